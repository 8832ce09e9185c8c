import { StatesError } from './states.error';
import { STATES_TASK_FAILED } from '../state-machine.constants';

export class TaskError extends StatesError {
  constructor(error: string = STATES_TASK_FAILED, cause?: string) {
    super(error, cause);
    this.name = 'TaskError';
  }
}
