import { TaskError } from './task.error';
import { STATES_TIMEOUT } from '../state-machine.constants';

export class TimeoutError extends TaskError {
  constructor(cause?: string) {
    super(STATES_TIMEOUT, cause);
    this.name = 'TimeoutError';
  }
}
