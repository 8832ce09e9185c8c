import { StatesError } from './states.error';
import { STATES_RUNTIME } from '../state-machine.constants';

export class StatesRuntimeError extends StatesError {
  constructor(cause: string, error: string = STATES_RUNTIME) {
    super(error, cause);
    this.name = 'StatesRuntimeError';
  }
}
