import { StatesError } from './states.error';
import { STATES_TIMEOUT } from '../state-machine.constants';

export class ExecutionTimeoutError extends StatesError {
  constructor(public readonly timeoutSeconds: number) {
    super(
      STATES_TIMEOUT,
      `Execution exceeded its TimeoutSeconds of ${timeoutSeconds}`,
    );
    this.name = 'ExecutionTimeoutError';
  }
}
