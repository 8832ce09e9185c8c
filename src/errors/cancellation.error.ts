import { StatesError } from './states.error';
import { STATES_CANCELLED } from '../state-machine.constants';

/**
 * Raised into in-flight work when an execution is stopped or a sibling
 * branch fails. Never offered to retry or catch rules.
 */
export class CancellationError extends StatesError {
  constructor(
    cause = 'Execution was cancelled',
    public readonly stopError?: string,
  ) {
    super(STATES_CANCELLED, cause);
    this.name = 'CancellationError';
  }
}
