/**
 * Base class for errors raised while a state machine runs. The `error`
 * field is the classification matched by retry and catch rules.
 */
export class StatesError extends Error {
  constructor(
    public readonly error: string,
    public readonly cause?: string,
  ) {
    super(cause ? `${error}: ${cause}` : error);
    this.name = 'StatesError';
  }
}
