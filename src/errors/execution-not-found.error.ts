export class ExecutionNotFoundError extends Error {
  constructor(public readonly executionId: string) {
    super(`Execution "${executionId}" does not exist.`);
    this.name = 'ExecutionNotFoundError';
  }
}
