export class ExecutionAlreadyExistsError extends Error {
  constructor(public readonly executionId: string) {
    super(`Execution "${executionId}" already exists.`);
    this.name = 'ExecutionAlreadyExistsError';
  }
}
