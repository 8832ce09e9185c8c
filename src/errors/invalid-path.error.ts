export class InvalidPathError extends Error {
  constructor(
    public readonly path: string,
    reason: string,
  ) {
    super(`Invalid path "${path}": ${reason}`);
    this.name = 'InvalidPathError';
  }
}
