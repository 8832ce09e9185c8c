export class DuplicateRegistrationError extends Error {
  constructor(
    public readonly stateMachineName: string,
    public readonly class1: string,
    public readonly class2: string,
  ) {
    super(
      `Duplicate state machine name "${stateMachineName}". ` +
        `Both ${class1} and ${class2} are registered with the same name.`,
    );
    this.name = 'DuplicateRegistrationError';
  }
}
