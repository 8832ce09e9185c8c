export class StateMachineNotFoundError extends Error {
  constructor(public readonly stateMachineName: string) {
    super(`No state machine registered with name "${stateMachineName}".`);
    this.name = 'StateMachineNotFoundError';
  }
}
