import StateMachine from 'javascript-state-machine';
import type {
  ExecutionStatus,
  TerminalExecutionStatus,
} from '../interfaces/execution-records.interface';

const TRANSITION_BY_STATUS: Record<TerminalExecutionStatus, string> = {
  SUCCEEDED: 'succeed',
  FAILED: 'fail',
  TIMED_OUT: 'timeout',
  ABORTED: 'abort',
};

const STATUS_BY_STATE: Record<string, ExecutionStatus> = {
  pending: 'RUNNING',
  running: 'RUNNING',
  succeeded: 'SUCCEEDED',
  failed: 'FAILED',
  timedOut: 'TIMED_OUT',
  aborted: 'ABORTED',
};

/**
 * Status machine of a single execution walker: pending, then running,
 * then exactly one terminal status. Later attempts to settle are
 * rejected. A pending walker reports RUNNING, as its record does.
 */
export class ExecutionLifecycle {
  private readonly fsm: StateMachine;

  constructor() {
    this.fsm = new StateMachine({
      init: 'pending',
      transitions: [
        { name: 'start', from: 'pending', to: 'running' },
        { name: 'succeed', from: 'running', to: 'succeeded' },
        { name: 'fail', from: 'running', to: 'failed' },
        { name: 'timeout', from: 'running', to: 'timedOut' },
        { name: 'abort', from: ['pending', 'running'], to: 'aborted' },
      ],
    });
  }

  get status(): ExecutionStatus {
    return STATUS_BY_STATE[this.fsm.state] ?? 'RUNNING';
  }

  start(): void {
    this.fire('start');
  }

  /** Returns false when the execution has already settled. */
  settle(status: TerminalExecutionStatus): boolean {
    const transition = TRANSITION_BY_STATUS[status];
    if (!this.fsm.can(transition)) {
      return false;
    }
    this.fire(transition);
    return true;
  }

  private fire(transition: string): void {
    const fire = this.fsm[transition];
    if (typeof fire !== 'function') {
      throw new Error(`Lifecycle transition ${transition} is not available`);
    }
    fire.call(this.fsm);
  }
}
