import type { JsonValue } from './json.interface';
import type { StateType } from './state-machine-definition.interface';

export type ExecutionStatus =
  | 'RUNNING'
  | 'SUCCEEDED'
  | 'FAILED'
  | 'TIMED_OUT'
  | 'ABORTED';

export type TerminalExecutionStatus = Exclude<ExecutionStatus, 'RUNNING'>;

export interface StateTransition {
  /** Entry order within the execution, shared by nested branches and iterations. */
  sequence: number;
  stateName: string;
  stateType: StateType;
  /** `''` at top level, `Fan[1]` or `Fan[1]/Loop[3]` inside branches and iterations. */
  scope: string;
  /** 1-based; retried states record one transition per attempt. */
  attempt: number;
  enteredAt: Date;
  exitedAt: Date;
  input: JsonValue;
  output?: JsonValue;
  error?: string;
  cause?: string;
}

export interface ExecutionRecord {
  executionId: string;
  name: string;
  stateMachineName: string;
  status: ExecutionStatus;
  input: JsonValue;
  output?: JsonValue;
  error?: string;
  cause?: string;
  startedAt: Date;
  stoppedAt?: Date;
}

export interface ExecutionView extends ExecutionRecord {
  history: StateTransition[];
}

export interface ExecutionOutcome {
  status: TerminalExecutionStatus;
  output?: JsonValue;
  error?: string;
  cause?: string;
  stoppedAt: Date;
}

export type SyncExecutionResult =
  | {
      executionId: string;
      status: 'SUCCEEDED';
      output: JsonValue;
      startedAt: Date;
      stoppedAt: Date;
    }
  | {
      executionId: string;
      status: Exclude<TerminalExecutionStatus, 'SUCCEEDED'>;
      error: string;
      cause?: string;
      startedAt: Date;
      stoppedAt: Date;
    };

export interface AsyncExecutionResult {
  executionId: string;
  startedAt: Date;
}

export interface ExecutionFilter {
  stateMachineName?: string;
  status?: ExecutionStatus;
}
