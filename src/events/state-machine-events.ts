import type { JsonValue } from '../interfaces/json.interface';
import type { TerminalExecutionStatus } from '../interfaces/execution-records.interface';
import type { StateType } from '../interfaces/state-machine-definition.interface';

export interface ExecutionStartedEvent {
  executionId: string;
  stateMachineName: string;
  input: JsonValue;
  timestamp: Date;
}

export interface ExecutionCompletedEvent {
  executionId: string;
  stateMachineName: string;
  status: TerminalExecutionStatus;
  output?: JsonValue;
  error?: string;
  cause?: string;
  timestamp: Date;
}

export interface StateEnteredEvent {
  executionId: string;
  stateName: string;
  stateType: StateType;
  scope: string;
  attempt: number;
  timestamp: Date;
}

export interface StateExitedEvent extends StateEnteredEvent {
  error?: string;
}

export interface RetryScheduledEvent {
  executionId: string;
  stateName: string;
  scope: string;
  error: string;
  attempt: number;
  delaySeconds: number;
  timestamp: Date;
}

export interface ExecutionsPurgedEvent {
  executionIds: string[];
  cutoff: Date;
  timestamp: Date;
}
