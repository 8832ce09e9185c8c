import type {
  ExecutionFilter,
  ExecutionOutcome,
  ExecutionRecord,
  ExecutionView,
  StateTransition,
} from './execution-records.interface';

export interface IExecutionStore {
  /**
   * Insert a new execution in RUNNING state.
   * Rejects when the execution id is already taken.
   */
  create(record: ExecutionRecord): Promise<void>;

  /**
   * Append a completed state transition. History is append-only.
   */
  record(executionId: string, transition: StateTransition): Promise<void>;

  /**
   * Store the terminal outcome. Only a RUNNING execution may be completed.
   */
  complete(executionId: string, outcome: ExecutionOutcome): Promise<void>;

  /**
   * Point-in-time copy of an execution and its history, ordered by entry.
   */
  snapshot(executionId: string): Promise<ExecutionView | null>;

  list(filter?: ExecutionFilter): Promise<ExecutionRecord[]>;

  /**
   * Ids of terminal executions stopped before the cutoff.
   * Enables retention sweeps.
   */
  findStoppedBefore(cutoff: Date): Promise<string[]>;

  delete(executionId: string): Promise<boolean>;
}
