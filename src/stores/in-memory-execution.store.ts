import { ExecutionAlreadyExistsError } from '../errors/execution-already-exists.error';
import { ExecutionNotFoundError } from '../errors/execution-not-found.error';
import type {
  ExecutionFilter,
  ExecutionOutcome,
  ExecutionRecord,
  ExecutionView,
  StateTransition,
} from '../interfaces/execution-records.interface';
import type { IExecutionStore } from '../interfaces/execution-store.interface';
import { cloneJson } from '../utils/json-path';

interface StoredExecution {
  record: ExecutionRecord;
  history: StateTransition[];
}

function cloneExecutionRecord(record: ExecutionRecord): ExecutionRecord {
  return {
    ...record,
    input: cloneJson(record.input),
    ...(record.output !== undefined ? { output: cloneJson(record.output) } : {}),
    startedAt: new Date(record.startedAt),
    ...(record.stoppedAt ? { stoppedAt: new Date(record.stoppedAt) } : {}),
  };
}

function cloneTransition(transition: StateTransition): StateTransition {
  return {
    ...transition,
    input: cloneJson(transition.input),
    ...(transition.output !== undefined
      ? { output: cloneJson(transition.output) }
      : {}),
    enteredAt: new Date(transition.enteredAt),
    exitedAt: new Date(transition.exitedAt),
  };
}

/**
 * Keeps executions in process memory. Every value is copied on the way
 * in and on the way out, so callers never share state with the store.
 */
export class InMemoryExecutionStore implements IExecutionStore {
  private readonly executions = new Map<string, StoredExecution>();

  async create(record: ExecutionRecord): Promise<void> {
    if (this.executions.has(record.executionId)) {
      throw new ExecutionAlreadyExistsError(record.executionId);
    }
    this.executions.set(record.executionId, {
      record: cloneExecutionRecord(record),
      history: [],
    });
  }

  async record(executionId: string, transition: StateTransition): Promise<void> {
    this.getOrThrow(executionId).history.push(cloneTransition(transition));
  }

  async complete(executionId: string, outcome: ExecutionOutcome): Promise<void> {
    const stored = this.getOrThrow(executionId);
    if (stored.record.status !== 'RUNNING') {
      throw new Error(
        `Execution "${executionId}" already finished with status ${stored.record.status}`,
      );
    }

    stored.record = {
      ...stored.record,
      status: outcome.status,
      ...(outcome.output !== undefined ? { output: cloneJson(outcome.output) } : {}),
      ...(outcome.error !== undefined ? { error: outcome.error } : {}),
      ...(outcome.cause !== undefined ? { cause: outcome.cause } : {}),
      stoppedAt: new Date(outcome.stoppedAt),
    };
  }

  async snapshot(executionId: string): Promise<ExecutionView | null> {
    const stored = this.executions.get(executionId);
    if (!stored) return null;

    return {
      ...cloneExecutionRecord(stored.record),
      history: [...stored.history]
        .sort((a, b) => a.sequence - b.sequence)
        .map((transition) => cloneTransition(transition)),
    };
  }

  async list(filter: ExecutionFilter = {}): Promise<ExecutionRecord[]> {
    const matches: ExecutionRecord[] = [];
    for (const { record } of this.executions.values()) {
      if (
        filter.stateMachineName !== undefined &&
        record.stateMachineName !== filter.stateMachineName
      ) {
        continue;
      }
      if (filter.status !== undefined && record.status !== filter.status) {
        continue;
      }
      matches.push(cloneExecutionRecord(record));
    }

    return matches.sort((a, b) => a.startedAt.getTime() - b.startedAt.getTime());
  }

  async findStoppedBefore(cutoff: Date): Promise<string[]> {
    const expired: string[] = [];
    for (const { record } of this.executions.values()) {
      if (record.stoppedAt && record.stoppedAt.getTime() < cutoff.getTime()) {
        expired.push(record.executionId);
      }
    }
    return expired;
  }

  async delete(executionId: string): Promise<boolean> {
    return this.executions.delete(executionId);
  }

  private getOrThrow(executionId: string): StoredExecution {
    const stored = this.executions.get(executionId);
    if (!stored) {
      throw new ExecutionNotFoundError(executionId);
    }
    return stored;
  }
}
