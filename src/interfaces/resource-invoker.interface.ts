import type { JsonValue } from './json.interface';

export interface InvocationContext {
  executionId: string;
  stateName: string;
  attempt: number;
  /** Aborted on stop, timeout, or when a sibling branch fails. */
  signal: AbortSignal;
}

export interface IResourceInvoker {
  /**
   * Invoke the resource with the task payload.
   * Failures should throw; a `StatesError` keeps its classification,
   * other errors are classified by name.
   */
  invoke(
    resource: string,
    payload: JsonValue,
    context: InvocationContext,
  ): Promise<JsonValue>;
}

export type TaskHandlerFn = (
  payload: JsonValue,
  context: InvocationContext,
) => JsonValue | Promise<JsonValue>;
