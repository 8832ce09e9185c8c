import { Logger } from '@nestjs/common';
import { TaskError } from '../errors/task.error';
import type { JsonValue } from '../interfaces/json.interface';
import type {
  InvocationContext,
  IResourceInvoker,
  TaskHandlerFn,
} from '../interfaces/resource-invoker.interface';
import { STATES_TASK_FAILED } from '../state-machine.constants';
import { isJsonObject } from '../utils/json-path';

const FUNCTION_ARN_MARKER = ':function:';
const FUNCTION_PATH_MARKER = 'function/';
const LAMBDA_INVOKE_MARKER = 'lambda:invoke';

/**
 * Function name carried by a resource id: `…:function:Name[:qualifier]`,
 * `…function/Name[:qualifier]`, or the last `:`-separated segment.
 */
export function extractFunctionName(resource: string): string {
  for (const marker of [FUNCTION_ARN_MARKER, FUNCTION_PATH_MARKER]) {
    const at = resource.lastIndexOf(marker);
    if (at >= 0) {
      return resource.slice(at + marker.length).split(':')[0];
    }
  }
  const at = resource.lastIndexOf(':');
  return at >= 0 ? resource.slice(at + 1) : resource;
}

/**
 * Resolves Task resources to handlers registered in this process.
 * `…:states:::lambda:invoke` resources read `FunctionName` and `Payload`
 * from the task payload and wrap the result in `{ Payload, StatusCode }`.
 */
export class LocalResourceInvoker implements IResourceInvoker {
  private readonly logger = new Logger(LocalResourceInvoker.name);
  private readonly handlers = new Map<string, TaskHandlerFn>();

  constructor(handlers: Record<string, TaskHandlerFn> = {}) {
    for (const [name, handler] of Object.entries(handlers)) {
      this.register(name, handler);
    }
  }

  register(name: string, handler: TaskHandlerFn): void {
    if (this.handlers.has(name)) {
      this.logger.warn(`Replacing task handler "${name}"`);
    }
    this.handlers.set(name, handler);
  }

  has(resource: string): boolean {
    return this.resolve(resource) !== undefined;
  }

  get registeredNames(): string[] {
    return [...this.handlers.keys()];
  }

  async invoke(
    resource: string,
    payload: JsonValue,
    context: InvocationContext,
  ): Promise<JsonValue> {
    if (resource.includes(LAMBDA_INVOKE_MARKER) && isJsonObject(payload)) {
      const functionName = payload.FunctionName;
      if (typeof functionName !== 'string') {
        throw new TaskError(
          STATES_TASK_FAILED,
          `${resource} requires a FunctionName parameter`,
        );
      }
      const inner = payload.Payload === undefined ? payload : payload.Payload;
      const result = await this.call(functionName, inner, context);
      return { Payload: result, StatusCode: 200 };
    }

    return this.call(resource, payload, context);
  }

  private async call(
    resource: string,
    payload: JsonValue,
    context: InvocationContext,
  ): Promise<JsonValue> {
    const handler = this.resolve(resource);
    if (!handler) {
      throw new TaskError(
        STATES_TASK_FAILED,
        `No task handler registered for resource "${resource}"`,
      );
    }
    return handler(payload, context);
  }

  private resolve(resource: string): TaskHandlerFn | undefined {
    return this.handlers.get(resource) ?? this.handlers.get(extractFunctionName(resource));
  }
}
