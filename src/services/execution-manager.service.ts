import { randomUUID } from 'crypto';
import {
  Inject,
  Injectable,
  Logger,
  OnModuleDestroy,
} from '@nestjs/common';
import { EventEmitter2 } from '@nestjs/event-emitter';
import { ExecutionEngine } from '../engine/execution-engine';
import { CancellationError } from '../errors/cancellation.error';
import { ExecutionNotFoundError } from '../errors/execution-not-found.error';
import type {
  AsyncExecutionResult,
  ExecutionFilter,
  ExecutionOutcome,
  ExecutionRecord,
  ExecutionView,
  StateTransition,
  SyncExecutionResult,
} from '../interfaces/execution-records.interface';
import type { IExecutionStore } from '../interfaces/execution-store.interface';
import type { JsonValue } from '../interfaces/json.interface';
import type { IResourceInvoker } from '../interfaces/resource-invoker.interface';
import type { ResolvedStateMachineModuleOptions } from '../interfaces/state-machine-module-options.interface';
import {
  EXECUTION_ARN_PREFIX,
  EXECUTION_SCHEDULER,
  EXECUTION_STORE,
  RESOURCE_INVOKER,
  STATE_MACHINE_MODULE_OPTIONS,
  STATES_CANCELLED,
} from '../state-machine.constants';
import {
  type ExecutionScheduler,
  SystemScheduler,
} from '../utils/cancellable-timer';
import { StateMachineRegistry } from './state-machine-registry.service';

export interface StartExecutionOptions {
  /** Unique per state machine. Default: a random UUID */
  name?: string;
}

export interface StopExecutionOptions {
  error?: string;
  cause?: string;
}

interface RunningExecution {
  controller: AbortController;
  completion: Promise<ExecutionOutcome>;
}

/**
 * Starts executions of registered state machines and answers status
 * queries. STANDARD machines start in the background; EXPRESS machines
 * block until the execution finishes.
 */
@Injectable()
export class ExecutionManager implements OnModuleDestroy {
  private readonly logger = new Logger(ExecutionManager.name);
  private readonly engine: ExecutionEngine;
  private readonly scheduler: ExecutionScheduler;
  private readonly running = new Map<string, RunningExecution>();

  constructor(
    private readonly registry: StateMachineRegistry,
    @Inject(EXECUTION_STORE) private readonly store: IExecutionStore,
    @Inject(RESOURCE_INVOKER) invoker: IResourceInvoker,
    eventEmitter: EventEmitter2,
    @Inject(STATE_MACHINE_MODULE_OPTIONS)
    options: ResolvedStateMachineModuleOptions,
    @Inject(EXECUTION_SCHEDULER) scheduler?: ExecutionScheduler,
  ) {
    this.scheduler = scheduler ?? new SystemScheduler();
    this.engine = new ExecutionEngine(invoker, store, {
      eventEmitter,
      maxWaitSeconds: options.maxWaitSeconds,
      scheduler: this.scheduler,
    });
  }

  /** Starts in the mode the state machine is registered with. */
  async startExecution(
    stateMachineName: string,
    input: JsonValue = {},
    options: StartExecutionOptions = {},
  ): Promise<AsyncExecutionResult | SyncExecutionResult> {
    const { type } = this.registry.getOrThrow(stateMachineName);
    return type === 'EXPRESS'
      ? this.startSync(stateMachineName, input, options)
      : this.startAsync(stateMachineName, input, options);
  }

  /**
   * Returns once the execution record exists and the engine is running
   * in the background.
   */
  async startAsync(
    stateMachineName: string,
    input: JsonValue = {},
    options: StartExecutionOptions = {},
  ): Promise<AsyncExecutionResult> {
    const { executionId, startedAt } = await this.launch(
      stateMachineName,
      input,
      options,
    );
    return { executionId, startedAt };
  }

  /** Waits for the execution to finish and returns its result. */
  async startSync(
    stateMachineName: string,
    input: JsonValue = {},
    options: StartExecutionOptions = {},
  ): Promise<SyncExecutionResult> {
    const { executionId, startedAt, completion } = await this.launch(
      stateMachineName,
      input,
      options,
    );
    const outcome = await completion;

    if (outcome.status === 'SUCCEEDED') {
      return {
        executionId,
        status: outcome.status,
        output: outcome.output ?? null,
        startedAt,
        stoppedAt: outcome.stoppedAt,
      };
    }
    return {
      executionId,
      status: outcome.status,
      error: outcome.error ?? STATES_CANCELLED,
      cause: outcome.cause,
      startedAt,
      stoppedAt: outcome.stoppedAt,
    };
  }

  async describe(executionId: string): Promise<ExecutionView> {
    const view = await this.store.snapshot(executionId);
    if (!view) {
      throw new ExecutionNotFoundError(executionId);
    }
    return view;
  }

  async listHistory(executionId: string): Promise<StateTransition[]> {
    return (await this.describe(executionId)).history;
  }

  async listExecutions(filter?: ExecutionFilter): Promise<ExecutionRecord[]> {
    return this.store.list(filter);
  }

  /**
   * Stops a running execution: in-flight tasks, waits and retries are
   * cancelled and the execution ends ABORTED. A finished execution is
   * returned unchanged.
   */
  async stop(
    executionId: string,
    options: StopExecutionOptions = {},
  ): Promise<ExecutionView> {
    const execution = this.running.get(executionId);
    if (!execution) {
      const view = await this.describe(executionId);
      this.logger.warn(
        `Stop requested for ${executionId}, which is not running (status=${view.status})`,
      );
      return view;
    }

    this.logger.log(`Stopping execution ${executionId}`);
    execution.controller.abort(
      new CancellationError(options.cause ?? 'Execution was stopped', options.error),
    );
    await execution.completion;
    return this.describe(executionId);
  }

  /** Resolves with the execution's view once it has finished. */
  async awaitExecution(executionId: string): Promise<ExecutionView> {
    const execution = this.running.get(executionId);
    if (execution) {
      await execution.completion;
    }
    return this.describe(executionId);
  }

  async onModuleDestroy(): Promise<void> {
    if (this.running.size === 0) return;

    this.logger.log(`Aborting ${this.running.size} running execution(s) on shutdown`);
    const completions: Promise<ExecutionOutcome>[] = [];
    for (const execution of this.running.values()) {
      execution.controller.abort(new CancellationError('Module is shutting down'));
      completions.push(execution.completion);
    }
    await Promise.allSettled(completions);
  }

  private async launch(
    stateMachineName: string,
    input: JsonValue,
    options: StartExecutionOptions,
  ): Promise<{
    executionId: string;
    startedAt: Date;
    completion: Promise<ExecutionOutcome>;
  }> {
    const registration = this.registry.getOrThrow(stateMachineName);
    const name = options.name ?? randomUUID();
    const executionId = `${EXECUTION_ARN_PREFIX}${stateMachineName}:${name}`;
    const startedAt = this.scheduler.now();

    await this.store.create({
      executionId,
      name,
      stateMachineName,
      status: 'RUNNING',
      input,
      startedAt,
    });

    const controller = new AbortController();
    const completion = this.engine
      .run({
        executionId,
        name,
        stateMachineName,
        definition: registration.definition,
        input,
        startedAt,
        signal: controller.signal,
      })
      .finally(() => this.running.delete(executionId));
    this.running.set(executionId, { controller, completion });

    completion.catch((error: unknown) => {
      this.logger.error(
        `Execution ${executionId} could not be completed`,
        error instanceof Error ? error.stack : error,
      );
    });

    this.logger.log(
      `Started execution ${stateMachineName}/${name} (${registration.type})`,
    );
    return { executionId, startedAt, completion };
  }
}
