import { Logger } from '@nestjs/common';
import type { EventEmitter2 } from '@nestjs/event-emitter';
import { CancellationError } from '../errors/cancellation.error';
import { ChoiceNoMatchError } from '../errors/choice-no-match.error';
import { ExecutionTimeoutError } from '../errors/execution-timeout.error';
import { StatesError } from '../errors/states.error';
import { StatesRuntimeError } from '../errors/states-runtime.error';
import { TimeoutError } from '../errors/timeout.error';
import { StateMachineEventType } from '../events/state-machine-event-type.enum';
import type {
  ExecutionCompletedEvent,
  ExecutionStartedEvent,
  RetryScheduledEvent,
  StateEnteredEvent,
  StateExitedEvent,
} from '../events/state-machine-events';
import type {
  ExecutionOutcome,
  StateTransition,
} from '../interfaces/execution-records.interface';
import type { IExecutionStore } from '../interfaces/execution-store.interface';
import type { JsonObject, JsonValue } from '../interfaces/json.interface';
import type { IResourceInvoker } from '../interfaces/resource-invoker.interface';
import type {
  MapState,
  ParallelState,
  State,
  StateMachineDefinition,
  TaskState,
  WaitDuration,
  WaitState,
} from '../interfaces/state-machine-definition.interface';
import { STATES_FAIL } from '../state-machine.constants';
import {
  abortReason,
  type ExecutionScheduler,
  linkAbortController,
  raceWithSignal,
  SystemScheduler,
} from '../utils/cancellable-timer';
import { evaluateChoices, isTimestamp } from '../utils/choice-rules';
import { classifyError } from '../utils/classify-error';
import { cloneJson, getPath } from '../utils/json-path';
import { resolveTemplate } from '../utils/payload-template';
import { decide, toDelayMs } from '../utils/retry-policy';
import {
  applyInputPath,
  applyOutputPath,
  applyResultPath,
} from '../utils/state-io';
import { ExecutionLifecycle } from './execution-lifecycle';

export interface ExecutionRequest {
  executionId: string;
  name: string;
  stateMachineName: string;
  definition: StateMachineDefinition;
  input: JsonValue;
  startedAt: Date;
  /** Aborting stops the execution; a `CancellationError` reason keeps its stop error. */
  signal: AbortSignal;
}

export interface ExecutionEngineOptions {
  eventEmitter?: EventEmitter2;
  /** Upper bound for Wait durations, in seconds. */
  maxWaitSeconds?: number;
  scheduler?: ExecutionScheduler;
}

interface WalkContext {
  request: ExecutionRequest;
  scope: string;
  signal: AbortSignal;
  /** Entry order, shared by every branch and iteration of one execution. */
  sequence: { next: number };
  mapItem?: { index: number; value: JsonValue };
}

interface AttemptInfo {
  attempt: number;
  enteredAt: Date;
}

/** Where the walk goes after a state: `next` is absent when the region ends. */
interface Step {
  output: JsonValue;
  next?: string;
}

type AttemptResult =
  | { ok: true; step: Step }
  | { ok: false; error: StatesError };

function childScope(parent: string, stateName: string, index: number): string {
  const segment = `${stateName}[${index}]`;
  return parent ? `${parent}/${segment}` : segment;
}

/**
 * Walks a definition from its start state to a terminal state. Parallel
 * branches and Map iterations are walked by the same loop, recursively,
 * each under its own abort signal.
 */
export class ExecutionEngine {
  private readonly logger = new Logger(ExecutionEngine.name);
  private readonly scheduler: ExecutionScheduler;

  constructor(
    private readonly invoker: IResourceInvoker,
    private readonly store: IExecutionStore,
    private readonly options: ExecutionEngineOptions = {},
  ) {
    this.scheduler = options.scheduler ?? new SystemScheduler();
  }

  /**
   * Runs one execution to completion and stores its outcome. The record
   * must already exist in the store. Never rejects on workflow failures;
   * the outcome carries them.
   */
  async run(request: ExecutionRequest): Promise<ExecutionOutcome> {
    const lifecycle = new ExecutionLifecycle();
    const { controller, dispose } = linkAbortController(request.signal);
    const { timeoutSeconds } = request.definition;
    const cancelCeiling =
      timeoutSeconds === undefined
        ? undefined
        : this.scheduler.schedule(toDelayMs(timeoutSeconds), () =>
            controller.abort(new ExecutionTimeoutError(timeoutSeconds)),
          );

    lifecycle.start();
    this.emit(StateMachineEventType.EXECUTION_STARTED, {
      executionId: request.executionId,
      stateMachineName: request.stateMachineName,
      input: request.input,
      timestamp: this.scheduler.now(),
    } satisfies ExecutionStartedEvent);

    let outcome: ExecutionOutcome;
    try {
      const output = await this.runDefinition(request.definition, request.input, {
        request,
        scope: '',
        signal: controller.signal,
        sequence: { next: 0 },
      });
      outcome = { status: 'SUCCEEDED', output, stoppedAt: this.scheduler.now() };
    } catch (thrown) {
      outcome = this.toFailureOutcome(thrown);
    } finally {
      cancelCeiling?.();
      dispose();
    }

    if (!lifecycle.settle(outcome.status)) {
      this.logger.warn(
        `Execution ${request.executionId} already settled as ${lifecycle.status}; ignoring ${outcome.status}`,
      );
      return outcome;
    }
    await this.store.complete(request.executionId, outcome);

    this.logger.log(
      `Execution ${request.stateMachineName}/${request.executionId} finished: ${lifecycle.status}`,
    );
    this.emit(this.completionEvent(outcome), {
      executionId: request.executionId,
      stateMachineName: request.stateMachineName,
      status: outcome.status,
      output: outcome.output,
      error: outcome.error,
      cause: outcome.cause,
      timestamp: outcome.stoppedAt,
    } satisfies ExecutionCompletedEvent);

    return outcome;
  }

  private toFailureOutcome(thrown: unknown): ExecutionOutcome {
    const stoppedAt = this.scheduler.now();
    if (thrown instanceof CancellationError) {
      return {
        status: 'ABORTED',
        error: thrown.stopError ?? thrown.error,
        cause: thrown.cause,
        stoppedAt,
      };
    }
    if (thrown instanceof ExecutionTimeoutError) {
      return { status: 'TIMED_OUT', error: thrown.error, cause: thrown.cause, stoppedAt };
    }

    const error = classifyError(thrown);
    return { status: 'FAILED', error: error.error, cause: error.cause, stoppedAt };
  }

  private completionEvent(outcome: ExecutionOutcome): StateMachineEventType {
    switch (outcome.status) {
      case 'SUCCEEDED':
        return StateMachineEventType.EXECUTION_SUCCEEDED;
      case 'FAILED':
        return StateMachineEventType.EXECUTION_FAILED;
      case 'TIMED_OUT':
        return StateMachineEventType.EXECUTION_TIMED_OUT;
      case 'ABORTED':
        return StateMachineEventType.EXECUTION_ABORTED;
    }
  }

  private async runDefinition(
    definition: StateMachineDefinition,
    input: JsonValue,
    ctx: WalkContext,
  ): Promise<JsonValue> {
    let stateName = definition.startAt;
    let value = input;

    for (;;) {
      if (ctx.signal.aborted) {
        throw abortReason(ctx.signal);
      }

      const state = definition.states.get(stateName);
      if (!state) {
        throw new StatesRuntimeError(`State "${stateName}" is not defined`);
      }

      const step = await this.enterState(state, value, ctx);
      if (step.next === undefined) {
        return step.output;
      }
      stateName = step.next;
      value = step.output;
    }
  }

  /**
   * Runs attempts of one state until it produces a step, is caught, or
   * propagates. Every attempt is recorded as its own transition.
   */
  private async enterState(
    state: State,
    input: JsonValue,
    ctx: WalkContext,
  ): Promise<Step> {
    const retryRules = 'retry' in state ? state.retry : [];
    const catchRules = 'catch' in state ? state.catch : [];
    const retriesByRule: number[] = [];

    for (let attempt = 1; ; attempt += 1) {
      const sequence = ctx.sequence.next++;
      const enteredAt = this.scheduler.now();
      const entered: StateEnteredEvent = {
        executionId: ctx.request.executionId,
        stateName: state.name,
        stateType: state.type,
        scope: ctx.scope,
        attempt,
        timestamp: enteredAt,
      };
      this.emit(StateMachineEventType.STATE_ENTERED, entered);

      const inputAtEntry = cloneJson(input);
      const result = await this.attempt(state, input, ctx, { attempt, enteredAt });
      const transition: StateTransition = {
        sequence,
        stateName: state.name,
        stateType: state.type,
        scope: ctx.scope,
        attempt,
        enteredAt,
        exitedAt: this.scheduler.now(),
        input: inputAtEntry,
        ...(result.ok
          ? { output: result.step.output }
          : { error: result.error.error, cause: result.error.cause }),
      };
      await this.store.record(ctx.request.executionId, transition);
      this.emit(StateMachineEventType.STATE_EXITED, {
        ...entered,
        timestamp: transition.exitedAt,
        error: transition.error,
      } satisfies StateExitedEvent);

      if (result.ok) {
        return result.step;
      }

      const decision = decide(result.error, retryRules, catchRules, retriesByRule);
      switch (decision.kind) {
        case 'retry': {
          retriesByRule[decision.ruleIndex] = decision.retriesSoFar + 1;
          this.logger.warn(
            `Retrying ${state.name} in ${decision.delaySeconds}s after ${result.error.error} (attempt ${attempt})`,
          );
          this.emit(StateMachineEventType.RETRY_SCHEDULED, {
            executionId: ctx.request.executionId,
            stateName: state.name,
            scope: ctx.scope,
            error: result.error.error,
            attempt,
            delaySeconds: decision.delaySeconds,
            timestamp: this.scheduler.now(),
          } satisfies RetryScheduledEvent);
          await this.scheduler.sleep(toDelayMs(decision.delaySeconds), ctx.signal);
          break;
        }
        case 'catch':
          return {
            output: applyResultPath(input, decision.envelope, decision.resultPath),
            next: decision.next,
          };
        case 'propagate':
          throw result.error;
      }
    }
  }

  private async attempt(
    state: State,
    input: JsonValue,
    ctx: WalkContext,
    info: AttemptInfo,
  ): Promise<AttemptResult> {
    try {
      return { ok: true, step: await this.process(state, input, ctx, info) };
    } catch (thrown) {
      return { ok: false, error: classifyError(thrown) };
    }
  }

  private async process(
    state: State,
    input: JsonValue,
    ctx: WalkContext,
    info: AttemptInfo,
  ): Promise<Step> {
    switch (state.type) {
      case 'Pass': {
        const effective = applyInputPath(input, state.inputPath);
        let result = effective;
        if (state.result !== undefined) {
          result = cloneJson(state.result);
        } else if (state.parameters !== undefined) {
          result = resolveTemplate(
            state.parameters,
            effective,
            this.contextObject(state, ctx, info),
          );
        }
        return this.finish(state, input, result);
      }

      case 'Task':
        return this.runTask(state, input, ctx, info);

      case 'Choice': {
        const effective = applyInputPath(input, state.inputPath);
        const next = evaluateChoices(state.choices, effective) ?? state.default;
        if (next === undefined) {
          throw new ChoiceNoMatchError(state.name);
        }
        return { output: applyOutputPath(effective, state.outputPath), next };
      }

      case 'Wait': {
        const effective = applyInputPath(input, state.inputPath);
        await this.scheduler.sleep(this.resolveWaitMs(state, effective), ctx.signal);
        return {
          output: applyOutputPath(effective, state.outputPath),
          next: state.next,
        };
      }

      case 'Succeed': {
        const effective = applyInputPath(input, state.inputPath);
        return { output: applyOutputPath(effective, state.outputPath) };
      }

      case 'Fail':
        throw new StatesError(state.error ?? STATES_FAIL, state.cause);

      case 'Parallel':
        return this.runParallel(state, input, ctx, info);

      case 'Map':
        return this.runMap(state, input, ctx, info);
    }
  }

  private finish(
    state: { resultPath: string | null; outputPath: string | null; next?: string },
    input: JsonValue,
    result: JsonValue,
  ): Step {
    return {
      output: applyOutputPath(
        applyResultPath(input, result, state.resultPath),
        state.outputPath,
      ),
      next: state.next,
    };
  }

  private select(
    selector: JsonValue | undefined,
    raw: JsonValue,
    context: JsonObject,
  ): JsonValue {
    return selector === undefined ? raw : resolveTemplate(selector, raw, context);
  }

  private async runTask(
    state: TaskState,
    input: JsonValue,
    ctx: WalkContext,
    info: AttemptInfo,
  ): Promise<Step> {
    const effective = applyInputPath(input, state.inputPath);
    const context = this.contextObject(state, ctx, info);
    // Handlers get their own copy; the carried value stays untouched.
    const payload = cloneJson(
      state.parameters === undefined
        ? effective
        : resolveTemplate(state.parameters, effective, context),
    );

    const { controller, dispose } = linkAbortController(ctx.signal);
    const { timeoutSeconds } = state;
    const cancelTimer =
      timeoutSeconds === undefined
        ? undefined
        : this.scheduler.schedule(toDelayMs(timeoutSeconds), () =>
            controller.abort(
              new TimeoutError(`Task timed out after ${timeoutSeconds} seconds`),
            ),
          );

    let raw: JsonValue;
    try {
      raw = await raceWithSignal(
        this.invoker.invoke(state.resource, payload, {
          executionId: ctx.request.executionId,
          stateName: state.name,
          attempt: info.attempt,
          signal: controller.signal,
        }),
        controller.signal,
      );
    } finally {
      cancelTimer?.();
      dispose();
    }

    return this.finish(state, input, this.select(state.resultSelector, raw, context));
  }

  private async runParallel(
    state: ParallelState,
    input: JsonValue,
    ctx: WalkContext,
    info: AttemptInfo,
  ): Promise<Step> {
    const effective = applyInputPath(input, state.inputPath);
    const outputs = await this.fanOut(
      state.branches.length,
      0,
      ctx.signal,
      (index, signal) =>
        this.runDefinition(state.branches[index], cloneJson(effective), {
          request: ctx.request,
          scope: childScope(ctx.scope, state.name, index),
          signal,
          sequence: ctx.sequence,
        }),
    );

    const context = this.contextObject(state, ctx, info);
    return this.finish(state, input, this.select(state.resultSelector, outputs, context));
  }

  private async runMap(
    state: MapState,
    input: JsonValue,
    ctx: WalkContext,
    info: AttemptInfo,
  ): Promise<Step> {
    const effective = applyInputPath(input, state.inputPath);
    const lookup = getPath(effective, state.itemsPath);
    if (!lookup.found || !Array.isArray(lookup.value)) {
      throw new StatesRuntimeError(
        `ItemsPath '${state.itemsPath}' of state "${state.name}" did not select an array`,
      );
    }
    const items = lookup.value;

    const outputs = await this.fanOut(
      items.length,
      state.maxConcurrency,
      ctx.signal,
      (index, signal) => {
        const itemCtx: WalkContext = {
          request: ctx.request,
          scope: childScope(ctx.scope, state.name, index),
          signal,
          sequence: ctx.sequence,
          mapItem: { index, value: items[index] },
        };
        const itemInput =
          state.parameters === undefined
            ? cloneJson(items[index])
            : resolveTemplate(
                state.parameters,
                effective,
                this.contextObject(state, itemCtx, info),
              );
        return this.runDefinition(state.iterator, itemInput, itemCtx);
      },
    );

    const context = this.contextObject(state, ctx, info);
    return this.finish(state, input, this.select(state.resultSelector, outputs, context));
  }

  /**
   * Runs `count` units with at most `limit` in flight (0 = all at once)
   * and returns their results by index. The first failure aborts the
   * remaining units and is rethrown once every unit has settled.
   */
  private async fanOut(
    count: number,
    limit: number,
    parent: AbortSignal,
    work: (index: number, signal: AbortSignal) => Promise<JsonValue>,
  ): Promise<JsonValue[]> {
    const { controller, dispose } = linkAbortController(parent);
    const results: JsonValue[] = [];
    let cursor = 0;
    let failure: { error: unknown } | undefined;

    const worker = async (): Promise<void> => {
      while (cursor < count && !controller.signal.aborted) {
        const index = cursor;
        cursor += 1;
        try {
          results[index] = await work(index, controller.signal);
        } catch (error) {
          if (!failure) {
            failure = { error };
            controller.abort(new CancellationError('A sibling branch failed'));
          }
          return;
        }
      }
    };

    const workers = limit > 0 ? Math.min(limit, count) : count;
    try {
      await Promise.all(Array.from({ length: workers }, () => worker()));
    } finally {
      dispose();
    }

    if (failure) {
      throw failure.error;
    }
    if (parent.aborted) {
      throw abortReason(parent);
    }
    return results;
  }

  private resolveWaitMs(state: WaitState, input: JsonValue): number {
    const seconds = this.waitSeconds(state.wait, input);
    const { maxWaitSeconds } = this.options;
    return toDelayMs(
      maxWaitSeconds === undefined ? seconds : Math.min(seconds, maxWaitSeconds),
    );
  }

  private waitSeconds(wait: WaitDuration, input: JsonValue): number {
    switch (wait.kind) {
      case 'seconds':
        return wait.seconds;
      case 'secondsPath': {
        const lookup = getPath(input, wait.path);
        if (!lookup.found || typeof lookup.value !== 'number' || lookup.value < 0) {
          throw new StatesRuntimeError(
            `SecondsPath '${wait.path}' did not select a non-negative number`,
          );
        }
        return lookup.value;
      }
      case 'timestamp':
        return this.secondsUntil(wait.timestamp);
      case 'timestampPath': {
        const lookup = getPath(input, wait.path);
        if (!lookup.found || !isTimestamp(lookup.value)) {
          throw new StatesRuntimeError(
            `TimestampPath '${wait.path}' did not select a timestamp`,
          );
        }
        return this.secondsUntil(lookup.value);
      }
    }
  }

  private secondsUntil(timestamp: string): number {
    return Math.max(0, (Date.parse(timestamp) - this.scheduler.now().getTime()) / 1000);
  }

  private contextObject(
    state: State,
    ctx: WalkContext,
    info: AttemptInfo,
  ): JsonObject {
    const { request } = ctx;
    const context: JsonObject = {
      Execution: {
        Id: request.executionId,
        Name: request.name,
        Input: request.input,
        StartTime: request.startedAt.toISOString(),
      },
      StateMachine: { Name: request.stateMachineName },
      State: {
        Name: state.name,
        EnteredTime: info.enteredAt.toISOString(),
        RetryCount: info.attempt - 1,
      },
    };
    if (ctx.mapItem) {
      context.Map = {
        Item: { Index: ctx.mapItem.index, Value: ctx.mapItem.value },
      };
    }
    return context;
  }

  private emit(event: StateMachineEventType, payload: object): void {
    if (!this.options.eventEmitter) {
      return;
    }
    try {
      this.options.eventEmitter.emit(event, payload);
    } catch (error) {
      this.logger.error(
        `Listener for ${event} failed: ${error instanceof Error ? error.message : String(error)}`,
      );
    }
  }
}
