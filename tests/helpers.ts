import { DiscoveryService, Reflector } from '@nestjs/core';
import { ExecutionEngine } from '../src/engine/execution-engine';
import type { AslDocument } from '../src/interfaces/asl-document.interface';
import type {
  ExecutionOutcome,
  ExecutionView,
} from '../src/interfaces/execution-records.interface';
import type { JsonValue } from '../src/interfaces/json.interface';
import type { TaskHandlerFn } from '../src/interfaces/resource-invoker.interface';
import type { ResolvedStateMachineModuleOptions } from '../src/interfaces/state-machine-module-options.interface';
import { LocalResourceInvoker } from '../src/invokers/local-resource.invoker';
import { StateMachineRegistry } from '../src/services/state-machine-registry.service';
import { InMemoryExecutionStore } from '../src/stores/in-memory-execution.store';
import {
  abortReason,
  type ExecutionScheduler,
} from '../src/utils/cancellable-timer';
import { loadDefinition } from '../src/utils/load-definition';

export const FIXED_NOW = new Date('2024-01-01T00:00:00.000Z');

export function createResolvedOptions(
  overrides: Partial<ResolvedStateMachineModuleOptions> = {},
): ResolvedStateMachineModuleOptions {
  return {
    defaultType: 'STANDARD',
    retentionMinutes: 60,
    retentionCronExpression: '0 * * * * *',
    enableRetentionCron: false,
    stateMachines: [],
    ...overrides,
  };
}

export function createMockRegistry(
  overrides: Partial<ResolvedStateMachineModuleOptions> = {},
): StateMachineRegistry {
  const mockDiscovery = {
    getProviders: () => [],
  } as unknown as DiscoveryService;
  const mockReflector = { get: () => undefined } as unknown as Reflector;
  return new StateMachineRegistry(
    mockDiscovery,
    mockReflector,
    createResolvedOptions(overrides),
  );
}

interface VirtualTimer {
  dueAt: number;
  onElapsed: () => void;
}

/**
 * Sleeps return at once and advance a virtual clock, so waits and
 * backoffs are observable without real time passing. Scheduled timers
 * fire when the clock passes their due time.
 */
export class VirtualScheduler implements ExecutionScheduler {
  readonly sleeps: number[] = [];
  private clock = FIXED_NOW.getTime();
  private readonly timers = new Set<VirtualTimer>();

  now(): Date {
    return new Date(this.clock);
  }

  async sleep(delayMs: number, signal: AbortSignal): Promise<void> {
    if (signal.aborted) {
      throw abortReason(signal);
    }
    this.sleeps.push(delayMs);
    this.advance(delayMs);
    if (signal.aborted) {
      throw abortReason(signal);
    }
  }

  schedule(delayMs: number, onElapsed: () => void): () => void {
    const timer: VirtualTimer = { dueAt: this.clock + delayMs, onElapsed };
    this.timers.add(timer);
    return () => {
      this.timers.delete(timer);
    };
  }

  get pendingTimers(): number {
    return this.timers.size;
  }

  advance(delayMs: number): void {
    this.clock += delayMs;
    const due = [...this.timers]
      .filter((timer) => timer.dueAt <= this.clock)
      .sort((a, b) => a.dueAt - b.dueAt);
    for (const timer of due) {
      this.timers.delete(timer);
      timer.onElapsed();
    }
  }
}

export interface Deferred<T> {
  promise: Promise<T>;
  resolve: (value: T) => void;
  reject: (reason: Error) => void;
}

export function createDeferred<T>(): Deferred<T> {
  let resolve: (value: T) => void = () => undefined;
  let reject: (reason: Error) => void = () => undefined;
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}

/** Lets pending promise callbacks run. */
export async function flushPromises(rounds = 10): Promise<void> {
  for (let i = 0; i < rounds; i++) {
    await new Promise<void>((resolve) => setImmediate(resolve));
  }
}

export interface EngineHarness {
  engine: ExecutionEngine;
  store: InMemoryExecutionStore;
  invoker: LocalResourceInvoker;
  scheduler: VirtualScheduler;
}

export function createEngineHarness(
  handlers: Record<string, TaskHandlerFn> = {},
  maxWaitSeconds?: number,
): EngineHarness {
  const store = new InMemoryExecutionStore();
  const invoker = new LocalResourceInvoker(handlers);
  const scheduler = new VirtualScheduler();
  const engine = new ExecutionEngine(invoker, store, {
    scheduler,
    maxWaitSeconds,
  });
  return { engine, store, invoker, scheduler };
}

export interface RunResult {
  outcome: ExecutionOutcome;
  view: ExecutionView;
}

let executionCounter = 0;

export async function runDocument(
  harness: EngineHarness,
  document: AslDocument,
  input: JsonValue = {},
  signal: AbortSignal = new AbortController().signal,
): Promise<RunResult> {
  executionCounter += 1;
  const executionId = `test-execution-${executionCounter}`;
  const startedAt = harness.scheduler.now();

  await harness.store.create({
    executionId,
    name: executionId,
    stateMachineName: 'test-machine',
    status: 'RUNNING',
    input,
    startedAt,
  });

  const outcome = await harness.engine.run({
    executionId,
    name: executionId,
    stateMachineName: 'test-machine',
    definition: loadDefinition(document),
    input,
    startedAt,
    signal,
  });

  const view = await harness.store.snapshot(executionId);
  if (!view) {
    throw new Error(`Execution ${executionId} vanished from the store`);
  }
  return { outcome, view };
}
