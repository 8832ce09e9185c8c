import type { FactoryProvider, ModuleMetadata } from '@nestjs/common';
import type { ExecutionScheduler } from '../utils/cancellable-timer';
import type { IExecutionStore } from './execution-store.interface';
import type {
  IResourceInvoker,
  TaskHandlerFn,
} from './resource-invoker.interface';
import type { WorkflowType } from './state-machine-definition.interface';

export interface StateMachineConfig {
  name: string;
  /** Parsed JSON document, or its JSON text. */
  definition: unknown;
  type?: WorkflowType;
  /** `${Key}` placeholders replaced in the document before loading. */
  definitionSubstitutions?: Record<string, string>;
}

export interface StateMachineModuleOptions {
  /** Resource invoker for Task states. Default: LocalResourceInvoker */
  invoker?: IResourceInvoker;
  /** In-process handlers registered on the default invoker */
  handlers?: Record<string, TaskHandlerFn>;
  /** Execution tracker. Default: InMemoryExecutionStore */
  store?: IExecutionStore;
  /** Clock and sleeps used for Wait states and retry backoff. Default: SystemScheduler */
  scheduler?: ExecutionScheduler;
  /** State machines registered at module init */
  stateMachines?: StateMachineConfig[];
  /** Mode for state machines that do not name one. Default: 'STANDARD' */
  defaultType?: WorkflowType;
  /** Clamp for Wait durations, in seconds. Default: no clamp */
  maxWaitSeconds?: number;
  /** Age after which terminal executions are purged. Default: 60 */
  retentionMinutes?: number;
  /** Cron expression for the retention sweep. Default: every minute */
  retentionCronExpression?: string;
  /** Enable the retention sweep. Default: true */
  enableRetentionCron?: boolean;
}

export interface ResolvedStateMachineModuleOptions {
  defaultType: WorkflowType;
  maxWaitSeconds?: number;
  retentionMinutes: number;
  retentionCronExpression: string;
  enableRetentionCron: boolean;
  stateMachines: StateMachineConfig[];
}

export interface StateMachineModuleAsyncOptions
  extends Pick<ModuleMetadata, 'imports'> {
  useFactory: (
    ...args: any[]
  ) => Promise<StateMachineModuleOptions> | StateMachineModuleOptions;
  inject?: FactoryProvider['inject'];
}
