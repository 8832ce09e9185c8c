import { DynamicModule, Module, Provider } from '@nestjs/common';
import { DiscoveryModule } from '@nestjs/core';
import { EventEmitterModule } from '@nestjs/event-emitter';
import { ExecutionManager } from './services/execution-manager.service';
import { ExecutionRetentionService } from './services/execution-retention.service';
import { StateMachineRegistry } from './services/state-machine-registry.service';
import { TaskHandlerExplorer } from './services/task-handler-explorer.service';
import { InMemoryExecutionStore } from './stores/in-memory-execution.store';
import { LocalResourceInvoker } from './invokers/local-resource.invoker';
import { SystemScheduler } from './utils/cancellable-timer';
import {
  ResolvedStateMachineModuleOptions,
  StateMachineModuleAsyncOptions,
  StateMachineModuleOptions,
} from './interfaces/state-machine-module-options.interface';
import {
  DEFAULT_RETENTION_CRON_EXPRESSION,
  DEFAULT_RETENTION_MINUTES,
  DEFAULT_WORKFLOW_TYPE,
  EXECUTION_SCHEDULER,
  EXECUTION_STORE,
  RESOURCE_INVOKER,
  STATE_MACHINE_MODULE_OPTIONS,
  STATE_MACHINE_USER_OPTIONS,
} from './state-machine.constants';

function resolveOptions(
  options: StateMachineModuleOptions,
): ResolvedStateMachineModuleOptions {
  return {
    defaultType: options.defaultType ?? DEFAULT_WORKFLOW_TYPE,
    maxWaitSeconds: options.maxWaitSeconds,
    retentionMinutes: options.retentionMinutes ?? DEFAULT_RETENTION_MINUTES,
    retentionCronExpression:
      options.retentionCronExpression ?? DEFAULT_RETENTION_CRON_EXPRESSION,
    enableRetentionCron: options.enableRetentionCron ?? true,
    stateMachines: options.stateMachines ?? [],
  };
}

function createProviders(userOptions: Provider): Provider[] {
  return [
    userOptions,
    {
      provide: STATE_MACHINE_MODULE_OPTIONS,
      useFactory: resolveOptions,
      inject: [STATE_MACHINE_USER_OPTIONS],
    },
    {
      provide: EXECUTION_STORE,
      useFactory: (options: StateMachineModuleOptions) =>
        options.store ?? new InMemoryExecutionStore(),
      inject: [STATE_MACHINE_USER_OPTIONS],
    },
    {
      provide: RESOURCE_INVOKER,
      useFactory: (options: StateMachineModuleOptions) =>
        options.invoker ?? new LocalResourceInvoker(options.handlers),
      inject: [STATE_MACHINE_USER_OPTIONS],
    },
    {
      provide: EXECUTION_SCHEDULER,
      useFactory: (options: StateMachineModuleOptions) =>
        options.scheduler ?? new SystemScheduler(),
      inject: [STATE_MACHINE_USER_OPTIONS],
    },
    StateMachineRegistry,
    ExecutionManager,
    ExecutionRetentionService,
    TaskHandlerExplorer,
  ];
}

const EXPORTS = [
  ExecutionManager,
  StateMachineRegistry,
  ExecutionRetentionService,
  EXECUTION_STORE,
  RESOURCE_INVOKER,
];

@Module({})
export class StateMachineModule {
  static forRoot(options: StateMachineModuleOptions = {}): DynamicModule {
    return {
      module: StateMachineModule,
      imports: [DiscoveryModule, EventEmitterModule.forRoot()],
      providers: createProviders({
        provide: STATE_MACHINE_USER_OPTIONS,
        useValue: options,
      }),
      exports: EXPORTS,
      global: true,
    };
  }

  static forRootAsync(options: StateMachineModuleAsyncOptions): DynamicModule {
    return {
      module: StateMachineModule,
      imports: [
        DiscoveryModule,
        EventEmitterModule.forRoot(),
        ...(options.imports ?? []),
      ],
      providers: createProviders({
        provide: STATE_MACHINE_USER_OPTIONS,
        useFactory: options.useFactory,
        inject: options.inject ?? [],
      }),
      exports: EXPORTS,
      global: true,
    };
  }
}
