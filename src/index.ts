import 'reflect-metadata';

// Module
export { StateMachineModule } from './state-machine.module';

// Services
export { ExecutionManager } from './services/execution-manager.service';
export type {
  StartExecutionOptions,
  StopExecutionOptions,
} from './services/execution-manager.service';
export { StateMachineRegistry } from './services/state-machine-registry.service';
export type {
  RegisteredStateMachine,
  StateMachineDescription,
} from './services/state-machine-registry.service';
export { ExecutionRetentionService } from './services/execution-retention.service';
export type { RetentionSweepResult } from './services/execution-retention.service';
export { TaskHandlerExplorer } from './services/task-handler-explorer.service';

// Engine
export { ExecutionEngine } from './engine/execution-engine';
export type {
  ExecutionEngineOptions,
  ExecutionRequest,
} from './engine/execution-engine';
export { ExecutionLifecycle } from './engine/execution-lifecycle';

// Decorators
export { StateMachine } from './decorators/state-machine.decorator';
export type { StateMachineOptions } from './decorators/state-machine.decorator';
export { TaskHandler } from './decorators/task-handler.decorator';

// Stores and invokers
export { InMemoryExecutionStore } from './stores/in-memory-execution.store';
export {
  LocalResourceInvoker,
  extractFunctionName,
} from './invokers/local-resource.invoker';

// Definitions and data paths
export { loadDefinition } from './utils/load-definition';
export { applyDefinitionSubstitutions } from './utils/definition-substitutions';
export { getPath, setPath, parsePath } from './utils/json-path';
export { resolveTemplate } from './utils/payload-template';
export { evaluateChoices } from './utils/choice-rules';
export { decide, computeBackoffSeconds } from './utils/retry-policy';
export type { ErrorEnvelope, PolicyDecision } from './utils/retry-policy';
export {
  CancellableTimer,
  SystemScheduler,
} from './utils/cancellable-timer';
export type { ExecutionScheduler } from './utils/cancellable-timer';

// Interfaces
export type * from './interfaces/json.interface';
export type * from './interfaces/asl-document.interface';
export type * from './interfaces/execution-records.interface';
export type { IExecutionStore } from './interfaces/execution-store.interface';
export type {
  InvocationContext,
  IResourceInvoker,
  TaskHandlerFn,
} from './interfaces/resource-invoker.interface';
export type {
  StateMachineConfig,
  StateMachineModuleAsyncOptions,
  StateMachineModuleOptions,
} from './interfaces/state-machine-module-options.interface';
export type {
  CatchRule,
  ChoiceBranch,
  ChoiceCondition,
  ComparisonOperator,
  RetryRule,
  State,
  StateMachineDefinition,
  StateType,
  WaitDuration,
  WorkflowType,
} from './interfaces/state-machine-definition.interface';
export { COMPARISON_OPERATORS } from './interfaces/state-machine-definition.interface';

// Errors
export { StatesError } from './errors/states.error';
export { TaskError } from './errors/task.error';
export { TimeoutError } from './errors/timeout.error';
export { ChoiceNoMatchError } from './errors/choice-no-match.error';
export { CancellationError } from './errors/cancellation.error';
export { ExecutionTimeoutError } from './errors/execution-timeout.error';
export { StatesRuntimeError } from './errors/states-runtime.error';
export { DefinitionError } from './errors/definition.error';
export type { DefinitionErrorKind } from './errors/definition.error';
export { InvalidPathError } from './errors/invalid-path.error';
export { DuplicateRegistrationError } from './errors/duplicate-registration.error';
export { StateMachineNotFoundError } from './errors/state-machine-not-found.error';
export { ExecutionNotFoundError } from './errors/execution-not-found.error';
export { ExecutionAlreadyExistsError } from './errors/execution-already-exists.error';

// Events
export { StateMachineEventType } from './events/state-machine-event-type.enum';
export type {
  ExecutionCompletedEvent,
  ExecutionsPurgedEvent,
  ExecutionStartedEvent,
  RetryScheduledEvent,
  StateEnteredEvent,
  StateExitedEvent,
} from './events/state-machine-events';

// Constants
export {
  STATE_MACHINE_MODULE_OPTIONS,
  EXECUTION_STORE,
  RESOURCE_INVOKER,
  EXECUTION_SCHEDULER,
  STATE_MACHINE_METADATA,
  TASK_HANDLER_METADATA,
  STATES_ALL,
  STATES_TIMEOUT,
  STATES_TASK_FAILED,
  STATES_RUNTIME,
  STATES_NO_CHOICE_MATCHED,
} from './state-machine.constants';
