export const STATE_MACHINE_MODULE_OPTIONS = Symbol('STATE_MACHINE_MODULE_OPTIONS');
export const EXECUTION_STORE = Symbol('EXECUTION_STORE');
export const RESOURCE_INVOKER = Symbol('RESOURCE_INVOKER');
export const EXECUTION_SCHEDULER = Symbol('EXECUTION_SCHEDULER');
export const STATE_MACHINE_USER_OPTIONS = Symbol('STATE_MACHINE_USER_OPTIONS');

export const STATE_MACHINE_METADATA = 'local-states:state-machine';
export const TASK_HANDLER_METADATA = 'local-states:task-handler';

export const DEFAULT_WORKFLOW_TYPE = 'STANDARD' as const;
export const DEFAULT_RETENTION_MINUTES = 60;
export const DEFAULT_RETENTION_CRON_EXPRESSION = '0 * * * * *';

export const STATE_MACHINE_ARN_PREFIX = 'arn:aws:states:us-east-1:000000000000:stateMachine:';
export const EXECUTION_ARN_PREFIX = 'arn:aws:states:us-east-1:000000000000:execution:';

/** Error names with built-in meaning in retry and catch rules. */
export const ERROR_WILDCARD = '*';
export const STATES_ALL = 'States.ALL';
export const STATES_TIMEOUT = 'States.Timeout';
export const STATES_TASK_FAILED = 'States.TaskFailed';
export const STATES_RUNTIME = 'States.Runtime';
export const STATES_NO_CHOICE_MATCHED = 'States.NoChoiceMatched';
export const STATES_PARAMETER_PATH_FAILURE = 'States.ParameterPathFailure';
export const STATES_RESULT_PATH_MATCH_FAILURE = 'States.ResultPathMatchFailure';
export const STATES_CANCELLED = 'States.Cancelled';
export const STATES_FAIL = 'States.Fail';

export const DEFAULT_RETRY_INTERVAL_SECONDS = 1;
export const DEFAULT_RETRY_MAX_ATTEMPTS = 3;
export const DEFAULT_RETRY_BACKOFF_RATE = 2;
