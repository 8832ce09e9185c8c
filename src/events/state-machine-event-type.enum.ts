export enum StateMachineEventType {
  EXECUTION_STARTED = 'states.execution.started',
  EXECUTION_SUCCEEDED = 'states.execution.succeeded',
  EXECUTION_FAILED = 'states.execution.failed',
  EXECUTION_TIMED_OUT = 'states.execution.timed_out',
  EXECUTION_ABORTED = 'states.execution.aborted',
  STATE_ENTERED = 'states.state.entered',
  STATE_EXITED = 'states.state.exited',
  RETRY_SCHEDULED = 'states.retry.scheduled',
  EXECUTIONS_PURGED = 'states.executions.purged',
}
