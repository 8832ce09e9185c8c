import { StatesError } from '../errors/states.error';
import { TaskError } from '../errors/task.error';
import { STATES_TASK_FAILED } from '../state-machine.constants';

/**
 * Maps anything thrown by a task handler onto a classified error. Named
 * errors keep their name so rules can match on it; a bare `Error`
 * becomes `States.TaskFailed`.
 */
export function classifyError(thrown: unknown): StatesError {
  if (thrown instanceof StatesError) {
    return thrown;
  }
  if (thrown instanceof Error) {
    const name = thrown.name && thrown.name !== 'Error' ? thrown.name : STATES_TASK_FAILED;
    return new TaskError(name, thrown.message);
  }
  return new TaskError(STATES_TASK_FAILED, String(thrown));
}
