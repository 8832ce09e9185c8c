import { StatesError } from './states.error';
import { STATES_NO_CHOICE_MATCHED } from '../state-machine.constants';

export class ChoiceNoMatchError extends StatesError {
  constructor(public readonly stateName: string) {
    super(
      STATES_NO_CHOICE_MATCHED,
      `No choice rule matched in state "${stateName}" and no Default is configured`,
    );
    this.name = 'ChoiceNoMatchError';
  }
}
