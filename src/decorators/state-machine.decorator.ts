import { SetMetadata } from '@nestjs/common';
import { STATE_MACHINE_METADATA } from '../state-machine.constants';
import { deriveStateMachineName } from '../utils/derive-state-machine-name';
import type { AslDocument } from '../interfaces/asl-document.interface';
import type { WorkflowType } from '../interfaces/state-machine-definition.interface';

export interface StateMachineOptions {
  /** Registered name. If omitted, derived from class name. */
  name?: string;
  /** State-language document, or its JSON text */
  definition: AslDocument | string;
  /** Falls back to the module's defaultType */
  type?: WorkflowType;
  definitionSubstitutions?: Record<string, string>;
}

export interface StateMachineMetadata {
  name: string;
  definition: unknown;
  type?: WorkflowType;
  definitionSubstitutions?: Record<string, string>;
}

export function StateMachine(options: StateMachineOptions): ClassDecorator {
  return (target: Function) => {
    const metadata: StateMachineMetadata = {
      name: options.name ?? deriveStateMachineName(target.name),
      definition: options.definition,
      type: options.type,
      definitionSubstitutions: options.definitionSubstitutions,
    };
    SetMetadata(STATE_MACHINE_METADATA, metadata)(target);
  };
}
