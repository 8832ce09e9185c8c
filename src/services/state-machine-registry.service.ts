import { Inject, Injectable, Logger, OnModuleInit } from '@nestjs/common';
import { DiscoveryService, Reflector } from '@nestjs/core';
import type { StateMachineMetadata } from '../decorators/state-machine.decorator';
import { DuplicateRegistrationError } from '../errors/duplicate-registration.error';
import { StateMachineNotFoundError } from '../errors/state-machine-not-found.error';
import type {
  StateMachineDefinition,
  WorkflowType,
} from '../interfaces/state-machine-definition.interface';
import type {
  ResolvedStateMachineModuleOptions,
  StateMachineConfig,
} from '../interfaces/state-machine-module-options.interface';
import {
  STATE_MACHINE_ARN_PREFIX,
  STATE_MACHINE_METADATA,
  STATE_MACHINE_MODULE_OPTIONS,
} from '../state-machine.constants';
import { applyDefinitionSubstitutions } from '../utils/definition-substitutions';
import { loadDefinition } from '../utils/load-definition';

const OPTIONS_SOURCE = 'StateMachineModuleOptions';

export interface RegisteredStateMachine {
  name: string;
  arn: string;
  type: WorkflowType;
  definition: StateMachineDefinition;
  /** Document as loaded, after substitutions. */
  document: unknown;
  /** Class or origin that registered it. */
  source: string;
  createdAt: Date;
  updatedAt: Date;
}

export interface StateMachineDescription {
  name: string;
  arn: string;
  type: WorkflowType;
  definition: string;
  createdAt: Date;
  updatedAt: Date;
}

@Injectable()
export class StateMachineRegistry implements OnModuleInit {
  private readonly logger = new Logger(StateMachineRegistry.name);
  private readonly registrations = new Map<string, RegisteredStateMachine>();

  constructor(
    private readonly discoveryService: DiscoveryService,
    private readonly reflector: Reflector,
    @Inject(STATE_MACHINE_MODULE_OPTIONS)
    private readonly options: ResolvedStateMachineModuleOptions,
  ) {}

  onModuleInit(): void {
    for (const config of this.options.stateMachines) {
      this.register(config, OPTIONS_SOURCE);
    }

    for (const wrapper of this.discoveryService.getProviders()) {
      if (!wrapper.metatype) continue;

      const metadata = this.reflector.get<StateMachineMetadata | undefined>(
        STATE_MACHINE_METADATA,
        wrapper.metatype,
      );

      if (metadata) {
        this.register(metadata, wrapper.metatype.name);
      }
    }
  }

  /**
   * Registers a state machine, rejecting a name that is already taken.
   * @throws DefinitionError when the document is invalid
   */
  register(config: StateMachineConfig, source: string): RegisteredStateMachine {
    const existing = this.registrations.get(config.name);
    if (existing) {
      throw new DuplicateRegistrationError(config.name, existing.source, source);
    }
    return this.store(config, source);
  }

  /**
   * Creates or replaces a state machine. Loading the same document again
   * leaves an equal registration.
   */
  create(config: StateMachineConfig): RegisteredStateMachine {
    return this.store(config, this.registrations.get(config.name)?.source ?? 'api');
  }

  update(
    name: string,
    changes: Partial<Omit<StateMachineConfig, 'name'>>,
  ): RegisteredStateMachine {
    const existing = this.getOrThrow(name);
    return this.store(
      {
        name,
        definition: changes.definition ?? existing.document,
        type: changes.type ?? existing.type,
        definitionSubstitutions: changes.definitionSubstitutions,
      },
      existing.source,
    );
  }

  delete(name: string): boolean {
    const deleted = this.registrations.delete(name);
    if (deleted) {
      this.logger.log(`Deleted state machine: ${name}`);
    }
    return deleted;
  }

  get(name: string): RegisteredStateMachine | undefined {
    return this.registrations.get(name);
  }

  getAll(): RegisteredStateMachine[] {
    return Array.from(this.registrations.values());
  }

  getOrThrow(name: string): RegisteredStateMachine {
    const registration = this.registrations.get(name);
    if (!registration) {
      throw new StateMachineNotFoundError(name);
    }
    return registration;
  }

  describe(name: string): StateMachineDescription {
    const registration = this.getOrThrow(name);
    return {
      name: registration.name,
      arn: registration.arn,
      type: registration.type,
      definition:
        typeof registration.document === 'string'
          ? registration.document
          : JSON.stringify(registration.document),
      createdAt: new Date(registration.createdAt),
      updatedAt: new Date(registration.updatedAt),
    };
  }

  private store(config: StateMachineConfig, source: string): RegisteredStateMachine {
    const document = applyDefinitionSubstitutions(
      config.definition,
      config.definitionSubstitutions,
    );
    const definition = loadDefinition(document);
    const now = new Date();
    const existing = this.registrations.get(config.name);

    const registration: RegisteredStateMachine = {
      name: config.name,
      arn: `${STATE_MACHINE_ARN_PREFIX}${config.name}`,
      type: config.type ?? existing?.type ?? this.options.defaultType,
      definition,
      document,
      source,
      createdAt: existing?.createdAt ?? now,
      updatedAt: now,
    };
    this.registrations.set(config.name, registration);

    this.logger.log(
      `${existing ? 'Updated' : 'Registered'} state machine: ${config.name} (${registration.type}) from ${source}`,
    );
    return registration;
  }
}
