import { Inject, Injectable, Logger, OnModuleInit } from '@nestjs/common';
import { DiscoveryService, MetadataScanner, Reflector } from '@nestjs/core';
import type { JsonValue } from '../interfaces/json.interface';
import type {
  InvocationContext,
  IResourceInvoker,
} from '../interfaces/resource-invoker.interface';
import { LocalResourceInvoker } from '../invokers/local-resource.invoker';
import {
  RESOURCE_INVOKER,
  TASK_HANDLER_METADATA,
} from '../state-machine.constants';

/**
 * Registers `@TaskHandler()` methods of discovered providers on the
 * local resource invoker.
 */
@Injectable()
export class TaskHandlerExplorer implements OnModuleInit {
  private readonly logger = new Logger(TaskHandlerExplorer.name);

  constructor(
    private readonly discoveryService: DiscoveryService,
    private readonly metadataScanner: MetadataScanner,
    private readonly reflector: Reflector,
    @Inject(RESOURCE_INVOKER) private readonly invoker: IResourceInvoker,
  ) {}

  onModuleInit(): void {
    for (const wrapper of this.discoveryService.getProviders()) {
      const instance: unknown = wrapper.instance;
      if (typeof instance !== 'object' || instance === null) continue;

      const prototype: unknown = Object.getPrototypeOf(instance);
      if (typeof prototype !== 'object' || prototype === null) continue;

      for (const methodName of this.metadataScanner.getAllMethodNames(prototype)) {
        const method: unknown = Reflect.get(instance, methodName);
        if (typeof method !== 'function') continue;

        const resourceName = this.reflector.get<string | undefined>(
          TASK_HANDLER_METADATA,
          method,
        );
        if (resourceName !== undefined) {
          this.bind(resourceName, instance, method, wrapper.name);
        }
      }
    }
  }

  private bind(
    resourceName: string,
    instance: object,
    method: Function,
    providerName: string,
  ): void {
    if (!(this.invoker instanceof LocalResourceInvoker)) {
      this.logger.warn(
        `@TaskHandler('${resourceName}') on ${providerName} ignored: the configured invoker does not accept local handlers`,
      );
      return;
    }

    this.invoker.register(
      resourceName,
      async (payload: JsonValue, context: InvocationContext): Promise<JsonValue> =>
        method.call(instance, payload, context),
    );
    this.logger.log(`Registered task handler: ${providerName} -> ${resourceName}`);
  }
}
