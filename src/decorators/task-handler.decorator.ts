import { SetMetadata } from '@nestjs/common';
import { TASK_HANDLER_METADATA } from '../state-machine.constants';

/**
 * Marks a provider method as the in-process handler for a Task resource.
 * The name matches the resource id or the function name it carries.
 */
export const TaskHandler = (resourceName: string): MethodDecorator =>
  SetMetadata(TASK_HANDLER_METADATA, resourceName);
