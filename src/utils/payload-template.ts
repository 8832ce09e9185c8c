import { StatesRuntimeError } from '../errors/states-runtime.error';
import type { JsonObject, JsonValue } from '../interfaces/json.interface';
import { STATES_PARAMETER_PATH_FAILURE } from '../state-machine.constants';
import { getPath, isJsonObject } from './json-path';

/** Keys ending with this suffix take their value from a path reference. */
export const PATH_KEY_SUFFIX = '.$';
export const CONTEXT_PATH_PREFIX = '$$';

export function isContextPath(path: string): boolean {
  return path.startsWith(CONTEXT_PATH_PREFIX);
}

/** `$$.Map.Item.Value` → `$.Map.Item.Value`, so it can be read from the context object. */
export function toContextRelativePath(path: string): string {
  return path.slice(1);
}

/**
 * Builds a payload from a template: `"key.$": "$.path"` entries are
 * replaced by `"key": <value at path>`, `$$.` paths read the context
 * object, and everything else is copied as-is.
 */
export function resolveTemplate(
  template: JsonValue,
  input: JsonValue,
  context: JsonObject,
): JsonValue {
  if (Array.isArray(template)) {
    return template.map((item) => resolveTemplate(item, input, context));
  }

  if (!isJsonObject(template)) {
    return template;
  }

  const resolved: JsonObject = {};
  for (const [key, value] of Object.entries(template)) {
    if (key.endsWith(PATH_KEY_SUFFIX) && typeof value === 'string') {
      resolved[key.slice(0, -PATH_KEY_SUFFIX.length)] = resolveReference(
        value,
        input,
        context,
      );
    } else {
      resolved[key] = resolveTemplate(value, input, context);
    }
  }
  return resolved;
}

export function resolveReference(
  path: string,
  input: JsonValue,
  context: JsonObject,
): JsonValue {
  const lookup = isContextPath(path)
    ? getPath(context, toContextRelativePath(path))
    : getPath(input, path);

  if (!lookup.found) {
    throw new StatesRuntimeError(
      `The JSONPath '${path}' could not be found in the ${isContextPath(path) ? 'context object' : 'input'}`,
      STATES_PARAMETER_PATH_FAILURE,
    );
  }
  return lookup.value;
}

/** Collects every `.$` reference in a template, for load-time validation. */
export function collectTemplatePaths(template: JsonValue): string[] {
  if (Array.isArray(template)) {
    return template.flatMap((item) => collectTemplatePaths(item));
  }
  if (!isJsonObject(template)) {
    return [];
  }

  const paths: string[] = [];
  for (const [key, value] of Object.entries(template)) {
    if (key.endsWith(PATH_KEY_SUFFIX) && typeof value === 'string') {
      paths.push(value);
    } else {
      paths.push(...collectTemplatePaths(value));
    }
  }
  return paths;
}
