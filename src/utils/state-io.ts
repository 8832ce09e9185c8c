import { InvalidPathError } from '../errors/invalid-path.error';
import { StatesRuntimeError } from '../errors/states-runtime.error';
import type { JsonValue } from '../interfaces/json.interface';
import {
  STATES_RESULT_PATH_MATCH_FAILURE,
  STATES_RUNTIME,
} from '../state-machine.constants';
import { getPath, ROOT_PATH, setPath } from './json-path';

function narrow(value: JsonValue, path: string | null, field: string): JsonValue {
  if (path === null) {
    return {};
  }
  if (path === ROOT_PATH) {
    return value;
  }

  const lookup = getPath(value, path);
  if (!lookup.found) {
    throw new StatesRuntimeError(
      `Invalid path '${path}' in ${field}: the path could not be found in the value`,
      STATES_RUNTIME,
    );
  }
  return lookup.value;
}

export function applyInputPath(value: JsonValue, path: string | null): JsonValue {
  return narrow(value, path, 'InputPath');
}

export function applyOutputPath(
  value: JsonValue,
  path: string | null,
): JsonValue {
  return narrow(value, path, 'OutputPath');
}

/**
 * Places a state's result into its raw input. `null` keeps the input,
 * `$` replaces it.
 */
export function applyResultPath(
  rawInput: JsonValue,
  result: JsonValue,
  path: string | null,
): JsonValue {
  if (path === null) {
    return rawInput;
  }
  if (path === ROOT_PATH) {
    return result;
  }

  try {
    return setPath(rawInput, path, result);
  } catch (error) {
    if (error instanceof InvalidPathError) {
      throw new StatesRuntimeError(
        error.message,
        STATES_RESULT_PATH_MATCH_FAILURE,
      );
    }
    throw error;
  }
}
