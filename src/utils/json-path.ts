import { InvalidPathError } from '../errors/invalid-path.error';
import type { JsonObject, JsonValue } from '../interfaces/json.interface';

export type PathSegment = string | number;

export type PathLookup =
  | { found: true; value: JsonValue }
  | { found: false };

export const ROOT_PATH = '$';

const FIELD_PATTERN = /^[^.[\]\s]+/;
const INDEX_PATTERN = /^\[(\d+)\]/;
const QUOTED_FIELD_PATTERN = /^\['([^']*)'\]/;

export function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function cloneJson<T extends JsonValue>(value: T): T {
  return structuredClone(value);
}

/**
 * Splits a reference path such as `$.order.items[0]['unit price']` into
 * segments. Field names follow a dot; array indices and quoted field
 * names use brackets.
 */
export function parsePath(path: string): PathSegment[] {
  if (!path.startsWith(ROOT_PATH)) {
    throw new InvalidPathError(path, 'must start with "$"');
  }

  const segments: PathSegment[] = [];
  let rest = path.slice(ROOT_PATH.length);

  while (rest.length > 0) {
    if (rest.startsWith('.')) {
      const match = FIELD_PATTERN.exec(rest.slice(1));
      if (!match) {
        throw new InvalidPathError(path, 'expected a field name after "."');
      }
      segments.push(match[0]);
      rest = rest.slice(1 + match[0].length);
      continue;
    }

    const index = INDEX_PATTERN.exec(rest);
    if (index) {
      segments.push(Number(index[1]));
      rest = rest.slice(index[0].length);
      continue;
    }

    const quoted = QUOTED_FIELD_PATTERN.exec(rest);
    if (quoted) {
      segments.push(quoted[1]);
      rest = rest.slice(quoted[0].length);
      continue;
    }

    throw new InvalidPathError(path, `unexpected token at "${rest}"`);
  }

  return segments;
}

export function isValidPath(path: string): boolean {
  try {
    parsePath(path);
    return true;
  } catch {
    return false;
  }
}

export function getPath(value: JsonValue, path: string): PathLookup {
  let current: JsonValue = value;

  for (const segment of parsePath(path)) {
    if (typeof segment === 'number') {
      if (!Array.isArray(current) || segment >= current.length) {
        return { found: false };
      }
      current = current[segment];
      continue;
    }

    if (!isJsonObject(current) || !Object.hasOwn(current, segment)) {
      return { found: false };
    }
    current = current[segment];
  }

  return { found: true, value: current };
}

/**
 * Returns a copy of `value` with `newValue` placed at `path`. Missing or
 * non-object maps along the way are replaced by new maps; array slots
 * are never created.
 */
export function setPath(
  value: JsonValue,
  path: string,
  newValue: JsonValue,
): JsonValue {
  const segments = parsePath(path);
  if (segments.length === 0) {
    return cloneJson(newValue);
  }

  const root = cloneJson(value);
  return assign(root, segments, cloneJson(newValue), path);
}

function assign(
  container: JsonValue,
  segments: PathSegment[],
  newValue: JsonValue,
  path: string,
): JsonValue {
  const [segment, ...rest] = segments;

  if (typeof segment === 'number') {
    if (!Array.isArray(container) || segment >= container.length) {
      throw new InvalidPathError(
        path,
        `array index ${segment} does not exist`,
      );
    }
    container[segment] =
      rest.length === 0
        ? newValue
        : assign(container[segment], rest, newValue, path);
    return container;
  }

  const target: JsonObject = isJsonObject(container) ? container : {};
  const child = Object.hasOwn(target, segment) ? target[segment] : {};
  target[segment] =
    rest.length === 0 ? newValue : assign(child, rest, newValue, path);
  return target;
}
