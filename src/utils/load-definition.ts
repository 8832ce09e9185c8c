import {
  DefinitionError,
  type DefinitionErrorKind,
} from '../errors/definition.error';
import type { JsonValue } from '../interfaces/json.interface';
import {
  COMPARISON_OPERATORS,
  type CatchRule,
  type ChoiceBranch,
  type ChoiceCondition,
  type ComparisonOperator,
  type MapState,
  type ParallelState,
  type RetryRule,
  type State,
  type StateMachineDefinition,
  type TaskState,
  type WaitDuration,
  type WaitState,
} from '../interfaces/state-machine-definition.interface';
import {
  DEFAULT_RETRY_BACKOFF_RATE,
  DEFAULT_RETRY_INTERVAL_SECONDS,
  DEFAULT_RETRY_MAX_ATTEMPTS,
} from '../state-machine.constants';
import { isTimestamp, usesPathOperand } from './choice-rules';
import { isValidPath, ROOT_PATH } from './json-path';
import {
  collectTemplatePaths,
  isContextPath,
  toContextRelativePath,
} from './payload-template';

type RawObject = Record<string, unknown>;

const STATE_TYPES = new Set<string>([
  'Task',
  'Choice',
  'Wait',
  'Pass',
  'Succeed',
  'Fail',
  'Parallel',
  'Map',
]);

const OPERATOR_NAMES = new Set<string>(COMPARISON_OPERATORS);

function isOperator(key: string): key is ComparisonOperator {
  return OPERATOR_NAMES.has(key);
}

function isRecord(value: unknown): value is RawObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function isJsonValue(value: unknown): value is JsonValue {
  if (value === null || typeof value === 'string' || typeof value === 'boolean') {
    return true;
  }
  if (typeof value === 'number') {
    return Number.isFinite(value);
  }
  if (Array.isArray(value)) {
    return value.every(isJsonValue);
  }
  if (isRecord(value)) {
    return Object.values(value).every(isJsonValue);
  }
  return false;
}

function fail(
  kind: DefinitionErrorKind,
  message: string,
  stateName?: string,
): never {
  throw new DefinitionError(kind, message, stateName);
}

function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}

/**
 * Parses and validates a state-language document into an immutable
 * definition. The same document always yields an equal definition or
 * the same `DefinitionError`.
 */
export function loadDefinition(document: unknown): StateMachineDefinition {
  let parsed = document;
  if (typeof document === 'string') {
    try {
      parsed = JSON.parse(document);
    } catch (error) {
      fail(
        'invalid-document',
        `Definition is not valid JSON: ${error instanceof Error ? error.message : String(error)}`,
      );
    }
  }
  return parseDocument(parsed);
}

function parseDocument(document: unknown): StateMachineDefinition {
  if (!isRecord(document)) {
    fail('invalid-document', 'Definition must be a JSON object');
  }

  const startAt = document.StartAt;
  if (typeof startAt !== 'string' || startAt.length === 0) {
    fail('missing-field', 'StartAt must be a non-empty string');
  }

  const rawStates = document.States;
  if (!isRecord(rawStates) || Object.keys(rawStates).length === 0) {
    fail('missing-field', 'States must be a non-empty object');
  }

  const states = new Map<string, State>();
  for (const [name, raw] of Object.entries(rawStates)) {
    states.set(name, parseState(name, raw));
  }

  if (!states.has(startAt)) {
    fail('unknown-target', `StartAt references unknown state "${startAt}"`);
  }

  for (const state of states.values()) {
    for (const target of transitionTargets(state)) {
      if (!states.has(target)) {
        fail(
          'unknown-target',
          `references unknown state "${target}"`,
          state.name,
        );
      }
    }
  }

  if (![...states.values()].some(isTerminal)) {
    fail(
      'no-terminal-state',
      'Definition has no Succeed, Fail, or End state',
    );
  }

  const timeoutSeconds = optionalNumber(document, 'TimeoutSeconds');
  if (timeoutSeconds !== undefined && timeoutSeconds <= 0) {
    fail('invalid-value', 'TimeoutSeconds must be a positive number');
  }

  const definition: StateMachineDefinition = {
    startAt,
    states,
    ...(typeof document.Comment === 'string' ? { comment: document.Comment } : {}),
    ...(timeoutSeconds !== undefined ? { timeoutSeconds } : {}),
  };
  for (const state of states.values()) {
    deepFreeze(state);
  }
  return Object.freeze(definition);
}

function transitionTargets(state: State): string[] {
  const targets: string[] = [];
  switch (state.type) {
    case 'Choice':
      targets.push(...state.choices.map((branch) => branch.next));
      if (state.default !== undefined) targets.push(state.default);
      break;
    case 'Task':
    case 'Parallel':
    case 'Map':
      targets.push(...state.catch.map((rule) => rule.next));
      if (state.next !== undefined) targets.push(state.next);
      break;
    case 'Pass':
    case 'Wait':
      if (state.next !== undefined) targets.push(state.next);
      break;
    case 'Succeed':
    case 'Fail':
      break;
  }
  return targets;
}

function isTerminal(state: State): boolean {
  switch (state.type) {
    case 'Succeed':
    case 'Fail':
      return true;
    case 'Choice':
      return false;
    default:
      return state.end;
  }
}

function parseState(name: string, raw: unknown): State {
  if (!isRecord(raw)) {
    fail('invalid-document', 'state must be a JSON object', name);
  }
  const type = raw.Type;
  if (typeof type !== 'string' || !STATE_TYPES.has(type)) {
    fail('unknown-state-type', `unknown state type "${String(type)}"`, name);
  }

  const comment = typeof raw.Comment === 'string' ? { comment: raw.Comment } : {};

  switch (type) {
    case 'Task':
      return { ...comment, ...parseTask(name, raw) };
    case 'Pass':
      return {
        ...comment,
        type: 'Pass',
        name,
        ...parseIo(name, raw),
        ...parseTransition(name, raw),
        resultPath: optionalPath(name, raw, 'ResultPath'),
        ...optionalTemplate(name, raw, 'Result', 'result', false),
        ...optionalTemplate(name, raw, 'Parameters', 'parameters'),
      };
    case 'Choice':
      return {
        ...comment,
        type: 'Choice',
        name,
        ...parseIo(name, raw),
        choices: parseChoices(name, raw),
        ...(raw.Default !== undefined
          ? { default: requireString(name, raw, 'Default') }
          : {}),
      };
    case 'Wait':
      return { ...comment, ...parseWait(name, raw) };
    case 'Succeed':
      return { ...comment, type: 'Succeed', name, ...parseIo(name, raw) };
    case 'Fail':
      return {
        ...comment,
        type: 'Fail',
        name,
        ...(raw.Error !== undefined ? { error: requireString(name, raw, 'Error') } : {}),
        ...(raw.Cause !== undefined ? { cause: requireString(name, raw, 'Cause') } : {}),
      };
    case 'Parallel':
      return { ...comment, ...parseParallel(name, raw) };
    default:
      return { ...comment, ...parseMap(name, raw) };
  }
}

function parseIo(
  name: string,
  raw: RawObject,
): { inputPath: string | null; outputPath: string | null } {
  return {
    inputPath: optionalPath(name, raw, 'InputPath'),
    outputPath: optionalPath(name, raw, 'OutputPath'),
  };
}

function parseTransition(
  name: string,
  raw: RawObject,
): { next?: string; end: boolean } {
  const hasNext = raw.Next !== undefined;
  const end = raw.End === true;
  if (raw.End !== undefined && typeof raw.End !== 'boolean') {
    fail('invalid-value', 'End must be a boolean', name);
  }
  if (hasNext && end) {
    fail('conflicting-transition', 'Next and End are mutually exclusive', name);
  }
  if (!hasNext && !end) {
    fail('missing-transition', 'state must set either Next or End', name);
  }
  return hasNext ? { next: requireString(name, raw, 'Next'), end } : { end };
}

function parseErrorHandling(
  name: string,
  raw: RawObject,
): { resultPath: string | null; retry: RetryRule[]; catch: CatchRule[] } {
  return {
    resultPath: optionalPath(name, raw, 'ResultPath'),
    retry: parseRetry(name, raw.Retry),
    catch: parseCatch(name, raw.Catch),
  };
}

function parseTask(name: string, raw: RawObject): TaskState {
  const resource = requireString(name, raw, 'Resource');
  if (resource.length === 0) {
    fail('missing-field', 'Resource must be a non-empty string', name);
  }
  const timeoutSeconds = optionalNumber(raw, 'TimeoutSeconds', name);
  if (timeoutSeconds !== undefined && timeoutSeconds <= 0) {
    fail('invalid-value', 'TimeoutSeconds must be a positive number', name);
  }

  return {
    type: 'Task',
    name,
    resource,
    ...parseIo(name, raw),
    ...parseTransition(name, raw),
    ...parseErrorHandling(name, raw),
    ...optionalTemplate(name, raw, 'Parameters', 'parameters'),
    ...optionalTemplate(name, raw, 'ResultSelector', 'resultSelector'),
    ...(timeoutSeconds !== undefined ? { timeoutSeconds } : {}),
  };
}

function parseWait(name: string, raw: RawObject): WaitState {
  const options: WaitDuration[] = [];
  if (raw.Seconds !== undefined) {
    const seconds = optionalNumber(raw, 'Seconds', name);
    if (seconds === undefined || seconds < 0) {
      fail('invalid-value', 'Seconds must be a non-negative number', name);
    }
    options.push({ kind: 'seconds', seconds });
  }
  if (raw.SecondsPath !== undefined) {
    options.push({ kind: 'secondsPath', path: requirePath(name, raw, 'SecondsPath') });
  }
  if (raw.Timestamp !== undefined) {
    const timestamp = requireString(name, raw, 'Timestamp');
    if (!isTimestamp(timestamp)) {
      fail('invalid-value', `Timestamp "${timestamp}" is not an ISO-8601 timestamp`, name);
    }
    options.push({ kind: 'timestamp', timestamp });
  }
  if (raw.TimestampPath !== undefined) {
    options.push({
      kind: 'timestampPath',
      path: requirePath(name, raw, 'TimestampPath'),
    });
  }
  if (options.length !== 1) {
    fail(
      'invalid-value',
      'Wait state needs exactly one of Seconds, SecondsPath, Timestamp, TimestampPath',
      name,
    );
  }

  return {
    type: 'Wait',
    name,
    wait: options[0],
    ...parseIo(name, raw),
    ...parseTransition(name, raw),
  };
}

function parseParallel(name: string, raw: RawObject): ParallelState {
  const branches = raw.Branches;
  if (!Array.isArray(branches) || branches.length === 0) {
    fail('missing-field', 'Branches must be a non-empty array', name);
  }

  return {
    type: 'Parallel',
    name,
    branches: branches.map((branch, index) =>
      parseNested(name, branch, `Branches[${index}]`),
    ),
    ...parseIo(name, raw),
    ...parseTransition(name, raw),
    ...parseErrorHandling(name, raw),
    ...optionalTemplate(name, raw, 'ResultSelector', 'resultSelector'),
  };
}

function parseMap(name: string, raw: RawObject): MapState {
  const processorKey = raw.ItemProcessor !== undefined ? 'ItemProcessor' : 'Iterator';
  if (raw[processorKey] === undefined) {
    fail('missing-field', 'Map state needs an Iterator or ItemProcessor', name);
  }

  const maxConcurrency = optionalNumber(raw, 'MaxConcurrency', name) ?? 0;
  if (!Number.isInteger(maxConcurrency) || maxConcurrency < 0) {
    fail('invalid-value', 'MaxConcurrency must be a non-negative integer', name);
  }

  const selectorKey = raw.ItemSelector !== undefined ? 'ItemSelector' : 'Parameters';

  return {
    type: 'Map',
    name,
    iterator: parseNested(name, raw[processorKey], processorKey),
    itemsPath: raw.ItemsPath === undefined ? ROOT_PATH : requirePath(name, raw, 'ItemsPath'),
    maxConcurrency,
    ...parseIo(name, raw),
    ...parseTransition(name, raw),
    ...parseErrorHandling(name, raw),
    ...optionalTemplate(name, raw, selectorKey, 'parameters'),
    ...optionalTemplate(name, raw, 'ResultSelector', 'resultSelector'),
  };
}

function parseNested(
  name: string,
  document: unknown,
  field: string,
): StateMachineDefinition {
  try {
    return parseDocument(document);
  } catch (error) {
    if (error instanceof DefinitionError) {
      throw new DefinitionError(
        'invalid-nested-definition',
        `${field} is invalid: ${error.message}`,
        name,
        error,
      );
    }
    throw error;
  }
}

function parseRetry(name: string, raw: unknown): RetryRule[] {
  if (raw === undefined) return [];
  if (!Array.isArray(raw)) {
    fail('invalid-value', 'Retry must be an array', name);
  }

  return raw.map((entry, index): RetryRule => {
    if (!isRecord(entry)) {
      fail('invalid-value', `Retry[${index}] must be an object`, name);
    }
    const intervalSeconds =
      optionalNumber(entry, 'IntervalSeconds', name) ?? DEFAULT_RETRY_INTERVAL_SECONDS;
    const maxAttempts =
      optionalNumber(entry, 'MaxAttempts', name) ?? DEFAULT_RETRY_MAX_ATTEMPTS;
    const backoffRate =
      optionalNumber(entry, 'BackoffRate', name) ?? DEFAULT_RETRY_BACKOFF_RATE;
    const maxDelaySeconds = optionalNumber(entry, 'MaxDelaySeconds', name);

    if (intervalSeconds < 0) {
      fail('invalid-value', `Retry[${index}].IntervalSeconds must not be negative`, name);
    }
    if (!Number.isInteger(maxAttempts) || maxAttempts < 0) {
      fail('invalid-value', `Retry[${index}].MaxAttempts must be a non-negative integer`, name);
    }
    if (backoffRate < 1) {
      fail('invalid-value', `Retry[${index}].BackoffRate must be at least 1`, name);
    }
    if (maxDelaySeconds !== undefined && maxDelaySeconds <= 0) {
      fail('invalid-value', `Retry[${index}].MaxDelaySeconds must be positive`, name);
    }

    return {
      errorEquals: parseErrorEquals(name, entry, `Retry[${index}]`),
      intervalSeconds,
      maxAttempts,
      backoffRate,
      ...(maxDelaySeconds !== undefined ? { maxDelaySeconds } : {}),
    };
  });
}

function parseCatch(name: string, raw: unknown): CatchRule[] {
  if (raw === undefined) return [];
  if (!Array.isArray(raw)) {
    fail('invalid-value', 'Catch must be an array', name);
  }

  return raw.map((entry, index): CatchRule => {
    if (!isRecord(entry)) {
      fail('invalid-value', `Catch[${index}] must be an object`, name);
    }
    return {
      errorEquals: parseErrorEquals(name, entry, `Catch[${index}]`),
      next: requireString(name, entry, 'Next'),
      resultPath: optionalPath(name, entry, 'ResultPath'),
    };
  });
}

function parseErrorEquals(name: string, entry: RawObject, field: string): string[] {
  const errorEquals = entry.ErrorEquals;
  if (
    !Array.isArray(errorEquals) ||
    errorEquals.length === 0 ||
    !errorEquals.every((value): value is string => typeof value === 'string')
  ) {
    fail('invalid-value', `${field}.ErrorEquals must be a non-empty string array`, name);
  }
  return [...errorEquals];
}

function parseChoices(name: string, raw: RawObject): ChoiceBranch[] {
  const choices = raw.Choices;
  if (!Array.isArray(choices) || choices.length === 0) {
    fail('missing-field', 'Choices must be a non-empty array', name);
  }

  return choices.map((rule, index) => {
    const next = isRecord(rule) ? rule.Next : undefined;
    if (typeof next !== 'string') {
      fail('invalid-choice-rule', `Choices[${index}] must set Next`, name);
    }
    return { condition: parseCondition(name, rule, `Choices[${index}]`), next };
  });
}

function parseCondition(name: string, rule: unknown, field: string): ChoiceCondition {
  if (!isRecord(rule)) {
    fail('invalid-choice-rule', `${field} must be an object`, name);
  }

  for (const combinator of ['And', 'Or'] as const) {
    const operands = rule[combinator];
    if (operands === undefined) continue;
    if (!Array.isArray(operands) || operands.length === 0) {
      fail('invalid-choice-rule', `${field}.${combinator} must be a non-empty array`, name);
    }
    return {
      kind: combinator === 'And' ? 'and' : 'or',
      conditions: operands.map((operand, index) =>
        parseCondition(name, operand, `${field}.${combinator}[${index}]`),
      ),
    };
  }

  if (rule.Not !== undefined) {
    return { kind: 'not', condition: parseCondition(name, rule.Not, `${field}.Not`) };
  }

  const operators = Object.keys(rule).filter(isOperator);
  if (operators.length !== 1) {
    fail(
      'invalid-choice-rule',
      `${field} must contain exactly one comparison operator`,
      name,
    );
  }
  const operator = operators[0];
  const variable = requirePath(name, rule, 'Variable');
  const value = rule[operator];

  if (!isOperandValid(operator, value)) {
    fail(
      'invalid-choice-rule',
      `${field}.${operator} has an invalid operand`,
      name,
    );
  }

  return { kind: 'comparison', variable, operator, value };
}

function isOperandValid(
  operator: ComparisonOperator,
  value: unknown,
): value is JsonValue {
  if (usesPathOperand(operator)) {
    return typeof value === 'string' && isValidPath(value);
  }
  if (operator.startsWith('Is') || operator.startsWith('Boolean')) {
    return typeof value === 'boolean';
  }
  if (operator.startsWith('Numeric')) {
    return typeof value === 'number' && Number.isFinite(value);
  }
  if (operator.startsWith('Timestamp')) {
    return isTimestamp(typeof value === 'string' ? value : null);
  }
  return typeof value === 'string';
}

function requireString(name: string, raw: RawObject, key: string): string {
  const value = raw[key];
  if (typeof value !== 'string') {
    fail(
      value === undefined ? 'missing-field' : 'invalid-value',
      `${key} must be a string`,
      name,
    );
  }
  return value;
}

function requirePath(name: string, raw: RawObject, key: string): string {
  const value = requireString(name, raw, key);
  if (!isValidPath(value)) {
    fail('invalid-path', `${key} "${value}" is not a valid path`, name);
  }
  return value;
}

function optionalPath(name: string, raw: RawObject, key: string): string | null {
  if (raw[key] === undefined) return ROOT_PATH;
  if (raw[key] === null) return null;
  return requirePath(name, raw, key);
}

function optionalNumber(
  raw: RawObject,
  key: string,
  name?: string,
): number | undefined {
  const value = raw[key];
  if (value === undefined) return undefined;
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    fail('invalid-value', `${key} must be a number`, name);
  }
  return value;
}

function optionalTemplate<K extends string>(
  name: string,
  raw: RawObject,
  key: string,
  field: K,
  checkPaths = true,
): Partial<Record<K, JsonValue>> {
  const value = raw[key];
  if (value === undefined) return {};
  if (!isJsonValue(value)) {
    fail('invalid-value', `${key} must be a JSON value`, name);
  }

  if (checkPaths) {
    assertTemplatePaths(name, key, value);
  }
  const entry: Partial<Record<K, JsonValue>> = {};
  entry[field] = value;
  return entry;
}

function assertTemplatePaths(name: string, key: string, template: JsonValue): void {
  for (const path of collectTemplatePaths(template)) {
    const relative = isContextPath(path) ? toContextRelativePath(path) : path;
    if (!isValidPath(relative)) {
      fail('invalid-path', `${key} references invalid path "${path}"`, name);
    }
  }
  assertPathKeysHaveStrings(name, key, template);
}

function assertPathKeysHaveStrings(name: string, key: string, template: JsonValue): void {
  if (Array.isArray(template)) {
    template.forEach((item) => assertPathKeysHaveStrings(name, key, item));
    return;
  }
  if (!isRecord(template)) return;
  for (const [field, value] of Object.entries(template)) {
    if (field.endsWith('.$') && typeof value !== 'string') {
      fail('invalid-path', `${key}.${field} must be a path string`, name);
    }
    if (isJsonValue(value)) {
      assertPathKeysHaveStrings(name, key, value);
    }
  }
}
