import type { JsonValue } from '../interfaces/json.interface';
import type {
  ChoiceBranch,
  ChoiceCondition,
  ComparisonOperator,
} from '../interfaces/state-machine-definition.interface';
import { getPath } from './json-path';

type Comparator = (actual: JsonValue, expected: JsonValue) => boolean;
type Order = (comparison: number) => boolean;

interface OperatorEntry {
  compare: Comparator;
  /** The rule's value is a path to the right-hand side. */
  againstPath: boolean;
}

const TIMESTAMP_PATTERN =
  /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}(\.\d+)?(Z|[+-]\d{2}:\d{2})$/;

export function isTimestamp(value: JsonValue): value is string {
  return (
    typeof value === 'string' &&
    TIMESTAMP_PATTERN.test(value) &&
    !Number.isNaN(Date.parse(value))
  );
}

const equals: Order = (c) => c === 0;
const lessThan: Order = (c) => c < 0;
const greaterThan: Order = (c) => c > 0;
const lessThanEquals: Order = (c) => c <= 0;
const greaterThanEquals: Order = (c) => c >= 0;

function compareStrings(a: string, b: string): number {
  if (a < b) return -1;
  return a > b ? 1 : 0;
}

function strings(order: Order): Comparator {
  return (a, e) =>
    typeof a === 'string' && typeof e === 'string' && order(compareStrings(a, e));
}

function numbers(order: Order): Comparator {
  return (a, e) =>
    typeof a === 'number' && typeof e === 'number' && order(a - e);
}

function timestamps(order: Order): Comparator {
  return (a, e) =>
    isTimestamp(a) &&
    isTimestamp(e) &&
    order(Date.parse(a) - Date.parse(e));
}

const booleans: Comparator = (a, e) => typeof a === 'boolean' && a === e;

function typeCheck(predicate: (value: JsonValue) => boolean): Comparator {
  return (a, e) => predicate(a) === e;
}

function value(compare: Comparator): OperatorEntry {
  return { compare, againstPath: false };
}

function path(compare: Comparator): OperatorEntry {
  return { compare, againstPath: true };
}

const OPERATORS: Record<Exclude<ComparisonOperator, 'IsPresent'>, OperatorEntry> = {
  StringEquals: value(strings(equals)),
  StringLessThan: value(strings(lessThan)),
  StringGreaterThan: value(strings(greaterThan)),
  StringLessThanEquals: value(strings(lessThanEquals)),
  StringGreaterThanEquals: value(strings(greaterThanEquals)),
  StringMatches: value(
    (a, e) =>
      typeof a === 'string' && typeof e === 'string' && matchesWildcard(a, e),
  ),
  NumericEquals: value(numbers(equals)),
  NumericLessThan: value(numbers(lessThan)),
  NumericGreaterThan: value(numbers(greaterThan)),
  NumericLessThanEquals: value(numbers(lessThanEquals)),
  NumericGreaterThanEquals: value(numbers(greaterThanEquals)),
  BooleanEquals: value(booleans),
  TimestampEquals: value(timestamps(equals)),
  TimestampLessThan: value(timestamps(lessThan)),
  TimestampGreaterThan: value(timestamps(greaterThan)),
  TimestampLessThanEquals: value(timestamps(lessThanEquals)),
  TimestampGreaterThanEquals: value(timestamps(greaterThanEquals)),
  StringEqualsPath: path(strings(equals)),
  StringLessThanPath: path(strings(lessThan)),
  StringGreaterThanPath: path(strings(greaterThan)),
  StringLessThanEqualsPath: path(strings(lessThanEquals)),
  StringGreaterThanEqualsPath: path(strings(greaterThanEquals)),
  NumericEqualsPath: path(numbers(equals)),
  NumericLessThanPath: path(numbers(lessThan)),
  NumericGreaterThanPath: path(numbers(greaterThan)),
  NumericLessThanEqualsPath: path(numbers(lessThanEquals)),
  NumericGreaterThanEqualsPath: path(numbers(greaterThanEquals)),
  BooleanEqualsPath: path(booleans),
  TimestampEqualsPath: path(timestamps(equals)),
  TimestampLessThanPath: path(timestamps(lessThan)),
  TimestampGreaterThanPath: path(timestamps(greaterThan)),
  TimestampLessThanEqualsPath: path(timestamps(lessThanEquals)),
  TimestampGreaterThanEqualsPath: path(timestamps(greaterThanEquals)),
  IsNull: value(typeCheck((v) => v === null)),
  IsString: value(typeCheck((v) => typeof v === 'string')),
  IsNumeric: value(typeCheck((v) => typeof v === 'number')),
  IsBoolean: value(typeCheck((v) => typeof v === 'boolean')),
  IsTimestamp: value(typeCheck(isTimestamp)),
};

/**
 * Returns the `Next` of the first branch whose condition holds, or
 * `undefined` when none does.
 */
export function evaluateChoices(
  branches: readonly ChoiceBranch[],
  input: JsonValue,
): string | undefined {
  return branches.find((branch) => evaluateCondition(branch.condition, input))
    ?.next;
}

export function evaluateCondition(
  condition: ChoiceCondition,
  input: JsonValue,
): boolean {
  switch (condition.kind) {
    case 'and':
      return condition.conditions.every((c) => evaluateCondition(c, input));
    case 'or':
      return condition.conditions.some((c) => evaluateCondition(c, input));
    case 'not':
      return !evaluateCondition(condition.condition, input);
    case 'comparison':
      return evaluateComparison(
        condition.variable,
        condition.operator,
        condition.value,
        input,
      );
  }
}

function evaluateComparison(
  variable: string,
  operator: ComparisonOperator,
  expected: JsonValue,
  input: JsonValue,
): boolean {
  const lookup = getPath(input, variable);

  if (operator === 'IsPresent') {
    return lookup.found === expected;
  }
  // Every other operator is false for a missing variable.
  if (!lookup.found) {
    return false;
  }

  const entry = OPERATORS[operator];
  if (!entry.againstPath) {
    return entry.compare(lookup.value, expected);
  }

  if (typeof expected !== 'string') {
    return false;
  }
  const other = getPath(input, expected);
  return other.found && entry.compare(lookup.value, other.value);
}

/** `*` matches any run of characters; `\*` is a literal asterisk. */
export function matchesWildcard(text: string, pattern: string): boolean {
  let source = '';
  for (let i = 0; i < pattern.length; i++) {
    const char = pattern[i];
    if (char === '\\' && pattern[i + 1] === '*') {
      source += '\\*';
      i++;
    } else if (char === '*') {
      source += '.*';
    } else {
      source += char.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
    }
  }
  return new RegExp(`^${source}$`, 's').test(text);
}

export function usesPathOperand(operator: ComparisonOperator): boolean {
  return operator !== 'IsPresent' && OPERATORS[operator].againstPath;
}
