import type { JsonValue } from './json.interface';

export type StateType =
  | 'Task'
  | 'Choice'
  | 'Wait'
  | 'Pass'
  | 'Succeed'
  | 'Fail'
  | 'Parallel'
  | 'Map';

export type WorkflowType = 'STANDARD' | 'EXPRESS';

export interface RetryRule {
  errorEquals: readonly string[];
  intervalSeconds: number;
  maxAttempts: number;
  backoffRate: number;
  maxDelaySeconds?: number;
}

export interface CatchRule {
  errorEquals: readonly string[];
  next: string;
  /** `null` discards the error envelope and keeps the state input. */
  resultPath: string | null;
}

export const COMPARISON_OPERATORS = [
  'StringEquals',
  'StringLessThan',
  'StringGreaterThan',
  'StringLessThanEquals',
  'StringGreaterThanEquals',
  'StringMatches',
  'NumericEquals',
  'NumericLessThan',
  'NumericGreaterThan',
  'NumericLessThanEquals',
  'NumericGreaterThanEquals',
  'BooleanEquals',
  'TimestampEquals',
  'TimestampLessThan',
  'TimestampGreaterThan',
  'TimestampLessThanEquals',
  'TimestampGreaterThanEquals',
  'StringEqualsPath',
  'StringLessThanPath',
  'StringGreaterThanPath',
  'StringLessThanEqualsPath',
  'StringGreaterThanEqualsPath',
  'NumericEqualsPath',
  'NumericLessThanPath',
  'NumericGreaterThanPath',
  'NumericLessThanEqualsPath',
  'NumericGreaterThanEqualsPath',
  'BooleanEqualsPath',
  'TimestampEqualsPath',
  'TimestampLessThanPath',
  'TimestampGreaterThanPath',
  'TimestampLessThanEqualsPath',
  'TimestampGreaterThanEqualsPath',
  'IsPresent',
  'IsNull',
  'IsString',
  'IsNumeric',
  'IsBoolean',
  'IsTimestamp',
] as const;

export type ComparisonOperator = (typeof COMPARISON_OPERATORS)[number];

export type ChoiceCondition =
  | { kind: 'and'; conditions: readonly ChoiceCondition[] }
  | { kind: 'or'; conditions: readonly ChoiceCondition[] }
  | { kind: 'not'; condition: ChoiceCondition }
  | {
      kind: 'comparison';
      variable: string;
      operator: ComparisonOperator;
      /** For `…Path` operators this is the path of the right-hand side. */
      value: JsonValue;
    };

export interface ChoiceBranch {
  condition: ChoiceCondition;
  next: string;
}

export type WaitDuration =
  | { kind: 'seconds'; seconds: number }
  | { kind: 'secondsPath'; path: string }
  | { kind: 'timestamp'; timestamp: string }
  | { kind: 'timestampPath'; path: string };

interface StateBase {
  name: string;
  comment?: string;
}

interface IoPaths {
  /** `null` means "use an empty object"; `'$'` is the whole value. */
  inputPath: string | null;
  outputPath: string | null;
}

interface Transition {
  next?: string;
  end: boolean;
}

interface Fallible {
  resultPath: string | null;
  retry: readonly RetryRule[];
  catch: readonly CatchRule[];
}

export interface TaskState extends StateBase, IoPaths, Transition, Fallible {
  type: 'Task';
  resource: string;
  parameters?: JsonValue;
  resultSelector?: JsonValue;
  timeoutSeconds?: number;
}

export interface PassState extends StateBase, IoPaths, Transition {
  type: 'Pass';
  resultPath: string | null;
  result?: JsonValue;
  parameters?: JsonValue;
}

export interface ChoiceState extends StateBase, IoPaths {
  type: 'Choice';
  choices: readonly ChoiceBranch[];
  default?: string;
}

export interface WaitState extends StateBase, IoPaths, Transition {
  type: 'Wait';
  wait: WaitDuration;
}

export interface SucceedState extends StateBase, IoPaths {
  type: 'Succeed';
}

export interface FailState extends StateBase {
  type: 'Fail';
  error?: string;
  cause?: string;
}

export interface ParallelState extends StateBase, IoPaths, Transition, Fallible {
  type: 'Parallel';
  branches: readonly StateMachineDefinition[];
  resultSelector?: JsonValue;
}

export interface MapState extends StateBase, IoPaths, Transition, Fallible {
  type: 'Map';
  iterator: StateMachineDefinition;
  itemsPath: string;
  /** 0 means unbounded. */
  maxConcurrency: number;
  parameters?: JsonValue;
  resultSelector?: JsonValue;
}

export type State =
  | TaskState
  | ChoiceState
  | WaitState
  | PassState
  | SucceedState
  | FailState
  | ParallelState
  | MapState;

export interface StateMachineDefinition {
  startAt: string;
  states: ReadonlyMap<string, State>;
  comment?: string;
  timeoutSeconds?: number;
}
