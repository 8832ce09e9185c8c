import { CancellationError } from '../errors/cancellation.error';
import { ExecutionTimeoutError } from '../errors/execution-timeout.error';
import type { StatesError } from '../errors/states.error';
import type { JsonObject } from '../interfaces/json.interface';
import type {
  CatchRule,
  RetryRule,
} from '../interfaces/state-machine-definition.interface';
import {
  ERROR_WILDCARD,
  STATES_ALL,
  STATES_TASK_FAILED,
  STATES_TIMEOUT,
} from '../state-machine.constants';

export interface ErrorEnvelope extends JsonObject {
  Error: string;
  Cause: string;
}

export type PolicyDecision =
  | {
      kind: 'retry';
      ruleIndex: number;
      /** Retries already taken under this rule before this one. */
      retriesSoFar: number;
      delaySeconds: number;
    }
  | {
      kind: 'catch';
      ruleIndex: number;
      next: string;
      resultPath: string | null;
      envelope: ErrorEnvelope;
    }
  | { kind: 'propagate' };

export function errorMatches(
  errorName: string,
  patterns: readonly string[],
): boolean {
  return patterns.some((pattern) => {
    if (pattern === ERROR_WILDCARD || pattern === STATES_ALL) {
      return true;
    }
    if (pattern === STATES_TASK_FAILED) {
      return errorName !== STATES_TIMEOUT;
    }
    return pattern === errorName;
  });
}

/**
 * `intervalSeconds * backoffRate ^ retriesSoFar`, capped by
 * `maxDelaySeconds` when the rule sets one.
 */
export function computeBackoffSeconds(
  rule: RetryRule,
  retriesSoFar: number,
): number {
  const delay = rule.intervalSeconds * rule.backoffRate ** retriesSoFar;
  return rule.maxDelaySeconds === undefined
    ? delay
    : Math.min(delay, rule.maxDelaySeconds);
}

export function toDelayMs(delaySeconds: number): number {
  return Math.round(delaySeconds * 1000);
}

/**
 * Decides what happens after a state attempt fails. Only the first retry
 * rule matching the error is considered; once it is exhausted the catch
 * rules are scanned in order.
 */
export function decide(
  error: StatesError,
  retryRules: readonly RetryRule[],
  catchRules: readonly CatchRule[],
  retriesByRule: readonly number[],
): PolicyDecision {
  if (error instanceof CancellationError || error instanceof ExecutionTimeoutError) {
    return { kind: 'propagate' };
  }

  const retryIndex = retryRules.findIndex((rule) =>
    errorMatches(error.error, rule.errorEquals),
  );
  if (retryIndex >= 0) {
    const rule = retryRules[retryIndex];
    const retriesSoFar = retriesByRule[retryIndex] ?? 0;
    if (retriesSoFar < Math.max(rule.maxAttempts, 1) - 1) {
      return {
        kind: 'retry',
        ruleIndex: retryIndex,
        retriesSoFar,
        delaySeconds: computeBackoffSeconds(rule, retriesSoFar),
      };
    }
  }

  const catchIndex = catchRules.findIndex((rule) =>
    errorMatches(error.error, rule.errorEquals),
  );
  if (catchIndex >= 0) {
    const rule = catchRules[catchIndex];
    return {
      kind: 'catch',
      ruleIndex: catchIndex,
      next: rule.next,
      resultPath: rule.resultPath,
      envelope: { Error: error.error, Cause: error.cause ?? error.message },
    };
  }

  return { kind: 'propagate' };
}
