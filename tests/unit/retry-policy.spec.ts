import { CancellationError } from '../../src/errors/cancellation.error';
import { ExecutionTimeoutError } from '../../src/errors/execution-timeout.error';
import { TaskError } from '../../src/errors/task.error';
import { TimeoutError } from '../../src/errors/timeout.error';
import type {
  CatchRule,
  RetryRule,
} from '../../src/interfaces/state-machine-definition.interface';
import {
  computeBackoffSeconds,
  decide,
  errorMatches,
  toDelayMs,
} from '../../src/utils/retry-policy';

function retryRule(overrides: Partial<RetryRule> = {}): RetryRule {
  return {
    errorEquals: ['States.ALL'],
    intervalSeconds: 1,
    maxAttempts: 3,
    backoffRate: 2,
    ...overrides,
  };
}

describe('retry-policy', () => {
  describe('errorMatches', () => {
    it('should match exact names and both wildcards', () => {
      expect(errorMatches('Custom.Error', ['Custom.Error'])).toBe(true);
      expect(errorMatches('Custom.Error', ['Other'])).toBe(false);
      expect(errorMatches('Custom.Error', ['*'])).toBe(true);
      expect(errorMatches('States.Timeout', ['States.ALL'])).toBe(true);
    });

    it('should let States.TaskFailed match everything except a timeout', () => {
      expect(errorMatches('Custom.Error', ['States.TaskFailed'])).toBe(true);
      expect(errorMatches('States.Timeout', ['States.TaskFailed'])).toBe(false);
    });
  });

  describe('computeBackoffSeconds', () => {
    it('should multiply the interval by the backoff rate per retry', () => {
      const rule = retryRule({ intervalSeconds: 2, backoffRate: 1.5 });

      expect(computeBackoffSeconds(rule, 0)).toBe(2);
      expect(computeBackoffSeconds(rule, 1)).toBe(3);
      expect(computeBackoffSeconds(rule, 2)).toBe(4.5);
    });

    it('should cap the delay at MaxDelaySeconds', () => {
      const rule = retryRule({ intervalSeconds: 10, backoffRate: 3, maxDelaySeconds: 50 });

      expect(computeBackoffSeconds(rule, 1)).toBe(30);
      expect(computeBackoffSeconds(rule, 2)).toBe(50);
    });

    it('should be strictly increasing when the rate and interval are positive', () => {
      const rule = retryRule({ intervalSeconds: 0.3, backoffRate: 1.1 });
      const delays = [0, 1, 2, 3, 4, 5].map((n) => computeBackoffSeconds(rule, n));

      for (let i = 1; i < delays.length; i++) {
        expect(delays[i]).toBeGreaterThan(delays[i - 1]);
      }
    });

    it('should round sleeps to whole milliseconds', () => {
      expect(toDelayMs(0.1 * 3)).toBe(300);
      expect(toDelayMs(1.25)).toBe(1250);
    });
  });

  describe('decide', () => {
    const failure = new TaskError('Custom.Error', 'boom');

    it('should retry with the first matching rule until it is exhausted', () => {
      const rules = [
        retryRule({ errorEquals: ['Other'], maxAttempts: 5 }),
        retryRule({ errorEquals: ['Custom.Error'], maxAttempts: 3, intervalSeconds: 2 }),
      ];

      expect(decide(failure, rules, [], [])).toEqual({
        kind: 'retry',
        ruleIndex: 1,
        retriesSoFar: 0,
        delaySeconds: 2,
      });
      expect(decide(failure, rules, [], [0, 1])).toEqual({
        kind: 'retry',
        ruleIndex: 1,
        retriesSoFar: 1,
        delaySeconds: 4,
      });
      expect(decide(failure, rules, [], [0, 2])).toEqual({ kind: 'propagate' });
    });

    it('should never retry when MaxAttempts is 1 or 0', () => {
      expect(decide(failure, [retryRule({ maxAttempts: 1 })], [], [])).toEqual({
        kind: 'propagate',
      });
      expect(decide(failure, [retryRule({ maxAttempts: 0 })], [], [])).toEqual({
        kind: 'propagate',
      });
    });

    it('should fall back to the first matching catch rule with an error envelope', () => {
      const catchers: CatchRule[] = [
        { errorEquals: ['Other'], next: 'Nope', resultPath: '$' },
        { errorEquals: ['States.ALL'], next: 'Recover', resultPath: '$.error' },
      ];

      expect(decide(failure, [retryRule({ maxAttempts: 1 })], catchers, [])).toEqual({
        kind: 'catch',
        ruleIndex: 1,
        next: 'Recover',
        resultPath: '$.error',
        envelope: { Error: 'Custom.Error', Cause: 'boom' },
      });
    });

    it('should use the message as cause when the error has none', () => {
      const decision = decide(
        new TimeoutError(),
        [],
        [{ errorEquals: ['States.Timeout'], next: 'Late', resultPath: '$' }],
        [],
      );

      expect(decision).toEqual({
        kind: 'catch',
        ruleIndex: 0,
        next: 'Late',
        resultPath: '$',
        envelope: { Error: 'States.Timeout', Cause: 'States.Timeout' },
      });
    });

    it('should always propagate cancellation and execution timeouts', () => {
      const everything = [retryRule({ errorEquals: ['*'] })];
      const catchAll: CatchRule[] = [
        { errorEquals: ['*'], next: 'Recover', resultPath: '$' },
      ];

      expect(decide(new CancellationError(), everything, catchAll, [])).toEqual({
        kind: 'propagate',
      });
      expect(decide(new ExecutionTimeoutError(5), everything, catchAll, [])).toEqual({
        kind: 'propagate',
      });
    });
  });
});
