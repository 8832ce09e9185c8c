import { CancellationError } from '../errors/cancellation.error';
import { StatesError } from '../errors/states.error';

/**
 * Error raised when `signal` aborts. A classified reason is kept; a bare
 * `abort()` becomes a cancellation.
 */
export function abortReason(signal: AbortSignal): StatesError {
  return signal.reason instanceof StatesError
    ? signal.reason
    : new CancellationError();
}

/**
 * A one-shot timer that can be cancelled. `start()` resolves once the
 * delay elapses, or rejects as soon as the timer is cancelled or the
 * given signal aborts.
 */
export class CancellableTimer {
  private handle: NodeJS.Timeout | undefined;
  private settled = false;
  private rejectPending: ((reason: Error) => void) | undefined;

  constructor(
    private readonly delayMs: number,
    private readonly signal?: AbortSignal,
  ) {}

  start(): Promise<void> {
    if (this.handle !== undefined || this.settled) {
      return Promise.reject(new Error('CancellableTimer can only be started once'));
    }

    return new Promise<void>((resolve, reject) => {
      if (this.signal?.aborted) {
        this.settled = true;
        reject(abortReason(this.signal));
        return;
      }

      const onAbort = (): void => {
        if (this.signal) {
          this.cancel(abortReason(this.signal));
        }
      };

      this.rejectPending = (reason) => {
        this.signal?.removeEventListener('abort', onAbort);
        reject(reason);
      };

      this.handle = setTimeout(() => {
        if (this.settled) return;
        this.settled = true;
        this.signal?.removeEventListener('abort', onAbort);
        resolve();
      }, Math.max(0, this.delayMs));

      this.signal?.addEventListener('abort', onAbort, { once: true });
    });
  }

  cancel(reason: Error = new CancellationError('Timer cancelled')): void {
    if (this.settled) return;
    this.settled = true;
    clearTimeout(this.handle);
    this.rejectPending?.(reason);
  }

  get fired(): boolean {
    return this.settled;
  }
}

export interface ExecutionScheduler {
  now(): Date;
  /** Suspends for `delayMs`; rejects promptly when `signal` aborts. */
  sleep(delayMs: number, signal: AbortSignal): Promise<void>;
  /**
   * Calls `onElapsed` once after `delayMs` unless the returned function
   * is called first.
   */
  schedule(delayMs: number, onElapsed: () => void): () => void;
}

function ignoreCancellation(reason: unknown): void {
  if (!(reason instanceof CancellationError)) {
    throw reason;
  }
}

export class SystemScheduler implements ExecutionScheduler {
  now(): Date {
    return new Date();
  }

  sleep(delayMs: number, signal: AbortSignal): Promise<void> {
    return new CancellableTimer(delayMs, signal).start();
  }

  schedule(delayMs: number, onElapsed: () => void): () => void {
    const timer = new CancellableTimer(delayMs);
    void timer.start().then(onElapsed, ignoreCancellation);
    return () => timer.cancel();
  }
}

/**
 * Settles with `promise`, or rejects as soon as `signal` aborts. The
 * underlying work is expected to observe the same signal.
 */
export function raceWithSignal<T>(
  promise: Promise<T>,
  signal: AbortSignal,
): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const onAbort = (): void => reject(abortReason(signal));
    if (signal.aborted) {
      onAbort();
    } else {
      signal.addEventListener('abort', onAbort, { once: true });
    }
    promise.then(
      (value) => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(error);
      },
    );
  });
}

/**
 * A controller that aborts with the parent's reason when the parent
 * aborts. Call `dispose()` once the child work has settled.
 */
export function linkAbortController(parent: AbortSignal): {
  controller: AbortController;
  dispose: () => void;
} {
  const controller = new AbortController();
  if (parent.aborted) {
    controller.abort(parent.reason);
    return { controller, dispose: () => undefined };
  }

  const onAbort = (): void => controller.abort(parent.reason);
  parent.addEventListener('abort', onAbort, { once: true });
  return {
    controller,
    dispose: () => parent.removeEventListener('abort', onAbort),
  };
}
