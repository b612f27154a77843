/**
 * AbortSignal helpers
 */

export interface TimeoutSignal {
  signal: AbortSignal;
  /** True once the timeout (not the parent) aborted the signal */
  timedOut: () => boolean;
  dispose: () => void;
}

/**
 * A signal that fires when `parent` fires or after `timeoutMs`, whichever
 * comes first. A timeout of 0 or less never fires. Call `dispose` when done.
 */
export function createTimeoutSignal(parent: AbortSignal | undefined, timeoutMs: number | undefined): TimeoutSignal {
  const controller = new AbortController();
  let expired = false;

  const onParentAbort = () => controller.abort(parent?.reason);
  if (parent?.aborted) {
    onParentAbort();
  } else {
    parent?.addEventListener('abort', onParentAbort, { once: true });
  }

  const timer =
    timeoutMs && timeoutMs > 0
      ? setTimeout(() => {
          expired = true;
          controller.abort(new Error(`Request timed out after ${timeoutMs}ms`));
        }, timeoutMs)
      : undefined;

  return {
    signal: controller.signal,
    timedOut: () => expired,
    dispose: () => {
      if (timer) {
        clearTimeout(timer);
      }
      parent?.removeEventListener('abort', onParentAbort);
    },
  };
}

/**
 * A one-shot timer that can be paused and resumed. Paused time does not
 * count toward `ms`. A duration of 0 or less never fires.
 */
export class PausableTimeout {
  private timer: NodeJS.Timeout | undefined;
  private remainingMs: number;
  private startedAt = 0;
  private stopped = false;

  constructor(
    private readonly ms: number,
    private readonly onExpire: () => void,
    private readonly now: () => number = Date.now
  ) {
    this.remainingMs = ms;
  }

  resume(): void {
    if (this.ms <= 0 || this.stopped || this.timer) {
      return;
    }
    this.startedAt = this.now();
    this.timer = setTimeout(() => {
      this.timer = undefined;
      this.stopped = true;
      this.onExpire();
    }, this.remainingMs);
  }

  pause(): void {
    if (!this.timer) {
      return;
    }
    clearTimeout(this.timer);
    this.timer = undefined;
    this.remainingMs = Math.max(0, this.remainingMs - (this.now() - this.startedAt));
  }

  /**
   * Cancel for good; later `resume` calls do nothing
   */
  stop(): void {
    this.pause();
    this.stopped = true;
  }
}
