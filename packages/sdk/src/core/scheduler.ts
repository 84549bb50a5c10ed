/**
 * Delayed work scheduling for controllers.
 *
 * A scheduler holds at most one pending callback: posting new work replaces
 * whatever was pending. Callbacks run on the event loop that posted them.
 *
 * @module core/scheduler
 */

import type { Logger } from '../utils/logger.js';

export interface Scheduler {
  postDelayedWork(callback: () => void, delayMs: number): void;
  cancelDelayedWork(): void;
  hasPendingWork(): boolean;
}

export class TimerScheduler implements Scheduler {
  private timer: ReturnType<typeof setTimeout> | null = null;

  postDelayedWork(callback: () => void, delayMs: number): void {
    this.cancelDelayedWork();
    this.timer = setTimeout(() => {
      this.timer = null;
      callback();
    }, delayMs);
  }

  cancelDelayedWork(): void {
    if (this.timer !== null) {
      clearTimeout(this.timer);
      this.timer = null;
    }
  }

  hasPendingWork(): boolean {
    return this.timer !== null;
  }
}

/**
 * Wraps another scheduler and logs every post and cancel at debug level.
 */
export class LoggingScheduler implements Scheduler {
  constructor(
    private readonly inner: Scheduler,
    private readonly logger: Logger,
    private readonly label = 'scheduler'
  ) {}

  postDelayedWork(callback: () => void, delayMs: number): void {
    this.logger.debug('Posting delayed work', { scheduler: this.label, delayMs });
    this.inner.postDelayedWork(callback, delayMs);
  }

  cancelDelayedWork(): void {
    if (this.inner.hasPendingWork()) {
      this.logger.debug('Cancelling delayed work', { scheduler: this.label });
    }
    this.inner.cancelDelayedWork();
  }

  hasPendingWork(): boolean {
    return this.inner.hasPendingWork();
  }
}
