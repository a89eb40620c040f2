/**
 * Daily quota reset timer.
 * Restores exhausted credentials at the provider's quota day boundary and
 * reschedules itself for the following day.
 */

import { logger } from '../shared/logger.js';

const DAY_MS = 86_400_000;

/**
 * Milliseconds from `nowMs` until the next occurrence of `hourUtc`:00 UTC.
 * Returns a full day when `nowMs` falls exactly on the boundary.
 */
export function msUntilNextReset(nowMs: number, hourUtc: number): number {
  const now = new Date(nowMs);
  const next = Date.UTC(
    now.getUTCFullYear(),
    now.getUTCMonth(),
    now.getUTCDate(),
    hourUtc,
  );
  return next > nowMs ? next - nowMs : next + DAY_MS - nowMs;
}

/** Anything that can be reset at the day boundary (the credential pool). */
export interface DailyResettable {
  resetDaily(): number;
}

/**
 * Schedules `resetDaily()` on a target at a fixed UTC hour.
 * The timer is unref'd so it never keeps the process alive on its own.
 */
export class DailyResetScheduler {
  private timer: NodeJS.Timeout | undefined;

  constructor(
    private readonly target: DailyResettable,
    private readonly hourUtc: number,
    private readonly now: () => number = Date.now,
  ) {}

  /** Start (or restart) the schedule. */
  start(): void {
    this.stop();

    const delayMs = msUntilNextReset(this.now(), this.hourUtc);
    this.timer = setTimeout(() => {
      this.timer = undefined;
      this.target.resetDaily();
      this.start();
    }, delayMs);

    if (typeof this.timer === 'object' && 'unref' in this.timer) {
      this.timer.unref();
    }

    logger.debug(
      { hourUtc: this.hourUtc, delayMs },
      `Next daily quota reset in ${Math.round(delayMs / 1000)}s`,
    );
  }

  /** Cancel the pending reset. Used during shutdown. */
  stop(): void {
    if (this.timer !== undefined) {
      clearTimeout(this.timer);
      this.timer = undefined;
    }
  }

  /** Whether a reset is currently scheduled. */
  get scheduled(): boolean {
    return this.timer !== undefined;
  }
}
