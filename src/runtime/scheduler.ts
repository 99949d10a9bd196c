/**
 * Cooperative scheduling primitives.
 *
 * All trade-link state lives on the event loop. Retry delays are awaited
 * through a Scheduler so nothing ever blocks the host, and so tests can
 * replace wall-clock timers with an immediate scheduler.
 */

export interface Scheduler {
  /** Resolves once, after at least `ms` milliseconds. Never rejects. */
  delay(ms: number): Promise<void>;
}

export interface Clock {
  /** Milliseconds since the unix epoch. */
  now(): number;
}

export const systemClock: Clock = {
  now: () => Date.now()
};

export class TimerScheduler implements Scheduler {
  delay(ms: number): Promise<void> {
    return new Promise((resolve) => {
      setTimeout(resolve, Math.max(0, ms));
    });
  }
}
