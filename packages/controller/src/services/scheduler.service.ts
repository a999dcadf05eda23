import { silentLogger, type Logger } from '../utils/logger';

/**
 * Time source for the loop
 */
export interface SchedulerClock {
  now(): number;
  /** Resolves after `ms`, or as soon as `signal` aborts */
  sleep(ms: number, signal?: AbortSignal): Promise<void>;
}

export const systemClock: SchedulerClock = {
  now: () => Date.now(),
  sleep: (ms, signal) =>
    new Promise<void>((resolve) => {
      if (signal?.aborted) {
        resolve();
        return;
      }
      const done = (): void => {
        clearTimeout(timer);
        signal?.removeEventListener('abort', done);
        resolve();
      };
      const timer = setTimeout(done, ms);
      signal?.addEventListener('abort', done, { once: true });
    }),
};

export interface SchedulerOptions {
  /** Period between cycles; zero or less runs a single cycle */
  intervalMs: number;
  /** Stops the loop before the next cycle starts */
  signal?: AbortSignal;
  clock?: SchedulerClock;
}

/**
 * Drives reconciliation cycles, one at a time
 */
export class SchedulerService {
  constructor(private readonly logger: Logger = silentLogger) {}

  /**
   * Run `cycle` once, or repeatedly on ticks at `start + k * interval`.
   *
   * A cycle that overruns one or more ticks is followed immediately by a single
   * catch-up cycle. A cycle failure rejects and ends the loop.
   * Resolves with the number of cycles that ran.
   */
  async run(cycle: () => Promise<void>, options: SchedulerOptions): Promise<number> {
    const { intervalMs, signal } = options;
    const clock = options.clock ?? systemClock;

    if (intervalMs <= 0) {
      await cycle();
      return 1;
    }

    const start = clock.now();
    let tick = 0;
    let cycles = 0;

    this.logger.info({ intervalMs }, 'Starting periodic reconciliation');

    while (!signal?.aborted) {
      await cycle();
      cycles += 1;

      if (signal?.aborted) {
        break;
      }

      const nextTick = tick + 1;
      const due = start + nextTick * intervalMs;
      const now = clock.now();

      if (due > now) {
        await clock.sleep(due - now, signal);
        tick = nextTick;
      } else {
        tick = Math.floor((now - start) / intervalMs);
        this.logger.warn(
          { intervalMs, overrunMs: now - due },
          'Reconciliation cycle overran its interval'
        );
      }
    }

    this.logger.info({ cycles }, 'Periodic reconciliation stopped');
    return cycles;
  }
}
