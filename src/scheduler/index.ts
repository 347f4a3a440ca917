import { Mutex } from 'async-mutex';
import { logger } from '../utils/logger.js';

export interface SchedulerOptions {
  intervalMs: number;
  job: () => Promise<void>;
  name?: string;
}

/**
 * Runs `job` now and then again `intervalMs` after each run finishes.
 * A single gate keeps runs from overlapping; a tick that finds the gate
 * held is skipped and the loop waits for the active run before sleeping.
 */
export class MirrorScheduler {
  private readonly gate = new Mutex();
  private readonly intervalMs: number;
  private readonly job: () => Promise<void>;
  private readonly log: typeof logger;

  private active = false;
  private loop: Promise<void> | null = null;
  private timer: NodeJS.Timeout | null = null;
  private wake: (() => void) | null = null;

  constructor(options: SchedulerOptions) {
    this.intervalMs = options.intervalMs;
    this.job = options.job;
    this.log = logger.child({ component: 'scheduler', name: options.name ?? 'mirror-check' });
  }

  get isRunning(): boolean {
    return this.gate.isLocked();
  }

  /**
   * Runs the job unless a run is already in flight. Resolves to false when
   * the tick was skipped. Job errors are logged, never rethrown.
   */
  async tick(): Promise<boolean> {
    if (this.gate.isLocked()) {
      this.log.debug('Previous run still in progress, skipping tick');
      return false;
    }

    await this.gate.runExclusive(async () => {
      const startedAt = Date.now();
      try {
        await this.job();
        this.log.info({ durationMs: Date.now() - startedAt }, 'Scheduled run finished');
      } catch (err) {
        this.log.error({ err, durationMs: Date.now() - startedAt }, 'Scheduled run failed');
      }
    });
    return true;
  }

  start(): void {
    if (this.active) return;
    this.active = true;
    this.log.info({ intervalMs: this.intervalMs }, 'Scheduler started');
    this.loop = this.runLoop();
  }

  /** Stops rearming and waits for an in-flight run to finish. */
  async stop(): Promise<void> {
    if (!this.active) return;
    this.active = false;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    this.wake?.();
    this.wake = null;
    await this.loop;
    this.loop = null;
    this.log.info('Scheduler stopped');
  }

  private async runLoop(): Promise<void> {
    while (this.active) {
      const ran = await this.tick();
      if (!ran) await this.gate.waitForUnlock();
      if (!this.active) break;
      await this.sleep(this.intervalMs);
    }
  }

  private sleep(ms: number): Promise<void> {
    return new Promise((resolve) => {
      this.wake = resolve;
      this.timer = setTimeout(() => {
        this.timer = null;
        this.wake = null;
        resolve();
      }, ms);
    });
  }
}
