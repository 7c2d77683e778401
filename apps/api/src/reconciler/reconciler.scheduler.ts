import {
  Injectable,
  Logger,
  OnApplicationBootstrap,
  OnApplicationShutdown,
} from '@nestjs/common';
import { SchedulerRegistry } from '@nestjs/schedule';
import {
  DEFAULT_POLL_INTERVAL_SECONDS,
  MIN_POLL_INTERVAL_SECONDS,
  SettingsService,
  type AppSettings,
} from '../settings/settings.service';
import { ReconcilerService } from './reconciler.service';
import type { SchedulerState } from './reconciler.types';
import { errToMessage } from '../lib/errors';

const NEXT_PASS_TIMEOUT = 'reconciler:next-pass';
export const STOP_WAIT_TIMEOUT_MS = 2_000;
// Largest delay setTimeout honours; longer ones fire after 1 ms.
export const MAX_TIMER_DELAY_MS = 2_147_483_647;

export function pollIntervalMs(settings: Pick<AppSettings, 'pollIntervalSeconds'>) {
  const seconds = Number.isFinite(settings.pollIntervalSeconds)
    ? Math.trunc(settings.pollIntervalSeconds)
    : DEFAULT_POLL_INTERVAL_SECONDS;
  return Math.max(seconds, MIN_POLL_INTERVAL_SECONDS) * 1000;
}

/**
 * Background loop: pass, re-read the interval, sleep, repeat. The sleep is a
 * registered timeout that `stop()` cuts short; a pass already running is left
 * to finish.
 */
@Injectable()
export class ReconcilerScheduler
  implements OnApplicationBootstrap, OnApplicationShutdown
{
  private readonly logger = new Logger(ReconcilerScheduler.name);
  private loop: Promise<void> | null = null;
  private stopRequested = false;
  private wakeUp: (() => void) | null = null;

  constructor(
    private readonly reconciler: ReconcilerService,
    private readonly settingsService: SettingsService,
    private readonly schedulerRegistry: SchedulerRegistry,
  ) {}

  onApplicationBootstrap() {
    if (process.env.SCHEDULER_ENABLED === 'false') {
      this.logger.warn('Scheduler disabled via SCHEDULER_ENABLED=false');
      return;
    }
    this.start();
  }

  async onApplicationShutdown() {
    await this.stop();
  }

  get state(): SchedulerState {
    return this.loop && !this.stopRequested ? 'running' : 'stopped';
  }

  /** Returns false when the loop was already running. */
  start(): boolean {
    if (this.loop) {
      if (!this.stopRequested) return false;
      // Loop is still finishing a pass after stop(); keep it going.
      this.stopRequested = false;
      this.logger.log('Scheduler resumed');
      return true;
    }

    this.stopRequested = false;
    this.loop = this.runLoop();
    this.logger.log('Scheduler started');
    return true;
  }

  async stop(): Promise<void> {
    const loop = this.loop;
    if (!loop) return;

    this.stopRequested = true;
    this.wakeUp?.();

    let timer: NodeJS.Timeout | undefined;
    const timedOut = await Promise.race([
      loop.then(() => false),
      new Promise<boolean>((resolve) => {
        timer = setTimeout(() => resolve(true), STOP_WAIT_TIMEOUT_MS);
      }),
    ]);
    clearTimeout(timer);

    if (timedOut) {
      this.logger.warn(
        'Scheduler stop requested; current pass is still running and no further passes will start',
      );
    } else {
      this.logger.log('Scheduler stopped');
    }
  }

  private async runLoop(): Promise<void> {
    for (;;) {
      if (this.stopRequested) break;

      try {
        await this.reconciler.runOnce('schedule');
      } catch (err) {
        this.logger.error(`Scheduled pass failed: ${errToMessage(err)}`);
      }
      if (this.stopRequested) break;

      const intervalMs = await this.nextIntervalMs();
      if (this.stopRequested) break;

      this.logger.debug(`Next pass in ${intervalMs / 1000}s`);
      await this.waitForNextPass(intervalMs);
    }
    // Cleared in the same tick as the exit check so start() can never see a
    // loop that is about to return.
    this.loop = null;
  }

  private async nextIntervalMs(): Promise<number> {
    try {
      return pollIntervalMs(await this.settingsService.load());
    } catch (err) {
      this.logger.warn(
        `Could not read poll interval; using default: ${errToMessage(err)}`,
      );
      return DEFAULT_POLL_INTERVAL_SECONDS * 1000;
    }
  }

  /** Sleeps `ms` in timer-sized chunks; stop() cuts it short. */
  private async waitForNextPass(ms: number): Promise<void> {
    let remaining = ms;
    while (remaining > 0) {
      const chunk = Math.min(remaining, MAX_TIMER_DELAY_MS);
      const woken = await this.sleep(chunk);
      if (woken || this.stopRequested) return;
      remaining -= chunk;
    }
  }

  /** Resolves true when woken early, false when the delay ran out. */
  private sleep(ms: number): Promise<boolean> {
    return new Promise<boolean>((resolve) => {
      const done = (woken: boolean) => {
        this.wakeUp = null;
        if (this.schedulerRegistry.doesExist('timeout', NEXT_PASS_TIMEOUT)) {
          this.schedulerRegistry.deleteTimeout(NEXT_PASS_TIMEOUT);
        }
        resolve(woken);
      };
      this.wakeUp = () => done(true);
      this.schedulerRegistry.addTimeout(
        NEXT_PASS_TIMEOUT,
        setTimeout(() => done(false), ms),
      );
    });
  }
}
