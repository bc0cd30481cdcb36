import * as cron from 'node-cron';
import type { Notifier } from '../types';
import type { CheckInRepository } from '../repositories/checkInRepository';
import type { CheckInManager } from './checkInManager';
import type { ProductivityReporter } from '../productivityReporter';
import type { PatternManager } from '../patternManager';
import { errorMessage } from '../utils';

/** Delay before retry 1, 2 and 3 when the user is mid-conversation */
export const retryDelaysMinutes = [5, 10, 10];

export const schedules = {
  hourlyCheckIn: '0 * * * *',
  staleCleanup: '*/30 * * * *',
  dailyMetrics: '55 23 * * *',
  weeklyReport: '0 21 * * 0',
} as const;

export interface CheckInSchedulerDeps {
  checkIns: CheckInRepository;
  manager: CheckInManager;
  reporter: ProductivityReporter;
  patterns: PatternManager;
  notifier: Notifier;
  /** True while the chat is in the middle of a conversation flow */
  checkIsBusy: (chatId: number) => boolean;
  /** IANA timezone for the cron expressions; null uses the process timezone */
  timezone: string | null;
}

/**
 * @description Cron jobs around the check-in loop: the hourly question,
 * stale cleanup, nightly metrics and the Sunday report.
 */
export class CheckInScheduler {
  private jobs: cron.ScheduledTask[] = [];
  private readonly retryTimers = new Set<NodeJS.Timeout>();

  constructor(private readonly deps: CheckInSchedulerDeps) {}

  get isRunning(): boolean {
    return this.jobs.length > 0;
  }

  /** Starts the jobs once at least one chat has check-ins enabled */
  start(): boolean {
    if (this.isRunning) return true;

    if (this.deps.checkIns.listEnabledChats().length === 0) {
      console.log('[Scheduler] Waiting for a chat to be configured (/start)');
      return false;
    }

    this.schedule(schedules.hourlyCheckIn, 'hourly check-in', () => this.runHourlyCheckIn());
    this.schedule(schedules.staleCleanup, 'stale cleanup', async () => {
      this.runCleanup();
    });
    this.schedule(schedules.dailyMetrics, 'daily metrics', async () => {
      this.runDailyMetrics();
    });
    this.schedule(schedules.weeklyReport, 'weekly report', () => this.runWeeklyReport());

    console.log(`[Scheduler] Started (${this.deps.timezone ?? 'local time'})`);
    return true;
  }

  stop(): void {
    for (const job of this.jobs) {
      job.stop();
    }
    this.jobs = [];
    for (const timer of this.retryTimers) {
      clearTimeout(timer);
    }
    this.retryTimers.clear();
    console.log('[Scheduler] Stopped');
  }

  async runHourlyCheckIn(now = Date.now()): Promise<void> {
    const { checkIns, manager, checkIsBusy } = this.deps;

    for (const chatId of checkIns.listEnabledChats()) {
      try {
        const config = checkIns.getUserConfig(chatId);
        if (config?.isSleeping) {
          manager.recordSleepingCheckIn(chatId, now);
          console.log(`[Scheduler] Chat ${chatId} is sleeping, check-in recorded as sleeping`);
          continue;
        }

        if (checkIsBusy(chatId)) {
          console.log(`[Scheduler] Chat ${chatId} is busy, retrying in ${retryDelaysMinutes[0]} min`);
          this.scheduleRetry(chatId, 1, now);
          continue;
        }

        await manager.sendCheckIn(chatId, now);
      } catch (err) {
        console.error(`[Scheduler] Hourly check-in failed for chat ${chatId}:`, errorMessage(err));
      }
    }
  }

  /**
   * @description Retry `attempt` (1-based) of a check-in that was due at
   * `scheduledTime`. Still busy after the last retry: recorded as missed.
   */
  async retryCheckIn(chatId: number, attempt: number, scheduledTime: number, now = Date.now()): Promise<void> {
    const { checkIns, manager, checkIsBusy } = this.deps;

    const config = checkIns.getUserConfig(chatId);
    if (!config || !config.checkInsEnabled || config.isSleeping) {
      console.log(`[Scheduler] Chat ${chatId} no longer expects a check-in, dropping retry ${attempt}`);
      return;
    }

    if (checkIsBusy(chatId)) {
      if (attempt >= retryDelaysMinutes.length) {
        manager.recordMissedCheckIn(chatId, scheduledTime, attempt);
        console.log(`[Scheduler] Chat ${chatId} still busy after ${attempt} retries, check-in missed`);
        return;
      }
      console.log(`[Scheduler] Chat ${chatId} still busy, retry ${attempt + 1} in ${retryDelaysMinutes[attempt]} min`);
      this.scheduleRetry(chatId, attempt + 1, scheduledTime);
      return;
    }

    await manager.sendCheckIn(chatId, now, attempt);
    console.log(`[Scheduler] Check-in sent to chat ${chatId} after ${attempt} retries`);
  }

  runCleanup(now = Date.now()): number {
    return this.deps.manager.markStaleAsMissed(now);
  }

  runDailyMetrics(now = new Date()): void {
    this.deps.reporter.saveDailyMetrics(now, now.getTime());
  }

  async runWeeklyReport(now = new Date()): Promise<void> {
    const { reporter, checkIns, notifier, patterns } = this.deps;
    const report = reporter.generateWeeklyReport(now, now.getTime());

    for (const chatId of checkIns.listEnabledChats()) {
      await notifier.send(chatId, report.markdown);
    }

    await patterns.analyzeOverrides(now.getTime());
  }

  private scheduleRetry(chatId: number, attempt: number, scheduledTime: number): void {
    const delayMs = retryDelaysMinutes[attempt - 1] * 60 * 1000;
    const timer = setTimeout(() => {
      this.retryTimers.delete(timer);
      this.retryCheckIn(chatId, attempt, scheduledTime).catch((err) => {
        console.error(`[Scheduler] Retry ${attempt} failed for chat ${chatId}:`, errorMessage(err));
      });
    }, delayMs);
    this.retryTimers.add(timer);
  }

  private schedule(expression: string, name: string, job: () => Promise<void>): void {
    const options: cron.ScheduleOptions = this.deps.timezone ? { timezone: this.deps.timezone } : {};
    const task = cron.schedule(expression, () => {
      job().catch((err) => {
        console.error(`[Scheduler] Job "${name}" failed:`, errorMessage(err));
      });
    }, options);
    this.jobs.push(task);
  }
}
