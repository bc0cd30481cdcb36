import type { CheckIn, InlineButton, Notifier } from '../types';
import type { CheckInRepository } from '../repositories/checkInRepository';
import { atClockTime, parseClockTime } from '../utils';

export const staleAfterMs = 90 * 60 * 1000;

export const checkInMessage =
  '⏰ **Hourly Check-In**\n\n' +
  'What did you do in the last hour?\n\n' +
  "💬 Reply with what you worked on, and I'll analyze how it aligns with your goals.";

export const checkInButtons: InlineButton[][] = [[
  { text: '😴 Sleep', callbackData: 'checkin_sleep' },
  { text: '☀️ Wake', callbackData: 'checkin_wake' },
]];

/**
 * @description Sends hourly check-ins and keeps their lifecycle in the database:
 * sent → completed (answered), missed (stale) or sleeping (sleep mode).
 */
export class CheckInManager {
  constructor(
    private readonly checkIns: CheckInRepository,
    private readonly notifier: Notifier,
  ) {}

  /** Records a sent check-in and delivers the question; returns the check-in ID */
  async sendCheckIn(chatId: number, now = Date.now(), retryCount = 0): Promise<number> {
    const checkInId = this.checkIns.createCheckIn(chatId, now, 'sent', retryCount);
    const messageId = await this.notifier.send(chatId, checkInMessage, checkInButtons);
    if (messageId === null) {
      console.error(`[CheckIn] Check-in ${checkInId} could not be delivered to chat ${chatId}`);
    } else {
      console.log(`[CheckIn] Check-in ${checkInId} sent to chat ${chatId}`);
    }
    return checkInId;
  }

  /** The latest unanswered check-in of the chat */
  getPendingCheckIn(chatId: number): CheckIn | null {
    return this.checkIns.getLatestSentCheckIn(chatId);
  }

  /** An hour that passed while the user slept: no message, just the record */
  recordSleepingCheckIn(chatId: number, now = Date.now()): number {
    const checkInId = this.checkIns.createCheckIn(chatId, now, 'sleeping');
    this.checkIns.insertActivityLog({
      timestamp: now,
      userResponse: null,
      activitySummary: 'Sleeping',
      productivityType: 'sleeping',
      alignmentScore: null,
      matchedTodoId: null,
      category: null,
      reasoning: null,
      checkInId,
    }, now);
    return checkInId;
  }

  recordMissedCheckIn(chatId: number, scheduledTime: number, retryCount: number): number {
    return this.checkIns.createCheckIn(chatId, scheduledTime, 'missed', retryCount);
  }

  handleSleep(chatId: number, now = Date.now()): void {
    this.checkIns.ensureUserConfig(chatId, now);
    this.checkIns.markSleeping(chatId, now);
    console.log(`[CheckIn] Chat ${chatId} entered sleep mode`);
  }

  /**
   * @description Ends sleep mode. Unanswered check-ins between the later of the
   * sleep start and today's default wake time and now become sleeping, each
   * with a Sleeping activity log. Returns hours slept (one decimal), or null
   * when the chat was not asleep.
   */
  handleWake(chatId: number, now = Date.now()): number | null {
    const config = this.checkIns.getUserConfig(chatId);
    if (!config || !config.isSleeping || config.sleepStartTime === null) {
      console.log(`[CheckIn] Chat ${chatId} pressed Wake without sleeping`);
      return null;
    }

    const wakeClock = parseClockTime(config.defaultWakeTime) ?? { hours: 8, minutes: 0 };
    const todayWake = atClockTime(new Date(now), wakeClock.hours, wakeClock.minutes);
    const retroactiveStart = Math.max(config.sleepStartTime, todayWake.getTime());

    const sleeping = this.checkIns.markRangeAsSleeping(chatId, retroactiveStart, now);
    for (const checkIn of sleeping) {
      if (this.checkIns.checkHasActivityLog(checkIn.id)) continue;
      this.checkIns.insertActivityLog({
        timestamp: checkIn.scheduledTime,
        userResponse: null,
        activitySummary: 'Sleeping',
        productivityType: 'sleeping',
        alignmentScore: null,
        matchedTodoId: null,
        category: null,
        reasoning: null,
        checkInId: checkIn.id,
      }, now);
    }

    this.checkIns.markAwake(chatId, now);
    const hoursSlept = Math.round(((now - config.sleepStartTime) / 3_600_000) * 10) / 10;
    console.log(`[CheckIn] Chat ${chatId} woke up after ${hoursSlept.toFixed(1)} hours`);
    return hoursSlept;
  }

  markStaleAsMissed(now = Date.now()): number {
    const count = this.checkIns.markStaleAsMissed(now - staleAfterMs);
    if (count > 0) {
      console.log(`[CheckIn] Marked ${count} stale check-ins as missed`);
    }
    return count;
  }
}
