import { Storage } from '../../storage';
import { CheckInManager, checkInMessage } from '../checkInManager';
import { CheckInScheduler } from '../checkInScheduler';
import { ProductivityReporter } from '../../productivityReporter';
import { PatternManager } from '../../patternManager';
import { RecordingSender, ScriptedModel } from '../../__tests__/fakes';
import { setTimeZone } from '../../utils';

const minute = 60 * 1000;
const tenAm = new Date(2026, 0, 29, 10, 0).getTime();

interface MetricsRow {
  period_start: number;
  period_end: number;
  total_check_ins: number;
}

interface CheckInRow {
  chat_id: number;
  status: string;
  retry_count: number;
  scheduled_time: number;
}

describe('CheckInScheduler', () => {
  let storage: Storage;
  let sender: RecordingSender;
  let model: ScriptedModel;
  let busy: Set<number>;
  let scheduler: CheckInScheduler;

  beforeEach(() => {
    storage = new Storage(':memory:');
    sender = new RecordingSender();
    model = new ScriptedModel();
    busy = new Set();
    scheduler = new CheckInScheduler({
      checkIns: storage.checkIns,
      manager: new CheckInManager(storage.checkIns, sender),
      reporter: new ProductivityReporter(storage.checkIns, storage.insights),
      patterns: new PatternManager(model, storage.todos, storage.insights),
      notifier: sender,
      checkIsBusy: (chatId) => busy.has(chatId),
      timezone: null,
    });
  });

  afterEach(() => {
    scheduler.stop();
    jest.useRealTimers();
    storage.close();
  });

  function checkInRows(): CheckInRow[] {
    return storage.db
      .prepare<[], CheckInRow>('SELECT chat_id, status, retry_count, scheduled_time FROM check_ins ORDER BY id')
      .all();
  }

  function metricsRows(): MetricsRow[] {
    return storage.db
      .prepare<[], MetricsRow>('SELECT period_start, period_end, total_check_ins FROM productivity_metrics ORDER BY id')
      .all();
  }

  describe('start', () => {
    it('should wait until a chat is configured', () => {
      expect(scheduler.start()).toBe(false);
      expect(scheduler.isRunning).toBe(false);
    });

    it('should run once a chat has check-ins enabled', () => {
      storage.checkIns.ensureUserConfig(1);

      expect(scheduler.start()).toBe(true);
      expect(scheduler.isRunning).toBe(true);

      scheduler.stop();
      expect(scheduler.isRunning).toBe(false);
    });
  });

  describe('runHourlyCheckIn', () => {
    it('should ask awake chats and record sleeping ones', async () => {
      storage.checkIns.ensureUserConfig(1);
      storage.checkIns.ensureUserConfig(2);
      storage.checkIns.markSleeping(2, tenAm - 120 * minute);
      storage.checkIns.ensureUserConfig(4);
      storage.checkIns.setCheckInsEnabled(4, false);

      await scheduler.runHourlyCheckIn(tenAm);

      expect(sender.messages.map((m) => [m.chatId, m.text])).toEqual([[1, checkInMessage]]);
      expect(checkInRows()).toEqual([
        { chat_id: 1, status: 'sent', retry_count: 0, scheduled_time: tenAm },
        { chat_id: 2, status: 'sleeping', retry_count: 0, scheduled_time: tenAm },
      ]);
    });

    it('should retry a busy chat after five minutes', async () => {
      jest.useFakeTimers();
      storage.checkIns.ensureUserConfig(3);
      busy.add(3);

      await scheduler.runHourlyCheckIn(tenAm);
      expect(sender.messages).toEqual([]);

      busy.delete(3);
      jest.advanceTimersByTime(5 * minute);

      expect(sender.messages.map((m) => m.chatId)).toEqual([3]);
      expect(checkInRows()).toMatchObject([{ chat_id: 3, status: 'sent', retry_count: 1 }]);
    });

    it('should record a missed check-in after three busy retries', async () => {
      jest.useFakeTimers();
      storage.checkIns.ensureUserConfig(3);
      busy.add(3);

      await scheduler.runHourlyCheckIn(tenAm);
      jest.advanceTimersByTime(25 * minute);

      expect(sender.messages).toEqual([]);
      expect(checkInRows()).toEqual([{ chat_id: 3, status: 'missed', retry_count: 3, scheduled_time: tenAm }]);
    });
  });

  describe('retryCheckIn', () => {
    it('should drop the retry when the chat went to sleep', async () => {
      storage.checkIns.ensureUserConfig(3);
      storage.checkIns.markSleeping(3, tenAm);

      await scheduler.retryCheckIn(3, 1, tenAm, tenAm + 5 * minute);

      expect(checkInRows()).toEqual([]);
    });

    it('should drop the retry when check-ins were turned off', async () => {
      storage.checkIns.ensureUserConfig(3);
      storage.checkIns.setCheckInsEnabled(3, false);

      await scheduler.retryCheckIn(3, 2, tenAm, tenAm + 15 * minute);

      expect(sender.messages).toEqual([]);
    });
  });

  it('should save the daily metrics', () => {
    scheduler.runDailyMetrics(new Date(2026, 0, 29, 23, 55));

    expect(metricsRows()).toEqual([{
      period_start: new Date(2026, 0, 29).getTime(),
      period_end: new Date(2026, 0, 29, 23, 59, 59, 999).getTime(),
      total_check_ins: 0,
    }]);
  });

  describe('in a configured timezone', () => {
    beforeEach(() => {
      setTimeZone('America/New_York');
    });

    afterEach(() => {
      setTimeZone(null);
    });

    it('should save the day ending in that timezone', () => {
      storage.checkIns.createCheckIn(1, Date.parse('2026-03-01T20:00:00Z'), 'completed');

      // 23:55 in New York is already the next day in UTC
      scheduler.runDailyMetrics(new Date('2026-03-02T04:55:00Z'));

      expect(metricsRows()).toEqual([{
        period_start: Date.parse('2026-03-01T05:00:00.000Z'),
        period_end: Date.parse('2026-03-02T04:59:59.999Z'),
        total_check_ins: 1,
      }]);
    });

    it('should date the weekly report by that timezone', async () => {
      storage.checkIns.ensureUserConfig(1);

      await scheduler.runWeeklyReport(new Date('2026-03-02T02:00:00Z'));

      expect(sender.messages[0]?.text).toContain('Week: 2026-02-23 → 2026-03-01');
    });
  });

  it('should clean up stale check-ins', () => {
    storage.checkIns.createCheckIn(1, tenAm - 120 * minute, 'sent');

    expect(scheduler.runCleanup(tenAm)).toBe(1);
  });

  it('should send the weekly report to every enabled chat and store it', async () => {
    storage.checkIns.ensureUserConfig(1);
    storage.checkIns.ensureUserConfig(2);

    await scheduler.runWeeklyReport(new Date(2026, 1, 1, 21, 0));

    const report = '📅 **Weekly Productivity Report**\nWeek: 2026-01-26 → 2026-02-01\n\nNo check-in data available for this week.';
    expect(sender.messages.map((m) => [m.chatId, m.text])).toEqual([[1, report], [2, report]]);
    expect(storage.db.prepare<[], { week_start: string }>('SELECT week_start FROM insights').all()).toEqual([
      { week_start: '2026-01-26' },
    ]);
    expect(model.prompts).toHaveLength(0);
  });
});
