import { Storage } from '../storage';
import { ProductivityReporter } from '../productivityReporter';
import type { ProductivityType } from '../types';

const at = (day: number, hours: number) => new Date(2026, 0, day, hours, 0).getTime();

describe('ProductivityReporter', () => {
  let storage: Storage;
  let reporter: ProductivityReporter;

  beforeEach(() => {
    storage = new Storage(':memory:');
    reporter = new ProductivityReporter(storage.checkIns, storage.insights);
  });

  afterEach(() => {
    storage.close();
  });

  function answered(time: number, type: ProductivityType, score: number | null, category: string | null): void {
    const checkInId = storage.checkIns.createCheckIn(42, time, 'sent');
    storage.checkIns.setCheckInStatus(checkInId, 'completed', time);
    storage.checkIns.insertActivityLog({
      timestamp: time,
      userResponse: 'did things',
      activitySummary: 'Things',
      productivityType: type,
      alignmentScore: score,
      matchedTodoId: null,
      category,
      reasoning: null,
      checkInId,
    }, time);
  }

  function seedThursday(): void {
    answered(at(29, 9), 'aligned', 8, 'Career');
    answered(at(29, 10), 'beneficial', 6, 'Career');
    answered(at(29, 11), 'wasted', 1, 'Entertainment');
    storage.checkIns.createCheckIn(42, at(29, 12), 'missed');
    const sleeping = storage.checkIns.createCheckIn(42, at(29, 3), 'sleeping');
    storage.checkIns.insertActivityLog({
      timestamp: at(29, 3),
      userResponse: null,
      activitySummary: 'Sleeping',
      productivityType: 'sleeping',
      alignmentScore: null,
      matchedTodoId: null,
      category: null,
      reasoning: null,
      checkInId: sleeping,
    }, at(29, 3));
  }

  const thursdayBody =
    '**Check-ins:** 3/5 responded (1 sleeping) (60%)\n\n' +
    '**Activity Breakdown:**\n' +
    '✅ Aligned (on todo list): 1 hours\n' +
    '💡 Beneficial (goal-aligned): 1 hours\n' +
    '⚠️ Wasted time: 1 hours\n\n' +
    '**Alignment Score:** 5.0/10\n' +
    '**Productivity Ratio:** 67%\n\n' +
    '**Time by Category:**\n' +
    '- Career: 2 hours\n' +
    '- Entertainment: 1 hour\n' +
    '\n⚠️ **Missed Check-ins:** 1\n';

  it('should aggregate a day of check-ins', () => {
    seedThursday();

    const stats = reporter.getDailyStats(new Date(2026, 0, 29));

    expect(stats).toMatchObject({
      totalCheckIns: 5,
      respondedCheckIns: 3,
      missedCheckIns: 1,
      sleepingCheckIns: 1,
      alignedActivities: 1,
      beneficialActivities: 1,
      wastedActivities: 1,
      avgAlignmentScore: 5,
    });
    expect(stats.productivityRatio).toBeCloseTo(66.67, 1);
  });

  it('should format the daily report', () => {
    seedThursday();

    expect(reporter.formatDailyReport(new Date(2026, 0, 29, 18, 0))).toBe(
      '📊 **Daily Productivity Report**\nDate: 2026-01-29\n\n' + thursdayBody,
    );
  });

  it('should say when a day has no data', () => {
    expect(reporter.formatDailyReport(new Date(2026, 0, 30))).toBe(
      '📊 **Daily Productivity Report**\nDate: 2026-01-30\n\n' +
        'No check-in data available for this day.\n' +
        'Check-ins will start automatically at the next hour.',
    );
  });

  it('should build the weekly report with a line per active day', () => {
    seedThursday();

    const report = reporter.buildWeeklyReport(new Date(2026, 1, 1));

    expect(report.weekStart).toBe('2026-01-26');
    expect(report.weekEnd).toBe('2026-02-01');
    expect(report.markdown).toBe(
      '📅 **Weekly Productivity Report**\nWeek: 2026-01-26 → 2026-02-01\n\n' +
        thursdayBody +
        '\n**By Day:**\n- Thu, Jan 29: 67% (3 responded)\n',
    );
  });

  it('should store generated weekly reports and daily metrics', () => {
    seedThursday();

    reporter.generateWeeklyReport(new Date(2026, 1, 1), 5000);
    const stats = reporter.saveDailyMetrics(new Date(2026, 0, 29), 6000);

    expect(stats?.totalCheckIns).toBe(5);
    const metrics = storage.db
      .prepare<[], { period_start: number; total_check_ins: number }>('SELECT period_start, total_check_ins FROM productivity_metrics')
      .all();
    expect(metrics).toEqual([{ period_start: new Date(2026, 0, 29).getTime(), total_check_ins: 5 }]);
    const row = storage.db
      .prepare<[], { week_end: string; created_at: number }>('SELECT week_end, created_at FROM insights')
      .get();
    expect(row).toEqual({ week_end: '2026-02-01', created_at: 5000 });
  });

  it('should leave the ratio empty without answers', () => {
    storage.checkIns.createCheckIn(42, at(29, 9), 'missed');

    expect(reporter.getStats(at(29, 0), at(29, 23))).toMatchObject({
      totalCheckIns: 1,
      respondedCheckIns: 0,
      avgAlignmentScore: null,
      productivityRatio: null,
    });
  });
});
