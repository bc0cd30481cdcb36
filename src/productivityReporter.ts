import type { ProductivityStats } from './types';
import type { CheckInRepository, CountRow } from './repositories/checkInRepository';
import type { InsightRepository } from './repositories/insightRepository';
import { addDays, endOfDay, errorMessage, formatShortDate, startOfDay, toIsoDate } from './utils';

export const emptyStats: ProductivityStats = {
  totalCheckIns: 0,
  respondedCheckIns: 0,
  missedCheckIns: 0,
  sleepingCheckIns: 0,
  alignedActivities: 0,
  beneficialActivities: 0,
  wastedActivities: 0,
  avgAlignmentScore: null,
  productivityRatio: null,
};

export interface WeeklyReport {
  weekStart: string;
  weekEnd: string;
  markdown: string;
  stats: ProductivityStats;
}

function countOf(rows: CountRow[], key: string): number {
  return rows.find((row) => row.key === key)?.count ?? 0;
}

function plural(count: number, word: string): string {
  return `${count} ${word}${count === 1 ? '' : 's'}`;
}

/**
 * @description Aggregates check-ins and activity logs into daily and weekly
 * productivity reports (Telegram Markdown).
 */
export class ProductivityReporter {
  constructor(
    private readonly checkIns: CheckInRepository,
    private readonly insights: InsightRepository,
  ) {}

  getStats(from: number, to: number): ProductivityStats {
    const statuses = this.checkIns.countCheckInsByStatus(from, to);
    const activities = this.checkIns.countActivitiesByType(from, to);

    const responded = countOf(statuses, 'completed');
    const aligned = countOf(activities, 'aligned');
    const beneficial = countOf(activities, 'beneficial');

    return {
      totalCheckIns: statuses.reduce((sum, row) => sum + row.count, 0),
      respondedCheckIns: responded,
      missedCheckIns: countOf(statuses, 'missed'),
      sleepingCheckIns: countOf(statuses, 'sleeping'),
      alignedActivities: aligned,
      beneficialActivities: beneficial,
      wastedActivities: countOf(activities, 'wasted'),
      avgAlignmentScore: this.checkIns.averageAlignmentScore(from, to),
      productivityRatio: responded > 0 ? ((aligned + beneficial) / responded) * 100 : null,
    };
  }

  getDailyStats(day: Date): ProductivityStats {
    try {
      return this.getStats(startOfDay(day).getTime(), endOfDay(day).getTime());
    } catch (err) {
      console.error('[Report] Failed to get daily stats:', errorMessage(err));
      return { ...emptyStats };
    }
  }

  formatDailyReport(day = new Date()): string {
    const header = `📊 **Daily Productivity Report**\nDate: ${toIsoDate(day)}\n\n`;
    try {
      const stats = this.getDailyStats(day);
      if (stats.totalCheckIns === 0) {
        return header +
          'No check-in data available for this day.\n' +
          'Check-ins will start automatically at the next hour.';
      }

      const categories = this.checkIns.categoryBreakdown(startOfDay(day).getTime(), endOfDay(day).getTime());
      return header + this.formatStatsBody(stats, categories);
    } catch (err) {
      console.error('[Report] Failed to generate daily report:', errorMessage(err));
      return '❌ Failed to generate report. Please try again.';
    }
  }

  saveDailyMetrics(day = new Date(), now = Date.now()): ProductivityStats | null {
    try {
      const stats = this.getDailyStats(day);
      this.insights.upsertDailyMetrics(startOfDay(day).getTime(), endOfDay(day).getTime(), stats, now);
      console.log(`[Report] Daily metrics saved for ${toIsoDate(day)}`);
      return stats;
    } catch (err) {
      console.error('[Report] Failed to save daily metrics:', errorMessage(err));
      return null;
    }
  }

  /** Seven days ending with `endDay` */
  buildWeeklyReport(endDay = new Date()): WeeklyReport {
    const firstDay = addDays(endDay, -6);
    const from = startOfDay(firstDay).getTime();
    const to = endOfDay(endDay).getTime();
    const weekStart = toIsoDate(firstDay);
    const weekEnd = toIsoDate(endDay);

    const stats = this.getStats(from, to);
    let markdown = `📅 **Weekly Productivity Report**\nWeek: ${weekStart} → ${weekEnd}\n\n`;

    if (stats.totalCheckIns === 0) {
      markdown += 'No check-in data available for this week.';
      return { weekStart, weekEnd, markdown, stats };
    }

    markdown += this.formatStatsBody(stats, this.checkIns.categoryBreakdown(from, to));

    const dailyLines: string[] = [];
    for (let offset = 0; offset < 7; offset++) {
      const day = addDays(firstDay, offset);
      const dayStats = this.getDailyStats(day);
      if (dayStats.respondedCheckIns === 0) continue;
      const ratio = dayStats.productivityRatio === null ? '—' : `${dayStats.productivityRatio.toFixed(0)}%`;
      dailyLines.push(`- ${formatShortDate(day)}: ${ratio} (${dayStats.respondedCheckIns} responded)`);
    }
    if (dailyLines.length > 0) {
      markdown += `\n**By Day:**\n${dailyLines.join('\n')}\n`;
    }

    return { weekStart, weekEnd, markdown, stats };
  }

  /** Builds the weekly report and stores it as an insight */
  generateWeeklyReport(endDay = new Date(), now = Date.now()): WeeklyReport {
    const report = this.buildWeeklyReport(endDay);
    this.insights.saveWeeklyInsight({
      weekStart: report.weekStart,
      weekEnd: report.weekEnd,
      reportMarkdown: report.markdown,
      metrics: report.stats,
    }, now);
    console.log(`[Report] Weekly insight saved for ${report.weekStart} → ${report.weekEnd}`);
    return report;
  }

  private formatStatsBody(stats: ProductivityStats, categories: CountRow[]): string {
    const responseRate = stats.totalCheckIns > 0 ? (stats.respondedCheckIns / stats.totalCheckIns) * 100 : 0;

    let body = `**Check-ins:** ${stats.respondedCheckIns}/${stats.totalCheckIns} responded`;
    if (stats.sleepingCheckIns > 0) {
      body += ` (${stats.sleepingCheckIns} sleeping)`;
    }
    body += ` (${responseRate.toFixed(0)}%)\n\n`;

    if (stats.respondedCheckIns > 0) {
      body += '**Activity Breakdown:**\n';
      body += `✅ Aligned (on todo list): ${stats.alignedActivities} hours\n`;
      body += `💡 Beneficial (goal-aligned): ${stats.beneficialActivities} hours\n`;
      body += `⚠️ Wasted time: ${stats.wastedActivities} hours\n\n`;

      if (stats.avgAlignmentScore !== null) {
        body += `**Alignment Score:** ${stats.avgAlignmentScore.toFixed(1)}/10\n`;
      }
      if (stats.productivityRatio !== null) {
        body += `**Productivity Ratio:** ${stats.productivityRatio.toFixed(0)}%\n\n`;
      }
      if (categories.length > 0) {
        body += '**Time by Category:**\n';
        body += categories.map((row) => `- ${row.key}: ${plural(row.count, 'hour')}`).join('\n') + '\n';
      }
    }

    if (stats.missedCheckIns > 0) {
      body += `\n⚠️ **Missed Check-ins:** ${stats.missedCheckIns}\n`;
    }
    return body;
  }
}
