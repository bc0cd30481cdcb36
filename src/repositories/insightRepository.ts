import type Database from 'better-sqlite3';
import type { ProductivityStats } from '../types';

export interface AuditEntry {
  eventType: string;
  details: string;
  timestamp: number;
}

export interface WeeklyInsightInput {
  weekStart: string;
  weekEnd: string;
  reportMarkdown: string;
  metrics: ProductivityStats;
}

export class InsightRepository {
  constructor(private readonly db: Database.Database) {}

  // ═══════════════════════════════════════════
  //  Audit log
  // ═══════════════════════════════════════════

  logAudit(eventType: string, details: string, now = Date.now()): void {
    try {
      this.db
        .prepare('INSERT INTO audit_logs (event_type, details, timestamp) VALUES (?, ?, ?)')
        .run(eventType, details, now);
    } catch (err) {
      console.error('[Storage] Failed to log audit event:', err);
    }
  }

  /** Newest first */
  listAudit(eventType: string, limit = 20): AuditEntry[] {
    return this.db
      .prepare<[string, number], { event_type: string; details: string; timestamp: number }>(`
        SELECT event_type, details, timestamp FROM audit_logs
        WHERE event_type = ?
        ORDER BY timestamp DESC, id DESC
        LIMIT ?
      `)
      .all(eventType, limit)
      .map((row) => ({ eventType: row.event_type, details: row.details, timestamp: row.timestamp }));
  }

  // ═══════════════════════════════════════════
  //  Learned patterns
  // ═══════════════════════════════════════════

  listActivePatterns(minConfidence = 0.7): string[] {
    return this.db
      .prepare<[number], { pattern_data: string }>(`
        SELECT pattern_data FROM patterns
        WHERE confidence > ? AND pattern_data IS NOT NULL
        ORDER BY id
      `)
      .all(minConfidence)
      .map((row) => row.pattern_data);
  }

  /**
   * @description Stores a pattern. Identical text already on file only gets
   * its usage count and last-used time bumped.
   */
  savePattern(patternType: string, patternData: string, confidence: number, now = Date.now()): void {
    const existing = this.db
      .prepare<[string, string], { id: number }>('SELECT id FROM patterns WHERE pattern_type = ? AND pattern_data = ?')
      .get(patternType, patternData);

    if (existing) {
      this.db
        .prepare('UPDATE patterns SET usage_count = usage_count + 1, last_used = ? WHERE id = ?')
        .run(now, existing.id);
      return;
    }

    this.db.prepare(`
      INSERT INTO patterns (pattern_type, pattern_data, confidence, last_used, usage_count, created_at)
      VALUES (?, ?, ?, ?, 1, ?)
    `).run(patternType, patternData, confidence, now, now);
  }

  // ═══════════════════════════════════════════
  //  Aggregates
  // ═══════════════════════════════════════════

  upsertDailyMetrics(periodStart: number, periodEnd: number, stats: ProductivityStats, now = Date.now()): void {
    const values = [
      stats.totalCheckIns,
      stats.respondedCheckIns,
      stats.missedCheckIns,
      stats.sleepingCheckIns,
      stats.alignedActivities,
      stats.beneficialActivities,
      stats.wastedActivities,
      stats.avgAlignmentScore,
      stats.productivityRatio,
      JSON.stringify(stats),
    ];

    const existing = this.db
      .prepare<[number], { id: number }>("SELECT id FROM productivity_metrics WHERE period_start = ? AND period_type = 'daily'")
      .get(periodStart);

    if (existing) {
      this.db.prepare(`
        UPDATE productivity_metrics
        SET total_check_ins = ?, responded_check_ins = ?, missed_check_ins = ?, sleeping_check_ins = ?,
            aligned_activities = ?, beneficial_activities = ?, wasted_activities = ?,
            avg_alignment_score = ?, productivity_ratio = ?, metrics_json = ?
        WHERE id = ?
      `).run(...values, existing.id);
      return;
    }

    this.db.prepare(`
      INSERT INTO productivity_metrics
      (period_start, period_end, period_type,
       total_check_ins, responded_check_ins, missed_check_ins, sleeping_check_ins,
       aligned_activities, beneficial_activities, wasted_activities,
       avg_alignment_score, productivity_ratio, metrics_json, created_at)
      VALUES (?, ?, 'daily', ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
    `).run(periodStart, periodEnd, ...values, now);
  }

  saveWeeklyInsight(input: WeeklyInsightInput, now = Date.now()): number {
    const result = this.db.prepare(`
      INSERT INTO insights (week_start, week_end, report_markdown, metrics_json, created_at)
      VALUES (?, ?, ?, ?, ?)
    `).run(input.weekStart, input.weekEnd, input.reportMarkdown, JSON.stringify(input.metrics), now);
    return Number(result.lastInsertRowid);
  }
}
