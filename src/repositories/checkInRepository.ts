import type Database from 'better-sqlite3';
import type { CheckIn, CheckInStatus, ProductivityType, UserConfig } from '../types';

interface UserConfigRow {
  chat_id: number;
  check_ins_enabled: number;
  is_sleeping: number;
  sleep_start_time: number | null;
  default_wake_time: string | null;
  last_wake_time: number | null;
  created_at: number;
  updated_at: number;
}

interface CheckInRow {
  id: number;
  chat_id: number | null;
  scheduled_time: number;
  sent_time: number | null;
  response_time: number | null;
  status: CheckInStatus;
  retry_count: number | null;
}

export interface ActivityLogInput {
  timestamp: number;
  userResponse: string | null;
  activitySummary: string;
  productivityType: ProductivityType;
  alignmentScore: number | null;
  matchedTodoId: number | null;
  category: string | null;
  reasoning: string | null;
  checkInId: number | null;
}

export interface CountRow {
  key: string;
  count: number;
}

function mapUserConfig(row: UserConfigRow): UserConfig {
  return {
    chatId: row.chat_id,
    checkInsEnabled: row.check_ins_enabled === 1,
    isSleeping: row.is_sleeping === 1,
    sleepStartTime: row.sleep_start_time,
    defaultWakeTime: row.default_wake_time || '08:00',
    lastWakeTime: row.last_wake_time,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

function mapCheckIn(row: CheckInRow): CheckIn {
  return {
    id: row.id,
    chatId: row.chat_id ?? 0,
    scheduledTime: row.scheduled_time,
    sentTime: row.sent_time,
    responseTime: row.response_time,
    status: row.status,
    retryCount: row.retry_count ?? 0,
  };
}

const checkInColumns = 'id, chat_id, scheduled_time, sent_time, response_time, status, retry_count';

export class CheckInRepository {
  constructor(private readonly db: Database.Database) {}

  // ═══════════════════════════════════════════
  //  User config
  // ═══════════════════════════════════════════

  /** Returns true when the chat was registered by this call */
  ensureUserConfig(chatId: number, now = Date.now()): boolean {
    const result = this.db.prepare(`
      INSERT OR IGNORE INTO user_config (chat_id, check_ins_enabled, created_at, updated_at)
      VALUES (?, 1, ?, ?)
    `).run(chatId, now, now);
    return result.changes > 0;
  }

  getUserConfig(chatId: number): UserConfig | null {
    const row = this.db
      .prepare<[number], UserConfigRow>('SELECT * FROM user_config WHERE chat_id = ?')
      .get(chatId);
    return row ? mapUserConfig(row) : null;
  }

  listEnabledChats(): number[] {
    return this.db
      .prepare<[], { chat_id: number }>('SELECT chat_id FROM user_config WHERE check_ins_enabled = 1 ORDER BY id')
      .all()
      .map((row) => row.chat_id);
  }

  setCheckInsEnabled(chatId: number, enabled: boolean, now = Date.now()): boolean {
    const result = this.db
      .prepare('UPDATE user_config SET check_ins_enabled = ?, updated_at = ? WHERE chat_id = ?')
      .run(enabled ? 1 : 0, now, chatId);
    return result.changes > 0;
  }

  setDefaultWakeTime(chatId: number, wakeTime: string, now = Date.now()): boolean {
    const result = this.db
      .prepare('UPDATE user_config SET default_wake_time = ?, updated_at = ? WHERE chat_id = ?')
      .run(wakeTime, now, chatId);
    return result.changes > 0;
  }

  markSleeping(chatId: number, at: number): boolean {
    const result = this.db
      .prepare('UPDATE user_config SET is_sleeping = 1, sleep_start_time = ?, updated_at = ? WHERE chat_id = ?')
      .run(at, at, chatId);
    return result.changes > 0;
  }

  markAwake(chatId: number, at: number): boolean {
    const result = this.db
      .prepare('UPDATE user_config SET is_sleeping = 0, last_wake_time = ?, updated_at = ? WHERE chat_id = ?')
      .run(at, at, chatId);
    return result.changes > 0;
  }

  // ═══════════════════════════════════════════
  //  Check-ins
  // ═══════════════════════════════════════════

  createCheckIn(chatId: number, scheduledTime: number, status: CheckInStatus, retryCount = 0): number {
    const sentTime = status === 'sent' ? scheduledTime : null;
    const result = this.db.prepare(`
      INSERT INTO check_ins (chat_id, scheduled_time, sent_time, status, retry_count, created_at)
      VALUES (?, ?, ?, ?, ?, ?)
    `).run(chatId, scheduledTime, sentTime, status, retryCount, scheduledTime);
    return Number(result.lastInsertRowid);
  }

  getCheckIn(id: number): CheckIn | null {
    const row = this.db
      .prepare<[number], CheckInRow>(`SELECT ${checkInColumns} FROM check_ins WHERE id = ?`)
      .get(id);
    return row ? mapCheckIn(row) : null;
  }

  getLatestSentCheckIn(chatId: number): CheckIn | null {
    const row = this.db
      .prepare<[number], CheckInRow>(`
        SELECT ${checkInColumns} FROM check_ins
        WHERE status = 'sent' AND chat_id = ?
        ORDER BY sent_time DESC, id DESC
        LIMIT 1
      `)
      .get(chatId);
    return row ? mapCheckIn(row) : null;
  }

  setCheckInStatus(id: number, status: CheckInStatus, responseTime: number | null = null): void {
    this.db
      .prepare('UPDATE check_ins SET status = ?, response_time = COALESCE(?, response_time) WHERE id = ?')
      .run(status, responseTime, id);
  }

  /** Marks sent check-ins older than the threshold as missed; returns how many */
  markStaleAsMissed(threshold: number): number {
    return this.db
      .prepare("UPDATE check_ins SET status = 'missed' WHERE status = 'sent' AND sent_time < ?")
      .run(threshold).changes;
  }

  /**
   * @description Turns missed, pending and unanswered check-ins in [from, to] into
   * sleeping ones. Returns every sleeping check-in in the range.
   */
  markRangeAsSleeping(chatId: number, from: number, to: number): CheckIn[] {
    this.db.prepare(`
      UPDATE check_ins SET status = 'sleeping'
      WHERE chat_id = ? AND scheduled_time >= ? AND scheduled_time <= ?
        AND status IN ('missed', 'pending', 'sent')
    `).run(chatId, from, to);

    return this.db
      .prepare<[number, number, number], CheckInRow>(`
        SELECT ${checkInColumns} FROM check_ins
        WHERE chat_id = ? AND status = 'sleeping' AND scheduled_time >= ? AND scheduled_time <= ?
        ORDER BY scheduled_time
      `)
      .all(chatId, from, to)
      .map(mapCheckIn);
  }

  // ═══════════════════════════════════════════
  //  Activity logs
  // ═══════════════════════════════════════════

  insertActivityLog(input: ActivityLogInput, now = Date.now()): number {
    const result = this.db.prepare(`
      INSERT INTO activity_logs
      (timestamp, user_response, activity_summary, productivity_type, alignment_score,
       matched_todo_id, category, reasoning, check_in_id, created_at)
      VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
    `).run(
      input.timestamp,
      input.userResponse,
      input.activitySummary,
      input.productivityType,
      input.alignmentScore,
      input.matchedTodoId,
      input.category,
      input.reasoning,
      input.checkInId,
      now,
    );
    return Number(result.lastInsertRowid);
  }

  checkHasActivityLog(checkInId: number): boolean {
    const row = this.db
      .prepare<[number], { id: number }>('SELECT id FROM activity_logs WHERE check_in_id = ? LIMIT 1')
      .get(checkInId);
    return row !== undefined;
  }

  // ═══════════════════════════════════════════
  //  Statistics over [from, to]
  // ═══════════════════════════════════════════

  countCheckInsByStatus(from: number, to: number): CountRow[] {
    return this.db
      .prepare<[number, number], CountRow>(`
        SELECT status AS key, COUNT(*) AS count FROM check_ins
        WHERE scheduled_time >= ? AND scheduled_time <= ?
        GROUP BY status
      `)
      .all(from, to);
  }

  countActivitiesByType(from: number, to: number): CountRow[] {
    return this.db
      .prepare<[number, number], CountRow>(`
        SELECT productivity_type AS key, COUNT(*) AS count FROM activity_logs
        WHERE timestamp >= ? AND timestamp <= ?
        GROUP BY productivity_type
      `)
      .all(from, to);
  }

  averageAlignmentScore(from: number, to: number): number | null {
    const row = this.db
      .prepare<[number, number], { avg: number | null }>(`
        SELECT AVG(alignment_score) AS avg FROM activity_logs
        WHERE timestamp >= ? AND timestamp <= ? AND productivity_type != 'sleeping'
      `)
      .get(from, to);
    return row?.avg ?? null;
  }

  /** Activity count per category, most frequent first; sleeping excluded */
  categoryBreakdown(from: number, to: number): CountRow[] {
    return this.db
      .prepare<[number, number], CountRow>(`
        SELECT category AS key, COUNT(*) AS count FROM activity_logs
        WHERE timestamp >= ? AND timestamp <= ?
          AND category IS NOT NULL AND productivity_type != 'sleeping'
        GROUP BY category
        ORDER BY COUNT(*) DESC, category ASC
      `)
      .all(from, to);
  }
}
