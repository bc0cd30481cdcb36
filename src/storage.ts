import Database from 'better-sqlite3';
import path from 'path';
import fs from 'fs';
import { TodoRepository } from './repositories/todoRepository';
import { CheckInRepository } from './repositories/checkInRepository';
import { InsightRepository } from './repositories/insightRepository';

export const requiredTables = [
  'todos',
  'patterns',
  'insights',
  'audit_logs',
  'user_config',
  'check_ins',
  'activity_logs',
  'productivity_metrics',
] as const;

export class Storage {
  readonly db: Database.Database;
  readonly todos: TodoRepository;
  readonly checkIns: CheckInRepository;
  readonly insights: InsightRepository;

  constructor(readonly dbPath: string) {
    if (dbPath !== ':memory:') {
      const dir = path.dirname(path.resolve(dbPath));
      if (!fs.existsSync(dir)) {
        fs.mkdirSync(dir, { recursive: true });
      }
      this.db = new Database(dbPath);
      this.db.pragma('journal_mode = WAL');
    } else {
      this.db = new Database(dbPath);
    }
    this.db.pragma('foreign_keys = ON');
    this.init();

    this.todos = new TodoRepository(this.db);
    this.checkIns = new CheckInRepository(this.db);
    this.insights = new InsightRepository(this.db);
  }

  private init() {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS todos (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        task TEXT NOT NULL,
        raw_input TEXT,
        category TEXT,
        priority TEXT,
        due_date TEXT,
        due_time TEXT,
        is_scheduled INTEGER DEFAULT 1,
        status TEXT DEFAULT 'Pending',
        user_clarification TEXT,
        reasoning TEXT,
        vault_links TEXT,
        recurrence TEXT,
        created_at INTEGER NOT NULL,
        completed_at INTEGER,
        updated_at INTEGER NOT NULL
      );

      CREATE TABLE IF NOT EXISTS patterns (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        pattern_type TEXT,
        pattern_data TEXT,
        confidence REAL,
        last_used INTEGER,
        usage_count INTEGER DEFAULT 1,
        created_at INTEGER NOT NULL
      );

      CREATE TABLE IF NOT EXISTS insights (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        week_start TEXT,
        week_end TEXT,
        report_markdown TEXT,
        metrics_json TEXT,
        created_at INTEGER NOT NULL
      );

      CREATE TABLE IF NOT EXISTS audit_logs (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        event_type TEXT,
        details TEXT,
        timestamp INTEGER NOT NULL
      );

      CREATE TABLE IF NOT EXISTS user_config (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        chat_id INTEGER UNIQUE NOT NULL,
        check_ins_enabled INTEGER DEFAULT 1,
        is_sleeping INTEGER DEFAULT 0,
        sleep_start_time INTEGER,
        default_wake_time TEXT DEFAULT '08:00',
        last_wake_time INTEGER,
        created_at INTEGER NOT NULL,
        updated_at INTEGER NOT NULL
      );

      CREATE TABLE IF NOT EXISTS check_ins (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        chat_id INTEGER,
        scheduled_time INTEGER NOT NULL,
        sent_time INTEGER,
        response_time INTEGER,
        status TEXT DEFAULT 'pending',
        retry_count INTEGER DEFAULT 0,
        created_at INTEGER NOT NULL
      );

      CREATE TABLE IF NOT EXISTS activity_logs (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        timestamp INTEGER NOT NULL,
        user_response TEXT,
        activity_summary TEXT,
        productivity_type TEXT,
        alignment_score INTEGER,
        matched_todo_id INTEGER,
        category TEXT,
        reasoning TEXT,
        check_in_id INTEGER,
        created_at INTEGER NOT NULL,
        FOREIGN KEY (matched_todo_id) REFERENCES todos(id) ON DELETE SET NULL,
        FOREIGN KEY (check_in_id) REFERENCES check_ins(id) ON DELETE SET NULL
      );

      CREATE TABLE IF NOT EXISTS productivity_metrics (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        period_start INTEGER NOT NULL,
        period_end INTEGER NOT NULL,
        period_type TEXT,
        total_check_ins INTEGER DEFAULT 0,
        responded_check_ins INTEGER DEFAULT 0,
        missed_check_ins INTEGER DEFAULT 0,
        sleeping_check_ins INTEGER DEFAULT 0,
        aligned_activities INTEGER DEFAULT 0,
        beneficial_activities INTEGER DEFAULT 0,
        wasted_activities INTEGER DEFAULT 0,
        avg_alignment_score REAL,
        productivity_ratio REAL,
        metrics_json TEXT,
        created_at INTEGER NOT NULL
      );
    `);

    this.addMissingColumns('todos', {
      due_time: 'TEXT',
      is_scheduled: 'INTEGER DEFAULT 1',
      recurrence: 'TEXT',
    });
    this.addMissingColumns('check_ins', {
      chat_id: 'INTEGER',
    });

    this.db.exec(`
      CREATE INDEX IF NOT EXISTS idx_activity_timestamp ON activity_logs(timestamp);
      CREATE INDEX IF NOT EXISTS idx_activity_type ON activity_logs(productivity_type);
      CREATE INDEX IF NOT EXISTS idx_checkin_scheduled ON check_ins(scheduled_time);
      CREATE INDEX IF NOT EXISTS idx_checkin_status ON check_ins(status);
    `);
  }

  /** Brings databases created by older releases up to the current columns */
  private addMissingColumns(table: string, columns: Record<string, string>): void {
    const existing = new Set(this.listColumns(table));
    for (const [name, definition] of Object.entries(columns)) {
      if (!existing.has(name)) {
        this.db.exec(`ALTER TABLE ${table} ADD COLUMN ${name} ${definition}`);
        console.log(`[Storage] Migration: added '${name}' column to ${table}`);
      }
    }
  }

  listTables(): string[] {
    return this.db
      .prepare<[], { name: string }>(
        "SELECT name FROM sqlite_master WHERE type = 'table' AND name NOT LIKE 'sqlite_%' ORDER BY name"
      )
      .all()
      .map((row) => row.name);
  }

  listColumns(table: string): string[] {
    return this.db
      .prepare<[], { name: string }>(`PRAGMA table_info(${table})`)
      .all()
      .map((row) => row.name);
  }

  /**
   * @description Empties the task-side tables and resets autoincrement counters.
   * Check-in history is left in place.
   */
  clearTaskData(): Record<string, number> {
    const cleared: Record<string, number> = {};
    const clear = this.db.transaction(() => {
      for (const table of ['todos', 'audit_logs', 'patterns', 'insights']) {
        cleared[table] = this.db.prepare(`DELETE FROM ${table}`).run().changes;
      }
      const sequence = this.db
        .prepare<[], { name: string }>("SELECT name FROM sqlite_master WHERE name = 'sqlite_sequence'")
        .get();
      if (sequence) {
        this.db.prepare("DELETE FROM sqlite_sequence WHERE name IN ('todos', 'audit_logs', 'patterns', 'insights')").run();
      }
    });
    clear();
    return cleared;
  }

  close() {
    this.db.close();
  }
}
