import type Database from 'better-sqlite3';
import type { Priority, Todo, TodoStatus } from '../types';

interface TodoRow {
  id: number;
  task: string;
  raw_input: string | null;
  category: string | null;
  priority: string | null;
  due_date: string | null;
  due_time: string | null;
  is_scheduled: number | null;
  status: string | null;
  reasoning: string | null;
  recurrence: string | null;
  created_at: number;
  completed_at: number | null;
  updated_at: number;
}

export interface TodoInput {
  task: string;
  rawInput: string;
  category: string | null;
  priority: Priority | null;
  dueDate: string | null;
  dueTime: string | null;
  isScheduled: boolean;
  reasoning: string | null;
  recurrence: string | null;
}

/** Columns that may be edited directly with `field=value` */
export type EditableTodoField = 'task' | 'category' | 'priority' | 'due_date' | 'due_time' | 'reasoning';

export const editableTodoFields: readonly EditableTodoField[] = [
  'task', 'category', 'priority', 'due_date', 'due_time', 'reasoning',
];

function toPriority(value: string | null): Priority | null {
  return value === 'HIGH' || value === 'MEDIUM' || value === 'LOW' ? value : null;
}

function toStatus(value: string | null): TodoStatus {
  return value === 'Completed' ? 'Completed' : 'Pending';
}

function mapTodo(row: TodoRow): Todo {
  return {
    id: row.id,
    task: row.task,
    rawInput: row.raw_input,
    category: row.category,
    priority: toPriority(row.priority),
    dueDate: row.due_date,
    dueTime: row.due_time,
    isScheduled: row.is_scheduled !== 0,
    status: toStatus(row.status),
    reasoning: row.reasoning,
    recurrence: row.recurrence,
    createdAt: row.created_at,
    completedAt: row.completed_at,
    updatedAt: row.updated_at,
  };
}

const todoColumns = `id, task, raw_input, category, priority, due_date, due_time, is_scheduled,
  status, reasoning, recurrence, created_at, completed_at, updated_at`;

export class TodoRepository {
  constructor(private readonly db: Database.Database) {}

  create(input: TodoInput, now = Date.now()): number {
    const result = this.db.prepare(`
      INSERT INTO todos
      (task, raw_input, category, priority, due_date, due_time, is_scheduled, reasoning, status, recurrence, created_at, updated_at)
      VALUES (?, ?, ?, ?, ?, ?, ?, ?, 'Pending', ?, ?, ?)
    `).run(
      input.task,
      input.rawInput,
      input.category,
      input.priority,
      input.dueDate,
      input.dueTime,
      input.isScheduled ? 1 : 0,
      input.reasoning,
      input.recurrence,
      now,
      now,
    );
    return Number(result.lastInsertRowid);
  }

  /** Overwrites a task with a fresh triage; the task becomes Pending again */
  replace(id: number, input: TodoInput, now = Date.now()): boolean {
    const result = this.db.prepare(`
      UPDATE todos
      SET task = ?, raw_input = ?, category = ?, priority = ?, due_date = ?, due_time = ?,
          is_scheduled = ?, reasoning = ?, recurrence = ?, status = 'Pending', updated_at = ?
      WHERE id = ?
    `).run(
      input.task,
      input.rawInput,
      input.category,
      input.priority,
      input.dueDate,
      input.dueTime,
      input.isScheduled ? 1 : 0,
      input.reasoning,
      input.recurrence,
      now,
      id,
    );
    return result.changes > 0;
  }

  get(id: number): Todo | null {
    const row = this.db
      .prepare<[number], TodoRow>(`SELECT ${todoColumns} FROM todos WHERE id = ?`)
      .get(id);
    return row ? mapTodo(row) : null;
  }

  searchPending(term: string, limit = 5): Todo[] {
    return this.db
      .prepare<[string, number], TodoRow>(`
        SELECT ${todoColumns} FROM todos
        WHERE status = 'Pending' AND task LIKE ?
        ORDER BY created_at DESC, id DESC
        LIMIT ?
      `)
      .all(`%${term}%`, limit)
      .map(mapTodo);
  }

  listPending(): Todo[] {
    return this.db
      .prepare<[], TodoRow>(`
        SELECT ${todoColumns} FROM todos
        WHERE status = 'Pending'
        ORDER BY created_at DESC, id DESC
      `)
      .all()
      .map(mapTodo);
  }

  listRecentlyCompleted(limit = 10): Todo[] {
    return this.db
      .prepare<[number], TodoRow>(`
        SELECT ${todoColumns} FROM todos
        WHERE status = 'Completed'
        ORDER BY completed_at DESC, id DESC
        LIMIT ?
      `)
      .all(limit)
      .map(mapTodo);
  }

  listUnscheduled(): Todo[] {
    return this.db
      .prepare<[], TodoRow>(`
        SELECT ${todoColumns} FROM todos
        WHERE is_scheduled = 0 AND status = 'Pending'
        ORDER BY created_at DESC, id DESC
      `)
      .all()
      .map(mapTodo);
  }

  listRecent(limit = 10): Todo[] {
    return this.db
      .prepare<[number], TodoRow>(`
        SELECT ${todoColumns} FROM todos
        ORDER BY created_at DESC, id DESC
        LIMIT ?
      `)
      .all(limit)
      .map(mapTodo);
  }

  /** Pending HIGH and MEDIUM tasks, HIGH first, then by earliest due date */
  listOpenGoalTodos(limit = 20): Todo[] {
    return this.db
      .prepare<[number], TodoRow>(`
        SELECT ${todoColumns} FROM todos
        WHERE status = 'Pending' AND priority IN ('HIGH', 'MEDIUM')
        ORDER BY CASE priority WHEN 'HIGH' THEN 0 ELSE 1 END,
                 due_date IS NULL, due_date ASC, id ASC
        LIMIT ?
      `)
      .all(limit)
      .map(mapTodo);
  }

  markUnscheduled(id: number, now = Date.now()): boolean {
    const result = this.db.prepare(`
      UPDATE todos SET is_scheduled = 0, due_date = NULL, due_time = NULL, updated_at = ?
      WHERE id = ?
    `).run(now, id);
    return result.changes > 0;
  }

  schedule(id: number, dueDate: string, dueTime: string | null, now = Date.now()): boolean {
    const result = this.db.prepare(`
      UPDATE todos SET due_date = ?, due_time = ?, is_scheduled = 1, updated_at = ?
      WHERE id = ?
    `).run(dueDate, dueTime, now, id);
    return result.changes > 0;
  }

  complete(id: number, completedAt: number, now = Date.now()): boolean {
    const result = this.db.prepare(`
      UPDATE todos SET status = 'Completed', completed_at = ?, updated_at = ?
      WHERE id = ?
    `).run(completedAt, now, id);
    return result.changes > 0;
  }

  updateFields(id: number, fields: Partial<Record<EditableTodoField, string | null>>, now = Date.now()): boolean {
    const entries = editableTodoFields
      .filter((field) => fields[field] !== undefined)
      .map((field) => [field, fields[field] ?? null] as const);
    if (entries.length === 0) return false;

    const assignments = entries.map(([field]) => `${field} = ?`).join(', ');
    const values = entries.map(([, value]) => value);
    const result = this.db
      .prepare(`UPDATE todos SET ${assignments}, updated_at = ? WHERE id = ?`)
      .run(...values, now, id);
    return result.changes > 0;
  }
}
