import type { Todo, TriageResult } from './types';
import { editableTodoFields, type EditableTodoField, type TodoInput, type TodoRepository } from './repositories/todoRepository';
import type { InsightRepository } from './repositories/insightRepository';
import type { TriageEngine } from './triageEngine';
import type { PatternManager } from './patternManager';
import type { VaultWriter } from './vault/vaultWriter';
import type { MediaAttachment } from './llm/languageModel';
import { addDays, addMonths, atClockTime, errorMessage, getWeekday, normalizeClockTime, parseIsoDate, toIsoDate } from './utils';

export const schedulingQuestion =
  "When would you like to complete this? Give me a date (e.g., 'Friday'), date+time (e.g., 'tomorrow at 3pm'), or say 'unscheduled' to add to backlog.";

const unscheduledKeywords = [
  'unscheduled', 'no date', 'backlog', 'no deadline', 'add to backlog',
  'put in backlog', 'skip scheduling', "don't schedule", 'no due date',
];

const weekdayAbbreviations = ['sun', 'mon', 'tue', 'wed', 'thu', 'fri', 'sat'];

export interface ProcessTaskOptions {
  /** Re-triage an existing task instead of creating one */
  updateId?: number;
  now?: Date;
  attachments?: MediaAttachment[];
}

export interface ProcessTaskOutcome {
  todoId: number;
  isUpdate: boolean;
  triage: TriageResult;
  isScheduled: boolean;
  synced: boolean;
  /** Pushback on a LOW task: the user may still push it to the vault */
  offerForceSync: boolean;
}

export type ClarificationOutcome =
  | { kind: 'unscheduled'; todoId: number }
  | { kind: 'retriaged'; outcome: ProcessTaskOutcome }
  | { kind: 'notFound'; todoId: number };

export type EditOutcome =
  | { kind: 'fields'; todo: Todo; changes: Array<[EditableTodoField, string]> }
  | { kind: 'retriaged'; outcome: ProcessTaskOutcome }
  | { kind: 'invalid'; message: string }
  | { kind: 'notFound'; todoId: number };

export type ScheduleOutcome =
  | { kind: 'scheduled'; todo: Todo }
  | { kind: 'unparseable' }
  | { kind: 'notFound'; todoId: number };

export interface RecurringTask {
  todoId: number;
  dueDate: string;
}

export interface CompletionOutcome {
  todo: Todo;
  next: RecurringTask | null;
}

export function checkIsUnscheduledReply(reply: string): boolean {
  const text = reply.toLowerCase().trim();
  const wordCount = text.split(/\s+/).filter(Boolean).length;
  return wordCount <= 5 && unscheduledKeywords.some((keyword) => text.includes(keyword));
}

/**
 * @description Next due date for a recurring task completed on `from`.
 * Understands `daily`, `every day`, `every N days`, `weekly`,
 * `weekly:Mon,Wed` and `monthly`; anything else does not recur.
 */
export function getNextRecurrenceDate(recurrence: string, from: Date): Date | null {
  const rule = recurrence.toLowerCase().trim();

  const everyN = /every\s+(\d+)\s+days?/.exec(rule);
  if (everyN) {
    const days = Number(everyN[1]);
    return days > 0 ? addDays(from, days) : null;
  }

  if (rule.includes('daily') || rule.includes('every day')) {
    return addDays(from, 1);
  }

  const weeklyOn = /weekly\s*:\s*(.+)$/.exec(rule);
  if (weeklyOn) {
    const wanted = new Set(
      weeklyOn[1]
        .split(',')
        .map((day) => weekdayAbbreviations.indexOf(day.trim().slice(0, 3)))
        .filter((index) => index >= 0),
    );
    if (wanted.size > 0) {
      for (let offset = 1; offset <= 7; offset++) {
        const candidate = addDays(from, offset);
        if (wanted.has(getWeekday(candidate))) return candidate;
      }
    }
    return addDays(from, 7);
  }

  if (rule.includes('weekly')) return addDays(from, 7);
  if (rule.includes('monthly')) return addMonths(from, 1);
  return null;
}

function parseFieldEdit(instruction: string): { field: EditableTodoField; value: string } | { error: string } | null {
  const match = /^\s*([a-z_]+)\s*=\s*(.+?)\s*$/i.exec(instruction);
  if (!match) return null;

  const key = match[1].toLowerCase();
  const field = editableTodoFields.find((f) => f === (key === 'task_name' ? 'task' : key));
  if (!field) return null;
  const value = match[2];

  switch (field) {
    case 'task':
    case 'category':
    case 'reasoning':
      return { field, value };
    case 'priority': {
      const upper = value.toUpperCase();
      if (upper !== 'HIGH' && upper !== 'MEDIUM' && upper !== 'LOW') {
        return { error: 'Priority must be HIGH, MEDIUM or LOW.' };
      }
      return { field, value: upper };
    }
    case 'due_date':
      return parseIsoDate(value) ? { field, value } : { error: 'Due date must be YYYY-MM-DD.' };
    case 'due_time': {
      const normalized = normalizeClockTime(value);
      return normalized ? { field, value: normalized } : { error: 'Due time must be HH:MM (24h).' };
    }
  }
}

export interface TaskServiceDeps {
  todos: TodoRepository;
  insights: InsightRepository;
  triage: TriageEngine;
  patterns: PatternManager;
  /** Null when no vault is configured */
  writer: VaultWriter | null;
}

export class TaskService {
  constructor(private readonly deps: TaskServiceDeps) {}

  get hasVault(): boolean {
    return this.deps.writer !== null;
  }

  async processTask(text: string, options: ProcessTaskOptions = {}): Promise<ProcessTaskOutcome> {
    const { todos, writer } = this.deps;
    const now = options.now ?? new Date();
    const triage = await this.deps.triage.triageTask(text, now, options.attachments);

    const isScheduled = triage.dueDate !== null;
    if (!isScheduled && !triage.clarificationNeeded && !triage.schedulingUnclear) {
      triage.clarificationNeeded = schedulingQuestion;
    }

    const input: TodoInput = {
      task: triage.taskName,
      rawInput: text,
      category: triage.category,
      priority: triage.priority,
      dueDate: triage.dueDate,
      dueTime: triage.dueTime,
      isScheduled,
      reasoning: triage.reasoning,
      recurrence: triage.recurrence,
    };

    let todoId: number;
    let isUpdate = false;
    if (options.updateId !== undefined && todos.replace(options.updateId, input, now.getTime())) {
      todoId = options.updateId;
      isUpdate = true;
    } else {
      todoId = todos.create(input, now.getTime());
    }

    let synced = false;
    if (writer && triage.priority !== 'LOW' && !triage.clarificationNeeded) {
      if (isUpdate) {
        synced = this.fullSync();
      } else {
        const stored = todos.get(todoId);
        synced = stored !== null && writer.appendTask(stored);
      }
    }

    console.log(`[Triage] Task ${todoId} ${isUpdate ? 'updated' : 'captured'}: ${triage.priority} / ${triage.category}`);
    return {
      todoId,
      isUpdate,
      triage,
      isScheduled,
      synced,
      offerForceSync: triage.pushback !== null && triage.priority === 'LOW',
    };
  }

  async applyClarification(todoId: number, reply: string, now = new Date()): Promise<ClarificationOutcome> {
    const { todos, insights, writer } = this.deps;
    insights.logAudit('clarification', `Replying to ${todoId}: ${reply}`, now.getTime());

    const todo = todos.get(todoId);
    if (!todo) return { kind: 'notFound', todoId };

    if (checkIsUnscheduledReply(reply)) {
      todos.markUnscheduled(todoId, now.getTime());
      const updated = todos.get(todoId);
      if (updated && writer) {
        writer.appendTask(updated);
      }
      return { kind: 'unscheduled', todoId };
    }

    const combined = `Original task: ${todo.rawInput ?? todo.task}\nClarification info: ${reply}`;
    const outcome = await this.processTask(combined, { updateId: todoId, now });
    return { kind: 'retriaged', outcome };
  }

  /** `field=value` edits apply directly; anything else is re-triaged */
  async editTask(todoId: number, instruction: string, now = new Date()): Promise<EditOutcome> {
    const { todos } = this.deps;
    const todo = todos.get(todoId);
    if (!todo) return { kind: 'notFound', todoId };

    const edit = parseFieldEdit(instruction);
    if (edit && 'error' in edit) {
      return { kind: 'invalid', message: edit.error };
    }

    if (edit) {
      if (edit.field === 'due_date') {
        todos.schedule(todoId, edit.value, todo.dueTime, now.getTime());
      } else {
        const fields: Partial<Record<EditableTodoField, string>> = {};
        fields[edit.field] = edit.value;
        todos.updateFields(todoId, fields, now.getTime());
      }
      const updated = todos.get(todoId);
      if (!updated) return { kind: 'notFound', todoId };
      this.fullSync();
      return { kind: 'fields', todo: updated, changes: [[edit.field, edit.value]] };
    }

    const combined = `Original task: ${todo.rawInput ?? todo.task}\nEdit instruction: ${instruction}`;
    const outcome = await this.processTask(combined, { updateId: todoId, now });
    return { kind: 'retriaged', outcome };
  }

  async scheduleTask(todoId: number, dateText: string, now = new Date()): Promise<ScheduleOutcome> {
    const { todos } = this.deps;
    if (!todos.get(todoId)) return { kind: 'notFound', todoId };

    const parsed = await this.deps.triage.parseDateTime(dateText, now);
    if (!parsed) return { kind: 'unparseable' };

    todos.schedule(todoId, parsed.dueDate, parsed.dueTime, now.getTime());
    const updated = todos.get(todoId);
    if (!updated) return { kind: 'notFound', todoId };
    this.fullSync();
    return { kind: 'scheduled', todo: updated };
  }

  /**
   * @description Resolve a free-form completion time ("yesterday 3pm").
   * A date without a time counts as noon that day. Null when unparseable.
   */
  async parseCompletionTime(text: string, now = new Date()): Promise<number | null> {
    const parsed = await this.deps.triage.parseDateTime(text, now);
    if (!parsed) return null;
    const date = parseIsoDate(parsed.dueDate);
    if (!date) return null;
    const [hours, minutes] = (parsed.dueTime ?? '12:00').split(':').map(Number);
    return atClockTime(date, hours, minutes).getTime();
  }

  /** Marks the task complete and spawns the next instance of a recurring task */
  completeTask(todoId: number, completedAt: number, now = Date.now()): CompletionOutcome | null {
    const { todos, insights } = this.deps;
    const todo = todos.get(todoId);
    if (!todo) return null;

    todos.complete(todoId, completedAt, now);
    insights.logAudit('task_completed', `Task ${todoId} marked complete`, now);

    let next: RecurringTask | null = null;
    if (todo.recurrence) {
      next = this.regenerateRecurring(todo, new Date(completedAt), now);
    }

    this.fullSync();
    const completed = todos.get(todoId);
    return completed ? { todo: completed, next } : null;
  }

  private regenerateRecurring(todo: Todo, completedOn: Date, now: number): RecurringTask | null {
    const recurrence = todo.recurrence;
    if (!recurrence) return null;

    const nextDate = getNextRecurrenceDate(recurrence, completedOn);
    if (!nextDate) {
      console.log(`[Triage] Recurrence "${recurrence}" of task ${todo.id} not understood, not regenerating`);
      return null;
    }

    const dueDate = toIsoDate(nextDate);
    const todoId = this.deps.todos.create({
      task: todo.task,
      rawInput: `Recurring: ${todo.task}`,
      category: todo.category,
      priority: todo.priority,
      dueDate,
      dueTime: null,
      isScheduled: true,
      reasoning: `Regenerated from Task ${todo.id} (${recurrence.toLowerCase()})`,
      recurrence,
    }, now);

    console.log(`[Triage] Recurring task ${todo.id} regenerated as ${todoId}, due ${dueDate}`);
    return { todoId, dueDate };
  }

  /**
   * @description Pushes a task the triage pushed back on to the vault anyway,
   * records the override and lets the pattern manager learn from it.
   * Returns null when the task does not exist.
   */
  async forceSync(todoId: number, now = Date.now()): Promise<{ synced: boolean; pattern: string | null } | null> {
    if (!this.deps.todos.get(todoId)) return null;

    const synced = this.fullSync();
    this.deps.insights.logAudit('manual_sync', `Force synced todo ${todoId}`, now);
    const pattern = await this.deps.patterns.analyzeOverrides(now);
    return { synced, pattern };
  }

  /** Rewrites the vault tables from the database; false when there is no vault or the write failed */
  fullSync(): boolean {
    const { todos, writer } = this.deps;
    if (!writer) return false;
    try {
      const ok = writer.syncAllTasks(todos.listPending(), todos.listRecentlyCompleted(10));
      if (ok) console.log('[Vault] Full sync completed');
      return ok;
    } catch (err) {
      console.error('[Vault] Sync failed:', errorMessage(err));
      return false;
    }
  }
}
