import * as fs from 'fs';
import * as path from 'path';
import type { Todo } from '../types';
import { formatDayFirst, formatTwelveHour, toLocalTimestamp } from '../utils';

const todoHeader =
  '# 📋 TO-DO List\n\n' +
  '| ID | Task | Priority | Status | Category | Due Date | Due Time | Reasoning |\n' +
  '| :--- | :--- | :--- | :--- | :--- | :--- | :--- | :--- |\n';

const completedHeader =
  '# ✅ Recently Completed\n\n' +
  '| ID | Task | Completed At | Category | Priority |\n' +
  '| :--- | :--- | :--- | :--- | :--- |\n';

/** Task fields the vault tables show; a Todo satisfies it */
export type VaultTask = Pick<
  Todo,
  'id' | 'task' | 'category' | 'priority' | 'dueDate' | 'dueTime' | 'isScheduled' | 'status' | 'reasoning' | 'recurrence'
>;

function escapeCell(text: string): string {
  return text.replace(/\r?\n/g, ' ').replace(/\|/g, '\\|');
}

export function formatTaskRow(task: VaultTask): string {
  let name = escapeCell(task.task || 'Untitled Task');
  if (task.recurrence) name += ' 🔁';

  let dateDisplay = '📅 Unscheduled';
  let timeDisplay = '—';
  if (task.isScheduled && task.dueDate) {
    dateDisplay = formatDayFirst(task.dueDate);
    timeDisplay = task.dueTime ? formatTwelveHour(task.dueTime) : '—';
  }

  const cells = [
    String(task.id),
    name,
    task.priority ?? 'MEDIUM',
    task.status,
    task.category ?? 'General',
    dateDisplay,
    timeDisplay,
    escapeCell(task.reasoning ?? ''),
  ];
  return `| ${cells.join(' | ')} |\n`;
}

export function formatCompletedRow(task: Todo): string {
  const completedAt = task.completedAt ? toLocalTimestamp(new Date(task.completedAt)) : '—';
  const cells = [
    String(task.id),
    escapeCell(task.task || 'Untitled'),
    completedAt,
    task.category ?? 'General',
    task.priority ?? 'MEDIUM',
  ];
  return `| ${cells.join(' | ')} |\n`;
}

/**
 * @description Mirrors the task list into `To Do/TO-DO List.md` and
 * `To Do/Completed Tasks.md` inside the vault.
 */
export class VaultWriter {
  readonly inboxPath: string;
  readonly completedPath: string;

  constructor(vaultPath: string) {
    const root = path.resolve(vaultPath);
    if (!fs.existsSync(root)) {
      throw new Error(`Vault path does not exist: ${root}`);
    }
    this.inboxPath = path.join(root, 'To Do', 'TO-DO List.md');
    this.completedPath = path.join(root, 'To Do', 'Completed Tasks.md');
    fs.mkdirSync(path.dirname(this.inboxPath), { recursive: true });
  }

  appendTask(task: VaultTask): boolean {
    try {
      if (!fs.existsSync(this.inboxPath)) {
        fs.writeFileSync(this.inboxPath, todoHeader, 'utf-8');
      }
      fs.appendFileSync(this.inboxPath, formatTaskRow(task), 'utf-8');
      return true;
    } catch (err) {
      console.error('[Vault] Failed to append task:', err);
      return false;
    }
  }

  /** Rewrites the active list; the completed list only when there is something to show */
  syncAllTasks(activeTasks: VaultTask[], completedTasks: Todo[]): boolean {
    try {
      fs.writeFileSync(this.inboxPath, todoHeader + activeTasks.map(formatTaskRow).join(''), 'utf-8');
      if (completedTasks.length > 0) {
        fs.writeFileSync(this.completedPath, completedHeader + completedTasks.map(formatCompletedRow).join(''), 'utf-8');
      }
      return true;
    } catch (err) {
      console.error('[Vault] Failed to sync tasks:', err);
      return false;
    }
  }
}
