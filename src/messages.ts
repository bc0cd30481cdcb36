import type { ActivityAnalysis, InlineButton, Todo } from './types';
import type { ProcessTaskOutcome, RecurringTask } from './taskService';
import { escapeMarkdown, formatDueDisplay, formatShortDate, parseIsoDate, toLocalTimestamp, truncate } from './utils';

// ═══════════════════════════════════════════
//  Keyboards
// ═══════════════════════════════════════════

export const keyboardLabels = {
  start: '🏁 Start',
  unscheduled: '📋 Unscheduled',
  done: '✅ Done',
  stats: '📈 Stats',
  refresh: '🔄 Refresh Context',
} as const;

export const replyKeyboard: string[][] = [
  [keyboardLabels.start, keyboardLabels.unscheduled],
  [keyboardLabels.done, keyboardLabels.stats],
  [keyboardLabels.refresh],
];

function button(text: string, callbackData: string): InlineButton {
  return { text, callbackData };
}

export const inlineMenu: InlineButton[][] = [
  [button('➕ Add Task', 'menu_add'), button('✏️ Edit Task', 'menu_edit'), button('✅ Done', 'menu_done')],
  [button('🔍 Query Vault', 'menu_query')],
  [button('📋 Unscheduled', 'menu_unscheduled'), button('📅 Schedule', 'menu_schedule')],
  [button('🔄 Refresh', 'menu_refresh')],
];

export const doneOptions: InlineButton[][] = [
  [button('📝 Enter Task ID', 'done_enter_id'), button('🔍 Search Tasks', 'done_search')],
];

export const editOptions: InlineButton[][] = [
  [button('📝 Enter Task ID', 'edit_enter_id'), button('🔍 Search Tasks', 'edit_search')],
];

export function completionButtons(todoId: number): InlineButton[][] {
  return [[button('✅ Completed Now', `complete_now_${todoId}`), button('📝 Custom Time', `complete_custom_${todoId}`)]];
}

export function forceSyncButtons(todoId: number): InlineButton[][] {
  return [[button('🚀 Force Sync', `sync_${todoId}`)]];
}

/** One button per task, labels capped at 40 characters */
export function searchResultButtons(todos: Todo[], action: 'done_task' | 'edit_task'): InlineButton[][] {
  return todos.map((todo) => [button(truncate(`${todo.task} [ID: ${todo.id}]`, 40), `${action}_${todo.id}`)]);
}

// ═══════════════════════════════════════════
//  Static texts
// ═══════════════════════════════════════════

export function welcomeText(firstName: string): string {
  return (
    `Hello ${escapeMarkdown(firstName)}! I am Kairos, your Intelligent Life Sorter.\n\n` +
    "I'm here to help you stay aligned with your primary goals.\n\n" +
    '🆕 **Hourly Check-Ins Active!**\n' +
    "I'll ask you every hour what you did. This helps track alignment between planned tasks and actual work.\n\n" +
    'Use 😴 Sleep / ☀️ Wake buttons to control quiet periods.\n\n' +
    'Use the buttons below to interact!'
  );
}

export const quickAccessText = '⌨️ _Quick access buttons enabled below_';

export const helpText =
  '🤖 **Kairos Bot Help**\n\n' +
  '➕ **Add Task**: `/add <task>` or the button below.\n' +
  '✏️ **Edit**: `/edit <id> <change>`, or `/edit <id> priority=HIGH` for a direct field change.\n' +
  '✅ **Done**: `/done <id>` marks a task complete.\n' +
  '🔍 **Query Vault**: `/query <question>` asks about your goals and tasks.\n' +
  '📋 **Unscheduled**: `/unscheduled` lists tasks needing a date.\n' +
  '📅 **Schedule**: `/schedule <id> <date> [time]` schedules a task.\n' +
  '📈 **Stats**: `/stats` for today, `/stats week` for the last seven days.\n' +
  '⏰ **Check-ins**: `/checkins on|off`, `/waketime HH:MM`.\n' +
  '🔄 **Refresh**: `/refresh_context` rebuilds my context from your vault.\n';

export const prompts = {
  addTask: "➕ **What task would you like to add?**\n\n_Send me the task description (e.g., 'Submit application by Friday')_",
  query: '🔍 **What would you like to know?**\n\n_Ask me about your goals, recent tasks, or vault content._',
  schedule:
    '📅 **Schedule a Task**\n\n' +
    'Send me the task ID and date:\n' +
    '`<task_id> <date> [time]`\n\n' +
    'Examples:\n' +
    '• `30 Friday`\n' +
    '• `30 tomorrow 3pm`\n' +
    '• `30 2026-02-01 14:00`',
  done: '✅ **Mark Task as Complete**\n\nWhich task did you complete? Use buttons below or `/done <id>`',
  doneEnterId: '📝 **Enter the Task ID** you completed:\n\n_Send the number (e.g., 21)_',
  doneSearch: "🔍 **Search for your task**\n\n_Type a keyword to search (e.g., 'call', 'apply')_",
  edit: '✏️ **Edit Task**\n\nWhich task do you want to edit?',
  editEnterId: '📝 **Enter Task ID to Edit**:\n\n_Send the number (e.g., 21)_',
  editSearch: "🔍 **Search Task to Edit**:\n\n_Type a keyword (e.g., 'call', 'apply')_",
  completionTime: "📝 **When was it completed?**\n\n_Send the date/time (e.g., 'yesterday 3pm', 'Jan 28 2pm')_",
  sleep: "😴 **Sleep mode activated**\n\nI'll pause check-ins until you press ☀️ Wake.\nSleep well!",
  refreshStarted: '🔍 Starting deep vault scan & full sync... this may take a minute.',
} as const;

// ═══════════════════════════════════════════
//  Formatters
// ═══════════════════════════════════════════

export function formatTaskOutcome(outcome: ProcessTaskOutcome): string {
  const { triage, todoId } = outcome;
  const lines = [
    `✅ **Task ${outcome.isUpdate ? 'Updated' : 'Captured'} [ID: ${todoId}]**: ${escapeMarkdown(triage.taskName)}`,
    `📊 **Priority**: ${triage.priority}`,
    `📂 **Category**: ${escapeMarkdown(triage.category)}`,
    `📅 **Due**: ${formatDueDisplay(triage.dueDate, triage.dueTime, outcome.isScheduled)}`,
  ];
  if (triage.recurrence) {
    lines.push(`🔁 **Recurrence**: ${escapeMarkdown(triage.recurrence)}`);
  }
  if (outcome.synced) {
    lines.push(outcome.isUpdate ? '📝 *Synced to Obsidian (Updated)*' : '📝 *Synced to Obsidian*');
  }

  lines.push(`\n**Reasoning**: ${escapeMarkdown(triage.reasoning)}`);
  if (triage.pushback) {
    lines.push(`\n✋ **Pushback**: ${escapeMarkdown(triage.pushback)}`);
  }
  if (triage.suggestedAlternative) {
    lines.push(`\n💡 **Alternative**: ${escapeMarkdown(triage.suggestedAlternative)}`);
  }
  if (triage.clarificationNeeded) {
    lines.push(`\n❓ **Clarification**: ${escapeMarkdown(triage.clarificationNeeded)}`);
    lines.push(`\n_(I'm waiting for your reply regarding Task ${todoId})_`);
  }
  return lines.join('\n');
}

export function formatUnscheduledList(todos: Todo[]): string {
  if (todos.length === 0) {
    return '✅ No unscheduled tasks! All tasks have due dates.';
  }
  const rows = todos.map((todo) =>
    `**[ID: ${todo.id}]** ${escapeMarkdown(todo.task)}\n   └─ ${escapeMarkdown(todo.category ?? 'General')} | ${todo.priority ?? 'MEDIUM'} priority\n`,
  );
  return `📋 **Unscheduled Tasks (Backlog)**\n\n${rows.join('\n')}\n_Use \`/schedule <id> <date> [time]\` to schedule a task._`;
}

const productivityEmoji: Record<ActivityAnalysis['productivityType'], string> = {
  aligned: '✅',
  beneficial: '💡',
  wasted: '⚠️',
  sleeping: '😴',
};

export function formatActivityLogged(analysis: ActivityAnalysis): string {
  const type = analysis.productivityType;
  let text =
    `${productivityEmoji[type]} **Activity Logged**\n\n` +
    `**Summary:** ${escapeMarkdown(analysis.activitySummary)}\n` +
    `**Type:** ${type.charAt(0).toUpperCase()}${type.slice(1)}\n` +
    `**Alignment Score:** ${analysis.alignmentScore}/10\n` +
    `**Category:** ${escapeMarkdown(analysis.category)}\n\n` +
    `💬 ${escapeMarkdown(analysis.feedback)}`;
  if (analysis.matchedTodoId !== null) {
    text += `\n\n✓ Matched to Task ID: ${analysis.matchedTodoId}`;
  }
  return text;
}

export function formatCompletion(todo: Todo, completedAt: number): string {
  return `🎉 **Task Completed!**\n\n✅ ${escapeMarkdown(todo.task)}\n⏰ Completed: ${toLocalTimestamp(new Date(completedAt))}`;
}

export function formatRecurring(next: RecurringTask): string {
  const due = parseIsoDate(next.dueDate);
  const dueText = due ? formatShortDate(due) : next.dueDate;
  return `🔄 **Recurring Task Regenerated!**\n📅 Next due: ${dueText}\n🆔 New ID: ${next.todoId}`;
}

export function formatScheduled(todo: Todo): string {
  return `✅ **Task ${todo.id} scheduled!**\n📅 Due: ${formatDueDisplay(todo.dueDate, todo.dueTime, todo.isScheduled)}`;
}

export function formatWake(hoursSlept: number): string {
  return `☀️ **Welcome back!**\n\nYou slept for ~${hoursSlept.toFixed(1)} hours.\nCheck-ins resumed. Let's make today count!`;
}
