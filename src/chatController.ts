import * as fs from 'fs';
import type { ChatSender, InlineButton } from './types';
import type { ConversationStore } from './conversation';
import type { TodoRepository } from './repositories/todoRepository';
import type { InsightRepository } from './repositories/insightRepository';
import type { CheckInRepository } from './repositories/checkInRepository';
import type { TaskService, ProcessTaskOutcome } from './taskService';
import type { TriageEngine } from './triageEngine';
import type { ContextManager } from './contextManager';
import type { CheckInManager } from './checkIns/checkInManager';
import type { ActivityAnalyzer } from './checkIns/activityAnalyzer';
import type { ProductivityReporter } from './productivityReporter';
import type { MediaKind, MediaTranscriber } from './mediaInput';
import { checkIsUnscheduledReply } from './taskService';
import {
  completionButtons,
  doneOptions,
  editOptions,
  forceSyncButtons,
  formatActivityLogged,
  formatCompletion,
  formatRecurring,
  formatScheduled,
  formatTaskOutcome,
  formatUnscheduledList,
  formatWake,
  helpText,
  inlineMenu,
  keyboardLabels,
  prompts,
  quickAccessText,
  replyKeyboard,
  searchResultButtons,
  welcomeText,
} from './messages';
import { errorMessage, escapeMarkdown, normalizeClockTime } from './utils';

export interface ChatUser {
  id: number;
  username?: string;
  firstName?: string;
}

/** Commands shown in the Telegram menu, in order */
export const commandMenu = [
  { command: 'start', description: 'Start the bot and show menu' },
  { command: 'add', description: 'Add a new task' },
  { command: 'edit', description: 'Edit task: /edit <id> <change>' },
  { command: 'query', description: 'Query your vault' },
  { command: 'done', description: 'Mark task complete: /done <id>' },
  { command: 'unscheduled', description: 'View unscheduled tasks' },
  { command: 'schedule', description: 'Schedule a task: /schedule <id> <date>' },
  { command: 'stats', description: 'Productivity stats: /stats [week]' },
  { command: 'checkins', description: 'Hourly check-ins: /checkins on|off' },
  { command: 'waketime', description: 'Default wake time: /waketime HH:MM' },
  { command: 'help', description: 'Show help information' },
  { command: 'refresh_context', description: 'Refresh vault context' },
] as const;

export type CommandName = (typeof commandMenu)[number]['command'];

export interface ChatControllerDeps {
  sender: ChatSender;
  conversations: ConversationStore;
  todos: TodoRepository;
  insights: InsightRepository;
  checkIns: CheckInRepository;
  tasks: TaskService;
  triage: TriageEngine;
  context: ContextManager;
  checkInManager: CheckInManager;
  analyzer: ActivityAnalyzer;
  reporter: ProductivityReporter;
  scheduler: { readonly isRunning: boolean; start(): boolean };
  media: MediaTranscriber;
  clock?: () => Date;
}

function parseTaskId(text: string): number | null {
  const trimmed = text.trim();
  return /^\d+$/.test(trimmed) ? Number(trimmed) : null;
}

function splitFirstWord(text: string): [string, string] {
  const trimmed = text.trim();
  const space = trimmed.search(/\s/);
  if (space === -1) return [trimmed, ''];
  return [trimmed.slice(0, space), trimmed.slice(space + 1).trim()];
}

/**
 * @description Conversation flows of the bot, independent of Telegraf.
 * Every entry point answers through the ChatSender and never throws.
 */
export class ChatController {
  constructor(private readonly deps: ChatControllerDeps) {}

  private now(): Date {
    return this.deps.clock ? this.deps.clock() : new Date();
  }

  // ═══════════════════════════════════════════
  //  Entry points
  // ═══════════════════════════════════════════

  async handleCommand(chatId: number, user: ChatUser, command: CommandName, payload: string): Promise<void> {
    await this.runSafely(chatId, `/${command}`, () => this.dispatchCommand(chatId, user, command, payload.trim()));
  }

  /**
   * @description Free text: an idle chat with an open check-in answers it,
   * keyboard shortcuts always work, then the current conversation state decides.
   */
  async handleText(chatId: number, user: ChatUser, text: string): Promise<void> {
    await this.runSafely(chatId, 'text', async () => {
      const state = this.deps.conversations.get(chatId);

      if (state.kind === 'idle') {
        const pending = this.deps.checkInManager.getPendingCheckIn(chatId);
        if (pending) {
          await this.answerCheckIn(chatId, pending.id, text);
          return;
        }
      }

      if (await this.handleShortcut(chatId, user, text)) return;
      await this.handleStateInput(chatId, text);
    });
  }

  async handleCallback(chatId: number, data: string): Promise<void> {
    await this.runSafely(chatId, `callback ${data}`, () => this.dispatchCallback(chatId, data));
  }

  /** Voice note or photo already downloaded to `filePath`; the file is removed afterwards */
  async handleMedia(chatId: number, kind: MediaKind, filePath: string, caption: string | null = null): Promise<void> {
    const { sender, insights, media } = this.deps;
    await this.runSafely(chatId, kind, async () => {
      insights.logAudit(`message_${kind}`, `Chat ${chatId}`, this.now().getTime());
      const statusId = await sender.send(chatId, `📥 Received ${kind}. Processing...`);
      try {
        const text = await media.extractText(kind, filePath, caption);
        if (!text) {
          await this.replaceStatus(chatId, statusId, `❌ Couldn't understand that ${kind}.`);
          return;
        }
        console.log(`[Bot] ${kind} converted: "${text}"`);
        await this.replaceStatus(chatId, statusId, `${kind === 'voice' ? '🎤' : '🖼️'} ${escapeMarkdown(text)}`);
        await this.processTask(chatId, text);
      } finally {
        fs.rmSync(filePath, { force: true });
      }
    });
  }

  // ═══════════════════════════════════════════
  //  Commands
  // ═══════════════════════════════════════════

  private async dispatchCommand(chatId: number, user: ChatUser, command: CommandName, payload: string): Promise<void> {
    const { sender, conversations, insights } = this.deps;
    if (command !== 'add' && command !== 'query' && command !== 'done') {
      insights.logAudit('command', `/${command} by ${user.username ?? user.id} (${user.id})`, this.now().getTime());
    }

    switch (command) {
      case 'start':
        await this.start(chatId, user);
        return;
      case 'help':
        await sender.sendWithKeyboard(chatId, helpText, replyKeyboard);
        return;
      case 'add':
        if (!payload) {
          conversations.set(chatId, { kind: 'awaitingAddTask' });
          await sender.sendWithKeyboard(chatId, prompts.addTask, replyKeyboard);
          return;
        }
        await this.processTask(chatId, payload);
        return;
      case 'query':
        if (!payload) {
          conversations.set(chatId, { kind: 'awaitingQuery' });
          await sender.sendWithKeyboard(chatId, prompts.query, replyKeyboard);
          return;
        }
        await this.answerQuery(chatId, payload);
        return;
      case 'done': {
        if (!payload) {
          conversations.reset(chatId);
          await sender.send(chatId, prompts.done, doneOptions);
          return;
        }
        await this.showCompletionChoice(chatId, splitFirstWord(payload)[0]);
        return;
      }
      case 'edit': {
        if (!payload) {
          conversations.reset(chatId);
          await sender.send(chatId, prompts.edit, editOptions);
          return;
        }
        const [idText, instruction] = splitFirstWord(payload);
        if (!instruction) {
          await sender.send(chatId, 'Usage: `/edit <id> <instruction>` or `/edit` (interactive)');
          return;
        }
        await this.editTask(chatId, idText, instruction);
        return;
      }
      case 'unscheduled':
        await sender.sendWithKeyboard(chatId, formatUnscheduledList(this.deps.todos.listUnscheduled()), replyKeyboard);
        return;
      case 'schedule': {
        const [idText, dateText] = splitFirstWord(payload);
        if (!idText || !dateText) {
          conversations.set(chatId, { kind: 'awaitingSchedule' });
          await sender.sendWithKeyboard(chatId, prompts.schedule, replyKeyboard);
          return;
        }
        await this.scheduleTask(chatId, idText, dateText);
        return;
      }
      case 'stats':
        await this.sendStats(chatId, payload.toLowerCase() === 'week');
        return;
      case 'refresh_context':
        conversations.reset(chatId);
        await this.refreshContext(chatId, 'reply');
        return;
      case 'checkins':
        await this.setCheckIns(chatId, payload.toLowerCase());
        return;
      case 'waketime':
        await this.setWakeTime(chatId, payload);
        return;
    }
  }

  private async start(chatId: number, user: ChatUser): Promise<void> {
    const { checkIns, scheduler, sender } = this.deps;
    if (checkIns.ensureUserConfig(chatId, this.now().getTime())) {
      console.log(`[Bot] Check-ins configured for chat ${chatId}`);
    }
    if (!scheduler.isRunning) {
      scheduler.start();
    }

    await sender.send(chatId, welcomeText(user.firstName ?? 'there'), inlineMenu);
    await sender.sendWithKeyboard(chatId, quickAccessText, replyKeyboard);
  }

  private async sendStats(chatId: number, isWeekly: boolean): Promise<void> {
    const { reporter, sender } = this.deps;
    const report = isWeekly
      ? reporter.buildWeeklyReport(this.now()).markdown
      : reporter.formatDailyReport(this.now());
    await sender.sendWithKeyboard(chatId, report, replyKeyboard);
  }

  private async setCheckIns(chatId: number, value: string): Promise<void> {
    const { checkIns, scheduler, sender } = this.deps;
    const now = this.now().getTime();
    checkIns.ensureUserConfig(chatId, now);

    if (value === 'on' || value === 'off') {
      checkIns.setCheckInsEnabled(chatId, value === 'on', now);
      if (value === 'on') {
        scheduler.start();
        await sender.send(chatId, '✅ Hourly check-ins enabled.');
      } else {
        await sender.send(chatId, '⏸️ Hourly check-ins disabled. Use `/checkins on` to resume.');
      }
      return;
    }

    const enabled = checkIns.getUserConfig(chatId)?.checkInsEnabled ?? false;
    await sender.send(chatId, `⏰ Check-ins are currently **${enabled ? 'on' : 'off'}**. Use \`/checkins on\` or \`/checkins off\`.`);
  }

  private async setWakeTime(chatId: number, value: string): Promise<void> {
    const { checkIns, sender } = this.deps;
    const now = this.now().getTime();
    checkIns.ensureUserConfig(chatId, now);

    const wakeTime = normalizeClockTime(value);
    if (!wakeTime) {
      const current = checkIns.getUserConfig(chatId)?.defaultWakeTime ?? '08:00';
      await sender.send(chatId, `Usage: \`/waketime HH:MM\` (24h), e.g. \`/waketime 07:30\`. Current: ${current}`);
      return;
    }

    checkIns.setDefaultWakeTime(chatId, wakeTime, now);
    await sender.send(chatId, `⏰ Default wake time set to ${wakeTime}.`);
  }

  // ═══════════════════════════════════════════
  //  Free text
  // ═══════════════════════════════════════════

  private async handleShortcut(chatId: number, user: ChatUser, text: string): Promise<boolean> {
    const { conversations, sender } = this.deps;
    switch (text) {
      case keyboardLabels.done:
        conversations.reset(chatId);
        await sender.send(chatId, prompts.done, doneOptions);
        return true;
      case keyboardLabels.start:
        await this.dispatchCommand(chatId, user, 'start', '');
        return true;
      case keyboardLabels.unscheduled:
        await this.dispatchCommand(chatId, user, 'unscheduled', '');
        return true;
      case keyboardLabels.refresh:
        conversations.reset(chatId);
        await this.refreshContext(chatId, 'reply');
        return true;
      case keyboardLabels.stats:
        conversations.reset(chatId);
        await this.sendStats(chatId, false);
        return true;
      default:
        return false;
    }
  }

  private async handleStateInput(chatId: number, text: string): Promise<void> {
    const { conversations, sender, todos } = this.deps;
    const state = conversations.get(chatId);

    switch (state.kind) {
      case 'awaitingAddTask':
        conversations.reset(chatId);
        await this.processTask(chatId, text);
        return;
      case 'awaitingQuery':
        conversations.reset(chatId);
        await this.answerQuery(chatId, text);
        return;
      case 'awaitingSchedule': {
        conversations.reset(chatId);
        const [idText, dateText] = splitFirstWord(text);
        if (!dateText) {
          await sender.send(chatId, '❌ Please provide: `<task_id> <date>`\nExample: `15 Friday 3pm`');
          return;
        }
        await this.scheduleTask(chatId, idText, dateText);
        return;
      }
      case 'awaitingDoneId':
        conversations.reset(chatId);
        await this.showCompletionChoice(chatId, text);
        return;
      case 'awaitingDoneSearch':
        conversations.reset(chatId);
        await this.showSearchResults(chatId, text, 'done_task');
        return;
      case 'awaitingEditId': {
        conversations.reset(chatId);
        const todoId = parseTaskId(text);
        const todo = todoId === null ? null : todos.get(todoId);
        if (todoId === null || !todo) {
          await sender.sendWithKeyboard(chatId, `❌ Task ID ${escapeMarkdown(text.trim())} not found.`, replyKeyboard);
          return;
        }
        conversations.set(chatId, { kind: 'awaitingEditInstruction', todoId });
        await sender.send(
          chatId,
          `✏️ **Editing Task ${todoId}:** ${escapeMarkdown(todo.task)}\n\n` +
          "Tell me your edits (e.g., 'Change priority to HIGH', 'due friday', or `priority=HIGH`)",
        );
        return;
      }
      case 'awaitingEditSearch':
        conversations.reset(chatId);
        await this.showSearchResults(chatId, text, 'edit_task');
        return;
      case 'awaitingEditInstruction':
        conversations.reset(chatId);
        await this.editTask(chatId, String(state.todoId), text);
        return;
      case 'awaitingCompletionTime': {
        const completedAt = await this.deps.tasks.parseCompletionTime(text, this.now());
        if (completedAt === null) {
          await sender.send(chatId, "❌ Couldn't understand that time. Try 'yesterday 3pm' or `2026-02-01 15:00`.");
          return;
        }
        conversations.reset(chatId);
        await this.completeTask(chatId, state.todoId, completedAt);
        return;
      }
      case 'awaitingClarification':
        conversations.reset(chatId);
        await this.applyClarification(chatId, state.todoId, text);
        return;
      case 'idle':
        if (text.trim().split(/\s+/).length > 3) {
          await sender.sendWithKeyboard(
            chatId,
            '💡 It looks like you want to add a task. Tap **➕ Add Task** or type `/add`',
            replyKeyboard,
          );
        } else {
          await sender.sendWithKeyboard(
            chatId,
            "I didn't quite get that. Use the menu button (/) or tap a button below.",
            replyKeyboard,
          );
        }
        return;
    }
  }

  // ═══════════════════════════════════════════
  //  Callback buttons
  // ═══════════════════════════════════════════

  private async dispatchCallback(chatId: number, data: string): Promise<void> {
    const { conversations, sender, checkInManager, todos } = this.deps;

    switch (data) {
      case 'checkin_sleep':
        checkInManager.handleSleep(chatId, this.now().getTime());
        await sender.send(chatId, prompts.sleep);
        return;
      case 'checkin_wake': {
        const hoursSlept = checkInManager.handleWake(chatId, this.now().getTime());
        await sender.send(
          chatId,
          hoursSlept === null ? "☀️ You weren't in sleep mode. Check-ins are running as usual." : formatWake(hoursSlept),
        );
        return;
      }
      case 'menu_add':
        conversations.set(chatId, { kind: 'awaitingAddTask' });
        await sender.send(chatId, prompts.addTask);
        return;
      case 'menu_query':
        conversations.set(chatId, { kind: 'awaitingQuery' });
        await sender.send(chatId, prompts.query);
        return;
      case 'menu_unscheduled':
        await sender.send(chatId, formatUnscheduledList(todos.listUnscheduled()), inlineMenu);
        return;
      case 'menu_schedule':
        conversations.set(chatId, { kind: 'awaitingSchedule' });
        await sender.send(chatId, prompts.schedule);
        return;
      case 'menu_done':
        conversations.reset(chatId);
        await sender.send(chatId, prompts.done, doneOptions);
        return;
      case 'menu_edit':
        conversations.reset(chatId);
        await sender.send(chatId, prompts.edit, editOptions);
        return;
      case 'menu_refresh':
        conversations.reset(chatId);
        await this.refreshContext(chatId, 'inline');
        return;
      case 'done_enter_id':
        conversations.set(chatId, { kind: 'awaitingDoneId' });
        await sender.send(chatId, prompts.doneEnterId);
        return;
      case 'done_search':
        conversations.set(chatId, { kind: 'awaitingDoneSearch' });
        await sender.send(chatId, prompts.doneSearch);
        return;
      case 'edit_enter_id':
        conversations.set(chatId, { kind: 'awaitingEditId' });
        await sender.send(chatId, prompts.editEnterId);
        return;
      case 'edit_search':
        conversations.set(chatId, { kind: 'awaitingEditSearch' });
        await sender.send(chatId, prompts.editSearch);
        return;
    }

    const match = /^(edit_task|done_task|complete_now|complete_custom|sync)_(\d+)$/.exec(data);
    if (!match) {
      console.log(`[Bot] Unknown callback: ${data}`);
      return;
    }
    const todoId = Number(match[2]);

    switch (match[1]) {
      case 'edit_task': {
        const todo = todos.get(todoId);
        if (!todo) {
          await sender.send(chatId, `❌ Task ID ${todoId} not found.`, inlineMenu);
          return;
        }
        conversations.set(chatId, { kind: 'awaitingEditInstruction', todoId });
        await sender.send(
          chatId,
          `✏️ **Editing: ${escapeMarkdown(todo.task)} [ID: ${todoId}]**\n\n` +
          "Tell me your edits (e.g., 'Change priority to HIGH', 'due friday')",
        );
        return;
      }
      case 'done_task':
        await this.showCompletionChoice(chatId, String(todoId));
        return;
      case 'complete_now':
        conversations.reset(chatId);
        await this.completeTask(chatId, todoId, this.now().getTime());
        return;
      case 'complete_custom':
        conversations.set(chatId, { kind: 'awaitingCompletionTime', todoId });
        await sender.send(chatId, prompts.completionTime);
        return;
      case 'sync':
        await this.forceSync(chatId, todoId);
        return;
    }
  }

  // ═══════════════════════════════════════════
  //  Flows
  // ═══════════════════════════════════════════

  private async processTask(chatId: number, text: string): Promise<void> {
    const statusId = await this.deps.sender.send(chatId, '🤔 Analyzing task...');
    const outcome = await this.deps.tasks.processTask(text, { now: this.now() });
    await this.presentOutcome(chatId, outcome, statusId);
  }

  private async presentOutcome(chatId: number, outcome: ProcessTaskOutcome, statusId: number | null): Promise<void> {
    if (outcome.triage.clarificationNeeded) {
      this.deps.conversations.set(chatId, { kind: 'awaitingClarification', todoId: outcome.todoId });
    }
    const buttons = outcome.offerForceSync ? forceSyncButtons(outcome.todoId) : undefined;
    await this.replaceStatus(chatId, statusId, formatTaskOutcome(outcome), buttons);
  }

  private async applyClarification(chatId: number, todoId: number, reply: string): Promise<void> {
    const { sender, tasks } = this.deps;
    const statusId = checkIsUnscheduledReply(reply)
      ? null
      : await sender.send(chatId, `🔄 Refining Task ${todoId} with your reply...`);

    const result = await tasks.applyClarification(todoId, reply, this.now());
    switch (result.kind) {
      case 'unscheduled':
        await sender.sendWithKeyboard(
          chatId,
          `📋 **Task ${todoId} moved to Unscheduled backlog.**\n` +
          `Use \`/schedule ${todoId} <date> [time]\` when you're ready to schedule it.`,
          replyKeyboard,
        );
        return;
      case 'notFound':
        await this.replaceStatus(chatId, statusId, `❌ Task ID ${todoId} not found.`);
        return;
      case 'retriaged':
        await this.presentOutcome(chatId, result.outcome, statusId);
        return;
    }
  }

  private async editTask(chatId: number, idText: string, instruction: string): Promise<void> {
    const { sender, tasks } = this.deps;
    const todoId = parseTaskId(idText);
    if (todoId === null) {
      await sender.send(chatId, '❌ Invalid task ID. Usage: `/edit <id> <instruction>`');
      return;
    }

    const statusId = await sender.send(chatId, `🔄 Applying edit to Task ${todoId}...`);
    const result = await tasks.editTask(todoId, instruction, this.now());
    switch (result.kind) {
      case 'fields': {
        const changes = result.changes.map(([field, value]) => `• ${field}: ${escapeMarkdown(value)}`).join('\n');
        await this.replaceStatus(chatId, statusId, `✅ **Task ${todoId} Updated!**\n${changes}`, inlineMenu);
        return;
      }
      case 'retriaged':
        await this.presentOutcome(chatId, result.outcome, statusId);
        return;
      case 'invalid':
        await this.replaceStatus(chatId, statusId, `❌ ${result.message}`);
        return;
      case 'notFound':
        await this.replaceStatus(chatId, statusId, `❌ Task ID ${todoId} not found.`);
        return;
    }
  }

  private async scheduleTask(chatId: number, idText: string, dateText: string): Promise<void> {
    const { sender, tasks } = this.deps;
    const todoId = parseTaskId(idText);
    if (todoId === null) {
      await sender.send(chatId, '❌ Invalid task ID. Usage: `/schedule <id> <date>`');
      return;
    }

    const result = await tasks.scheduleTask(todoId, dateText, this.now());
    switch (result.kind) {
      case 'scheduled':
        await sender.sendWithKeyboard(chatId, formatScheduled(result.todo), replyKeyboard);
        return;
      case 'unparseable':
        await sender.send(chatId, "❌ Couldn't parse that date. Try: `/schedule 30 2026-02-01`");
        return;
      case 'notFound':
        await sender.sendWithKeyboard(chatId, `❌ Task ID ${todoId} not found.`, replyKeyboard);
        return;
    }
  }

  private async showCompletionChoice(chatId: number, idText: string): Promise<void> {
    const { sender, todos } = this.deps;
    const todoId = parseTaskId(idText);
    const todo = todoId === null ? null : todos.get(todoId);
    if (todoId === null || !todo) {
      await sender.send(chatId, `❌ Task ID ${escapeMarkdown(idText.trim())} not found.`, inlineMenu);
      return;
    }
    if (todo.status === 'Completed') {
      await sender.send(chatId, `ℹ️ Task ${todoId} is already completed.`, inlineMenu);
      return;
    }
    await sender.send(
      chatId,
      `✅ Found: **${escapeMarkdown(todo.task)}**\n\n🕐 **When did you complete it?**`,
      completionButtons(todoId),
    );
  }

  private async completeTask(chatId: number, todoId: number, completedAt: number): Promise<void> {
    const { sender, tasks } = this.deps;
    const result = tasks.completeTask(todoId, completedAt, this.now().getTime());
    if (!result) {
      await sender.send(chatId, `❌ Task ID ${todoId} not found.`, inlineMenu);
      return;
    }
    await sender.send(chatId, formatCompletion(result.todo, completedAt), inlineMenu);
    if (result.next) {
      await sender.send(chatId, formatRecurring(result.next));
    }
  }

  private async showSearchResults(chatId: number, term: string, action: 'done_task' | 'edit_task'): Promise<void> {
    const { sender, todos } = this.deps;
    const query = term.trim();
    const results = todos.searchPending(query, 5);
    if (results.length === 0) {
      await sender.send(chatId, `❌ No pending tasks found matching '${escapeMarkdown(query)}'.`, inlineMenu);
      return;
    }
    const header = action === 'done_task'
      ? `🔍 **Search Results for '${escapeMarkdown(query)}':**`
      : '🔍 **Select Task to Edit:**';
    await sender.send(chatId, header, searchResultButtons(results, action));
  }

  private async answerQuery(chatId: number, question: string): Promise<void> {
    const { sender, insights, triage } = this.deps;
    insights.logAudit('query', `Chat ${chatId}: ${question}`, this.now().getTime());
    const statusId = await sender.send(chatId, '🔍 Searching personal knowledge base...');
    const answer = await triage.answerQuery(question);
    await this.replaceStatus(chatId, statusId, answer || 'I could not find an answer to that.');
  }

  private async refreshContext(chatId: number, menu: 'inline' | 'reply'): Promise<void> {
    const { sender, context, tasks } = this.deps;
    const reply = (text: string) => menu === 'inline'
      ? sender.send(chatId, text, inlineMenu)
      : sender.sendWithKeyboard(chatId, text, replyKeyboard);

    if (!context.hasVault) {
      await reply('⚠️ No Obsidian vault configured. Set OBSIDIAN_VAULT_PATH to enable context refresh.');
      return;
    }

    await sender.send(chatId, prompts.refreshStarted);
    const contextMap = await context.generateContextMap(this.now().getTime());
    const synced = tasks.fullSync();
    await reply(contextMap && synced
      ? '✅ Context update & Obsidian Sync complete!'
      : '⚠️ Context refresh failed or Sync failed.');
  }

  private async forceSync(chatId: number, todoId: number): Promise<void> {
    const { sender, tasks } = this.deps;
    if (!tasks.hasVault) {
      await sender.send(chatId, '⚠️ No Obsidian vault configured, nothing to sync.', inlineMenu);
      return;
    }

    const result = await tasks.forceSync(todoId, this.now().getTime());
    if (!result) {
      await sender.send(chatId, `❌ Task ID ${todoId} not found.`, inlineMenu);
      return;
    }
    if (!result.synced) {
      await sender.send(chatId, '❌ Sync failed.', inlineMenu);
      return;
    }

    let text = '🚀 **Force Sync Complete!**';
    if (result.pattern) {
      text += `\n\n🧠 Learned pattern: ${escapeMarkdown(result.pattern)}`;
    }
    await sender.send(chatId, text, inlineMenu);
  }

  private async answerCheckIn(chatId: number, checkInId: number, text: string): Promise<void> {
    const { sender, analyzer, insights, checkIns } = this.deps;
    const statusId = await sender.send(chatId, '🔍 Analyzing your activity...');
    const now = this.now().getTime();

    try {
      const analysis = await analyzer.analyzeActivity(text, checkInId, now);
      await this.replaceStatus(chatId, statusId, formatActivityLogged(analysis));
      insights.logAudit('activity_logged', `Check-in ${checkInId}: ${text.slice(0, 50)}`, now);
    } catch (err) {
      console.error(`[CheckIn] Failed to log activity for check-in ${checkInId}:`, errorMessage(err));
      try {
        checkIns.setCheckInStatus(checkInId, 'completed', now);
      } catch (statusErr) {
        console.error(`[CheckIn] Failed to close check-in ${checkInId}:`, errorMessage(statusErr));
      }
      await this.replaceStatus(chatId, statusId, '✅ Activity logged. Analysis pending.');
    }
  }

  // ═══════════════════════════════════════════
  //  Helpers
  // ═══════════════════════════════════════════

  private async replaceStatus(chatId: number, statusId: number | null, text: string, buttons?: InlineButton[][]): Promise<void> {
    if (statusId === null) {
      await this.deps.sender.send(chatId, text, buttons);
    } else {
      await this.deps.sender.edit(chatId, statusId, text, buttons);
    }
  }

  private async runSafely(chatId: number, label: string, action: () => Promise<void>): Promise<void> {
    try {
      await action();
    } catch (err) {
      console.error(`[Bot] ${label} failed:`, err);
      await this.deps.sender.send(chatId, `❌ Error: ${errorMessage(err)}`, inlineMenu);
    }
  }
}
