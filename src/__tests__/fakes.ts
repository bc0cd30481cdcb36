import type { LanguageModel, MediaAttachment } from '../llm/languageModel';
import type { ChatSender, InlineButton } from '../types';

/** LanguageModel that replays queued replies; an Error entry is thrown instead */
export class ScriptedModel implements LanguageModel {
  readonly name = 'scripted-model';
  readonly prompts: string[] = [];
  readonly attachments: MediaAttachment[][] = [];
  private readonly replies: Array<string | Error>;

  constructor(replies: Array<string | Error> = []) {
    this.replies = [...replies];
  }

  queue(...replies: Array<string | Error>): void {
    this.replies.push(...replies);
  }

  get lastPrompt(): string {
    return this.prompts[this.prompts.length - 1] ?? '';
  }

  async generate(prompt: string, attachments: MediaAttachment[] = []): Promise<string> {
    this.prompts.push(prompt);
    this.attachments.push(attachments);
    const next = this.replies.shift();
    if (next === undefined) {
      throw new Error('No scripted reply left');
    }
    if (next instanceof Error) {
      throw next;
    }
    return next;
  }
}

export interface RecordedMessage {
  kind: 'send' | 'keyboard' | 'edit';
  chatId: number;
  text: string;
  messageId: number;
  buttons?: InlineButton[][];
  keyboard?: string[][];
}

/** ChatSender that keeps every outgoing message in order */
export class RecordingSender implements ChatSender {
  readonly messages: RecordedMessage[] = [];
  failSends = false;
  private nextMessageId = 100;

  get texts(): string[] {
    return this.messages.map((m) => m.text);
  }

  get last(): RecordedMessage | undefined {
    return this.messages[this.messages.length - 1];
  }

  async send(chatId: number, text: string, buttons?: InlineButton[][]): Promise<number | null> {
    if (this.failSends) return null;
    const messageId = this.nextMessageId++;
    this.messages.push({ kind: 'send', chatId, text, messageId, buttons });
    return messageId;
  }

  async sendWithKeyboard(chatId: number, text: string, keyboard: string[][]): Promise<number | null> {
    if (this.failSends) return null;
    const messageId = this.nextMessageId++;
    this.messages.push({ kind: 'keyboard', chatId, text, messageId, keyboard });
    return messageId;
  }

  async edit(chatId: number, messageId: number, text: string, buttons?: InlineButton[][]): Promise<void> {
    this.messages.push({ kind: 'edit', chatId, text, messageId, buttons });
  }
}

export function callbackData(buttons: InlineButton[][] | undefined): string[] {
  return (buttons ?? []).flat().map((b) => b.callbackData);
}

/** JSON triage reply for "Write report", with fields overridden */
export function triageReply(fields: Record<string, unknown> = {}): string {
  return JSON.stringify({
    task_name: 'Write report',
    category: 'Career',
    priority: 'HIGH',
    due_date: '2026-02-01',
    due_time: null,
    recurrence: null,
    scheduling_unclear: false,
    reasoning: 'Career deadline',
    alignment_score: 9,
    pushback: null,
    suggested_alternative: null,
    clarification_needed: null,
    ...fields,
  });
}
