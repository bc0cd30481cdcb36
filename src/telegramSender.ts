import { Markup, type Telegram } from 'telegraf';
import type { InlineKeyboardMarkup, ReplyKeyboardMarkup } from 'telegraf/types';
import type { ChatSender, InlineButton } from './types';
import { ChatThrottle } from './chatThrottle';
import { errorMessage, splitMessage } from './utils';

type ReplyMarkup = InlineKeyboardMarkup | ReplyKeyboardMarkup;

export function toInlineMarkup(buttons: InlineButton[][]): InlineKeyboardMarkup {
  return Markup.inlineKeyboard(
    buttons.map((row) => row.map((b) => Markup.button.callback(b.text, b.callbackData))),
  ).reply_markup;
}

export function toReplyKeyboard(rows: string[][]): ReplyKeyboardMarkup {
  return Markup.keyboard(rows).resize().reply_markup;
}

/**
 * @description ChatSender over the Telegram Bot API. Long texts are split,
 * markup goes on the last chunk, and Markdown that Telegram rejects is
 * resent as plain text.
 */
export class TelegramSender implements ChatSender {
  constructor(
    private readonly telegram: Telegram,
    private readonly throttle = new ChatThrottle(),
  ) {}

  async send(chatId: number, text: string, buttons?: InlineButton[][]): Promise<number | null> {
    return this.sendChunks(chatId, text, buttons ? toInlineMarkup(buttons) : undefined);
  }

  async sendWithKeyboard(chatId: number, text: string, keyboard: string[][]): Promise<number | null> {
    return this.sendChunks(chatId, text, toReplyKeyboard(keyboard));
  }

  async edit(chatId: number, messageId: number, text: string, buttons?: InlineButton[][]): Promise<void> {
    const [first, ...rest] = splitMessage(text);
    const markup = buttons ? toInlineMarkup(buttons) : undefined;
    const firstMarkup = rest.length === 0 ? markup : undefined;

    const isEdited = await this.editChunk(chatId, messageId, first, firstMarkup);
    if (!isEdited) {
      await this.sendChunk(chatId, first, firstMarkup);
    }

    for (let i = 0; i < rest.length; i++) {
      await this.sendChunk(chatId, rest[i], i === rest.length - 1 ? markup : undefined);
    }
  }

  /** Typing indicator; skipped while the chat is cooling down from a 429 */
  async sendTyping(chatId: number): Promise<void> {
    if (this.throttle.checkIsCoolingDown(chatId)) return;
    try {
      await this.telegram.sendChatAction(chatId, 'typing');
    } catch (err) {
      console.error('[Bot] sendChatAction failed:', errorMessage(err));
    }
  }

  private async sendChunks(chatId: number, text: string, markup?: ReplyMarkup): Promise<number | null> {
    const chunks = splitMessage(text);
    let lastId: number | null = null;
    for (let i = 0; i < chunks.length; i++) {
      lastId = await this.sendChunk(chatId, chunks[i], i === chunks.length - 1 ? markup : undefined);
    }
    return lastId;
  }

  /**
   * Send a single chunk with Markdown, falling back to plain text.
   * Returns the sent message ID.
   */
  private async sendChunk(chatId: number, text: string, markup?: ReplyMarkup): Promise<number | null> {
    try {
      const sent = await this.throttle.run(chatId, () =>
        this.telegram.sendMessage(chatId, text, { parse_mode: 'Markdown', reply_markup: markup }),
      );
      return sent.message_id;
    } catch {
      // Markdown failed, retry as plain text
      try {
        const sent = await this.throttle.run(chatId, () =>
          this.telegram.sendMessage(chatId, text, { reply_markup: markup }),
        );
        return sent.message_id;
      } catch (plainErr) {
        console.error('[sendChunk] Plain text also failed:', plainErr);
        return null;
      }
    }
  }

  private async editChunk(chatId: number, messageId: number, text: string, markup?: InlineKeyboardMarkup): Promise<boolean> {
    try {
      await this.throttle.run(chatId, () =>
        this.telegram.editMessageText(chatId, messageId, undefined, text, { parse_mode: 'Markdown', reply_markup: markup }),
      );
      return true;
    } catch (editErr) {
      if (errorMessage(editErr).includes('message is not modified')) return true;
      try {
        await this.throttle.run(chatId, () =>
          this.telegram.editMessageText(chatId, messageId, undefined, text, { reply_markup: markup }),
        );
        return true;
      } catch (plainErr) {
        console.error(`[Bot] Edit of message ${messageId} failed, sending new message:`, errorMessage(plainErr));
        return false;
      }
    }
  }
}
