import { Telegraf, type Context } from 'telegraf';
import { message } from 'telegraf/filters';
import type { AppConfig } from './config';
import { Storage } from './storage';
import { GeminiModel } from './llm/geminiModel';
import { VaultReader } from './vault/vaultReader';
import { VaultWriter } from './vault/vaultWriter';
import { ContextManager } from './contextManager';
import { PatternManager } from './patternManager';
import { TriageEngine } from './triageEngine';
import { TaskService } from './taskService';
import { ConversationStore } from './conversation';
import { CheckInManager } from './checkIns/checkInManager';
import { ActivityAnalyzer } from './checkIns/activityAnalyzer';
import { CheckInScheduler } from './checkIns/checkInScheduler';
import { ProductivityReporter } from './productivityReporter';
import { MediaTranscriber, downloadFile, getTempPath, type MediaKind } from './mediaInput';
import { ChatController, commandMenu, type ChatUser } from './chatController';
import { TelegramSender } from './telegramSender';
import { resolveAccess } from './access';
import { errorMessage, setTimeZone } from './utils';

export interface BotApp {
  bot: Telegraf;
  storage: Storage;
  sender: TelegramSender;
  scheduler: CheckInScheduler;
  controller: ChatController;
}

function toChatUser(ctx: Context): ChatUser {
  return {
    id: ctx.from?.id ?? 0,
    username: ctx.from?.username,
    firstName: ctx.from?.first_name,
  };
}

/** Wires storage, models and services together and registers the Telegram handlers */
export function createBotApp(config: AppConfig): BotApp {
  setTimeZone(config.checkInTimezone);

  const bot = new Telegraf(config.telegramBotToken);
  const storage = new Storage(config.dbPath);
  const { todos, checkIns, insights } = storage;

  const model = new GeminiModel(config.geminiApiKey, config.geminiModel);
  const contextModel = new GeminiModel(config.geminiApiKey, config.geminiContextModel);
  const vaultPath = config.obsidianVaultPath;

  const context = new ContextManager({
    model: contextModel,
    reader: vaultPath ? new VaultReader(vaultPath) : null,
    contextMapPath: config.contextMapPath,
    insights,
  });
  const patterns = new PatternManager(model, todos, insights);
  const triage = new TriageEngine(model, context, patterns, todos);
  const tasks = new TaskService({
    todos,
    insights,
    triage,
    patterns,
    writer: vaultPath ? new VaultWriter(vaultPath) : null,
  });

  const sender = new TelegramSender(bot.telegram);
  const conversations = new ConversationStore();
  const checkInManager = new CheckInManager(checkIns, sender);
  const reporter = new ProductivityReporter(checkIns, insights);
  const scheduler = new CheckInScheduler({
    checkIns,
    manager: checkInManager,
    reporter,
    patterns,
    notifier: sender,
    checkIsBusy: (chatId) => conversations.checkIsBusy(chatId),
    timezone: config.checkInTimezone,
  });

  const controller = new ChatController({
    sender,
    conversations,
    todos,
    insights,
    checkIns,
    tasks,
    triage,
    context,
    checkInManager,
    analyzer: new ActivityAnalyzer(model, todos, checkIns, context),
    reporter,
    scheduler,
    media: new MediaTranscriber(model),
  });

  // ═══════════════════════════════════════════
  //  Access guard
  // ═══════════════════════════════════════════

  bot.use(async (ctx, next) => {
    const access = resolveAccess(ctx.chat?.type, ctx.from?.id, config.allowedUsers);
    if (access === 'privateOnly') {
      if (ctx.message) await ctx.reply('This bot works only in private messages.');
      return;
    }
    if (access === 'denied') {
      console.log(`[Bot] Access denied for user ${ctx.from?.id ?? 'unknown'}`);
      if (ctx.message) await ctx.reply('Access denied.');
      return;
    }
    await next();
  });

  // ═══════════════════════════════════════════
  //  Commands
  // ═══════════════════════════════════════════

  for (const { command } of commandMenu) {
    bot.command(command, async (ctx) => {
      await controller.handleCommand(ctx.chat.id, toChatUser(ctx), command, ctx.payload);
    });
  }

  // ═══════════════════════════════════════════
  //  Message handlers
  // ═══════════════════════════════════════════

  bot.on(message('text'), async (ctx) => {
    const text = ctx.message.text.trim();
    if (text.startsWith('/')) {
      await sender.send(ctx.chat.id, 'Unknown command. Use /help to see what I can do.');
      return;
    }
    await sender.sendTyping(ctx.chat.id);
    await controller.handleText(ctx.chat.id, toChatUser(ctx), text);
  });

  const handleMedia = async (chatId: number, kind: MediaKind, fileId: string, caption: string | null) => {
    try {
      const url = await bot.telegram.getFileLink(fileId);
      const tempPath = getTempPath(config.tempDir, fileId, kind);
      await downloadFile(url.href, tempPath);
      await controller.handleMedia(chatId, kind, tempPath, caption);
    } catch (err) {
      console.error(`[Bot] ${kind} handling error:`, errorMessage(err));
      await sender.send(chatId, `❌ Error processing ${kind} message`);
    }
  };

  bot.on(message('voice'), async (ctx) => {
    await handleMedia(ctx.chat.id, 'voice', ctx.message.voice.file_id, null);
  });

  bot.on(message('photo'), async (ctx) => {
    const photos = ctx.message.photo;
    const largest = photos[photos.length - 1];
    if (!largest) return;
    await handleMedia(ctx.chat.id, 'photo', largest.file_id, ctx.message.caption ?? null);
  });

  bot.action(/.+/, async (ctx) => {
    await ctx.answerCbQuery();
    const chatId = ctx.chat?.id;
    if (chatId === undefined) return;
    await controller.handleCallback(chatId, ctx.match[0]);
  });

  bot.catch((err, ctx) => {
    console.error(`[Bot] Unhandled error in ${ctx.updateType} update:`, err);
  });

  return { bot, storage, sender, scheduler, controller };
}

// ═══════════════════════════════════════════
//  Bot startup
// ═══════════════════════════════════════════

export async function startBot(config: AppConfig): Promise<void> {
  console.log('');
  console.log('=================================');
  console.log('  Kairos Telegram Bot starting...');
  console.log('=================================');
  console.log(`Allowed users: ${config.allowedUsers.length > 0 ? config.allowedUsers.join(', ') : 'any private chat'}`);
  console.log(`Database: ${config.dbPath}`);
  console.log(`Vault: ${config.obsidianVaultPath ?? '(not configured)'}`);
  console.log(`Models: ${config.geminiModel} / ${config.geminiContextModel}`);
  console.log(`Timezone: ${config.checkInTimezone ?? 'process local'}`);

  const { bot, storage, scheduler } = createBotApp(config);

  const shutdown = (signal: string) => {
    console.log(`\n${signal} received, shutting down...`);
    scheduler.stop();
    bot.stop(signal);
    storage.close();
    process.exit(0);
  };

  process.once('SIGINT', () => shutdown('SIGINT'));
  process.once('SIGTERM', () => shutdown('SIGTERM'));

  console.log('Testing Telegram API connection...');
  try {
    const botInfo = await bot.telegram.getMe();
    console.log(`Bot info: @${botInfo.username} (${botInfo.id})`);

    await bot.telegram.setMyCommands([...commandMenu]);
    console.log('Bot commands menu set');
  } catch (err) {
    console.error('Failed to connect to Telegram API:', err);
    throw err;
  }

  scheduler.start();

  console.log('Launching Telegraf bot (long polling)...');
  bot.launch({ dropPendingUpdates: true }).catch((err) => {
    console.error('Bot polling stopped:', err);
    scheduler.stop();
    storage.close();
    process.exit(1);
  });
  console.log('');
  console.log('Bot is running! Waiting for messages...');
  console.log('Press Ctrl+C to stop');
  console.log('');
}
