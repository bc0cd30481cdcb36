#!/usr/bin/env node
import 'dotenv/config';
import { Telegram } from 'telegraf';
import { Storage, requiredTables } from './storage';
import { defaultDbPath, loadConfig, type AppConfig, type Env } from './config';
import { errorMessage, formatDueDisplay } from './utils';

export interface VerifyCheck {
  name: string;
  ok: boolean;
  detail: string;
}

/** Resolves the bot username for a token; throws when Telegram rejects it */
export type TokenChecker = (token: string) => Promise<string>;

const usage = 'Usage: kairos-db <inspect|clean|verify>';

export function describeDatabase(storage: Storage): string[] {
  const lines = [
    `Database: ${storage.dbPath}`,
    `Tables: ${storage.listTables().join(', ')}`,
    `Todo columns: ${storage.listColumns('todos').join(', ')}`,
  ];

  const recent = storage.todos.listRecent(20);
  if (recent.length === 0) {
    lines.push('No todos yet.');
    return lines;
  }

  lines.push(`Recent todos (${recent.length}):`);
  for (const todo of recent) {
    const due = formatDueDisplay(todo.dueDate, todo.dueTime, todo.isScheduled);
    lines.push(`  [${todo.id}] ${todo.status} | ${todo.priority ?? '-'} | ${todo.task} | ${due}`);
  }
  return lines;
}

export function cleanDatabase(storage: Storage): string[] {
  const cleared = storage.clearTaskData();
  return [
    ...Object.entries(cleared).map(([table, rows]) => `Cleared ${rows} rows from ${table}`),
    'Autoincrement counters reset.',
  ];
}

/**
 * @description Startup preflight: configuration, database schema and the
 * Telegram token. The token is only checked once the configuration loads.
 */
export async function verifySetup(env: Env, checkToken: TokenChecker): Promise<VerifyCheck[]> {
  const checks: VerifyCheck[] = [];

  let config: AppConfig | null = null;
  try {
    config = loadConfig(env);
    checks.push({ name: 'configuration', ok: true, detail: 'required variables present' });
  } catch (err) {
    checks.push({ name: 'configuration', ok: false, detail: errorMessage(err) });
  }

  const dbPath = config?.dbPath ?? (env.DB_PATH?.trim() || defaultDbPath);
  try {
    const storage = new Storage(dbPath);
    try {
      const tables = storage.listTables();
      const missing = requiredTables.filter((table) => !tables.includes(table));
      checks.push(missing.length === 0
        ? { name: 'database', ok: true, detail: `${requiredTables.length} tables in ${dbPath}` }
        : { name: 'database', ok: false, detail: `missing tables: ${missing.join(', ')}` });
    } finally {
      storage.close();
    }
  } catch (err) {
    checks.push({ name: 'database', ok: false, detail: errorMessage(err) });
  }

  if (!config) {
    checks.push({ name: 'telegram', ok: false, detail: 'skipped, configuration incomplete' });
    return checks;
  }

  try {
    const username = await checkToken(config.telegramBotToken);
    checks.push({ name: 'telegram', ok: true, detail: `connected as @${username}` });
  } catch (err) {
    checks.push({ name: 'telegram', ok: false, detail: errorMessage(err) });
  }
  return checks;
}

export function formatChecks(checks: VerifyCheck[]): string[] {
  return checks.map((check) => `${check.ok ? '✅' : '❌'} ${check.name}: ${check.detail}`);
}

const checkTelegramToken: TokenChecker = async (token) => {
  const me = await new Telegram(token).getMe();
  return me.username;
};

async function main(args: string[]): Promise<number> {
  const command = args[0];
  const dbPath = process.env.DB_PATH?.trim() || defaultDbPath;

  switch (command) {
    case 'inspect':
    case 'clean': {
      const storage = new Storage(dbPath);
      try {
        const lines = command === 'inspect' ? describeDatabase(storage) : cleanDatabase(storage);
        lines.forEach((line) => console.log(line));
      } finally {
        storage.close();
      }
      return 0;
    }
    case 'verify': {
      const checks = await verifySetup(process.env, checkTelegramToken);
      formatChecks(checks).forEach((line) => console.log(line));
      return checks.every((check) => check.ok) ? 0 : 1;
    }
    default:
      console.error(usage);
      return 1;
  }
}

if (require.main === module) {
  main(process.argv.slice(2))
    .then((code) => process.exit(code))
    .catch((err) => {
      console.error('[Storage] Maintenance failed:', err);
      process.exit(1);
    });
}
