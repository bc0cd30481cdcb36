import { checkIsValidTimeZone } from './utils';

export interface AppConfig {
  telegramBotToken: string;
  geminiApiKey: string;
  /** Empty list means every private chat is accepted */
  allowedUsers: number[];
  dbPath: string;
  obsidianVaultPath: string | null;
  geminiModel: string;
  geminiContextModel: string;
  contextMapPath: string;
  tempDir: string;
  /** IANA timezone for cron schedules and day boundaries; null uses the process timezone */
  checkInTimezone: string | null;
}

export type Env = Record<string, string | undefined>;

export const defaultDbPath = 'kairos.db';

function readOptional(env: Env, name: string): string | null {
  const value = env[name]?.trim();
  return value ? value : null;
}

function readRequired(env: Env, name: string): string {
  const value = readOptional(env, name);
  if (!value) {
    throw new Error(`${name} is required`);
  }
  return value;
}

function parseAllowedUsers(raw: string | null): number[] {
  if (!raw) return [];
  return raw
    .split(',')
    .map((part) => part.trim())
    .filter(Boolean)
    .map((part) => {
      if (!/^-?\d+$/.test(part)) {
        throw new Error(`ALLOWED_USERS contains an invalid user ID: ${part}`);
      }
      return Number(part);
    });
}

function readTimeZone(env: Env): string | null {
  const zone = readOptional(env, 'CHECK_IN_TIMEZONE');
  if (zone && !checkIsValidTimeZone(zone)) {
    throw new Error(`CHECK_IN_TIMEZONE is not a known IANA timezone: ${zone}`);
  }
  return zone;
}

export function loadConfig(env: Env = process.env): AppConfig {
  return {
    telegramBotToken: readRequired(env, 'TELEGRAM_BOT_TOKEN'),
    geminiApiKey: readRequired(env, 'GEMINI_API_KEY'),
    allowedUsers: parseAllowedUsers(readOptional(env, 'ALLOWED_USERS')),
    dbPath: readOptional(env, 'DB_PATH') ?? defaultDbPath,
    obsidianVaultPath: readOptional(env, 'OBSIDIAN_VAULT_PATH'),
    geminiModel: readOptional(env, 'GEMINI_MODEL') ?? 'gemini-2.5-flash',
    geminiContextModel: readOptional(env, 'GEMINI_CONTEXT_MODEL') ?? 'gemini-2.5-pro',
    contextMapPath: readOptional(env, 'CONTEXT_MAP_PATH') ?? 'data/context_map.json',
    tempDir: readOptional(env, 'TEMP_DIR') ?? 'data/temp',
    checkInTimezone: readTimeZone(env),
  };
}
