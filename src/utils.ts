export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

// ═══════════════════════════════════════════
//  Dates (calendar of the configured timezone)
// ═══════════════════════════════════════════

const weekdayNames = ['Sunday', 'Monday', 'Tuesday', 'Wednesday', 'Thursday', 'Friday', 'Saturday'];
const weekdayShortNames = weekdayNames.map((name) => name.slice(0, 3));
const monthShortNames = ['Jan', 'Feb', 'Mar', 'Apr', 'May', 'Jun', 'Jul', 'Aug', 'Sep', 'Oct', 'Nov', 'Dec'];

interface CalendarParts {
  year: number;
  /** 0-based, like Date#getMonth */
  month: number;
  day: number;
  hours: number;
  minutes: number;
  seconds: number;
  /** 0 = Sunday */
  weekday: number;
}

let activeTimeZone: string | null = null;
const zoneFormatters = new Map<string, Intl.DateTimeFormat>();

export function checkIsValidTimeZone(zone: string): boolean {
  try {
    new Intl.DateTimeFormat('en-US', { timeZone: zone });
    return true;
  } catch {
    return false;
  }
}

/**
 * @description Sets the IANA zone that days, weekdays and clock times are
 * read in. Null falls back to the process timezone.
 */
export function setTimeZone(zone: string | null): void {
  if (zone !== null && !checkIsValidTimeZone(zone)) {
    throw new Error(`Unknown timezone: ${zone}`);
  }
  activeTimeZone = zone;
}

export function getTimeZone(): string | null {
  return activeTimeZone;
}

function getZoneFormatter(zone: string): Intl.DateTimeFormat {
  let formatter = zoneFormatters.get(zone);
  if (!formatter) {
    formatter = new Intl.DateTimeFormat('en-US', {
      timeZone: zone,
      hourCycle: 'h23',
      year: 'numeric',
      month: 'numeric',
      day: 'numeric',
      hour: 'numeric',
      minute: 'numeric',
      second: 'numeric',
      weekday: 'short',
    });
    zoneFormatters.set(zone, formatter);
  }
  return formatter;
}

function getCalendarParts(date: Date): CalendarParts {
  if (!activeTimeZone) {
    return {
      year: date.getFullYear(),
      month: date.getMonth(),
      day: date.getDate(),
      hours: date.getHours(),
      minutes: date.getMinutes(),
      seconds: date.getSeconds(),
      weekday: date.getDay(),
    };
  }

  const values = new Map<string, string>();
  for (const part of getZoneFormatter(activeTimeZone).formatToParts(date)) {
    values.set(part.type, part.value);
  }
  const read = (type: string): number => Number(values.get(type));
  return {
    year: read('year'),
    month: read('month') - 1,
    day: read('day'),
    hours: read('hour'),
    minutes: read('minute'),
    seconds: read('second'),
    weekday: weekdayShortNames.indexOf(values.get('weekday') ?? ''),
  };
}

/** How far the active zone's wall clock is ahead of UTC at `date` */
function getZoneOffsetMs(date: Date): number {
  const parts = getCalendarParts(date);
  const wallClock = Date.UTC(parts.year, parts.month, parts.day, parts.hours, parts.minutes, parts.seconds);
  return wallClock - Math.floor(date.getTime() / 1000) * 1000;
}

/** Like the local `new Date(y, m, d, ...)`, in the active zone. Out-of-range fields roll over. */
function makeDate(year: number, month: number, day: number, hours = 0, minutes = 0, seconds = 0, ms = 0): Date {
  if (!activeTimeZone) return new Date(year, month, day, hours, minutes, seconds, ms);

  const wallClock = Date.UTC(year, month, day, hours, minutes, seconds, ms);
  const guess = wallClock - getZoneOffsetMs(new Date(wallClock));
  // Re-read the offset at the guess so DST changes between the two land right
  return new Date(wallClock - getZoneOffsetMs(new Date(guess)));
}

function getDaysInMonth(year: number, month: number): number {
  return new Date(Date.UTC(year, month + 1, 0)).getUTCDate();
}

function pad2(n: number): string {
  return n.toString().padStart(2, '0');
}

/** `YYYY-MM-DD` */
export function toIsoDate(date: Date): string {
  const { year, month, day } = getCalendarParts(date);
  return `${year}-${pad2(month + 1)}-${pad2(day)}`;
}

/** `YYYY-MM-DD HH:MM:SS` */
export function toLocalTimestamp(date: Date): string {
  const { hours, minutes, seconds } = getCalendarParts(date);
  return `${toIsoDate(date)} ${pad2(hours)}:${pad2(minutes)}:${pad2(seconds)}`;
}

/** 0 = Sunday */
export function getWeekday(date: Date): number {
  return getCalendarParts(date).weekday;
}

export function getWeekdayName(date: Date): string {
  return weekdayNames[getWeekday(date)];
}

/** Parse strict `YYYY-MM-DD` into that day's midnight, or null */
export function parseIsoDate(value: string): Date | null {
  const match = /^(\d{4})-(\d{2})-(\d{2})$/.exec(value.trim());
  if (!match) return null;
  const year = Number(match[1]);
  const month = Number(match[2]) - 1;
  const day = Number(match[3]);
  if (month < 0 || month > 11 || day < 1 || day > getDaysInMonth(year, month)) {
    return null;
  }
  return makeDate(year, month, day);
}

/** Parse strict 24h `HH:MM`, or null */
export function parseClockTime(value: string): { hours: number; minutes: number } | null {
  const match = /^(\d{1,2}):(\d{2})$/.exec(value.trim());
  if (!match) return null;
  const hours = Number(match[1]);
  const minutes = Number(match[2]);
  if (hours > 23 || minutes > 59) return null;
  return { hours, minutes };
}

export function normalizeClockTime(value: string): string | null {
  const parsed = parseClockTime(value);
  return parsed ? `${pad2(parsed.hours)}:${pad2(parsed.minutes)}` : null;
}

/** Midnight `days` calendar days after `date` */
export function addDays(date: Date, days: number): Date {
  const { year, month, day } = getCalendarParts(date);
  return makeDate(year, month, day + days);
}

/** Adds calendar months, clamping to the last day of the target month */
export function addMonths(date: Date, months: number): Date {
  const { year, month, day } = getCalendarParts(date);
  const target = new Date(Date.UTC(year, month + months, 1));
  const targetYear = target.getUTCFullYear();
  const targetMonth = target.getUTCMonth();
  return makeDate(targetYear, targetMonth, Math.min(day, getDaysInMonth(targetYear, targetMonth)));
}

/** Same calendar day as `date`, at `hours:minutes` */
export function atClockTime(date: Date, hours: number, minutes: number): Date {
  const { year, month, day } = getCalendarParts(date);
  return makeDate(year, month, day, hours, minutes);
}

export function startOfDay(date: Date): Date {
  return atClockTime(date, 0, 0);
}

export function endOfDay(date: Date): Date {
  const { year, month, day } = getCalendarParts(date);
  return makeDate(year, month, day, 23, 59, 59, 999);
}

/** `2026-01-29` → `29-01-2026`; anything unparseable is returned as-is */
export function formatDayFirst(isoDate: string): string {
  const date = parseIsoDate(isoDate);
  if (!date) return isoDate;
  const { year, month, day } = getCalendarParts(date);
  return `${pad2(day)}-${pad2(month + 1)}-${year}`;
}

/** `14:30` → `2:30 PM`; anything unparseable is returned as-is */
export function formatTwelveHour(clock: string): string {
  const parsed = parseClockTime(clock);
  if (!parsed) return clock;
  const suffix = parsed.hours < 12 ? 'AM' : 'PM';
  const hours = parsed.hours % 12 === 0 ? 12 : parsed.hours % 12;
  return `${hours}:${pad2(parsed.minutes)} ${suffix}`;
}

/** `Mon, Feb 02` */
export function formatShortDate(date: Date): string {
  const { month, day, weekday } = getCalendarParts(date);
  return `${weekdayShortNames[weekday]}, ${monthShortNames[month]} ${pad2(day)}`;
}

/**
 * @description User-facing due label: `29-01-2026 @ 2:30 PM`, `29-01-2026`,
 * or `📅 Unscheduled` when the task has no date.
 */
export function formatDueDisplay(dueDate: string | null, dueTime: string | null, isScheduled = true): string {
  if (!isScheduled || !dueDate) return '📅 Unscheduled';
  const datePart = formatDayFirst(dueDate);
  if (!dueTime) return datePart;
  return `${datePart} @ ${formatTwelveHour(dueTime)}`;
}

// ═══════════════════════════════════════════
//  Text
// ═══════════════════════════════════════════

export function truncate(text: string, maxLength: number): string {
  return text.length > maxLength ? text.slice(0, maxLength - 3) + '...' : text;
}

/**
 * Split a long message into chunks that fit Telegram's 4096 char limit.
 * Prefers newline boundaries in the second half of a chunk.
 */
export function splitMessage(text: string, maxLen = 4000): string[] {
  if (text.length <= maxLen) return [text];

  const parts: string[] = [];
  let remaining = text;

  while (remaining.length > 0) {
    if (remaining.length <= maxLen) {
      parts.push(remaining);
      break;
    }

    let cutAt = maxLen;
    const lastNewline = remaining.lastIndexOf('\n', maxLen);
    if (lastNewline > maxLen * 0.5) {
      cutAt = lastNewline;
    }

    parts.push(remaining.slice(0, cutAt));
    remaining = remaining.slice(cutAt).replace(/^\n/, '');
  }

  return parts;
}

/** Escape characters that legacy Telegram Markdown would interpret */
export function escapeMarkdown(text: string): string {
  return text
    .replace(/\*/g, '\\*')
    .replace(/_/g, '\\_')
    .replace(/\[/g, '\\[')
    .replace(/`/g, '\\`');
}
