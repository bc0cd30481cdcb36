import type { Priority, TriageResult } from './types';
import type { ContextManager } from './contextManager';
import type { PatternManager } from './patternManager';
import type { TodoRepository } from './repositories/todoRepository';
import { checkIsRecord, extractJson, readNumber, readString, type LanguageModel, type MediaAttachment } from './llm/languageModel';
import { addDays, errorMessage, getWeekdayName, normalizeClockTime, parseIsoDate, toIsoDate } from './utils';

export interface ParsedDateTime {
  dueDate: string;
  dueTime: string | null;
}

const overrideInstruction = `
HUMAN OVERRIDE ACTIVE: The user has explicitly invoked "human override".
You MUST:
1. Respect ANY priority, category, or date the user specifies - do NOT override their choice
2. Set pushback to null (no pushback when user overrides)
3. Set suggested_alternative to null
4. If user says "priority HIGH", set priority to HIGH regardless of your analysis
5. Still parse dates correctly
`;

export function checkIsHumanOverride(input: string): boolean {
  return input.toLowerCase().includes('human override');
}

function toPriority(value: string | null): Priority {
  const upper = value?.toUpperCase();
  return upper === 'HIGH' || upper === 'LOW' ? upper : 'MEDIUM';
}

function readDate(record: Record<string, unknown>, key: string): string | null {
  const value = readString(record, key);
  return value && parseIsoDate(value) ? value : null;
}

function readTime(record: Record<string, unknown>, key: string): string | null {
  const value = readString(record, key);
  return value ? normalizeClockTime(value) : null;
}

function clampScore(value: number | null): number {
  if (value === null) return 0;
  return Math.min(10, Math.max(0, value));
}

/**
 * @description Turn whatever the model returned into a complete TriageResult.
 * Unknown priorities become MEDIUM, dates that are not `YYYY-MM-DD` are dropped,
 * and an active human override clears pushback and alternatives.
 */
export function normalizeTriage(raw: Record<string, unknown>, input: string): TriageResult {
  const override = checkIsHumanOverride(input);
  return {
    taskName: readString(raw, 'task_name') ?? input.slice(0, 50),
    category: readString(raw, 'category') ?? 'General',
    priority: toPriority(readString(raw, 'priority')),
    dueDate: readDate(raw, 'due_date'),
    dueTime: readTime(raw, 'due_time'),
    recurrence: readString(raw, 'recurrence'),
    schedulingUnclear: raw['scheduling_unclear'] === true,
    reasoning: readString(raw, 'reasoning') ?? '',
    alignmentScore: clampScore(readNumber(raw, 'alignment_score')),
    pushback: override ? null : readString(raw, 'pushback'),
    suggestedAlternative: override ? null : readString(raw, 'suggested_alternative'),
    clarificationNeeded: readString(raw, 'clarification_needed'),
  };
}

export function fallbackTriage(input: string, err: unknown): TriageResult {
  return {
    taskName: input.slice(0, 50),
    category: 'Unknown',
    priority: 'MEDIUM',
    dueDate: null,
    dueTime: null,
    recurrence: null,
    schedulingUnclear: false,
    reasoning: `Triage engine error: ${errorMessage(err)}`,
    alignmentScore: 0,
    pushback: null,
    suggestedAlternative: null,
    clarificationNeeded: null,
  };
}

/** `2026-02-01` or `2026-02-01 14:00`, without asking the model */
export function parseIsoDateTime(text: string): ParsedDateTime | null {
  const match = /^(\d{4}-\d{2}-\d{2})(?:\s+(\d{1,2}:\d{2}))?$/.exec(text.trim());
  if (!match || !parseIsoDate(match[1])) return null;
  if (match[2] === undefined) return { dueDate: match[1], dueTime: null };
  const dueTime = normalizeClockTime(match[2]);
  return dueTime ? { dueDate: match[1], dueTime } : null;
}

/**
 * @description Gemini-backed task triage, plus the smaller prompts that share
 * its context: natural-language dates and free-form questions.
 */
export class TriageEngine {
  constructor(
    private readonly model: LanguageModel,
    private readonly context: ContextManager,
    private readonly patterns: PatternManager,
    private readonly todos: TodoRepository,
  ) {}

  buildTriagePrompt(input: string, now: Date): string {
    const currentDate = toIsoDate(now);
    const currentDay = getWeekdayName(now);
    const patterns = this.patterns.getActivePatterns();
    const patternsText = patterns.length > 0
      ? patterns.map((p) => `- ${p}`).join('\n')
      : 'No recurring patterns detected yet.';

    return `
You are an intelligent triage agent for "Kairos - Life Sorter".
Your goal is to categorize and prioritize a new task based on the user's strategic context and learned patterns.

CURRENT DATE: ${currentDate} (${currentDay})

USER STRATEGIC CONTEXT:
${this.context.loadContextText()}

LEARNED USER PATTERNS (Overrides):
${patternsText}

NEW INPUT:
${input}
${checkIsHumanOverride(input) ? overrideInstruction : ''}
ANALYSIS RULES:
1. Alignment: Does this align with "Get Fit", "Career Growth", or "Live a Good Quality Life" (daily maintenance/hygiene)?
2. Priority:
   - HIGH: Directly impacts the critical career deadline or critical health.
   - MEDIUM: Aligned with Career/Fitness. Routine "Quality Life" tasks (hygiene, chores) should be MEDIUM or LOW unless critical.
   - LOW: Tangential, curiosity-driven, hobbies, or minor daily maintenance.
3. Pushback:
   - If a task is misaligned (not in the 3 pillars), provide "Strategic Pushback".
   - Do NOT push back on "Live a Good Quality Life" tasks (brushing, showering, etc.), but categorize them as MEDIUM/LOW.
   - Push back on excessive distractions (e.g., "watch 10 hours of TV").
4. Alternatives: If priority is LOW and task is a distraction, suggest 1-2 specific high-priority alternatives.

DATE PARSING RULES:
- ALWAYS convert natural language dates to YYYY-MM-DD format using the CURRENT DATE above as reference.
- "saturday" or "coming saturday" → the next Saturday after ${currentDate}
- "tomorrow" → ${toIsoDate(addDays(now, 1))}
- "day after tomorrow" → ${toIsoDate(addDays(now, 2))}
- "next week" → ${toIsoDate(addDays(now, 7))}
- If a date is mentioned (even informally like "friday", "this weekend"), you MUST return a valid YYYY-MM-DD. If unable, ask user for clarification.
- Only return null if the user explicitly says "no date", "unscheduled", or truly never mentions any timeframe.

OUTPUT FORMAT (JSON ONLY):
{
  "task_name": "Concise version of the task",
  "category": "Career | Fitness | Projects | Personal | Hobby",
  "priority": "HIGH | MEDIUM | LOW",
  "due_date": "YYYY-MM-DD or null if truly no date mentioned",
  "due_time": "HH:MM (24hr format) or null if not mentioned or only a date was given",
  "recurrence": "daily | weekly | weekly:Mon,Wed | monthly | every X days | null",
  "scheduling_unclear": true if the user mentioned a deadline vaguely like 'soon'/'later'/'eventually', false otherwise,
  "reasoning": "Brief explanation of why this priority/category was chosen",
  "alignment_score": 0-10,
  "pushback": "Message to user if priority is LOW or alignment is weak, otherwise null",
  "suggested_alternative": "A suggested high-priority task based on context, otherwise null",
  "clarification_needed": "Ask a specific question if the task purpose is unclear, otherwise null"
}
`;
  }

  /** Never throws: model or parse failures yield the fallback triage */
  async triageTask(input: string, now = new Date(), attachments: MediaAttachment[] = []): Promise<TriageResult> {
    if (checkIsHumanOverride(input)) {
      console.log('[Triage] Human override detected in input');
    }
    try {
      const reply = await this.model.generate(this.buildTriagePrompt(input, now), attachments);
      const parsed = extractJson(reply);
      if (!checkIsRecord(parsed)) {
        throw new Error('Triage reply is not a JSON object');
      }
      return normalizeTriage(parsed, input);
    } catch (err) {
      console.error('[Triage] Triage failed:', errorMessage(err));
      return fallbackTriage(input, err);
    }
  }

  /** Returns null when no date can be determined */
  async parseDateTime(text: string, now = new Date()): Promise<ParsedDateTime | null> {
    const direct = parseIsoDateTime(text);
    if (direct) return direct;

    const prompt = `
Parse the following date/time string and return JSON:
Input: "${text}"
Current date: ${toIsoDate(now)} (${getWeekdayName(now)})

Return ONLY valid JSON:
{
  "due_date": "YYYY-MM-DD",
  "due_time": "HH:MM" or null if no time specified
}
`;
    try {
      const parsed = extractJson(await this.model.generate(prompt));
      if (!checkIsRecord(parsed)) return null;
      const dueDate = readDate(parsed, 'due_date');
      if (!dueDate) return null;
      return { dueDate, dueTime: readTime(parsed, 'due_time') };
    } catch (err) {
      console.error('[Triage] Date parsing failed:', errorMessage(err));
      return null;
    }
  }

  async answerQuery(question: string): Promise<string> {
    const recent = this.todos.listRecent(10);
    const tasksText = recent.length > 0
      ? 'RECENT TASKS FROM DATABASE:\n' +
        recent.map((t) => `- [${t.priority ?? 'MEDIUM'}] ${t.task} (Due: ${t.dueDate ?? 'Unscheduled'})`).join('\n')
      : 'No recent tasks found in database.';

    const prompt = `
You are Kairos, a strategic advisor. Answer the following question based on the user's vault context and recent tasks.

VAULT CONTEXT:
${this.context.loadContextText()}

${tasksText}

USER QUESTION:
${question}

Provide a concise, helpful answer. If the answer is in the recent tasks, highlight that.
`;
    return (await this.model.generate(prompt)).trim();
  }
}
