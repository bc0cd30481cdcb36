import type { InsightRepository } from './repositories/insightRepository';
import type { TodoRepository } from './repositories/todoRepository';
import type { LanguageModel } from './llm/languageModel';
import { errorMessage } from './utils';

const minOverrides = 3;
const patternConfidence = 0.8;
export const overridePatternType = 'Override';

/**
 * @description Learns from Force Sync overrides: when the user keeps syncing
 * tasks the triage pushed back on, the model summarizes the theme as a
 * pattern that later triage prompts take into account.
 */
export class PatternManager {
  constructor(
    private readonly model: LanguageModel,
    private readonly todos: TodoRepository,
    private readonly insights: InsightRepository,
  ) {}

  getActivePatterns(): string[] {
    try {
      return this.insights.listActivePatterns(0.7);
    } catch (err) {
      console.error('[Patterns] Failed to fetch patterns:', err);
      return [];
    }
  }

  /** Returns the detected pattern, or null when there is none (or too little data) */
  async analyzeOverrides(now = Date.now()): Promise<string | null> {
    console.log('[Patterns] Analyzing manual overrides...');

    try {
      const overrides = this.insights.listAudit('manual_sync', 20);
      if (overrides.length < minOverrides) {
        console.log('[Patterns] Not enough overrides to detect patterns yet');
        return null;
      }

      const details: string[] = [];
      for (const entry of overrides) {
        const match = /todo (\d+)/.exec(entry.details);
        if (!match) continue;
        const todo = this.todos.get(Number(match[1]));
        if (todo) {
          details.push(`Task: ${todo.task} | Category: ${todo.category ?? 'General'} | AI Reasoning: ${todo.reasoning ?? ''}`);
        }
      }
      if (details.length === 0) return null;

      const prompt = `
Analyze the following list of tasks that the user FORCED to sync, overriding my strategic pushback.
Identify if there is a recurring theme or pattern (e.g., "The user always wants to sync grocery lists despite low career alignment").

OVERRIDDEN TASKS:
${details.join('\n')}

If a pattern is found, output a single sentence description of the pattern.
If no clear pattern is found, output "NONE".

Format: A simple string.
`;
      const patternText = (await this.model.generate(prompt)).trim();
      if (!patternText || patternText.toUpperCase() === 'NONE') {
        return null;
      }

      this.insights.savePattern(overridePatternType, patternText, patternConfidence, now);
      this.insights.logAudit('pattern_detected', patternText, now);
      console.log(`[Patterns] New pattern detected: ${patternText}`);
      return patternText;
    } catch (err) {
      console.error('[Patterns] Pattern analysis failed:', errorMessage(err));
      return null;
    }
  }
}
