import * as fs from 'fs';
import * as path from 'path';
import type { InsightRepository } from './repositories/insightRepository';
import type { VaultReader } from './vault/vaultReader';
import { checkIsRecord, extractJson, type LanguageModel } from './llm/languageModel';
import { errorMessage } from './utils';

export const noContextText = 'No context available.';

export type ContextMap = Record<string, unknown>;

export interface GoalSummary {
  primaryGoal: string;
  priorities: string[];
}

export interface ContextManagerOptions {
  /** Deep model used for the vault analysis */
  model: LanguageModel;
  /** Null when no vault is configured */
  reader: VaultReader | null;
  contextMapPath: string;
  insights: InsightRepository;
}

function buildContextPrompt(vaultContent: string): string {
  return `
You are a strategic advisor analyzing a user's knowledge base (Obsidian vault) to extract their current life context and goals.

The user has the following primary pillars in their life right now:
1. Health and fitness.
2. Career and livelihood goals.
3. Quality of life and maintenance.

Analyze the following vault content and extract a structured JSON map.

VAULT CONTENT:
${vaultContent}

OUTPUT FORMAT (JSON ONLY):
{
  "primary_goals": [
    { "goal": "Career Growth", "deadline": null, "description": "...", "priority": "HIGH" },
    { "goal": "Get Fit", "deadline": null, "description": "...", "priority": "HIGH" }
  ],
  "active_projects": ["Project Name 1", "Project Name 2"],
  "skill_gaps": ["Skill 1", "Skill 2"],
  "recent_focus_areas": ["Area 1", "Area 2"],
  "critical_deadlines": [
    { "event": "...", "date": "..." }
  ],
  "identity_context": "Brief summary of who the user is and what they value based on their files."
}

Focus on accuracy. If information isn't found, use null or an empty list.
`;
}

/**
 * @description Owns the cached goal context (`context_map.json`): builds it
 * from the vault with the deep model and serves it to the prompts.
 */
export class ContextManager {
  constructor(private readonly options: ContextManagerOptions) {}

  get hasVault(): boolean {
    return this.options.reader !== null;
  }

  /** Raw context file for prompt injection */
  loadContextText(): string {
    const filePath = this.options.contextMapPath;
    if (!fs.existsSync(filePath)) {
      console.log('[Context] Context map not found, prompts run without it');
      return noContextText;
    }
    try {
      return fs.readFileSync(filePath, 'utf-8');
    } catch (err) {
      console.error('[Context] Failed to read context map:', err);
      return noContextText;
    }
  }

  loadContextMap(): ContextMap {
    const text = this.loadContextText();
    if (text === noContextText) return {};
    try {
      const parsed: unknown = JSON.parse(text);
      return checkIsRecord(parsed) ? parsed : {};
    } catch (err) {
      console.error('[Context] Context map is not valid JSON:', errorMessage(err));
      return {};
    }
  }

  /** First primary goal and the names of all of them, with defaults for an empty map */
  getGoalSummary(): GoalSummary {
    const goals = this.loadContextMap()['primary_goals'];
    const names: string[] = [];
    if (Array.isArray(goals)) {
      for (const goal of goals) {
        if (checkIsRecord(goal) && typeof goal['goal'] === 'string' && goal['goal'].trim()) {
          names.push(goal['goal'].trim());
        }
      }
    }
    return {
      primaryGoal: names[0] ?? 'Career Growth',
      priorities: names.length > 0 ? names : ['Career', 'Fitness', 'Personal Development'],
    };
  }

  /**
   * @description Re-reads the vault, asks the deep model for a context map and
   * caches it. Returns null when there is no vault or the model reply is unusable.
   */
  async generateContextMap(now = Date.now()): Promise<ContextMap | null> {
    const { reader, model, contextMapPath, insights } = this.options;
    if (!reader) {
      console.log('[Context] No vault configured, skipping context refresh');
      return null;
    }

    console.log('[Context] Starting vault analysis...');
    try {
      const vaultContent = reader.getAllContextText();
      const reply = await model.generate(buildContextPrompt(vaultContent));
      const parsed = extractJson(reply);
      if (!checkIsRecord(parsed)) {
        throw new Error('Context map is not a JSON object');
      }

      fs.mkdirSync(path.dirname(path.resolve(contextMapPath)), { recursive: true });
      fs.writeFileSync(contextMapPath, JSON.stringify(parsed, null, 2), 'utf-8');

      console.log(`[Context] Context map saved to ${contextMapPath}`);
      insights.logAudit('context_refresh', 'Regenerated context map from vault analysis.', now);
      return parsed;
    } catch (err) {
      console.error('[Context] Failed to generate context map:', errorMessage(err));
      return null;
    }
  }
}
