import type { ActivityAnalysis, ProductivityType, Todo } from '../types';
import type { CheckInRepository } from '../repositories/checkInRepository';
import type { TodoRepository } from '../repositories/todoRepository';
import type { ContextManager, GoalSummary } from '../contextManager';
import { checkIsRecord, extractJson, readNumber, readString, type LanguageModel } from '../llm/languageModel';
import { errorMessage } from '../utils';

function toProductivityType(value: string | null): ProductivityType {
  const lower = value?.toLowerCase();
  return lower === 'aligned' || lower === 'wasted' ? lower : 'beneficial';
}

export function fallbackAnalysis(userResponse: string, reasoning: string, feedback: string): ActivityAnalysis {
  return {
    activitySummary: userResponse.slice(0, 100),
    productivityType: 'beneficial',
    matchedTodoId: null,
    alignmentScore: 5,
    category: 'Unknown',
    reasoning,
    feedback,
  };
}

/**
 * @description Normalize the model's analysis. A matched todo ID only counts
 * when it was one of the todos offered in the prompt.
 */
export function normalizeAnalysis(raw: Record<string, unknown>, userResponse: string, offered: Todo[]): ActivityAnalysis {
  const matched = readNumber(raw, 'matched_todo_id');
  const score = readNumber(raw, 'alignment_score');
  return {
    activitySummary: readString(raw, 'activity_summary') ?? userResponse.slice(0, 100),
    productivityType: toProductivityType(readString(raw, 'productivity_type')),
    matchedTodoId: matched !== null && offered.some((todo) => todo.id === matched) ? matched : null,
    alignmentScore: score === null ? 5 : Math.min(10, Math.max(0, score)),
    category: readString(raw, 'category') ?? 'Unknown',
    reasoning: readString(raw, 'reasoning') ?? '',
    feedback: readString(raw, 'feedback') ?? 'Activity logged.',
  };
}

export function buildAnalysisPrompt(userResponse: string, todos: Todo[], goals: GoalSummary): string {
  const todosText = todos.length > 0
    ? todos.map((t) => `- [ID: ${t.id}] ${t.task} (Category: ${t.category ?? 'General'}, Priority: ${t.priority ?? 'MEDIUM'})`).join('\n')
    : 'No active high-priority todos found.';

  return `You are an AI productivity coach analyzing hourly activity logs.

USER CONTEXT:
- Primary Goal: ${goals.primaryGoal}
- Priorities: ${goals.priorities.join(', ')}

ACTIVE TODO LIST:
${todosText}

USER'S HOURLY ACTIVITY:
"${userResponse}"

TASK:
Analyze this activity and determine:
1. Is it directly working on a todo? If yes, which one (provide ID)?
2. Productivity type:
   - "aligned": Working on a specific todo from the list
   - "beneficial": Productive and goal-aligned but not on todo list
   - "wasted": Unproductive time not contributing to goals
3. Alignment score: 0-10 (0=totally wasted, 10=perfectly aligned with primary goal)
4. Category: Career, Fitness, Personal, Entertainment, etc.
5. Brief reasoning
6. Encouraging feedback message (1-2 sentences)

IMPORTANT:
- Be honest about "wasted" time - YouTube/social media/gaming should be marked as wasted unless directly work-related
- Only mark as "aligned" if it directly matches a todo
- Be encouraging but truthful

Respond ONLY with valid JSON (no markdown, no extra text):
{
  "activity_summary": "Brief summary of what user did",
  "productivity_type": "aligned|beneficial|wasted",
  "matched_todo_id": 15 or null,
  "alignment_score": 7,
  "category": "Career",
  "reasoning": "Why you categorized it this way",
  "feedback": "Encouraging message for user"
}`;
}

export class ActivityAnalyzer {
  constructor(
    private readonly model: LanguageModel,
    private readonly todos: TodoRepository,
    private readonly checkIns: CheckInRepository,
    private readonly context: ContextManager,
  ) {}

  /**
   * @description Scores a check-in answer against the open todo list, stores
   * the activity log and completes the check-in. Model failures fall back to a
   * neutral analysis; database failures propagate.
   */
  async analyzeActivity(userResponse: string, checkInId: number, now = Date.now()): Promise<ActivityAnalysis> {
    const todos = this.todos.listOpenGoalTodos(20);
    const prompt = buildAnalysisPrompt(userResponse, todos, this.context.getGoalSummary());

    let analysis: ActivityAnalysis;
    try {
      const reply = await this.model.generate(prompt);
      try {
        const parsed = extractJson(reply);
        if (!checkIsRecord(parsed)) throw new SyntaxError('Analysis reply is not a JSON object');
        analysis = normalizeAnalysis(parsed, userResponse, todos);
      } catch (parseErr) {
        console.error('[CheckIn] Failed to parse analysis:', errorMessage(parseErr));
        analysis = fallbackAnalysis(
          userResponse,
          'Analysis pending - manual review required',
          'Activity logged. I had trouble analyzing it automatically.',
        );
      }
    } catch (err) {
      console.error('[CheckIn] Activity analysis failed:', errorMessage(err));
      analysis = fallbackAnalysis(userResponse, errorMessage(err), 'Activity logged successfully.');
    }

    this.checkIns.insertActivityLog({
      timestamp: now,
      userResponse,
      activitySummary: analysis.activitySummary,
      productivityType: analysis.productivityType,
      alignmentScore: analysis.alignmentScore,
      matchedTodoId: analysis.matchedTodoId,
      category: analysis.category,
      reasoning: analysis.reasoning,
      checkInId,
    }, now);
    this.checkIns.setCheckInStatus(checkInId, 'completed', now);
    console.log(`[CheckIn] Activity saved for check-in ${checkInId}: ${analysis.productivityType}`);

    return analysis;
  }
}
