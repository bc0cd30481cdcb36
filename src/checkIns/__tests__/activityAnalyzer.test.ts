import * as os from 'os';
import * as path from 'path';
import { Storage } from '../../storage';
import { ContextManager } from '../../contextManager';
import { ActivityAnalyzer } from '../activityAnalyzer';
import { ScriptedModel } from '../../__tests__/fakes';

const now = new Date(2026, 0, 29, 11, 0).getTime();

describe('ActivityAnalyzer', () => {
  let storage: Storage;
  let model: ScriptedModel;
  let analyzer: ActivityAnalyzer;
  let checkInId: number;

  beforeEach(() => {
    storage = new Storage(':memory:');
    model = new ScriptedModel();
    const context = new ContextManager({
      model,
      reader: null,
      contextMapPath: path.join(os.tmpdir(), 'kairos-missing-context', 'context_map.json'),
      insights: storage.insights,
    });
    analyzer = new ActivityAnalyzer(model, storage.todos, storage.checkIns, context);

    const base = { rawInput: 'captured', dueDate: null, dueTime: null, isScheduled: false, reasoning: null, recurrence: null };
    storage.todos.create({ ...base, task: 'Write report', category: 'Career', priority: 'HIGH' }, 1000);
    storage.todos.create({ ...base, task: 'Watch series', category: 'Entertainment', priority: 'LOW' }, 1000);
    checkInId = storage.checkIns.createCheckIn(42, now - 60_000, 'sent');
  });

  afterEach(() => {
    storage.close();
  });

  function loggedTypes() {
    return storage.checkIns.countActivitiesByType(now, now);
  }

  it('should score the activity against the open todos', async () => {
    model.queue(JSON.stringify({
      activity_summary: 'Drafted report intro',
      productivity_type: 'ALIGNED',
      matched_todo_id: 1,
      alignment_score: 14,
      category: 'Career',
      reasoning: 'Matches the report todo',
      feedback: 'Nice focus!',
    }));

    const analysis = await analyzer.analyzeActivity('worked on the report intro', checkInId, now);

    expect(analysis).toEqual({
      activitySummary: 'Drafted report intro',
      productivityType: 'aligned',
      matchedTodoId: 1,
      alignmentScore: 10,
      category: 'Career',
      reasoning: 'Matches the report todo',
      feedback: 'Nice focus!',
    });
    expect(model.lastPrompt).toContain('- [ID: 1] Write report (Category: Career, Priority: HIGH)');
    expect(model.lastPrompt).not.toContain('Watch series');
    expect(model.lastPrompt).toContain('- Primary Goal: Career Growth');
    expect(storage.checkIns.getCheckIn(checkInId)).toMatchObject({ status: 'completed', responseTime: now });
    expect(loggedTypes()).toEqual([{ key: 'aligned', count: 1 }]);
  });

  it('should drop a matched todo that was not offered', async () => {
    model.queue('{"productivity_type": "wasted", "matched_todo_id": 2, "alignment_score": "1"}');

    const analysis = await analyzer.analyzeActivity('watched the series', checkInId, now);

    expect(analysis.matchedTodoId).toBeNull();
    expect(analysis.alignmentScore).toBe(1);
    expect(analysis.activitySummary).toBe('watched the series');
    expect(analysis.feedback).toBe('Activity logged.');
  });

  it('should log a neutral analysis when the reply is not JSON', async () => {
    model.queue('Looks productive to me!');

    const analysis = await analyzer.analyzeActivity('emails', checkInId, now);

    expect(analysis).toEqual({
      activitySummary: 'emails',
      productivityType: 'beneficial',
      matchedTodoId: null,
      alignmentScore: 5,
      category: 'Unknown',
      reasoning: 'Analysis pending - manual review required',
      feedback: 'Activity logged. I had trouble analyzing it automatically.',
    });
    expect(loggedTypes()).toEqual([{ key: 'beneficial', count: 1 }]);
  });

  it('should still complete the check-in when the model fails', async () => {
    model.queue(new Error('quota exceeded'));

    const analysis = await analyzer.analyzeActivity('emails', checkInId, now);

    expect(analysis.reasoning).toBe('quota exceeded');
    expect(analysis.feedback).toBe('Activity logged successfully.');
    expect(storage.checkIns.getCheckIn(checkInId)?.status).toBe('completed');
  });
});
