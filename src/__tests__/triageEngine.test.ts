import * as os from 'os';
import * as path from 'path';
import { Storage } from '../storage';
import { ContextManager } from '../contextManager';
import { PatternManager } from '../patternManager';
import { TriageEngine, checkIsHumanOverride, parseIsoDateTime } from '../triageEngine';
import { ScriptedModel } from './fakes';

const thursday = new Date(2026, 0, 29, 10, 0);

describe('TriageEngine', () => {
  let storage: Storage;
  let model: ScriptedModel;
  let triage: TriageEngine;

  beforeEach(() => {
    storage = new Storage(':memory:');
    model = new ScriptedModel();
    const context = new ContextManager({
      model,
      reader: null,
      contextMapPath: path.join(os.tmpdir(), 'kairos-missing-context', 'context_map.json'),
      insights: storage.insights,
    });
    const patterns = new PatternManager(model, storage.todos, storage.insights);
    triage = new TriageEngine(model, context, patterns, storage.todos);
  });

  afterEach(() => {
    storage.close();
  });

  describe('triageTask', () => {
    it('should normalize the model reply', async () => {
      model.queue([
        '```json',
        JSON.stringify({
          task_name: 'Gym session',
          category: 'Fitness',
          priority: 'high',
          due_date: '2026-01-30',
          due_time: '7:00',
          recurrence: 'weekly:Mon,Thu',
          scheduling_unclear: false,
          reasoning: 'Health pillar',
          alignment_score: 12,
          pushback: 'null',
          suggested_alternative: null,
          clarification_needed: '',
        }),
        '```',
      ].join('\n'));

      expect(await triage.triageTask('gym tomorrow 7am', thursday)).toEqual({
        taskName: 'Gym session',
        category: 'Fitness',
        priority: 'HIGH',
        dueDate: '2026-01-30',
        dueTime: '07:00',
        recurrence: 'weekly:Mon,Thu',
        schedulingUnclear: false,
        reasoning: 'Health pillar',
        alignmentScore: 10,
        pushback: null,
        suggestedAlternative: null,
        clarificationNeeded: null,
      });
    });

    it('should drop dates that are not ISO and default missing fields', async () => {
      model.queue('{"due_date": "friday", "priority": "urgent", "scheduling_unclear": true}');

      const result = await triage.triageTask('finish the slides soon', thursday);

      expect(result).toMatchObject({
        taskName: 'finish the slides soon',
        category: 'General',
        priority: 'MEDIUM',
        dueDate: null,
        schedulingUnclear: true,
        alignmentScore: 0,
        reasoning: '',
      });
    });

    it('should fall back when the model fails', async () => {
      const input = 'Prepare the onboarding checklist for the new hires starting next month';
      model.queue(new Error('quota exceeded'));

      expect(await triage.triageTask(input, thursday)).toEqual({
        taskName: input.slice(0, 50),
        category: 'Unknown',
        priority: 'MEDIUM',
        dueDate: null,
        dueTime: null,
        recurrence: null,
        schedulingUnclear: false,
        reasoning: 'Triage engine error: quota exceeded',
        alignmentScore: 0,
        pushback: null,
        suggestedAlternative: null,
        clarificationNeeded: null,
      });
    });

    it('should fall back when the reply is not a JSON object', async () => {
      model.queue('[1, 2]');

      const result = await triage.triageTask('call mom', thursday);

      expect(result.reasoning).toBe('Triage engine error: Triage reply is not a JSON object');
      expect(result.category).toBe('Unknown');
    });

    it('should clear pushback under a human override', async () => {
      model.queue('{"task_name": "Watch the match", "priority": "HIGH", "pushback": "Skip it", "suggested_alternative": "Study"}');

      const result = await triage.triageTask('Human Override: watch the match, priority HIGH', thursday);

      expect(result.pushback).toBeNull();
      expect(result.suggestedAlternative).toBeNull();
      expect(result.priority).toBe('HIGH');
      expect(model.lastPrompt).toContain('HUMAN OVERRIDE ACTIVE');
    });
  });

  describe('buildTriagePrompt', () => {
    it('should anchor dates and include learned patterns', () => {
      storage.insights.savePattern('Override', 'User keeps grocery lists', 0.8);

      const prompt = triage.buildTriagePrompt('buy milk', thursday);

      expect(prompt).toContain('CURRENT DATE: 2026-01-29 (Thursday)');
      expect(prompt).toContain('"tomorrow" → 2026-01-30');
      expect(prompt).toContain('"next week" → 2026-02-05');
      expect(prompt).toContain('- User keeps grocery lists');
      expect(prompt).toContain('USER STRATEGIC CONTEXT:\nNo context available.');
      expect(prompt).not.toContain('HUMAN OVERRIDE ACTIVE');
    });

    it('should say when no patterns are known', () => {
      expect(triage.buildTriagePrompt('buy milk', thursday)).toContain('No recurring patterns detected yet.');
    });
  });

  describe('parseDateTime', () => {
    it('should parse ISO input without the model', async () => {
      expect(await triage.parseDateTime('2026-02-01 9:30', thursday)).toEqual({ dueDate: '2026-02-01', dueTime: '09:30' });
      expect(await triage.parseDateTime('2026-02-01', thursday)).toEqual({ dueDate: '2026-02-01', dueTime: null });
      expect(model.prompts).toHaveLength(0);
    });

    it('should ask the model for natural language', async () => {
      model.queue('{"due_date": "2026-02-06", "due_time": null}');

      expect(await triage.parseDateTime('next friday', thursday)).toEqual({ dueDate: '2026-02-06', dueTime: null });
      expect(model.lastPrompt).toContain('Input: "next friday"');
      expect(model.lastPrompt).toContain('Current date: 2026-01-29 (Thursday)');
    });

    it('should return null when no date comes back', async () => {
      model.queue('{"due_date": "next friday"}', new Error('offline'));

      expect(await triage.parseDateTime('whenever', thursday)).toBeNull();
      expect(await triage.parseDateTime('whenever', thursday)).toBeNull();
    });
  });

  describe('answerQuery', () => {
    it('should include the recent tasks in the prompt', async () => {
      storage.todos.create({
        task: 'Write report',
        rawInput: 'write report',
        category: 'Career',
        priority: 'HIGH',
        dueDate: '2026-02-01',
        dueTime: null,
        isScheduled: true,
        reasoning: null,
        recurrence: null,
      }, 1000);
      storage.todos.create({
        task: 'Learn Rust',
        rawInput: 'learn rust',
        category: 'Hobby',
        priority: null,
        dueDate: null,
        dueTime: null,
        isScheduled: false,
        reasoning: null,
        recurrence: null,
      }, 2000);
      model.queue('  You have a report due Feb 1.  ');

      const answer = await triage.answerQuery('What is due soon?');

      expect(answer).toBe('You have a report due Feb 1.');
      expect(model.lastPrompt).toContain(
        'RECENT TASKS FROM DATABASE:\n- [MEDIUM] Learn Rust (Due: Unscheduled)\n- [HIGH] Write report (Due: 2026-02-01)',
      );
      expect(model.lastPrompt).toContain('USER QUESTION:\nWhat is due soon?');
    });

    it('should say when there are no tasks', async () => {
      model.queue('Nothing yet.');

      await triage.answerQuery('Anything?');

      expect(model.lastPrompt).toContain('No recent tasks found in database.');
    });
  });
});

describe('triage helpers', () => {
  it('should detect a human override anywhere in the input', () => {
    expect(checkIsHumanOverride('please, HUMAN override this')).toBe(true);
    expect(checkIsHumanOverride('human-override')).toBe(false);
  });

  it('should reject invalid ISO date-times', () => {
    expect(parseIsoDateTime('2026-02-01 25:00')).toBeNull();
    expect(parseIsoDateTime('2026-02-31')).toBeNull();
    expect(parseIsoDateTime('tomorrow')).toBeNull();
  });
});
