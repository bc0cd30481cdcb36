import { Storage } from '../../storage';
import type { TodoInput, TodoRepository } from '../todoRepository';

function todoInput(overrides: Partial<TodoInput> = {}): TodoInput {
  return {
    task: 'Write report',
    rawInput: 'write the quarterly report',
    category: 'Career',
    priority: 'HIGH',
    dueDate: '2026-02-01',
    dueTime: null,
    isScheduled: true,
    reasoning: 'Moves the career goal forward',
    recurrence: null,
    ...overrides,
  };
}

describe('TodoRepository', () => {
  let storage: Storage;
  let todos: TodoRepository;

  beforeEach(() => {
    storage = new Storage(':memory:');
    todos = storage.todos;
  });

  afterEach(() => {
    storage.close();
  });

  it('should store and read back a task', () => {
    const id = todos.create(todoInput({ dueTime: '14:30', recurrence: 'weekly' }), 1000);

    expect(todos.get(id)).toEqual({
      id,
      task: 'Write report',
      rawInput: 'write the quarterly report',
      category: 'Career',
      priority: 'HIGH',
      dueDate: '2026-02-01',
      dueTime: '14:30',
      isScheduled: true,
      status: 'Pending',
      reasoning: 'Moves the career goal forward',
      recurrence: 'weekly',
      createdAt: 1000,
      completedAt: null,
      updatedAt: 1000,
    });
  });

  it('should return null for unknown ids', () => {
    expect(todos.get(999)).toBeNull();
  });

  it('should reopen a completed task when it is replaced', () => {
    const id = todos.create(todoInput(), 1000);
    todos.complete(id, 2000, 2000);

    expect(todos.replace(id, todoInput({ task: 'Write final report', priority: 'MEDIUM' }), 3000)).toBe(true);

    const replaced = todos.get(id);
    expect(replaced?.task).toBe('Write final report');
    expect(replaced?.priority).toBe('MEDIUM');
    expect(replaced?.status).toBe('Pending');
    expect(replaced?.updatedAt).toBe(3000);
    expect(todos.replace(999, todoInput(), 3000)).toBe(false);
  });

  it('should search pending tasks by substring, newest first', () => {
    const older = todos.create(todoInput({ task: 'Call the bank' }), 1000);
    const newer = todos.create(todoInput({ task: 'Call mom' }), 2000);
    const done = todos.create(todoInput({ task: 'Call the plumber' }), 3000);
    todos.create(todoInput({ task: 'Buy milk' }), 4000);
    todos.complete(done, 5000, 5000);

    expect(todos.searchPending('Call').map((t) => t.id)).toEqual([newer, older]);
    expect(todos.searchPending('Call', 1).map((t) => t.id)).toEqual([newer]);
  });

  it('should list open goal tasks by priority, then earliest due date', () => {
    todos.create(todoInput({ task: 'Low', priority: 'LOW', dueDate: '2026-01-01' }), 1000);
    const medium = todos.create(todoInput({ task: 'Medium', priority: 'MEDIUM', dueDate: '2026-01-10' }), 1000);
    const highLate = todos.create(todoInput({ task: 'High late', dueDate: '2026-02-01' }), 1000);
    const highNoDate = todos.create(todoInput({ task: 'High undated', dueDate: null, isScheduled: false }), 1000);
    const highSoon = todos.create(todoInput({ task: 'High soon', dueDate: '2026-01-20' }), 1000);

    expect(todos.listOpenGoalTodos().map((t) => t.id)).toEqual([highSoon, highLate, highNoDate, medium]);
  });

  it('should move a task to the backlog and schedule it again', () => {
    const id = todos.create(todoInput({ dueTime: '09:00' }), 1000);

    todos.markUnscheduled(id, 2000);
    expect(todos.listUnscheduled().map((t) => t.id)).toEqual([id]);
    expect(todos.get(id)).toMatchObject({ dueDate: null, dueTime: null, isScheduled: false });

    todos.schedule(id, '2026-03-01', '10:15', 3000);
    expect(todos.listUnscheduled()).toEqual([]);
    expect(todos.get(id)).toMatchObject({ dueDate: '2026-03-01', dueTime: '10:15', isScheduled: true });
  });

  it('should update only the given fields', () => {
    const id = todos.create(todoInput(), 1000);

    expect(todos.updateFields(id, { priority: 'LOW', category: 'Home' }, 2000)).toBe(true);
    expect(todos.get(id)).toMatchObject({ task: 'Write report', priority: 'LOW', category: 'Home', updatedAt: 2000 });
    expect(todos.updateFields(id, {}, 3000)).toBe(false);
  });

  it('should list the most recently completed tasks first', () => {
    const first = todos.create(todoInput({ task: 'First' }), 1000);
    const second = todos.create(todoInput({ task: 'Second' }), 1000);
    todos.create(todoInput({ task: 'Open' }), 1000);
    todos.complete(first, 5000, 5000);
    todos.complete(second, 4000, 5000);

    expect(todos.listRecentlyCompleted().map((t) => t.id)).toEqual([first, second]);
    expect(todos.listPending().map((t) => t.task)).toEqual(['Open']);
  });
});
