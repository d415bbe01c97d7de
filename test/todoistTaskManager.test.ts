import { describe, expect, it } from 'vitest';
import { TodoistTaskManager } from '../src/providers/todoist.js';

function jsonResponse(obj: unknown, status = 200) {
  return new Response(JSON.stringify(obj), {
    status,
    headers: { 'content-type': 'application/json' },
  });
}

interface Call {
  method: string;
  url: string;
  body?: unknown;
}

function recorder(respond: (call: Call) => Response) {
  const calls: Call[] = [];
  const fetcher: typeof fetch = async (url, init) => {
    const raw = init?.body;
    const call: Call = {
      method: init?.method ?? 'GET',
      url: url.toString(),
      body: typeof raw === 'string' ? JSON.parse(raw) : undefined,
    };
    calls.push(call);
    return respond(call);
  };
  return { calls, fetcher };
}

const API = 'https://api.todoist.com/api/v1';

const rawTask = {
  id: 't1',
  content: 'Buy milk',
  description: '',
  priority: 4,
  labels: ['errands'],
  due: { date: '2024-01-10', string: 'Jan 10', is_recurring: false },
  project_id: 'p1',
  parent_id: null,
  checked: false,
  added_at: '2024-01-01T00:00:00Z',
  updated_at: '2024-01-02T00:00:00Z',
};

describe('TodoistTaskManager', () => {
  it('fetches a task and maps its fields', async () => {
    const { calls, fetcher } = recorder(() => jsonResponse(rawTask));
    const tasks = new TodoistTaskManager({ token: 'test-token', fetcher });

    expect(await tasks.fetchById('t1')).toEqual({
      id: 't1',
      content: 'Buy milk',
      description: '',
      priority: 4,
      labels: ['errands'],
      due: { date: '2024-01-10', string: 'Jan 10', isRecurring: false },
      projectId: 'p1',
      parentId: undefined,
      isCompleted: false,
      createdAt: '2024-01-01T00:00:00Z',
      updatedAt: '2024-01-02T00:00:00Z',
    });
    expect(calls[0]?.url).toBe(`${API}/tasks/t1`);
  });

  it('reads a timed due from the date field', async () => {
    const { fetcher } = recorder(() => jsonResponse({ ...rawTask, due: { date: '2024-01-10T09:00:00Z', is_recurring: false } }));
    const t = await new TodoistTaskManager({ token: 't', fetcher }).fetchById('t1');
    expect(t?.due).toEqual({ date: '2024-01-10', datetime: '2024-01-10T09:00:00Z', isRecurring: false });
  });

  it('treats missing and deleted tasks as absent', async () => {
    const missing = recorder(() => new Response('not found', { status: 404 }));
    expect(await new TodoistTaskManager({ token: 't', fetcher: missing.fetcher }).fetchById('x')).toBeUndefined();

    const deleted = recorder(() => jsonResponse({ ...rawTask, is_deleted: true }));
    expect(await new TodoistTaskManager({ token: 't', fetcher: deleted.fetcher }).fetchById('t1')).toBeUndefined();
  });

  it('follows cursors and filters by modification time', async () => {
    const { calls, fetcher } = recorder((call) =>
      call.url.includes('cursor=c2')
        ? jsonResponse({ results: [{ ...rawTask, id: 't2', updated_at: '2023-12-01T00:00:00Z' }], next_cursor: null })
        : jsonResponse({ results: [rawTask], next_cursor: 'c2' }),
    );
    const tasks = new TodoistTaskManager({ token: 't', fetcher });

    const changed = await tasks.queryChangedSince('2024-01-01T00:00:00Z');

    expect(changed.map((t) => t.id)).toEqual(['t1']);
    expect(calls.map((c) => c.url)).toEqual([`${API}/tasks?limit=200`, `${API}/tasks?limit=200&cursor=c2`]);
  });

  it('creates tasks with due, labels and placement', async () => {
    const { calls, fetcher } = recorder(() => jsonResponse(rawTask));
    const tasks = new TodoistTaskManager({ token: 't', fetcher });

    await tasks.create({
      content: 'Buy milk',
      priority: 4,
      labels: ['errands'],
      due: { dueDate: '2024-01-10' },
      projectId: 'p1',
    });

    expect(calls[0]).toEqual({
      method: 'POST',
      url: `${API}/tasks`,
      body: { content: 'Buy milk', priority: 4, labels: ['errands'], due_date: '2024-01-10', project_id: 'p1' },
    });
  });

  it('moves under a parent before considering the project', async () => {
    const { calls, fetcher } = recorder(() => jsonResponse({}));
    const tasks = new TodoistTaskManager({ token: 't', fetcher });

    await tasks.move('t1', { parent: 't0', project: 'p1' });
    await tasks.move('t1', { project: 'p2' });
    await tasks.move('t1', {});

    expect(calls).toEqual([
      { method: 'POST', url: `${API}/tasks/t1/move`, body: { parent_id: 't0' } },
      { method: 'POST', url: `${API}/tasks/t1/move`, body: { project_id: 'p2' } },
    ]);
  });

  it('closes, reopens and deletes, ignoring tasks that are already gone', async () => {
    const { calls, fetcher } = recorder((call) =>
      call.method === 'DELETE' ? new Response('gone', { status: 404 }) : new Response(null, { status: 204 }),
    );
    const tasks = new TodoistTaskManager({ token: 't', fetcher });

    await tasks.complete('t1');
    await tasks.reopen('t1');
    await tasks.delete('t1');

    expect(calls.map((c) => `${c.method} ${c.url}`)).toEqual([
      `POST ${API}/tasks/t1/close`,
      `POST ${API}/tasks/t1/reopen`,
      `DELETE ${API}/tasks/t1`,
    ]);
  });

  it('resolves projects and labels by name and creates missing labels once', async () => {
    const { calls, fetcher } = recorder((call) => {
      if (call.url.startsWith(`${API}/projects`)) {
        return jsonResponse({ results: [{ id: 'p1', name: 'Home' }], next_cursor: null });
      }
      if (call.method === 'POST') return jsonResponse({ id: 'l2', name: 'From Planner' });
      return jsonResponse({ results: [{ id: 'l1', name: 'errands' }], next_cursor: null });
    });
    const tasks = new TodoistTaskManager({ token: 't', fetcher });

    expect(await tasks.resolveProject('home')).toBe('p1');
    expect(await tasks.resolveProject('p1')).toBe('p1');
    expect(await tasks.resolveProject('Work')).toBeUndefined();
    expect(await tasks.resolveLabel('Errands')).toBe('errands');
    expect(await tasks.ensureLabel('From Planner')).toBe('From Planner');
    expect(await tasks.ensureLabel('from planner')).toBe('From Planner');

    expect(calls.filter((c) => c.method === 'POST')).toEqual([
      { method: 'POST', url: `${API}/labels`, body: { name: 'From Planner' } },
    ]);
    expect(calls.filter((c) => c.url.startsWith(`${API}/projects`))).toHaveLength(1);
  });

  it('reads comments for a task', async () => {
    const { calls, fetcher } = recorder(() =>
      jsonResponse({ results: [{ id: 'c1', content: 'Planner ID: a1' }], next_cursor: null }),
    );
    const tasks = new TodoistTaskManager({ token: 't', fetcher });

    expect(await tasks.listAnnotations('t1')).toEqual(['Planner ID: a1']);
    expect(calls[0]?.url).toBe(`${API}/comments?task_id=t1&limit=200`);
  });
});
