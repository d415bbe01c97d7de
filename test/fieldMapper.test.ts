import { describe, expect, it } from 'vitest';
import { parseSyncConfig } from '../src/config.js';
import {
  chooseDue,
  extractList,
  extractText,
  FieldMapper,
  fromTaskManagerPriority,
  looksLikeRecurrence,
  parsePlannerPriority,
  toTaskManagerPriority,
} from '../src/sync/fieldMapper.js';
import { BASE_CONFIG, page, task, title } from './fixtures.js';

const mapper = new FieldMapper(parseSyncConfig(BASE_CONFIG));

describe('priority', () => {
  it('round-trips every planner priority through the task manager scale', () => {
    for (const p of [1, 2, 3, 4] as const) {
      expect(fromTaskManagerPriority(toTaskManagerPriority(p))).toBe(p);
    }
    expect([1, 2, 3, 4].map(toTaskManagerPriority)).toEqual([4, 3, 2, 1]);
  });

  it('maps out-of-domain values to the lowest priority', () => {
    expect(toTaskManagerPriority(7)).toBe(1);
    expect(fromTaskManagerPriority(0)).toBe(4);
    expect(parsePlannerPriority('high')).toBe(4);
    expect(parsePlannerPriority(' 2 ')).toBe(2);
    expect(parsePlannerPriority(null)).toBe(4);
  });
});

describe('property extraction', () => {
  it('reads each property kind as text', () => {
    expect(extractText({ type: 'title', text: 'Buy milk' })).toBe('Buy milk');
    expect(extractText({ type: 'rich_text', text: '   ' })).toBeUndefined();
    expect(extractText({ type: 'select', name: 'Home' })).toBe('Home');
    expect(extractText({ type: 'multi_select', names: ['a', 'b'] })).toBe('a, b');
    expect(extractText({ type: 'date', start: '2024-01-10', end: null })).toBe('2024-01-10');
    expect(extractText({ type: 'checkbox', checked: false })).toBe('No');
    expect(extractText({ type: 'number', value: 0 })).toBe('0');
    expect(extractText({ type: 'relation', ids: [] })).toBeUndefined();
    expect(extractText({ type: 'unsupported', kind: 'formula' })).toBeUndefined();
  });

  it('splits comma-separated text into a list', () => {
    expect(extractList({ type: 'rich_text', text: 'a, b,,c ' })).toEqual(['a', 'b', 'c']);
    expect(extractList({ type: 'number', value: 3 })).toBeUndefined();
  });
});

describe('due handling', () => {
  it('prefers timestamps over dates over free text, and keeps recurrences verbatim', () => {
    expect(chooseDue('2024-01-10T09:00:00Z', undefined)).toEqual({ kind: 'datetime', value: '2024-01-10T09:00:00Z' });
    expect(chooseDue('2024-01-10', 'in 3 days')).toEqual({ kind: 'date', value: '2024-01-10' });
    expect(chooseDue(undefined, 'in 3 days')).toEqual({ kind: 'natural', value: 'in 3 days' });
    expect(chooseDue('2024-01-10', 'every monday')).toEqual({ kind: 'recurrence', value: 'every monday' });
    expect(chooseDue(undefined, undefined)).toBeUndefined();
  });

  it('recognises recurrence keywords case-insensitively', () => {
    expect(looksLikeRecurrence('Every Monday')).toBe(true);
    expect(looksLikeRecurrence('each workday')).toBe(true);
    expect(looksLikeRecurrence('tomorrow')).toBe(false);
  });

  it('does not let a plain date replace a recurring series', () => {
    const current = task('b1', { due: { date: '2024-01-08', string: 'every monday', isRecurring: true } });
    expect(mapper.diffTaskManager(current, { due: { dueDate: '2024-01-15' } })).toEqual({});
    expect(mapper.diffTaskManager(current, { due: { dueString: 'every tuesday' } })).toEqual({
      due: { dueString: 'every tuesday' },
    });
  });

  it('writes a changed date to a non-recurring task', () => {
    const current = task('b1', { due: { date: '2024-01-08', isRecurring: false } });
    expect(mapper.diffTaskManager(current, { due: { dueDate: '2024-01-08' } })).toEqual({});
    expect(mapper.diffTaskManager(current, { due: { dueDate: '2024-01-09' } })).toEqual({ due: { dueDate: '2024-01-09' } });
  });
});

describe('description synthesis', () => {
  const described = new FieldMapper(
    parseSyncConfig({
      ...BASE_CONFIG,
      descriptionFields: {
        enabled: true,
        fields: [{ name: 'Notes' }, { name: 'Energy', format: 'Energy: {value}' }, { name: 'Estimate', format: 'Estimate: {value} min' }],
      },
    }),
  );

  it('joins non-empty fields with the separator and skips empty ones', () => {
    const p = page('a1', {
      Name: title('Write report'),
      Notes: { type: 'rich_text', text: 'Quarterly numbers' },
      Energy: { type: 'select', name: null },
      Estimate: { type: 'number', value: 30 },
    });
    expect(described.buildDescription(p)).toBe('Quarterly numbers\n\nEstimate: 30 min');
  });

  it('yields nothing when every field is empty', () => {
    expect(described.buildDescription(page('a1', { Name: title('x') }))).toBeUndefined();
  });
});

describe('FieldMapper', () => {
  it('maps a planner page to task-manager fields and references', () => {
    const mapped = mapper.toTaskManager(
      page('a1', {
        Name: title('Buy milk'),
        Due: { type: 'date', start: '2024-01-10T09:00:00.000Z', end: null },
        Priority: { type: 'select', name: '2' },
        Area: { type: 'select', name: 'Home' },
        Tags: { type: 'multi_select', names: ['errands'] },
        Parent: { type: 'relation', ids: ['p1'] },
      }),
    );
    expect(mapped).toEqual({
      fields: {
        content: 'Buy milk',
        priority: 3,
        labels: ['errands'],
        due: { dueDatetime: '2024-01-10T09:00:00.000Z' },
      },
      projectRef: 'Home',
      parentRef: 'p1',
    });
  });

  it('drops the source label when normalizing a task-manager task', () => {
    const n = mapper.normalizeTaskManager(task('b1', { labels: ['errands', 'from planner'], priority: 4 }));
    expect(n.labels).toEqual(['errands']);
    expect(n.priority).toBe(1);
  });

  it('writes priority as a number when the page stores it as one', () => {
    const current = page('a1', { Name: title('x'), Priority: { type: 'number', value: 4 } });
    const writes = mapper.toPlanner(mapper.normalizeTaskManager(task('b1', { content: 'x', priority: 3 })), current);
    expect(writes.Priority).toEqual({ type: 'number', value: 2 });
    expect(mapper.diffPlanner(current, writes)).toMatchObject({ Priority: { type: 'number', value: 2 } });
    expect(mapper.diffPlanner(current, writes).Name).toBeUndefined();
  });

  it('clears the planner date when the task has no due', () => {
    const writes = mapper.toPlanner(mapper.normalizeTaskManager(task('b1')));
    expect(writes.Due).toEqual({ type: 'date', start: null, end: null });
  });
});
