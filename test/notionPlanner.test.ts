import { describe, expect, it } from 'vitest';
import { CollaboratorError } from '../src/errors.js';
import { encodeProperty, NOTION_VERSION, NotionPlanner, runs } from '../src/providers/notion.js';

function jsonResponse(obj: unknown, status = 200) {
  return new Response(JSON.stringify(obj), {
    status,
    headers: { 'content-type': 'application/json' },
  });
}

const rawPage = {
  id: 'a1',
  created_time: '2024-01-01T00:00:00.000Z',
  last_edited_time: '2024-01-02T00:00:00.000Z',
  archived: false,
  properties: {
    Name: { type: 'title', title: [{ plain_text: 'Buy ' }, { plain_text: 'milk' }] },
    Due: { type: 'date', date: { start: '2024-01-10', end: null } },
    Tags: { type: 'multi_select', multi_select: [{ name: 'errands' }] },
    Status: { type: 'status', status: { name: 'Not started' } },
    Link: { type: 'url', url: 'https://example.com' },
  },
};

interface Call {
  method: string;
  url: string;
  body?: unknown;
  headers: Headers;
}

function recorder(respond: (call: Call) => Response) {
  const calls: Call[] = [];
  const fetcher: typeof fetch = async (url, init) => {
    const raw = init?.body;
    const call: Call = {
      method: init?.method ?? 'GET',
      url: url.toString(),
      body: typeof raw === 'string' ? JSON.parse(raw) : undefined,
      headers: new Headers(init?.headers),
    };
    calls.push(call);
    return respond(call);
  };
  return { calls, fetcher };
}

describe('NotionPlanner', () => {
  it('fetches a page and decodes its properties', async () => {
    const { calls, fetcher } = recorder(() => jsonResponse(rawPage));
    const planner = new NotionPlanner({ token: 'test-token', databaseId: 'db1', fetcher });

    const page = await planner.fetchById('a1');

    expect(calls[0]?.url).toBe('https://api.notion.com/v1/pages/a1');
    expect(calls[0]?.headers.get('notion-version')).toBe(NOTION_VERSION);
    expect(calls[0]?.headers.get('authorization')).toBe('Bearer test-token');
    expect(page).toEqual({
      id: 'a1',
      createdTime: '2024-01-01T00:00:00.000Z',
      lastEditedTime: '2024-01-02T00:00:00.000Z',
      archived: false,
      properties: {
        Name: { type: 'title', text: 'Buy milk' },
        Due: { type: 'date', start: '2024-01-10', end: null },
        Tags: { type: 'multi_select', names: ['errands'] },
        Status: { type: 'status', name: 'Not started' },
        Link: { type: 'unsupported', kind: 'url' },
      },
    });
  });

  it('treats missing and archived pages as absent', async () => {
    const missing = recorder(() => jsonResponse({ object: 'error' }, 404));
    expect(await new NotionPlanner({ token: 't', databaseId: 'db1', fetcher: missing.fetcher }).fetchById('x')).toBeUndefined();

    const archived = recorder(() => jsonResponse({ ...rawPage, in_trash: true }));
    expect(await new NotionPlanner({ token: 't', databaseId: 'db1', fetcher: archived.fetcher }).fetchById('a1')).toBeUndefined();
  });

  it('wraps other API failures in CollaboratorError', async () => {
    const { fetcher } = recorder(() => jsonResponse({ message: 'bad' }, 400));
    const planner = new NotionPlanner({ token: 't', databaseId: 'db1', fetcher });
    await expect(planner.fetchById('a1')).rejects.toBeInstanceOf(CollaboratorError);
    await expect(planner.update('a1', {})).rejects.toThrow('A update failed: HTTP 400');
  });

  it('queries recently edited pages across result pages', async () => {
    const { calls, fetcher } = recorder((call) => {
      const second = typeof call.body === 'object' && call.body !== null && 'start_cursor' in call.body;
      return second
        ? jsonResponse({ results: [{ ...rawPage, id: 'a2' }], has_more: false, next_cursor: null })
        : jsonResponse({ results: [rawPage], has_more: true, next_cursor: 'c2' });
    });
    const planner = new NotionPlanner({ token: 't', databaseId: 'db1', fetcher });

    const pages = await planner.queryChangedSince('2024-01-01T00:00:00.000Z');

    expect(pages.map((p) => p.id)).toEqual(['a1', 'a2']);
    expect(calls.map((c) => `${c.method} ${c.url}`)).toEqual([
      'POST https://api.notion.com/v1/databases/db1/query',
      'POST https://api.notion.com/v1/databases/db1/query',
    ]);
    expect(calls[0]?.body).toEqual({
      page_size: 100,
      filter: { timestamp: 'last_edited_time', last_edited_time: { on_or_after: '2024-01-01T00:00:00.000Z' } },
    });
    expect(calls[1]?.body).toMatchObject({ start_cursor: 'c2' });
  });

  it('encodes property writes on update and archives on delete', async () => {
    const { calls, fetcher } = recorder(() => jsonResponse(rawPage));
    const planner = new NotionPlanner({ token: 't', databaseId: 'db1', fetcher });

    await planner.update('a1', {
      Name: { type: 'title', text: 'Buy oat milk' },
      Due: { type: 'date', start: null, end: null },
      Priority: { type: 'select', name: '2' },
    });
    await planner.delete('a1');

    expect(calls[0]).toMatchObject({
      method: 'PATCH',
      url: 'https://api.notion.com/v1/pages/a1',
      body: {
        properties: {
          Name: { title: [{ type: 'text', text: { content: 'Buy oat milk' } }] },
          Due: { date: null },
          Priority: { select: { name: '2' } },
        },
      },
    });
    expect(calls[1]).toMatchObject({ method: 'PATCH', body: { archived: true } });
  });

  it('completes through the bound status property', async () => {
    const { calls, fetcher } = recorder(() => jsonResponse(rawPage));
    const planner = new NotionPlanner({
      token: 't',
      databaseId: 'db1',
      fetcher,
      bindings: { completion: { name: 'Status', doneValue: 'Done', openValue: 'Not started' } },
    });

    await planner.complete('a1');

    expect(calls.map((c) => c.method)).toEqual(['GET', 'PATCH']);
    expect(calls[1]?.body).toEqual({ properties: { Status: { status: { name: 'Done' } } } });
  });

  it('writes and reads comments', async () => {
    const { calls, fetcher } = recorder((call) =>
      call.method === 'POST'
        ? jsonResponse({ id: 'c1', rich_text: [] })
        : jsonResponse({
            results: [{ id: 'c1', rich_text: [{ plain_text: 'Planner ID: a1' }] }],
            has_more: false,
            next_cursor: null,
          }),
    );
    const planner = new NotionPlanner({ token: 't', databaseId: 'db1', fetcher });

    await planner.annotate('a1', 'hello');
    expect(await planner.listAnnotations('a1')).toEqual(['Planner ID: a1']);
    expect(calls[0]?.body).toEqual({ parent: { page_id: 'a1' }, rich_text: [{ type: 'text', text: { content: 'hello' } }] });
    expect(calls[1]?.url).toBe('https://api.notion.com/v1/comments?block_id=a1');
  });

  it('splits long text into 2000-character runs', () => {
    const text = 'a'.repeat(4500);
    expect(encodeProperty({ type: 'rich_text', text })).toEqual({
      rich_text: [
        { type: 'text', text: { content: 'a'.repeat(2000) } },
        { type: 'text', text: { content: 'a'.repeat(2000) } },
        { type: 'text', text: { content: 'a'.repeat(500) } },
      ],
    });
  });

  it('never splits an emoji across runs', () => {
    const text = 'a'.repeat(1999) + '🎉' + 'b';
    const out = runs(text).map((r) => r.text.content);
    expect(out).toEqual(['a'.repeat(1999), '🎉b']);
    expect(out.join('')).toBe(text);
    expect(runs('')).toEqual([]);
  });
});
