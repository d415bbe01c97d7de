import type { MoveTarget, PlannerPage, PropertyValue, PropertyWrite, PropertyWrites } from '../model.js';
import {
  completionWrites,
  isPlannerCompleted,
  moveWrites,
  type PlannerBindings,
  type PlannerClient,
} from './provider.js';
import { isNotFound, requestJson, type FetchLike, type JsonRequestOptions } from '../http.js';
import { CollaboratorError } from '../errors.js';

export interface NotionPlannerOptions {
  token: string;
  databaseId: string;
  /** Completion, parent and project properties. */
  bindings?: PlannerBindings;
  baseUrl?: string;
  /** Inject fetch for tests */
  fetcher?: FetchLike;
}

export const NOTION_VERSION = '2022-06-28';

// Notion caps a single rich text run at 2000 characters.
const MAX_TEXT_RUN = 2000;

interface NotionRichText {
  plain_text?: string;
  text?: { content: string };
}

type NotionProperty =
  | { type: 'title'; title: NotionRichText[] }
  | { type: 'rich_text'; rich_text: NotionRichText[] }
  | { type: 'select'; select: { name: string } | null }
  | { type: 'multi_select'; multi_select: Array<{ name: string }> }
  | { type: 'date'; date: { start: string; end: string | null } | null }
  | { type: 'checkbox'; checkbox: boolean }
  | { type: 'number'; number: number | null }
  | { type: 'relation'; relation: Array<{ id: string }> }
  | { type: 'status'; status: { name: string } | null }
  | { type: 'formula' | 'rollup' | 'people' | 'files' | 'url' | 'email' | 'phone_number' | 'created_time' | 'last_edited_time' | 'created_by' | 'last_edited_by' | 'unique_id' | 'button' | 'verification' };

interface NotionPage {
  id: string;
  created_time: string;
  last_edited_time: string;
  archived?: boolean;
  in_trash?: boolean;
  properties: Record<string, NotionProperty>;
}

interface NotionList<T> {
  results: T[];
  has_more: boolean;
  next_cursor: string | null;
}

interface NotionComment {
  id: string;
  rich_text: NotionRichText[];
}

function plain(runs: NotionRichText[]): string {
  return runs.map((r) => r.plain_text ?? r.text?.content ?? '').join('');
}

/** Text runs of at most MAX_TEXT_RUN units; a surrogate pair is never split. */
export function runs(text: string): Array<{ type: 'text'; text: { content: string } }> {
  const out: Array<{ type: 'text'; text: { content: string } }> = [];
  let chunk = '';
  for (const ch of text) {
    if (chunk.length + ch.length > MAX_TEXT_RUN) {
      out.push({ type: 'text', text: { content: chunk } });
      chunk = '';
    }
    chunk += ch;
  }
  if (chunk) out.push({ type: 'text', text: { content: chunk } });
  return out;
}

export function decodeProperty(p: NotionProperty): PropertyValue {
  switch (p.type) {
    case 'title':
      return { type: 'title', text: plain(p.title) };
    case 'rich_text':
      return { type: 'rich_text', text: plain(p.rich_text) };
    case 'select':
      return { type: 'select', name: p.select?.name ?? null };
    case 'multi_select':
      return { type: 'multi_select', names: p.multi_select.map((o) => o.name) };
    case 'date':
      return { type: 'date', start: p.date?.start ?? null, end: p.date?.end ?? null };
    case 'checkbox':
      return { type: 'checkbox', checked: p.checkbox };
    case 'number':
      return { type: 'number', value: p.number };
    case 'relation':
      return { type: 'relation', ids: p.relation.map((r) => r.id) };
    case 'status':
      return { type: 'status', name: p.status?.name ?? null };
    default:
      return { type: 'unsupported', kind: p.type };
  }
}

export function encodeProperty(w: PropertyWrite): Record<string, unknown> {
  switch (w.type) {
    case 'title':
      return { title: runs(w.text) };
    case 'rich_text':
      return { rich_text: runs(w.text) };
    case 'select':
      return { select: w.name ? { name: w.name } : null };
    case 'status':
      return { status: w.name ? { name: w.name } : null };
    case 'multi_select':
      return { multi_select: w.names.map((name) => ({ name })) };
    case 'date':
      return { date: w.start ? { start: w.start, end: w.end } : null };
    case 'checkbox':
      return { checkbox: w.checked };
    case 'number':
      return { number: w.value };
    case 'relation':
      return { relation: w.ids.map((id) => ({ id })) };
  }
}

function encodeProperties(writes: PropertyWrites): Record<string, Record<string, unknown>> {
  const out: Record<string, Record<string, unknown>> = {};
  for (const [name, w] of Object.entries(writes)) out[name] = encodeProperty(w);
  return out;
}

function toPage(p: NotionPage): PlannerPage {
  const properties: Record<string, PropertyValue> = {};
  for (const [name, prop] of Object.entries(p.properties)) properties[name] = decodeProperty(prop);
  return {
    id: p.id,
    properties,
    createdTime: p.created_time,
    lastEditedTime: p.last_edited_time,
    archived: !!(p.archived || p.in_trash),
  };
}

/** Planner database backed by the Notion REST API. */
export class NotionPlanner implements PlannerClient {
  readonly side = 'A' as const;

  private fetcher: FetchLike;
  private baseUrl: string;
  private bindings: PlannerBindings;

  constructor(private opts: NotionPlannerOptions) {
    this.fetcher = opts.fetcher ?? fetch;
    this.baseUrl = (opts.baseUrl ?? 'https://api.notion.com/v1').replace(/\/$/, '');
    this.bindings = opts.bindings ?? {};
  }

  private async api<T>(operation: string, path: string, init: JsonRequestOptions = {}): Promise<T> {
    try {
      return await requestJson<T>(
        `${this.baseUrl}${path}`,
        {
          ...init,
          headers: {
            authorization: `Bearer ${this.opts.token}`,
            'notion-version': NOTION_VERSION,
            ...(init.headers ?? {}),
          },
        },
        this.fetcher,
      );
    } catch (e) {
      throw new CollaboratorError('A', operation, e);
    }
  }

  private async queryDatabase(filter?: Record<string, unknown>): Promise<PlannerPage[]> {
    const out: PlannerPage[] = [];
    let cursor: string | undefined;
    do {
      const res = await this.api<NotionList<NotionPage>>('query', `/databases/${this.opts.databaseId}/query`, {
        method: 'POST',
        body: { page_size: 100, ...(filter ? { filter } : {}), ...(cursor ? { start_cursor: cursor } : {}) },
      });
      out.push(...res.results.map(toPage));
      cursor = res.has_more ? (res.next_cursor ?? undefined) : undefined;
    } while (cursor);
    return out;
  }

  async fetchById(id: string): Promise<PlannerPage | undefined> {
    try {
      const page = toPage(await this.api<NotionPage>('fetch', `/pages/${id}`));
      return page.archived ? undefined : page;
    } catch (e) {
      if (e instanceof CollaboratorError && isNotFound(e.cause)) return undefined;
      throw e;
    }
  }

  async queryChangedSince(since?: string): Promise<PlannerPage[]> {
    if (!since) return this.queryDatabase();
    return this.queryDatabase({ timestamp: 'last_edited_time', last_edited_time: { on_or_after: since } });
  }

  async queryChildren(parentId: string, excludeCompleted: boolean): Promise<PlannerPage[]> {
    const field = this.bindings.parentProperty;
    if (!field) return [];
    const pages = await this.queryDatabase({ property: field, relation: { contains: parentId } });
    return excludeCompleted ? pages.filter((p) => !isPlannerCompleted(this.bindings, p)) : pages;
  }

  async create(fields: PropertyWrites): Promise<PlannerPage> {
    const page = await this.api<NotionPage>('create', '/pages', {
      method: 'POST',
      body: { parent: { database_id: this.opts.databaseId }, properties: encodeProperties(fields) },
    });
    return toPage(page);
  }

  async update(id: string, fields: PropertyWrites): Promise<PlannerPage> {
    const page = await this.api<NotionPage>('update', `/pages/${id}`, {
      method: 'PATCH',
      body: { properties: encodeProperties(fields) },
    });
    return toPage(page);
  }

  async move(id: string, target: MoveTarget): Promise<void> {
    const writes = moveWrites(this.bindings, target);
    if (Object.keys(writes).length) await this.update(id, writes);
  }

  private async setCompleted(id: string, completed: boolean): Promise<void> {
    const current = await this.fetchById(id);
    const writes = completionWrites(this.bindings, current, completed);
    if (Object.keys(writes).length) await this.update(id, writes);
  }

  async complete(id: string): Promise<void> {
    await this.setCompleted(id, true);
  }

  async reopen(id: string): Promise<void> {
    await this.setCompleted(id, false);
  }

  /** Pages are archived, not destroyed. */
  async delete(id: string): Promise<void> {
    await this.api<NotionPage>('archive', `/pages/${id}`, { method: 'PATCH', body: { archived: true } });
  }

  async annotate(id: string, text: string): Promise<void> {
    await this.api<NotionComment>('annotate', '/comments', {
      method: 'POST',
      body: { parent: { page_id: id }, rich_text: runs(text) },
    });
  }

  async listAnnotations(id: string): Promise<string[]> {
    const out: string[] = [];
    let cursor: string | undefined;
    do {
      const res = await this.api<NotionList<NotionComment>>('listAnnotations', '/comments', {
        query: { block_id: id, start_cursor: cursor },
      });
      out.push(...res.results.map((c) => plain(c.rich_text)));
      cursor = res.has_more ? (res.next_cursor ?? undefined) : undefined;
    } while (cursor);
    return out;
  }

  /** Select options are created on write, so any non-empty name resolves to itself. */
  async resolveProject(ref: string): Promise<string | undefined> {
    return ref.trim() || undefined;
  }

  async resolveLabel(name: string): Promise<string | undefined> {
    return name.trim() || undefined;
  }
}
