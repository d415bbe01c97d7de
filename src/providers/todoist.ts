import type {
  MoveTarget,
  TaskManagerCreate,
  TaskManagerDue,
  TaskManagerDueInput,
  TaskManagerFields,
  TaskManagerTask,
} from '../model.js';
import type { TaskManagerClient } from './provider.js';
import { isNotFound, requestJson, type FetchLike, type JsonRequestOptions } from '../http.js';
import { CollaboratorError } from '../errors.js';
import { parseTimestamp } from '../sync/timestamps.js';

export interface TodoistTaskManagerOptions {
  token: string;
  baseUrl?: string;
  /** Inject fetch for tests */
  fetcher?: FetchLike;
}

interface TodoistDue {
  /** `YYYY-MM-DD`, or a full timestamp when the due has a time. */
  date: string;
  datetime?: string | null;
  string?: string;
  is_recurring?: boolean;
  timezone?: string | null;
}

interface TodoistTask {
  id: string;
  content: string;
  description?: string;
  priority?: number;
  labels?: string[];
  due?: TodoistDue | null;
  project_id?: string | null;
  parent_id?: string | null;
  checked?: boolean;
  is_deleted?: boolean;
  added_at?: string | null;
  updated_at?: string | null;
}

interface Page<T> {
  results: T[];
  next_cursor: string | null;
}

interface TodoistProject {
  id: string;
  name: string;
}

interface TodoistLabel {
  id: string;
  name: string;
}

interface TodoistComment {
  id: string;
  content: string;
}

function toDue(d: TodoistDue | null | undefined): TaskManagerDue | undefined {
  if (!d?.date) return undefined;
  const datetime = d.datetime ?? (d.date.includes('T') ? d.date : undefined);
  return {
    date: d.date.slice(0, 10),
    ...(datetime ? { datetime } : {}),
    ...(d.string ? { string: d.string } : {}),
    isRecurring: !!d.is_recurring,
  };
}

function toTask(t: TodoistTask): TaskManagerTask {
  return {
    id: t.id,
    content: t.content,
    description: t.description ?? '',
    priority: t.priority ?? 1,
    labels: t.labels ?? [],
    due: toDue(t.due),
    projectId: t.project_id ?? undefined,
    parentId: t.parent_id ?? undefined,
    isCompleted: !!t.checked,
    createdAt: t.added_at ?? undefined,
    updatedAt: t.updated_at ?? undefined,
  };
}

function dueBody(due: TaskManagerDueInput): Record<string, string> {
  if ('dueDatetime' in due) return { due_datetime: due.dueDatetime };
  if ('dueDate' in due) return { due_date: due.dueDate };
  return { due_string: due.dueString };
}

function fieldsBody(fields: TaskManagerFields): Record<string, unknown> {
  return {
    ...(fields.content !== undefined ? { content: fields.content } : {}),
    ...(fields.description !== undefined ? { description: fields.description } : {}),
    ...(fields.priority !== undefined ? { priority: fields.priority } : {}),
    ...(fields.labels !== undefined ? { labels: fields.labels } : {}),
    ...(fields.due ? dueBody(fields.due) : {}),
  };
}

/** Flat task manager backed by the Todoist API (v1). */
export class TodoistTaskManager implements TaskManagerClient {
  readonly side = 'B' as const;

  private fetcher: FetchLike;
  private baseUrl: string;
  private projects?: Map<string, string>;
  private labels?: Map<string, string>;

  constructor(private opts: TodoistTaskManagerOptions) {
    this.fetcher = opts.fetcher ?? fetch;
    this.baseUrl = (opts.baseUrl ?? 'https://api.todoist.com/api/v1').replace(/\/$/, '');
  }

  private async api<T>(operation: string, path: string, init: JsonRequestOptions = {}): Promise<T> {
    try {
      return await requestJson<T>(
        `${this.baseUrl}${path}`,
        { ...init, headers: { authorization: `Bearer ${this.opts.token}`, ...(init.headers ?? {}) } },
        this.fetcher,
      );
    } catch (e) {
      throw new CollaboratorError('B', operation, e);
    }
  }

  private async paged<T>(operation: string, path: string, query: JsonRequestOptions['query'] = {}): Promise<T[]> {
    const out: T[] = [];
    let cursor: string | undefined;
    do {
      const res = await this.api<Page<T>>(operation, path, { query: { ...query, limit: 200, cursor } });
      out.push(...res.results);
      cursor = res.next_cursor ?? undefined;
    } while (cursor);
    return out;
  }

  async fetchById(id: string): Promise<TaskManagerTask | undefined> {
    try {
      const t = await this.api<TodoistTask>('fetch', `/tasks/${id}`);
      return t.is_deleted ? undefined : toTask(t);
    } catch (e) {
      if (e instanceof CollaboratorError && isNotFound(e.cause)) return undefined;
      throw e;
    }
  }

  /** Active tasks only; the listing endpoint has no modification filter, so it is applied here. */
  async queryChangedSince(since?: string): Promise<TaskManagerTask[]> {
    const all = (await this.paged<TodoistTask>('query', '/tasks')).map(toTask);
    const sinceMs = parseTimestamp(since);
    if (sinceMs === undefined) return all;
    return all.filter((t) => (parseTimestamp(t.updatedAt ?? t.createdAt) ?? 0) >= sinceMs);
  }

  async queryChildren(parentId: string, excludeCompleted: boolean): Promise<TaskManagerTask[]> {
    const children = (await this.paged<TodoistTask>('queryChildren', '/tasks', { parent_id: parentId })).map(toTask);
    return excludeCompleted ? children.filter((t) => !t.isCompleted) : children;
  }

  async create(fields: TaskManagerCreate): Promise<TaskManagerTask> {
    const t = await this.api<TodoistTask>('create', '/tasks', {
      method: 'POST',
      body: {
        ...fieldsBody(fields),
        ...(fields.projectId ? { project_id: fields.projectId } : {}),
        ...(fields.parentId ? { parent_id: fields.parentId } : {}),
      },
    });
    return toTask(t);
  }

  async update(id: string, fields: TaskManagerFields): Promise<TaskManagerTask> {
    const t = await this.api<TodoistTask>('update', `/tasks/${id}`, { method: 'POST', body: fieldsBody(fields) });
    return toTask(t);
  }

  /** One destination per call: a parent move implies the parent's project. */
  async move(id: string, target: MoveTarget): Promise<void> {
    if (target.parent) {
      await this.api<unknown>('move', `/tasks/${id}/move`, { method: 'POST', body: { parent_id: target.parent } });
    } else if (target.project) {
      await this.api<unknown>('move', `/tasks/${id}/move`, { method: 'POST', body: { project_id: target.project } });
    }
  }

  async complete(id: string): Promise<void> {
    await this.api<unknown>('complete', `/tasks/${id}/close`, { method: 'POST' });
  }

  async reopen(id: string): Promise<void> {
    await this.api<unknown>('reopen', `/tasks/${id}/reopen`, { method: 'POST' });
  }

  async delete(id: string): Promise<void> {
    try {
      await this.api<unknown>('delete', `/tasks/${id}`, { method: 'DELETE' });
    } catch (e) {
      // already gone
      if (!(e instanceof CollaboratorError && isNotFound(e.cause))) throw e;
    }
  }

  async annotate(id: string, text: string): Promise<void> {
    await this.api<TodoistComment>('annotate', '/comments', { method: 'POST', body: { task_id: id, content: text } });
  }

  async listAnnotations(id: string): Promise<string[]> {
    const comments = await this.paged<TodoistComment>('listAnnotations', '/comments', { task_id: id });
    return comments.map((c) => c.content);
  }

  private async projectIndex(): Promise<Map<string, string>> {
    if (!this.projects) {
      const list = await this.paged<TodoistProject>('projects', '/projects');
      this.projects = new Map(list.map((p) => [p.name.toLowerCase(), p.id] as const));
    }
    return this.projects;
  }

  private async labelIndex(): Promise<Map<string, string>> {
    if (!this.labels) {
      const list = await this.paged<TodoistLabel>('labels', '/labels');
      this.labels = new Map(list.map((l) => [l.name.toLowerCase(), l.name] as const));
    }
    return this.labels;
  }

  /** Project id by name (case-insensitive), or a known project id as is. */
  async resolveProject(ref: string): Promise<string | undefined> {
    const index = await this.projectIndex();
    const byName = index.get(ref.trim().toLowerCase());
    if (byName) return byName;
    return [...index.values()].includes(ref) ? ref : undefined;
  }

  async resolveLabel(name: string): Promise<string | undefined> {
    return (await this.labelIndex()).get(name.trim().toLowerCase());
  }

  async ensureLabel(name: string): Promise<string> {
    const existing = await this.resolveLabel(name);
    if (existing) return existing;
    const created = await this.api<TodoistLabel>('ensureLabel', '/labels', { method: 'POST', body: { name: name.trim() } });
    (await this.labelIndex()).set(created.name.toLowerCase(), created.name);
    return created.name;
  }
}
