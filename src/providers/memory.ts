import type {
  MoveTarget,
  PlannerPage,
  PropertyValue,
  PropertyWrites,
  TaskManagerCreate,
  TaskManagerDue,
  TaskManagerDueInput,
  TaskManagerFields,
  TaskManagerTask,
} from '../model.js';
import {
  completionWrites,
  isPlannerCompleted,
  moveWrites,
  plannerParentOf,
  type PlannerBindings,
  type PlannerClient,
  type TaskManagerClient,
} from './provider.js';
import { looksLikeRecurrence } from '../sync/fieldMapper.js';
import { parseTimestamp } from '../sync/timestamps.js';

export interface MemoryClientOptions {
  now?: () => Date;
  /** Id prefix for created records. */
  idPrefix?: string;
}

/**
 * In-process planner for local dev and tests.
 *
 * Every mutating call is recorded in {@link writes} as `op:id`.
 */
export class MemoryPlanner implements PlannerClient {
  readonly side = 'A' as const;
  readonly writes: string[] = [];

  private pages = new Map<string, PlannerPage>();
  private comments = new Map<string, string[]>();
  private seq = 0;
  private now: () => Date;
  private idPrefix: string;

  constructor(
    private bindings: PlannerBindings = {},
    opts: MemoryClientOptions = {},
  ) {
    this.now = opts.now ?? (() => new Date());
    this.idPrefix = opts.idPrefix ?? 'page';
  }

  /** Insert or replace a page as given (no write is recorded). */
  put(page: PlannerPage): PlannerPage {
    this.pages.set(page.id, structuredClone(page));
    return page;
  }

  /** Current page including archived ones. */
  peek(id: string): PlannerPage | undefined {
    const p = this.pages.get(id);
    return p ? structuredClone(p) : undefined;
  }

  async fetchById(id: string): Promise<PlannerPage | undefined> {
    const p = this.pages.get(id);
    return p && !p.archived ? structuredClone(p) : undefined;
  }

  async queryChangedSince(since?: string): Promise<PlannerPage[]> {
    const sinceMs = parseTimestamp(since);
    return [...this.pages.values()]
      .filter((p) => !p.archived)
      .filter((p) => sinceMs === undefined || (parseTimestamp(p.lastEditedTime) ?? 0) >= sinceMs)
      .map((p) => structuredClone(p));
  }

  async queryChildren(parentId: string, excludeCompleted: boolean): Promise<PlannerPage[]> {
    return [...this.pages.values()]
      .filter((p) => !p.archived && plannerParentOf(this.bindings, p) === parentId)
      .filter((p) => !excludeCompleted || !isPlannerCompleted(this.bindings, p))
      .map((p) => structuredClone(p));
  }

  async create(fields: PropertyWrites): Promise<PlannerPage> {
    const at = this.now().toISOString();
    const page: PlannerPage = {
      id: `${this.idPrefix}-${++this.seq}`,
      properties: { ...fields },
      createdTime: at,
      lastEditedTime: at,
      archived: false,
    };
    this.pages.set(page.id, page);
    this.writes.push(`create:${page.id}`);
    return structuredClone(page);
  }

  async update(id: string, fields: PropertyWrites): Promise<PlannerPage> {
    const page = this.pages.get(id);
    if (!page) throw new Error(`page ${id} not found`);
    const properties: Record<string, PropertyValue> = { ...page.properties, ...fields };
    const next: PlannerPage = { ...page, properties, lastEditedTime: this.now().toISOString() };
    this.pages.set(id, next);
    this.writes.push(`update:${id}`);
    return structuredClone(next);
  }

  async move(id: string, target: MoveTarget): Promise<void> {
    const writes = moveWrites(this.bindings, target);
    if (Object.keys(writes).length) await this.update(id, writes);
  }

  private async setCompleted(id: string, completed: boolean): Promise<void> {
    const writes = completionWrites(this.bindings, this.pages.get(id), completed);
    if (Object.keys(writes).length) await this.update(id, writes);
  }

  async complete(id: string): Promise<void> {
    await this.setCompleted(id, true);
  }

  async reopen(id: string): Promise<void> {
    await this.setCompleted(id, false);
  }

  async delete(id: string): Promise<void> {
    const page = this.pages.get(id);
    if (!page) return;
    this.pages.set(id, { ...page, archived: true, lastEditedTime: this.now().toISOString() });
    this.writes.push(`delete:${id}`);
  }

  async annotate(id: string, text: string): Promise<void> {
    this.comments.set(id, [...(this.comments.get(id) ?? []), text]);
    this.writes.push(`annotate:${id}`);
  }

  async listAnnotations(id: string): Promise<string[]> {
    return [...(this.comments.get(id) ?? [])];
  }

  async resolveProject(ref: string): Promise<string | undefined> {
    return ref.trim() || undefined;
  }

  async resolveLabel(name: string): Promise<string | undefined> {
    return name.trim() || undefined;
  }
}

/** In-process task manager for local dev and tests. Mutations are recorded in {@link writes}. */
export class MemoryTaskManager implements TaskManagerClient {
  readonly side = 'B' as const;
  readonly writes: string[] = [];

  private tasks = new Map<string, TaskManagerTask>();
  private comments = new Map<string, string[]>();
  private projects = new Map<string, string>();
  private labels = new Map<string, string>();
  private seq = 0;
  private now: () => Date;
  private idPrefix: string;

  constructor(opts: MemoryClientOptions = {}) {
    this.now = opts.now ?? (() => new Date());
    this.idPrefix = opts.idPrefix ?? 'task';
  }

  put(task: TaskManagerTask): TaskManagerTask {
    this.tasks.set(task.id, structuredClone(task));
    return task;
  }

  peek(id: string): TaskManagerTask | undefined {
    const t = this.tasks.get(id);
    return t ? structuredClone(t) : undefined;
  }

  addProject(name: string, id = `project-${name.toLowerCase().replace(/\s+/g, '-')}`): string {
    this.projects.set(name.toLowerCase(), id);
    return id;
  }

  addLabel(name: string): void {
    this.labels.set(name.toLowerCase(), name);
  }

  /** Seed a comment without recording a write. */
  seedAnnotation(id: string, text: string): void {
    this.comments.set(id, [...(this.comments.get(id) ?? []), text]);
  }

  private due(input: TaskManagerDueInput): TaskManagerDue {
    if ('dueDatetime' in input) return { date: input.dueDatetime.slice(0, 10), datetime: input.dueDatetime, isRecurring: false };
    if ('dueDate' in input) return { date: input.dueDate, isRecurring: false };
    return {
      date: this.now().toISOString().slice(0, 10),
      string: input.dueString,
      isRecurring: looksLikeRecurrence(input.dueString),
    };
  }

  async fetchById(id: string): Promise<TaskManagerTask | undefined> {
    const t = this.tasks.get(id);
    return t ? structuredClone(t) : undefined;
  }

  async queryChangedSince(since?: string): Promise<TaskManagerTask[]> {
    const sinceMs = parseTimestamp(since);
    return [...this.tasks.values()]
      .filter((t) => sinceMs === undefined || (parseTimestamp(t.updatedAt ?? t.createdAt) ?? 0) >= sinceMs)
      .map((t) => structuredClone(t));
  }

  async queryChildren(parentId: string, excludeCompleted: boolean): Promise<TaskManagerTask[]> {
    return [...this.tasks.values()]
      .filter((t) => t.parentId === parentId && (!excludeCompleted || !t.isCompleted))
      .map((t) => structuredClone(t));
  }

  async create(fields: TaskManagerCreate): Promise<TaskManagerTask> {
    const at = this.now().toISOString();
    const task: TaskManagerTask = {
      id: `${this.idPrefix}-${++this.seq}`,
      content: fields.content,
      description: fields.description ?? '',
      priority: fields.priority ?? 1,
      labels: fields.labels ?? [],
      due: fields.due ? this.due(fields.due) : undefined,
      projectId: fields.projectId,
      parentId: fields.parentId,
      isCompleted: false,
      createdAt: at,
      updatedAt: at,
    };
    this.tasks.set(task.id, task);
    this.writes.push(`create:${task.id}`);
    return structuredClone(task);
  }

  private mutate(id: string, op: string, change: (t: TaskManagerTask) => TaskManagerTask): TaskManagerTask {
    const t = this.tasks.get(id);
    if (!t) throw new Error(`task ${id} not found`);
    const next = { ...change(t), updatedAt: this.now().toISOString() };
    this.tasks.set(id, next);
    this.writes.push(`${op}:${id}`);
    return structuredClone(next);
  }

  async update(id: string, fields: TaskManagerFields): Promise<TaskManagerTask> {
    return this.mutate(id, 'update', (t) => ({
      ...t,
      ...(fields.content !== undefined ? { content: fields.content } : {}),
      ...(fields.description !== undefined ? { description: fields.description } : {}),
      ...(fields.priority !== undefined ? { priority: fields.priority } : {}),
      ...(fields.labels !== undefined ? { labels: fields.labels } : {}),
      ...(fields.due ? { due: this.due(fields.due) } : {}),
    }));
  }

  async move(id: string, target: MoveTarget): Promise<void> {
    this.mutate(id, 'move', (t) => {
      if (target.parent) {
        const parent = this.tasks.get(target.parent);
        return { ...t, parentId: target.parent, projectId: parent?.projectId ?? t.projectId };
      }
      return target.project ? { ...t, projectId: target.project, parentId: undefined } : t;
    });
  }

  async complete(id: string): Promise<void> {
    this.mutate(id, 'complete', (t) => ({ ...t, isCompleted: true }));
  }

  async reopen(id: string): Promise<void> {
    this.mutate(id, 'reopen', (t) => ({ ...t, isCompleted: false }));
  }

  async delete(id: string): Promise<void> {
    if (!this.tasks.delete(id)) return;
    this.writes.push(`delete:${id}`);
  }

  async annotate(id: string, text: string): Promise<void> {
    this.comments.set(id, [...(this.comments.get(id) ?? []), text]);
    this.writes.push(`annotate:${id}`);
  }

  async listAnnotations(id: string): Promise<string[]> {
    return [...(this.comments.get(id) ?? [])];
  }

  async resolveProject(ref: string): Promise<string | undefined> {
    const byName = this.projects.get(ref.trim().toLowerCase());
    if (byName) return byName;
    return [...this.projects.values()].includes(ref) ? ref : undefined;
  }

  async resolveLabel(name: string): Promise<string | undefined> {
    return this.labels.get(name.trim().toLowerCase());
  }

  async ensureLabel(name: string): Promise<string> {
    const existing = await this.resolveLabel(name);
    if (existing) return existing;
    this.addLabel(name.trim());
    this.writes.push(`label:${name.trim()}`);
    return name.trim();
  }
}
