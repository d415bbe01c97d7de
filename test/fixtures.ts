import { mkdtemp } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { parseSyncConfig } from '../src/config.js';
import { createContext } from '../src/context.js';
import { silentLogger } from '../src/log.js';
import type { PlannerPage, PropertyValue, TaskManagerTask } from '../src/model.js';
import { MemoryPlanner, MemoryTaskManager } from '../src/providers/memory.js';
import { plannerBindings } from '../src/providers/provider.js';
import { SyncEngine } from '../src/sync/engine.js';

export const T0 = '2024-01-05T12:00:00.000Z';

/** Clock that only moves when told to. */
export class TestClock {
  private ms: number;

  constructor(start = T0) {
    this.ms = Date.parse(start);
  }

  now = (): Date => new Date(this.ms);

  iso(): string {
    return this.now().toISOString();
  }

  advance(minutes: number): string {
    this.ms += minutes * 60_000;
    return this.iso();
  }
}

/** ISO timestamp `minutes` away from T0. */
export function at(minutes: number): string {
  return new Date(Date.parse(T0) + minutes * 60_000).toISOString();
}

export const BASE_CONFIG = {
  fieldMapping: { Name: 'content', Due: 'due_date', Priority: 'priority', Area: 'project', Tags: 'labels' },
  descriptionFields: { enabled: true, fields: [{ name: 'Notes' }] },
  completionField: { name: 'Status' },
  parentTaskField: { name: 'Parent', createParent: true },
};

export const title = (text: string): PropertyValue => ({ type: 'title', text });
export const status = (name: string): PropertyValue => ({ type: 'status', name });
export const date = (start: string): PropertyValue => ({ type: 'date', start, end: null });

export function page(id: string, properties: Record<string, PropertyValue>, edited = at(-60)): PlannerPage {
  return { id, properties, createdTime: at(-120), lastEditedTime: edited, archived: false };
}

export function task(id: string, fields: Partial<TaskManagerTask> = {}): TaskManagerTask {
  return {
    id,
    content: 'Task',
    description: '',
    priority: 1,
    labels: [],
    isCompleted: false,
    createdAt: at(-120),
    updatedAt: at(-60),
    ...fields,
  };
}

export async function tempDir(): Promise<string> {
  return mkdtemp(path.join(os.tmpdir(), 'tasklink-'));
}

export async function harness(overrides: Record<string, unknown> = {}) {
  const clock = new TestClock();
  const config = parseSyncConfig({ ...BASE_CONFIG, ...overrides });
  const planner = new MemoryPlanner(plannerBindings(config), { now: clock.now });
  const tasks = new MemoryTaskManager({ now: clock.now });
  const dir = await tempDir();
  const ctx = createContext({ env: {}, config, logger: silentLogger, stateDir: dir, planner, tasks, now: clock.now });
  return { clock, config, planner, tasks, dir, ctx, store: ctx.store, engine: new SyncEngine(ctx) };
}
