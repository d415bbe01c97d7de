import type { SyncConfig } from '../config.js';
import type {
  MoveTarget,
  PlannerPage,
  Side,
  SyncDirection,
  TaskManagerFields,
  TaskManagerTask,
} from '../model.js';
import type { PlannerClient, TaskManagerClient } from '../providers/provider.js';
import type { SyncStateRecord, SyncStateStore } from '../store/syncStateStore.js';
import type { Logger } from '../log.js';
import { ConflictDeferred, NotFoundError, ValidationError, errorMessage } from '../errors.js';
import type { FieldMapper } from './fieldMapper.js';
import type { ConflictResolver } from './conflictResolver.js';
import { isStrictlyAfter, latest, parseTimestamp } from './timestamps.js';

/** Everything a reconciliation needs, built once and shared. */
export interface SyncContext {
  planner: PlannerClient;
  tasks: TaskManagerClient;
  store: SyncStateStore;
  mapper: FieldMapper;
  resolver: ConflictResolver;
  config: SyncConfig;
  logger: Logger;
}

export type SkipReason = 'not_found' | 'counterpart_missing' | 'already_completed' | 'invalid' | 'unlinked';

export type SyncStage =
  | 'lookup_state'
  | 'fetch'
  | 'resolve'
  | 'map'
  | 'create'
  | 'complete'
  | 'update'
  | 'move'
  | 'record';

export type SyncOutcome =
  | { kind: 'created'; direction: SyncDirection; aId: string; bId: string }
  | { kind: 'updated'; direction: SyncDirection; aId: string; bId: string; changes: string[] }
  | { kind: 'unchanged'; direction: SyncDirection; aId: string; bId: string }
  | { kind: 'deferred'; direction: SyncDirection; id: string; reason: string }
  | { kind: 'skipped'; direction: SyncDirection; id: string; reason: SkipReason; detail?: string }
  | { kind: 'failed'; direction: SyncDirection; id: string; stage: SyncStage; error: string };

export type SyncOutcomeKind = SyncOutcome['kind'];

export interface RebuildReport {
  scanned: number;
  linked: number;
  alreadyLinked: number;
  unannotated: number;
}

const UNTITLED_PARENT = 'Untitled Parent Task';

/**
 * Whether a side changed since the last sync: its timestamp is after
 * `lastSyncedAt` and is not the one we recorded after our own write.
 */
function changedSince(current: string | undefined, recorded: string | null, lastSyncedAt: string): boolean {
  if (!current) return false;
  if (recorded && parseTimestamp(recorded) === parseTimestamp(current)) return false;
  return isStrictlyAfter(current, lastSyncedAt) === true;
}

function sameTimestamp(a: string | null | undefined, b: string | null | undefined): boolean {
  if (!a || !b) return !a && !b;
  return parseTimestamp(a) === parseTimestamp(b);
}

function taskTimestamp(t: TaskManagerTask): string | undefined {
  return t.updatedAt ?? t.createdAt;
}

/**
 * Reconciles one task at a time between the planner (A) and the task
 * manager (B).
 *
 * Per-task errors never escape: they come back as `failed`, `skipped` or
 * `deferred` outcomes and leave the state row alone.
 */
export class SyncEngine {
  private readonly log: Logger;

  constructor(private readonly ctx: SyncContext) {
    this.log = ctx.logger.child('engine');
  }

  private get prefix() {
    return this.ctx.config.annotationPrefix;
  }

  /** Dispatch by side. */
  sync(side: Side, id: string): Promise<SyncOutcome> {
    return side === 'A' ? this.syncFromA(id) : this.syncFromB(id);
  }

  /** Push a planner page to the task manager. */
  async syncFromA(aId: string): Promise<SyncOutcome> {
    const direction: SyncDirection = 'a_to_b';
    const stage: { at: SyncStage } = { at: 'lookup_state' };
    try {
      return await this.fromA(aId, stage);
    } catch (e) {
      return this.toOutcome(direction, 'A', aId, stage.at, e);
    }
  }

  /** Pull a task-manager task into the planner. */
  async syncFromB(bId: string): Promise<SyncOutcome> {
    const direction: SyncDirection = 'b_to_a';
    const stage: { at: SyncStage } = { at: 'lookup_state' };
    try {
      return await this.fromB(bId, stage);
    } catch (e) {
      return this.toOutcome(direction, 'B', bId, stage.at, e);
    }
  }

  private toOutcome(direction: SyncDirection, source: Side, id: string, stage: SyncStage, e: unknown): SyncOutcome {
    if (e instanceof ConflictDeferred) {
      this.log.info('deferred', { direction, id, reason: e.reason });
      return { kind: 'deferred', direction, id, reason: e.reason };
    }
    if (e instanceof NotFoundError) {
      const reason: SkipReason = e.side === source ? 'not_found' : 'counterpart_missing';
      this.log.warn(`skipped: ${reason}`, { direction, id, missing: `${e.side}:${e.id}` });
      return { kind: 'skipped', direction, id, reason, detail: e.message };
    }
    if (e instanceof ValidationError) {
      this.log.warn('skipped: invalid', { direction, id, error: e.message });
      return { kind: 'skipped', direction, id, reason: 'invalid', detail: e.message };
    }
    this.log.error('sync failed', { direction, id, stage, error: e });
    return { kind: 'failed', direction, id, stage, error: errorMessage(e) };
  }

  /* ---------------------------------------------------------------- */
  /*  A -> B                                                           */
  /* ---------------------------------------------------------------- */

  private async fromA(aId: string, stage: { at: SyncStage }): Promise<SyncOutcome> {
    const { planner, tasks, store, mapper, resolver } = this.ctx;
    const direction: SyncDirection = 'a_to_b';

    const prior = await store.getByA(aId);

    stage.at = 'fetch';
    const [page, task] = await Promise.all([
      planner.fetchById(aId),
      prior ? tasks.fetchById(prior.sideBId) : Promise.resolve(undefined),
    ]);
    if (!page) throw new NotFoundError('A', aId);

    if (!prior) return this.createInTaskManager(page, stage);
    if (!task) throw new NotFoundError('B', prior.sideBId);

    stage.at = 'resolve';
    const a = mapper.normalizePlanner(page);
    const b = mapper.normalizeTaskManager(task);
    const aChanged = changedSince(page.lastEditedTime, prior.sideALastModified, prior.lastSyncedAt);
    const bChanged = changedSince(taskTimestamp(task), prior.sideBLastModified, prior.lastSyncedAt);

    if (!aChanged && !bChanged) {
      return this.finish(direction, prior, page.lastEditedTime, taskTimestamp(task), []);
    }

    const conflict = aChanged && bChanged;
    if (bChanged) {
      const r = resolver.resolve(a, b, prior);
      if (!r.aWins) {
        await store.touchTimestamps(aId, page.lastEditedTime, undefined);
        if (conflict) await store.incrementConflict(aId);
        throw new ConflictDeferred(r.reason);
      }
      this.log.debug('counterpart changed; A wins', { aId, reason: r.reason });
    }

    const syncCompletion = !!this.ctx.config.completionField;
    if (syncCompletion && a.completed && b.completed) {
      return this.finish(direction, prior, page.lastEditedTime, taskTimestamp(task), [], conflict);
    }

    if (syncCompletion && a.completed !== b.completed) {
      stage.at = 'complete';
      if (a.completed) await tasks.complete(task.id);
      else await tasks.reopen(task.id);
      const changes = [a.completed ? 'completed' : 'reopened'];
      return this.finish(direction, prior, page.lastEditedTime, taskTimestamp(task), changes, conflict);
    }

    stage.at = 'map';
    const mapped = mapper.toTaskManager(page);
    const desired: TaskManagerFields = { ...mapped.fields };
    if (mapped.fields.labels) desired.labels = await this.labelsForTaskManager(mapped.fields.labels);
    const projectId = mapped.projectRef ? await this.resolveProject(mapped.projectRef) : undefined;
    const parentId = mapped.parentRef ? await this.parentInTaskManager(mapped.parentRef, projectId) : undefined;

    const changes: string[] = [];
    let bModified = taskTimestamp(task);

    const diff = mapper.diffTaskManager(task, desired);
    if (Object.keys(diff).length) {
      stage.at = 'update';
      const updated = await tasks.update(task.id, diff);
      bModified = latest(bModified, taskTimestamp(updated)) ?? bModified;
      changes.push(...Object.keys(diff));
    }

    const move: MoveTarget = {};
    if (parentId && parentId !== task.parentId) move.parent = parentId;
    else if (!mapped.parentRef && projectId && projectId !== task.projectId) move.project = projectId;
    if (move.parent || move.project) {
      stage.at = 'move';
      await tasks.move(task.id, move);
      changes.push(move.parent ? 'parent' : 'project');
    }

    return this.finish(direction, prior, page.lastEditedTime, bModified, changes, conflict);
  }

  private async createInTaskManager(page: PlannerPage, stage: { at: SyncStage }): Promise<SyncOutcome> {
    const { tasks, store, mapper } = this.ctx;

    if (mapper.isCompleted(page)) {
      return { kind: 'skipped', direction: 'a_to_b', id: page.id, reason: 'already_completed' };
    }

    stage.at = 'map';
    const mapped = mapper.toTaskManager(page);
    const content = mapped.fields.content?.trim();
    if (!content) throw new ValidationError(`page ${page.id} has no title`);

    const labels = await this.labelsForTaskManager(mapped.fields.labels ?? []);
    const projectId = mapped.projectRef ? await this.resolveProject(mapped.projectRef) : undefined;
    const parentId = mapped.parentRef ? await this.parentInTaskManager(mapped.parentRef, projectId) : undefined;

    stage.at = 'create';
    const created = await tasks.create({ ...mapped.fields, content, labels, projectId, parentId });
    await tasks.annotate(created.id, `${this.prefix} ${page.id}`);

    stage.at = 'record';
    await store.upsert(page.id, created.id, page.lastEditedTime, taskTimestamp(created), 'a_to_b');
    this.log.info('created in B', { aId: page.id, bId: created.id, title: content });
    return { kind: 'created', direction: 'a_to_b', aId: page.id, bId: created.id };
  }

  /** Mapped labels that exist on B, plus the source label. Unknown labels are dropped. */
  private async labelsForTaskManager(names: string[]): Promise<string[]> {
    const { tasks, config } = this.ctx;
    const out: string[] = [];
    for (const name of names) {
      const resolved = await tasks.resolveLabel(name);
      if (resolved) out.push(resolved);
      else this.log.warn('label not found on B; dropped', { label: name });
    }
    const source = await tasks.ensureLabel(config.sourceLabel);
    if (!out.some((l) => l.toLowerCase() === source.toLowerCase())) out.push(source);
    return out;
  }

  private async resolveProject(ref: string): Promise<string | undefined> {
    const id = await this.ctx.tasks.resolveProject(ref);
    if (!id) this.log.warn('project not found on B; dropped', { project: ref });
    return id;
  }

  /**
   * B id for a planner parent page. An unpaired parent is created on B when
   * enabled and it has more than one open child.
   */
  private async parentInTaskManager(parentAId: string, projectId: string | undefined): Promise<string | undefined> {
    const { planner, tasks, store, mapper, config } = this.ctx;

    const row = await store.getByA(parentAId);
    if (row) return row.sideBId;

    const parentCfg = config.parentTaskField;
    if (!parentCfg?.createParent) {
      this.log.debug('parent not paired; left flat', { parentAId });
      return undefined;
    }

    const children = await planner.queryChildren(parentAId, true);
    if (children.length <= 1) return undefined;

    const parent = await planner.fetchById(parentAId);
    if (!parent) {
      this.log.warn('parent page not found', { parentAId });
      return undefined;
    }

    const content = mapper.titleOf(parent, parentCfg.titleField) ?? UNTITLED_PARENT;
    const created = await tasks.create({
      content,
      labels: await this.labelsForTaskManager([]),
      projectId,
    });
    await tasks.annotate(created.id, `${this.prefix} ${parentAId}`);
    await store.upsert(parentAId, created.id, parent.lastEditedTime, taskTimestamp(created), 'a_to_b');
    this.log.info('created parent in B', { aId: parentAId, bId: created.id, children: children.length });
    return created.id;
  }

  /* ---------------------------------------------------------------- */
  /*  B -> A                                                           */
  /* ---------------------------------------------------------------- */

  private async fromB(bId: string, stage: { at: SyncStage }): Promise<SyncOutcome> {
    const { planner, tasks, store, mapper, resolver } = this.ctx;
    const direction: SyncDirection = 'b_to_a';

    const prior = await store.getByB(bId);

    stage.at = 'fetch';
    const [task, pairedPage] = await Promise.all([
      tasks.fetchById(bId),
      prior ? planner.fetchById(prior.sideAId) : Promise.resolve(undefined),
    ]);
    if (!task) throw new NotFoundError('B', bId);

    let page: PlannerPage | undefined;
    if (prior) {
      page = pairedPage;
      if (!page) throw new NotFoundError('A', prior.sideAId);
    } else {
      stage.at = 'lookup_state';
      const aId = await this.findBackReference(bId);
      if (!aId) return this.createInPlanner(task, stage);
      stage.at = 'fetch';
      page = await planner.fetchById(aId);
      if (!page) throw new NotFoundError('A', aId);
    }

    stage.at = 'resolve';
    const a = mapper.normalizePlanner(page);
    const b = mapper.normalizeTaskManager(task);

    let conflict = false;
    if (prior) {
      const aChanged = changedSince(page.lastEditedTime, prior.sideALastModified, prior.lastSyncedAt);
      const bChanged = changedSince(taskTimestamp(task), prior.sideBLastModified, prior.lastSyncedAt);
      if (!aChanged && !bChanged) return this.finishFromB(prior, page, page.lastEditedTime, task, []);

      conflict = aChanged && bChanged;
      if (aChanged) {
        const r = resolver.resolve(a, b, prior);
        if (r.aWins) {
          await store.touchTimestamps(prior.sideAId, undefined, taskTimestamp(task));
          if (conflict) await store.incrementConflict(prior.sideAId);
          throw new ConflictDeferred(r.reason);
        }
        this.log.debug('counterpart changed; B wins', { bId, reason: r.reason });
      }
    }

    const syncCompletion = !!this.ctx.config.completionField;
    if (syncCompletion && a.completed && b.completed) {
      return this.finishFromB(prior, page, page.lastEditedTime, task, [], conflict);
    }

    if (syncCompletion && a.completed !== b.completed) {
      stage.at = 'complete';
      if (b.completed) await planner.complete(page.id);
      else await planner.reopen(page.id);
      return this.finishFromB(prior, page, undefined, task, [b.completed ? 'completed' : 'reopened'], conflict);
    }

    stage.at = 'map';
    const writes = mapper.diffPlanner(page, mapper.toPlanner(b, page));
    const changes: string[] = [];
    let aModified: string | undefined = page.lastEditedTime;

    if (Object.keys(writes).length) {
      stage.at = 'update';
      const updated = await planner.update(page.id, writes);
      aModified = updated.lastEditedTime;
      changes.push(...Object.keys(writes));
    }

    if (task.parentId) {
      const parentRow = await store.getByB(task.parentId);
      if (parentRow && parentRow.sideAId !== a.parentId) {
        stage.at = 'move';
        await planner.move(page.id, { parent: parentRow.sideAId });
        aModified = undefined;
        changes.push('parent');
      }
    }

    return this.finishFromB(prior, page, aModified, task, changes, conflict);
  }

  private async createInPlanner(task: TaskManagerTask, stage: { at: SyncStage }): Promise<SyncOutcome> {
    const { planner, tasks, store, mapper, config } = this.ctx;

    if (!config.bidirectional.createInPlanner) {
      return { kind: 'skipped', direction: 'b_to_a', id: task.id, reason: 'unlinked' };
    }
    if (task.isCompleted) {
      return { kind: 'skipped', direction: 'b_to_a', id: task.id, reason: 'already_completed' };
    }
    if (!task.content.trim()) throw new ValidationError(`task ${task.id} has no content`);

    stage.at = 'create';
    const normalized = mapper.normalizeTaskManager(task);
    const created = await planner.create(mapper.toPlanner(normalized));

    let aModified: string | undefined = created.lastEditedTime;
    const parentRow = task.parentId ? await store.getByB(task.parentId) : undefined;
    if (parentRow) {
      await planner.move(created.id, { parent: parentRow.sideAId });
      aModified = undefined;
    }

    await tasks.annotate(task.id, `${this.prefix} ${created.id}`);

    stage.at = 'record';
    await store.upsert(created.id, task.id, aModified, taskTimestamp(task), 'b_to_a');
    this.log.info('created in A', { aId: created.id, bId: task.id, title: task.content });
    return { kind: 'created', direction: 'b_to_a', aId: created.id, bId: task.id };
  }

  /** Planner id from a `<prefix> <id>` annotation on the B task. */
  private async findBackReference(bId: string): Promise<string | undefined> {
    const notes = await this.ctx.tasks.listAnnotations(bId);
    return parseBackReference(notes, this.prefix);
  }

  /* ---------------------------------------------------------------- */
  /*  Recording                                                        */
  /* ---------------------------------------------------------------- */

  /**
   * Record the pass. A pass that wrote nothing and saw the recorded
   * timestamps leaves the row untouched. A conflict is counted only here,
   * once the writes went through.
   */
  private async finish(
    direction: SyncDirection,
    prior: SyncStateRecord,
    aModified: string | undefined,
    bModified: string | undefined,
    changes: string[],
    conflict = false,
  ): Promise<SyncOutcome> {
    const { store } = this.ctx;
    const aId = prior.sideAId;
    const bId = prior.sideBId;

    if (!changes.length) {
      if (!sameTimestamp(aModified, prior.sideALastModified) || !sameTimestamp(bModified, prior.sideBLastModified)) {
        await store.touchTimestamps(aId, aModified, bModified);
      }
      if (conflict) await store.incrementConflict(aId);
      return { kind: 'unchanged', direction, aId, bId };
    }

    await store.upsert(aId, bId, aModified, bModified, direction);
    if (conflict) await store.incrementConflict(aId);
    this.log.info('updated', { direction, aId, bId, changes });
    return { kind: 'updated', direction, aId, bId, changes };
  }

  private async finishFromB(
    prior: SyncStateRecord | undefined,
    page: PlannerPage,
    aModified: string | undefined,
    task: TaskManagerTask,
    changes: string[],
    conflict = false,
  ): Promise<SyncOutcome> {
    if (prior) return this.finish('b_to_a', prior, aModified, taskTimestamp(task), changes, conflict);

    // paired through the back-reference only
    await this.ctx.store.upsert(page.id, task.id, aModified, taskTimestamp(task), 'b_to_a');
    return changes.length
      ? { kind: 'updated', direction: 'b_to_a', aId: page.id, bId: task.id, changes }
      : { kind: 'unchanged', direction: 'b_to_a', aId: page.id, bId: task.id };
  }

  /* ---------------------------------------------------------------- */
  /*  Rebuild                                                          */
  /* ---------------------------------------------------------------- */

  /**
   * Recreate missing pairings from the back-reference annotations on B.
   * Rows are recorded with direction `migrated`; existing rows are kept.
   */
  async rebuildState(): Promise<RebuildReport> {
    const { tasks, store } = this.ctx;
    const report: RebuildReport = { scanned: 0, linked: 0, alreadyLinked: 0, unannotated: 0 };

    for (const task of await tasks.queryChangedSince(undefined)) {
      report.scanned++;
      const aId = parseBackReference(await tasks.listAnnotations(task.id), this.prefix);
      if (!aId) {
        report.unannotated++;
        continue;
      }
      if ((await store.getByA(aId)) || (await store.getByB(task.id))) {
        report.alreadyLinked++;
        continue;
      }
      await store.upsert(aId, task.id, undefined, taskTimestamp(task), 'migrated');
      report.linked++;
    }

    this.log.info('state rebuilt', report);
    return report;
  }
}

/** Last `<prefix> <id>` line among the notes. */
export function parseBackReference(notes: string[], prefix: string): string | undefined {
  let found: string | undefined;
  for (const note of notes) {
    for (const line of note.split('\n')) {
      const trimmed = line.trim();
      if (!trimmed.startsWith(prefix)) continue;
      const id = trimmed.slice(prefix.length).trim();
      if (id) found = id;
    }
  }
  return found;
}
