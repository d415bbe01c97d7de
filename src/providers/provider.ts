import type { SyncConfig } from '../config.js';
import type {
  MoveTarget,
  PlannerPage,
  PropertyWrites,
  Side,
  TaskManagerCreate,
  TaskManagerFields,
  TaskManagerTask,
} from '../model.js';

/**
 * Operations the engine needs from either side. `Raw` is the side's own
 * record shape; ids are opaque strings.
 */
export interface TaskStoreClient<Raw, Create, Update> {
  readonly side: Side;

  /** The record, or undefined when it does not exist (any more). */
  fetchById(id: string): Promise<Raw | undefined>;

  /** Records modified at or after `since`; every record when `since` is undefined. */
  queryChangedSince(since?: string): Promise<Raw[]>;

  queryChildren(parentId: string, excludeCompleted: boolean): Promise<Raw[]>;

  create(fields: Create): Promise<Raw>;
  update(id: string, fields: Update): Promise<Raw>;
  move(id: string, target: MoveTarget): Promise<void>;
  complete(id: string): Promise<void>;
  reopen(id: string): Promise<void>;
  delete(id: string): Promise<void>;

  /** Attach a free-text note (comment) to the record. */
  annotate(id: string, text: string): Promise<void>;
  listAnnotations(id: string): Promise<string[]>;

  /** Side-local project id for a project name, if one exists. */
  resolveProject(ref: string): Promise<string | undefined>;
  /** Canonical label name, if the label exists. */
  resolveLabel(name: string): Promise<string | undefined>;
}

/** Side A: database pages. Create and update take property writes. */
export type PlannerClient = TaskStoreClient<PlannerPage, PropertyWrites, PropertyWrites>;

/** Side B: flat tasks. */
export interface TaskManagerClient extends TaskStoreClient<TaskManagerTask, TaskManagerCreate, TaskManagerFields> {
  /** Create the label when missing; returns its name. */
  ensureLabel(name: string): Promise<string>;
}

/* ------------------------------------------------------------------ */
/*  Planner property bindings                                          */
/* ------------------------------------------------------------------ */

/** Which planner properties carry completion, parent and project. */
export interface PlannerBindings {
  completion?: { name: string; doneValue: string; openValue: string };
  parentProperty?: string;
  projectProperty?: string;
}

export function plannerBindings(config: SyncConfig): PlannerBindings {
  const projectProperty = Object.entries(config.fieldMapping).find(([, target]) => target === 'project')?.[0];
  return {
    completion: config.completionField,
    parentProperty: config.parentTaskField?.name,
    projectProperty,
  };
}

/** Completion write matching the type the page uses for the completion property. */
export function completionWrites(bindings: PlannerBindings, page: PlannerPage | undefined, completed: boolean): PropertyWrites {
  const field = bindings.completion;
  if (!field) return {};
  const type = page?.properties[field.name]?.type;
  if (type === 'checkbox') return { [field.name]: { type, checked: completed } };
  const name = completed ? field.doneValue : field.openValue;
  return { [field.name]: type === 'select' ? { type, name } : { type: 'status', name } };
}

export function moveWrites(bindings: PlannerBindings, target: MoveTarget): PropertyWrites {
  const writes: PropertyWrites = {};
  if (target.parent !== undefined && bindings.parentProperty) {
    writes[bindings.parentProperty] = { type: 'relation', ids: [target.parent] };
  }
  if (target.project !== undefined && bindings.projectProperty) {
    writes[bindings.projectProperty] = { type: 'select', name: target.project };
  }
  return writes;
}

export function isPlannerCompleted(bindings: PlannerBindings, page: PlannerPage): boolean {
  const field = bindings.completion;
  const v = field ? page.properties[field.name] : undefined;
  if (!field || !v) return false;
  if (v.type === 'checkbox') return v.checked;
  if (v.type === 'status' || v.type === 'select') return v.name === field.doneValue;
  return false;
}

export function plannerParentOf(bindings: PlannerBindings, page: PlannerPage): string | undefined {
  const v = bindings.parentProperty ? page.properties[bindings.parentProperty] : undefined;
  return v?.type === 'relation' ? v.ids[0] : undefined;
}
