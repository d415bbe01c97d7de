export type Side = 'A' | 'B';

export type SyncDirection = 'a_to_b' | 'b_to_a' | 'migrated';

/** Normalized priority: 1 is the most urgent, 4 the least. */
export type Priority = 1 | 2 | 3 | 4;

/**
 * Due value. Exact timestamps win over date-only values, which win over free
 * text; a recurrence expression is kept verbatim.
 */
export type Due =
  | { kind: 'datetime'; value: string }
  | { kind: 'date'; value: string }
  | { kind: 'recurrence'; value: string }
  | { kind: 'natural'; value: string };

/** Common shape both sides are reduced to before comparing or resolving. */
export interface NormalizedTask {
  /** Side-local id (opaque). */
  id: string;
  title: string;
  description?: string;
  due?: Due;
  priority: Priority;
  /** Order-insensitive. */
  labels: string[];
  /** Same-side parent id. */
  parentId?: string;
  /** Project name (side A) or project id (side B). */
  project?: string;
  completed: boolean;
  /** The target manages the due date as a repeating series. */
  recurring: boolean;
  createdAt?: string;
  lastModifiedAt?: string;
}

/* ------------------------------------------------------------------ */
/*  Side A: planner database pages                                     */
/* ------------------------------------------------------------------ */

/** Property value read from a planner page. Closed: unknown types are `unsupported`. */
export type PropertyValue =
  | { type: 'title'; text: string }
  | { type: 'rich_text'; text: string }
  | { type: 'select'; name: string | null }
  | { type: 'multi_select'; names: string[] }
  | { type: 'date'; start: string | null; end: string | null }
  | { type: 'checkbox'; checked: boolean }
  | { type: 'number'; value: number | null }
  | { type: 'relation'; ids: string[] }
  | { type: 'status'; name: string | null }
  | { type: 'unsupported'; kind: string };

/** Property value written to a planner page. */
export type PropertyWrite = Exclude<PropertyValue, { type: 'unsupported' }>;

export type PropertyWrites = Record<string, PropertyWrite>;

export interface PlannerPage {
  id: string;
  properties: Record<string, PropertyValue>;
  createdTime: string;
  lastEditedTime: string;
  archived: boolean;
}

/* ------------------------------------------------------------------ */
/*  Side B: task manager tasks                                         */
/* ------------------------------------------------------------------ */

export interface TaskManagerDue {
  /** `YYYY-MM-DD`. */
  date: string;
  /** Full timestamp when the due carries a time. */
  datetime?: string;
  /** Human-readable form, e.g. "every monday". */
  string?: string;
  isRecurring: boolean;
}

export interface TaskManagerTask {
  id: string;
  content: string;
  description: string;
  /** 4 is the most urgent, 1 the least. */
  priority: number;
  labels: string[];
  due?: TaskManagerDue;
  projectId?: string;
  parentId?: string;
  isCompleted: boolean;
  createdAt?: string;
  updatedAt?: string;
}

export type TaskManagerDueInput =
  | { dueDatetime: string }
  | { dueDate: string }
  | { dueString: string };

/** Writable task-manager fields. Project and parent changes go through `move`. */
export interface TaskManagerFields {
  content?: string;
  description?: string;
  priority?: number;
  labels?: string[];
  due?: TaskManagerDueInput;
}

export interface TaskManagerCreate extends TaskManagerFields {
  content: string;
  projectId?: string;
  parentId?: string;
}

export interface MoveTarget {
  project?: string;
  parent?: string;
}
