import type { SyncConfig, TargetField } from '../config.js';
import type {
  Due,
  NormalizedTask,
  PlannerPage,
  Priority,
  PropertyValue,
  PropertyWrite,
  PropertyWrites,
  TaskManagerDue,
  TaskManagerDueInput,
  TaskManagerFields,
  TaskManagerTask,
} from '../model.js';
import { isPlannerCompleted, plannerBindings, plannerParentOf, type PlannerBindings } from '../providers/provider.js';
import { parseTimestamp } from './timestamps.js';

export const RECURRENCE_KEYWORDS = [
  'every',
  'daily',
  'weekly',
  'monthly',
  'yearly',
  'each',
  'workday',
  'weekday',
] as const;

/** Keyword heuristic: "every monday", "Daily", "each workday"... */
export function looksLikeRecurrence(value: string | undefined): boolean {
  if (!value) return false;
  const lower = value.toLowerCase();
  return RECURRENCE_KEYWORDS.some((kw) => lower.includes(kw));
}

/* ------------------------------------------------------------------ */
/*  Priority                                                           */
/* ------------------------------------------------------------------ */

// Planner: 1 is the most urgent. Task manager: 4 is the most urgent.
const TO_TASK_MANAGER: Record<Priority, number> = { 1: 4, 2: 3, 3: 2, 4: 1 };
const FROM_TASK_MANAGER: Record<number, Priority> = { 4: 1, 3: 2, 2: 3, 1: 4 };

function isPriority(n: number): n is Priority {
  return n === 1 || n === 2 || n === 3 || n === 4;
}

/** Planner-scale value ("2", 2) to normalized priority; out of domain -> 4. */
export function parsePlannerPriority(raw: string | number | null | undefined): Priority {
  const n = typeof raw === 'number' ? raw : Number(String(raw ?? '').trim());
  return Number.isInteger(n) && isPriority(n) ? n : 4;
}

/** Normalized priority to the task manager's scale; out of domain -> 1. */
export function toTaskManagerPriority(p: number): number {
  return isPriority(p) ? TO_TASK_MANAGER[p] : 1;
}

/** Task-manager priority to the normalized scale; out of domain -> 4. */
export function fromTaskManagerPriority(p: number): Priority {
  return FROM_TASK_MANAGER[p] ?? 4;
}

/* ------------------------------------------------------------------ */
/*  Property extraction                                                */
/* ------------------------------------------------------------------ */

function assertNever(x: never): never {
  throw new Error(`Unhandled property value: ${JSON.stringify(x)}`);
}

/** Text form of a property value; empty values yield undefined. */
export function extractText(value: PropertyValue): string | undefined {
  switch (value.type) {
    case 'title':
    case 'rich_text':
      return value.text.trim() ? value.text : undefined;
    case 'select':
    case 'status':
      return value.name ?? undefined;
    case 'multi_select':
      return value.names.length ? value.names.join(', ') : undefined;
    case 'date':
      return value.start ?? undefined;
    case 'checkbox':
      return value.checked ? 'Yes' : 'No';
    case 'number':
      return value.value === null ? undefined : String(value.value);
    case 'relation':
      return value.ids.length ? value.ids.join(', ') : undefined;
    case 'unsupported':
      return undefined;
    default:
      return assertNever(value);
  }
}

/** List form, used for label targets. */
export function extractList(value: PropertyValue): string[] | undefined {
  switch (value.type) {
    case 'multi_select':
      return value.names;
    case 'relation':
      return value.ids;
    case 'select':
    case 'status':
      return value.name ? [value.name] : [];
    case 'title':
    case 'rich_text':
      return value.text
        .split(',')
        .map((s) => s.trim())
        .filter(Boolean);
    case 'date':
    case 'checkbox':
    case 'number':
    case 'unsupported':
      return undefined;
    default:
      return assertNever(value);
  }
}

/* ------------------------------------------------------------------ */
/*  Due handling                                                       */
/* ------------------------------------------------------------------ */

/**
 * Pick a due value from a date property and a free-text property.
 * Recurrence text wins; otherwise timestamp > date > free text.
 */
export function chooseDue(date: string | undefined, text: string | undefined): Due | undefined {
  if (text && looksLikeRecurrence(text)) return { kind: 'recurrence', value: text.trim() };
  if (date) return date.includes('T') ? { kind: 'datetime', value: date } : { kind: 'date', value: date };
  if (text?.trim()) return { kind: 'natural', value: text.trim() };
  return undefined;
}

export function dueToInput(due: Due): TaskManagerDueInput {
  switch (due.kind) {
    case 'datetime':
      return { dueDatetime: due.value };
    case 'date':
      return { dueDate: due.value };
    case 'recurrence':
    case 'natural':
      return { dueString: due.value };
    default:
      return assertNever(due);
  }
}

export function dueFromTaskManager(due: TaskManagerDue | undefined): Due | undefined {
  if (!due) return undefined;
  if (due.isRecurring && due.string) return { kind: 'recurrence', value: due.string };
  if (due.datetime) return { kind: 'datetime', value: due.datetime };
  return { kind: 'date', value: due.date };
}

function dueInputMatches(input: TaskManagerDueInput, current: TaskManagerDue | undefined): boolean {
  if (!current) return false;
  if ('dueDatetime' in input) {
    const want = parseTimestamp(input.dueDatetime);
    return want !== undefined && want === parseTimestamp(current.datetime);
  }
  if ('dueDate' in input) return !current.datetime && input.dueDate === current.date;
  return input.dueString.trim().toLowerCase() === (current.string ?? '').trim().toLowerCase();
}

/* ------------------------------------------------------------------ */
/*  Comparisons                                                        */
/* ------------------------------------------------------------------ */

export function sameLabels(a: readonly string[], b: readonly string[]): boolean {
  const sa = new Set(a);
  const sb = new Set(b);
  return sa.size === sb.size && [...sa].every((x) => sb.has(x));
}

/** Whether writing `write` would leave `current` unchanged. */
export function propertyMatches(current: PropertyValue | undefined, write: PropertyWrite): boolean {
  if (!current || current.type !== write.type) return false;
  switch (write.type) {
    case 'title':
      return current.type === 'title' && current.text.trim() === write.text.trim();
    case 'rich_text':
      return current.type === 'rich_text' && current.text.trim() === write.text.trim();
    case 'select':
      return current.type === 'select' && current.name === write.name;
    case 'status':
      return current.type === 'status' && current.name === write.name;
    case 'multi_select':
      return current.type === 'multi_select' && sameLabels(current.names, write.names);
    case 'relation':
      return current.type === 'relation' && sameLabels(current.ids, write.ids);
    case 'date':
      if (current.type !== 'date') return false;
      if (current.start === null || write.start === null) return current.start === write.start;
      return parseTimestamp(current.start) === parseTimestamp(write.start);
    case 'checkbox':
      return current.type === 'checkbox' && current.checked === write.checked;
    case 'number':
      return current.type === 'number' && current.value === write.value;
    default:
      return assertNever(write);
  }
}

/* ------------------------------------------------------------------ */
/*  Mapper                                                             */
/* ------------------------------------------------------------------ */

export interface MappedForTaskManager {
  fields: TaskManagerFields;
  /** Project name to resolve on the task manager. */
  projectRef?: string;
  /** Planner id of the parent page. */
  parentRef?: string;
}

const DEFAULT_WRITE_TYPE: Record<TargetField, PropertyWrite['type']> = {
  content: 'title',
  description: 'rich_text',
  due_date: 'date',
  due_string: 'rich_text',
  priority: 'select',
  project: 'select',
  labels: 'multi_select',
};

/**
 * Translates planner pages to task-manager fields and back.
 * Stateless; everything it knows comes from the sync config.
 */
export class FieldMapper {
  private readonly byTarget = new Map<TargetField, string>();
  private readonly bindings: PlannerBindings;

  constructor(private readonly config: SyncConfig) {
    for (const [prop, target] of Object.entries(config.fieldMapping)) this.byTarget.set(target, prop);
    this.bindings = plannerBindings(config);
  }

  /** Planner property mapped to `target`, if any. */
  propertyFor(target: TargetField): string | undefined {
    return this.byTarget.get(target);
  }

  private valueFor(page: PlannerPage, target: TargetField): PropertyValue | undefined {
    const prop = this.byTarget.get(target);
    return prop ? page.properties[prop] : undefined;
  }

  private textFor(page: PlannerPage, target: TargetField): string | undefined {
    const v = this.valueFor(page, target);
    return v ? extractText(v) : undefined;
  }

  private dueFor(page: PlannerPage): Due | undefined {
    const dateValue = this.valueFor(page, 'due_date');
    const date = dateValue ? extractText(dateValue) : undefined;
    return chooseDue(date, this.textFor(page, 'due_string'));
  }

  /** Title of any page, mapped or not: the mapped content property, else the first title property. */
  titleOf(page: PlannerPage, titleField?: string): string | undefined {
    const explicit = titleField ? page.properties[titleField] : this.valueFor(page, 'content');
    if (explicit) {
      const t = extractText(explicit);
      if (t) return t;
    }
    for (const v of Object.values(page.properties)) {
      if (v.type === 'title' && v.text.trim()) return v.text;
    }
    return undefined;
  }

  parentIdOf(page: PlannerPage): string | undefined {
    return plannerParentOf(this.bindings, page);
  }

  isCompleted(page: PlannerPage): boolean {
    return isPlannerCompleted(this.bindings, page);
  }

  /** Description synthesized from the configured fields, or undefined when disabled or empty. */
  buildDescription(page: PlannerPage): string | undefined {
    const cfg = this.config.descriptionFields;
    if (!cfg.enabled) return undefined;

    const parts: string[] = [];
    for (const field of cfg.fields) {
      const v = page.properties[field.name];
      const text = v ? extractText(v) : undefined;
      if (!text) continue;
      parts.push(field.format.split('{value}').join(text));
    }

    return parts.length ? parts.join(cfg.separator) : undefined;
  }

  normalizePlanner(page: PlannerPage): NormalizedTask {
    const priority = this.valueFor(page, 'priority');
    const labels = this.valueFor(page, 'labels');
    const due = this.dueFor(page);

    return {
      id: page.id,
      title: this.titleOf(page) ?? '',
      description: this.buildDescription(page) ?? this.textFor(page, 'description'),
      due,
      priority: parsePlannerPriority(priority ? extractText(priority) : undefined),
      labels: (labels ? extractList(labels) : undefined) ?? [],
      parentId: this.parentIdOf(page),
      project: this.textFor(page, 'project'),
      completed: this.isCompleted(page),
      recurring: due?.kind === 'recurrence',
      createdAt: page.createdTime,
      lastModifiedAt: page.lastEditedTime,
    };
  }

  normalizeTaskManager(task: TaskManagerTask): NormalizedTask {
    const source = this.config.sourceLabel.toLowerCase();
    return {
      id: task.id,
      title: task.content,
      description: task.description || undefined,
      due: dueFromTaskManager(task.due),
      priority: fromTaskManagerPriority(task.priority),
      labels: task.labels.filter((l) => l.toLowerCase() !== source),
      parentId: task.parentId,
      project: task.projectId,
      completed: task.isCompleted,
      recurring: task.due?.isRecurring ?? false,
      createdAt: task.createdAt,
      lastModifiedAt: task.updatedAt,
    };
  }

  /** Planner page -> task-manager fields, before project/label/parent resolution. */
  toTaskManager(page: PlannerPage): MappedForTaskManager {
    const fields: TaskManagerFields = {};
    let projectRef: string | undefined;

    for (const [prop, target] of Object.entries(this.config.fieldMapping)) {
      const value = page.properties[prop];
      if (!value) continue;

      const text = extractText(value);
      switch (target) {
        case 'content':
          if (text !== undefined) fields.content = text;
          break;
        case 'description':
          if (text !== undefined) fields.description = text;
          break;
        case 'priority':
          if (text !== undefined) fields.priority = toTaskManagerPriority(parsePlannerPriority(text));
          break;
        case 'project':
          projectRef = text;
          break;
        case 'labels': {
          const list = extractList(value);
          if (list) fields.labels = list;
          break;
        }
        case 'due_date':
        case 'due_string':
          // combined below
          break;
        default:
          assertNever(target);
      }
    }

    const synthesized = this.buildDescription(page);
    if (synthesized) fields.description = synthesized;

    const due = this.dueFor(page);
    if (due) fields.due = dueToInput(due);

    return { fields, projectRef, parentRef: this.parentIdOf(page) };
  }

  /**
   * Fields of `desired` that differ from `current`.
   *
   * Due writes to a recurring task are dropped unless the incoming value is
   * itself a recurrence expression, so an echoed plain date never replaces
   * the series.
   */
  diffTaskManager(current: TaskManagerTask, desired: TaskManagerFields): TaskManagerFields {
    const out: TaskManagerFields = {};

    if (desired.content !== undefined && desired.content !== current.content) out.content = desired.content;
    if (desired.description !== undefined && desired.description !== current.description) {
      out.description = desired.description;
    }
    if (desired.priority !== undefined && desired.priority !== current.priority) out.priority = desired.priority;
    if (desired.labels !== undefined && !sameLabels(desired.labels, current.labels)) out.labels = desired.labels;

    if (desired.due) {
      const incoming = desired.due;
      const protectSeries = current.due?.isRecurring && !('dueString' in incoming && looksLikeRecurrence(incoming.dueString));
      if (!protectSeries && !dueInputMatches(incoming, current.due)) out.due = incoming;
    }

    return out;
  }

  /**
   * Normalized task-manager task -> planner property writes for the mapped
   * fields. Property types follow the current page where it has the property.
   * Project, parent and completion go through the client.
   */
  toPlanner(task: NormalizedTask, current?: PlannerPage): PropertyWrites {
    const writes: PropertyWrites = {};

    for (const [prop, target] of Object.entries(this.config.fieldMapping)) {
      const type = current?.properties[prop]?.type ?? DEFAULT_WRITE_TYPE[target];

      switch (target) {
        case 'content':
          writes[prop] = type === 'rich_text' ? { type, text: task.title } : { type: 'title', text: task.title };
          break;
        case 'description':
          if (!this.config.descriptionFields.enabled) {
            writes[prop] = { type: 'rich_text', text: task.description ?? '' };
          }
          break;
        case 'due_date':
          if (!task.due) writes[prop] = { type: 'date', start: null, end: null };
          else if (task.due.kind === 'date' || task.due.kind === 'datetime') {
            writes[prop] = { type: 'date', start: task.due.value, end: null };
          }
          break;
        case 'due_string':
          if (task.due?.kind === 'recurrence' || task.due?.kind === 'natural') {
            writes[prop] = { type: 'rich_text', text: task.due.value };
          }
          break;
        case 'priority':
          writes[prop] = type === 'number' ? { type, value: task.priority } : { type: 'select', name: String(task.priority) };
          break;
        case 'labels':
          writes[prop] = { type: 'multi_select', names: task.labels };
          break;
        case 'project':
          // task-manager projects are ids; the planner keeps its own names
          break;
        default:
          assertNever(target);
      }
    }

    return writes;
  }

  /** Drop writes that would not change the page. */
  diffPlanner(page: PlannerPage, writes: PropertyWrites): PropertyWrites {
    const out: PropertyWrites = {};
    for (const [prop, write] of Object.entries(writes)) {
      if (!propertyMatches(page.properties[prop], write)) out[prop] = write;
    }
    return out;
  }
}
