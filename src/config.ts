import { readFileSync } from 'node:fs';
import { z } from 'zod';
import { ConfigurationError } from './errors.js';

const str = z.string().min(1);

export const ConflictStrategySchema = z.enum(['last_modified_wins', 'a_wins', 'b_wins', 'merge']);

export type ConflictStrategy = z.infer<typeof ConflictStrategySchema>;

export const EnvSchema = z.object({
  // behavior
  TASKLINK_LOG_LEVEL: z.enum(['silent', 'error', 'warn', 'info', 'debug']).optional(),
  TASKLINK_STATE_DIR: str.optional(),
  TASKLINK_CONFIG_PATH: str.optional(),
  TASKLINK_CONFLICT_STRATEGY: ConflictStrategySchema.optional(),
  TASKLINK_POLL_INTERVAL_MINUTES: z.coerce.number().int().positive().optional(),
  TASKLINK_SWEEP_WINDOW_MINUTES: z.coerce.number().int().positive().optional(),
  TASKLINK_HTTP_RPS: z.coerce.number().positive().optional(),

  // planner (side A)
  TASKLINK_PLANNER_TOKEN: str.optional(),
  TASKLINK_PLANNER_DATABASE_ID: str.optional(),

  // task manager (side B)
  TASKLINK_TASKS_TOKEN: str.optional(),

  // webhooks
  TASKLINK_WEBHOOK_PORT: z.coerce.number().int().positive().optional(),
  TASKLINK_PLANNER_WEBHOOK_SECRET: str.optional(),
  TASKLINK_TASKS_WEBHOOK_SECRET: str.optional(),
});

export type EnvConfig = z.infer<typeof EnvSchema>;

function formatIssues(error: z.ZodError): string {
  return error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`).join('; ');
}

export function readEnv(env: NodeJS.ProcessEnv = process.env): EnvConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) throw new ConfigurationError(`Invalid environment: ${formatIssues(parsed.error)}`);
  return parsed.data;
}

export function doctorReport(env: EnvConfig = readEnv()) {
  const missing: string[] = [];
  const notes: string[] = [];

  if (!env.TASKLINK_PLANNER_TOKEN) missing.push('TASKLINK_PLANNER_TOKEN');
  if (!env.TASKLINK_PLANNER_DATABASE_ID) missing.push('TASKLINK_PLANNER_DATABASE_ID');
  if (!env.TASKLINK_TASKS_TOKEN) missing.push('TASKLINK_TASKS_TOKEN');

  if (!env.TASKLINK_PLANNER_WEBHOOK_SECRET || !env.TASKLINK_TASKS_WEBHOOK_SECRET) {
    notes.push('Webhook secrets not set: incoming webhook signatures will not be verified.');
  }
  if (!env.TASKLINK_CONFIG_PATH) notes.push(`Sync config: ${DEFAULT_CONFIG_PATH} (set TASKLINK_CONFIG_PATH to override).`);

  return { missing, notes };
}

/* ------------------------------------------------------------------ */
/*  Sync configuration file                                            */
/* ------------------------------------------------------------------ */

export const DEFAULT_CONFIG_PATH = 'config/sync-config.json';

export const TargetFieldSchema = z.enum([
  'content',
  'description',
  'due_date',
  'due_string',
  'priority',
  'project',
  'labels',
]);

export type TargetField = z.infer<typeof TargetFieldSchema>;

const DescriptionFieldSchema = z.object({
  name: str,
  /** `{value}` is replaced with the extracted text. */
  format: z.string().default('{value}'),
});

export const SyncConfigSchema = z.object({
  /** Planner property name -> task-manager field. */
  fieldMapping: z
    .record(str, TargetFieldSchema)
    .superRefine((mapping, ctx) => {
      const targets = Object.values(mapping);
      if (!targets.includes('content')) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'one property must map to "content"' });
      }
      const dupes = targets.filter((t, i) => targets.indexOf(t) !== i);
      if (dupes.length) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `targets mapped twice: ${[...new Set(dupes)].join(', ')}` });
      }
    }),
  descriptionFields: z
    .object({
      enabled: z.boolean().default(false),
      separator: z.string().default('\n\n'),
      fields: z.array(DescriptionFieldSchema).default([]),
    })
    .default({}),
  completionField: z
    .object({
      name: str,
      doneValue: str.default('Done'),
      openValue: str.default('Not started'),
    })
    .optional(),
  parentTaskField: z
    .object({
      name: str,
      /** Title property of the parent page (defaults to the page's title property). */
      titleField: str.optional(),
      createParent: z.boolean().default(false),
    })
    .optional(),
  bidirectional: z
    .object({
      conflictResolution: ConflictStrategySchema.default('last_modified_wins'),
      syncDeletions: z.boolean().default(false),
      createInPlanner: z.boolean().default(true),
    })
    .default({}),
  /** Label attached to every task written to the task manager. */
  sourceLabel: str.default('From Planner'),
  /** Back-reference comment prefix on task-manager tasks. */
  annotationPrefix: str.default('Planner ID:'),
});

export type SyncConfig = z.infer<typeof SyncConfigSchema>;

export function parseSyncConfig(input: unknown): SyncConfig {
  const parsed = SyncConfigSchema.safeParse(input);
  if (!parsed.success) throw new ConfigurationError(`Invalid sync config: ${formatIssues(parsed.error)}`);
  return parsed.data;
}

export function loadSyncConfig(filePath: string = DEFAULT_CONFIG_PATH): SyncConfig {
  let raw: string;
  try {
    raw = readFileSync(filePath, 'utf8');
  } catch (e) {
    throw new ConfigurationError(`Cannot read sync config ${filePath}`, { cause: e });
  }

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (e) {
    throw new ConfigurationError(`Sync config ${filePath} is not valid JSON`, { cause: e });
  }

  return parseSyncConfig(json);
}
