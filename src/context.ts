import path from 'node:path';
import type { EnvConfig, SyncConfig } from './config.js';
import type { FetchLike } from './http.js';
import type { Logger } from './log.js';
import { ConfigurationError } from './errors.js';
import { plannerBindings, type PlannerClient, type TaskManagerClient } from './providers/provider.js';
import { NotionPlanner } from './providers/notion.js';
import { TodoistTaskManager } from './providers/todoist.js';
import { SyncStateStore } from './store/syncStateStore.js';
import { FieldMapper } from './sync/fieldMapper.js';
import { ConflictResolver } from './sync/conflictResolver.js';
import type { SyncContext } from './sync/engine.js';

export const DEFAULT_STATE_DIR = '.tasklink';

export function resolveStateDir(env: EnvConfig, override?: string): string {
  return path.resolve(override ?? env.TASKLINK_STATE_DIR ?? DEFAULT_STATE_DIR);
}

function required(value: string | undefined, name: string): string {
  if (!value) throw new ConfigurationError(`${name} is not set (run: tasklink doctor)`);
  return value;
}

export interface CreateContextOptions {
  env: EnvConfig;
  config: SyncConfig;
  logger: Logger;
  stateDir?: string;
  /** Replace the HTTP clients (demo, tests). */
  planner?: PlannerClient;
  tasks?: TaskManagerClient;
  fetcher?: FetchLike;
  now?: () => Date;
}

/** Wire collaborators, store, mapper and resolver once; everything else receives the result. */
export function createContext(opts: CreateContextOptions): SyncContext {
  const { env, config, logger } = opts;

  const planner =
    opts.planner ??
    new NotionPlanner({
      token: required(env.TASKLINK_PLANNER_TOKEN, 'TASKLINK_PLANNER_TOKEN'),
      databaseId: required(env.TASKLINK_PLANNER_DATABASE_ID, 'TASKLINK_PLANNER_DATABASE_ID'),
      bindings: plannerBindings(config),
      fetcher: opts.fetcher,
    });

  const tasks =
    opts.tasks ??
    new TodoistTaskManager({
      token: required(env.TASKLINK_TASKS_TOKEN, 'TASKLINK_TASKS_TOKEN'),
      fetcher: opts.fetcher,
    });

  const strategy = env.TASKLINK_CONFLICT_STRATEGY ?? config.bidirectional.conflictResolution;

  return {
    planner,
    tasks,
    store: new SyncStateStore(resolveStateDir(env, opts.stateDir), { now: opts.now, logger: logger.child('store') }),
    mapper: new FieldMapper(config),
    resolver: new ConflictResolver(strategy),
    config,
    logger,
  };
}
