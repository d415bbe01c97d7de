export * from './model.js';
export * from './errors.js';
export { createLogger, silentLogger, type Logger, type LogLevel } from './log.js';
export { loadEnvFiles } from './env.js';
export {
  readEnv,
  doctorReport,
  parseSyncConfig,
  loadSyncConfig,
  SyncConfigSchema,
  type EnvConfig,
  type SyncConfig,
  type ConflictStrategy,
  type TargetField,
} from './config.js';
export { createContext, resolveStateDir, type CreateContextOptions } from './context.js';

export type { PlannerClient, TaskManagerClient, TaskStoreClient, PlannerBindings } from './providers/provider.js';
export { plannerBindings } from './providers/provider.js';
export { NotionPlanner, type NotionPlannerOptions } from './providers/notion.js';
export { TodoistTaskManager, type TodoistTaskManagerOptions } from './providers/todoist.js';
export { MemoryPlanner, MemoryTaskManager } from './providers/memory.js';

export { SyncStateStore, type SyncStateRecord } from './store/syncStateStore.js';
export { acquireLock, type LockHandle } from './store/lock.js';

export { FieldMapper } from './sync/fieldMapper.js';
export { ConflictResolver, type Resolution } from './sync/conflictResolver.js';
export {
  SyncEngine,
  parseBackReference,
  type SyncContext,
  type SyncOutcome,
  type SkipReason,
  type SyncStage,
  type RebuildReport,
} from './sync/engine.js';
export {
  Orchestrator,
  isDeletionEvent,
  type SyncEvent,
  type OrchestratorOptions,
  type OrchestratorStatus,
  type SweepReport,
} from './sync/orchestrator.js';

export { createWebhookApp, startWebhookServer, type WebhookAppOptions } from './webhooks/receiver.js';
export { signBody, verifySignature, type SignatureEncoding } from './webhooks/signature.js';
