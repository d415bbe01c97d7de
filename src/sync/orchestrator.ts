import type { Side } from '../model.js';
import type { Logger } from '../log.js';
import { acquireLock, type LockHandle } from '../store/lock.js';
import { errorMessage } from '../errors.js';
import { SyncEngine, type SyncContext, type SyncOutcome, type SyncOutcomeKind } from './engine.js';
import { EventQueue } from './queue.js';

export interface SyncEvent {
  source: Side;
  eventType: string;
  payload: { entityId: string };
  enqueuedAt: string;
}

export interface OrchestratorStats {
  eventsReceived: Record<Side, number>;
  eventsProcessed: Record<Side, number>;
  lastEventAt: Partial<Record<Side, string>>;
  outcomes: Record<SyncOutcomeKind, number>;
  deletions: { propagated: number; ignored: number; failed: number };
  sweeps: number;
  lastSweepAt?: string;
  /** Reconciliations in flight (0 or 1). */
  activeSyncs: number;
}

export interface OrchestratorStatus {
  running: boolean;
  queued: number;
  stats: OrchestratorStats;
  stateCount: number;
}

export interface SweepReport {
  windowMinutes: number;
  since: string;
  scanned: number;
  outcomes: SyncOutcome[];
}

export interface OrchestratorOptions {
  engine?: SyncEngine;
  /** Periodic sweep interval; no timer when unset. */
  pollIntervalMinutes?: number;
  /** Look-back window of the periodic sweep (default: twice the interval). */
  sweepWindowMinutes?: number;
  /** How long the consumer waits for an event before checking for shutdown. */
  takeTimeoutMs?: number;
  now?: () => Date;
}

export function isDeletionEvent(eventType: string): boolean {
  return eventType.endsWith('deleted');
}

const emptyStats = (): OrchestratorStats => ({
  eventsReceived: { A: 0, B: 0 },
  eventsProcessed: { A: 0, B: 0 },
  lastEventAt: {},
  outcomes: { created: 0, updated: 0, unchanged: 0, deferred: 0, skipped: 0, failed: 0 },
  deletions: { propagated: 0, ignored: 0, failed: 0 },
  sweeps: 0,
  activeSyncs: 0,
});

/**
 * Feeds webhook events and sweeps into the engine, one reconciliation at a
 * time.
 */
export class Orchestrator {
  readonly engine: SyncEngine;

  private readonly log: Logger;
  private readonly now: () => Date;
  private readonly takeTimeoutMs: number;
  private queue = new EventQueue<SyncEvent>();
  private stats = emptyStats();
  private running = false;
  private loop?: Promise<void>;
  private lock?: LockHandle;
  private timer?: NodeJS.Timeout;
  private tail: Promise<unknown> = Promise.resolve();
  private pending = 0;
  private idleWaiters: Array<() => void> = [];

  constructor(
    private readonly ctx: SyncContext,
    private readonly opts: OrchestratorOptions = {},
  ) {
    this.engine = opts.engine ?? new SyncEngine(ctx);
    this.log = ctx.logger.child('orchestrator');
    this.now = opts.now ?? (() => new Date());
    this.takeTimeoutMs = opts.takeTimeoutMs ?? 1000;
  }

  get isRunning(): boolean {
    return this.running;
  }

  /** Queue an event; never blocks. */
  enqueue(source: Side, eventType: string, entityId: string): SyncEvent {
    const event: SyncEvent = {
      source,
      eventType,
      payload: { entityId },
      enqueuedAt: this.now().toISOString(),
    };
    if (!this.queue.push(event)) {
      this.log.warn('event dropped while stopping', { source, eventType, entityId });
      return event;
    }
    this.stats.eventsReceived[source]++;
    this.stats.lastEventAt[source] = event.enqueuedAt;
    this.pending++;
    this.log.debug('event queued', { source, eventType, entityId });
    return event;
  }

  async start(): Promise<void> {
    if (this.running) return;
    this.lock = await acquireLock(this.ctx.store.getDir(), 'orchestrator.lock');
    this.running = true;
    this.loop = this.consume();

    const every = this.opts.pollIntervalMinutes;
    if (every) {
      const window = this.opts.sweepWindowMinutes ?? every * 2;
      this.timer = setInterval(() => {
        this.runFullSweep(window).catch((e: unknown) => {
          this.log.error('scheduled sweep failed', e);
        });
      }, every * 60_000);
      this.timer.unref();
    }
    this.log.info('started', { pollIntervalMinutes: every ?? null });
  }

  /** Finish the reconciliation in flight, drop whatever is still queued and release the lock. */
  async stop(): Promise<void> {
    if (!this.running) return;
    this.running = false;
    if (this.timer) clearInterval(this.timer);
    this.timer = undefined;

    const dropped = this.queue.size;
    this.queue.close();
    this.pending -= dropped;
    await this.loop;
    await this.tail;
    this.queue = new EventQueue<SyncEvent>();
    this.notifyIdle();

    await this.lock?.release();
    this.lock = undefined;
    this.log.info('stopped', { dropped });
  }

  /** Resolve once every queued event has been handled. Processes inline when not started. */
  async drain(): Promise<void> {
    if (!this.running) {
      for (let event = await this.queue.take(0); event; event = await this.queue.take(0)) {
        const current = event;
        await this.exclusive(() => this.dispatch(current));
      }
      return;
    }
    if (this.pending === 0) return;
    await new Promise<void>((resolve) => this.idleWaiters.push(resolve));
  }

  async getStatus(): Promise<OrchestratorStatus> {
    return {
      running: this.running,
      queued: this.queue.size,
      stats: structuredClone(this.stats),
      stateCount: await this.ctx.store.count(),
    };
  }

  /** Reconcile every planner page edited in the last `windowMinutes`, serially. */
  async runFullSweep(windowMinutes: number): Promise<SweepReport> {
    return this.exclusive(async () => {
      const since = new Date(this.now().getTime() - windowMinutes * 60_000).toISOString();
      const pages = await this.ctx.planner.queryChangedSince(since);
      this.log.info('sweep', { windowMinutes, pages: pages.length });

      const outcomes: SyncOutcome[] = [];
      for (const page of pages) {
        outcomes.push(await this.track(() => this.engine.syncFromA(page.id)));
      }

      this.stats.sweeps++;
      this.stats.lastSweepAt = this.now().toISOString();
      return { windowMinutes, since, scanned: pages.length, outcomes };
    });
  }

  private async consume(): Promise<void> {
    while (this.running) {
      const event = await this.queue.take(this.takeTimeoutMs);
      if (!event) continue;
      await this.exclusive(() => this.dispatch(event));
    }
  }

  /** Sweeps and queued events share this section, so reconciliations never overlap. */
  private exclusive<T>(fn: () => Promise<T>): Promise<T> {
    const run = this.tail.then(fn);
    this.tail = run.then(
      () => undefined,
      () => undefined,
    );
    return run;
  }

  private async track(fn: () => Promise<SyncOutcome>): Promise<SyncOutcome> {
    this.stats.activeSyncs++;
    try {
      const outcome = await fn();
      this.stats.outcomes[outcome.kind]++;
      return outcome;
    } finally {
      this.stats.activeSyncs--;
    }
  }

  private async dispatch(event: SyncEvent): Promise<void> {
    try {
      if (isDeletionEvent(event.eventType)) await this.handleDeletion(event);
      else await this.track(() => this.engine.sync(event.source, event.payload.entityId));
      this.stats.eventsProcessed[event.source]++;
    } finally {
      this.pending--;
      if (this.pending <= 0) this.notifyIdle();
    }
  }

  private notifyIdle(): void {
    const waiters = this.idleWaiters;
    this.idleWaiters = [];
    for (const resolve of waiters) resolve();
  }

  private async handleDeletion(event: SyncEvent): Promise<void> {
    const { source, payload } = event;
    const { store, planner, tasks, config } = this.ctx;

    if (!config.bidirectional.syncDeletions) {
      this.stats.deletions.ignored++;
      this.log.info('deletion ignored (syncDeletions disabled)', { source, id: payload.entityId });
      return;
    }

    try {
      const row = source === 'A' ? await store.getByA(payload.entityId) : await store.getByB(payload.entityId);
      if (!row) {
        this.stats.deletions.ignored++;
        this.log.debug('deletion of unpaired record ignored', { source, id: payload.entityId });
        return;
      }

      if (source === 'A') await tasks.delete(row.sideBId);
      else await planner.delete(row.sideAId);
      await store.delete(row.sideAId);

      this.stats.deletions.propagated++;
      this.log.info('deletion propagated', { source, aId: row.sideAId, bId: row.sideBId });
    } catch (e) {
      this.stats.deletions.failed++;
      this.log.error('deletion failed', { source, id: payload.entityId, error: errorMessage(e) });
    }
  }
}
