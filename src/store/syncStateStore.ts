import { mkdir, readFile, writeFile, rename, copyFile, stat } from 'node:fs/promises';
import path from 'node:path';
import { z } from 'zod';
import type { SyncDirection } from '../model.js';
import { silentLogger, type Logger } from '../log.js';
import { errorMessage } from '../errors.js';
import { parseTimestamp } from '../sync/timestamps.js';

const SyncStateRecordSchema = z.object({
  sideAId: z.string().min(1),
  sideBId: z.string().min(1),
  sideALastModified: z.string().nullable(),
  sideBLastModified: z.string().nullable(),
  lastSyncedAt: z.string(),
  lastSyncDirection: z.enum(['a_to_b', 'b_to_a', 'migrated']),
  conflictCount: z.number().int().nonnegative(),
  createdAt: z.string(),
});

export type SyncStateRecord = z.infer<typeof SyncStateRecordSchema>;

const StateFileSchema = z.object({
  version: z.literal(1),
  /** Keyed by side-A id. */
  states: z.record(SyncStateRecordSchema),
});

type StateFile = z.infer<typeof StateFileSchema>;

const emptyState = (): StateFile => ({ version: 1, states: {} });

export interface SyncStateStoreOptions {
  now?: () => Date;
  logger?: Logger;
}

/**
 * Durable pairing between side-A and side-B ids plus the bookkeeping the
 * engine needs to detect changes and conflicts.
 *
 * Stored as one JSON file. Each write re-reads the file, applies a single
 * change and swaps the file in via temp + rename, keeping the previous
 * version as `.bak`. Writes are chained so they never interleave. A file
 * that cannot be read is moved aside to `sync-state.json.corrupt-<time>` before
 * the first write replaces it.
 */
export class SyncStateStore {
  private readonly now: () => Date;
  private readonly logger: Logger;
  private writes: Promise<unknown> = Promise.resolve();

  constructor(
    private readonly dir = path.join(process.cwd(), '.tasklink'),
    opts: SyncStateStoreOptions = {},
  ) {
    this.now = opts.now ?? (() => new Date());
    this.logger = opts.logger ?? silentLogger;
  }

  getDir() {
    return this.dir;
  }

  statePath() {
    return path.join(this.dir, 'sync-state.json');
  }

  private async load(): Promise<StateFile> {
    return (await this.readStateFile()).state;
  }

  /** Current state; `corrupt` when a file exists but cannot be used. */
  private async readStateFile(): Promise<{ state: StateFile; corrupt: boolean }> {
    let raw: string;
    try {
      raw = await readFile(this.statePath(), 'utf8');
    } catch (e) {
      if (e instanceof Error && 'code' in e && e.code === 'ENOENT') return { state: emptyState(), corrupt: false };
      throw e;
    }

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (e) {
      this.logger.warn('state file is not valid JSON; reading as empty', { path: this.statePath(), error: errorMessage(e) });
      return { state: emptyState(), corrupt: true };
    }

    const parsed = StateFileSchema.safeParse(json);
    if (!parsed.success) {
      this.logger.warn('state file has an unknown layout; reading as empty', { path: this.statePath() });
      return { state: emptyState(), corrupt: true };
    }
    return { state: parsed.data, corrupt: false };
  }

  /** Move an unusable state file aside so the next save cannot overwrite it. */
  private async quarantine(): Promise<string> {
    const target = `${this.statePath()}.corrupt-${this.nowIso().replace(/[:.]/g, '-')}`;
    await rename(this.statePath(), target);
    this.logger.warn('unusable state file moved aside', { path: target });
    return target;
  }

  private async backupStateFile(): Promise<void> {
    try {
      await stat(this.statePath());
    } catch {
      return;
    }
    await copyFile(this.statePath(), this.statePath() + '.bak');
  }

  private async save(state: StateFile): Promise<void> {
    await mkdir(this.dir, { recursive: true });
    await this.backupStateFile();
    const tmp = this.statePath() + '.tmp';
    await writeFile(tmp, JSON.stringify(state, null, 2) + '\n', 'utf8');
    await rename(tmp, this.statePath());
  }

  /** Run `change` against a freshly loaded state and persist it, one writer at a time. */
  private mutate<T>(change: (state: StateFile) => T): Promise<T> {
    const run = this.writes.then(async () => {
      const { state, corrupt } = await this.readStateFile();
      if (corrupt) await this.quarantine();
      const result = change(state);
      await this.save(state);
      return result;
    });
    // keep the chain alive after a failed write; the caller still sees the rejection
    this.writes = run.catch((e: unknown) => {
      this.logger.error('state write failed', e);
    });
    return run;
  }

  private nowIso() {
    return this.now().toISOString();
  }

  /** `lastSyncedAt` never moves backwards. */
  private advance(previous: string | undefined): string {
    const now = this.nowIso();
    if (!previous) return now;
    const prev = parseTimestamp(previous);
    return prev !== undefined && prev > Date.parse(now) ? previous : now;
  }

  async getByA(aId: string): Promise<SyncStateRecord | undefined> {
    const state = await this.load();
    return state.states[aId];
  }

  async getByB(bId: string): Promise<SyncStateRecord | undefined> {
    const state = await this.load();
    return Object.values(state.states).find((r) => r.sideBId === bId);
  }

  async upsert(
    aId: string,
    bId: string,
    aModified: string | undefined,
    bModified: string | undefined,
    direction: SyncDirection,
  ): Promise<SyncStateRecord> {
    return this.mutate((state) => {
      const existing = state.states[aId];

      // a B id belongs to exactly one pairing
      for (const [key, rec] of Object.entries(state.states)) {
        if (key !== aId && rec.sideBId === bId) delete state.states[key];
      }

      const record: SyncStateRecord = {
        sideAId: aId,
        sideBId: bId,
        sideALastModified: aModified ?? existing?.sideALastModified ?? null,
        sideBLastModified: bModified ?? existing?.sideBLastModified ?? null,
        lastSyncedAt: this.advance(existing?.lastSyncedAt),
        lastSyncDirection: direction,
        conflictCount: existing?.conflictCount ?? 0,
        createdAt: existing?.createdAt ?? this.nowIso(),
      };
      state.states[aId] = record;
      return record;
    });
  }

  /** Record side timestamps without changing the pairing; advances `lastSyncedAt`. */
  async touchTimestamps(aId: string, aModified?: string, bModified?: string): Promise<SyncStateRecord | undefined> {
    return this.mutate((state) => {
      const rec = state.states[aId];
      if (!rec) return undefined;
      if (aModified !== undefined) rec.sideALastModified = aModified;
      if (bModified !== undefined) rec.sideBLastModified = bModified;
      rec.lastSyncedAt = this.advance(rec.lastSyncedAt);
      return rec;
    });
  }

  async incrementConflict(aId: string): Promise<number> {
    return this.mutate((state) => {
      const rec = state.states[aId];
      if (!rec) return 0;
      rec.conflictCount += 1;
      return rec.conflictCount;
    });
  }

  async delete(aId: string): Promise<boolean> {
    return this.mutate((state) => {
      if (!state.states[aId]) return false;
      delete state.states[aId];
      return true;
    });
  }

  /** Newest sync first. */
  async listAll(): Promise<SyncStateRecord[]> {
    const state = await this.load();
    return Object.values(state.states).sort(
      (x, y) => (parseTimestamp(y.lastSyncedAt) ?? 0) - (parseTimestamp(x.lastSyncedAt) ?? 0),
    );
  }

  /** Rows not synced for at least `olderThanMs`, oldest first. */
  async listStale(olderThanMs: number): Promise<SyncStateRecord[]> {
    const cutoff = this.now().getTime() - olderThanMs;
    const all = await this.listAll();
    return all.filter((r) => (parseTimestamp(r.lastSyncedAt) ?? 0) <= cutoff).reverse();
  }

  async count(): Promise<number> {
    const state = await this.load();
    return Object.keys(state.states).length;
  }
}
