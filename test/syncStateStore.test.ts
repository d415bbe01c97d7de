import { describe, expect, it } from 'vitest';
import { readFile, readdir, writeFile, mkdir } from 'node:fs/promises';
import path from 'node:path';
import { existsSync } from 'node:fs';
import { SyncStateStore } from '../src/store/syncStateStore.js';
import { TestClock, at, tempDir } from './fixtures.js';

async function storeWithClock() {
  const clock = new TestClock();
  const dir = await tempDir();
  return { clock, dir, store: new SyncStateStore(dir, { now: clock.now }) };
}

describe('SyncStateStore', () => {
  it('starts empty when no state file exists', async () => {
    const { store } = await storeWithClock();
    expect(await store.listAll()).toEqual([]);
    expect(await store.count()).toBe(0);
    expect(await store.getByA('a1')).toBeUndefined();
  });

  it('inserts a row and looks it up from either side', async () => {
    const { store, clock } = await storeWithClock();
    const rec = await store.upsert('a1', 'b1', at(-10), undefined, 'a_to_b');

    expect(rec).toEqual({
      sideAId: 'a1',
      sideBId: 'b1',
      sideALastModified: at(-10),
      sideBLastModified: null,
      lastSyncedAt: clock.iso(),
      lastSyncDirection: 'a_to_b',
      conflictCount: 0,
      createdAt: clock.iso(),
    });
    expect(await store.getByB('b1')).toEqual(rec);

    const file: unknown = JSON.parse(await readFile(store.statePath(), 'utf8'));
    expect(file).toEqual({ version: 1, states: { a1: rec } });
  });

  it('keeps createdAt, conflict count and unknown timestamps on update', async () => {
    const { store, clock } = await storeWithClock();
    await store.upsert('a1', 'b1', at(-10), at(-5), 'a_to_b');
    await store.incrementConflict('a1');
    clock.advance(3);

    const rec = await store.upsert('a1', 'b1', undefined, at(2), 'b_to_a');

    expect(rec).toMatchObject({
      sideALastModified: at(-10),
      sideBLastModified: at(2),
      lastSyncedAt: at(3),
      lastSyncDirection: 'b_to_a',
      conflictCount: 1,
      createdAt: at(0),
    });
    expect(existsSync(store.statePath() + '.bak')).toBe(true);
  });

  it('gives a task-manager id to one pairing only', async () => {
    const { store } = await storeWithClock();
    await store.upsert('a1', 'b1', undefined, undefined, 'a_to_b');
    await store.upsert('a2', 'b1', undefined, undefined, 'migrated');

    expect(await store.getByA('a1')).toBeUndefined();
    expect((await store.getByB('b1'))?.sideAId).toBe('a2');
  });

  it('touches timestamps without moving lastSyncedAt backwards', async () => {
    const { store, clock } = await storeWithClock();
    await store.upsert('a1', 'b1', at(-10), at(-10), 'a_to_b');
    clock.advance(-30);

    const rec = await store.touchTimestamps('a1', at(1));

    expect(rec).toMatchObject({ sideALastModified: at(1), sideBLastModified: at(-10), lastSyncedAt: at(0) });
    expect(await store.touchTimestamps('missing', at(1))).toBeUndefined();
  });

  it('counts conflicts and deletes rows', async () => {
    const { store } = await storeWithClock();
    await store.upsert('a1', 'b1', undefined, undefined, 'a_to_b');

    expect(await store.incrementConflict('a1')).toBe(1);
    expect(await store.incrementConflict('a1')).toBe(2);
    expect(await store.incrementConflict('missing')).toBe(0);
    expect(await store.delete('a1')).toBe(true);
    expect(await store.delete('a1')).toBe(false);
    expect(await store.count()).toBe(0);
  });

  it('lists newest first and stale rows oldest first', async () => {
    const { store, clock } = await storeWithClock();
    await store.upsert('a1', 'b1', undefined, undefined, 'a_to_b');
    clock.advance(60);
    await store.upsert('a2', 'b2', undefined, undefined, 'a_to_b');
    clock.advance(60);
    await store.upsert('a3', 'b3', undefined, undefined, 'a_to_b');
    clock.advance(60);

    expect((await store.listAll()).map((r) => r.sideAId)).toEqual(['a3', 'a2', 'a1']);
    expect((await store.listStale(2 * 3_600_000)).map((r) => r.sideAId)).toEqual(['a1', 'a2']);
  });

  it('starts empty when the state file is corrupt', async () => {
    const { store, dir } = await storeWithClock();
    await mkdir(dir, { recursive: true });
    await writeFile(store.statePath(), '{ not json', 'utf8');
    expect(await store.listAll()).toEqual([]);

    await writeFile(store.statePath(), JSON.stringify({ version: 2, rows: [] }), 'utf8');
    expect(await store.count()).toBe(0);
  });

  it('moves an unusable state file aside before the first write', async () => {
    const { store, dir } = await storeWithClock();
    await mkdir(dir, { recursive: true });
    const truncated = '{"version":1,"states":{"a0":{"sideAId":"a0"';
    await writeFile(store.statePath(), truncated, 'utf8');

    await store.upsert('a1', 'b1', undefined, undefined, 'a_to_b');
    await store.upsert('a2', 'b2', undefined, undefined, 'a_to_b');

    const aside = path.join(dir, 'sync-state.json.corrupt-2024-01-05T12-00-00-000Z');
    expect(await readFile(aside, 'utf8')).toBe(truncated);
    expect((await readdir(dir)).filter((f) => f.includes('.corrupt-'))).toHaveLength(1);
    expect(await store.count()).toBe(2);
  });

  it('serializes concurrent writes', async () => {
    const { store } = await storeWithClock();
    await Promise.all(
      ['a1', 'a2', 'a3', 'a4'].map((id, i) => store.upsert(id, `b${i}`, undefined, undefined, 'a_to_b')),
    );
    expect(await store.count()).toBe(4);
  });
});
