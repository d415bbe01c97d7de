import type { ConflictStrategy } from '../config.js';
import type { Due, NormalizedTask } from '../model.js';
import { isStrictlyAfter, parseTimestamp } from './timestamps.js';

export interface Resolution {
  aWins: boolean;
  reason: string;
}

/** The part of a stored pairing the resolver looks at. */
export interface PriorSync {
  lastSyncedAt?: string;
}

function modifiedAt(t: NormalizedTask): string | undefined {
  return t.lastModifiedAt ?? t.createdAt;
}

function sameDue(a: Due, b: Due): boolean {
  if (a.kind === 'recurrence' || b.kind === 'recurrence' || a.kind === 'natural' || b.kind === 'natural') {
    return a.value.trim().toLowerCase() === b.value.trim().toLowerCase();
  }
  return parseTimestamp(a.value) === parseTimestamp(b.value);
}

/**
 * Decides which side's content survives when both sides hold a version of
 * the same task. Pure and deterministic for a given strategy.
 */
export class ConflictResolver {
  constructor(readonly strategy: ConflictStrategy = 'last_modified_wins') {}

  resolve(a: NormalizedTask, b: NormalizedTask, prior?: PriorSync): Resolution {
    switch (this.strategy) {
      case 'a_wins':
        return { aWins: true, reason: 'strategy: A always wins' };
      case 'b_wins':
        return { aWins: false, reason: 'strategy: B always wins' };
      case 'merge':
        return this.merge(a, b);
      case 'last_modified_wins':
        return this.lastModified(a, b, prior);
    }
  }

  private lastModified(a: NormalizedTask, b: NormalizedTask, prior?: PriorSync): Resolution {
    const ta = modifiedAt(a);
    const tb = modifiedAt(b);

    if (prior?.lastSyncedAt) {
      const aChanged = isStrictlyAfter(ta, prior.lastSyncedAt) === true;
      const bChanged = isStrictlyAfter(tb, prior.lastSyncedAt) === true;
      if (aChanged && !bChanged) return { aWins: true, reason: 'only A changed since last sync' };
      if (bChanged && !aChanged) return { aWins: false, reason: 'only B changed since last sync' };
    }

    const pa = parseTimestamp(ta);
    const pb = parseTimestamp(tb);
    if (pa === undefined && pb === undefined) return { aWins: true, reason: 'no timestamps; A wins by default' };
    if (pa === undefined) return { aWins: false, reason: 'A timestamp unknown; B wins' };
    if (pb === undefined) return { aWins: true, reason: 'B timestamp unknown; A wins' };
    if (pa > pb) return { aWins: true, reason: 'A modified more recently' };
    if (pb > pa) return { aWins: false, reason: 'B modified more recently' };
    return { aWins: true, reason: 'same modification time; A wins the tie' };
  }

  private merge(a: NormalizedTask, b: NormalizedTask): Resolution {
    if (a.completed !== b.completed) return { aWins: true, reason: 'merge: completion differs, A wins' };
    if (a.due && b.due && !sameDue(a.due, b.due)) return { aWins: true, reason: 'merge: due differs, A wins' };
    if (a.priority !== b.priority) {
      return a.priority < b.priority
        ? { aWins: true, reason: 'merge: A has the higher priority' }
        : { aWins: false, reason: 'merge: B has the higher priority' };
    }
    return { aWins: true, reason: 'merge: no decisive difference, A wins' };
  }
}
