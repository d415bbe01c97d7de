import { mkdir, readFile, writeFile, unlink } from 'node:fs/promises';
import path from 'node:path';
import { ConfigurationError } from '../errors.js';

export interface LockHandle {
  path: string;
  release(): Promise<void>;
}

/**
 * Pid lock file in `dir`. A lock left by a dead process, or one that cannot be
 * read, is taken over.
 */
export async function acquireLock(dir: string, filename = 'lock'): Promise<LockHandle> {
  await mkdir(dir, { recursive: true });
  const lockPath = path.join(dir, filename);

  const pid = process.pid;
  const payload = JSON.stringify({ pid, at: new Date().toISOString() }) + '\n';

  try {
    await writeFile(lockPath, payload, { flag: 'wx' });
  } catch {
    const otherPid = await readLockPid(lockPath);
    if (otherPid !== undefined && isProcessAlive(otherPid)) {
      throw new ConfigurationError(`Another tasklink process is using ${dir} (pid=${otherPid}).`);
    }

    // stale
    await writeFile(lockPath, payload, { flag: 'w' });
  }

  return {
    path: lockPath,
    release: async () => {
      await unlink(lockPath).catch((e: unknown) => {
        if (!(e instanceof Error && 'code' in e && e.code === 'ENOENT')) throw e;
      });
    },
  };
}

async function readLockPid(lockPath: string): Promise<number | undefined> {
  try {
    const parsed: unknown = JSON.parse(await readFile(lockPath, 'utf8'));
    if (typeof parsed === 'object' && parsed !== null && 'pid' in parsed && typeof parsed.pid === 'number') {
      return parsed.pid;
    }
    return undefined;
  } catch {
    // unreadable lock counts as stale
    return undefined;
  }
}

function isProcessAlive(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch {
    return false;
  }
}
