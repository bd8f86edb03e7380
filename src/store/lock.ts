import { mkdir, readFile, writeFile, unlink } from 'node:fs/promises';
import path from 'node:path';
import { z } from 'zod';

export interface LockHandle {
  path: string;
  release(): Promise<void>;
}

export class LockBusyError extends Error {
  constructor(
    public readonly lockPath: string,
    public readonly pid: number,
  ) {
    super(`Another ticktick-duplicator process is running (pid=${pid}, lock=${lockPath}).`);
    this.name = 'LockBusyError';
  }
}

const LockFileSchema = z.object({ pid: z.number().int().positive(), at: z.string().optional() });

function isProcessAlive(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch (err) {
    // EPERM: the process exists but belongs to someone else.
    return err instanceof Error && 'code' in err && err.code === 'EPERM';
  }
}

async function holderPid(lockPath: string): Promise<number | undefined> {
  try {
    const parsed = LockFileSchema.safeParse(JSON.parse(await readFile(lockPath, 'utf8')));
    return parsed.success ? parsed.data.pid : undefined;
  } catch {
    return undefined;
  }
}

/**
 * Take an exclusive pid lock file. A lock left behind by a dead process, or
 * one that cannot be read, is stale and gets replaced.
 */
export async function acquireLock(lockPath: string): Promise<LockHandle> {
  await mkdir(path.dirname(lockPath), { recursive: true });
  const payload = JSON.stringify({ pid: process.pid, at: new Date().toISOString() }) + '\n';

  try {
    await writeFile(lockPath, payload, { flag: 'wx' });
  } catch (err) {
    if (!(err instanceof Error && 'code' in err && err.code === 'EEXIST')) throw err;

    const otherPid = await holderPid(lockPath);
    if (otherPid !== undefined && otherPid !== process.pid && isProcessAlive(otherPid)) {
      throw new LockBusyError(lockPath, otherPid);
    }
    await writeFile(lockPath, payload, { flag: 'w' });
  }

  return {
    path: lockPath,
    release: async () => {
      try {
        await unlink(lockPath);
      } catch (err) {
        if (!(err instanceof Error && 'code' in err && err.code === 'ENOENT')) throw err;
      }
    },
  };
}

export async function withLock<T>(lockPath: string, fn: () => Promise<T>): Promise<T> {
  const lock = await acquireLock(lockPath);
  try {
    return await fn();
  } finally {
    await lock.release();
  }
}
