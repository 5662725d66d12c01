import { mkdir, open, readFile } from 'node:fs/promises';
import { join } from 'node:path';
import process from 'node:process';
import { setTimeout as sleep } from 'node:timers/promises';
import { encodeKey } from './config.ts';
import { isErrnoException, unlinkIfPresent } from './fwdctl-internals.ts';

export class LockTimeoutError extends Error
{
  override readonly name = 'LockTimeoutError';

  constructor(readonly hostId: string, readonly lockPath: string)
  {
    super(`Timed out waiting for the lock on ${hostId} (${lockPath})`);
  }
}

/**
 Serializes the critical sections of concurrent fwdctl processes per host.
 */
export interface HostLocker
{
  withLock<T>(hostId: string, fn: () => Promise<T>): Promise<T>;
}

function processExists(pid: number): boolean
{
  try
  {
    process.kill(pid, 0);
    return true;
  }
  catch (error: unknown)
  {
    // EPERM: alive, owned by someone else
    return isErrnoException(error) && error.code === 'EPERM';
  }
}

/**
 Advisory lock files, one per host, created with O_EXCL and holding the
 owner's pid. A lock whose owner has exited is broken on the next attempt.
 */
export class FileHostLocker implements HostLocker
{
  constructor(
    readonly dir: string,
    readonly timeoutMs = 5000,
    readonly retryMs = 50,
  ) {}

  lockPath(hostId: string): string
  {
    return join(this.dir, `${encodeKey(hostId)}.lock`);
  }

  async withLock<T>(hostId: string, fn: () => Promise<T>): Promise<T>
  {
    const path = await this.#acquire(hostId);
    try
    {
      return await fn();
    }
    finally
    {
      await unlinkIfPresent(path);
    }
  }

  async #acquire(hostId: string): Promise<string>
  {
    await mkdir(this.dir, { recursive: true });
    const path = this.lockPath(hostId);
    const deadline = Date.now() + this.timeoutMs;

    for (;;)
    {
      try
      {
        const handle = await open(path, 'wx');
        await handle.writeFile(String(process.pid));
        await handle.close();
        return path;
      }
      catch (error: unknown)
      {
        if (!isErrnoException(error) || error.code !== 'EEXIST')
        {
          throw error;
        }
      }

      if (await this.#isStale(path))
      {
        await unlinkIfPresent(path);
        continue;
      }
      if (Date.now() >= deadline)
      {
        throw new LockTimeoutError(hostId, path);
      }
      await sleep(this.retryMs);
    }
  }

  async #isStale(path: string): Promise<boolean>
  {
    let content: string;
    try
    {
      content = await readFile(path, 'utf-8');
    }
    catch (error: unknown)
    {
      // released between our open() and this read
      if (isErrnoException(error) && error.code === 'ENOENT')
      {
        return false;
      }
      throw error;
    }
    const pid = Number(content.trim());
    // an empty file is a lock still being written
    if (!Number.isInteger(pid) || pid <= 0)
    {
      return false;
    }
    return pid !== process.pid && !processExists(pid);
  }
}
