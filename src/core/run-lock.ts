import * as fs from 'fs';
import * as fsp from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { errnoCode, errorMessage, LockContentionError, StateStoreError } from '@/core/errors';
import logger from '@/utils/logger';

export interface LockToken {
  path: string;
  pid: number;
  acquiredAt: string;
}

interface LockFileContent {
  pid: number;
  hostname?: string;
  acquiredAt?: string;
}

export type ProcessProbe = (pid: number) => boolean;

/**
 * Signal 0 performs the permission and existence checks without delivering
 * anything. EPERM means the process exists but belongs to someone else.
 */
export const isProcessAlive: ProcessProbe = (pid) => {
  try {
    process.kill(pid, 0);
    return true;
  } catch (error) {
    return errnoCode(error) === 'EPERM';
  }
};

function parseLockFile(raw: string): LockFileContent | null {
  try {
    const parsed: unknown = JSON.parse(raw);
    if (
      typeof parsed === 'object' && parsed !== null &&
      'pid' in parsed && typeof parsed.pid === 'number' && Number.isInteger(parsed.pid) && parsed.pid > 0
    ) {
      return { pid: parsed.pid };
    }
  } catch {
    // garbled lock files are treated as stale
  }
  return null;
}

/**
 * Cross-process exclusion for a run, backed by a lock file holding the owner's
 * PID. Acquisition never waits: a live owner makes it fail at once, a dead one
 * (or an unreadable file) is reclaimed.
 */
export class RunLock {
  constructor(
    private readonly lockFilePath: string,
    private readonly pid: number = process.pid,
    private readonly probe: ProcessProbe = isProcessAlive
  ) {}

  async acquire(): Promise<LockToken> {
    await fsp.mkdir(path.dirname(this.lockFilePath), { recursive: true });

    for (let attempt = 0; attempt < 2; attempt++) {
      const token: LockToken = { path: this.lockFilePath, pid: this.pid, acquiredAt: new Date().toISOString() };
      const content: LockFileContent = { pid: token.pid, hostname: os.hostname(), acquiredAt: token.acquiredAt };

      try {
        await fsp.writeFile(this.lockFilePath, JSON.stringify(content), { flag: 'wx' });
        logger.debug('Run lock acquired', { lockFilePath: this.lockFilePath });
        return token;
      } catch (error) {
        if (errnoCode(error) !== 'EEXIST') {
          throw new StateStoreError(`Cannot create lock file ${this.lockFilePath}`, {
            lockFilePath: this.lockFilePath
          }, { cause: error });
        }
      }

      const observed = await this.readRaw();
      if (observed === null) {
        continue;
      }
      const owner = parseLockFile(observed);
      if (owner && owner.pid !== this.pid && this.probe(owner.pid)) {
        throw new LockContentionError(this.lockFilePath, owner.pid);
      }

      logger.warn('Removing stale run lock', {
        lockFilePath: this.lockFilePath,
        ownerPid: owner?.pid
      });
      await this.discardStale(observed);
    }

    // Another process won the race for the reclaimed lock
    const owner = await this.readOwner();
    throw new LockContentionError(this.lockFilePath, owner?.pid ?? 0);
  }

  async release(token: LockToken): Promise<void> {
    try {
      const owner = await this.readOwner();
      if (owner?.pid === token.pid) {
        await fsp.rm(token.path, { force: true });
        logger.debug('Run lock released', { lockFilePath: token.path });
      }
    } catch (error) {
      logger.warn('Failed to release run lock', { lockFilePath: token.path, error });
    }
  }

  /** Signal-handler variant of release(). */
  releaseSync(token: LockToken): void {
    try {
      const owner = parseLockFile(fs.readFileSync(token.path, 'utf8'));
      if (owner?.pid === token.pid) {
        fs.rmSync(token.path, { force: true });
      }
    } catch (error) {
      if (errnoCode(error) !== 'ENOENT') {
        logger.warn('Failed to release run lock', { lockFilePath: token.path, error });
      }
    }
  }

  /**
   * Moves the lock file aside and deletes it only if it is still the stale one
   * that was inspected. A concurrent run may have reclaimed it in between; its
   * fresh lock is put back and this acquisition gives way.
   */
  private async discardStale(observed: string): Promise<void> {
    const stalePath = `${this.lockFilePath}.${this.pid}.stale`;
    try {
      await fsp.rename(this.lockFilePath, stalePath);
    } catch (error) {
      if (errnoCode(error) === 'ENOENT') {
        return;
      }
      throw new StateStoreError(`Cannot move stale lock file ${this.lockFilePath}`, {
        lockFilePath: this.lockFilePath
      }, { cause: error });
    }

    let moved: string;
    try {
      moved = await fsp.readFile(stalePath, 'utf8');
    } catch (error) {
      throw new StateStoreError(`Cannot read lock file ${stalePath}`, { lockFilePath: stalePath }, { cause: error });
    }

    if (moved === observed) {
      await fsp.rm(stalePath, { force: true });
      return;
    }

    await this.restore(stalePath);
    throw new LockContentionError(this.lockFilePath, parseLockFile(moved)?.pid ?? 0);
  }

  private async restore(stalePath: string): Promise<void> {
    try {
      // link() fails instead of overwriting when yet another run got in first
      await fsp.link(stalePath, this.lockFilePath);
    } catch (error) {
      logger.warn('Could not restore run lock taken over by another process', {
        lockFilePath: this.lockFilePath,
        error: errorMessage(error)
      });
    } finally {
      await fsp.rm(stalePath, { force: true });
    }
  }

  private async readRaw(): Promise<string | null> {
    try {
      return await fsp.readFile(this.lockFilePath, 'utf8');
    } catch (error) {
      if (errnoCode(error) === 'ENOENT') {
        return null;
      }
      throw new StateStoreError(`Cannot read lock file ${this.lockFilePath}`, {
        lockFilePath: this.lockFilePath
      }, { cause: error });
    }
  }

  private async readOwner(): Promise<LockFileContent | null> {
    const raw = await this.readRaw();
    return raw === null ? null : parseLockFile(raw);
  }
}

/**
 * Runs `fn` while holding the lock; the lock is released on every exit path.
 */
export async function withRunLock<T>(
  lock: RunLock,
  fn: (token: LockToken) => Promise<T>
): Promise<T> {
  const token = await lock.acquire();
  try {
    return await fn(token);
  } finally {
    await lock.release(token);
  }
}
