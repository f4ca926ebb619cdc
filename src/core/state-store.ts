import * as fsp from 'fs/promises';
import * as path from 'path';
import { z } from 'zod';
import { errnoCode, StateStoreError } from '@/core/errors';
import logger from '@/utils/logger';

const STATE_VERSION = 1;

const StateFileSchema = z.object({
  version: z.literal(STATE_VERSION),
  sources: z.record(z.array(z.string()))
});

type StateFile = z.infer<typeof StateFileSchema>;

/**
 * Read-only view of one source's notified identifiers.
 */
export interface SeenSet {
  has(id: string): boolean;
  readonly size: number;
}

/**
 * Persisted mapping of source key to the identifiers already notified for it.
 *
 * Identifiers keep their insertion order, which is what retention pruning
 * relies on. Writes go to a temporary file that is fsynced and renamed over the
 * state file, so a crash leaves either the old or the new state behind.
 */
export class StateStore {
  private readonly sources = new Map<string, Set<string>>();
  private dirty = false;

  private constructor(private readonly filePath: string) {}

  static async load(filePath: string): Promise<StateStore> {
    const store = new StateStore(filePath);

    let raw: string;
    try {
      raw = await fsp.readFile(filePath, 'utf8');
    } catch (error) {
      if (errnoCode(error) === 'ENOENT') {
        logger.info('No state file found, starting with empty state', { filePath });
        return store;
      }
      throw new StateStoreError(`Cannot read state file ${filePath}`, { filePath }, { cause: error });
    }

    let state: StateFile;
    try {
      state = StateFileSchema.parse(JSON.parse(raw));
    } catch (error) {
      throw new StateStoreError(`State file ${filePath} is corrupt`, { filePath }, { cause: error });
    }

    for (const [key, ids] of Object.entries(state.sources)) {
      store.sources.set(key, new Set(ids));
    }

    logger.debug('State loaded', { filePath, sources: store.sources.size });
    return store;
  }

  /** True once a source has been recorded, even with no identifiers. */
  hasSource(key: string): boolean {
    return this.sources.has(key);
  }

  seenSet(key: string): SeenSet {
    return this.sources.get(key) ?? new Set<string>();
  }

  isSeen(key: string, id: string): boolean {
    return this.sources.get(key)?.has(id) ?? false;
  }

  markSeen(key: string, id: string): void {
    const ids = this.ensureSource(key);
    if (!ids.has(id)) {
      ids.add(id);
      this.dirty = true;
    }
  }

  /**
   * Records a source and its current identifiers without any notification;
   * used for the first fetch of a source under the seed policy.
   */
  seed(key: string, ids: Iterable<string>): void {
    this.ensureSource(key);
    for (const id of ids) {
      this.markSeen(key, id);
    }
  }

  /**
   * Keeps the `retain` most recently recorded identifiers of a source, plus
   * every identifier in `window` (still visible upstream, so it may come back).
   *
   * @returns number of identifiers dropped
   */
  prune(key: string, retain: number, window: Iterable<string>): number {
    const ids = this.sources.get(key);
    if (!ids || retain <= 0 || ids.size <= retain) {
      return 0;
    }

    const keep = new Set(window);
    const ordered = Array.from(ids);
    const cutoff = ordered.length - retain;
    let dropped = 0;

    for (let i = 0; i < cutoff; i++) {
      if (!keep.has(ordered[i])) {
        ids.delete(ordered[i]);
        dropped++;
      }
    }

    if (dropped > 0) {
      this.dirty = true;
    }
    return dropped;
  }

  isDirty(): boolean {
    return this.dirty;
  }

  toJSON(): StateFile {
    const sources: Record<string, string[]> = {};
    for (const [key, ids] of this.sources) {
      sources[key] = Array.from(ids);
    }
    return { version: STATE_VERSION, sources };
  }

  /**
   * Atomically writes the state file.
   *
   * @throws StateStoreError when the file cannot be written
   */
  async flush(): Promise<void> {
    const tmpPath = `${this.filePath}.${process.pid}.tmp`;
    const content = JSON.stringify(this.toJSON(), null, 2) + '\n';

    try {
      await fsp.mkdir(path.dirname(this.filePath), { recursive: true });
      const handle = await fsp.open(tmpPath, 'w');
      try {
        await handle.writeFile(content, 'utf8');
        await handle.sync();
      } finally {
        await handle.close();
      }
      await fsp.rename(tmpPath, this.filePath);
      this.dirty = false;
    } catch (error) {
      await fsp.rm(tmpPath, { force: true }).catch((cleanupError: unknown) => {
        logger.warn('Failed to remove temporary state file', { tmpPath, error: cleanupError });
      });
      throw new StateStoreError(`Cannot write state file ${this.filePath}`, {
        filePath: this.filePath
      }, { cause: error });
    }

    logger.debug('State flushed', { filePath: this.filePath });
  }

  private ensureSource(key: string): Set<string> {
    let ids = this.sources.get(key);
    if (!ids) {
      ids = new Set<string>();
      this.sources.set(key, ids);
      this.dirty = true;
    }
    return ids;
  }
}
