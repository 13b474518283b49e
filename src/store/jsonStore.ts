import { mkdir, readFile, writeFile, rename, copyFile, stat } from 'node:fs/promises';
import path from 'node:path';
import { z } from 'zod';
import { acquireLock } from './lock.js';
import { applyOperations, BaseTaskStore, type StoreData, type StoreOperation, type StoreRecord } from './taskStore.js';

const StateSchema = z.object({
  /** State schema version. */
  version: z.literal(1),
  tasks: z.record(z.record(z.string())),
});

export type StoreState = z.infer<typeof StateSchema>;

const EMPTY_STATE: StoreState = { version: 1, tasks: {} };

export interface JsonTaskStoreOptions {
  /** Create the store directory on first commit instead of failing. */
  createIfMissing?: boolean;
}

/**
 * Task database kept in `<dir>/taskdb.json`.
 *
 * Every read goes to disk, so each reconciliation sees the current file.
 * Commits hold the directory lock for the whole load-apply-save cycle.
 */
export class JsonTaskStore extends BaseTaskStore {
  constructor(
    private dir: string,
    private opts: JsonTaskStoreOptions = {},
  ) {
    super();
  }

  getDir() {
    return this.dir;
  }

  statePath() {
    return path.join(this.dir, 'taskdb.json');
  }

  private async ensureDir(): Promise<void> {
    try {
      const info = await stat(this.dir);
      if (!info.isDirectory()) throw new Error(`Task store path is not a directory: ${this.dir}`);
    } catch (err) {
      if (!(err instanceof Error && 'code' in err && err.code === 'ENOENT')) throw err;
      if (!this.opts.createIfMissing) throw new Error(`Task store not found: ${this.dir}`);
      await mkdir(this.dir, { recursive: true });
    }
  }

  async load(): Promise<StoreState> {
    let raw: string;
    try {
      raw = await readFile(this.statePath(), 'utf8');
    } catch (err) {
      if (err instanceof Error && 'code' in err && err.code === 'ENOENT') {
        await this.ensureDir();
        return structuredClone(EMPTY_STATE);
      }
      throw err;
    }

    const parsed = StateSchema.safeParse(JSON.parse(raw));
    if (!parsed.success) {
      throw new Error(`Task store file is malformed (${this.statePath()}): ${parsed.error.issues[0]?.message ?? 'invalid'}`);
    }
    return parsed.data;
  }

  private async backupStateFile(): Promise<void> {
    try {
      await copyFile(this.statePath(), this.statePath() + '.bak');
    } catch (err) {
      if (!(err instanceof Error && 'code' in err && err.code === 'ENOENT')) throw err;
    }
  }

  private async save(state: StoreState): Promise<void> {
    await this.backupStateFile();
    const tmp = this.statePath() + '.tmp';
    await writeFile(tmp, JSON.stringify(state, null, 2) + '\n', 'utf8');
    await rename(tmp, this.statePath());
  }

  async get(uuid: string): Promise<StoreRecord | undefined> {
    const state = await this.load();
    const data: StoreData | undefined = state.tasks[uuid];
    return data ? { uuid, data: { ...data } } : undefined;
  }

  async commit(ops: StoreOperation[]): Promise<void> {
    if (!ops.length) return;
    await this.ensureDir();

    const lock = await acquireLock(this.dir);
    try {
      const state = await this.load();
      applyOperations(state.tasks, ops);
      await this.save(state);
    } finally {
      await lock.release();
    }
  }

  async uuids(): Promise<string[]> {
    return Object.keys((await this.load()).tasks);
  }
}
