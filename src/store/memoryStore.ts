import { applyOperations, BaseTaskStore, type StoreData, type StoreOperation, type StoreRecord } from './taskStore.js';

/**
 * In-process task database for tests and demos.
 *
 * - Records live in a plain object keyed by uuid.
 * - `commit` applies to a copy and swaps it in, so a rejected batch changes nothing.
 * - Every committed batch is kept in `history`.
 */
export class MemoryTaskStore extends BaseTaskStore {
  private tasks: Record<string, StoreData> = {};
  readonly history: StoreOperation[][] = [];

  constructor(opts?: { tasks?: Record<string, StoreData> }) {
    super();
    for (const [uuid, data] of Object.entries(opts?.tasks ?? {})) this.tasks[uuid] = { ...data };
  }

  async get(uuid: string): Promise<StoreRecord | undefined> {
    const data = this.tasks[uuid];
    return data ? { uuid, data: { ...data } } : undefined;
  }

  async commit(ops: StoreOperation[]): Promise<void> {
    if (!ops.length) return;
    const next = structuredClone(this.tasks);
    applyOperations(next, ops);
    this.tasks = next;
    this.history.push([...ops]);
  }

  uuids(): string[] {
    return Object.keys(this.tasks);
  }
}
