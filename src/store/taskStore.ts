import { randomUUID } from 'node:crypto';

/** Status vocabulary of the task database. */
export type StoreStatus = 'pending' | 'completed' | 'deleted' | 'recurring';

export const STORE_STATUSES: readonly StoreStatus[] = ['pending', 'completed', 'deleted', 'recurring'];

/**
 * Raw key/value data of one external task. Dates are epoch seconds as
 * decimal strings, tags are `tag_<name>` keys with an empty value.
 */
export type StoreData = Record<string, string>;

export interface StoreRecord {
  readonly uuid: string;
  /** Local working copy; `setField` keeps it in step with queued operations. */
  data: StoreData;
}

export type StoreOperation =
  | { kind: 'create'; uuid: string }
  | { kind: 'update'; uuid: string; property: string; value?: string; timestamp: string };

export interface TaskStore {
  get(uuid: string): Promise<StoreRecord | undefined>;

  /** Queue creation of an empty record. Nothing is written until `commit`. */
  create(uuid: string, ops: StoreOperation[]): StoreRecord;

  /** Queue a property change; `undefined` removes the property. */
  setField(record: StoreRecord, property: string, value: string | undefined, ops: StoreOperation[]): void;

  /** Apply queued operations as one all-or-nothing group. */
  commit(ops: StoreOperation[]): Promise<void>;

  newIdentifier(): string;
}

export const TAG_PREFIX = 'tag_';

export function tagKey(tag: string): string {
  return `${TAG_PREFIX}${tag}`;
}

export function readTags(data: StoreData): string[] {
  return Object.keys(data)
    .filter((key) => key.startsWith(TAG_PREFIX))
    .map((key) => key.slice(TAG_PREFIX.length));
}

export function readStatus(data: StoreData): StoreStatus {
  return STORE_STATUSES.find((s) => s === data.status) ?? 'pending';
}

/** Apply operations to `tasks` in place. Throws on an update to an unknown record. */
export function applyOperations(tasks: Record<string, StoreData>, ops: StoreOperation[]): void {
  for (const op of ops) {
    if (op.kind === 'create') {
      tasks[op.uuid] ??= {};
      continue;
    }
    const data = tasks[op.uuid];
    if (!data) throw new Error(`Cannot update unknown task ${op.uuid}`);
    if (op.value === undefined) delete data[op.property];
    else data[op.property] = op.value;
  }
}

/** Operation queueing shared by the store implementations. */
export abstract class BaseTaskStore implements TaskStore {
  abstract get(uuid: string): Promise<StoreRecord | undefined>;

  abstract commit(ops: StoreOperation[]): Promise<void>;

  create(uuid: string, ops: StoreOperation[]): StoreRecord {
    ops.push({ kind: 'create', uuid });
    return { uuid, data: {} };
  }

  setField(record: StoreRecord, property: string, value: string | undefined, ops: StoreOperation[]): void {
    if (record.data[property] === value) return;
    ops.push({ kind: 'update', uuid: record.uuid, property, value, timestamp: new Date().toISOString() });
    if (value === undefined) delete record.data[property];
    else record.data[property] = value;
  }

  newIdentifier(): string {
    return randomUUID();
  }
}
