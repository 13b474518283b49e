import path from 'node:path';
import type { TaskRecord } from '../model.js';
import { createLogger, type Logger } from '../log.js';
import type { StoreOperation, TaskStore } from '../store/taskStore.js';
import { fieldsEqual, recordFromStore, writeFields, type FieldDiff } from './fields.js';

export type SyncDirection = 'text-to-store' | 'store-to-text';

export type ReconcileOutcome =
  | { kind: 'unchanged' }
  | { kind: 'store-updated'; diffs: FieldDiff[] }
  | { kind: 'store-created'; uuid: string; task: TaskRecord }
  | { kind: 'text-updated'; task: TaskRecord; diffs: FieldDiff[] }
  /** The line names a record the store does not have. Reported, never retried. */
  | { kind: 'missing'; uuid: string };

/** Where a task line came from; used for the creation annotation. */
export interface TaskSource {
  file: string;
  /** Root directory the file was found under, when syncing a whole vault. */
  vault?: string;
}

export interface ReconcilerOptions {
  timeZone: string;
  logger?: Logger;
  now?: () => Date;
}

/** Link written once onto a newly created record. */
export function sourceLink(source: TaskSource): string | undefined {
  if (!source.vault) return undefined;
  const vault = path.basename(path.resolve(source.vault));
  const file = path.parse(source.file).name;
  return `obsidian://open?vault=${encodeURIComponent(vault)}&file=${encodeURIComponent(file)}`;
}

export class Reconciler {
  private readonly timeZone: string;
  private readonly logger: Logger;
  private readonly now: () => Date;

  constructor(
    private store: TaskStore,
    opts: ReconcilerOptions,
  ) {
    this.timeZone = opts.timeZone;
    this.logger = opts.logger ?? createLogger('silent');
    this.now = opts.now ?? (() => new Date());
  }

  reconcile(task: TaskRecord, direction: SyncDirection, source?: TaskSource): Promise<ReconcileOutcome> {
    return direction === 'text-to-store' ? this.textToStore(task, source) : this.storeToText(task);
  }

  /** Make the store match the text. */
  async textToStore(task: TaskRecord, source?: TaskSource): Promise<ReconcileOutcome> {
    if (!task.uuid) return this.createFromText(task, source);

    const record = await this.store.get(task.uuid);
    if (!record) {
      this.logger.warn(`task ${task.uuid} not found in store`, { description: task.description });
      return { kind: 'missing', uuid: task.uuid };
    }

    const diffs = fieldsEqual(task, record.data, this.timeZone);
    if (!diffs.length) {
      this.logger.debug(`no changes for ${task.uuid}`);
      return { kind: 'unchanged' };
    }

    const ops: StoreOperation[] = [];
    writeFields(task, { store: this.store, record, ops, timeZone: this.timeZone }, diffs.map((d) => d.field));
    if (!ops.length) {
      this.logger.debug(`no writes needed for ${task.uuid}`);
      return { kind: 'unchanged' };
    }
    this.logDiffs(task.uuid, diffs, 'store');
    await this.store.commit(ops);
    return { kind: 'store-updated', diffs };
  }

  /** Compute the text that matches the store. The caller renders and patches it. */
  async storeToText(task: TaskRecord): Promise<ReconcileOutcome> {
    if (!task.uuid) return { kind: 'unchanged' };

    const record = await this.store.get(task.uuid);
    if (!record) {
      this.logger.warn(`task ${task.uuid} not found in store`, { description: task.description });
      return { kind: 'missing', uuid: task.uuid };
    }

    const diffs = fieldsEqual(task, record.data, this.timeZone);
    if (!diffs.length) return { kind: 'unchanged' };
    this.logDiffs(task.uuid, diffs, 'text');

    return { kind: 'text-updated', task: recordFromStore(record, this.timeZone, task), diffs };
  }

  private async createFromText(task: TaskRecord, source?: TaskSource): Promise<ReconcileOutcome> {
    const uuid = this.store.newIdentifier();
    const created: TaskRecord = { ...task, uuid };

    const ops: StoreOperation[] = [];
    const record = this.store.create(uuid, ops);
    writeFields(created, { store: this.store, record, ops, timeZone: this.timeZone });

    const link = source ? sourceLink(source) : undefined;
    if (link) {
      const stamp = Math.floor(this.now().getTime() / 1000);
      this.store.setField(record, `annotation_${stamp}`, link, ops);
    }

    await this.store.commit(ops);
    this.logger.info(`created ${uuid}`, { description: task.description });
    return { kind: 'store-created', uuid, task: created };
  }

  private logDiffs(uuid: string, diffs: FieldDiff[], target: 'store' | 'text') {
    for (const d of diffs) {
      const [from, to] = target === 'store' ? [d.store, d.text] : [d.text, d.store];
      this.logger.info(`${uuid} ${d.field}: ${from ?? '(none)'} -> ${to ?? '(none)'}`);
    }
  }
}
