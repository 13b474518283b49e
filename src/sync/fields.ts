import {
  createTaskRecord,
  NEXT_TAG,
  type CalendarDate,
  type Priority,
  type TaskRecord,
  type TaskStatus,
} from '../model.js';
import { extractTags } from '../parser/line.js';
import {
  readStatus,
  readTags,
  tagKey,
  type StoreData,
  type StoreOperation,
  type StoreRecord,
  type StoreStatus,
  type TaskStore,
} from '../store/taskStore.js';
import { fromStoreTimestamp, toStoreTimestamp } from './dates.js';

export const STATUS_TO_STORE: Record<TaskStatus, StoreStatus> = {
  pending: 'pending',
  complete: 'completed',
  canceled: 'deleted',
};

export const STATUS_FROM_STORE: Record<StoreStatus, TaskStatus> = {
  pending: 'pending',
  completed: 'complete',
  deleted: 'canceled',
  recurring: 'pending',
};

export type PriorityCode = 'H' | 'M' | 'L';

const PRIORITY_CODE_VALUES: readonly PriorityCode[] = ['H', 'M', 'L'];

/** `normal` is stored as no priority at all. */
export const PRIORITY_CODES: Record<Priority, PriorityCode | undefined> = {
  lowest: 'L',
  low: 'L',
  normal: undefined,
  medium: 'M',
  high: 'H',
  highest: 'H',
};

export type FieldName =
  | 'status'
  | 'description'
  | 'due'
  | 'scheduled'
  | 'start'
  | 'created'
  | 'end'
  | 'tags'
  | 'priority'
  | 'project';

export interface FieldDiff {
  field: FieldName;
  text?: string;
  store?: string;
}

export interface WriteContext {
  store: TaskStore;
  record: StoreRecord;
  ops: StoreOperation[];
  timeZone: string;
}

interface FieldSpec<T> {
  field: FieldName;
  text(task: TaskRecord): T;
  store(data: StoreData, timeZone: string): T;
  equal?(text: T, store: T): boolean;
  show?(value: T): string | undefined;
  write(task: TaskRecord, ctx: WriteContext): void;
}

interface FieldComparator {
  field: FieldName;
  diff(task: TaskRecord, data: StoreData, timeZone: string): FieldDiff | undefined;
  write(task: TaskRecord, ctx: WriteContext): void;
}

function defineField<T>(def: FieldSpec<T>): FieldComparator {
  const equal = def.equal ?? ((a: T, b: T) => a === b);
  const show = def.show ?? ((value: T) => (value === undefined ? undefined : String(value)));
  return {
    field: def.field,
    diff(task, data, timeZone) {
      const text = def.text(task);
      const store = def.store(data, timeZone);
      if (equal(text, store)) return undefined;
      return { field: def.field, text: show(text), store: show(store) };
    },
    write: def.write,
  };
}

function set(ctx: WriteContext, property: string, value: string | undefined) {
  ctx.store.setField(ctx.record, property, value, ctx.ops);
}

function storeDate(date: CalendarDate | undefined, timeZone: string): string | undefined {
  return date === undefined ? undefined : toStoreTimestamp(date, timeZone);
}

function dateField(field: 'due' | 'scheduled' | 'start' | 'created', property: string): FieldComparator {
  return defineField<CalendarDate | undefined>({
    field,
    text: (task) => task[field],
    store: (data, timeZone) => fromStoreTimestamp(data[property], timeZone),
    write: (task, ctx) => set(ctx, property, storeDate(task[field], ctx.timeZone)),
  });
}

/** The single store `end` slot holds the done date or the canceled date, chosen by status. */
export function endDate(task: TaskRecord): CalendarDate | undefined {
  if (task.status === 'complete') return task.done;
  if (task.status === 'canceled') return task.canceled;
  return undefined;
}

/** Tags the store should carry for `task`: its own plus `next` when priority is highest. */
export function expectedStoreTags(task: TaskRecord): string[] {
  const tags = new Set(task.tags);
  if (task.priority === 'highest') tags.add(NEXT_TAG);
  return [...tags];
}

export function tagSetsEqual(a: Iterable<string>, b: Iterable<string>): boolean {
  const left = new Set(a);
  const right = new Set(b);
  if (left.size !== right.size) return false;
  for (const tag of left) if (!right.has(tag)) return false;
  return true;
}

export function readPriorityCode(data: StoreData): PriorityCode | undefined {
  return PRIORITY_CODE_VALUES.find((code) => code === data.priority);
}

export function priorityFromStore(code: PriorityCode | undefined, hasNextTag: boolean): Priority {
  switch (code) {
    case 'H':
      return hasNextTag ? 'highest' : 'high';
    case 'M':
      return 'medium';
    case 'L':
      return 'low';
    default:
      return 'normal';
  }
}

interface PriorityValue {
  code?: PriorityCode;
  next: boolean;
}

const FIELD_TABLE: readonly FieldComparator[] = [
  defineField<TaskStatus>({
    field: 'status',
    text: (task) => task.status,
    store: (data) => STATUS_FROM_STORE[readStatus(data)],
    write: (task, ctx) => set(ctx, 'status', STATUS_TO_STORE[task.status]),
  }),
  defineField<string>({
    field: 'description',
    text: (task) => task.description,
    store: (data) => data.description ?? '',
    write: (task, ctx) => set(ctx, 'description', task.description),
  }),
  dateField('due', 'due'),
  dateField('scheduled', 'scheduled'),
  dateField('start', 'wait'),
  dateField('created', 'created'),
  defineField<CalendarDate | undefined>({
    field: 'end',
    text: endDate,
    store: (data, timeZone) => fromStoreTimestamp(data.end, timeZone),
    write: (task, ctx) => set(ctx, 'end', storeDate(endDate(task), ctx.timeZone)),
  }),
  defineField<string[]>({
    field: 'tags',
    text: expectedStoreTags,
    store: readTags,
    equal: tagSetsEqual,
    show: (tags) => [...tags].sort().join(' '),
    write: (task, ctx) => {
      const expected = expectedStoreTags(task);
      for (const tag of readTags(ctx.record.data)) {
        if (!expected.includes(tag)) set(ctx, tagKey(tag), undefined);
      }
      for (const tag of expected) set(ctx, tagKey(tag), '');
    },
  }),
  defineField<PriorityValue>({
    field: 'priority',
    text: (task) => ({ code: PRIORITY_CODES[task.priority], next: task.priority === 'highest' }),
    store: (data) => ({ code: readPriorityCode(data), next: tagKey(NEXT_TAG) in data }),
    // Highest only matches a store record that also carries the next tag.
    equal: (text, store) => text.code === store.code && (!text.next || store.next),
    show: (value) => (value.code ? `${value.code}${value.next ? ' +next' : ''}` : undefined),
    write: (task, ctx) => {
      set(ctx, 'priority', PRIORITY_CODES[task.priority]);
      if (task.priority === 'highest') set(ctx, tagKey(NEXT_TAG), '');
    },
  }),
  defineField<string | undefined>({
    field: 'project',
    text: (task) => task.project,
    store: (data) => data.project || undefined,
    write: (task, ctx) => set(ctx, 'project', task.project),
  }),
];

/** Every field on which `task` and the store data disagree; empty when in sync. */
export function fieldsEqual(task: TaskRecord, data: StoreData, timeZone: string): FieldDiff[] {
  const diffs: FieldDiff[] = [];
  for (const field of FIELD_TABLE) {
    const diff = field.diff(task, data, timeZone);
    if (diff) diffs.push(diff);
  }
  return diffs;
}

/** Queue writes for the named fields, or for every field when `only` is omitted. */
export function writeFields(task: TaskRecord, ctx: WriteContext, only?: Iterable<FieldName>): void {
  const selected = only ? new Set(only) : undefined;
  for (const field of FIELD_TABLE) {
    if (!selected || selected.has(field.field)) field.write(task, ctx);
  }
}

/**
 * Text form of a store record. The store description is kept as is, with
 * `#tag` tokens appended for store tags it does not mention. `current` is the
 * line being replaced; its `lowest` priority survives since the store cannot
 * tell it from `low`.
 */
export function recordFromStore(record: StoreRecord, timeZone: string, current?: TaskRecord): TaskRecord {
  const { data } = record;
  const status = STATUS_FROM_STORE[readStatus(data)];
  const storeTags = readTags(data);

  let priority = priorityFromStore(readPriorityCode(data), storeTags.includes(NEXT_TAG));
  if (priority === 'low' && current?.priority === 'lowest') priority = 'lowest';

  let description = (data.description ?? '').trim() || (current?.description ?? '');
  const mentioned = extractTags(description);
  const missing = storeTags.filter(
    (tag) => !mentioned.includes(tag) && !(tag === NEXT_TAG && priority === 'highest'),
  );
  if (missing.length) description = [description, ...missing.map((tag) => `#${tag}`)].join(' ').trim();

  const end = fromStoreTimestamp(data.end, timeZone);

  return createTaskRecord({
    uuid: record.uuid,
    status,
    description,
    tags: extractTags(description),
    due: fromStoreTimestamp(data.due, timeZone),
    scheduled: fromStoreTimestamp(data.scheduled, timeZone),
    start: fromStoreTimestamp(data.wait, timeZone),
    created: fromStoreTimestamp(data.created, timeZone),
    done: status === 'complete' ? end : undefined,
    canceled: status === 'canceled' ? end : undefined,
    priority,
    project: data.project || undefined,
  });
}
