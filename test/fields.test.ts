import { describe, expect, it } from 'vitest';
import { createTaskRecord } from '../src/model.js';
import { MemoryTaskStore } from '../src/store/memoryStore.js';
import type { StoreOperation } from '../src/store/taskStore.js';
import { fromStoreTimestamp, toStoreTimestamp } from '../src/sync/dates.js';
import { fieldsEqual, priorityFromStore, recordFromStore, tagSetsEqual, writeFields } from '../src/sync/fields.js';

const UUID = '3f2c2b1e-9a4d-4c6b-8e1f-0a1b2c3d4e5f';
const JUNE_7_UTC = '1749254400';
const JUNE_8_UTC = '1749340800';

describe('store timestamps', () => {
  it('stores midnight in the configured zone', () => {
    expect(toStoreTimestamp('2025-06-07', 'UTC')).toBe(JUNE_7_UTC);
    expect(toStoreTimestamp('2025-06-07', 'America/Chicago')).toBe('1749272400');
  });

  it('reads the calendar date as seen in the zone', () => {
    expect(fromStoreTimestamp('1749272400', 'America/Chicago')).toBe('2025-06-07');
    expect(fromStoreTimestamp(JUNE_8_UTC, 'UTC')).toBe('2025-06-08');
    expect(fromStoreTimestamp(JUNE_8_UTC, 'America/Chicago')).toBe('2025-06-07');
  });

  it('uses the end of the gap when DST skips midnight', () => {
    expect(toStoreTimestamp('2024-09-08', 'America/Santiago')).toBe('1725768000');
    expect(fromStoreTimestamp('1725768000', 'America/Santiago')).toBe('2024-09-08');
    expect(toStoreTimestamp('2024-03-10', 'America/Havana')).toBe('1710046800');
    expect(toStoreTimestamp('2024-09-07', 'America/Santiago')).toBe('1725681600');
  });

  it('ignores values that are not epoch seconds', () => {
    expect(fromStoreTimestamp(undefined, 'UTC')).toBeUndefined();
    expect(fromStoreTimestamp('2025-06-07', 'UTC')).toBeUndefined();
  });
});

describe('fieldsEqual', () => {
  it('is empty when text and store agree', () => {
    const task = createTaskRecord({ description: 'Test #a', tags: ['a'], due: '2025-06-07', priority: 'medium' });
    const data = { status: 'pending', description: 'Test #a', due: JUNE_7_UTC, priority: 'M', tag_a: '' };
    expect(fieldsEqual(task, data, 'UTC')).toEqual([]);
  });

  it('names each differing field with both sides', () => {
    const task = createTaskRecord({ description: 'Test', due: '2025-06-07', project: 'Home' });
    const data = { status: 'pending', description: 'Test', due: JUNE_8_UTC };
    expect(fieldsEqual(task, data, 'UTC')).toEqual([
      { field: 'due', text: '2025-06-07', store: '2025-06-08' },
      { field: 'project', text: 'Home', store: undefined },
    ]);
  });

  it('requires the next tag for highest priority', () => {
    const task = createTaskRecord({ description: 'Urgent', priority: 'highest' });
    const data = { status: 'pending', description: 'Urgent', priority: 'H' };
    expect(fieldsEqual(task, data, 'UTC').map((d) => d.field)).toEqual(['tags', 'priority']);
    expect(fieldsEqual(task, { ...data, tag_next: '' }, 'UTC')).toEqual([]);
  });

  it('compares the end slot with the date that matches the status', () => {
    const done = createTaskRecord({ status: 'complete', description: 'x', done: '2025-06-08' });
    expect(fieldsEqual(done, { status: 'completed', description: 'x', end: JUNE_8_UTC }, 'UTC')).toEqual([]);

    const canceled = createTaskRecord({ status: 'canceled', description: 'x', canceled: '2025-06-08' });
    expect(fieldsEqual(canceled, { status: 'deleted', description: 'x', end: JUNE_8_UTC }, 'UTC')).toEqual([]);
  });

  it('treats lowest and low as the same store priority', () => {
    const task = createTaskRecord({ description: 'x', priority: 'lowest' });
    expect(fieldsEqual(task, { status: 'pending', description: 'x', priority: 'L' }, 'UTC')).toEqual([]);
  });
});

describe('writeFields', () => {
  it('writes every field of a new record', async () => {
    const store = new MemoryTaskStore();
    const ops: StoreOperation[] = [];
    const record = store.create(UUID, ops);
    const task = createTaskRecord({
      description: 'Write report #work',
      tags: ['work'],
      start: '2025-06-07',
      priority: 'highest',
    });

    writeFields(task, { store, record, ops, timeZone: 'UTC' });
    await store.commit(ops);

    expect((await store.get(UUID))?.data).toEqual({
      status: 'pending',
      description: 'Write report #work',
      wait: JUNE_7_UTC,
      tag_work: '',
      tag_next: '',
      priority: 'H',
    });
  });

  it('removes tags the text no longer has', async () => {
    const store = new MemoryTaskStore({
      tasks: { [UUID]: { status: 'pending', description: 'x', tag_old: '', tag_keep: '' } },
    });
    const record = await store.get(UUID);
    if (!record) throw new Error('record missing');
    const ops: StoreOperation[] = [];

    writeFields(createTaskRecord({ description: 'x #keep', tags: ['keep'] }), { store, record, ops, timeZone: 'UTC' }, [
      'tags',
    ]);
    await store.commit(ops);

    expect((await store.get(UUID))?.data).toEqual({ status: 'pending', description: 'x', tag_keep: '' });
  });
});

describe('recordFromStore', () => {
  it('builds the text form of a store record', () => {
    const record = {
      uuid: UUID,
      data: {
        status: 'completed',
        description: 'Buy milk',
        end: JUNE_8_UTC,
        due: JUNE_7_UTC,
        priority: 'L',
        project: 'Home',
        tag_errand: '',
      },
    };
    const current = createTaskRecord({ uuid: UUID, description: 'Buy milk', priority: 'lowest' });

    expect(recordFromStore(record, 'UTC', current)).toEqual({
      uuid: UUID,
      status: 'complete',
      description: 'Buy milk #errand',
      tags: ['errand'],
      due: '2025-06-07',
      done: '2025-06-08',
      priority: 'lowest',
      project: 'Home',
    });
  });

  it('reads H with the next tag as highest without echoing the tag', () => {
    const task = recordFromStore(
      { uuid: UUID, data: { status: 'recurring', description: 'Ship it', priority: 'H', tag_next: '' } },
      'UTC',
    );
    expect(task.status).toBe('pending');
    expect(task.priority).toBe('highest');
    expect(task.description).toBe('Ship it');
  });

  it('keeps the current description when the store has none', () => {
    const current = createTaskRecord({ description: 'Keep me' });
    expect(recordFromStore({ uuid: UUID, data: { status: 'pending' } }, 'UTC', current).description).toBe('Keep me');
  });
});

describe('priorityFromStore', () => {
  it('maps codes back to priorities', () => {
    expect(priorityFromStore('H', false)).toBe('high');
    expect(priorityFromStore('M', true)).toBe('medium');
    expect(priorityFromStore(undefined, false)).toBe('normal');
  });
});

describe('tagSetsEqual', () => {
  it('ignores order and notices size differences', () => {
    expect(tagSetsEqual(['a', 'b'], ['b', 'a'])).toBe(true);
    expect(tagSetsEqual(['a'], ['a', 'b'])).toBe(false);
  });
});
