import { describe, expect, it } from 'vitest';
import { mkdtemp, readFile, stat, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { JsonTaskStore } from '../src/store/jsonStore.js';
import { acquireLock } from '../src/store/lock.js';
import type { StoreOperation } from '../src/store/taskStore.js';

const UUID = '3f2c2b1e-9a4d-4c6b-8e1f-0a1b2c3d4e5f';

async function tempDir() {
  return mkdtemp(path.join(os.tmpdir(), 'taskline-store-'));
}

describe('JsonTaskStore', () => {
  it('commits operations and reads them back from a fresh instance', async () => {
    const dir = await tempDir();
    const store = new JsonTaskStore(dir);
    expect(await store.get(UUID)).toBeUndefined();

    const ops: StoreOperation[] = [];
    const record = store.create(UUID, ops);
    store.setField(record, 'status', 'pending', ops);
    store.setField(record, 'description', 'Write tests', ops);
    await store.commit(ops);

    const reopened = new JsonTaskStore(dir);
    expect(await reopened.get(UUID)).toEqual({
      uuid: UUID,
      data: { status: 'pending', description: 'Write tests' },
    });
    expect(await reopened.uuids()).toEqual([UUID]);

    const onDisk: unknown = JSON.parse(await readFile(path.join(dir, 'taskdb.json'), 'utf8'));
    expect(onDisk).toEqual({ version: 1, tasks: { [UUID]: { status: 'pending', description: 'Write tests' } } });
  });

  it('keeps a backup of the previous state and releases the lock', async () => {
    const dir = await tempDir();
    const store = new JsonTaskStore(dir);

    const first: StoreOperation[] = [];
    store.setField(store.create(UUID, first), 'description', 'v1', first);
    await store.commit(first);

    const record = await store.get(UUID);
    if (!record) throw new Error('record missing');
    const second: StoreOperation[] = [];
    store.setField(record, 'description', 'v2', second);
    await store.commit(second);

    const backup: unknown = JSON.parse(await readFile(path.join(dir, 'taskdb.json.bak'), 'utf8'));
    expect(backup).toEqual({ version: 1, tasks: { [UUID]: { description: 'v1' } } });
    expect((await store.get(UUID))?.data).toEqual({ description: 'v2' });
    await expect(stat(path.join(dir, 'taskdb.lock'))).rejects.toThrow();
  });

  it('removes a property set to undefined', async () => {
    const dir = await tempDir();
    await writeFile(
      path.join(dir, 'taskdb.json'),
      JSON.stringify({ version: 1, tasks: { [UUID]: { description: 'x', project: 'Home' } } }),
      'utf8',
    );
    const store = new JsonTaskStore(dir);
    const record = await store.get(UUID);
    if (!record) throw new Error('record missing');

    const ops: StoreOperation[] = [];
    store.setField(record, 'project', undefined, ops);
    await store.commit(ops);

    expect((await store.get(UUID))?.data).toEqual({ description: 'x' });
  });

  it('rejects an update to a record it does not have', async () => {
    const store = new JsonTaskStore(await tempDir());
    const ops: StoreOperation[] = [];
    store.setField({ uuid: UUID, data: {} }, 'description', 'x', ops);

    await expect(store.commit(ops)).rejects.toThrow(`Cannot update unknown task ${UUID}`);
  });

  it('fails on a malformed state file', async () => {
    const dir = await tempDir();
    await writeFile(path.join(dir, 'taskdb.json'), JSON.stringify({ version: 2, tasks: {} }), 'utf8');

    await expect(new JsonTaskStore(dir).get(UUID)).rejects.toThrow('Task store file is malformed');
  });

  it('needs the directory unless asked to create it', async () => {
    const dir = path.join(await tempDir(), 'missing');
    await expect(new JsonTaskStore(dir).get(UUID)).rejects.toThrow(`Task store not found: ${dir}`);

    const store = new JsonTaskStore(dir, { createIfMissing: true });
    const ops: StoreOperation[] = [];
    store.create(UUID, ops);
    await store.commit(ops);
    expect(await store.get(UUID)).toEqual({ uuid: UUID, data: {} });
  });
});

describe('acquireLock', () => {
  it('refuses a lock held by a running process', async () => {
    const dir = await tempDir();
    await writeFile(path.join(dir, 'taskdb.lock'), JSON.stringify({ pid: process.ppid }), 'utf8');

    await expect(acquireLock(dir)).rejects.toThrow(`Task store is locked by another process (pid=${process.ppid})`);
  });

  it('takes over a lock file that cannot be read', async () => {
    const dir = await tempDir();
    await writeFile(path.join(dir, 'taskdb.lock'), '{half', 'utf8');

    const lock = await acquireLock(dir);
    expect(JSON.parse(await readFile(lock.path, 'utf8'))).toMatchObject({ pid: process.pid });
    await lock.release();
    await expect(stat(lock.path)).rejects.toThrow();
  });
});
