import { describe, expect, it } from 'vitest';
import { mkdir, mkdtemp, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { findTaskFiles } from '../src/files/scan.js';

describe('findTaskFiles', () => {
  it('finds markdown files and skips hidden directories', async () => {
    const root = await mkdtemp(path.join(os.tmpdir(), 'taskline-vault-'));
    await mkdir(path.join(root, 'daily'));
    await mkdir(path.join(root, '.obsidian'));
    await writeFile(path.join(root, 'b.md'), '', 'utf8');
    await writeFile(path.join(root, 'daily', 'a.MD'), '', 'utf8');
    await writeFile(path.join(root, '.obsidian', 'c.md'), '', 'utf8');
    await writeFile(path.join(root, 'notes.txt'), '', 'utf8');

    expect(await findTaskFiles(root)).toEqual([path.join(root, 'b.md'), path.join(root, 'daily', 'a.MD')]);
  });
});
