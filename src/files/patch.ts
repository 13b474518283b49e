import { readFile, writeFile, rename, rm, unlink } from 'node:fs/promises';

export interface LineUpdate {
  /** 0-based index into the file as read before the batch. */
  line: number;
  text: string;
}

/** Lines of a file; a final newline does not start another line. */
export function splitLines(raw: string): string[] {
  const lines = raw.split(/\r?\n/);
  if (lines[lines.length - 1] === '') lines.pop();
  return lines;
}

function indentOf(line: string): string {
  return line.slice(0, line.length - line.trimStart().length);
}

function sameLines(a: string[], b: string[]): boolean {
  return a.length === b.length && a.every((line, i) => line === b[i]);
}

/**
 * Replace whole lines of a file, keeping each target line's indentation.
 *
 * `snapshot` is the file as the caller read it when computing `updates`; if the
 * file no longer matches it, nothing is written. The new content goes to
 * `<file>.tmp` first; the original is removed and the temp file renamed over it
 * only once that write has finished. Output uses `\n` line endings with a
 * trailing newline.
 */
export async function applyLineUpdates(filePath: string, updates: LineUpdate[], snapshot?: string[]): Promise<void> {
  if (!updates.length) return;

  const tempPath = `${filePath}.tmp`;
  await rm(tempPath, { force: true });

  const current = splitLines(await readFile(filePath, 'utf8'));
  if (snapshot && !sameLines(snapshot, current)) {
    throw new Error(`${filePath} changed while it was being synced; not rewriting it`);
  }
  const lines = snapshot ?? current;
  for (const { line } of updates) {
    if (!Number.isInteger(line) || line < 0 || line >= lines.length) {
      throw new Error(`Line ${line} is out of range for ${filePath} (${lines.length} lines)`);
    }
  }

  const next = [...lines];
  for (const update of updates) {
    next[update.line] = indentOf(lines[update.line] ?? '') + update.text.trimStart();
  }

  await writeFile(tempPath, next.map((l) => `${l}\n`).join(''), 'utf8');
  await unlink(filePath);
  await rename(tempPath, filePath);
}
