import { readdir } from 'node:fs/promises';
import path from 'node:path';

const TASK_FILE_EXTENSIONS = new Set(['.md']);

/**
 * Markdown files under `root`, depth first, sorted by path. Hidden entries
 * (names starting with `.`, e.g. `.obsidian`, `.trash`) are skipped.
 */
export async function findTaskFiles(root: string): Promise<string[]> {
  const found: string[] = [];

  const walk = async (dir: string) => {
    const entries = await readdir(dir, { withFileTypes: true });
    for (const entry of entries) {
      if (entry.name.startsWith('.')) continue;
      const full = path.join(dir, entry.name);
      if (entry.isDirectory()) await walk(full);
      else if (entry.isFile() && TASK_FILE_EXTENSIONS.has(path.extname(entry.name).toLowerCase())) found.push(full);
    }
  };

  await walk(root);
  return found.sort();
}
