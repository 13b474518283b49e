import { readFileSync, existsSync } from 'node:fs';
import path from 'node:path';

/**
 * Parse dotenv text into key/value pairs.
 *
 * - `KEY=VALUE`, optionally prefixed with `export `
 * - `#` starts a comment on its own line, or after whitespace in an unquoted value
 * - single or double quotes are stripped; quoted values are kept verbatim
 */
export function parseEnvText(raw: string): Record<string, string> {
  const out: Record<string, string> = {};

  for (const line of raw.split(/\r?\n/)) {
    const trimmed = line.trim().replace(/^export\s+/, '');
    if (!trimmed || trimmed.startsWith('#')) continue;

    const eq = trimmed.indexOf('=');
    if (eq <= 0) continue;
    const key = trimmed.slice(0, eq).trim();
    let value = trimmed.slice(eq + 1).trim();

    const quote = value[0];
    if ((quote === '"' || quote === "'") && value.length >= 2 && value.endsWith(quote)) {
      value = value.slice(1, -1);
    } else {
      value = value.replace(/\s+#.*$/, '');
    }

    if (key) out[key] = value;
  }

  return out;
}

/**
 * Load `.env` files from `cwd` into `env`. Keys already present in `env` win,
 * and earlier files win over later ones.
 */
export function loadEnvFiles(
  filenames: string[] = ['.env', '.env.local'],
  cwd: string = process.cwd(),
  env: NodeJS.ProcessEnv = process.env,
): { loaded: string[] } {
  const loaded: string[] = [];

  for (const name of filenames) {
    const filePath = path.join(cwd, name);
    if (!existsSync(filePath)) continue;

    for (const [key, value] of Object.entries(parseEnvText(readFileSync(filePath, 'utf8')))) {
      if (env[key] === undefined) env[key] = value;
    }
    loaded.push(name);
  }

  return { loaded };
}
