import { existsSync } from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { z } from 'zod';
import { LOG_LEVELS, type LogLevel } from './log.js';
import { isValidTimeZone } from './sync/dates.js';

const str = z.string().min(1);

export const EnvSchema = z.object({
  TASKLINE_STORE_DIR: str.optional(),
  TASKLINE_VAULT: str.optional(),
  TASKLINE_TZ: str.refine(isValidTimeZone, { message: 'Unknown time zone' }).optional(),
  TASKLINE_LOG_LEVEL: z.enum(LOG_LEVELS).optional(),
});

export type EnvConfig = z.infer<typeof EnvSchema>;

export const DEFAULT_STORE_DIR = '~/.taskline';

function describeIssues(issues: z.ZodIssue[], raw: NodeJS.ProcessEnv): string[] {
  return issues.map((issue) => {
    const key = String(issue.path[0] ?? 'environment');
    return `valid ${key} (got ${raw[key] ?? ''}: ${issue.message})`;
  });
}

export function readEnv(env = process.env): EnvConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) throw new Error(`Invalid environment: ${describeIssues(parsed.error.issues, env).join('; ')}`);
  return parsed.data;
}

/** Like `readEnv`, but invalid variables are dropped and described instead of thrown. */
export function readEnvLenient(env: NodeJS.ProcessEnv = process.env): { env: EnvConfig; problems: string[] } {
  const parsed = EnvSchema.safeParse(env);
  if (parsed.success) return { env: parsed.data, problems: [] };

  const invalid = new Set(parsed.error.issues.map((issue) => String(issue.path[0])));
  const rest = EnvSchema.safeParse(Object.fromEntries(Object.entries(env).filter(([key]) => !invalid.has(key))));
  return { env: rest.success ? rest.data : {}, problems: describeIssues(parsed.error.issues, env) };
}

/** Values given on the command line; they take precedence over the environment. */
export interface CliOverrides {
  file?: string;
  vault?: string;
  store?: string;
  tz?: string;
  logLevel?: string;
}

export type SyncTarget = { kind: 'file'; path: string } | { kind: 'vault'; path: string };

export interface RunConfig {
  target: SyncTarget;
  storeDir: string;
  timeZone: string;
  logLevel: LogLevel;
}

export function expandHome(p: string, home = os.homedir()): string {
  if (p === '~') return home;
  if (p.startsWith('~/')) return path.join(home, p.slice(2));
  return p;
}

export function defaultTimeZone(): string {
  return Intl.DateTimeFormat().resolvedOptions().timeZone || 'UTC';
}

function resolveTimeZone(cli: CliOverrides, env: EnvConfig): string {
  const tz = cli.tz ?? env.TASKLINE_TZ ?? defaultTimeZone();
  if (!isValidTimeZone(tz)) throw new Error(`Unknown time zone: ${tz}`);
  return tz;
}

function resolveLogLevel(cli: CliOverrides, env: EnvConfig): LogLevel {
  if (cli.logLevel === undefined) return env.TASKLINE_LOG_LEVEL ?? 'info';
  const parsed = z.enum(LOG_LEVELS).safeParse(cli.logLevel);
  if (!parsed.success) throw new Error(`Unknown log level: ${cli.logLevel} (expected ${LOG_LEVELS.join('|')})`);
  return parsed.data;
}

/** CLI flags, then environment, then defaults. */
export function resolveConfig(cli: CliOverrides, env: EnvConfig = readEnv(), home = os.homedir()): RunConfig {
  if (cli.file && cli.vault) throw new Error('Use either --file or --vault, not both.');

  let target: SyncTarget;
  if (cli.file) target = { kind: 'file', path: expandHome(cli.file, home) };
  else {
    const vault = cli.vault ?? env.TASKLINE_VAULT;
    if (!vault) throw new Error('No target: pass --file <path> or --vault <dir> (or set TASKLINE_VAULT).');
    target = { kind: 'vault', path: expandHome(vault, home) };
  }

  return {
    target,
    storeDir: expandHome(cli.store ?? env.TASKLINE_STORE_DIR ?? DEFAULT_STORE_DIR, home),
    timeZone: resolveTimeZone(cli, env),
    logLevel: resolveLogLevel(cli, env),
  };
}

export function doctorReport(
  cli: CliOverrides = {},
  rawEnv: NodeJS.ProcessEnv = process.env,
  exists: (p: string) => boolean = existsSync,
) {
  const { env, problems } = readEnvLenient(rawEnv);
  const missing: string[] = [...problems];
  const notes: string[] = [];

  const storeDir = expandHome(cli.store ?? env.TASKLINE_STORE_DIR ?? DEFAULT_STORE_DIR);
  if (!exists(storeDir)) missing.push(`task store directory ${storeDir} (set TASKLINE_STORE_DIR or pass --store)`);

  const timeZone = cli.tz ?? env.TASKLINE_TZ ?? defaultTimeZone();
  if (!isValidTimeZone(timeZone)) missing.push(`valid time zone (got ${timeZone})`);
  if (!cli.tz && !rawEnv.TASKLINE_TZ) notes.push(`TASKLINE_TZ not set; using host zone ${timeZone}.`);

  const vault = cli.vault ?? env.TASKLINE_VAULT;
  if (!cli.file && !vault) missing.push('target (TASKLINE_VAULT, --vault or --file)');
  else if (vault && !cli.file && !exists(expandHome(vault))) missing.push(`vault directory ${expandHome(vault)}`);

  return {
    storeDir,
    timeZone,
    vault: vault ? expandHome(vault) : undefined,
    missing: [...new Set(missing)],
    notes: [...new Set(notes)],
  };
}
