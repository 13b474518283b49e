import { Command, Option } from 'commander';
import { existsSync } from 'node:fs';
import { doctorReport, resolveConfig, type CliOverrides, type RunConfig } from './config.js';
import { findTaskFiles } from './files/scan.js';
import { createLogger } from './log.js';
import { JsonTaskStore } from './store/jsonStore.js';
import { SyncEngine, type SyncReport } from './sync/engine.js';
import type { SyncDirection } from './sync/reconcile.js';

export const REPORT_FORMATS = ['pretty', 'json'] as const;

export type ReportFormat = (typeof REPORT_FORMATS)[number];

interface RunOptions extends CliOverrides {
  format?: ReportFormat;
  createStore?: boolean;
}

function printReport(report: SyncReport, format: ReportFormat) {
  if (format === 'json') {
    console.log(JSON.stringify(report, null, 2));
    return;
  }

  console.log(`taskline report (${report.direction})`);
  console.log(`files: ${report.files.length}`);
  console.log(`durationMs: ${report.durationMs}`);

  console.log('\ncounts:');
  for (const [k, v] of Object.entries(report.counts)) console.log(`- ${k}: ${v}`);

  for (const file of report.files) {
    if (!file.actions.length && !file.errors.length) continue;
    console.log(`\n${file.file}`);
    for (const a of file.actions) {
      console.log(`- ${a.kind} line ${a.line + 1}${a.uuid ? ` ${a.uuid}` : ''} :: ${a.detail}`);
    }
    for (const e of file.errors) {
      console.log(`- error (${e.stage}${e.line === undefined ? '' : ` line ${e.line + 1}`}): ${e.error}`);
    }
  }
}

async function runSync(direction: SyncDirection, opts: RunOptions) {
  let config: RunConfig;
  try {
    config = resolveConfig(opts);
  } catch (err) {
    console.error(err instanceof Error ? err.message : String(err));
    process.exitCode = 2;
    return;
  }

  if (!opts.createStore && !existsSync(config.storeDir)) {
    console.error(`Task store not found: ${config.storeDir}. Create it or pass --create-store.`);
    process.exitCode = 2;
    return;
  }

  const logger = createLogger(config.logLevel, 'taskline');
  const store = new JsonTaskStore(config.storeDir, { createIfMissing: !!opts.createStore });
  const engine = new SyncEngine(store, { timeZone: config.timeZone, logger });

  const files = config.target.kind === 'file' ? [config.target.path] : await findTaskFiles(config.target.path);
  const vault = config.target.kind === 'vault' ? config.target.path : undefined;

  logger.info(`${direction} start`, { files: files.length, store: config.storeDir, timeZone: config.timeZone });
  const report = await engine.syncMany(files, { direction, vault });

  printReport(report, opts.format ?? 'pretty');
  if (!report.ok) process.exitCode = 1;
}

/**
 * The `taskline` command tree. `configure` runs before any subcommand is added,
 * so settings such as `exitOverride` reach every subcommand.
 */
export function buildProgram(configure?: (program: Command) => void): Command {
  const program = new Command();
  program
    .name('taskline')
    .description('Sync markdown checkbox tasks with a task database')
    .version('0.1.0');
  configure?.(program);

  const syncCommand = (name: SyncDirection, description: string) => {
    program
      .command(name)
      .description(description)
      .option('-f, --file <path>', 'Sync a single markdown file')
      .option('-v, --vault <dir>', 'Sync every markdown file under a directory (or TASKLINE_VAULT)')
      .option('-s, --store <dir>', 'Task store directory (or TASKLINE_STORE_DIR, default ~/.taskline)')
      .option('--tz <zone>', 'IANA time zone for dates (or TASKLINE_TZ, default host zone)')
      .option('--log-level <level>', 'silent|error|warn|info|debug (or TASKLINE_LOG_LEVEL)')
      .option('--create-store', 'Create the task store directory if it does not exist')
      .addOption(new Option('--format <format>', 'Output format').choices(REPORT_FORMATS).default('pretty'))
      .action((opts: RunOptions) => runSync(name, opts));
  };

  syncCommand('text-to-store', 'Write task lines into the task store (text wins)');
  syncCommand('store-to-text', 'Rewrite task lines from the task store (store wins)');

  program
    .command('doctor')
    .description('Check environment/config and print what is missing')
    .option('-f, --file <path>', 'Single markdown file target')
    .option('-v, --vault <dir>', 'Vault directory target')
    .option('-s, --store <dir>', 'Task store directory')
    .option('--tz <zone>', 'IANA time zone')
    .action((opts: CliOverrides) => {
      const report = doctorReport(opts);
      console.log('taskline doctor');
      console.log(`store: ${report.storeDir}`);
      console.log(`timeZone: ${report.timeZone}`);
      console.log(`vault: ${report.vault ?? '(none)'}`);
      if (report.missing.length) {
        console.log('\nMissing:');
        for (const k of report.missing) console.log(`- ${k}`);
        process.exitCode = 2;
      } else {
        console.log('\nNothing missing.');
      }

      if (report.notes.length) {
        console.log('\nNotes:');
        for (const n of report.notes) console.log(`- ${n}`);
      }
    });

  return program;
}
