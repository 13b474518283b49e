import { readFile } from 'node:fs/promises';
import { applyLineUpdates, splitLines, type LineUpdate } from '../files/patch.js';
import { createLogger, type Logger } from '../log.js';
import { parseLineDetailed } from '../parser/line.js';
import { renderTask } from '../parser/render.js';
import type { TaskStore } from '../store/taskStore.js';
import { Reconciler, type ReconcileOutcome, type SyncDirection } from './reconcile.js';

/** Lines that look like a checkbox item; only these are parsed. */
const CHECKBOX_LINE = /^\s*- \[.\]/;

export interface SyncOptions {
  direction: SyncDirection;
  /** Vault root, when the files were found by scanning a directory. */
  vault?: string;
}

export const LINE_ACTION_KINDS = ['create', 'update', 'rewrite', 'noop', 'missing', 'unparsed'] as const;

export type LineActionKind = (typeof LINE_ACTION_KINDS)[number];

export interface LineAction {
  kind: LineActionKind;
  /** 0-based line index. */
  line: number;
  uuid?: string;
  detail: string;
}

export interface SyncError {
  line?: number;
  stage: 'read' | 'reconcile' | 'patch';
  error: string;
}

export interface FileReport {
  file: string;
  counts: Record<LineActionKind, number>;
  actions: LineAction[];
  errors: SyncError[];
}

export interface SyncReport {
  direction: SyncDirection;
  files: FileReport[];
  counts: Record<LineActionKind, number>;
  /** Files with at least one store or file error. */
  failedFiles: number;
  ok: boolean;
  durationMs: number;
}

export interface SyncEngineOptions {
  timeZone: string;
  logger?: Logger;
  now?: () => Date;
}

function emptyCounts(): Record<LineActionKind, number> {
  return { create: 0, update: 0, rewrite: 0, noop: 0, missing: 0, unparsed: 0 };
}

function message(e: unknown) {
  return e instanceof Error ? e.message : String(e);
}

export class SyncEngine {
  private readonly reconciler: Reconciler;
  private readonly logger: Logger;

  constructor(store: TaskStore, opts: SyncEngineOptions) {
    this.logger = opts.logger ?? createLogger('silent');
    this.reconciler = new Reconciler(store, {
      timeZone: opts.timeZone,
      logger: this.logger.child('reconcile'),
      now: opts.now,
    });
  }

  /**
   * Reconcile every task line of one file, one line at a time, then rewrite the
   * file once with all line replacements. A failure on one line does not stop
   * the others or undo their store writes.
   */
  async syncFile(file: string, opts: SyncOptions): Promise<FileReport> {
    const report: FileReport = { file, counts: emptyCounts(), actions: [], errors: [] };
    const push = (action: LineAction) => {
      report.counts[action.kind]++;
      if (action.kind !== 'noop') report.actions.push(action);
    };

    let lines: string[];
    try {
      lines = splitLines(await readFile(file, 'utf8'));
    } catch (e) {
      report.errors.push({ stage: 'read', error: message(e) });
      this.logger.error(`cannot read ${file}`, message(e));
      return report;
    }

    this.logger.info(`sync ${file}`, { direction: opts.direction });
    const updates: LineUpdate[] = [];

    for (const [index, line] of lines.entries()) {
      if (!CHECKBOX_LINE.test(line)) continue;

      const parsed = parseLineDetailed(line);
      if (!parsed) {
        this.logger.debug(`unparsed line ${index + 1}`, line.trim());
        push({ kind: 'unparsed', line: index, detail: line.trim() });
        continue;
      }
      for (const fe of parsed.errors) {
        this.logger.warn(`line ${index + 1}: ${fe.message}; ${fe.field} ignored`);
      }

      let outcome: ReconcileOutcome;
      try {
        outcome = await this.reconciler.reconcile(parsed.task, opts.direction, { file, vault: opts.vault });
      } catch (e) {
        report.errors.push({ line: index, stage: 'reconcile', error: message(e) });
        this.logger.error(`line ${index + 1}: store operation failed`, message(e));
        continue;
      }

      switch (outcome.kind) {
        case 'unchanged':
          push({ kind: 'noop', line: index, uuid: parsed.task.uuid, detail: 'in sync' });
          break;
        case 'missing':
          push({ kind: 'missing', line: index, uuid: outcome.uuid, detail: 'not in store' });
          break;
        case 'store-updated':
          push({
            kind: 'update',
            line: index,
            uuid: parsed.task.uuid,
            detail: outcome.diffs.map((d) => d.field).join(','),
          });
          break;
        case 'store-created':
          updates.push({ line: index, text: renderTask(outcome.task) });
          push({ kind: 'create', line: index, uuid: outcome.uuid, detail: outcome.task.description });
          break;
        case 'text-updated': {
          const text = renderTask(outcome.task);
          if (text === line.trim()) {
            push({ kind: 'noop', line: index, uuid: parsed.task.uuid, detail: 'text already canonical' });
            break;
          }
          updates.push({ line: index, text });
          push({
            kind: 'rewrite',
            line: index,
            uuid: parsed.task.uuid,
            detail: outcome.diffs.map((d) => d.field).join(','),
          });
          break;
        }
      }
    }

    if (updates.length) {
      try {
        await applyLineUpdates(file, updates, lines);
      } catch (e) {
        report.errors.push({ stage: 'patch', error: message(e) });
        this.logger.error(`cannot rewrite ${file}`, message(e));
      }
    }

    return report;
  }

  /** Files are processed one after another. */
  async syncMany(files: string[], opts: SyncOptions): Promise<SyncReport> {
    const started = Date.now();
    const reports: FileReport[] = [];
    const counts = emptyCounts();

    for (const file of files) {
      const report = await this.syncFile(file, opts);
      reports.push(report);
      for (const kind of LINE_ACTION_KINDS) counts[kind] += report.counts[kind];
    }

    const failedFiles = reports.filter((r) => r.errors.length > 0).length;
    return {
      direction: opts.direction,
      files: reports,
      counts,
      failedFiles,
      ok: failedFiles === 0,
      durationMs: Date.now() - started,
    };
  }
}
