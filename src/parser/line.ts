import { z } from 'zod';
import { createTaskRecord, type TaskRecord, type TaskStatus } from '../model.js';
import { splitGraphemes } from './graphemes.js';
import { isMarker } from './markers.js';
import { applyMetadata, metadataEvents, type FieldError } from './metadata.js';

const PREAMBLE = /^\s*- \[([ xX-])\] (.*)$/;

const STATUS_BY_MARKER: Record<string, TaskStatus> = {
  ' ': 'pending',
  x: 'complete',
  X: 'complete',
  '-': 'canceled',
};

/** `[[id: <uuid>|<glyph>]]`; the older `uuid:` prefix is read as well. */
const ANCHOR = /\[\[(?:id|uuid): ([^|\]]*)\|[^\]]*\]\]/;

const UuidSchema = z.string().uuid();

export interface ParsedLine {
  task: TaskRecord;
  /** Fields dropped because their text could not be parsed. */
  errors: FieldError[];
}

export function splitPreamble(line: string): { status: TaskStatus; remainder: string } | undefined {
  const match = PREAMBLE.exec(line);
  if (!match) return undefined;
  const status = STATUS_BY_MARKER[match[1] ?? ''];
  if (!status) return undefined;
  return { status, remainder: match[2] ?? '' };
}

/**
 * Remove the identifier anchor. The anchor text is removed even when the
 * identifier inside it is malformed.
 */
export function extractAnchor(text: string): { text: string; uuid?: string; error?: FieldError } {
  const match = ANCHOR.exec(text);
  if (!match) return { text };

  const rest = (text.slice(0, match.index) + text.slice(match.index + match[0].length)).trim();
  const raw = (match[1] ?? '').trim();
  const parsed = UuidSchema.safeParse(raw);
  if (!parsed.success) {
    return { text: rest, error: { field: 'uuid', input: raw, message: `Invalid task identifier: "${raw}"` } };
  }
  return { text: rest, uuid: parsed.data.toLowerCase() };
}

/** Split at the first metadata marker: description (with tags) before, metadata run after. */
export function splitDescription(text: string): { description: string; metadata: string } {
  const graphemes = splitGraphemes(text);
  const at = graphemes.findIndex(isMarker);
  if (at === -1) return { description: text.trim(), metadata: '' };
  return {
    description: graphemes.slice(0, at).join('').trim(),
    metadata: graphemes.slice(at).join('').trim(),
  };
}

/** `#tag` and `#parent/child` tokens; every path segment is its own tag. */
export function extractTags(description: string): string[] {
  const graphemes = splitGraphemes(description);
  const tags: string[] = [];

  graphemes.forEach((grapheme, i) => {
    if (grapheme !== '#') return;
    let run = '';
    for (let j = i + 1; j < graphemes.length; j++) {
      const next = graphemes[j] ?? '';
      if (/^\s+$/.test(next)) break;
      run += next;
    }
    for (const segment of run.split('/')) {
      if (segment && !tags.includes(segment)) tags.push(segment);
    }
  });

  return tags;
}

export function parseLineDetailed(line: string): ParsedLine | undefined {
  const preamble = splitPreamble(line);
  if (!preamble) return undefined;

  const anchor = extractAnchor(preamble.remainder);
  const { description, metadata } = splitDescription(anchor.text);
  if (!description) return undefined;

  const task = createTaskRecord({
    status: preamble.status,
    description,
    tags: extractTags(description),
    uuid: anchor.uuid,
  });

  const errors = anchor.error ? [anchor.error] : [];
  if (metadata) errors.push(...applyMetadata(task, metadataEvents(metadata)));

  return { task, errors };
}

/** One line of text to a task record, or `undefined` if the line is not a task. */
export function parseLine(line: string): TaskRecord | undefined {
  return parseLineDetailed(line)?.task;
}
