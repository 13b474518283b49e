import { isValid, parse } from 'date-fns';
import type { CalendarDate, DateField, Priority, TaskRecord } from '../model.js';
import { GraphemeCursor } from './graphemes.js';
import { isMarker, markerFor } from './markers.js';

/** Graphemes consumed after a date marker: a separating space plus `YYYY-MM-DD`. */
const DATE_PAYLOAD_LENGTH = 11;

const DATE_SHAPE = /^\d{4}-\d{2}-\d{2}$/;

export type MetadataEvent =
  | { kind: 'date'; field: DateField; date: CalendarDate }
  | { kind: 'priority'; priority: Priority }
  | { kind: 'project'; project: string }
  | { kind: 'error'; field: DateField; input: string; message: string };

export interface FieldError {
  field: DateField | 'uuid';
  input: string;
  message: string;
}

export function parseCalendarDate(input: string): CalendarDate | undefined {
  if (!DATE_SHAPE.test(input)) return undefined;
  const parsed = parse(input, 'yyyy-MM-dd', new Date(0));
  return isValid(parsed) ? input : undefined;
}

/**
 * Lazily scan a metadata run. Each call starts a fresh pass over `run`.
 *
 * Date markers take exactly the next 11 graphemes whether or not they hold a
 * valid date; a bad payload yields an `error` event and scanning resumes after
 * it. The project marker captures everything up to the next known marker, so
 * unrelated emoji inside a project name are kept. Anything else is skipped.
 */
export function* metadataEvents(run: string): Generator<MetadataEvent, void, undefined> {
  const cursor = new GraphemeCursor(run);

  for (let grapheme = cursor.advance(); grapheme !== undefined; grapheme = cursor.advance()) {
    const marker = markerFor(grapheme);
    if (!marker) continue;

    switch (marker.kind) {
      case 'date': {
        const input = cursor.take(DATE_PAYLOAD_LENGTH).join('').trim();
        const date = parseCalendarDate(input);
        if (date) {
          yield { kind: 'date', field: marker.field, date };
        } else {
          yield { kind: 'error', field: marker.field, input, message: `Invalid ${marker.field} date: "${input}"` };
        }
        break;
      }
      case 'priority':
        yield { kind: 'priority', priority: marker.priority };
        break;
      case 'project': {
        let project = '';
        for (let next = cursor.peek(); next !== undefined && !isMarker(next); next = cursor.peek()) {
          project += next;
          cursor.advance();
        }
        project = project.trim();
        if (project) yield { kind: 'project', project };
        break;
      }
      case 'reserved':
        break;
    }
  }
}

/** Apply events in source order (later wins). Returns the rejected fields. */
export function applyMetadata(task: TaskRecord, events: Iterable<MetadataEvent>): FieldError[] {
  const errors: FieldError[] = [];
  for (const event of events) {
    switch (event.kind) {
      case 'date':
        task[event.field] = event.date;
        break;
      case 'priority':
        task.priority = event.priority;
        break;
      case 'project':
        task.project = event.project;
        break;
      case 'error':
        errors.push({ field: event.field, input: event.input, message: event.message });
        break;
    }
  }
  return errors;
}
