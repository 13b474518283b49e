import type { DateField, Priority } from '../model.js';

export type MarkerKind =
  | { kind: 'date'; field: DateField }
  | { kind: 'priority'; priority: Exclude<Priority, 'normal'> }
  | { kind: 'project' }
  | { kind: 'reserved'; name: 'recurrence' | 'id' | 'blocked' };

const VARIATION_SELECTOR = /\uFE0F/g;

/**
 * The closed metadata glyph set, keyed by base glyph (emoji variation selector
 * removed). Input in either form matches the same entry.
 */
const MARKERS = new Map<string, MarkerKind>([
  ['📅', { kind: 'date', field: 'due' }],
  ['⏳', { kind: 'date', field: 'scheduled' }],
  ['🛫', { kind: 'date', field: 'start' }],
  ['➕', { kind: 'date', field: 'created' }],
  ['✅', { kind: 'date', field: 'done' }],
  ['❌', { kind: 'date', field: 'canceled' }],
  ['🔺', { kind: 'priority', priority: 'highest' }],
  ['⏫', { kind: 'priority', priority: 'high' }],
  ['🔼', { kind: 'priority', priority: 'medium' }],
  ['🔽', { kind: 'priority', priority: 'low' }],
  ['⏬', { kind: 'priority', priority: 'lowest' }],
  ['🔨', { kind: 'project' }],
  ['🔁', { kind: 'reserved', name: 'recurrence' }],
  ['🆔', { kind: 'reserved', name: 'id' }],
  ['⛔', { kind: 'reserved', name: 'blocked' }],
]);

export const DATE_GLYPHS: Record<DateField, string> = {
  due: '📅',
  scheduled: '⏳',
  start: '🛫',
  created: '➕',
  done: '✅',
  canceled: '❌',
};

export const PRIORITY_GLYPHS: Record<Exclude<Priority, 'normal'>, string> = {
  highest: '🔺',
  high: '⏫',
  medium: '🔼',
  low: '🔽',
  lowest: '⏬',
};

export const PROJECT_GLYPH = '🔨';

export const ANCHOR_GLYPH = '\u2694\uFE0F';

export function baseGlyph(grapheme: string): string {
  return grapheme.replace(VARIATION_SELECTOR, '');
}

export function markerFor(grapheme: string): MarkerKind | undefined {
  return MARKERS.get(baseGlyph(grapheme));
}

export function isMarker(grapheme: string): boolean {
  return MARKERS.has(baseGlyph(grapheme));
}
