import { DATE_FIELDS, type TaskRecord, type TaskStatus } from '../model.js';
import { ANCHOR_GLYPH, DATE_GLYPHS, PRIORITY_GLYPHS, PROJECT_GLYPH } from './markers.js';

const STATUS_MARKERS: Record<TaskStatus, string> = {
  pending: ' ',
  complete: 'x',
  canceled: '-',
};

/**
 * Canonical text for a task: checkbox, description, then project, dates,
 * priority and identifier anchor in that order.
 */
export function renderTask(task: TaskRecord): string {
  const parts = [`- [${STATUS_MARKERS[task.status]}] ${task.description}`];

  if (task.project) parts.push(`${PROJECT_GLYPH} ${task.project}`);
  for (const field of DATE_FIELDS) {
    const date = task[field];
    if (date) parts.push(`${DATE_GLYPHS[field]} ${date}`);
  }
  if (task.priority !== 'normal') parts.push(PRIORITY_GLYPHS[task.priority]);
  if (task.uuid) parts.push(`[[id: ${task.uuid}|${ANCHOR_GLYPH}]]`);

  return parts.join(' ');
}
