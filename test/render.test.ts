import { describe, expect, it } from 'vitest';
import { createTaskRecord } from '../src/model.js';
import { parseLine } from '../src/parser/line.js';
import { ANCHOR_GLYPH } from '../src/parser/markers.js';
import { renderTask } from '../src/parser/render.js';

const UUID = '3f2c2b1e-9a4d-4c6b-8e1f-0a1b2c3d4e5f';

describe('renderTask', () => {
  it('writes a bare pending task', () => {
    expect(renderTask(createTaskRecord({ description: 'Hello' }))).toBe('- [ ] Hello');
  });

  it('writes fields in canonical order', () => {
    const task = createTaskRecord({
      uuid: UUID,
      status: 'complete',
      description: 'Make a 🥪 #food',
      tags: ['food'],
      project: 'Home',
      due: '2025-05-19',
      done: '2025-06-01',
      created: '2025-05-01',
      priority: 'lowest',
    });
    expect(renderTask(task)).toBe(
      `- [x] Make a 🥪 #food 🔨 Home 📅 2025-05-19 ➕ 2025-05-01 ✅ 2025-06-01 ⏬ [[id: ${UUID}|${ANCHOR_GLYPH}]]`,
    );
  });

  it('writes canceled tasks with a dash', () => {
    const task = createTaskRecord({ status: 'canceled', description: 'Dropped', canceled: '2025-05-19' });
    expect(renderTask(task)).toBe('- [-] Dropped ❌ 2025-05-19');
  });

  it('parses back to the same record', () => {
    const task = createTaskRecord({
      uuid: UUID,
      description: 'Plan trip 🙂 #travel/europe',
      tags: ['travel', 'europe'],
      project: 'Summer 🌞 plans',
      scheduled: '2025-06-07',
      start: '2025-06-01',
      priority: 'highest',
    });
    expect(parseLine(renderTask(task))).toEqual(task);
  });
});
