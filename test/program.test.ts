import { describe, expect, it } from 'vitest';
import { buildProgram } from '../src/program.js';

function quietProgram() {
  return buildProgram((program) => program.exitOverride().configureOutput({ writeOut: () => {}, writeErr: () => {} }));
}

describe('buildProgram', () => {
  it('offers both sync directions and doctor', () => {
    expect(quietProgram().commands.map((c) => c.name())).toEqual(['text-to-store', 'store-to-text', 'doctor']);
  });

  it('rejects an unknown report format before syncing', async () => {
    await expect(
      quietProgram().parseAsync(['node', 'taskline', 'text-to-store', '--file', 'notes.md', '--format', 'xml']),
    ).rejects.toMatchObject({ code: 'commander.invalidArgument' });
  });
});
