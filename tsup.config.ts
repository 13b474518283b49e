import { defineConfig } from 'tsup';
import { readFileSync, writeFileSync } from 'node:fs';

export default defineConfig({
  entry: ['src/cli.ts', 'src/index.ts'],
  format: ['esm'],
  platform: 'node',
  target: 'node20',
  sourcemap: true,
  clean: true,
  dts: { entry: 'src/index.ts' },
  splitting: true,
  async onSuccess() {
    // Shebang on the CLI entry only
    const cliPath = 'dist/cli.js';
    const content = readFileSync(cliPath, 'utf8');
    if (!content.startsWith('#!')) {
      writeFileSync(cliPath, '#!/usr/bin/env node\n' + content);
    }
  },
});
