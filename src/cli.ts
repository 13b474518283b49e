import { loadEnvFiles } from './env.js';
import { buildProgram } from './program.js';

loadEnvFiles();

buildProgram()
  .parseAsync(process.argv)
  .catch((err) => {
    console.error(err instanceof Error ? err.message : String(err));
    process.exitCode = 1;
  });
