#!/usr/bin/env node
import { createRequire } from 'node:module';
import { createProgram } from './program.js';

const require = createRequire(import.meta.url);

const pkg = require('../../package.json') as { version: string; description: string };

async function main(): Promise<void> {
  await createProgram(pkg).parseAsync(process.argv);
}

main().catch((err: unknown) => {
  const message = err instanceof Error ? err.message : String(err);
  process.stderr.write(`[microvec] Error: ${message}\n`);
  process.exit(1);
});
