#!/usr/bin/env -S npx tsx
/**
 * Thin wrapper that launches the CLI without pulling in the package exports.
 */
import { runCli } from '../src/runner.js';

runCli(process.argv).catch((error: unknown) => {
  process.exitCode = 1;
  if (error instanceof Error && error.message) {
    console.error(error.message);
    return;
  }

  console.error(String(error));
});
