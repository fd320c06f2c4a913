#!/usr/bin/env node
import { createProgram, run } from './cli';
import { consoleLogger } from './logger';

async function main() {
  const program = createProgram(async (directory, options) => {
    process.exitCode = await run(directory, options);
  });

  await program.parseAsync(process.argv);
}

main().catch((error) => {
  consoleLogger.error(error instanceof Error ? error.message : String(error));
  process.exitCode = 1;
});
