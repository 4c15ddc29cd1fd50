#!/usr/bin/env node
import { scanCommand } from './cli/commands/scan.js';
import { reportFatal } from './cli/logger.js';
import { EXIT_CODES } from './gap/index.js';

async function main() {
  // exitCode instead of exit() so piped output is flushed first
  process.exitCode = await scanCommand(process.argv.slice(2));
}

main().catch((err: unknown) => {
  reportFatal(err);
  process.exitCode = EXIT_CODES.ioError;
});
