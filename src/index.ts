#!/usr/bin/env node

/**
 * riverspider-setup: prepares a Mac for the riverSpider assembler workflow
 * (package manager, tools, Java, the project bundle and the `riverspider`
 * shell command).
 */

import { realpathSync } from 'fs';
import { fileURLToPath } from 'url';
import { Command } from 'commander';
import { logger } from './utils/logger.js';
import { formatFatalMessage } from './utils/errors.js';
import { getVersion } from './utils/package.js';
import { setupSetupCommand } from './commands/setup.js';
import { setupLocateCommand } from './commands/locate.js';

const program = new Command();

program
  .name('riverspider-setup')
  .description('riverSpider macOS setup: tools, Java, project files and shell helpers')
  .version(getVersion())
  .configureHelp({ sortSubcommands: true });

setupSetupCommand(program);
setupLocateCommand(program);

function abort(message: string, detail: unknown): never {
  logger.error(message, { detail });
  console.error(formatFatalMessage(message, logger.getFile()));
  process.exit(1);
}

process.on('uncaughtException', error => abort(`Unexpected error: ${error.message}`, error.stack));
process.on('unhandledRejection', reason => abort('Unexpected error in a background operation.', reason));

export async function run(argv: string[] = process.argv): Promise<void> {
  await program.parseAsync(argv);
}

function invokedDirectly(): boolean {
  const entry = process.argv[1];
  if (!entry) return false;
  try {
    return realpathSync(entry) === fileURLToPath(import.meta.url);
  } catch {
    return false;
  }
}

if (invokedDirectly()) {
  run().catch((error: unknown) => {
    abort(error instanceof Error ? error.message : String(error), error);
  });
}

export { program };
