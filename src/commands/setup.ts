import { Command, Option } from 'commander';
import { homedir } from 'os';

import { CommandResult, LogLevel } from '../types/index.js';
import { withErrorHandling } from '../utils/errors.js';
import { configureLogger, logger } from '../utils/logger.js';
import { ConfigManager, getConfigDirectory } from '../core/config.js';
import { buildLogFilePath } from '../core/setup-context.js';
import { runSetup, type SetupRunResult } from '../core/setup/setup-pipeline.js';
import { createCliSetupContext } from '../cli/context.js';

interface SetupCommandOptions {
  verbose?: boolean;
  quiet?: boolean;
}

async function setupCommand(options: SetupCommandOptions = {}): Promise<CommandResult<SetupRunResult>> {
  const startedAt = new Date();
  const logFile = buildLogFilePath(startedAt);
  const verbose = Boolean(options.verbose) || process.env.RIVERSPIDER_VERBOSE === '1';

  configureLogger({
    file: logFile,
    level: verbose ? LogLevel.DEBUG : LogLevel.ERROR,
    console: Boolean(options.verbose)
  });

  const config = await new ConfigManager(getConfigDirectory(homedir(), process.env)).load();
  const ctx = createCliSetupContext({ config, logFile, verbose: options.verbose, quiet: options.quiet });

  const result = await runSetup(ctx, { startedAt });
  logger.info(`Setup finished with ${result.warnings.length} warning(s)`);
  return { success: true, data: result, warnings: result.warnings };
}

export function setupSetupCommand(program: Command): void {
  program
    .command('setup', { isDefault: true })
    .description('Install the toolchain and configure the riverSpider project (default)')
    .addOption(new Option('-v, --verbose', 'show detailed progress').conflicts('quiet'))
    .addOption(new Option('-q, --quiet', 'show only warnings and errors').conflicts('verbose'))
    .action(withErrorHandling(async (options: SetupCommandOptions) => {
      await setupCommand(options);
    }));
}
