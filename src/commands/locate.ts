import { Command } from 'commander';
import { devNull, homedir } from 'os';

import { ResolutionExhaustedError, withErrorHandling } from '../utils/errors.js';
import { ConfigManager, getConfigDirectory } from '../core/config.js';
import { createSetupContext } from '../core/setup-context.js';
import { DIR_PATTERNS } from '../constants/index.js';
import { locateProjectDirectory } from '../core/resolver/locate.js';

/**
 * Print the project directory the shell helper would use. No log file and
 * no changes: this only searches.
 */
async function locateCommand(): Promise<string> {
  const home = homedir();
  const config = await new ConfigManager(getConfigDirectory(home, process.env)).load();
  const ctx = createSetupContext({ config, home, logFile: devNull });

  const found = await locateProjectDirectory(ctx);
  if (!found) {
    throw new ResolutionExhaustedError(
      1,
      `Could not locate the ${DIR_PATTERNS.PROJECT} directory. See Canvas for download instructions.`
    );
  }
  console.log(found);
  return found;
}

export function setupLocateCommand(program: Command): void {
  program
    .command('locate')
    .description(`Print the location of the ${DIR_PATTERNS.PROJECT} project directory`)
    .action(withErrorHandling(async () => {
      await locateCommand();
    }));
}
