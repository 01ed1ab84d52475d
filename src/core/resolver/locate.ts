/**
 * Project directory search.
 *
 * The installer, the `locate` command and the generated shell helper all
 * find the project the same way: every marker file under the home
 * directory, reduced to its parent directory, keeping the first parent
 * whose basename is the project directory name.
 */

import { DIR_PATTERNS, FILE_PATTERNS, SEARCH_TOOL_BINARY } from '../../constants/index.js';
import type { SetupContext } from '../../types/index.js';
import { resolveExecutable } from '../../utils/exec.js';
import { isDirectory } from '../../utils/fs.js';
import { MissingCommandError } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';
import { runCommandTask } from '../tasks/task-runner.js';

export interface SearchTarget {
  marker: string;
  dirName: string;
}

export const PROJECT_SEARCH: SearchTarget = {
  marker: FILE_PATTERNS.SUBMIT_SCRIPT,
  dirName: DIR_PATTERNS.PROJECT
};

/** Arguments for the search tool, rooted at `root` */
export function searchArgs(root: string, target: SearchTarget = PROJECT_SEARCH): string[] {
  return ['--type', 'f', target.marker, root, '--exec', 'dirname', '{}', ';'];
}

/**
 * The same search as a shell pipeline, for code that runs in the user's
 * shell. `rootExpression` is inserted verbatim inside double quotes.
 */
export function renderSearchCommand(rootExpression: string = '$HOME', target: SearchTarget = PROJECT_SEARCH): string {
  return (
    `${SEARCH_TOOL_BINARY} --type f ${target.marker} "${rootExpression}" --exec dirname {} \\; ` +
    `| grep "/${target.dirName}$" | head -n 1`
  );
}

/** Candidate directories from the search output, in output order */
export function pickProjectDirectories(stdout: string, dirName: string = PROJECT_SEARCH.dirName): string[] {
  return stdout
    .split('\n')
    .map(line => line.trim())
    .filter(line => line.endsWith(`/${dirName}`));
}

export interface LocateOptions {
  /** Run the search as a progress task (spinner, outcome message) */
  asTask?: boolean;
}

/**
 * Search the home directory for the project. Returns the first candidate
 * that is a directory, or null.
 */
export async function locateProjectDirectory(ctx: SetupContext, options: LocateOptions = {}): Promise<string | null> {
  const fd = await resolveExecutable(SEARCH_TOOL_BINARY, ctx.env);
  if (!fd) {
    throw new MissingCommandError(
      `'${SEARCH_TOOL_BINARY}' command not found. Cannot search for '${PROJECT_SEARCH.dirName}' directory. Ensure '${SEARCH_TOOL_BINARY}' is installed.`,
      [SEARCH_TOOL_BINARY]
    );
  }

  logger.debug(`Searching within '${ctx.home}' for a directory named '${PROJECT_SEARCH.dirName}' containing '${PROJECT_SEARCH.marker}'...`);
  const args = searchArgs(ctx.home);

  let stdout: string;
  if (options.asTask) {
    const outcome = await runCommandTask(ctx, {
      label: `Searching for '${PROJECT_SEARCH.dirName}' directory`,
      critical: false,
      command: fd,
      args
    });
    stdout = outcome.result?.stdout ?? '';
  } else {
    const result = await ctx.exec.run(fd, args, { env: ctx.env });
    if (result.code !== 0) {
      logger.debug(`Search exited with ${result.code}`, { stderr: result.stderr });
    }
    stdout = result.stdout;
  }

  for (const candidate of pickProjectDirectories(stdout)) {
    if (await isDirectory(candidate)) {
      logger.debug(`Search candidate accepted: ${candidate}`);
      return candidate;
    }
    logger.debug(`Search candidate is not a directory: ${candidate}`);
  }
  return null;
}
