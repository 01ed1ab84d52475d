/**
 * Config Projector
 *
 * Writes the resolved project location into the places that need it: the
 * shell profile (an exported variable and the helper functions) and the
 * submit script (absolute paths in place of the shipped relative ones).
 */

import { join } from 'path';
import type { PatchRule, SetupContext, SystemFacts, TargetDirectoryHandle } from '../../types/index.js';
import { FILE_PATTERNS, PROJECT_DIR_VARIABLE, SHELL_FUNCTIONS, SUBMIT_SCRIPT_PATHS } from '../../constants/index.js';
import { ensureFileWritable, isDirectory } from '../../utils/fs.js';
import { FileSystemError, ValidationError } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';
import { reportInfo, reportSuccess, reportWarning } from '../setup-context.js';
import {
  ensureBlockPresent,
  fileHasLineStartingWith,
  replaceExactLine,
  replaceOrAppendPattern,
  type EnsureLineStatus,
  type ExactReplaceResult,
  type PatternReplaceStatus
} from '../text/text-mutator.js';
import { buildProfileInjection } from './shell-functions.js';

type ProfileFacts = Pick<SystemFacts, 'shellProfilePath'>;

export interface PatchOutcome {
  rule: PatchRule;
  result: ExactReplaceResult;
}

export type InjectionStatus = EnsureLineStatus | 'failed';

async function requireProjectDirectory(handle: TargetDirectoryHandle): Promise<void> {
  if (!(await isDirectory(handle.path))) {
    throw new ValidationError(`${PROJECT_DIR_VARIABLE} path '${handle.path}' is not a valid directory.`, { path: handle.path });
  }
}

export function projectDirExportLine(dir: string): string {
  return `export ${PROJECT_DIR_VARIABLE}="${dir}"`;
}

/**
 * Export RIVER_SPIDER_DIR for this run and pin it in the profile, replacing
 * whatever earlier location the profile recorded. A failed profile write is
 * a warning with the line to add by hand.
 */
export async function setProjectDirVariable(
  ctx: SetupContext,
  facts: ProfileFacts,
  handle: TargetDirectoryHandle
): Promise<PatternReplaceStatus | null> {
  await requireProjectDirectory(handle);
  await ensureFileWritable(facts.shellProfilePath, 'Shell profile');

  ctx.env[PROJECT_DIR_VARIABLE] = handle.path;
  logger.debug(`Exported ${PROJECT_DIR_VARIABLE}='${handle.path}' for the current session.`);

  const line = projectDirExportLine(handle.path);
  logger.debug(`Ensuring shell profile (${facts.shellProfilePath}) contains line: ${line}`);
  try {
    const status = await replaceOrAppendPattern(facts.shellProfilePath, `export ${PROJECT_DIR_VARIABLE}=`, line);
    logger.debug(`${PROJECT_DIR_VARIABLE} profile line: ${status}`);
    return status;
  } catch (error) {
    if (!(error instanceof FileSystemError)) throw error;
    logger.debug(error.message, { details: error.details });
    reportWarning(ctx, `Could not add ${PROJECT_DIR_VARIABLE} to ${facts.shellProfilePath}. Add manually: ${line}`);
    return null;
  }
}

/**
 * One rule per relative path declaration in the submit script.
 */
export function buildPatchRules(dir: string): PatchRule[] {
  return SUBMIT_SCRIPT_PATHS.map(({ key, file, description }) => ({
    oldLine: `${key}=${file}`,
    newLine: `${key}="${join(dir, file)}"`,
    description
  }));
}

/**
 * Apply every patch rule to the submit script. Rules are independent: one
 * missing line does not stop the others.
 */
export async function absolutizeScriptPaths(ctx: SetupContext, handle: TargetDirectoryHandle): Promise<PatchOutcome[]> {
  await requireProjectDirectory(handle);
  const script = join(handle.path, FILE_PATTERNS.SUBMIT_SCRIPT);
  await ensureFileWritable(script, FILE_PATTERNS.SUBMIT_SCRIPT);

  reportInfo(ctx, `Updating paths in the riverSpider submit script...`);
  const outcomes: PatchOutcome[] = [];

  for (const rule of buildPatchRules(handle.path)) {
    const result = await replaceExactLine(script, rule.oldLine, rule.newLine);
    switch (result.status) {
      case 'already-set':
        reportSuccess(ctx, `${rule.description} path appears to be already correctly set in ${FILE_PATTERNS.SUBMIT_SCRIPT}.`);
        break;
      case 'replaced':
        reportSuccess(ctx, `Updated path for '${rule.description}' in ${FILE_PATTERNS.SUBMIT_SCRIPT}.`);
        break;
      case 'skipped':
        reportWarning(ctx, `Could not find '${rule.description}' in '${FILE_PATTERNS.SUBMIT_SCRIPT}'`);
        break;
      case 'failed':
        logger.debug(`Patch '${rule.description}' failed: ${result.reason ?? 'unknown'}`);
        reportWarning(ctx, `Couldn't update path for '${rule.description}' in ${FILE_PATTERNS.SUBMIT_SCRIPT}.`);
        break;
    }
    outcomes.push({ rule, result });
  }

  return outcomes;
}

/**
 * Install the helper function block into the profile once.
 */
export async function injectShellFunctions(ctx: SetupContext, facts: ProfileFacts): Promise<InjectionStatus> {
  const profile = facts.shellProfilePath;
  const injection = buildProfileInjection(ctx.config.profiles);
  const name = SHELL_FUNCTIONS.PRIMARY;

  reportInfo(ctx, 'Setting up River Spider helper function...');
  const status = await ensureBlockPresent(profile, injection.marker, injection.block);
  if (status === 'present') {
    reportSuccess(ctx, `'${name}' helper function already in shell profile`);
    return status;
  }

  if (await fileHasLineStartingWith(profile, injection.marker)) {
    reportSuccess(ctx, `Added '${name}' helper function to shell profile`);
    logger.debug(`Confirmed '${name}' helper function exists in ${profile}.`);
    return status;
  }

  reportWarning(
    ctx,
    `Failed to add '${name}' helper function. Copy the block from the log file into ${profile} manually.`
  );
  logger.debug(`Helper function block:\n${injection.block}`);
  return 'failed';
}
