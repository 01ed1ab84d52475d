/**
 * Idempotent Text Mutator
 *
 * Line-oriented edits of shell profiles and scripts. Every operation checks
 * the current content first and only writes when the desired state is not
 * already there, so any number of re-runs converges on the same bytes.
 *
 * Matching is literal: a "line" is the text between newline characters and
 * patterns are fixed prefixes, never regular expressions.
 */

import { ensureFileWritable, readTextFile, writeTextFile, appendTextFile } from '../../utils/fs.js';
import { logger } from '../../utils/logger.js';

export type EnsureLineStatus = 'present' | 'added';

export type PatternReplaceStatus = 'unchanged' | 'replaced' | 'appended';

export type ExactReplaceStatus = 'already-set' | 'replaced' | 'skipped' | 'failed';

export interface ExactReplaceResult {
  status: ExactReplaceStatus;
  /** Why the edit was skipped or failed */
  reason?: string;
}

function splitLines(content: string): string[] {
  return content.split('\n');
}

/** Text appended for a new line: a blank line before and after it */
function framedLine(line: string): string {
  return `\n${line}\n\n`;
}

export function contentHasLine(content: string, line: string): boolean {
  return splitLines(content).includes(line);
}

export async function fileContainsLine(file: string, line: string): Promise<boolean> {
  return contentHasLine(await readTextFile(file), line);
}

export async function fileHasLineStartingWith(file: string, prefix: string): Promise<boolean> {
  return splitLines(await readTextFile(file)).some(existing => existing.startsWith(prefix));
}

/**
 * Ensure `line` appears in `file` as a whole line.
 *
 * Throws FileSystemError when the file cannot be created or made writable.
 */
export async function ensureLinePresent(file: string, line: string): Promise<EnsureLineStatus> {
  await ensureFileWritable(file);

  if (await fileContainsLine(file, line)) {
    logger.debug(`${line} - already exists in ${file}`);
    return 'present';
  }

  logger.debug(`Adding line to ${file}: ${line}`);
  await appendTextFile(file, framedLine(line));
  return 'added';
}

/**
 * Append a multi-line `block` unless some line already starts with
 * `marker`. The block is written as-is followed by one blank line.
 */
export async function ensureBlockPresent(file: string, marker: string, block: string): Promise<EnsureLineStatus> {
  await ensureFileWritable(file);

  if (await fileHasLineStartingWith(file, marker)) {
    logger.debug(`Block marked '${marker}' already present in ${file}`);
    return 'present';
  }

  logger.debug(`Adding block marked '${marker}' to ${file}`);
  const body = block.endsWith('\n') ? block : `${block}\n`;
  await appendTextFile(file, `${body}\n`);
  return 'added';
}

/**
 * Converge `file` on exactly one line beginning with `prefix`, equal to `newLine`.
 *
 * - `newLine` already present: nothing to do.
 * - A line starts with `prefix`: the first such line becomes `newLine`; any
 *   later lines with the same prefix are dropped.
 * - Otherwise `newLine` is appended.
 */
export async function replaceOrAppendPattern(file: string, prefix: string, newLine: string): Promise<PatternReplaceStatus> {
  await ensureFileWritable(file);
  const content = await readTextFile(file);

  if (contentHasLine(content, newLine)) {
    logger.debug(`${newLine} - already set in ${file}`);
    return 'unchanged';
  }

  const lines = splitLines(content);
  const firstMatch = lines.findIndex(existing => existing.startsWith(prefix));
  if (firstMatch === -1) {
    logger.debug(`No line starting with '${prefix}' in ${file}; appending`);
    await appendTextFile(file, framedLine(newLine));
    return 'appended';
  }

  const updated = lines
    .map((existing, index) => (index === firstMatch ? newLine : existing))
    .filter((existing, index) => index <= firstMatch || !existing.startsWith(prefix));
  await writeTextFile(file, updated.join('\n'));
  logger.debug(`Replaced line starting with '${prefix}' in ${file}`);
  return 'replaced';
}

/**
 * Swap the whole line `oldLine` for `newLine`.
 *
 * Never throws for content reasons: a missing `oldLine` (hand-edited or
 * already migrated file) yields 'skipped', and a write or verification
 * problem yields 'failed'. The caller decides how loudly to report either.
 */
export async function replaceExactLine(file: string, oldLine: string, newLine: string): Promise<ExactReplaceResult> {
  logger.debug(`Attempting to update ${file}`);
  logger.debug(`  Old line expected: '${oldLine}'`);
  logger.debug(`  New line content: '${newLine}'`);

  let content: string;
  try {
    content = await readTextFile(file);
  } catch (error) {
    logger.debug(`Could not read ${file}`, { error });
    return { status: 'failed', reason: `cannot read ${file}` };
  }

  if (contentHasLine(content, newLine)) {
    return { status: 'already-set' };
  }

  if (!contentHasLine(content, oldLine)) {
    return { status: 'skipped', reason: 'pattern not found' };
  }

  const updated = splitLines(content).map(existing => (existing === oldLine ? newLine : existing));
  try {
    await writeTextFile(file, updated.join('\n'));
  } catch (error) {
    logger.debug(`Could not write ${file}`, { error });
    return { status: 'failed', reason: `cannot write ${file}` };
  }

  let verified = false;
  try {
    verified = await fileContainsLine(file, newLine);
  } catch (error) {
    logger.debug(`Could not re-read ${file}`, { error });
  }
  if (!verified) {
    return { status: 'failed', reason: 'new line not present after update' };
  }

  return { status: 'replaced' };
}
