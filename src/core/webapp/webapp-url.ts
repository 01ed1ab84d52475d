/**
 * Google Apps Script web-app URL capture.
 *
 * The deployment itself is manual; the installer shows the steps and saves
 * the URL the user pastes so the submit script can reach the web app.
 */

import { join } from 'path';
import type { SetupContext, TargetDirectoryHandle } from '../../types/index.js';
import { APP_SCRIPT_SETUP, FILE_PATTERNS, WEBAPP_URL_PATTERN } from '../../constants/index.js';
import { ensureFileWritable, writeTextFile } from '../../utils/fs.js';
import { UserCancellationError } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';
import { reportInfo, reportSuccess } from '../setup-context.js';

export type WebAppUrlOutcome =
  | { status: 'saved'; url: string; path: string }
  | { status: 'declined' }
  | { status: 'non-interactive' };

const INVALID_URL_HINT = 'It must match: https://script.google.com/macros/s/{ID}/exec';

/** Drop one pair of surrounding double quotes, as pasted from a JSON or shell snippet */
export function normalizeWebAppUrl(input: string): string {
  let url = input.trim();
  if (url.endsWith('"')) url = url.slice(0, -1);
  if (url.startsWith('"')) url = url.slice(1);
  return url;
}

export function isValidWebAppUrl(url: string): boolean {
  return WEBAPP_URL_PATTERN.test(url);
}

function isCancelAnswer(input: string): boolean {
  return /^[Qq]$/.test(input.trim());
}

export function renderSetupInstructions(): string {
  return [
    'Make a copy of:',
    '',
    `   shared/processor/${APP_SCRIPT_SETUP.SHEET_NAME}`,
    `   ${APP_SCRIPT_SETUP.DRIVE_FOLDER_URL}`,
    '',
    '   File > Make a Copy',
    '   Save it to: My Drive',
    '',
    "   Click: 'Make a Copy'",
    '',
    'In your copy:',
    '   Extensions > Apps Script',
    '   Deploy > New Deployment',
    '',
    '   Description:    River Spider Script',
    '   Execute as:     Me',
    '   Access:         Anyone',
    '',
    "   Click: 'Deploy'",
    '',
    'Authorize and allow access',
    '',
    "Copy the 'Web App URL'"
  ].join('\n');
}

async function showSetupInstructions(ctx: SetupContext): Promise<void> {
  ctx.output.note(renderSetupInstructions(), 'Manual setup of Google App Script');
  const opened = await ctx.exec.run('open', [APP_SCRIPT_SETUP.DRIVE_FOLDER_URL], { env: ctx.env });
  if (opened.code !== 0) {
    logger.debug(`Could not open ${APP_SCRIPT_SETUP.DRIVE_FOLDER_URL} (exit ${opened.code})`, { stderr: opened.stderr });
  }
}

/**
 * Ask until the answer is a web-app URL. `q` cancels the whole run.
 */
export async function promptForWebAppUrl(ctx: SetupContext): Promise<string> {
  for (;;) {
    const answer = await ctx.prompt.text("Paste the Web App URL (or 'q' to cancel)", {
      placeholder: 'https://script.google.com/macros/s/.../exec',
      validate: value =>
        isCancelAnswer(value) || isValidWebAppUrl(normalizeWebAppUrl(value)) ? undefined : INVALID_URL_HINT
    });

    if (isCancelAnswer(answer)) {
      throw new UserCancellationError('URL entry cancelled by user.');
    }

    const url = normalizeWebAppUrl(answer);
    if (isValidWebAppUrl(url)) {
      return url;
    }

    logger.warn(`Invalid Web App URL entered: ${url}`);
    ctx.output.warn('Invalid URL.');
    ctx.output.message(INVALID_URL_HINT);
  }
}

export async function saveWebAppUrl(dir: string, url: string): Promise<string> {
  const path = join(dir, FILE_PATTERNS.WEBAPP_URL);
  await ensureFileWritable(path, 'Web App url');
  await writeTextFile(path, `${url}\n`);
  return path;
}

/**
 * Offer the manual deployment steps and store the resulting URL.
 * Skipped when nobody can answer the prompts.
 */
export async function setupWebAppUrl(ctx: SetupContext, handle: TargetDirectoryHandle): Promise<WebAppUrlOutcome> {
  if (!ctx.prompt.interactive) {
    reportInfo(
      ctx,
      `Skipping Google Apps Script setup (non-interactive session). Save the Web App URL in ${join(handle.path, FILE_PATTERNS.WEBAPP_URL)}`
    );
    return { status: 'non-interactive' };
  }

  const wantsInstructions = await ctx.prompt.confirm('Would you like to view Google Apps Script setup instructions?', true);
  if (!wantsInstructions) {
    ctx.output.message('Setup instructions skipped.');
    logger.info('Google Apps Script setup instructions skipped');
    return { status: 'declined' };
  }

  await showSetupInstructions(ctx);
  const url = await promptForWebAppUrl(ctx);
  const path = await saveWebAppUrl(handle.path, url);
  reportSuccess(ctx, `Web App URL saved to: ${path}`);
  return { status: 'saved', url, path };
}
