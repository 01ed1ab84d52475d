/**
 * Setup pipeline: the three phases of a run plus the closing messages.
 *
 * Probe -> Dependency Installer -> Resource Directory Resolver -> Config
 * Projector -> web-app URL capture. Any fatal error propagates to the
 * command layer unchanged.
 */

import type { SetupContext, SystemFacts, TargetDirectoryHandle, ToolchainState } from '../../types/index.js';
import { FILE_PATTERNS, SHELL_FUNCTIONS } from '../../constants/index.js';
import { logger } from '../../utils/logger.js';
import { installDependencies } from '../dependencies/dependency-installer.js';
import { createProgressEvent } from '../ports/progress.js';
import { absolutizeScriptPaths, injectShellFunctions, setProjectDirVariable } from '../projector/config-projector.js';
import { probeSystem } from '../probe/environment-probe.js';
import { resolveProjectDirectory } from '../resolver/directory-resolver.js';
import { reportInfo, reportSuccess } from '../setup-context.js';
import { setupWebAppUrl, type WebAppUrlOutcome } from '../webapp/webapp-url.js';

const RULE = '─'.repeat(49);

export interface SetupRunOptions {
  startedAt?: Date;
}

export interface SetupRunResult {
  facts: Readonly<SystemFacts>;
  toolchain: ToolchainState;
  handle: TargetDirectoryHandle;
  webApp: WebAppUrlOutcome;
  warnings: string[];
}

async function runPhase<T>(ctx: SetupContext, phase: string, body: () => Promise<T>): Promise<T> {
  logger.info(`=== ${phase} ===`);
  ctx.progress.emit(createProgressEvent({ type: 'phase:start', phase }));
  const result = await body();
  ctx.progress.emit(createProgressEvent({ type: 'phase:complete', phase }));
  return result;
}

export function displayStartupMessage(ctx: SetupContext, startedAt: Date): void {
  logger.raw(RULE);
  logger.raw(`Setup started at ${startedAt.toString()}`);
  logger.raw(RULE);

  reportInfo(ctx, 'Starting riverSpider setup script');
  reportInfo(ctx, `Setup started at: ${startedAt.toString()}`);
  reportInfo(ctx, `Setup logfile:    ${ctx.logFile}`);
}

export function renderCompletionMessage(
  ctx: SetupContext,
  facts: Pick<SystemFacts, 'shellProfilePath'>,
  handle: TargetDirectoryHandle
): string {
  const warningLine =
    ctx.warnings.length > 0
      ? `${ctx.warnings.length} warning(s) were reported. Please look back at the 'Warning:' messages.`
      : "Please look back at any 'Warning:' messages just in case.";

  return [
    '---All automated setup steps finished.---',
    warningLine,
    '',
    '--- IMPORTANT NEXT STEPS ---',
    '1. Restart your Terminal:',
    '   (Alternatively, for your current terminal window only), you could run:',
    `      source ${facts.shellProfilePath}`,
    '',
    '2. Complete Manual Google App Script Setup:',
    "   If you haven't done it yet, follow the Google App Script setup instructions",
    '   and make sure to save the Web App URL in:',
    `      ${handle.path}/${FILE_PATTERNS.WEBAPP_URL}`,
    '',
    'After restarting your terminal and doing the Google App Script setup,',
    'you can use the new command like this:',
    `      ${SHELL_FUNCTIONS.PRIMARY} <your_file.${FILE_PATTERNS.ASSEMBLY_EXTENSION}>`,
    '(You can run this from any folder).',
    '',
    'Details about everything the script did were saved to:',
    `      ${ctx.logFile}`
  ].join('\n');
}

export function displayCompletionMessage(
  ctx: SetupContext,
  facts: Pick<SystemFacts, 'shellProfilePath'>,
  handle: TargetDirectoryHandle
): void {
  const message = renderCompletionMessage(ctx, facts, handle);
  logger.info(message);
  ctx.output.note(message, 'riverSpider Setup Complete');
  logger.info(`Script finished execution successfully at ${new Date().toString()}`);
}

/**
 * Phase 3: find or fetch the project, then point the profile and the
 * submit script at it.
 */
export async function configureProject(ctx: SetupContext, facts: Readonly<SystemFacts>): Promise<TargetDirectoryHandle> {
  const handle = await resolveProjectDirectory(ctx);
  await setProjectDirVariable(ctx, facts, handle);
  await absolutizeScriptPaths(ctx, handle);
  await injectShellFunctions(ctx, facts);
  return handle;
}

export async function runSetup(ctx: SetupContext, options: SetupRunOptions = {}): Promise<SetupRunResult> {
  displayStartupMessage(ctx, options.startedAt ?? new Date());

  const facts = await runPhase(ctx, 'PHASE 1: System Validation', () => probeSystem(ctx));
  reportSuccess(ctx, 'System validation complete.');

  const toolchain = await runPhase(ctx, 'PHASE 2: Dependency Installation', () => installDependencies(ctx, facts));
  reportSuccess(ctx, 'Dependency installation complete.');

  const handle = await runPhase(ctx, "PHASE 3: 'riverSpider' Setup", () => configureProject(ctx, facts));
  reportSuccess(ctx, "'riverSpider' configuration complete.");

  displayCompletionMessage(ctx, facts, handle);
  const webApp = await setupWebAppUrl(ctx, handle);

  return { facts, toolchain, handle, webApp, warnings: [...ctx.warnings] };
}
