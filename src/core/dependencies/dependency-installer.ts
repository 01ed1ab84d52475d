/**
 * Dependency Installer: package manager and packages.
 *
 * Every step checks first and only acts when something is missing, so a
 * second run on a provisioned machine changes nothing.
 */

import type { SetupContext, SystemFacts, ToolchainState } from '../../types/index.js';
import { PACKAGE_MANAGER } from '../../constants/index.js';
import { resolveExecutable } from '../../utils/exec.js';
import { isExecutable } from '../../utils/fs.js';
import { CriticalTaskError, MissingCommandError } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';
import { reportInfo, reportSuccess } from '../setup-context.js';
import { runCommandTask } from '../tasks/task-runner.js';
import { ensureLinePresent } from '../text/text-mutator.js';
import { configureVersionManager, installRuntimeWithVersionManager } from './runtime-installer.js';

type PackageManagerFacts = Pick<SystemFacts, 'packageManagerPath' | 'shellProfilePath'>;

/**
 * Install the package manager at its fixed location when it is not there yet.
 */
export async function ensurePackageManager(ctx: SetupContext, facts: PackageManagerFacts): Promise<void> {
  reportInfo(ctx, `Checking for ${PACKAGE_MANAGER.NAME}...`);
  const brewPath = facts.packageManagerPath;

  if (await isExecutable(brewPath)) {
    reportSuccess(ctx, `${PACKAGE_MANAGER.NAME} already installed`);
    logger.debug(`Found ${PACKAGE_MANAGER.NAME} at ${brewPath}`);
    return;
  }

  reportInfo(ctx, `${PACKAGE_MANAGER.NAME} not found. Installing (password required)... Buckle in, this will take a while.`);
  const sudo = await ctx.exec.run('sudo', ['-v'], { env: ctx.env });
  if (sudo.code !== 0) {
    throw new CriticalTaskError(
      `Failed to obtain sudo privileges, which are required for ${PACKAGE_MANAGER.NAME} installation. ` +
        'Please run the script again and provide the password when prompted.',
      { code: sudo.code }
    );
  }

  logger.debug(`Starting ${PACKAGE_MANAGER.NAME} installer`);
  await runCommandTask(ctx, {
    label: `Installing ${PACKAGE_MANAGER.NAME}`,
    critical: true,
    command: '/bin/bash',
    args: ['-c', `/bin/bash -c "$(curl -fsSL ${PACKAGE_MANAGER.INSTALL_URL})"`],
    options: { env: { ...ctx.env, NONINTERACTIVE: '1' } }
  });

  reportInfo(ctx, `Verifying ${PACKAGE_MANAGER.NAME} installation...`);
  if (!(await isExecutable(brewPath))) {
    throw new CriticalTaskError(
      `Failed to install ${PACKAGE_MANAGER.NAME}. Ensure you have sudo privileges and try again.`,
      { brewPath }
    );
  }
  reportSuccess(ctx, `${PACKAGE_MANAGER.NAME} successfully installed at '${brewPath}'.`);
}

function expandShellValue(value: string, env: NodeJS.ProcessEnv): string {
  return value
    .replace(/\$\{(\w+)\+:\$\1\}/g, (_match, name: string) => (env[name] !== undefined ? `:${env[name]}` : ''))
    .replace(/\$\{(\w+):-\}/g, (_match, name: string) => env[name] ?? '')
    .replace(/\$(\w+)/g, (_match, name: string) => env[name] ?? '');
}

/**
 * Read the variable assignments out of `brew shellenv` output.
 *
 * Handles `export NAME="value";` and `NAME="value"; export NAME;` lines and
 * expands the `${NAME+:$NAME}` / `${NAME:-}` forms against `env`. Lines
 * that are not plain assignments (fpath, conditionals) are ignored.
 */
export function parseShellenv(output: string, env: NodeJS.ProcessEnv): Record<string, string> {
  const assignments: Record<string, string> = {};
  const assignment = /^(?:export\s+)?([A-Za-z_][A-Za-z0-9_]*)="([^"]*)";/;

  for (const rawLine of output.split('\n')) {
    const match = assignment.exec(rawLine.trim());
    if (!match) continue;
    const [, name, value] = match;
    assignments[name] = expandShellValue(value, { ...env, ...assignments });
  }
  return assignments;
}

/**
 * Persist the package manager's shell environment in the profile and apply
 * it to this run, so `brew` and everything it installs resolve on PATH.
 */
export async function configurePackageManagerEnv(ctx: SetupContext, facts: PackageManagerFacts): Promise<string> {
  reportInfo(ctx, `Configuring shell environment for ${PACKAGE_MANAGER.NAME}...`);
  const brewPath = facts.packageManagerPath;

  if (!(await isExecutable(brewPath))) {
    throw new MissingCommandError(
      `${PACKAGE_MANAGER.NAME} executable not found at '${brewPath}'. Cannot configure shell environment. Run installation step first.`,
      [PACKAGE_MANAGER.BINARY]
    );
  }

  const shellenvLine = `eval "$("${brewPath}" shellenv)"`;
  logger.debug(`${PACKAGE_MANAGER.NAME} shellenv line to add/check in profile: ${shellenvLine}`);
  await ensureLinePresent(facts.shellProfilePath, shellenvLine);

  logger.debug(`Activating ${PACKAGE_MANAGER.NAME} environment for the current session...`);
  const shellenv = await ctx.exec.run(brewPath, ['shellenv'], { env: ctx.env });
  if (shellenv.code !== 0) {
    throw new CriticalTaskError(
      `Failed to activate ${PACKAGE_MANAGER.NAME} environment in the current session using '${brewPath} shellenv'.`,
      { code: shellenv.code, stderr: shellenv.stderr }
    );
  }
  Object.assign(ctx.env, parseShellenv(shellenv.stdout, ctx.env));

  const resolved = await resolveExecutable(PACKAGE_MANAGER.BINARY, ctx.env);
  if (!resolved) {
    throw new MissingCommandError(
      `${PACKAGE_MANAGER.NAME} shell environment was configured in profile, but '${PACKAGE_MANAGER.BINARY}' is still not found in PATH. ` +
        `Check '${facts.shellProfilePath}' and restart your terminal.`,
      [PACKAGE_MANAGER.BINARY]
    );
  }
  logger.debug(`Verified '${PACKAGE_MANAGER.BINARY}' is now available in PATH: ${resolved}`);
  reportSuccess(ctx, `Found ${PACKAGE_MANAGER.NAME} at '${brewPath}'`);
  return resolved;
}

async function requirePackageManager(ctx: SetupContext, action: string): Promise<string> {
  const brew = await resolveExecutable(PACKAGE_MANAGER.BINARY, ctx.env);
  if (!brew) {
    throw new MissingCommandError(`'${PACKAGE_MANAGER.BINARY}' command not found. ${action}`, [PACKAGE_MANAGER.BINARY]);
  }
  return brew;
}

/**
 * Turn analytics off and refresh the package index. Neither failure stops
 * the run.
 */
export async function updatePackageManager(ctx: SetupContext): Promise<void> {
  reportInfo(ctx, `Updating ${PACKAGE_MANAGER.NAME} and applying configurations...`);
  const brew = await requirePackageManager(ctx, `Cannot update ${PACKAGE_MANAGER.NAME}. Ensure previous setup steps succeeded.`);
  reportSuccess(ctx, `${PACKAGE_MANAGER.NAME} is ready to brew`);

  const analytics = await ctx.exec.run(brew, ['analytics', 'off'], { env: ctx.env });
  if (analytics.code === 0) {
    logger.debug(`Disabled ${PACKAGE_MANAGER.NAME} analytics.`);
  } else {
    logger.debug(`Could not disable ${PACKAGE_MANAGER.NAME} analytics (exit ${analytics.code}). Continuing...`);
  }

  reportInfo(ctx, `Updating ${PACKAGE_MANAGER.NAME} package database (this may take a moment)...`);
  await runCommandTask(ctx, {
    label: `Updating ${PACKAGE_MANAGER.NAME}`,
    critical: false,
    command: brew,
    args: ['update']
  });
}

/**
 * Install each package that `brew list` does not report. Returns the names
 * that were missing and could not be installed.
 */
export async function ensurePackages(ctx: SetupContext, names: readonly string[] = ctx.config.packages): Promise<string[]> {
  reportInfo(ctx, 'Installing required packages...');
  const brew = await requirePackageManager(ctx, 'Cannot continue.');
  const failed: string[] = [];

  for (const name of names) {
    reportInfo(ctx, `Checking for package: ${name}`);
    const listed = await ctx.exec.run(brew, ['list', name], { env: ctx.env });
    if (listed.code === 0) {
      reportSuccess(ctx, `${name} is already installed`);
      continue;
    }

    reportInfo(ctx, `Installing ${name}...`);
    const outcome = await runCommandTask(ctx, {
      label: `Installing '${name}'`,
      critical: false,
      command: brew,
      args: ['install', name]
    });
    if (!outcome.ok) {
      failed.push(name);
    }
  }
  return failed;
}

/**
 * Every tool must resolve on PATH; all missing ones are reported at once.
 */
export async function verifyTools(ctx: SetupContext, names: readonly string[] = ctx.config.toolsToVerify): Promise<void> {
  reportInfo(ctx, 'Verifying packages installation...');
  const missing: string[] = [];

  for (const name of names) {
    logger.debug(`Verifying command: ${name}`);
    if (await resolveExecutable(name, ctx.env)) {
      reportSuccess(ctx, `${name} is available`);
    } else {
      missing.push(name);
    }
  }

  if (missing.length > 0) {
    throw new MissingCommandError(`Critical tool(s) '${missing.join(' ')}' are missing. Please install them.`, missing);
  }
}

/**
 * Phase 2 in full: package manager, packages, version manager, runtime.
 */
export async function installDependencies(ctx: SetupContext, facts: Readonly<SystemFacts>): Promise<ToolchainState> {
  await ensurePackageManager(ctx, facts);
  await configurePackageManagerEnv(ctx, facts);
  await updatePackageManager(ctx);
  await ensurePackages(ctx);
  await verifyTools(ctx);
  await configureVersionManager(ctx, facts);
  await installRuntimeWithVersionManager(ctx);

  return { packageManagerPath: facts.packageManagerPath, activated: true };
}
