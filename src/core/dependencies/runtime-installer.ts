/**
 * Dependency Installer: version manager activation and the JDK.
 */

import semver from 'semver';
import type { SetupContext, SystemFacts } from '../../types/index.js';
import { VERSION_MANAGER_BINARY } from '../../constants/index.js';
import { resolveExecutable } from '../../utils/exec.js';
import { CriticalTaskError, MissingCommandError } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';
import { reportInfo, reportSuccess, reportWarning } from '../setup-context.js';
import { runCommandTask } from '../tasks/task-runner.js';
import { ensureLinePresent } from '../text/text-mutator.js';

type VersionManagerFacts = Pick<SystemFacts, 'shellProfilePath' | 'versionManagerShell'>;

async function requireVersionManager(ctx: SetupContext, action: string): Promise<string> {
  const mise = await resolveExecutable(VERSION_MANAGER_BINARY, ctx.env);
  if (!mise) {
    throw new MissingCommandError(
      `'${VERSION_MANAGER_BINARY}' command not found. ${action} Ensure mise setup was successful.`,
      [VERSION_MANAGER_BINARY]
    );
  }
  logger.debug(`mise executable found at: ${mise}`);
  return mise;
}

/**
 * Add the activation line to the profile and check activation works in
 * this session. Returns the resolved mise path.
 */
export async function configureVersionManager(ctx: SetupContext, facts: VersionManagerFacts): Promise<string> {
  reportInfo(ctx, "Configuring 'mise'...");
  const mise = await requireVersionManager(ctx, 'Cannot configure mise environment.');

  const activateLine = `eval "$(${mise} activate ${facts.versionManagerShell})"`;
  logger.debug(`mise activation line to add/check in profile: ${activateLine}`);
  await ensureLinePresent(facts.shellProfilePath, activateLine);

  const activation = await ctx.exec.run(mise, ['activate', facts.versionManagerShell], { env: ctx.env });
  if (activation.code !== 0) {
    throw new CriticalTaskError('Failed to activate mise environment.', { code: activation.code, stderr: activation.stderr });
  }
  reportSuccess(ctx, 'mise environment configured and active for this session.');
  return mise;
}

/**
 * A version string mise can install, e.g. "openjdk-23.0.2" or "21.0.5".
 */
export function isRecognizableVersion(version: string): boolean {
  if (!/^[A-Za-z0-9][A-Za-z0-9._+-]*$/.test(version)) {
    return false;
  }
  return semver.coerce(version) !== null;
}

/** "java@openjdk" installs as "java@<version>" */
export function runtimeToolName(runtimeName: string): string {
  const [tool] = runtimeName.split('@');
  return tool;
}

/**
 * Ask mise for the newest version of the configured runtime. Falls back to
 * the configured known-good version when the answer is missing or garbled.
 */
export async function resolveRuntimeVersion(ctx: SetupContext, mise: string): Promise<string> {
  const { name, fallbackVersion } = ctx.config.runtime;
  logger.debug(`Determining latest recommended Java version using 'mise latest ${name}'...`);

  const latest = await ctx.exec.run(mise, ['latest', name], { env: ctx.env });
  const version = latest.stdout.trim().split('\n')[0].trim();

  if (latest.code !== 0 || !isRecognizableVersion(version)) {
    logger.debug(`mise latest exited ${latest.code} with output '${version}'`, { stderr: latest.stderr });
    reportWarning(ctx, `Failed to determine the latest Java version. Falling back to ${fallbackVersion}.`);
    return fallbackVersion;
  }

  reportInfo(ctx, `Latest recommended Java version: ${version}`);
  return version;
}

/**
 * Install the JDK through mise and make it the global default.
 */
export async function installRuntimeWithVersionManager(ctx: SetupContext): Promise<string> {
  reportInfo(ctx, 'Downloading Java...');
  const mise = await requireVersionManager(ctx, 'Cannot install Java.');

  const version = await resolveRuntimeVersion(ctx, mise);
  const toolVersion = `${runtimeToolName(ctx.config.runtime.name)}@${version}`;
  logger.debug(`Full tool@version string for mise: ${toolVersion}`);

  await runCommandTask(ctx, {
    label: `Installing Java ${version}`,
    critical: true,
    command: mise,
    args: ['install', toolVersion]
  });

  reportInfo(ctx, `Setting Java ${version} as the global default version...`);
  const use = await ctx.exec.run(mise, ['use', '--global', toolVersion], { env: ctx.env });
  logger.debug(`mise use --global ${toolVersion} exited ${use.code}`, { stdout: use.stdout, stderr: use.stderr });
  if (use.code !== 0) {
    throw new CriticalTaskError(`Failed to set Java ${version} as the global default. Check log: ${ctx.logFile}`, { code: use.code });
  }
  reportSuccess(ctx, `Successfully set Java ${version} as the global default.`);

  reportInfo(ctx, 'Verifying Java installation...');
  const check = await ctx.exec.run(mise, ['exec', '--', 'java', '-version'], { env: ctx.env });
  if (check.code === 0) {
    // java -version prints to stderr
    const banner = (check.stderr || check.stdout).split('\n')[0];
    logger.debug(`Java: ${banner}`);
    reportSuccess(ctx, "Java installation verified successfully using 'mise exec'.");
    reportSuccess(ctx, `Java ${version} is ready`);
  } else {
    reportWarning(ctx, `Java verification failed. Check log: ${ctx.logFile}`);
    ctx.output.message('You can try verifying manually after restarting your terminal by running: java -version');
  }

  return version;
}
