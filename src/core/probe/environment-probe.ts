/**
 * Environment Probe
 *
 * Establishes the facts every later step relies on: macOS, a known CPU
 * architecture, a reachable network and a supported shell with a writable
 * profile. Anything outside those bounds ends the run.
 */

import { basename, join } from 'path';
import type { CpuArch, SetupContext, ShellKind, SystemFacts } from '../../types/index.js';
import { PACKAGE_MANAGER, PING_TIMEOUT_SECONDS, REQUIRED_SYSTEM_COMMANDS } from '../../constants/index.js';
import { resolveExecutable } from '../../utils/exec.js';
import { ensureFileWritable } from '../../utils/fs.js';
import { MissingCommandError, NetworkUnavailableError, UnsupportedPlatformError } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';
import { reportInfo, reportSuccess } from '../setup-context.js';

export interface PlatformFacts {
  osVersion: string;
  cpuArch: CpuArch;
  chipLabel: string;
  packageManagerPath: string;
}

export interface ShellFacts {
  shellKind: ShellKind;
  shellProfilePath: string;
  versionManagerShell: ShellKind;
}

interface ArchitectureProfile {
  cpuArch: CpuArch;
  chipLabel: string;
  packageManagerPath: string;
}

const ARCHITECTURES: Record<string, ArchitectureProfile> = {
  arm64: { cpuArch: 'arm64', chipLabel: 'Apple Silicon', packageManagerPath: PACKAGE_MANAGER.ARM_PATH },
  x86_64: { cpuArch: 'x86_64', chipLabel: 'Intel Processor', packageManagerPath: PACKAGE_MANAGER.INTEL_PATH }
};
// Node's spelling of x86_64
ARCHITECTURES.x64 = ARCHITECTURES.x86_64;

/**
 * Verify the basic system commands are on PATH. All missing commands are
 * reported together.
 */
export async function checkRequiredCommands(
  ctx: SetupContext,
  names: readonly string[] = REQUIRED_SYSTEM_COMMANDS
): Promise<void> {
  reportInfo(ctx, 'Checking for essential commands...');
  const missing: string[] = [];

  for (const name of names) {
    const resolved = await resolveExecutable(name, ctx.env);
    if (resolved) {
      logger.debug(`'${name}' found: (${resolved})`);
    } else {
      missing.push(name);
    }
  }

  if (missing.length > 0) {
    throw new MissingCommandError(`Required command(s) missing: ${missing.join(' ')}`, missing);
  }
  reportSuccess(ctx, 'Essential commands found');
}

export function mapArchitecture(machine: string): ArchitectureProfile {
  const profile = ARCHITECTURES[machine];
  if (!profile) {
    throw new UnsupportedPlatformError(
      `Unsupported processor architecture: '${machine}'. This script supports arm64 (Apple Silicon) and x86_64 (Intel).`,
      { machine }
    );
  }
  return profile;
}

export async function detectPlatform(ctx: SetupContext): Promise<PlatformFacts> {
  reportInfo(ctx, 'Checking operating system and architecture...');

  if (ctx.host.platform !== 'darwin') {
    throw new UnsupportedPlatformError(
      `This script is designed for macOS only. Detected OS: ${ctx.host.platform}`,
      { platform: ctx.host.platform }
    );
  }
  logger.debug('Operating system confirmed as macOS (Darwin).');

  const swVers = await ctx.exec.run('sw_vers', ['-productVersion'], { env: ctx.env });
  const osVersion = swVers.code === 0 && swVers.stdout.trim() ? swVers.stdout.trim() : 'Unknown';
  logger.debug(`Detected macOS version: ${osVersion}`);

  logger.debug(`Detected ${ctx.host.machine} architecture.`);
  const arch = mapArchitecture(ctx.host.machine);
  const packageManagerPath = ctx.config.packageManager.path ?? arch.packageManagerPath;
  logger.debug(`Architecture is ${arch.cpuArch} (${arch.chipLabel}). Expecting ${PACKAGE_MANAGER.NAME} at ${packageManagerPath}.`);

  reportSuccess(ctx, `System validated: macOS Version ${osVersion} (${arch.chipLabel})`);
  return { osVersion, ...arch, packageManagerPath };
}

/**
 * Ping the configured domains in order and stop at the first reply.
 * Returns the domain that answered.
 */
export async function checkConnectivity(ctx: SetupContext, domains: readonly string[] = ctx.config.checkDomains): Promise<string> {
  reportInfo(ctx, 'Checking internet connectivity...');

  for (const domain of domains) {
    logger.debug(`Attempting to ping ${domain}...`);
    // macOS ping: -t is the overall timeout in seconds (-W would be milliseconds)
    const result = await ctx.exec.run('ping', ['-c', '1', '-t', String(PING_TIMEOUT_SECONDS), domain], { env: ctx.env });
    if (result.code === 0) {
      reportSuccess(ctx, "Internet connection 'OK'");
      return domain;
    }
  }

  throw new NetworkUnavailableError(domains);
}

/**
 * Map $SHELL to a supported shell and its profile file. Pure: touches no files.
 */
export function resolveShell(ctx: SetupContext): ShellFacts {
  const shellName = basename(ctx.env.SHELL || '/bin/bash');
  logger.debug(`Detected shell command based on $SHELL: ${shellName}`);

  switch (shellName) {
    case 'zsh':
      return {
        shellKind: 'zsh',
        shellProfilePath: join(ctx.env.ZDOTDIR || ctx.home, ctx.config.profiles.zsh),
        versionManagerShell: 'zsh'
      };
    case 'bash':
      return {
        shellKind: 'bash',
        shellProfilePath: join(ctx.home, ctx.config.profiles.bash),
        versionManagerShell: 'bash'
      };
    default:
      throw new UnsupportedPlatformError(
        `Unsupported shell detected: '${shellName}'. This script currently only supports bash and zsh.`,
        { shell: shellName }
      );
  }
}

export async function detectShell(ctx: SetupContext): Promise<ShellFacts> {
  reportInfo(ctx, 'Detecting user shell and profile file...');
  const shell = resolveShell(ctx);
  await ensureFileWritable(shell.shellProfilePath, `${shell.shellKind.toUpperCase()} profile file`);
  reportSuccess(ctx, `Detected shell: ${shell.shellKind}`);
  reportInfo(ctx, `Using profile: ${shell.shellProfilePath}`);
  logger.debug(`Mise shell type for activation set to: ${shell.versionManagerShell}`);
  return shell;
}

/**
 * Run every system check in order and return the frozen fact sheet.
 */
export async function probeSystem(ctx: SetupContext): Promise<Readonly<SystemFacts>> {
  await checkRequiredCommands(ctx);
  const platform = await detectPlatform(ctx);
  await checkConnectivity(ctx);
  const shell = await detectShell(ctx);

  const facts: SystemFacts = {
    osKind: 'darwin',
    ...platform,
    ...shell
  };
  return Object.freeze(facts);
}
