/**
 * Resource Directory Resolver
 *
 * Finds the project directory, or downloads and unpacks it into the
 * canonical location and searches again. The number of downloads is capped
 * so a search that never sees the unpacked copy cannot loop forever.
 *
 *   searching -> found       -> resolved
 *   searching -> downloading -> extracting -> normalizing -> searching
 *   searching -> staging hit -> normalizing -> searching
 *
 * When the staging directory lies inside the search root the unpacked copy
 * can itself turn up in a search, so extraction is followed by a search
 * and the copy is normalized when it is seen (or when nothing is found).
 */

import { mkdtemp } from 'fs/promises';
import { tmpdir } from 'os';
import { isAbsolute, join, relative } from 'path';
import type { SetupContext, TargetDirectoryHandle } from '../../types/index.js';
import { ARCHIVE_DOWNLOAD_URL, DEFAULT_APP_SCRIPT_SECRET, DIR_PATTERNS, FILE_PATTERNS } from '../../constants/index.js';
import { copyDirectoryContents, ensureFileWritable, fileSize, isDirectory, readTextFile, remove, writeTextFile } from '../../utils/fs.js';
import { CriticalTaskError, ResolutionExhaustedError } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';
import { reportInfo, reportSuccess, reportWarning } from '../setup-context.js';
import { runCommandTask } from '../tasks/task-runner.js';
import { locateProjectDirectory } from './locate.js';

export type ResolverState = 'searching' | 'downloading' | 'extracting' | 'normalizing' | 'resolved';

export interface ResolverPaths {
  /** Downloaded archive, `~/<archive name>` */
  archivePath: string;
  /** Canonical project location, `~/riverSpider` */
  targetDir: string;
  /** Parent of the per-run staging directory */
  stagingRoot: string;
}

export function getResolverPaths(ctx: SetupContext): ResolverPaths {
  return {
    archivePath: join(ctx.home, ctx.config.archive.fileName),
    targetDir: join(ctx.home, DIR_PATTERNS.PROJECT),
    stagingRoot: tmpdir()
  };
}

function isWithin(child: string, parent: string): boolean {
  const rel = relative(parent, child);
  return rel !== '' && !rel.startsWith('..') && !isAbsolute(rel);
}

export function buildArchiveUrl(fileId: string): string {
  const query = new URLSearchParams({ id: fileId, export: 'download', confirm: 't' });
  return `${ARCHIVE_DOWNLOAD_URL}?${query.toString()}`;
}

const DOWNLOAD_HELP = 'See Canvas for download instructions.';

/**
 * Download the archive and unpack it into a fresh staging directory.
 * Returns the staging directory.
 */
export async function downloadAndExtract(ctx: SetupContext, paths: ResolverPaths): Promise<string> {
  const { fileId, fileName } = ctx.config.archive;
  reportInfo(ctx, `Downloading '${DIR_PATTERNS.PROJECT}'...`);

  await runCommandTask(ctx, {
    label: `Downloading '${fileName}'`,
    critical: true,
    command: 'curl',
    args: ['-fsSL', '-o', paths.archivePath, buildArchiveUrl(fileId)]
  });

  const size = await fileSize(paths.archivePath);
  if (!size) {
    throw new CriticalTaskError(`Downloaded archive is missing or empty: ${paths.archivePath}. ${DOWNLOAD_HELP}`, {
      archivePath: paths.archivePath,
      size
    });
  }

  const stagingDir = await mkdtemp(join(paths.stagingRoot, 'riverspider-'));
  logger.debug(`Created staging directory: ${stagingDir}`);

  await runCommandTask(ctx, {
    label: `Unzipping '${fileName}'`,
    critical: true,
    command: 'unzip',
    args: [paths.archivePath, '-d', stagingDir]
  });

  return stagingDir;
}

/**
 * Delete the archive and the staging directory. Failures are warnings.
 */
export async function discardDownload(ctx: SetupContext, stagingDir: string, paths: ResolverPaths): Promise<void> {
  for (const leftover of [stagingDir, paths.archivePath]) {
    try {
      await remove(leftover);
    } catch (error) {
      logger.debug(`Cleanup failed for ${leftover}`, { error });
      reportWarning(ctx, `Could not remove ${leftover}. You can delete it manually.`);
    }
  }
}

/**
 * Move the unpacked project from staging into the target directory and
 * delete the archive and the staging directory.
 */
export async function normalizeDownload(ctx: SetupContext, stagingDir: string, paths: ResolverPaths): Promise<void> {
  const unpacked = join(stagingDir, DIR_PATTERNS.PROJECT);
  if (!(await isDirectory(unpacked))) {
    throw new CriticalTaskError(`Failed to download '${DIR_PATTERNS.PROJECT}'. ${DOWNLOAD_HELP}`, { unpacked });
  }

  logger.debug(`Moving contents to ${paths.targetDir}...`);
  const copy = await copyDirectoryContents(unpacked, paths.targetDir);
  for (const failure of copy.failed) {
    reportWarning(ctx, `Could not copy '${failure.name}' into ${paths.targetDir}`);
  }

  await discardDownload(ctx, stagingDir, paths);
  logger.debug(`Extraction and cleanup complete. Files are in ${paths.targetDir}`);
}

/**
 * Write the default secret when the secret file is empty. An existing
 * secret is never replaced. Returns true when the default was written.
 */
export async function ensureSecretInitialized(dir: string): Promise<boolean> {
  const secretPath = join(dir, FILE_PATTERNS.SECRET);
  await ensureFileWritable(secretPath, FILE_PATTERNS.SECRET);

  const content = await readTextFile(secretPath);
  if (content.replace(/\n+$/, '') !== '') {
    return false;
  }

  await writeTextFile(secretPath, `${DEFAULT_APP_SCRIPT_SECRET}\n`);
  logger.debug(`Initialized ${secretPath} with the default secret`);
  return true;
}

/**
 * Locate or fetch the project directory, once per run. `maxAttempts` caps
 * the downloads; every download is followed by another search, so the
 * last one is still picked up.
 */
export async function resolveProjectDirectory(
  ctx: SetupContext,
  paths: ResolverPaths = getResolverPaths(ctx)
): Promise<TargetDirectoryHandle> {
  const maxAttempts = ctx.config.resolver.maxAttempts;
  // Extracted but not yet moved into the target directory
  let pendingStaging: string | null = null;
  let downloads = 0;
  let searches = 0;
  let state: ResolverState = 'searching';

  reportInfo(ctx, `Attempting to locate the ${DIR_PATTERNS.PROJECT} project directory...`);

  for (;;) {
    state = 'searching';
    searches++;
    logger.debug(`Resolver search ${searches} (downloads ${downloads}/${maxAttempts})`);
    const found = await locateProjectDirectory(ctx, { asTask: true });

    if (found && pendingStaging && found === join(pendingStaging, DIR_PATTERNS.PROJECT)) {
      state = 'normalizing';
      logger.debug(`Search matched the staging directory ${found}; normalizing`);
      await normalizeDownload(ctx, pendingStaging, paths);
      pendingStaging = null;
      continue;
    }

    if (found) {
      state = 'resolved';
      if (pendingStaging) {
        await discardDownload(ctx, pendingStaging, paths);
      }
      reportSuccess(ctx, `Found '${DIR_PATTERNS.PROJECT}' at ${found}`);
      if (await ensureSecretInitialized(found)) {
        reportInfo(ctx, `Initialized ${FILE_PATTERNS.SECRET} with the default secret`);
      }
      return { path: found, origin: downloads > 0 ? 'freshly_downloaded' : 'found_existing' };
    }

    if (pendingStaging) {
      state = 'normalizing';
      await normalizeDownload(ctx, pendingStaging, paths);
      pendingStaging = null;
      continue;
    }

    if (downloads >= maxAttempts) {
      break;
    }

    state = 'downloading';
    logger.debug(`Resolver state: ${state}`);
    const stagingDir = await downloadAndExtract(ctx, paths);
    downloads++;

    if (isWithin(stagingDir, ctx.home)) {
      state = 'extracting';
      logger.debug(`Staging directory ${stagingDir} is inside the search root; searching before normalizing`);
      pendingStaging = stagingDir;
      continue;
    }

    state = 'normalizing';
    await normalizeDownload(ctx, stagingDir, paths);
  }

  logger.debug(`Resolver gave up in state '${state}' after ${searches} searches`);
  throw new ResolutionExhaustedError(maxAttempts);
}
