import * as fs from 'fs-extra';
import * as path from 'path';
import { BUILD_ARTIFACT_DIRS, SOURCE_DIR } from './constants';
import { WorkspaceError, errorMessage } from './errors';
import { Logger, consoleLogger } from './logger';
import { WorkspaceLayout } from './types';

export interface PrepareOptions {
  targetDirectory: string;
  cleanBeforeClone: boolean;
  cwd?: string;
}

export function resolveWorkspace(targetDirectory: string, cwd: string = process.cwd()): WorkspaceLayout {
  const root = path.resolve(cwd, targetDirectory);
  return { root, sourceDir: path.join(root, SOURCE_DIR) };
}

/**
 * Recursively deletes `target`. There is no confirmation and no backup;
 * every destructive path in the tool goes through here.
 */
export async function wipeDirectory(target: string): Promise<void> {
  try {
    await fs.remove(target);
  } catch (error) {
    throw new WorkspaceError(`Could not remove ${target}: ${errorMessage(error)}`, target, { cause: error });
  }
}

async function isDirectory(target: string): Promise<boolean> {
  if (!await fs.pathExists(target)) {
    return false;
  }
  const stats = await fs.stat(target);
  return stats.isDirectory();
}

export async function prepareWorkspace(
  options: PrepareOptions,
  logger: Logger = consoleLogger
): Promise<WorkspaceLayout> {
  const layout = resolveWorkspace(options.targetDirectory, options.cwd);

  if (options.cleanBeforeClone && await isDirectory(layout.root)) {
    logger.warn(`Cleaning target directory ${options.targetDirectory}...`);
    await wipeDirectory(layout.root);
  }

  try {
    await fs.ensureDir(layout.sourceDir);
  } catch (error) {
    throw new WorkspaceError(
      `Could not create ${layout.sourceDir}: ${errorMessage(error)}`,
      layout.sourceDir,
      { cause: error }
    );
  }

  logger.info(`Working directory: ${layout.root}`);
  return layout;
}

export async function assertWorkspaceExists(layout: WorkspaceLayout): Promise<void> {
  if (!await isDirectory(layout.root)) {
    throw new WorkspaceError(`Workspace directory ${layout.root} does not exist`, layout.root);
  }
}

/** Removes colcon's build, install and log trees; returns the ones that existed. */
export async function cleanBuildArtifacts(layout: WorkspaceLayout): Promise<string[]> {
  const removed: string[] = [];
  for (const dir of BUILD_ARTIFACT_DIRS) {
    const target = path.join(layout.root, dir);
    if (await fs.pathExists(target)) {
      await wipeDirectory(target);
      removed.push(dir);
    }
  }
  return removed;
}

export async function cleanSources(layout: WorkspaceLayout): Promise<boolean> {
  if (!await fs.pathExists(layout.sourceDir)) {
    return false;
  }
  await wipeDirectory(layout.sourceDir);
  return true;
}
