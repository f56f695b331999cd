import { glob } from 'glob';
import { PACKAGE_MANIFEST } from './constants';
import { errorMessage } from './errors';
import { RepositoryImporter } from './importer';
import { Logger } from './logger';
import { Distribution, WorkspaceLayout } from './types';

export interface SummaryInput {
  distribution: Distribution;
  releaseTag?: string;
  workspace: WorkspaceLayout;
  targetDirectory: string;
}

export async function countPackages(sourceDir: string): Promise<number> {
  const matches = await glob(`**/${PACKAGE_MANIFEST}`, { cwd: sourceDir, dot: true, nodir: true });
  return matches.length;
}

/**
 * Prints the post-clone report. The clone has already succeeded by the time
 * this runs, so failures are only warned about. Returns the package count, or
 * null when the scan failed.
 */
export async function reportSummary(
  input: SummaryInput,
  importer: RepositoryImporter,
  logger: Logger,
  scan: (sourceDir: string) => Promise<number> = countPackages
): Promise<number | null> {
  let packageCount: number | null = null;

  logger.info('Cloning summary:');
  logger.detail(`- Distribution: ${input.distribution}`);
  if (input.releaseTag) {
    logger.detail(`- Release: ${input.releaseTag}`);
  }
  logger.detail(`- Directory: ${input.workspace.root}`);
  try {
    packageCount = await scan(input.workspace.sourceDir);
    logger.detail(`- Number of packages: ${packageCount}`);
  } catch (error) {
    logger.warn(`Could not count packages: ${errorMessage(error)}`);
  }

  logger.info('Repository information:');
  try {
    const status = await importer.status(input.workspace);
    for (const line of status.split('\n')) {
      if (line.trim().length > 0) {
        logger.detail(line);
      }
    }
  } catch (error) {
    logger.warn(`Could not read repository status: ${errorMessage(error)}`);
  }

  logger.success(`ROS2 workspace ready in: ${input.workspace.root}`);
  logger.info(`To build: ros2-clone build --target ${input.targetDirectory}`);
  return packageCount;
}
