import { CLONE_REQUIREMENTS } from './constants';
import { validateDistribution } from './distribution';
import { RepositoryImporter, VcsImporter } from './importer';
import { Logger, consoleLogger } from './logger';
import { ManifestProbe, confirmManifest, createManifestProbe, isPathSafeReleaseTag, resolveManifestUrl } from './manifest';
import { ExecutableLocator, checkPrerequisites, createPathLocator } from './prerequisites';
import { reportSummary } from './summary';
import { CloneOutcome, Configuration, PipelineStage } from './types';
import { prepareWorkspace } from './workspace';

export interface ClonerDependencies {
  importer: RepositoryImporter;
  probe: ManifestProbe;
  locate: ExecutableLocator;
  logger: Logger;
  cwd: string;
}

export function defaultDependencies(): ClonerDependencies {
  return {
    importer: new VcsImporter(),
    probe: createManifestProbe(),
    locate: createPathLocator(),
    logger: consoleLogger,
    cwd: process.cwd()
  };
}

/**
 * Single-pass clone pipeline. Each stage must finish before the next one
 * starts; the first error marks the run as failed and is rethrown to the
 * caller untouched.
 */
export class SourceCloner {
  private readonly deps: ClonerDependencies;
  private readonly history: PipelineStage[] = ['start'];

  constructor(deps: Partial<ClonerDependencies> = {}) {
    this.deps = { ...defaultDependencies(), ...deps };
  }

  get stages(): readonly PipelineStage[] {
    return this.history;
  }

  get stage(): PipelineStage {
    return this.history[this.history.length - 1];
  }

  async run(config: Configuration): Promise<CloneOutcome> {
    if (this.stage !== 'start') {
      throw new Error('SourceCloner instances run a single time');
    }
    const { logger } = this.deps;
    this.advance('args-parsed');

    try {
      logger.info('=== ROS2 Source Cloning ===');

      logger.info('Checking prerequisites...');
      await checkPrerequisites(CLONE_REQUIREMENTS, this.deps.locate);
      logger.success('Prerequisites OK');
      this.advance('prereqs-checked');

      const distribution = validateDistribution(config.distribution);
      this.advance('distro-validated');

      if (config.releaseTag && !isPathSafeReleaseTag(config.releaseTag)) {
        logger.warn(`Release tag '${config.releaseTag}' is inserted into the URL unescaped`);
      }
      const reference = resolveManifestUrl(distribution, config.releaseTag);
      logger.info(`Repos file URL: ${reference.url}`);
      this.advance('url-resolved');

      logger.info('Checking .repos file existence...');
      const manifest = await confirmManifest(reference, this.deps.probe);
      logger.success('.repos file found');
      this.advance('url-confirmed');

      const workspace = await prepareWorkspace(
        {
          targetDirectory: config.targetDirectory,
          cleanBeforeClone: config.cleanBeforeClone,
          cwd: this.deps.cwd
        },
        logger
      );
      this.advance('workspace-prepared');

      logger.info('Starting ROS2 source cloning...');
      logger.info(`Distribution: ${distribution}`);
      if (config.releaseTag) {
        logger.info(`Release: ${config.releaseTag}`);
      }
      await this.deps.importer.importRepositories(manifest, workspace);
      logger.success('Cloning completed successfully');
      this.advance('cloned');

      const packageCount = await reportSummary(
        {
          distribution,
          releaseTag: config.releaseTag,
          workspace,
          targetDirectory: config.targetDirectory
        },
        this.deps.importer,
        logger
      );
      this.advance('summarized');

      logger.success('=== Cloning completed successfully ===');
      this.advance('done');

      return { distribution, releaseTag: config.releaseTag, manifest, workspace, packageCount };
    } catch (error) {
      this.advance('failed');
      throw error;
    }
  }

  private advance(stage: PipelineStage): void {
    this.history.push(stage);
  }
}

export default SourceCloner;
