#!/usr/bin/env node

import { Command, CommanderError, OutputConfiguration } from 'commander';
import { BUILD_REQUIREMENTS, DEFAULT_TARGET_DIR, EXIT_CODES, SUPPORTED_DISTRIBUTIONS } from './constants';
import { ColconBuilder } from './builder';
import { ClonerError, InterruptedError, UnsupportedValueError, UsageError, errorMessage } from './errors';
import { CommandRunner, spawnRunner } from './process';
import { Logger, consoleLogger } from './logger';
import { CloneCommandOptions, buildConfiguration, collectRepeatable } from './options';
import { checkPrerequisites } from './prerequisites';
import { ClonerDependencies, SourceCloner, defaultDependencies } from './source-cloner';
import { assertWorkspaceExists, cleanBuildArtifacts, cleanSources, resolveWorkspace } from './workspace';

export interface CliDependencies extends ClonerDependencies {
  runner: CommandRunner;
  output?: OutputConfiguration;
}

interface TargetOptions {
  target: string;
}

interface BuildCommandOptions extends TargetOptions {
  buildType?: string;
  cmakeOption: string[];
}

const EXAMPLES = `
Examples:
  $ ros2-clone -d humble                      Latest Humble sources
  $ ros2-clone -d humble -r 20250331          Dated Humble release
  $ ros2-clone -d iron -t my_workspace        Iron in a custom workspace
  $ ros2-clone -d jazzy -r 20240523 -c        Dated release, wiping the target first
  $ ros2-clone build --build-type Release     Build the default workspace`;

export function createProgram(overrides: Partial<CliDependencies> = {}): Command {
  const deps: CliDependencies = { ...defaultDependencies(), runner: spawnRunner, ...overrides };
  const { logger } = deps;
  const program = new Command();

  program
    .name('ros2-clone')
    .description('Clone ROS2 source repositories for a specific distribution and release')
    .version('1.0.0')
    .exitOverride()
    .showHelpAfterError();

  if (deps.output) {
    program.configureOutput(deps.output);
  }

  const cloneCommand = program
    .command('clone', { isDefault: true })
    .description('Resolve the .repos manifest for a distribution and import its repositories')
    .option('-d, --distro <distro>', `ROS2 distribution (${SUPPORTED_DISTRIBUTIONS.join(', ')})`)
    .option('-r, --release <release>', 'Specific release tag')
    .option('-t, --target <dir>', 'Target directory', DEFAULT_TARGET_DIR)
    .option('-c, --clean', 'Clean target directory before cloning', false)
    .addHelpText('after', EXAMPLES)
    .action(async (options: CloneCommandOptions, command: Command) => {
      try {
        const config = buildConfiguration(options);
        await new SourceCloner(deps).run(config);
      } catch (error) {
        if (error instanceof UsageError) {
          logger.error(error.message);
          command.outputHelp();
        } else if (error instanceof UnsupportedValueError) {
          logger.error(error.message);
          logger.info(`Supported distributions: ${error.supported.join(' ')}`);
        }
        throw error;
      }
    });

  program.addHelpText('after', () => `\nDefault command:\n${cloneCommand.helpInformation()}`);

  program
    .command('build')
    .description('Build the workspace with colcon')
    .option('-t, --target <dir>', 'Workspace directory', DEFAULT_TARGET_DIR)
    .option('--build-type <type>', 'CMAKE_BUILD_TYPE passed to every package (e.g. Debug, Release)')
    .option('--cmake-option <define>', 'Extra CMake argument, repeatable', collectRepeatable, [])
    .action(async (options: BuildCommandOptions) => {
      const workspace = resolveWorkspace(options.target, deps.cwd);
      await checkPrerequisites(BUILD_REQUIREMENTS, deps.locate);
      await assertWorkspaceExists(workspace);

      logger.info(`Building workspace ${workspace.root}`);
      await new ColconBuilder(deps.runner).build({
        workspace: workspace.root,
        buildType: options.buildType,
        cmakeOptions: options.cmakeOption
      });
      logger.success('Build completed successfully');
    });

  program
    .command('clean')
    .description('Remove build, install and log directories from the workspace')
    .option('-t, --target <dir>', 'Workspace directory', DEFAULT_TARGET_DIR)
    .action(async (options: TargetOptions) => {
      const removed = await cleanBuildArtifacts(resolveWorkspace(options.target, deps.cwd));
      if (removed.length === 0) {
        logger.info('Nothing to clean');
        return;
      }
      for (const dir of removed) {
        logger.detail(`Removed: ${dir}`);
      }
      logger.success('Workspace cleaned');
    });

  program
    .command('clean-source')
    .description('Remove the cloned sources (src) from the workspace')
    .option('-t, --target <dir>', 'Workspace directory', DEFAULT_TARGET_DIR)
    .action(async (options: TargetOptions) => {
      const removed = await cleanSources(resolveWorkspace(options.target, deps.cwd));
      if (removed) {
        logger.success('Sources removed');
      } else {
        logger.info('No sources to remove');
      }
    });

  return program;
}

export function reportFailure(error: unknown, logger: Logger): number {
  if (error instanceof CommanderError) {
    return error.exitCode === 0 ? EXIT_CODES.success : EXIT_CODES.usage;
  }
  if (error instanceof UsageError || error instanceof UnsupportedValueError) {
    return error.exitCode;
  }
  if (error instanceof ClonerError) {
    logger.error(error.message);
    return error.exitCode;
  }
  logger.error(`Unexpected error: ${errorMessage(error)}`);
  return EXIT_CODES.unexpected;
}

/** Parses user arguments, runs the selected command and returns the exit code. */
export async function runCli(argv: readonly string[], overrides: Partial<CliDependencies> = {}): Promise<number> {
  const program = createProgram(overrides);
  try {
    await program.parseAsync([...argv], { from: 'user' });
    return EXIT_CODES.success;
  } catch (error) {
    return reportFailure(error, overrides.logger ?? consoleLogger);
  }
}

/** Returns a function that removes the handlers again. */
export function installInterruptHandler(logger: Logger): () => void {
  const onSignal = (signal: NodeJS.Signals) => {
    const interrupted = new InterruptedError(signal);
    logger.error(`Script ${interrupted.message.toLowerCase()}`);
    process.exit(interrupted.exitCode);
  };
  process.once('SIGINT', onSignal);
  process.once('SIGTERM', onSignal);
  return () => {
    process.off('SIGINT', onSignal);
    process.off('SIGTERM', onSignal);
  };
}

if (require.main === module) {
  installInterruptHandler(consoleLogger);
  runCli(process.argv.slice(2)).then(
    (code) => process.exit(code),
    (error: unknown) => {
      consoleLogger.error(errorMessage(error));
      process.exit(EXIT_CODES.unexpected);
    }
  );
}
