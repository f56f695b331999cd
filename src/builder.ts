import { COLCON_COMMAND } from './constants';
import { BuildFailureError, InterruptedError } from './errors';
import { CommandResult, CommandRunner, isInterruptSignal, spawnRunner } from './process';
import { BuildRequest } from './types';

export function colconBuildArguments(request: BuildRequest): string[] {
  const args = ['build', '--symlink-install', '--event-handlers', 'console_direct+'];
  const cmakeArgs = [...request.cmakeOptions];
  if (request.buildType) {
    cmakeArgs.unshift(`-DCMAKE_BUILD_TYPE=${request.buildType}`);
  }
  if (cmakeArgs.length > 0) {
    args.push('--cmake-args', ...cmakeArgs);
  }
  return args;
}

export class ColconBuilder {
  constructor(private readonly runner: CommandRunner = spawnRunner) {}

  async build(request: BuildRequest): Promise<void> {
    let result: CommandResult;
    try {
      result = await this.runner.run(COLCON_COMMAND, colconBuildArguments(request), {
        cwd: request.workspace
      });
    } catch (error) {
      throw new BuildFailureError(null, { cause: error });
    }

    if (isInterruptSignal(result.signal)) {
      throw new InterruptedError(result.signal);
    }
    if (result.status !== 0) {
      throw new BuildFailureError(result.status);
    }
  }
}
