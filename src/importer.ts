import { SOURCE_DIR, VCS_COMMAND } from './constants';
import { ImportFailureError, InterruptedError } from './errors';
import { CommandResult, CommandRunner, isInterruptSignal, spawnRunner } from './process';
import { ConfirmedManifest, WorkspaceLayout } from './types';

export interface RepositoryImporter {
  importRepositories(manifest: ConfirmedManifest, workspace: WorkspaceLayout): Promise<void>;
  status(workspace: WorkspaceLayout): Promise<string>;
}

/** Delegates to vcstool, run from the workspace root against `src`. */
export class VcsImporter implements RepositoryImporter {
  constructor(private readonly runner: CommandRunner = spawnRunner) {}

  async importRepositories(manifest: ConfirmedManifest, workspace: WorkspaceLayout): Promise<void> {
    let result: CommandResult;
    try {
      result = await this.runner.run(
        VCS_COMMAND,
        ['import', '--input', manifest.url, SOURCE_DIR],
        { cwd: workspace.root }
      );
    } catch (error) {
      throw new ImportFailureError(null, { cause: error });
    }

    if (isInterruptSignal(result.signal)) {
      throw new InterruptedError(result.signal);
    }
    if (result.status !== 0) {
      throw new ImportFailureError(result.status);
    }
  }

  async status(workspace: WorkspaceLayout): Promise<string> {
    const result = await this.runner.run(VCS_COMMAND, ['status', SOURCE_DIR], {
      cwd: workspace.root,
      captureOutput: true
    });
    if (result.status !== 0) {
      throw new Error(`vcs status exited with code ${result.status}`);
    }
    return result.stdout;
  }
}
