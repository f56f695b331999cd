import * as fs from 'fs-extra';
import * as os from 'os';
import * as path from 'path';
import { RepositoryImporter } from '../src/importer';
import { Logger } from '../src/logger';
import { CommandResult, CommandRunner, RunOptions } from '../src/process';
import { ConfirmedManifest, WorkspaceLayout } from '../src/types';

export interface RecordedCommand {
  command: string;
  args: string[];
  options: RunOptions;
}

export class FakeRunner implements CommandRunner {
  readonly calls: RecordedCommand[] = [];

  constructor(private readonly respond: (call: RecordedCommand) => Partial<CommandResult> = () => ({})) {}

  async run(command: string, args: readonly string[], options: RunOptions): Promise<CommandResult> {
    const call = { command, args: [...args], options };
    this.calls.push(call);
    return { status: 0, signal: null, stdout: '', ...this.respond(call) };
  }
}

export class FakeImporter implements RepositoryImporter {
  readonly imports: Array<{ url: string; workspace: WorkspaceLayout }> = [];
  statusOutput = '=== ./src/ros2/rcl (git) ===\nOn branch humble\n';
  failImport: Error | null = null;
  failStatus: Error | null = null;
  packagesToCreate: string[] = [];

  async importRepositories(manifest: ConfirmedManifest, workspace: WorkspaceLayout): Promise<void> {
    this.imports.push({ url: manifest.url, workspace });
    if (this.failImport) {
      throw this.failImport;
    }
    for (const pkg of this.packagesToCreate) {
      await fs.outputFile(path.join(workspace.sourceDir, pkg, 'package.xml'), '<package/>');
    }
  }

  async status(): Promise<string> {
    if (this.failStatus) {
      throw this.failStatus;
    }
    return this.statusOutput;
  }
}

export class RecordingLogger implements Logger {
  readonly lines: string[] = [];

  info(message: string): void {
    this.lines.push(`info: ${message}`);
  }

  success(message: string): void {
    this.lines.push(`success: ${message}`);
  }

  warn(message: string): void {
    this.lines.push(`warn: ${message}`);
  }

  error(message: string): void {
    this.lines.push(`error: ${message}`);
  }

  detail(message: string): void {
    this.lines.push(`detail: ${message}`);
  }
}

export const foundEverywhere = async (command: string): Promise<string> => `/usr/bin/${command}`;

export async function makeTempDir(prefix = 'ros2-clone-test-'): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), prefix));
}
