import { spawn } from 'child_process';

export interface RunOptions {
  cwd: string;
  captureOutput?: boolean;
}

export interface CommandResult {
  status: number | null;
  signal: NodeJS.Signals | null;
  stdout: string;
}

export interface CommandRunner {
  run(command: string, args: readonly string[], options: RunOptions): Promise<CommandResult>;
}

/**
 * Runs a child process to completion. Output goes straight to the terminal
 * unless `captureOutput` is set, in which case stdout is collected and
 * stderr is still inherited.
 */
export const spawnRunner: CommandRunner = {
  run(command, args, options) {
    return new Promise((resolve, reject) => {
      const child = spawn(command, [...args], {
        cwd: options.cwd,
        stdio: options.captureOutput ? ['ignore', 'pipe', 'inherit'] : 'inherit'
      });

      let stdout = '';
      child.stdout?.setEncoding('utf8');
      child.stdout?.on('data', (chunk: string) => {
        stdout += chunk;
      });

      child.once('error', reject);
      child.once('close', (status, signal) => {
        resolve({ status, signal, stdout });
      });
    });
  }
};

export function isInterruptSignal(signal: NodeJS.Signals | null): signal is 'SIGINT' | 'SIGTERM' {
  return signal === 'SIGINT' || signal === 'SIGTERM';
}
