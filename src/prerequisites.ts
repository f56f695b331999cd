import * as fs from 'fs-extra';
import * as path from 'path';
import { PrerequisiteMissingError } from './errors';
import { RequiredTool } from './types';

export type ExecutableLocator = (command: string) => Promise<string | null>;

async function isExecutableFile(candidate: string): Promise<boolean> {
  try {
    const stats = await fs.stat(candidate);
    if (!stats.isFile()) {
      return false;
    }
    await fs.access(candidate, fs.constants.X_OK);
    return true;
  } catch {
    return false;
  }
}

/**
 * Looks a command up on the search path the way a shell would, returning the
 * first executable match.
 */
export function createPathLocator(env: NodeJS.ProcessEnv = process.env): ExecutableLocator {
  return async (command) => {
    const directories = (env.PATH ?? '').split(path.delimiter).filter((dir) => dir.length > 0);
    const extensions = process.platform === 'win32'
      ? (env.PATHEXT ?? '.EXE;.CMD;.BAT').split(';')
      : [''];

    for (const dir of directories) {
      for (const extension of extensions) {
        const candidate = path.join(dir, command + extension);
        if (await isExecutableFile(candidate)) {
          return candidate;
        }
      }
    }
    return null;
  };
}

export async function checkPrerequisites(
  tools: readonly RequiredTool[],
  locate: ExecutableLocator
): Promise<void> {
  for (const tool of tools) {
    if ((await locate(tool.command)) === null) {
      throw new PrerequisiteMissingError(tool.displayName, tool.installHint);
    }
  }
}
