import { configurationSchema } from './constants';
import { UsageError } from './errors';
import { Configuration } from './types';

export interface CloneCommandOptions {
  distro?: string;
  release?: string;
  target?: string;
  clean?: boolean;
}

export function buildConfiguration(options: CloneCommandOptions): Readonly<Configuration> {
  const { error, value } = configurationSchema.validate({
    distribution: options.distro,
    releaseTag: options.release,
    targetDirectory: options.target,
    cleanBeforeClone: options.clean
  });

  if (error) {
    throw new UsageError(`Invalid arguments: ${error.message}`);
  }

  return Object.freeze({
    ...value,
    releaseTag: value.releaseTag ? value.releaseTag : undefined
  });
}

export function collectRepeatable(value: string, previous: string[]): string[] {
  return [...previous, value];
}
