/**
 * Error hierarchy:
 * - ClonerError (base, carries the process exit code)
 *   - UsageError (missing or malformed command-line input)
 *   - UnsupportedValueError (distribution outside the allow-list)
 *   - PrerequisiteMissingError (external tool not on PATH)
 *   - ManifestUnreachableError (existence probe failed)
 *   - WorkspaceError (target directory could not be prepared)
 *   - ImportFailureError (vcs import failed)
 *   - BuildFailureError (colcon build failed)
 *   - InterruptedError (SIGINT / SIGTERM)
 */

import { EXIT_CODES, SUPPORTED_DISTRIBUTIONS } from './constants';

export class ClonerError extends Error {
  readonly code: string;
  readonly exitCode: number;

  constructor(message: string, code: string, exitCode: number, options?: ErrorOptions) {
    super(message, options);
    this.name = 'ClonerError';
    this.code = code;
    this.exitCode = exitCode;
    Error.captureStackTrace?.(this, this.constructor);
  }
}

export class UsageError extends ClonerError {
  constructor(message: string) {
    super(message, 'USAGE_ERROR', EXIT_CODES.usage);
    this.name = 'UsageError';
  }
}

export class UnsupportedValueError extends ClonerError {
  readonly value: string;
  readonly supported: readonly string[];

  constructor(value: string, supported: readonly string[] = SUPPORTED_DISTRIBUTIONS) {
    super(`Invalid distribution: ${value}`, 'UNSUPPORTED_VALUE_ERROR', EXIT_CODES.usage);
    this.name = 'UnsupportedValueError';
    this.value = value;
    this.supported = supported;
  }
}

export class PrerequisiteMissingError extends ClonerError {
  readonly tool: string;

  constructor(tool: string, installHint?: string) {
    const hint = installHint ? `. Install it with: ${installHint}` : '.';
    super(`${tool} is not installed${hint}`, 'PREREQUISITE_MISSING_ERROR', EXIT_CODES.prerequisite);
    this.name = 'PrerequisiteMissingError';
    this.tool = tool;
  }
}

export class ManifestUnreachableError extends ClonerError {
  readonly url: string;

  constructor(url: string, options?: ErrorOptions) {
    super(
      `The .repos file does not exist at URL: ${url}`,
      'MANIFEST_UNREACHABLE_ERROR',
      EXIT_CODES.manifestUnreachable,
      options
    );
    this.name = 'ManifestUnreachableError';
    this.url = url;
  }
}

export class WorkspaceError extends ClonerError {
  readonly path: string;

  constructor(message: string, path: string, options?: ErrorOptions) {
    super(message, 'WORKSPACE_ERROR', EXIT_CODES.workspace, options);
    this.name = 'WorkspaceError';
    this.path = path;
  }
}

export class ImportFailureError extends ClonerError {
  readonly status: number | null;

  constructor(status: number | null, options?: ErrorOptions) {
    super('Error during cloning', 'IMPORT_FAILURE_ERROR', EXIT_CODES.importFailure, options);
    this.name = 'ImportFailureError';
    this.status = status;
  }
}

export class BuildFailureError extends ClonerError {
  readonly status: number | null;

  constructor(status: number | null, options?: ErrorOptions) {
    super('Error during build', 'BUILD_FAILURE_ERROR', EXIT_CODES.buildFailure, options);
    this.name = 'BuildFailureError';
    this.status = status;
  }
}

export class InterruptedError extends ClonerError {
  readonly signal: NodeJS.Signals;

  constructor(signal: NodeJS.Signals) {
    super('Interrupted by user', 'INTERRUPTED_ERROR', EXIT_CODES.interrupted);
    this.name = 'InterruptedError';
    this.signal = signal;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : 'Unknown error';
}
