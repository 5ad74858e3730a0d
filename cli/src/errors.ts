/**
 * Driver-level error types. Engine errors never reach this far; these cover
 * the command line, the config file and the file system.
 */

import { TypefillError } from '../../engine/src/errors';

export class UsageError extends TypefillError {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

export class ConfigError extends TypefillError {
  public readonly file: string;

  constructor(file: string, message: string) {
    super(`Invalid config file ${file}: ${message}`);
    this.name = 'ConfigError';
    this.file = file;
  }
}

export class PathNotFoundError extends TypefillError {
  public readonly path: string;

  constructor(path: string) {
    super(`Path '${path}' not found`);
    this.name = 'PathNotFoundError';
    this.path = path;
  }
}

/** Message of anything thrown, including errors raised by Node's own modules. */
export function errorMessage(e: unknown): string {
  if (typeof e === 'object' && e !== null && 'message' in e && typeof e.message === 'string') {
    return e.message;
  }
  return String(e);
}

/** Is `e` a system error carrying `code`, e.g. `ENOENT`? */
export function hasErrorCode(e: unknown, code: string): boolean {
  return typeof e === 'object' && e !== null && 'code' in e && e.code === code;
}
