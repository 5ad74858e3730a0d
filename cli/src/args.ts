/**
 * Command-line argument parsing.
 */

import { MigrateOptions } from './config';
import { UsageError } from './errors';
import { LANGS, Lang } from './messages';

export interface CliArgs {
  /** File or directory to migrate */
  path?: string;
  help: boolean;
  configPath?: string;
  /** Only the options given on the command line */
  overrides: Partial<MigrateOptions>;
}

function isLang(value: string): value is Lang {
  return LANGS.some(lang => lang === value);
}

export function parseArgs(args: readonly string[]): CliArgs {
  const parsed: CliArgs = { help: false, overrides: {} };
  const positional: string[] = [];

  const valueOf = (i: number, flag: string): string => {
    const value = args[i + 1];
    if (value === undefined || value.startsWith('-')) {
      throw new UsageError(`${flag} requires a value`);
    }
    return value;
  };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    switch (arg) {
      case '-h':
      case '--help':
        parsed.help = true;
        break;
      case '-i':
      case '--in-place':
        parsed.overrides.inPlace = true;
        break;
      case '--check':
        parsed.overrides.check = true;
        break;
      case '--no-recursive':
        parsed.overrides.recursive = false;
        break;
      case '-v':
      case '--verbose':
        parsed.overrides.verbose = true;
        break;
      case '-j':
      case '--jobs': {
        const n = parseInt(valueOf(i, arg), 10);
        if (isNaN(n) || n < 1) {
          throw new UsageError(`${arg} must be a positive integer`);
        }
        parsed.overrides.jobs = n;
        i++;
        break;
      }
      case '--config':
        parsed.configPath = valueOf(i, arg);
        i++;
        break;
      case '--lang': {
        const lang = valueOf(i, arg);
        if (!isLang(lang)) {
          throw new UsageError(`--lang must be one of: ${LANGS.join(', ')}`);
        }
        parsed.overrides.lang = lang;
        i++;
        break;
      }
      default:
        if (arg.startsWith('-') && arg !== '-') {
          throw new UsageError(`Unknown option: ${arg}`);
        }
        positional.push(arg);
        break;
    }
  }

  if (positional.length > 1) {
    throw new UsageError(`Expected one path, got ${positional.length}: ${positional.join(' ')}`);
  }
  if (positional.length === 1) parsed.path = positional[0];

  if (parsed.overrides.inPlace && parsed.overrides.check) {
    throw new UsageError('--in-place and --check cannot be combined');
  }

  return parsed;
}
