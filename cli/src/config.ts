/**
 * Run options: built-in defaults, then the locale, then an optional JSON
 * config file, then command-line flags. Later sources win.
 */

import * as fs from 'fs';
import * as os from 'os';
import { z } from 'zod';
import { ConfigError, errorMessage } from './errors';
import { Lang, detectLang } from './messages';

export interface MigrateOptions {
  /** Rewrite files instead of printing the result */
  inPlace: boolean;
  /** Report files that would change; write nothing */
  check: boolean;
  /** Descend into subdirectories when given a directory */
  recursive: boolean;
  /** Glob (relative to the directory) selecting config files */
  pattern: string;
  /** Upper bound on files processed concurrently */
  jobs: number;
  lang: Lang;
  /** Report every decision, not only skips and errors */
  verbose: boolean;
}

export const DEFAULT_OPTIONS: MigrateOptions = {
  inPlace: false,
  check: false,
  recursive: true,
  pattern: '*.conf',
  jobs: Math.max(1, os.cpus().length),
  lang: 'en',
  verbose: false,
};

export const ConfigFileSchema = z
  .object({
    inPlace: z.boolean(),
    recursive: z.boolean(),
    pattern: z.string().min(1),
    jobs: z.number().int().min(1).max(256),
    lang: z.enum(['en', 'zh']),
    verbose: z.boolean(),
  })
  .partial()
  .strict();

export type ConfigFile = z.infer<typeof ConfigFileSchema>;

/**
 * Read and validate a JSON config file.
 */
export function loadConfigFile(file: string): ConfigFile {
  let raw: string;
  try {
    raw = fs.readFileSync(file, 'utf-8');
  } catch (e) {
    throw new ConfigError(file, errorMessage(e));
  }

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (e) {
    throw new ConfigError(file, errorMessage(e));
  }

  const parsed = ConfigFileSchema.safeParse(json);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map(issue => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
      .join('; ');
    throw new ConfigError(file, details);
  }
  return parsed.data;
}

/**
 * Merge every option source into the final options. `overrides` carries
 * only the flags that were actually given.
 */
export function resolveOptions(
  overrides: Partial<MigrateOptions>,
  configFile: ConfigFile = {},
  env: NodeJS.ProcessEnv = process.env,
): MigrateOptions {
  return {
    ...DEFAULT_OPTIONS,
    lang: detectLang(env),
    ...configFile,
    ...overrides,
  };
}
