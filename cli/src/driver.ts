/**
 * Batch driver: resolves the target path into files, runs the engine on
 * each one through the worker pool, and writes results back when asked.
 *
 * A file's edits are computed in full before anything is written, so an
 * aborted batch never leaves a half-migrated file behind.
 */

import * as fs from 'fs';
import { migrate, RewriteEdit, ScanResult } from '../../engine/src';
import { Diagnostic, toDiagnostics } from '../../engine/src/diagnostics';
import { runWithConcurrency } from './concurrency';
import { MigrateOptions } from './config';
import { PathNotFoundError, errorMessage, hasErrorCode } from './errors';
import { collectConfigFiles, readText, writeText } from './files';

export type FileOutcome =
  | {
      tag: 'migrated';
      file: string;
      source: string;
      output: string;
      edits: RewriteEdit[];
      result: ScanResult;
      diagnostics: Diagnostic[];
      written: boolean;
    }
  | { tag: 'failed'; file: string; error: string };

export interface BatchOutcome {
  target: string;
  mode: 'file' | 'directory';
  /** Outcomes of the files that were processed, in path order */
  files: FileOutcome[];
  /** Files matched but never started because the run was aborted */
  pending: string[];
}

export async function processFile(file: string, options: MigrateOptions): Promise<FileOutcome> {
  try {
    const decoded = await readText(file);
    const { output, result, edits } = migrate(decoded.text);
    const changed = output !== decoded.text;

    let written = false;
    if (options.inPlace && !options.check && changed) {
      await writeText(file, { text: output, encoding: decoded.encoding });
      written = true;
    }

    return {
      tag: 'migrated',
      file,
      source: decoded.text,
      output,
      edits,
      result,
      diagnostics: toDiagnostics(decoded.text, result),
      written,
    };
  } catch (e) {
    return { tag: 'failed', file, error: errorMessage(e) };
  }
}

export async function processPath(
  target: string,
  options: MigrateOptions,
  signal?: AbortSignal,
): Promise<BatchOutcome> {
  let stat: fs.Stats;
  try {
    stat = await fs.promises.stat(target);
  } catch (e) {
    if (hasErrorCode(e, 'ENOENT')) {
      throw new PathNotFoundError(target);
    }
    throw e;
  }

  if (!stat.isDirectory()) {
    return { target, mode: 'file', files: [await processFile(target, options)], pending: [] };
  }

  const paths = await collectConfigFiles(target, options.pattern, options.recursive);
  const tasks = paths.map(file => () => processFile(file, options));
  const { results } = await runWithConcurrency(tasks, Math.min(paths.length, options.jobs), signal);

  const files: FileOutcome[] = [];
  const pending: string[] = [];
  results.forEach((outcome, i) => {
    if (outcome) files.push(outcome);
    else pending.push(paths[i]);
  });

  return { target, mode: 'directory', files, pending };
}

// ---------------------------------------------------------------------------
// Exit codes
// ---------------------------------------------------------------------------

export const ExitCode = {
  Success: 0,
  Failure: 1,
  SuccessWithSkips: 2,
  NeedsAnnotation: 3,
  Cancelled: 130,
} as const;

export type ExitCode = (typeof ExitCode)[keyof typeof ExitCode];

export function exitCodeFor(batch: BatchOutcome, options: MigrateOptions): ExitCode {
  let failed = false;
  let skipped = false;
  let pendingEdits = false;

  for (const outcome of batch.files) {
    if (outcome.tag === 'failed') {
      failed = true;
      continue;
    }
    const { decisions, errors } = outcome.result;
    if (errors.some(e => e.kind === 'MalformedDeclaration' || e.kind === 'UnbalancedDelimiter')) failed = true;
    if (decisions.some(d => d.result.tag === 'skip')) skipped = true;
    if (outcome.edits.length > 0) pendingEdits = true;
  }

  if (failed) return ExitCode.Failure;
  if (batch.pending.length > 0) return ExitCode.Cancelled;
  if (options.check && pendingEdits) return ExitCode.NeedsAnnotation;
  if (skipped) return ExitCode.SuccessWithSkips;
  return ExitCode.Success;
}
