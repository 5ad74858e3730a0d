/**
 * Rendering of batch results: the migrated text for stdout, and the
 * per-file report and summary for stderr.
 */

import chalk from 'chalk';
import { Diagnostic, formatDiagnostic } from '../../engine/src/diagnostics';
import { MigrateOptions } from './config';
import { BatchOutcome, FileOutcome } from './driver';
import { displayPath } from './files';
import { Messages, SummaryStats } from './messages';

/**
 * What goes to stdout when not writing in place. A single file prints as
 * is; a directory prints each file under a header line.
 */
export function renderOutput(batch: BatchOutcome): string {
  if (batch.mode === 'file') {
    const [only] = batch.files;
    return only && only.tag === 'migrated' ? only.output : '';
  }

  return batch.files
    .filter((f): f is Extract<FileOutcome, { tag: 'migrated' }> => f.tag === 'migrated')
    .map(f => `# === File: ${displayPath(f.file)} ===\n${f.output}\n`)
    .join('\n');
}

function colorFor(colors: chalk.Chalk, d: Diagnostic): chalk.Chalk {
  return d.severity === 'error' ? colors.red : d.severity === 'warning' ? colors.yellow : colors.gray;
}

export function summarize(batch: BatchOutcome): SummaryStats {
  const stats: SummaryStats = { files: batch.files.length, annotated: 0, skipped: 0, errors: 0 };
  for (const f of batch.files) {
    if (f.tag === 'failed') {
      stats.errors++;
      continue;
    }
    stats.annotated += f.edits.length;
    stats.skipped += f.result.decisions.filter(d => d.result.tag === 'skip').length;
    stats.errors += f.result.errors.filter(e => e.kind !== 'MalformedReturn').length;
  }
  return stats;
}

/**
 * Report lines for stderr: diagnostics per file, one status line per file
 * in check and in-place modes, then the summary.
 */
export function renderReport(
  batch: BatchOutcome,
  options: MigrateOptions,
  messages: Messages,
  colors: chalk.Chalk = chalk.stderr,
): string[] {
  const lines: string[] = [];

  if (batch.mode === 'directory' && batch.files.length === 0 && batch.pending.length === 0) {
    lines.push(colors.yellow(messages.noConfFiles(batch.target)));
    return lines;
  }

  for (const f of batch.files) {
    const name = displayPath(f.file);
    if (f.tag === 'failed') {
      lines.push(colors.red(`${name}: ${messages.processingError(f.error)}`));
      continue;
    }

    const shown = options.verbose ? f.diagnostics : f.diagnostics.filter(d => d.severity !== 'info');
    for (const d of shown) {
      lines.push(colorFor(colors, d)(formatDiagnostic(d, name)));
    }

    if (options.check && f.edits.length > 0) {
      lines.push(colors.yellow(messages.wouldAnnotate(name, f.edits.length)));
    } else if (f.written) {
      lines.push(colors.green(messages.annotated(name, f.edits.length)));
    } else if (options.inPlace || options.verbose) {
      lines.push(messages.unchanged(name));
    }
  }

  if (batch.pending.length > 0) {
    lines.push(colors.yellow(messages.cancelled));
  }

  const stats = summarize(batch);
  const summary = messages.summary(stats);
  lines.push(stats.errors > 0 ? colors.red(summary) : colors.green(summary));
  return lines;
}

/**
 * Help text. The short form (no arguments given) ends with a pointer to
 * `--help`; the full form lists the supported types instead.
 */
export function renderUsage(messages: Messages, full: boolean, colors: chalk.Chalk = chalk): string {
  const indent = (xs: string[]): string => xs.map(x => `  ${x}`).join('\n');
  const lines = [
    '',
    colors.cyan(messages.usageTitle),
    '',
    colors.yellow(messages.usage),
    '  bird-typefill <config_file_or_directory> [options]',
    '',
    colors.yellow(messages.examples),
    indent(messages.exampleLines),
    '',
    colors.yellow(messages.options),
    indent(messages.optionLines),
    '',
  ];

  if (full) {
    lines.push(colors.yellow(messages.supportedTypes), indent(messages.typeLines), '', messages.note);
  } else {
    lines.push(colors.green(messages.detailedHelp));
  }
  lines.push('');
  return lines.join('\n');
}
