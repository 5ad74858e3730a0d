/**
 * Diagnostic types and formatting for scan results.
 */

import { FunctionTypeDecision, ScanIssue, ScanResult, typeName } from './types';

export type Severity = 'error' | 'warning' | 'info';

export interface Diagnostic {
  severity: Severity;
  /** Short machine-readable tag, e.g. `skip:ambiguous` */
  code: string;
  message: string;
  /** 1-based line number */
  line: number;
  /** 0-based column */
  column: number;
}

export interface Position {
  line: number;
  column: number;
}

/**
 * Line and column of `offset` in `source`.
 */
export function positionAt(source: string, offset: number): Position {
  let line = 1;
  let lineStart = 0;
  const end = Math.min(offset, source.length);
  for (let i = 0; i < end; i++) {
    if (source[i] === '\n') {
      line++;
      lineStart = i + 1;
    }
  }
  return { line, column: end - lineStart };
}

function describeDecision(d: FunctionTypeDecision): Omit<Diagnostic, 'line' | 'column'> {
  const name = d.fn.name;
  const result = d.result;

  switch (result.tag) {
    case 'insert':
      return {
        severity: 'info',
        code: 'insert',
        message: `Function '${name}' annotated with '-> ${typeName(result.type)}'`,
      };
    case 'keep':
      return {
        severity: 'info',
        code: `keep:${result.reason}`,
        message: result.reason === 'annotated'
          ? `Function '${name}' already declares a return type`
          : `Function '${name}' returns no value`,
      };
    case 'skip': {
      const seen = [...new Set(d.returns.map(r => r.type))].join(', ');
      const message =
        result.reason === 'ambiguous' ? `Function '${name}' skipped: return sites disagree (${seen})`
        : result.reason === 'unrecognized' ? `Function '${name}' skipped: unrecognized return expression`
        : `Function '${name}' skipped: malformed return statement`;
      return { severity: 'warning', code: `skip:${result.reason}`, message };
    }
  }
}

function describeIssue(issue: ScanIssue): Omit<Diagnostic, 'line' | 'column'> {
  const where = issue.functionName ? ` in function '${issue.functionName}'` : '';
  return {
    severity: issue.kind === 'MalformedReturn' ? 'warning' : 'error',
    code: issue.kind,
    message: `${issue.message}${where}`,
  };
}

/**
 * Convert a scan result into positioned diagnostics, sorted by line then column.
 */
export function toDiagnostics(source: string, result: ScanResult): Diagnostic[] {
  const ds: Diagnostic[] = [];
  for (const d of result.decisions) {
    ds.push({ ...describeDecision(d), ...positionAt(source, d.fn.keywordOffset) });
  }
  for (const issue of result.errors) {
    ds.push({ ...describeIssue(issue), ...positionAt(source, issue.offset) });
  }
  return ds.sort((a, b) => a.line - b.line || a.column - b.column);
}

/**
 * Format a single diagnostic as a human-readable string.
 */
export function formatDiagnostic(d: Diagnostic, filename?: string): string {
  const loc = filename ? `${filename}:${d.line}:${d.column}` : `${d.line}:${d.column}`;
  const tag = d.severity === 'error' ? 'error' : d.severity === 'warning' ? 'warn' : 'info';
  return `  ${loc}  ${tag}  ${d.message}  (${d.code})`;
}

export function formatDiagnostics(ds: Diagnostic[], filename?: string): string {
  return ds.map(d => formatDiagnostic(d, filename)).join('\n');
}
