/**
 * Error types raised while scanning a configuration file.
 *
 * None of these escape `scanFile`: they are caught per function and turned
 * into `ScanIssue` entries for the driver to report.
 */

import { ErrorKind, ScanIssue } from './types';

export class TypefillError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'TypefillError';
  }
}

export abstract class ScanError extends TypefillError {
  abstract readonly kind: ErrorKind;
  public readonly offset: number;

  constructor(message: string, offset: number) {
    super(message);
    this.name = 'ScanError';
    this.offset = offset;
  }

  toIssue(functionName?: string): ScanIssue {
    const issue: ScanIssue = { kind: this.kind, offset: this.offset, message: this.message };
    if (functionName !== undefined) issue.functionName = functionName;
    return issue;
  }
}

export type Delimiter = 'bracket' | 'string' | 'block-comment';

const DELIMITER_NAMES: Record<Delimiter, string> = {
  bracket: 'bracket',
  string: 'string literal',
  'block-comment': 'block comment',
};

/** A bracket, string or block comment never closes. */
export class UnbalancedDelimiterError extends ScanError {
  readonly kind = 'UnbalancedDelimiter';
  public readonly delimiter: Delimiter;

  constructor(delimiter: Delimiter, offset: number, detail?: string) {
    super(`unterminated ${detail ?? DELIMITER_NAMES[delimiter]}`, offset);
    this.name = 'UnbalancedDelimiterError';
    this.delimiter = delimiter;
  }
}

export class MalformedDeclarationError extends ScanError {
  readonly kind = 'MalformedDeclaration';

  constructor(message: string, offset: number) {
    super(message, offset);
    this.name = 'MalformedDeclarationError';
  }
}

/** A `return` with no terminating `;` inside the function body. */
export class MalformedReturnError extends ScanError {
  readonly kind = 'MalformedReturn';

  constructor(offset: number) {
    super(`return statement has no terminating ';'`, offset);
    this.name = 'MalformedReturnError';
  }
}
