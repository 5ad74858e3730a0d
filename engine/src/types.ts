/**
 * Core data model for the return-type inference engine.
 *
 * Every offset below is an index into one immutable source string owned by
 * the caller. The engine never mutates that string; it only plans edits.
 */

// ---------------------------------------------------------------------------
// Spans
// ---------------------------------------------------------------------------

/** Half-open range `[start, end)` into the source text. */
export interface SourceSpan {
  start: number;
  end: number;
}

export function mkSpan(start: number, end: number): SourceSpan {
  if (start > end) {
    throw new RangeError(`Invalid span [${start}, ${end})`);
  }
  return { start, end };
}

// ---------------------------------------------------------------------------
// Functions and return statements
// ---------------------------------------------------------------------------

export interface FunctionDefinition {
  name: string;
  /** Offset of the `function` keyword */
  keywordOffset: number;
  /** `(` through `)` inclusive */
  paramListSpan: SourceSpan;
  /** Trimmed type text after `->`, when the declaration already has one */
  existingReturnTypeSpan?: SourceSpan;
  /** `{` through the matching `}` inclusive */
  bodySpan: SourceSpan;
  /** Where ` -> <type>` goes: right after the parameter list */
  insertionPoint: number;
}

export type ReturnStatement =
  | { tag: 'value'; keywordOffset: number; exprSpan: SourceSpan; text: string }
  | { tag: 'void'; keywordOffset: number };

// ---------------------------------------------------------------------------
// Type lattice
// ---------------------------------------------------------------------------

export type LatticeType = 'int' | 'pair' | 'ip' | 'prefix' | 'string' | 'set' | 'bool';

export type InferredType = LatticeType | 'unclassified';

/** Inference priority, highest first. */
export const TYPE_PRIORITY: readonly LatticeType[] = [
  'int',
  'pair',
  'ip',
  'prefix',
  'string',
  'set',
  'bool',
];

/**
 * Render a lattice type the way it is written in a function signature.
 * Pair element types are not inferred; they are always `int, int`.
 */
export function typeName(type: LatticeType): string {
  switch (type) {
    case 'pair':
      return 'pair (int, int)';
    case 'int':
    case 'ip':
    case 'prefix':
    case 'string':
    case 'set':
    case 'bool':
      return type;
  }
}

// ---------------------------------------------------------------------------
// Decisions and edits
// ---------------------------------------------------------------------------

export type KeepReason = 'annotated' | 'void';

export type SkipReason = 'ambiguous' | 'unrecognized' | 'malformed-return';

export type Resolution =
  | { tag: 'keep'; reason: KeepReason }
  | { tag: 'insert'; type: LatticeType }
  | { tag: 'skip'; reason: SkipReason };

export interface FunctionTypeDecision {
  fn: FunctionDefinition;
  /** Classified value returns; empty when extraction failed */
  returns: ClassifiedReturn[];
  result: Resolution;
}

export interface ClassifiedReturn {
  statement: Extract<ReturnStatement, { tag: 'value' }>;
  type: InferredType;
}

export interface RewriteEdit {
  insertionPoint: number;
  text: string;
}

// ---------------------------------------------------------------------------
// Scan results
// ---------------------------------------------------------------------------

export type ErrorKind = 'UnbalancedDelimiter' | 'MalformedDeclaration' | 'MalformedReturn';

export interface ScanIssue {
  kind: ErrorKind;
  offset: number;
  functionName?: string;
  message: string;
}

export interface ScanResult {
  decisions: FunctionTypeDecision[];
  errors: ScanIssue[];
}
