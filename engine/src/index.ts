/**
 * Return-type inference engine.
 *
 * Pipeline per file: locate functions, extract their return statements,
 * classify each expression, reconcile per function, plan edits. The engine
 * reads nothing but the text it is given and never writes anything.
 */

import { classify } from './classifier';
import { MalformedReturnError } from './errors';
import { locateFunctions } from './locator';
import { applyEdits, decide, planEdits } from './planner';
import { extractReturns } from './returns';
import { Scanner } from './scanner';
import { ClassifiedReturn, FunctionDefinition, RewriteEdit, ScanIssue, ScanResult } from './types';

export * from './types';
export * from './errors';
export { Scanner, ScanCursor, ScanUnit } from './scanner';
export { locateFunctions, LocateResult } from './locator';
export { extractReturns } from './returns';
export { classify } from './classifier';
export { reconcile } from './reconciler';
export { decide, planEdits, applyEdits } from './planner';
export {
  Diagnostic,
  Severity,
  Position,
  positionAt,
  toDiagnostics,
  formatDiagnostic,
  formatDiagnostics,
} from './diagnostics';

/**
 * Scan one file and decide, per function, whether to annotate it.
 */
export function scanFile(source: string): ScanResult {
  const scanner = new Scanner(source);
  const located = locateFunctions(scanner);
  const errors: ScanIssue[] = [...located.errors];

  const decisions = located.functions.map(fn => {
    if (fn.existingReturnTypeSpan) return decide(fn, []);

    const returns = classifyReturns(scanner, fn);
    if (returns instanceof MalformedReturnError) {
      errors.push(returns.toIssue(fn.name));
    }
    return decide(fn, returns);
  });

  errors.sort((a, b) => a.offset - b.offset);
  return { decisions, errors };
}

function classifyReturns(scanner: Scanner, fn: FunctionDefinition): ClassifiedReturn[] | MalformedReturnError {
  try {
    const classified: ClassifiedReturn[] = [];
    for (const statement of extractReturns(scanner, fn)) {
      if (statement.tag === 'value') {
        classified.push({ statement, type: classify(statement.text) });
      }
    }
    return classified;
  } catch (e) {
    if (e instanceof MalformedReturnError) return e;
    throw e;
  }
}

export interface MigrationResult {
  output: string;
  result: ScanResult;
  edits: RewriteEdit[];
}

/**
 * Scan, plan and apply in one step.
 */
export function migrate(source: string): MigrationResult {
  const result = scanFile(source);
  const edits = planEdits(result.decisions);
  return { output: applyEdits(source, edits), result, edits };
}
