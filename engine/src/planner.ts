/**
 * Edit planning: turns per-function decisions into text insertions and
 * applies them to the original source.
 */

import { MalformedReturnError } from './errors';
import { reconcile } from './reconciler';
import {
  ClassifiedReturn,
  FunctionDefinition,
  FunctionTypeDecision,
  RewriteEdit,
  typeName,
} from './types';

/**
 * Decide what happens to one function. An existing annotation always wins,
 * which keeps a second run over migrated output a no-op.
 */
export function decide(
  fn: FunctionDefinition,
  returns: readonly ClassifiedReturn[] | MalformedReturnError,
): FunctionTypeDecision {
  if (fn.existingReturnTypeSpan) {
    const kept = returns instanceof MalformedReturnError ? [] : [...returns];
    return { fn, returns: kept, result: { tag: 'keep', reason: 'annotated' } };
  }
  if (returns instanceof MalformedReturnError) {
    return { fn, returns: [], result: { tag: 'skip', reason: 'malformed-return' } };
  }
  return { fn, returns: [...returns], result: reconcile(returns) };
}

/** One edit per `insert` decision, in ascending offset order. */
export function planEdits(decisions: readonly FunctionTypeDecision[]): RewriteEdit[] {
  const edits: RewriteEdit[] = [];
  for (const decision of decisions) {
    if (decision.result.tag !== 'insert') continue;
    edits.push({
      insertionPoint: decision.fn.insertionPoint,
      text: ` -> ${typeName(decision.result.type)}`,
    });
  }
  return edits.sort((a, b) => a.insertionPoint - b.insertionPoint);
}

/**
 * Apply edits to the source they were planned against. Edits are applied
 * from the highest offset down so earlier offsets stay valid.
 */
export function applyEdits(source: string, edits: readonly RewriteEdit[]): string {
  const ordered = [...edits].sort((a, b) => b.insertionPoint - a.insertionPoint);
  let output = source;
  let previous = Number.POSITIVE_INFINITY;

  for (const edit of ordered) {
    if (edit.insertionPoint < 0 || edit.insertionPoint > source.length) {
      throw new RangeError(`Edit offset ${edit.insertionPoint} is outside the source`);
    }
    if (edit.insertionPoint === previous) {
      throw new RangeError(`Overlapping edits at offset ${edit.insertionPoint}`);
    }
    output = output.slice(0, edit.insertionPoint) + edit.text + output.slice(edit.insertionPoint);
    previous = edit.insertionPoint;
  }

  return output;
}
