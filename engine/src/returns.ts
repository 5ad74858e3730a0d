/**
 * Return-statement extraction.
 *
 * Every `return` inside a function body counts, however deeply it sits in
 * `if`/`case` blocks. Its terminator is the next `;` at the return's own
 * depth, so a `;` inside a nested sub-block never ends the expression.
 */

import { MalformedReturnError } from './errors';
import { ScanCursor, Scanner } from './scanner';
import { FunctionDefinition, ReturnStatement, SourceSpan, mkSpan } from './types';

const RETURN_KEYWORD = 'return';

/**
 * Extract the return statements of `fn` in source order.
 * Throws `MalformedReturnError` for a `return` with no terminating `;`.
 */
export function extractReturns(scanner: Scanner, fn: FunctionDefinition): ReturnStatement[] {
  const inner = mkSpan(fn.bodySpan.start + 1, fn.bodySpan.end - 1);
  const statements: ReturnStatement[] = [];
  let cursor: ScanCursor = { offset: inner.start, depth: 0 };

  while (cursor.offset < inner.end) {
    const keyword = scanner.findKeyword(cursor, RETURN_KEYWORD, inner);
    if (keyword === undefined) break;

    const keywordOffset = keyword.offset;
    const exprStart = keywordOffset + RETURN_KEYWORD.length;
    const terminator = scanner.findNextTopLevelToken(exprStart, ';', inner);
    if (terminator === undefined) {
      throw new MalformedReturnError(keywordOffset);
    }

    const text = scanner.extract(mkSpan(exprStart, terminator));
    if (text.length === 0) {
      statements.push({ tag: 'void', keywordOffset });
    } else {
      statements.push({ tag: 'value', keywordOffset, exprSpan: trimSpan(scanner, exprStart, terminator), text });
    }

    // The expression is balanced, so the walk resumes at the return's own depth.
    cursor = { offset: terminator + 1, depth: keyword.depth };
  }

  return statements;
}

function trimSpan(scanner: Scanner, start: number, end: number): SourceSpan {
  const raw = scanner.source.slice(start, end);
  const lead = raw.length - raw.trimStart().length;
  const trail = raw.length - raw.trimEnd().length;
  return mkSpan(start + lead, end - trail);
}
