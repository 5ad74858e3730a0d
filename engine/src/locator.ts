/**
 * Function locator: finds `function` declarations at the top level of a
 * configuration file and records the spans the rest of the engine needs.
 *
 *   function name(params) [-> type] [local declarations;] { body }
 */

import {
  MalformedDeclarationError,
  ScanError,
  UnbalancedDelimiterError,
} from './errors';
import { Scanner } from './scanner';
import { FunctionDefinition, ScanIssue, SourceSpan, mkSpan } from './types';

const FUNCTION_KEYWORD = 'function';

export interface LocateResult {
  functions: FunctionDefinition[];
  errors: ScanIssue[];
}

/**
 * Locate every function declaration in source order. A malformed
 * declaration is reported and skipped; scanning resumes right after the
 * construct that failed.
 */
export function locateFunctions(scanner: Scanner): LocateResult {
  const functions: FunctionDefinition[] = [];
  const errors: ScanIssue[] = [];
  const whole = mkSpan(0, scanner.length);
  let offset = 0;

  while (offset < scanner.length) {
    let keyword: number | undefined;
    try {
      keyword = findTopLevelKeyword(scanner, offset, whole);
    } catch (e) {
      if (!(e instanceof UnbalancedDelimiterError)) throw e;
      errors.push(e.toIssue());
      const resume = resumeAfter(scanner, e);
      if (resume === undefined) break;
      offset = resume;
      continue;
    }
    if (keyword === undefined) break;

    const parsed = parseDeclaration(scanner, keyword);
    if (parsed.ok) {
      functions.push(parsed.fn);
      offset = parsed.fn.bodySpan.end;
      continue;
    }

    errors.push(parsed.error.toIssue(parsed.name));
    if (parsed.error instanceof UnbalancedDelimiterError) {
      const resume = resumeAfter(scanner, parsed.error);
      if (resume === undefined) break;
      offset = resume;
    } else {
      offset = parsed.resumeAt;
    }
  }

  return { functions, errors };
}

/**
 * Where scanning picks up after an unterminated string or block comment:
 * the next line for a string (literals never span lines), nowhere for a
 * block comment, which swallows the rest of the file.
 */
function resumeAfter(scanner: Scanner, error: UnbalancedDelimiterError): number | undefined {
  if (error.delimiter !== 'string') return undefined;
  const newline = scanner.source.indexOf('\n', error.offset);
  return newline === -1 ? undefined : newline + 1;
}

/**
 * Like `Scanner.findNextTopLevelToken`, but a stray closing bracket at the
 * top level does not end the search: the file has no enclosing construct.
 */
function findTopLevelKeyword(scanner: Scanner, from: number, within: SourceSpan): number | undefined {
  let floor = 0;
  for (const unit of scanner.units({ offset: from, depth: 0 }, within.end)) {
    if (unit.depth < floor) floor = unit.depth;
    if (unit.depth === floor && scanner.matchesAt(unit.offset, FUNCTION_KEYWORD)) {
      return unit.offset;
    }
  }
  return undefined;
}

type ParseOutcome =
  | { ok: true; fn: FunctionDefinition }
  | { ok: false; error: ScanError; name?: string; resumeAt: number };

function parseDeclaration(scanner: Scanner, keywordOffset: number): ParseOutcome {
  const src = scanner.source;
  const afterKeyword = keywordOffset + FUNCTION_KEYWORD.length;
  let name: string | undefined;

  const fail = (error: ScanError, resumeAt: number): ParseOutcome => ({
    ok: false,
    error,
    name,
    resumeAt,
  });

  try {
    const nameStart = scanner.skipTrivia(afterKeyword);
    const nameEnd = scanner.identifierEnd(nameStart);
    if (nameEnd === nameStart) {
      return fail(new MalformedDeclarationError('expected a function name', nameStart), afterKeyword);
    }
    name = src.slice(nameStart, nameEnd);

    const paramOpen = scanner.skipTrivia(nameEnd);
    if (src[paramOpen] !== '(') {
      return fail(
        new MalformedDeclarationError(`expected '(' after function name '${name}'`, paramOpen),
        afterKeyword,
      );
    }

    let paramClose: number;
    try {
      paramClose = scanner.skipToMatchingClose(paramOpen);
    } catch (e) {
      if (isUnclosedBracket(e)) {
        return fail(new MalformedDeclarationError('parameter list is never closed', paramOpen), paramOpen + 1);
      }
      throw e;
    }

    let cursor = scanner.skipTrivia(paramClose);
    let existingReturnTypeSpan: SourceSpan | undefined;

    if (src.startsWith('->', cursor)) {
      const typeStart = scanner.skipTrivia(cursor + 2);
      const typeEnd = findSignatureStop(scanner, typeStart);
      const typeText = src.slice(typeStart, typeEnd).trimEnd();
      if (typeText.length === 0) {
        return fail(new MalformedDeclarationError(`missing return type after '->'`, cursor), paramClose);
      }
      existingReturnTypeSpan = mkSpan(typeStart, typeStart + typeText.length);
      cursor = typeEnd;
    }

    const bodyOpen = findBodyOpen(scanner, cursor);
    if (bodyOpen === undefined) {
      return fail(
        new MalformedDeclarationError(`expected '{' to open the body of '${name}'`, cursor),
        paramClose,
      );
    }

    let bodyClose: number;
    try {
      bodyClose = scanner.skipToMatchingClose(bodyOpen);
    } catch (e) {
      if (isUnclosedBracket(e)) {
        return fail(new MalformedDeclarationError(`body of '${name}' is never closed`, bodyOpen), bodyOpen + 1);
      }
      throw e;
    }

    const fn: FunctionDefinition = {
      name,
      keywordOffset,
      paramListSpan: mkSpan(paramOpen, paramClose),
      bodySpan: mkSpan(bodyOpen, bodyClose),
      insertionPoint: paramClose,
    };
    if (existingReturnTypeSpan) fn.existingReturnTypeSpan = existingReturnTypeSpan;
    return { ok: true, fn };
  } catch (e) {
    if (e instanceof ScanError) {
      return fail(e, afterKeyword);
    }
    throw e;
  }
}

function isUnclosedBracket(e: unknown): boolean {
  return e instanceof UnbalancedDelimiterError && e.delimiter === 'bracket';
}

/** First depth-0 `{` or `;` at or after `from`. */
function findSignatureStop(scanner: Scanner, from: number): number {
  for (const unit of scanner.units({ offset: from, depth: 0 })) {
    if (unit.depth === 0 && (unit.char === '{' || unit.char === ';')) return unit.offset;
  }
  return scanner.length;
}

/**
 * The body's `{`. Legacy local variable declarations may sit between the
 * signature and the body; another `function` keyword or a closing bracket
 * first means the body is missing.
 */
function findBodyOpen(scanner: Scanner, from: number): number | undefined {
  for (const unit of scanner.units({ offset: from, depth: 0 })) {
    if (unit.depth < 0) return undefined;
    if (unit.depth !== 0) continue;
    if (unit.char === '{') return unit.offset;
    if (scanner.matchesAt(unit.offset, FUNCTION_KEYWORD)) return undefined;
  }
  return undefined;
}
