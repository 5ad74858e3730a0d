/**
 * Type classifier: maps the surface syntax of a return expression to an
 * entry of the type lattice.
 *
 * Rules are tried in `TYPE_PRIORITY` order and the first match wins, so
 * `{1}` is a set (the int rule needs a bare literal or arithmetic) and
 * `1.2.3.4/32` is a prefix (the int rule rejects the dotted operand).
 * Nothing here resolves symbols: `a + b` is unclassified because neither
 * operand is recognizably an integer.
 */

import { isIPv4, isIPv6 } from 'net';
import { ScanError } from './errors';
import { Scanner } from './scanner';
import { InferredType, LatticeType, TYPE_PRIORITY } from './types';

const INT_LITERAL = /^\d+$/;
const MASK_CALL = /^(.*)\.mask\(\s*(\d+)\s*\)$/;
const ARITHMETIC = '+-*/%';
const COMPARISON = '=<>~!';

type Rule = (expr: string) => boolean;

const RULES: Record<LatticeType, Rule> = {
  int: isIntExpression,
  pair: isPair,
  ip: isIp,
  prefix: isPrefix,
  string: isStringLiteral,
  set: isSet,
  bool: isBool,
};

/**
 * Classify one return expression. Unbalanced or otherwise unreadable text
 * is `unclassified`.
 */
export function classify(text: string): InferredType {
  const expr = text.trim();
  if (expr.length === 0) return 'unclassified';

  try {
    for (const type of TYPE_PRIORITY) {
      if (RULES[type](expr)) return type;
    }
  } catch (e) {
    if (e instanceof ScanError) return 'unclassified';
    throw e;
  }
  return 'unclassified';
}

// ---------------------------------------------------------------------------
// Shape helpers
// ---------------------------------------------------------------------------

/** Does the bracket opening at 0 close exactly at the end of `expr`? */
function wrapsWhole(expr: string, open: '(' | '{'): boolean {
  if (expr[0] !== open) return false;
  return new Scanner(expr).skipToMatchingClose(0) === expr.length;
}

/** Offsets of depth-0 code characters accepted by `accept`. */
function topLevelOffsets(expr: string, accept: (ch: string, offset: number) => boolean): number[] {
  const offsets: number[] = [];
  for (const unit of new Scanner(expr).units({ offset: 0, depth: 0 })) {
    if (unit.depth === 0 && accept(unit.char, unit.offset)) offsets.push(unit.offset);
  }
  return offsets;
}

function unwrapParens(expr: string): string {
  let current = expr;
  while (wrapsWhole(current, '(')) {
    const inner = current.slice(1, -1).trim();
    if (topLevelOffsets(inner, ch => ch === ',').length > 0) break;
    current = inner;
  }
  return current;
}

function isIpLiteral(text: string): boolean {
  return isIPv4(text) || isIPv6(text);
}

// ---------------------------------------------------------------------------
// Rules
// ---------------------------------------------------------------------------

function isIntExpression(expr: string): boolean {
  const text = expr.trim();
  if (text.length === 0) return false;
  if (INT_LITERAL.test(text)) return true;
  if (text[0] === '-') return isIntExpression(text.slice(1));
  if (wrapsWhole(text, '(')) return isIntExpression(text.slice(1, -1));

  // A sign is binary when it follows an operand, not another operator.
  const operators = topLevelOffsets(text, (ch, offset) => {
    if (!ARITHMETIC.includes(ch)) return false;
    const before = text.slice(0, offset).trimEnd();
    const prev = before[before.length - 1];
    return prev !== undefined && !ARITHMETIC.includes(prev) && prev !== ',' && prev !== '(';
  });
  if (operators.length === 0) return false;

  let start = 0;
  for (const offset of [...operators, text.length]) {
    if (!isIntExpression(text.slice(start, offset))) return false;
    start = offset + 1;
  }
  return true;
}

function isPair(expr: string): boolean {
  if (!wrapsWhole(expr, '(')) return false;
  const inner = expr.slice(1, -1);
  const commas = topLevelOffsets(inner, ch => ch === ',');
  if (commas.length !== 1) return false;
  const [comma] = commas;
  return inner.slice(0, comma).trim() !== '' && inner.slice(comma + 1).trim() !== '';
}

function isIp(expr: string): boolean {
  const mask = MASK_CALL.exec(expr);
  return isIpLiteral(mask ? mask[1].trim() : expr);
}

function isPrefix(expr: string): boolean {
  if (expr === 'net') return true;

  const mask = MASK_CALL.exec(expr);
  if (mask) return mask[1].trim() === 'net';

  const slash = expr.lastIndexOf('/');
  if (slash === -1) return false;
  const address = expr.slice(0, slash).trim();
  const length = expr.slice(slash + 1).trim();
  if (!INT_LITERAL.test(length)) return false;

  const bits = Number(length);
  if (isIPv4(address)) return bits <= 32;
  if (isIPv6(address)) return bits <= 128;
  return false;
}

function isStringLiteral(expr: string): boolean {
  if (expr[0] !== '"') return false;
  return new Scanner(expr).regionEnd(0) === expr.length;
}

function isSet(expr: string): boolean {
  return wrapsWhole(expr, '{');
}

function isBool(expr: string): boolean {
  const text = unwrapParens(expr);
  if (text === 'true' || text === 'false') return true;

  const operators = topLevelOffsets(text, (ch, offset) => {
    if (COMPARISON.includes(ch)) return true;
    const next = text[offset + 1];
    return (ch === '&' && next === '&') || (ch === '|' && next === '|');
  });
  return operators.length > 0;
}
