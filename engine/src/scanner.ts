/**
 * Lexical scanner for BIRD filter configuration text.
 *
 * The scanner knows just enough of the language to walk it safely:
 * string literals (`"..."` and `'...'`, backslash escapes, no newlines),
 * `#` line comments, `/* ... *\/` block comments, and the three bracket
 * pairs, which share one nesting counter.
 *
 * All walking state lives in an explicit `ScanCursor`. String literals and
 * comments are consumed whole, so a cursor only ever rests on code. One
 * `Scanner` instance holds nothing but the source text and can be shared.
 */

import { UnbalancedDelimiterError } from './errors';
import { SourceSpan } from './types';

const OPENERS = '{([';
const CLOSERS = '})]';

export interface ScanCursor {
  readonly offset: number;
  /** Bracket depth relative to wherever the walk started */
  readonly depth: number;
}

/** One code character (outside strings and comments). */
export interface ScanUnit {
  offset: number;
  char: string;
  /** An opening bracket and its matching close report the same depth */
  depth: number;
  /** Cursor positioned just past this character */
  next: ScanCursor;
}

export function isIdentChar(ch: string | undefined): boolean {
  return ch !== undefined && /^[A-Za-z0-9_]$/.test(ch);
}

function isIdentStart(ch: string | undefined): boolean {
  return ch !== undefined && /^[A-Za-z_]$/.test(ch);
}

export class Scanner {
  readonly source: string;

  constructor(source: string) {
    this.source = source;
  }

  get length(): number {
    return this.source.length;
  }

  /**
   * If a string literal or comment starts at `offset`, return the offset just
   * past it; otherwise `undefined`.
   */
  regionEnd(offset: number): number | undefined {
    const src = this.source;
    const ch = src[offset];

    if (ch === '"' || ch === "'") {
      let i = offset + 1;
      while (i < src.length) {
        const c = src[i];
        if (c === '\\') {
          i += 2;
          continue;
        }
        if (c === ch) return i + 1;
        if (c === '\n') break;
        i++;
      }
      throw new UnbalancedDelimiterError('string', offset);
    }

    if (ch === '#') {
      const newline = src.indexOf('\n', offset);
      return newline === -1 ? src.length : newline;
    }

    if (ch === '/' && src[offset + 1] === '*') {
      const close = src.indexOf('*/', offset + 2);
      if (close === -1) {
        throw new UnbalancedDelimiterError('block-comment', offset);
      }
      return close + 2;
    }

    return undefined;
  }

  /**
   * Walk the code characters in `[from.offset, end)`.
   */
  *units(from: ScanCursor, end: number = this.source.length): Generator<ScanUnit> {
    let offset = from.offset;
    let depth = from.depth;

    while (offset < end) {
      const skipped = this.regionEnd(offset);
      if (skipped !== undefined) {
        offset = skipped;
        continue;
      }

      const char = this.source[offset];
      if (CLOSERS.includes(char)) depth--;
      const unitDepth = depth;
      if (OPENERS.includes(char)) depth++;

      offset++;
      yield { offset: offset - 1, char, depth: unitDepth, next: { offset, depth } };
    }
  }

  /**
   * Offset just past the bracket matching the opener at `openOffset`.
   */
  skipToMatchingClose(openOffset: number): number {
    const open = this.source[openOffset];
    if (!OPENERS.includes(open)) {
      throw new RangeError(`No opening bracket at offset ${openOffset}`);
    }

    for (const unit of this.units({ offset: openOffset, depth: 0 })) {
      if (unit.depth === 0 && CLOSERS.includes(unit.char)) {
        return unit.offset + 1;
      }
    }

    throw new UnbalancedDelimiterError('bracket', openOffset, `'${open}'`);
  }

  /**
   * Next occurrence of `token` at the same depth as `from`, inside `within`.
   * Gives up when a bracket enclosing `from` closes first.
   */
  findNextTopLevelToken(from: number, token: string, within: SourceSpan): number | undefined {
    for (const unit of this.units({ offset: from, depth: 0 }, within.end)) {
      if (unit.depth < 0) return undefined;
      if (unit.depth === 0 && this.matchesAt(unit.offset, token, within.end)) {
        return unit.offset;
      }
    }
    return undefined;
  }

  /**
   * Next occurrence of `keyword` at the depth of `from` or deeper, with the
   * depth it sits at. Depths count from the start of `within`, so a cursor
   * resumed inside a nested block keeps searching after that block closes.
   */
  findKeyword(from: ScanCursor, keyword: string, within: SourceSpan): ScanUnit | undefined {
    for (const unit of this.units(from, within.end)) {
      if (unit.depth < 0) return undefined;
      if (this.matchesAt(unit.offset, keyword, within.end)) {
        return unit;
      }
    }
    return undefined;
  }

  /**
   * Does `token` start at `offset`? Identifier-like tokens only match whole words.
   */
  matchesAt(offset: number, token: string, limit: number = this.source.length): boolean {
    if (offset + token.length > limit) return false;
    if (!this.source.startsWith(token, offset)) return false;
    if (!isIdentStart(token[0])) return true;
    return !isIdentChar(this.source[offset - 1]) && !isIdentChar(this.source[offset + token.length]);
  }

  /** Skip whitespace and comments. */
  skipTrivia(offset: number): number {
    const src = this.source;
    let i = offset;
    while (i < src.length) {
      if (/\s/.test(src[i])) {
        i++;
      } else if (src[i] === '#' || (src[i] === '/' && src[i + 1] === '*')) {
        i = this.regionEnd(i) ?? i + 1;
      } else {
        break;
      }
    }
    return i;
  }

  /** End offset of the identifier starting at `offset` (equal to `offset` if none). */
  identifierEnd(offset: number): number {
    if (!isIdentStart(this.source[offset])) return offset;
    let i = offset + 1;
    while (isIdentChar(this.source[i])) i++;
    return i;
  }

  /**
   * Text of `span` with comments dropped and whitespace runs collapsed to a
   * single space. String literals are kept exactly as written.
   */
  extract(span: SourceSpan): string {
    const src = this.source;
    let out = '';
    let pendingSpace = false;
    let i = span.start;

    const push = (text: string): void => {
      if (pendingSpace && out.length > 0) out += ' ';
      pendingSpace = false;
      out += text;
    };

    while (i < span.end) {
      const skipped = this.regionEnd(i);
      if (skipped !== undefined) {
        const ch = src[i];
        if (ch === '"' || ch === "'") {
          push(src.slice(i, Math.min(skipped, span.end)));
        } else {
          pendingSpace = true;
        }
        i = skipped;
        continue;
      }

      if (/\s/.test(src[i])) {
        pendingSpace = true;
      } else {
        push(src[i]);
      }
      i++;
    }

    return out;
  }
}
