/**
 * Tests for the lexical scanner: bracket matching, string and comment
 * skipping, and depth-aware token search.
 */

import { Scanner } from '../src/scanner';
import { UnbalancedDelimiterError } from '../src/errors';
import { mkSpan } from '../src/types';

function whole(src: string) {
  return mkSpan(0, src.length);
}

// ==================================================================
// Strings and comments
// ==================================================================

describe('regionEnd', () => {
  test('an escaped quote does not end a string', () => {
    const src = '"a\\"b" x';
    expect(new Scanner(src).regionEnd(0)).toBe(6);
  });

  test('line comments run to the newline', () => {
    const src = '# note\nnext';
    expect(new Scanner(src).regionEnd(0)).toBe(6);
  });

  test('block comments run past their closing marker', () => {
    const src = '/* a { b */ c';
    expect(new Scanner(src).regionEnd(0)).toBe(11);
  });

  test('plain code is not a region', () => {
    expect(new Scanner('abc').regionEnd(0)).toBeUndefined();
  });

  test('unterminated block comment throws', () => {
    expect(() => new Scanner('/* open').regionEnd(0)).toThrow(UnbalancedDelimiterError);
  });

  test('a string may not span lines', () => {
    try {
      new Scanner('"abc\ndef"').regionEnd(0);
      throw new Error('expected a throw');
    } catch (e) {
      expect(e).toBeInstanceOf(UnbalancedDelimiterError);
      if (e instanceof UnbalancedDelimiterError) {
        expect(e.delimiter).toBe('string');
        expect(e.offset).toBe(0);
      }
    }
  });
});

// ==================================================================
// Bracket matching
// ==================================================================

describe('skipToMatchingClose', () => {
  test('skips nested brackets, strings and comments', () => {
    const src = '{ a { b } "}" # }\n c } tail';
    expect(new Scanner(src).skipToMatchingClose(0)).toBe(src.indexOf(' tail'));
  });

  test('matches parentheses inside braces', () => {
    const src = 'f(a, (b), "(") rest';
    expect(new Scanner(src).skipToMatchingClose(1)).toBe(src.indexOf(' rest'));
  });

  test('throws when the text ends first', () => {
    expect(() => new Scanner('{ (').skipToMatchingClose(0)).toThrow(UnbalancedDelimiterError);
  });

  test('throws on an unterminated string inside the brackets', () => {
    try {
      new Scanner('f("abc)').skipToMatchingClose(1);
      throw new Error('expected a throw');
    } catch (e) {
      expect(e).toBeInstanceOf(UnbalancedDelimiterError);
      if (e instanceof UnbalancedDelimiterError) {
        expect(e.delimiter).toBe('string');
        expect(e.offset).toBe(2);
      }
    }
  });

  test('rejects an offset that is not an opening bracket', () => {
    expect(() => new Scanner('abc').skipToMatchingClose(0)).toThrow(RangeError);
  });
});

describe('units', () => {
  test('opening and closing brackets share a depth', () => {
    const scanner = new Scanner('(a)');
    const depths = [...scanner.units({ offset: 0, depth: 0 })].map(u => [u.char, u.depth]);
    expect(depths).toEqual([
      ['(', 0],
      ['a', 1],
      [')', 0],
    ]);
  });

  test('skips string and comment contents', () => {
    const scanner = new Scanner('a "b" # c\nd');
    const chars = [...scanner.units({ offset: 0, depth: 0 })].map(u => u.char).join('');
    expect(chars).toBe('a  \nd');
  });

  test('cursors resume a walk where it stopped', () => {
    const scanner = new Scanner('{ x }');
    const [, second] = scanner.units({ offset: 0, depth: 0 });
    const rest = [...scanner.units(second.next)].map(u => [u.char, u.depth]);
    expect(rest).toEqual([
      ['x', 1],
      [' ', 1],
      ['}', 0],
    ]);
  });
});

// ==================================================================
// Token search
// ==================================================================

describe('findNextTopLevelToken', () => {
  test('skips tokens nested deeper than the start', () => {
    const src = 'a (b; c); d;';
    expect(new Scanner(src).findNextTopLevelToken(0, ';', whole(src))).toBe(8);
  });

  test('gives up when an enclosing bracket closes', () => {
    const src = 'x ) ;';
    expect(new Scanner(src).findNextTopLevelToken(0, ';', whole(src))).toBeUndefined();
  });

  test('ignores tokens in strings and comments', () => {
    const src = '"a;b" # ;\n ;';
    expect(new Scanner(src).findNextTopLevelToken(0, ';', whole(src))).toBe(11);
  });

  test('stays inside the given span', () => {
    const src = 'a b; c;';
    expect(new Scanner(src).findNextTopLevelToken(0, ';', mkSpan(0, 3))).toBeUndefined();
  });
});

describe('findKeyword', () => {
  test('finds a keyword at a deeper depth', () => {
    const src = 'if x then { return 1; }';
    expect(new Scanner(src).findKeyword({ offset: 0, depth: 0 }, 'return', whole(src))).toMatchObject({
      offset: 12,
      depth: 1,
    });
  });

  test('a cursor resumed inside a block keeps searching after the block closes', () => {
    const src = 'if x then { return 1; } return 2;';
    const scanner = new Scanner(src);
    expect(scanner.findKeyword({ offset: 21, depth: 1 }, 'return', whole(src))).toMatchObject({
      offset: 24,
      depth: 0,
    });
  });

  test('stops when a bracket enclosing the start closes', () => {
    const src = 'if x then { return 1; } return 2;';
    expect(new Scanner(src).findKeyword({ offset: 21, depth: 0 }, 'return', whole(src))).toBeUndefined();
  });

  test('matches whole words only', () => {
    const scanner = new Scanner('myreturn return returned');
    expect(scanner.matchesAt(2, 'return')).toBe(false);
    expect(scanner.matchesAt(9, 'return')).toBe(true);
    expect(scanner.matchesAt(16, 'return')).toBe(false);
  });
});

// ==================================================================
// Helpers
// ==================================================================

describe('skipTrivia', () => {
  test('skips whitespace and both comment styles', () => {
    const src = '  # c\n  /* x */ y';
    expect(new Scanner(src).skipTrivia(0)).toBe(src.indexOf('y'));
  });
});

describe('identifierEnd', () => {
  test('reads an identifier', () => {
    expect(new Scanner('is_bogon(').identifierEnd(0)).toBe(8);
  });

  test('returns the start when no identifier begins there', () => {
    expect(new Scanner('(x)').identifierEnd(0)).toBe(0);
  });
});

describe('extract', () => {
  test('drops comments and collapses whitespace outside strings', () => {
    const src = '  1 +   2 # note\n /* c */ "a  b" ';
    expect(new Scanner(src).extract(whole(src))).toBe('1 + 2 "a  b"');
  });
});
