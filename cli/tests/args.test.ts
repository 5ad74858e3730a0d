/**
 * Tests for command-line argument parsing.
 */

import { parseArgs } from '../src/args';
import { UsageError } from '../src/errors';

describe('parseArgs', () => {
  test('a lone path', () => {
    expect(parseArgs(['bird.conf'])).toEqual({ help: false, overrides: {}, path: 'bird.conf' });
  });

  test('flags map onto option overrides', () => {
    const parsed = parseArgs(['-i', '--no-recursive', '-v', '-j', '4', '--lang', 'zh', '/etc/bird']);
    expect(parsed.path).toBe('/etc/bird');
    expect(parsed.overrides).toEqual({ inPlace: true, recursive: false, verbose: true, jobs: 4, lang: 'zh' });
  });

  test('long forms', () => {
    const parsed = parseArgs(['--in-place', '--jobs', '2', '--verbose', 'x.conf']);
    expect(parsed.overrides).toEqual({ inPlace: true, jobs: 2, verbose: true });
  });

  test('--check and --config', () => {
    const parsed = parseArgs(['--check', '--config', 'typefill.json', 'dir']);
    expect(parsed.overrides).toEqual({ check: true });
    expect(parsed.configPath).toBe('typefill.json');
  });

  test('--help without a path', () => {
    const parsed = parseArgs(['--help']);
    expect(parsed.help).toBe(true);
    expect(parsed.path).toBeUndefined();
  });

  test('unknown option', () => {
    expect(() => parseArgs(['--bogus', 'x'])).toThrow(new UsageError('Unknown option: --bogus'));
  });

  test('more than one path', () => {
    expect(() => parseArgs(['a.conf', 'b.conf'])).toThrow(UsageError);
  });

  test('--jobs needs a positive integer', () => {
    expect(() => parseArgs(['--jobs', '0', 'x'])).toThrow('--jobs must be a positive integer');
    expect(() => parseArgs(['-j', 'many', 'x'])).toThrow('-j must be a positive integer');
  });

  test('an option missing its value', () => {
    expect(() => parseArgs(['--jobs'])).toThrow('--jobs requires a value');
    expect(() => parseArgs(['--config', '-i', 'x'])).toThrow('--config requires a value');
  });

  test('unsupported language', () => {
    expect(() => parseArgs(['--lang', 'fr', 'x'])).toThrow('--lang must be one of: en, zh');
  });

  test('--in-place and --check exclude each other', () => {
    expect(() => parseArgs(['-i', '--check', 'x'])).toThrow(UsageError);
  });
});
