/**
 * Tests for the batch driver: file discovery, writing back, exit codes.
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { DEFAULT_OPTIONS, MigrateOptions } from '../src/config';
import { BatchOutcome, ExitCode, exitCodeFor, processFile, processPath } from '../src/driver';
import { PathNotFoundError } from '../src/errors';
import { decodeText, displayPath } from '../src/files';

const INT_FN = 'function f() { return 1; }\n';
const MIXED_FN = 'function g(int x) { if x > 0 then return 1; return "x"; }\n';

let root: string;

function options(overrides: Partial<MigrateOptions> = {}): MigrateOptions {
  return { ...DEFAULT_OPTIONS, jobs: 2, lang: 'en', ...overrides };
}

function write(relative: string, content: string | Buffer): string {
  const file = path.join(root, relative);
  fs.mkdirSync(path.dirname(file), { recursive: true });
  fs.writeFileSync(file, content);
  return file;
}

function read(relative: string): string {
  return fs.readFileSync(path.join(root, relative), 'utf-8');
}

function names(batch: BatchOutcome): string[] {
  return batch.files.map(f => path.relative(root, f.file));
}

beforeEach(() => {
  root = fs.realpathSync(fs.mkdtempSync(path.join(os.tmpdir(), 'typefill-driver-')));
  write('a.conf', INT_FN);
  write('sub/b.conf', MIXED_FN);
  write('notes.txt', INT_FN);
});

afterEach(() => {
  fs.rmSync(root, { recursive: true, force: true });
});

// ==================================================================
// Discovery
// ==================================================================

describe('processPath', () => {
  test('a directory is searched recursively for .conf files', async () => {
    const batch = await processPath(root, options());
    expect(batch.mode).toBe('directory');
    expect(names(batch)).toEqual(['a.conf', path.join('sub', 'b.conf')]);
    expect(batch.pending).toEqual([]);
  });

  test('--no-recursive stays at the top level', async () => {
    const batch = await processPath(root, options({ recursive: false }));
    expect(names(batch)).toEqual(['a.conf']);
  });

  test('a custom pattern', async () => {
    const batch = await processPath(root, options({ pattern: '*.txt' }));
    expect(names(batch)).toEqual(['notes.txt']);
  });

  test('a single file', async () => {
    const batch = await processPath(path.join(root, 'a.conf'), options());
    expect(batch.mode).toBe('file');
    expect(batch.files).toHaveLength(1);
    const [outcome] = batch.files;
    expect(outcome.tag === 'migrated' && outcome.output).toBe('function f() -> int { return 1; }\n');
  });

  test('a missing path', async () => {
    await expect(processPath(path.join(root, 'nope'), options())).rejects.toThrow(PathNotFoundError);
  });

  test('an aborted run leaves every file pending', async () => {
    const controller = new AbortController();
    controller.abort();
    const batch = await processPath(root, options(), controller.signal);
    expect(batch.files).toEqual([]);
    expect(batch.pending.map(f => path.relative(root, f))).toEqual(['a.conf', path.join('sub', 'b.conf')]);
    expect(exitCodeFor(batch, options())).toBe(ExitCode.Cancelled);
  });
});

// ==================================================================
// Writing back
// ==================================================================

describe('writing', () => {
  test('the default mode writes nothing', async () => {
    const batch = await processPath(root, options());
    expect(batch.files.map(f => f.tag === 'migrated' && f.written)).toEqual([false, false]);
    expect(read('a.conf')).toBe(INT_FN);
  });

  test('in-place mode rewrites changed files only', async () => {
    const batch = await processPath(root, options({ inPlace: true }));
    expect(batch.files.map(f => f.tag === 'migrated' && f.written)).toEqual([true, false]);
    expect(read('a.conf')).toBe('function f() -> int { return 1; }\n');
    expect(read('sub/b.conf')).toBe(MIXED_FN);
  });

  test('check mode writes nothing even with in-place set', async () => {
    const batch = await processPath(root, options({ inPlace: true, check: true }));
    expect(read('a.conf')).toBe(INT_FN);
    expect(exitCodeFor(batch, options({ check: true }))).toBe(ExitCode.NeedsAnnotation);
  });

  test('a second in-place run changes nothing', async () => {
    await processPath(root, options({ inPlace: true }));
    const again = await processPath(root, options({ inPlace: true }));
    expect(again.files.map(f => f.tag === 'migrated' && f.edits.length)).toEqual([0, 0]);
  });

  test('latin-1 files keep their encoding', async () => {
    write('legacy.conf', Buffer.from('# café\nfunction f() { return 1; }\n', 'latin1'));
    await processFile(path.join(root, 'legacy.conf'), options({ inPlace: true }));
    const bytes = fs.readFileSync(path.join(root, 'legacy.conf'));
    expect(bytes.toString('latin1')).toBe('# café\nfunction f() -> int { return 1; }\n');
    expect(bytes[5]).toBe(0xe9);
  });

  test('an unreadable file is reported, not thrown', async () => {
    const outcome = await processFile(path.join(root, 'gone.conf'), options());
    expect(outcome.tag).toBe('failed');
    expect(outcome.tag === 'failed' && outcome.error).toMatch(/ENOENT/);
  });
});

// ==================================================================
// Exit codes
// ==================================================================

describe('exitCodeFor', () => {
  test('all annotated', async () => {
    const batch = await processPath(path.join(root, 'a.conf'), options());
    expect(exitCodeFor(batch, options())).toBe(ExitCode.Success);
  });

  test('a skipped function', async () => {
    const batch = await processPath(root, options());
    expect(exitCodeFor(batch, options())).toBe(ExitCode.SuccessWithSkips);
  });

  test('check mode with nothing to do', async () => {
    const file = write('done.conf', 'function f() -> int { return 1; }\n');
    const batch = await processPath(file, options({ check: true }));
    expect(exitCodeFor(batch, options({ check: true }))).toBe(ExitCode.Success);
  });

  test('a malformed declaration fails the run', async () => {
    const file = write('broken.conf', 'function (x) { }\n');
    const batch = await processPath(file, options());
    expect(exitCodeFor(batch, options())).toBe(ExitCode.Failure);
  });

  test('a malformed return is only a skip', async () => {
    const file = write('ret.conf', 'function bad() { return 1 }\n');
    const batch = await processPath(file, options());
    expect(exitCodeFor(batch, options())).toBe(ExitCode.SuccessWithSkips);
  });

  test('a failed file fails the run', async () => {
    const batch: BatchOutcome = {
      target: root,
      mode: 'directory',
      files: [{ tag: 'failed', file: path.join(root, 'x.conf'), error: 'EACCES' }],
      pending: [],
    };
    expect(exitCodeFor(batch, options())).toBe(ExitCode.Failure);
  });
});

// ==================================================================
// Helpers
// ==================================================================

describe('files', () => {
  test('decodeText prefers UTF-8', () => {
    expect(decodeText(Buffer.from('café', 'utf8'))).toEqual({ text: 'café', encoding: 'utf8' });
    expect(decodeText(Buffer.from([0x63, 0xe9]))).toEqual({ text: 'cé', encoding: 'latin1' });
  });

  test('decodeText keeps a byte-order mark', () => {
    const { text } = decodeText(Buffer.from([0xef, 0xbb, 0xbf, 0x78]));
    expect(text).toBe('\uFEFFx');
  });

  test('displayPath', () => {
    expect(displayPath('/work/etc/bird.conf', '/work')).toBe(path.join('etc', 'bird.conf'));
    expect(displayPath('/other/bird.conf', '/work')).toBe('/other/bird.conf');
  });
});
