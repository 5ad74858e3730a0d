/**
 * File-system helpers: finding config files and reading them back in the
 * encoding they were written in.
 */

import * as fs from 'fs';
import * as path from 'path';
import { isUtf8 } from 'buffer';
import { glob } from 'glob';

export type TextEncoding = 'utf8' | 'latin1';

export interface DecodedText {
  text: string;
  encoding: TextEncoding;
}

/**
 * Config files under `dir` matching `pattern`, sorted by path.
 */
export async function collectConfigFiles(dir: string, pattern: string, recursive: boolean): Promise<string[]> {
  const files = await glob(recursive ? `**/${pattern}` : pattern, {
    cwd: dir,
    nodir: true,
    absolute: true,
  });
  return files.sort();
}

/**
 * Decode as UTF-8, falling back to latin-1 for bytes that are not valid UTF-8.
 * A byte-order mark stays in the text, so a rewrite keeps it.
 */
export function decodeText(bytes: Buffer): DecodedText {
  const encoding: TextEncoding = isUtf8(bytes) ? 'utf8' : 'latin1';
  return { text: bytes.toString(encoding), encoding };
}

export async function readText(file: string): Promise<DecodedText> {
  return decodeText(await fs.promises.readFile(file));
}

export async function writeText(file: string, content: DecodedText): Promise<void> {
  await fs.promises.writeFile(file, Buffer.from(content.text, content.encoding));
}

/** Path relative to the working directory when that is shorter. */
export function displayPath(file: string, cwd: string = process.cwd()): string {
  const relative = path.relative(cwd, file);
  return relative.length > 0 && !relative.startsWith('..') && relative.length < file.length ? relative : file;
}
