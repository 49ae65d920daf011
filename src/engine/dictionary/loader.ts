import fs from 'node:fs';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import { Trie } from './trie';
import { MIN_WORD_LENGTH, MAX_WORD_LENGTH } from '../constants';

const __dirname = path.dirname(fileURLToPath(import.meta.url));

export const DEFAULT_WORD_LIST = path.resolve(__dirname, '..', '..', '..', 'data', 'words.txt');

/** Parse a newline-separated word list, dropping comments and out-of-range words */
export function parseWordList(raw: string): string[] {
  return raw
    .split(/\r?\n/)
    .map((line) => line.trim().toUpperCase())
    .filter((w) => w.length > 0 && !w.startsWith('#'))
    .filter((w) => /^[A-Z]+$/.test(w))
    .filter((w) => w.length >= MIN_WORD_LENGTH && w.length <= MAX_WORD_LENGTH);
}

export function loadDictionary(filePath: string = DEFAULT_WORD_LIST): Trie {
  const raw = fs.readFileSync(filePath, 'utf-8');
  return new Trie(parseWordList(raw));
}
