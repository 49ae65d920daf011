/**
 * Prefix tree over upper-case words.
 */
import type { Letter } from '../types';
import { countLetters, normalizeWord } from '../utils/letter-utils';
import type { LetterCount } from '../utils/letter-utils';

interface TrieNode {
  children: Map<Letter, TrieNode>;
  terminal: boolean;
}

function createNode(): TrieNode {
  return { children: new Map(), terminal: false };
}

export class Trie {
  private root: TrieNode = createNode();
  private count = 0;

  constructor(words: Iterable<string> = []) {
    for (const w of words) this.insert(w);
  }

  get size(): number {
    return this.count;
  }

  insert(word: string): void {
    const normalized = normalizeWord(word);
    if (!/^[A-Z]+$/.test(normalized)) return;

    let node = this.root;
    for (const ch of normalized) {
      let next = node.children.get(ch);
      if (!next) {
        next = createNode();
        node.children.set(ch, next);
      }
      node = next;
    }
    if (!node.terminal) {
      node.terminal = true;
      this.count++;
    }
  }

  has(word: string): boolean {
    const node = this.find(normalizeWord(word));
    return node?.terminal ?? false;
  }

  hasPrefix(prefix: string): boolean {
    return this.find(normalizeWord(prefix)) !== null;
  }

  /**
   * Every word formable from the letter multiset, longest first, then alphabetical.
   */
  wordsFrom(letters: readonly Letter[], minLength: number = 1): string[] {
    const found: string[] = [];
    const remaining = countLetters(letters.map((l) => l.toUpperCase()));
    this.collect(this.root, '', remaining, minLength, found);
    return found.sort((a, b) => b.length - a.length || a.localeCompare(b));
  }

  private collect(
    node: TrieNode,
    prefix: string,
    remaining: LetterCount,
    minLength: number,
    out: string[],
  ): void {
    if (node.terminal && prefix.length >= minLength) out.push(prefix);

    for (const [ch, child] of node.children) {
      const left = remaining.get(ch) ?? 0;
      if (left === 0) continue;
      remaining.set(ch, left - 1);
      this.collect(child, prefix + ch, remaining, minLength, out);
      remaining.set(ch, left);
    }
  }

  private find(word: string): TrieNode | null {
    let node = this.root;
    for (const ch of word) {
      const next = node.children.get(ch);
      if (!next) return null;
      node = next;
    }
    return node;
  }
}
