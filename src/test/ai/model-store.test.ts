import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { MemoryModelStore, joinKey, splitKey } from '@ai/persistence/model-store';
import { FileModelStore, openModelStore } from '@ai/persistence/file-store';
import { PersistenceUnavailableError } from '@ai/errors';

describe('MemoryModelStore', () => {
  it('increments counters from zero', () => {
    const store = new MemoryModelStore();
    expect(store.increment('markov', 'L|^^|C', 1)).toBe(1);
    expect(store.increment('markov', 'L|^^|C', 2)).toBe(3);
    expect(store.get('markov', 'L|^^|C')).toBe(3);
  });

  it('refuses to increment a non-numeric entry or by a non-finite delta', () => {
    const store = new MemoryModelStore();
    store.put('history', 'g|0', { actual: 'CAT' });
    expect(() => store.increment('history', 'g|0', 1)).toThrow(PersistenceUnavailableError);
    expect(() => store.increment('markov', 'k', Number.POSITIVE_INFINITY)).toThrow(PersistenceUnavailableError);
  });

  it('hands out copies of stored objects', () => {
    const store = new MemoryModelStore();
    const value = { q: 1, visits: 1, reward: 1 };
    store.put('qlearning', 's|CAT', value);
    value.q = 99;
    expect(store.get('qlearning', 's|CAT')).toEqual({ q: 1, visits: 1, reward: 1 });
  });

  it('snapshots and restores a namespace', () => {
    const store = new MemoryModelStore();
    store.put('meta', 'letters:10|bayes', 1);
    store.snapshot('meta', 'before');
    store.put('meta', 'letters:10|bayes', 2);
    store.put('meta', 'letters:10|mcts', 3);

    store.restore('meta', 'before');
    expect(store.entries('meta')).toEqual([['letters:10|bayes', 1]]);
    expect(store.backups('meta')).toEqual(['before']);
    expect(() => store.restore('meta', 'missing')).toThrow('No backup named missing for meta');
  });

  it('joins and splits composite keys', () => {
    expect(joinKey('abc', 'CAT', 'visits')).toBe('abc|CAT|visits');
    expect(splitKey('abc|CAT')).toEqual(['abc', 'CAT']);
  });
});

describe('FileModelStore', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'lexiduel-store-'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('survives a restart', () => {
    const store = new FileModelStore(dir);
    store.increment('bayes', 'C|accepted', 2);
    store.put('qlearning', 's|DOG', { q: 0.5, visits: 1, reward: 5 });
    store.flush();

    const reopened = new FileModelStore(dir);
    expect(reopened.get('bayes', 'C|accepted')).toBe(2);
    expect(reopened.get('qlearning', 's|DOG')).toEqual({ q: 0.5, visits: 1, reward: 5 });
    expect(reopened.entries('markov')).toEqual([]);
  });

  it('writes nothing until flushed', () => {
    const store = new FileModelStore(dir);
    store.increment('markov', 'W|CAT|DOG', 1);
    expect(fs.existsSync(path.join(dir, 'markov.json'))).toBe(false);
    store.flush();
    expect(fs.existsSync(path.join(dir, 'markov.json'))).toBe(true);
  });

  it('keeps named backups on disk', () => {
    const store = new FileModelStore(dir);
    store.put('meta', 'letters:6|markov', 0.25);
    store.snapshot('meta', 'night-1');
    store.put('meta', 'letters:6|markov', 0.75);
    store.flush();

    const reopened = new FileModelStore(dir);
    expect(reopened.backups('meta')).toEqual(['night-1']);
    reopened.restore('meta', 'night-1');
    expect(reopened.get('meta', 'letters:6|markov')).toBe(0.25);
  });

  it('rejects backup names that are not plain file names', () => {
    const store = new FileModelStore(dir);
    expect(() => store.snapshot('meta', '../escape')).toThrow('Invalid backup name: ../escape');
  });

  it('reports a corrupt file as unavailable persistence', () => {
    fs.writeFileSync(path.join(dir, 'markov.json'), '{ not json');
    expect(() => new FileModelStore(dir)).toThrow(PersistenceUnavailableError);
  });

  it('falls back to memory when the directory cannot be loaded', () => {
    fs.writeFileSync(path.join(dir, 'qlearning.json'), JSON.stringify({ namespace: 'qlearning', entries: [] }));
    const store = openModelStore(dir);
    expect(store).toBeInstanceOf(MemoryModelStore);
    expect(store).not.toBeInstanceOf(FileModelStore);
    expect(store.entries('qlearning')).toEqual([]);
  });
});
