/**
 * Key-value persistence contract for learned tables.
 * Each model owns a namespace; keys are composite strings joined with KEY_SEPARATOR.
 */
import type { ModelKind } from '../types';
import { PersistenceUnavailableError } from '../errors';

export type StoreNamespace = ModelKind | 'meta' | 'history';

export const STORE_NAMESPACES: readonly StoreNamespace[] = [
  'bayes', 'markov', 'mcts', 'qlearning', 'meta', 'history',
];

export type StoreValue =
  | number
  | string
  | boolean
  | null
  | StoreValue[]
  | { [key: string]: StoreValue };

export const KEY_SEPARATOR = '|';

export function joinKey(...parts: (string | number)[]): string {
  return parts.join(KEY_SEPARATOR);
}

export function splitKey(key: string): string[] {
  return key.split(KEY_SEPARATOR);
}

export interface ModelStore {
  get(ns: StoreNamespace, key: string): StoreValue | undefined;
  put(ns: StoreNamespace, key: string, value: StoreValue): void;
  /** Add delta to a numeric entry (missing counts as 0); returns the new value */
  increment(ns: StoreNamespace, key: string, delta: number): number;
  entries(ns: StoreNamespace): [string, StoreValue][];
  remove(ns: StoreNamespace, key: string): boolean;
  clear(ns: StoreNamespace): void;
  /** Copy the live namespace into a named backup, replacing any previous one */
  snapshot(ns: StoreNamespace, name: string): void;
  /** Replace the live namespace with a named backup */
  restore(ns: StoreNamespace, name: string): void;
  backups(ns: StoreNamespace): string[];
  /** Make pending writes durable */
  flush(): void;
}

type Table = Map<string, StoreValue>;

function cloneValue(value: StoreValue): StoreValue {
  return typeof value === 'object' && value !== null ? structuredClone(value) : value;
}

function cloneTable(table: Table): Table {
  return new Map([...table].map(([k, v]) => [k, cloneValue(v)]));
}

/**
 * In-process store. Also the base of the file-backed store.
 */
export class MemoryModelStore implements ModelStore {
  protected tables = new Map<StoreNamespace, Table>();
  protected snapshots = new Map<StoreNamespace, Map<string, Table>>();
  protected dirty = new Set<StoreNamespace>();

  get(ns: StoreNamespace, key: string): StoreValue | undefined {
    const value = this.table(ns).get(key);
    return value === undefined ? undefined : cloneValue(value);
  }

  put(ns: StoreNamespace, key: string, value: StoreValue): void {
    this.table(ns).set(key, cloneValue(value));
    this.dirty.add(ns);
  }

  increment(ns: StoreNamespace, key: string, delta: number): number {
    if (!Number.isFinite(delta)) {
      throw new PersistenceUnavailableError(`Non-finite increment for ${ns}/${key}`);
    }
    const table = this.table(ns);
    const current = table.get(key);
    if (current !== undefined && typeof current !== 'number') {
      throw new PersistenceUnavailableError(`Entry ${ns}/${key} is not numeric`);
    }
    const next = (current ?? 0) + delta;
    table.set(key, next);
    this.dirty.add(ns);
    return next;
  }

  entries(ns: StoreNamespace): [string, StoreValue][] {
    return [...this.table(ns)].map(([k, v]) => [k, cloneValue(v)]);
  }

  remove(ns: StoreNamespace, key: string): boolean {
    const removed = this.table(ns).delete(key);
    if (removed) this.dirty.add(ns);
    return removed;
  }

  clear(ns: StoreNamespace): void {
    this.tables.set(ns, new Map());
    this.dirty.add(ns);
  }

  snapshot(ns: StoreNamespace, name: string): void {
    let named = this.snapshots.get(ns);
    if (!named) {
      named = new Map();
      this.snapshots.set(ns, named);
    }
    named.set(name, cloneTable(this.table(ns)));
    this.dirty.add(ns);
  }

  restore(ns: StoreNamespace, name: string): void {
    const backup = this.snapshots.get(ns)?.get(name);
    if (!backup) {
      throw new PersistenceUnavailableError(`No backup named ${name} for ${ns}`);
    }
    this.tables.set(ns, cloneTable(backup));
    this.dirty.add(ns);
  }

  backups(ns: StoreNamespace): string[] {
    return [...(this.snapshots.get(ns)?.keys() ?? [])].sort();
  }

  flush(): void {
    this.dirty.clear();
  }

  protected table(ns: StoreNamespace): Table {
    let table = this.tables.get(ns);
    if (!table) {
      table = new Map();
      this.tables.set(ns, table);
    }
    return table;
  }
}
