/**
 * JSON-file backed model store: one file per namespace, one per backup.
 * Everything is loaded on construction and written on flush().
 */
import fs from 'node:fs';
import path from 'node:path';
import { z } from 'zod';
import { MemoryModelStore, STORE_NAMESPACES } from './model-store';
import type { StoreNamespace, StoreValue } from './model-store';
import { PersistenceUnavailableError } from '../errors';
import { createLogger } from '@shared/logger';

const log = createLogger('file-store');

const storeValueSchema: z.ZodType<StoreValue> = z.lazy(() =>
  z.union([
    z.number(),
    z.string(),
    z.boolean(),
    z.null(),
    z.array(storeValueSchema),
    z.record(storeValueSchema),
  ]),
);

const tableFileSchema = z.object({
  namespace: z.string(),
  entries: z.record(storeValueSchema),
});

const BACKUP_NAME = /^[\w.-]+$/;

export class FileModelStore extends MemoryModelStore {
  private readonly dir: string;

  constructor(dir: string) {
    super();
    this.dir = dir;
    this.load();
  }

  override snapshot(ns: StoreNamespace, name: string): void {
    if (!BACKUP_NAME.test(name)) {
      throw new PersistenceUnavailableError(`Invalid backup name: ${name}`);
    }
    super.snapshot(ns, name);
  }

  override flush(): void {
    try {
      fs.mkdirSync(this.backupDir(), { recursive: true });
      for (const ns of this.dirty) {
        this.writeTable(this.tablePath(ns), ns, this.table(ns));
        for (const [name, table] of this.snapshots.get(ns) ?? []) {
          fs.mkdirSync(path.join(this.backupDir(), ns), { recursive: true });
          this.writeTable(this.backupPath(ns, name), ns, table);
        }
      }
    } catch (e) {
      throw new PersistenceUnavailableError(`Failed to write model store at ${this.dir}`, e);
    }
    super.flush();
  }

  private load(): void {
    if (!fs.existsSync(this.dir)) return;

    for (const ns of STORE_NAMESPACES) {
      const table = this.readTable(this.tablePath(ns));
      if (table) this.tables.set(ns, table);

      const nsBackups = path.join(this.backupDir(), ns);
      if (!fs.existsSync(nsBackups)) continue;
      const named = new Map<string, Map<string, StoreValue>>();
      for (const file of fs.readdirSync(nsBackups)) {
        if (!file.endsWith('.json')) continue;
        const backup = this.readTable(path.join(nsBackups, file));
        if (backup) named.set(file.slice(0, -'.json'.length), backup);
      }
      this.snapshots.set(ns, named);
    }
    log.info({ dir: this.dir, namespaces: this.tables.size }, 'Loaded model store');
  }

  private readTable(file: string): Map<string, StoreValue> | null {
    if (!fs.existsSync(file)) return null;
    try {
      const parsed = tableFileSchema.parse(JSON.parse(fs.readFileSync(file, 'utf-8')));
      return new Map(Object.entries(parsed.entries));
    } catch (e) {
      throw new PersistenceUnavailableError(`Corrupt model store file ${file}`, e);
    }
  }

  private writeTable(file: string, ns: StoreNamespace, table: Map<string, StoreValue>): void {
    const tmp = `${file}.tmp`;
    fs.writeFileSync(tmp, JSON.stringify({ namespace: ns, entries: Object.fromEntries(table) }));
    fs.renameSync(tmp, file);
  }

  private tablePath(ns: StoreNamespace): string {
    return path.join(this.dir, `${ns}.json`);
  }

  private backupDir(): string {
    return path.join(this.dir, 'backups');
  }

  private backupPath(ns: StoreNamespace, name: string): string {
    return path.join(this.backupDir(), ns, `${name}.json`);
  }
}

/**
 * Open the file store, or fall back to an in-memory one when the directory
 * can't be read. Learning then carries on without durability.
 */
export function openModelStore(dir: string): MemoryModelStore {
  try {
    return new FileModelStore(dir);
  } catch (e) {
    log.warn({ err: e, dir }, 'Model store unavailable, learning in memory only');
    return new MemoryModelStore();
  }
}
