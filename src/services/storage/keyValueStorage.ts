import { mkdir, readFile, rename, writeFile } from 'fs/promises';
import path from 'path';

/**
 * AsyncStorage-shaped string store. Everything the app persists locally goes
 * through this so the backing can be swapped (file on disk, memory in tests).
 */
export interface KeyValueStorage {
  getItem(key: string): Promise<string | null>;
  setItem(key: string, value: string): Promise<void>;
  removeItem(key: string): Promise<void>;
  multiGet(keys: readonly string[]): Promise<Array<[string, string | null]>>;
  multiSet(pairs: ReadonlyArray<readonly [string, string]>): Promise<void>;
}

export class MemoryKeyValueStorage implements KeyValueStorage {
  private readonly items = new Map<string, string>();

  async getItem(key: string): Promise<string | null> {
    return this.items.get(key) ?? null;
  }

  async setItem(key: string, value: string): Promise<void> {
    this.items.set(key, value);
  }

  async removeItem(key: string): Promise<void> {
    this.items.delete(key);
  }

  async multiGet(keys: readonly string[]): Promise<Array<[string, string | null]>> {
    return keys.map((key) => [key, this.items.get(key) ?? null]);
  }

  async multiSet(pairs: ReadonlyArray<readonly [string, string]>): Promise<void> {
    pairs.forEach(([key, value]) => this.items.set(key, value));
  }

  keys(): string[] {
    return Array.from(this.items.keys());
  }
}

function isStringRecord(value: unknown): value is Record<string, string> {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) return false;
  return Object.values(value).every((v) => typeof v === 'string');
}

/**
 * Single JSON file holding every key. The file is read once, then kept in memory;
 * each write rewrites the whole file through a temp file + rename.
 */
export class FileKeyValueStorage implements KeyValueStorage {
  private cache: Map<string, string> | null = null;
  private writeChain: Promise<void> = Promise.resolve();

  constructor(private readonly filePath: string) {}

  async getItem(key: string): Promise<string | null> {
    const items = await this.load();
    return items.get(key) ?? null;
  }

  async setItem(key: string, value: string): Promise<void> {
    const items = await this.load();
    items.set(key, value);
    await this.flush();
  }

  async removeItem(key: string): Promise<void> {
    const items = await this.load();
    if (!items.delete(key)) return;
    await this.flush();
  }

  async multiGet(keys: readonly string[]): Promise<Array<[string, string | null]>> {
    const items = await this.load();
    return keys.map((key) => [key, items.get(key) ?? null]);
  }

  async multiSet(pairs: ReadonlyArray<readonly [string, string]>): Promise<void> {
    const items = await this.load();
    pairs.forEach(([key, value]) => items.set(key, value));
    await this.flush();
  }

  private async load(): Promise<Map<string, string>> {
    if (this.cache) return this.cache;
    let raw: string | null = null;
    try {
      raw = await readFile(this.filePath, 'utf8');
    } catch (error) {
      if (!isMissingFileError(error)) throw error;
    }
    const items = new Map<string, string>();
    if (raw) {
      try {
        const parsed: unknown = JSON.parse(raw);
        if (isStringRecord(parsed)) {
          Object.entries(parsed).forEach(([key, value]) => items.set(key, value));
        }
      } catch {
        // Corrupt file: start over; the next write replaces it.
      }
    }
    // A concurrent load may have finished first.
    if (!this.cache) this.cache = items;
    return this.cache;
  }

  private flush(): Promise<void> {
    const write = async () => {
      const snapshot = JSON.stringify(Object.fromEntries(this.cache ?? new Map<string, string>()));
      await mkdir(path.dirname(this.filePath), { recursive: true });
      const tmpPath = `${this.filePath}.tmp`;
      await writeFile(tmpPath, snapshot, 'utf8');
      await rename(tmpPath, this.filePath);
    };
    const next = this.writeChain.then(write, write);
    this.writeChain = next.catch(() => undefined);
    return next;
  }
}

function isMissingFileError(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT';
}
