import { mkdir, readFile, rename, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { describeError } from './errors';
import { log } from './log';

/** The slice of a localStorage-like backend the progress store needs. */
export interface KeyValueStore {
  getItem(key: string): Promise<string | null>;
  setItem(key: string, value: string): Promise<void>;
  removeItem(key: string): Promise<void>;
  keys(): Promise<string[]>;
  clear(): Promise<void>;
}

export class MemoryKeyValueStore implements KeyValueStore {
  private readonly entries: Map<string, string>;

  constructor(initial: Record<string, string> = {}) {
    this.entries = new Map(Object.entries(initial));
  }

  async getItem(key: string) {
    return this.entries.get(key) ?? null;
  }

  async setItem(key: string, value: string) {
    this.entries.set(key, value);
  }

  async removeItem(key: string) {
    this.entries.delete(key);
  }

  async keys() {
    return [...this.entries.keys()];
  }

  async clear() {
    this.entries.clear();
  }
}

const SAVE_FILE = 'dogdog-save.json';

export class FileKeyValueStore implements KeyValueStore {
  private readonly filePath: string;
  private cache: Map<string, string> | null = null;
  private chain: Promise<unknown> = Promise.resolve();

  constructor(directory: string) {
    this.filePath = path.join(directory, SAVE_FILE);
  }

  private run<T>(operation: () => Promise<T>): Promise<T> {
    const next = this.chain.then(operation, operation);
    this.chain = next.catch((error: unknown) => {
      log.error(`save file operation failed: ${describeError(error)}`);
    });
    return next;
  }

  private async load(): Promise<Map<string, string>> {
    if (this.cache) return this.cache;
    let raw: string;
    try {
      raw = await readFile(this.filePath, 'utf8');
    } catch {
      this.cache = new Map();
      return this.cache;
    }
    try {
      const parsed: unknown = JSON.parse(raw);
      const entries =
        parsed && typeof parsed === 'object' && !Array.isArray(parsed)
          ? Object.entries(parsed).filter((entry): entry is [string, string] => typeof entry[1] === 'string')
          : [];
      this.cache = new Map(entries);
    } catch (error) {
      log.warn(`save file ${this.filePath} is unreadable, starting empty: ${describeError(error)}`);
      this.cache = new Map();
    }
    return this.cache;
  }

  private async persist(entries: Map<string, string>) {
    await mkdir(path.dirname(this.filePath), { recursive: true });
    const tempPath = `${this.filePath}.tmp`;
    await writeFile(tempPath, JSON.stringify(Object.fromEntries(entries), null, 2), 'utf8');
    await rename(tempPath, this.filePath);
  }

  getItem(key: string) {
    return this.run(async () => (await this.load()).get(key) ?? null);
  }

  setItem(key: string, value: string) {
    return this.run(async () => {
      const entries = await this.load();
      entries.set(key, value);
      await this.persist(entries);
    });
  }

  removeItem(key: string) {
    return this.run(async () => {
      const entries = await this.load();
      if (!entries.delete(key)) return;
      await this.persist(entries);
    });
  }

  keys() {
    return this.run(async () => [...(await this.load()).keys()]);
  }

  clear() {
    return this.run(async () => {
      const entries = await this.load();
      entries.clear();
      await this.persist(entries);
    });
  }
}
