/**
 * Role-tagged notes the operator explicitly asked the agent to remember.
 *
 * Nothing writes here automatically; the `/remember` directive is the only
 * producer. The file store keeps a JSON array and replaces it atomically
 * through a temp file and rename.
 */

import { randomBytes } from 'node:crypto';
import type { FileHandle } from 'node:fs/promises';
import * as fsp from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';

import { AsyncMutex } from '../utils/asyncMutex.js';
import { createLogger, type Logger } from '../utils/logger.js';

export type MemoryRole = 'user' | 'assistant';

export interface MemoryEntry {
  role: MemoryRole;
  content: string;
  createdAt: string;
}

export interface MemoryStore {
  append(role: MemoryRole, content: string): Promise<MemoryEntry>;
  /** Most recent entries last; `limit` keeps only the newest ones. */
  list(limit?: number): Promise<MemoryEntry[]>;
}

export function resolveDefaultMemoryPath(env: NodeJS.ProcessEnv = process.env): string {
  const xdgDataHome = env.XDG_DATA_HOME && env.XDG_DATA_HOME.trim();
  if (xdgDataHome) {
    return path.join(xdgDataHome, 'ptybridge', 'memory.json');
  }

  const homeDir = env.HOME || os.homedir();
  return path.join(homeDir, '.local', 'share', 'ptybridge', 'memory.json');
}

const isMemoryEntry = (value: unknown): value is MemoryEntry => {
  if (!value || typeof value !== 'object') {
    return false;
  }
  const candidate: Record<string, unknown> = { ...value };
  return (
    (candidate.role === 'user' || candidate.role === 'assistant') &&
    typeof candidate.content === 'string' &&
    typeof candidate.createdAt === 'string'
  );
};

const takeLast = (entries: MemoryEntry[], limit: number | undefined): MemoryEntry[] =>
  typeof limit === 'number' && limit >= 0 ? entries.slice(Math.max(0, entries.length - limit)) : entries;

export class InMemoryMemoryStore implements MemoryStore {
  private readonly entries: MemoryEntry[] = [];

  constructor(private readonly now: () => Date = () => new Date()) {}

  async append(role: MemoryRole, content: string): Promise<MemoryEntry> {
    const entry: MemoryEntry = { role, content, createdAt: this.now().toISOString() };
    this.entries.push(entry);
    return entry;
  }

  async list(limit?: number): Promise<MemoryEntry[]> {
    return takeLast([...this.entries], limit);
  }
}

export interface FileMemoryStoreOptions {
  filePath?: string | null;
  now?: () => Date;
  logger?: Logger;
}

export class FileMemoryStore implements MemoryStore {
  readonly filePath: string;

  private readonly now: () => Date;

  private readonly logger: Logger;

  private readonly mutex = new AsyncMutex();

  constructor({ filePath = null, now = () => new Date(), logger }: FileMemoryStoreOptions = {}) {
    this.filePath = filePath ? path.resolve(filePath) : resolveDefaultMemoryPath();
    this.now = now;
    this.logger = logger ?? createLogger('memory');
  }

  append(role: MemoryRole, content: string): Promise<MemoryEntry> {
    return this.mutex.runExclusive(async () => {
      const entries = await this.read();
      const entry: MemoryEntry = { role, content, createdAt: this.now().toISOString() };
      entries.push(entry);
      await this.write(entries);
      return entry;
    });
  }

  list(limit?: number): Promise<MemoryEntry[]> {
    return this.mutex.runExclusive(async () => takeLast(await this.read(), limit));
  }

  private async read(): Promise<MemoryEntry[]> {
    let raw: string;
    try {
      raw = await fsp.readFile(this.filePath, { encoding: 'utf8' });
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
        return [];
      }
      throw error;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.warn(`Ignoring unreadable memory file ${this.filePath}: ${message}`);
      return [];
    }

    if (!Array.isArray(parsed)) {
      this.logger.warn(`Ignoring memory file ${this.filePath}: expected a JSON array.`);
      return [];
    }
    return parsed.filter(isMemoryEntry);
  }

  private async write(entries: MemoryEntry[]): Promise<void> {
    const dir = path.dirname(this.filePath);
    await fsp.mkdir(dir, { recursive: true });

    const tempFile = path.join(dir, `._memory_${Date.now()}_${randomBytes(6).toString('hex')}`);
    let handle: FileHandle | null = null;
    try {
      handle = await fsp.open(tempFile, 'w');
      await handle.writeFile(`${JSON.stringify(entries, null, 2)}\n`, { encoding: 'utf8' });
      await handle.sync();
      await handle.close();
      handle = null;
      await fsp.rename(tempFile, this.filePath);
    } finally {
      if (handle) {
        await handle.close().catch((error: unknown) => {
          this.logger.debug(`Failed to close ${tempFile}: ${String(error)}`);
        });
      }
      // After a successful rename the temp file is gone; ENOENT is expected.
      await fsp.unlink(tempFile).catch(() => undefined);
    }
  }
}
