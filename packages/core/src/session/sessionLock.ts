/**
 * One shell session per working tree, across processes.
 *
 * The lock is a small JSON file named after a hash of the working tree and
 * created exclusively. A lock whose process is gone is stale and gets
 * replaced; a live one refuses the second session.
 */

import { createHash } from 'node:crypto';
import { existsSync } from 'node:fs';
import * as fsp from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';

import { SessionLockedError, type SessionLockHolder } from '../errors.js';
import { createLogger, type Logger } from '../utils/logger.js';

export type SessionLockStatus =
  | { state: 'idle'; workingTree: string }
  | { state: 'busy'; workingTree: string; holder: SessionLockHolder }
  | { state: 'stale'; workingTree: string; holder: SessionLockHolder | null };

export interface SessionLock {
  readonly workingTree: string;
  /** Rejects with `SessionLockedError` while another live process holds it. */
  acquire(): Promise<void>;
  release(): Promise<void>;
  inspect(): Promise<SessionLockStatus>;
}

export function resolveDefaultLockDir(env: NodeJS.ProcessEnv = process.env): string {
  const xdgStateHome = env.XDG_STATE_HOME && env.XDG_STATE_HOME.trim();
  if (xdgStateHome) {
    return path.join(xdgStateHome, 'ptybridge', 'locks');
  }

  const homeDir = env.HOME || os.homedir();
  return path.join(homeDir, '.local', 'state', 'ptybridge', 'locks');
}

/** Nearest ancestor holding a `.git` entry, or `start` itself. */
export function resolveWorkingTree(start: string, exists: (candidate: string) => boolean = existsSync): string {
  const resolved = path.resolve(start);
  let current = resolved;
  for (;;) {
    if (exists(path.join(current, '.git'))) {
      return current;
    }
    const parent = path.dirname(current);
    if (parent === current) {
      return resolved;
    }
    current = parent;
  }
}

export function defaultIsProcessAlive(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch (error) {
    // EPERM: the process exists but belongs to someone else.
    return hasErrorCode(error, 'EPERM');
  }
}

function hasErrorCode(error: unknown, code: string): boolean {
  return error instanceof Error && 'code' in error && error.code === code;
}

const isLockHolder = (value: unknown): value is SessionLockHolder => {
  if (!value || typeof value !== 'object') {
    return false;
  }
  const candidate: Record<string, unknown> = { ...value };
  return (
    typeof candidate.pid === 'number' &&
    Number.isInteger(candidate.pid) &&
    typeof candidate.workingTree === 'string' &&
    typeof candidate.startedAt === 'string'
  );
};

export interface FileSessionLockOptions {
  workingTree: string;
  lockDir?: string;
  pid?: number;
  isProcessAlive?: (pid: number) => boolean;
  now?: () => Date;
  logger?: Logger;
}

export class FileSessionLock implements SessionLock {
  readonly workingTree: string;

  readonly filePath: string;

  private readonly pid: number;

  private readonly isProcessAlive: (pid: number) => boolean;

  private readonly now: () => Date;

  private readonly logger: Logger;

  private held = false;

  constructor({
    workingTree,
    lockDir = resolveDefaultLockDir(),
    pid = process.pid,
    isProcessAlive = defaultIsProcessAlive,
    now = () => new Date(),
    logger,
  }: FileSessionLockOptions) {
    this.workingTree = path.resolve(workingTree);
    const digest = createHash('sha256').update(this.workingTree).digest('hex').slice(0, 16);
    this.filePath = path.join(path.resolve(lockDir), `${digest}.lock`);
    this.pid = pid;
    this.isProcessAlive = isProcessAlive;
    this.now = now;
    this.logger = logger ?? createLogger('lock');
  }

  get isHeld(): boolean {
    return this.held;
  }

  async acquire(): Promise<void> {
    if (this.held) {
      return;
    }
    await fsp.mkdir(path.dirname(this.filePath), { recursive: true });

    const holder: SessionLockHolder = {
      pid: this.pid,
      workingTree: this.workingTree,
      startedAt: this.now().toISOString(),
    };
    const contents = `${JSON.stringify(holder)}\n`;

    // Two attempts: the second follows removal of a stale lock.
    for (let attempt = 0; attempt < 2; attempt += 1) {
      try {
        await fsp.writeFile(this.filePath, contents, { encoding: 'utf8', flag: 'wx' });
        this.held = true;
        return;
      } catch (error) {
        if (!hasErrorCode(error, 'EEXIST')) {
          throw error;
        }
      }

      const status = await this.inspect();
      if (status.state === 'busy') {
        if (status.holder.pid !== this.pid) {
          throw new SessionLockedError(status.holder);
        }
        // Left behind by an earlier manager in this same process.
        await fsp.writeFile(this.filePath, contents, { encoding: 'utf8' });
        this.held = true;
        return;
      }

      const previous = status.state === 'stale' && status.holder ? `pid ${status.holder.pid}` : 'an unreadable file';
      this.logger.warn(`Replacing stale session lock ${this.filePath} left by ${previous}.`);
      await this.removeFile();
    }

    throw new Error(`Could not take the session lock ${this.filePath}.`);
  }

  async release(): Promise<void> {
    if (!this.held) {
      return;
    }
    this.held = false;

    const holder = await this.readHolder();
    if (holder && holder.pid !== this.pid) {
      this.logger.warn(`Session lock ${this.filePath} now belongs to pid ${holder.pid}; leaving it.`);
      return;
    }
    await this.removeFile();
  }

  async inspect(): Promise<SessionLockStatus> {
    let raw: string;
    try {
      raw = await fsp.readFile(this.filePath, { encoding: 'utf8' });
    } catch (error) {
      if (hasErrorCode(error, 'ENOENT')) {
        return { state: 'idle', workingTree: this.workingTree };
      }
      throw error;
    }

    const holder = this.parseHolder(raw);
    if (holder && this.isProcessAlive(holder.pid)) {
      return { state: 'busy', workingTree: this.workingTree, holder };
    }
    return { state: 'stale', workingTree: this.workingTree, holder };
  }

  private async readHolder(): Promise<SessionLockHolder | null> {
    try {
      return this.parseHolder(await fsp.readFile(this.filePath, { encoding: 'utf8' }));
    } catch (error) {
      if (hasErrorCode(error, 'ENOENT')) {
        return null;
      }
      throw error;
    }
  }

  private parseHolder(raw: string): SessionLockHolder | null {
    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.debug(`Unreadable session lock ${this.filePath}: ${message}`);
      return null;
    }
    return isLockHolder(parsed) ? parsed : null;
  }

  private async removeFile(): Promise<void> {
    try {
      await fsp.unlink(this.filePath);
    } catch (error) {
      if (!hasErrorCode(error, 'ENOENT')) {
        throw error;
      }
    }
  }
}
