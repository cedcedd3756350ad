/**
 * AdFeed — Config File
 *
 * Backup-write-verify persistence for the config document.
 *
 * A write stages the new content next to the live file, fsyncs it, reads it
 * back, renames it over the live file and reads that back too. The previous
 * version is kept as `<path>.bak` and is what a rollback restores.
 *
 * CRITICAL: backup() MUST succeed before write() is attempted.
 */

import { createHash } from 'crypto';
import { copyFile, open, readFile, rename, rm } from 'fs/promises';
import { logger, errorMessage } from '../lib/logger';

const log = logger.child({ component: 'config-file' });

// ============================================================
// TYPES
// ============================================================

export class ConfigError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ConfigError';
  }
}

export interface ConfigBackup {
  /** False when there was no live file to copy */
  existed: boolean;
  path: string;
  hash: string | null;
  createdAt: string;
}

// ============================================================
// HELPERS
// ============================================================

export function contentHash(content: string): string {
  return createHash('sha256').update(content, 'utf8').digest('hex');
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

// ============================================================
// CONFIG FILE
// ============================================================

export class ConfigFile {
  constructor(readonly path: string) {}

  get backupPath(): string {
    return `${this.path}.bak`;
  }

  get stagingPath(): string {
    return `${this.path}.tmp`;
  }

  async read(): Promise<string> {
    return readFile(this.path, 'utf8');
  }

  /**
   * Read and JSON-parse the live file.
   */
  async readDocument(): Promise<unknown> {
    let raw: string;
    try {
      raw = await this.read();
    } catch (error) {
      throw new ConfigError(`Config file ${this.path} not readable: ${errorMessage(error)}`, {
        cause: error,
      });
    }

    try {
      return JSON.parse(raw);
    } catch (error) {
      throw new ConfigError(`Config file ${this.path} is not valid JSON: ${errorMessage(error)}`, {
        cause: error,
      });
    }
  }

  /**
   * Hash of the live file, or null when it does not exist.
   */
  async hash(): Promise<string | null> {
    try {
      return contentHash(await this.read());
    } catch (error) {
      if (isMissingFile(error)) return null;
      throw error;
    }
  }

  /**
   * Copy the live file aside before it is modified.
   */
  async backup(): Promise<ConfigBackup> {
    const createdAt = new Date().toISOString();
    const hash = await this.hash();

    if (hash === null) {
      log.warn('No live config file to back up', { path: this.path });
      return { existed: false, path: this.backupPath, hash: null, createdAt };
    }

    await copyFile(this.path, this.backupPath);

    const copied = contentHash(await readFile(this.backupPath, 'utf8'));
    if (copied !== hash) {
      throw new ConfigError(`Backup verification failed for ${this.backupPath}`);
    }

    log.debug('Config backed up', { backupPath: this.backupPath });
    return { existed: true, path: this.backupPath, hash, createdAt };
  }

  /**
   * Replace the live file with `content`, verifying each step.
   */
  async write(content: string): Promise<void> {
    const expected = contentHash(content);

    await this.writeStaged(content);

    const staged = contentHash(await readFile(this.stagingPath, 'utf8'));
    if (staged !== expected) {
      await rm(this.stagingPath, { force: true });
      throw new ConfigError('Staged config does not match what was written');
    }

    await rename(this.stagingPath, this.path);

    const live = await this.hash();
    if (live !== expected) {
      throw new ConfigError('Live config does not match what was written');
    }
  }

  /**
   * Put the backed-up version back in place.
   */
  async restore(backup: ConfigBackup): Promise<void> {
    if (!backup.existed) {
      await rm(this.path, { force: true });
      log.info('Config restored to absent', { path: this.path });
      return;
    }

    const content = await readFile(backup.path, 'utf8');
    if (contentHash(content) !== backup.hash) {
      throw new ConfigError(`Backup ${backup.path} changed since it was taken`);
    }

    await this.write(content);
    log.info('Config restored from backup', { path: this.path, backupPath: backup.path });
  }

  protected async writeStaged(content: string): Promise<void> {
    const handle = await open(this.stagingPath, 'w');
    try {
      await handle.writeFile(content, 'utf8');
      await handle.sync();
    } finally {
      await handle.close();
    }
  }
}
