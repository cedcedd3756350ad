/**
 * AdFeed — Config Manager
 *
 * Single owner of the live ConfigSnapshot.
 *
 * Update path:
 *   validating → backing_up → writing → applying → stable(new)
 * Failure paths:
 *   validating → rejected                       (nothing touched)
 *   backing_up|writing|applying → rolling_back → stable(old)
 *
 * Readers call getSnapshot() and get either the old or the new snapshot,
 * never a mix: the swap is a single reference assignment.
 */

import type { ConfigDocument, ConfigSnapshot, ConfigUpdateResult, FieldChange } from '../types';
import { logger, errorMessage } from '../lib/logger';
import { Mutex } from '../lib/mutex';
import { ConfigFile, ConfigError, type ConfigBackup } from './file';
import { validateConfigDocument, toDocument, serializeDocument } from './validation';
import { classifyChanges, describeChanges } from './classify';

const log = logger.child({ component: 'config' });

// ============================================================
// TYPES
// ============================================================

type ConfigPhase =
  | 'stable'
  | 'validating'
  | 'backing_up'
  | 'writing'
  | 'applying'
  | 'rolling_back';

/**
 * Called after a new snapshot is swapped in. Throwing rolls the update back;
 * during rollback the listener is called again with the roles reversed.
 */
export type ApplyListener = (
  next: ConfigSnapshot,
  previous: ConfigSnapshot
) => void | Promise<void>;

export interface ConfigManagerOptions {
  snapshot: ConfigSnapshot;
  file: ConfigFile;
}

// ============================================================
// MANAGER
// ============================================================

export class ConfigManager {
  private snapshot: ConfigSnapshot;
  private phase: ConfigPhase = 'stable';
  private readonly file: ConfigFile;
  private readonly lock = new Mutex();
  private readonly listeners = new Set<ApplyListener>();

  constructor(options: ConfigManagerOptions) {
    this.snapshot = options.snapshot;
    this.file = options.file;
  }

  /**
   * Read and validate the config file at start-up.
   */
  static async load(path: string): Promise<ConfigManager> {
    const file = new ConfigFile(path);
    const document = await file.readDocument();
    const result = validateConfigDocument(document);

    if (!result.success) {
      throw new ConfigError(`Invalid config in ${path}: ${result.issues.join('; ')}`);
    }

    log.info('Configuration loaded', {
      path,
      targets: result.snapshot.targets.length,
      pollIntervalMinutes: result.snapshot.pollIntervalMinutes,
    });

    return new ConfigManager({ snapshot: result.snapshot, file });
  }

  getSnapshot(): ConfigSnapshot {
    return this.snapshot;
  }

  getDocument(): ConfigDocument {
    return toDocument(this.snapshot);
  }

  get path(): string {
    return this.file.path;
  }

  /**
   * The persisted document, read under the config lock.
   */
  async readDocument(): Promise<unknown> {
    return this.lock.runExclusive(() => this.file.readDocument());
  }

  /**
   * Register a listener run on every applied snapshot. Returns an unsubscribe function.
   */
  onApply(listener: ApplyListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /**
   * Validate, persist and apply a candidate document, all or nothing.
   */
  async applyUpdate(candidate: unknown): Promise<ConfigUpdateResult> {
    return this.lock.runExclusive(() => this.runUpdate(candidate));
  }

  private enter(phase: ConfigPhase): void {
    log.debug('Config phase', { from: this.phase, to: phase });
    this.phase = phase;
  }

  private async runUpdate(candidate: unknown): Promise<ConfigUpdateResult> {
    this.enter('validating');
    const validation = validateConfigDocument(candidate);

    if (!validation.success) {
      this.enter('stable');
      log.warn('Config update rejected', { issues: validation.issues });
      return {
        accepted: false,
        status: 'rejected',
        message: validation.issues.join('; '),
        changes: [],
        issues: validation.issues,
      };
    }

    const previous = this.snapshot;
    const changes = classifyChanges(toDocument(previous), validation.document);

    if (changes.length === 0) {
      this.enter('stable');
      return {
        accepted: true,
        status: 'unchanged',
        message: 'Configuration unchanged',
        changes,
      };
    }

    let backup: ConfigBackup;
    try {
      this.enter('backing_up');
      backup = await this.file.backup();
    } catch (error) {
      this.enter('stable');
      const message = `Failed to back up config: ${errorMessage(error)}`;
      log.error(message);
      return { accepted: false, status: 'rolled_back', message, changes };
    }

    const next = validation.snapshot;

    try {
      this.enter('writing');
      await this.file.write(serializeDocument(toDocument(next)));

      this.enter('applying');
      this.snapshot = next;
      await this.notify(next, previous);
    } catch (error) {
      return this.rollBack(backup, previous, next, changes, error);
    }

    this.enter('stable');
    const summary = describeChanges(changes);
    log.info('Config update applied', { changes });

    return {
      accepted: true,
      status: 'applied',
      message: `Configuration saved successfully (${summary})`,
      changes,
    };
  }

  private async rollBack(
    backup: ConfigBackup,
    previous: ConfigSnapshot,
    attempted: ConfigSnapshot,
    changes: FieldChange[],
    cause: unknown
  ): Promise<ConfigUpdateResult> {
    this.enter('rolling_back');
    const reason = errorMessage(cause);
    log.warn('Config update failed, rolling back', { error: reason });

    const wasApplied = this.snapshot === attempted;
    this.snapshot = previous;

    try {
      await this.file.restore(backup);
      if (wasApplied) {
        await this.notify(previous, attempted);
      }
    } catch (rollbackError) {
      this.enter('stable');
      const message = `Update failed (${reason}) and rollback failed (${errorMessage(rollbackError)})`;
      log.error('Config rollback failed, operator attention required', {
        error: reason,
        rollbackError: errorMessage(rollbackError),
        path: this.file.path,
      });
      return { accepted: false, status: 'rollback_failed', message, changes };
    }

    this.enter('stable');
    log.info('Config rolled back');
    return {
      accepted: false,
      status: 'rolled_back',
      message: `Update failed and was rolled back: ${reason}`,
      changes,
    };
  }

  private async notify(next: ConfigSnapshot, previous: ConfigSnapshot): Promise<void> {
    for (const listener of this.listeners) {
      await listener(next, previous);
    }
  }
}
