/**
 * AdFeed — Configuration Types
 *
 * The config document is the JSON file operators edit (snake_case keys).
 * A ConfigSnapshot is the validated, immutable form the rest of the code reads.
 */

import { z } from 'zod';

// ============================================================
// FILTERS
// ============================================================

/** Level identifiers are "level" followed by a decimal number: level1, level2, level10 */
export const LEVEL_KEY_PATTERN = /^level(\d+)$/;

/**
 * Level identifier → keywords. AND across levels, OR within a level.
 */
export type FilterSpec = Readonly<Record<string, readonly string[]>>;

export interface Target {
  readonly url: string;
  readonly filterSpec: FilterSpec;
}

// ============================================================
// CONFIG DOCUMENT
// ============================================================

/** Longest interval a Node timer holds without clamping (2^31-1 ms) */
export const MAX_POLL_INTERVAL_MINUTES = 35_791;

export const ConfigDocumentSchema = z.object({
  server_ip: z.string().min(1, 'must not be empty'),
  server_port: z.number().int().min(1).max(65535),
  currency: z.string(),
  poll_interval_minutes: z
    .number()
    .int()
    .positive('must be greater than 0')
    .max(MAX_POLL_INTERVAL_MINUTES, `must be at most ${MAX_POLL_INTERVAL_MINUTES}`),
  log_filename: z.string().min(1),
  database_name: z.string().min(1),
  url_filters: z.record(z.string(), z.record(z.string(), z.array(z.string()))),
});
export type ConfigDocument = z.infer<typeof ConfigDocumentSchema>;

export type ConfigField = keyof ConfigDocument;

// ============================================================
// SNAPSHOT
// ============================================================

export interface ConfigSnapshot {
  readonly serverIp: string;
  readonly serverPort: number;
  readonly currency: string;
  readonly pollIntervalMinutes: number;
  readonly logFilename: string;
  readonly databaseName: string;
  readonly targets: readonly Target[];
}

// ============================================================
// UPDATES
// ============================================================

/** live: takes effect without disruption. restart: recorded, needs a process restart. */
export type ChangeEffect = 'live' | 'restart';

export interface FieldChange {
  field: ConfigField;
  effect: ChangeEffect;
}

export type ConfigUpdateStatus =
  | 'applied'
  | 'unchanged'
  | 'rejected'
  | 'rolled_back'
  | 'rollback_failed';

export interface ConfigUpdateResult {
  accepted: boolean;
  status: ConfigUpdateStatus;
  message: string;
  changes: FieldChange[];
  /** Validation issues, present when status is 'rejected' */
  issues?: string[];
}
