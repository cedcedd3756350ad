/**
 * AdFeed — Config Validation
 *
 * Turns an untrusted config document into a ConfigSnapshot.
 * Nothing downstream reads the raw document: a snapshot only exists
 * once every rule below has passed.
 */

import { z } from 'zod';
import { ConfigDocumentSchema } from '../types';
import type { ConfigDocument, ConfigSnapshot, FilterSpec, Target } from '../types';
import { isLevelKey } from '../filter';

// ============================================================
// RULES
// ============================================================

function isWellFormedUrl(value: string): boolean {
  try {
    const parsed = new URL(value);
    return parsed.protocol.length > 1 && parsed.hostname.length > 0;
  } catch {
    return false;
  }
}

const ValidatedConfigSchema = ConfigDocumentSchema.superRefine((doc, ctx) => {
  for (const [url, levels] of Object.entries(doc.url_filters)) {
    if (!isWellFormedUrl(url)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['url_filters', url],
        message: `Invalid URL format: ${url}`,
      });
    }

    for (const level of Object.keys(levels)) {
      if (!isLevelKey(level)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['url_filters', url, level],
          message: `Invalid filter level name '${level}' for URL '${url}'`,
        });
      }
    }
  }
});

// ============================================================
// VALIDATION
// ============================================================

export type ValidationResult =
  | { success: true; document: ConfigDocument; snapshot: ConfigSnapshot }
  | { success: false; issues: string[] };

function formatIssue(issue: z.ZodIssue): string {
  if (issue.code === z.ZodIssueCode.custom || issue.path.length === 0) {
    return issue.message;
  }
  return `${issue.path.join('.')}: ${issue.message}`;
}

/**
 * Validate a candidate document. All issues are reported, not just the first.
 */
export function validateConfigDocument(input: unknown): ValidationResult {
  const parsed = ValidatedConfigSchema.safeParse(input);

  if (!parsed.success) {
    return { success: false, issues: parsed.error.issues.map(formatIssue) };
  }

  return { success: true, document: parsed.data, snapshot: toSnapshot(parsed.data) };
}

// ============================================================
// CONVERSION
// ============================================================

function freezeFilterSpec(levels: Record<string, string[]>): FilterSpec {
  const spec: Record<string, readonly string[]> = {};
  for (const [level, keywords] of Object.entries(levels)) {
    spec[level] = Object.freeze([...keywords]);
  }
  return Object.freeze(spec);
}

export function toSnapshot(document: ConfigDocument): ConfigSnapshot {
  const targets: Target[] = Object.entries(document.url_filters).map(([url, levels]) =>
    Object.freeze({ url, filterSpec: freezeFilterSpec(levels) })
  );

  return Object.freeze({
    serverIp: document.server_ip,
    serverPort: document.server_port,
    currency: document.currency,
    pollIntervalMinutes: document.poll_interval_minutes,
    logFilename: document.log_filename,
    databaseName: document.database_name,
    targets: Object.freeze(targets),
  });
}

/**
 * The document form of a snapshot, keys in a fixed order.
 */
export function toDocument(snapshot: ConfigSnapshot): ConfigDocument {
  const urlFilters: ConfigDocument['url_filters'] = {};
  for (const target of snapshot.targets) {
    const levels: Record<string, string[]> = {};
    for (const [level, keywords] of Object.entries(target.filterSpec)) {
      levels[level] = [...keywords];
    }
    urlFilters[target.url] = levels;
  }

  return {
    server_ip: snapshot.serverIp,
    server_port: snapshot.serverPort,
    currency: snapshot.currency,
    poll_interval_minutes: snapshot.pollIntervalMinutes,
    log_filename: snapshot.logFilename,
    database_name: snapshot.databaseName,
    url_filters: urlFilters,
  };
}

export function serializeDocument(document: ConfigDocument): string {
  return `${JSON.stringify(document, null, 2)}\n`;
}
