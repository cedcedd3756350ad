/**
 * AdFeed — Change Classification
 *
 * Which config fields take effect on the running process and which are
 * only picked up after a restart.
 */

import type { ChangeEffect, ConfigDocument, ConfigField, FieldChange } from '../types';

export const FIELD_EFFECTS: Record<ConfigField, ChangeEffect> = {
  url_filters: 'live',
  poll_interval_minutes: 'live',
  currency: 'live',
  server_ip: 'restart',
  server_port: 'restart',
  log_filename: 'restart',
  database_name: 'restart',
};

const FIELDS: readonly ConfigField[] = [
  'server_ip',
  'server_port',
  'currency',
  'poll_interval_minutes',
  'log_filename',
  'database_name',
  'url_filters',
];

type UrlFilters = ConfigDocument['url_filters'];

function sameKeywords(a: readonly string[], b: readonly string[]): boolean {
  return a.length === b.length && a.every((keyword, i) => keyword === b[i]);
}

/**
 * Levels are evaluated in numeric order, so their key order is not a change.
 */
function sameLevels(a: Record<string, string[]>, b: Record<string, string[]>): boolean {
  const levels = Object.keys(a);
  if (levels.length !== Object.keys(b).length) return false;
  return levels.every((level) => Object.hasOwn(b, level) && sameKeywords(a[level], b[level]));
}

/**
 * Target order is the fetch order and counts as a change.
 */
function sameFilters(a: UrlFilters, b: UrlFilters): boolean {
  const urls = Object.keys(a);
  if (!sameKeywords(urls, Object.keys(b))) return false;
  return urls.every((url) => sameLevels(a[url], b[url]));
}

function sameValue(field: ConfigField, previous: ConfigDocument, next: ConfigDocument): boolean {
  if (field === 'url_filters') return sameFilters(previous.url_filters, next.url_filters);
  return previous[field] === next[field];
}

/**
 * Fields that differ between two documents, each with its effect.
 */
export function classifyChanges(previous: ConfigDocument, next: ConfigDocument): FieldChange[] {
  return FIELDS.filter((field) => !sameValue(field, previous, next)).map((field) => ({
    field,
    effect: FIELD_EFFECTS[field],
  }));
}

export function describeChanges(changes: FieldChange[]): string {
  const live = changes.filter((c) => c.effect === 'live').map((c) => c.field);
  const restart = changes.filter((c) => c.effect === 'restart').map((c) => c.field);

  const parts: string[] = [];
  if (live.length > 0) parts.push(`applied live: ${live.join(', ')}`);
  if (restart.length > 0) parts.push(`restart required: ${restart.join(', ')}`);
  return parts.join('; ');
}
