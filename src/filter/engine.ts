/**
 * AdFeed — Filter Engine
 *
 * Deterministic keyword filtering of candidate titles.
 *
 * A title passes a FilterSpec when every level has at least one keyword
 * that is a case-insensitive substring of the title. Levels run in the
 * numeric order of their suffix and the first failing level stops evaluation.
 * No stemming, no tokenization.
 */

import type { FilterSpec } from '../types';
import { LEVEL_KEY_PATTERN } from '../types';
import { logger } from '../lib/logger';

const log = logger.child({ component: 'filter' });

/**
 * Whether a key follows the level naming convention.
 */
export function isLevelKey(key: string): boolean {
  return LEVEL_KEY_PATTERN.test(key);
}

function levelNumber(key: string): number {
  const match = LEVEL_KEY_PATTERN.exec(key);
  return match ? Number.parseInt(match[1], 10) : 0;
}

/**
 * Level keys of a spec in evaluation order. Non-level keys are dropped.
 */
export function orderedLevels(filterSpec: FilterSpec): string[] {
  return Object.keys(filterSpec)
    .filter(isLevelKey)
    .sort((a, b) => levelNumber(a) - levelNumber(b));
}

function isKeywordList(value: unknown): value is readonly string[] {
  return Array.isArray(value) && value.every((keyword) => typeof keyword === 'string');
}

/**
 * Evaluate a title against a target's filter levels.
 */
export function accepts(filterSpec: FilterSpec | null | undefined, title: string): boolean {
  if (!filterSpec) return true;

  const levels = orderedLevels(filterSpec);
  if (levels.length === 0) return true;

  const titleLower = title.toLowerCase();

  for (const level of levels) {
    const keywords: unknown = filterSpec[level];

    if (!isKeywordList(keywords)) {
      log.warn('Malformed filter level skipped', { level });
      continue;
    }

    // An empty level constrains nothing
    if (keywords.length === 0) continue;

    const matched = keywords.some((keyword) => titleLower.includes(keyword.toLowerCase()));
    if (!matched) return false;
  }

  return true;
}
