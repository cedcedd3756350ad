/**
 * AdFeed — Ad Types
 *
 * Candidates come from the extractor and live for one cycle.
 * AdRecords are what the change store persists and the feed publishes.
 */

import { z } from 'zod';

// ============================================================
// CANDIDATES
// ============================================================

export const CandidateRecordSchema = z.object({
  title: z.string(),
  /** Raw price text as shown on the listing, e.g. "$120" or "Free" */
  price: z.string(),
  /** Canonical listing URL, query string stripped */
  sourceUrl: z.string().url(),
  /** URL of the target whose search page produced this candidate */
  originTarget: z.string(),
});
export type CandidateRecord = z.infer<typeof CandidateRecordSchema>;

// ============================================================
// PERSISTED RECORDS
// ============================================================

export interface AdRecord {
  /** MD5 hex digest of the listing URL */
  id: string;
  title: string;
  price: string;
  url: string;
  firstSeen: Date;
  lastChecked: Date;
}

/**
 * One sighting of an accepted ad, as handed to the store.
 */
export interface AdSighting {
  id: string;
  title: string;
  price: string;
  url: string;
  seenAt: Date;
}

export type UpsertOutcome = 'inserted' | 'updated';

/**
 * An ad stored for the first time during a cycle.
 */
export interface Arrival {
  id: string;
  title: string;
  price: string;
  url: string;
  /** Target URL whose search page listed it */
  target: string;
  seenAt: Date;
}

/**
 * The subset of the change store the poll cycle and the feed depend on.
 */
export interface AdLedger {
  isKnown(id: string): boolean;
  upsert(sighting: AdSighting): UpsertOutcome;
  recent(since: Date, limit?: number): AdRecord[];
  prune(retentionMs?: number): number;
}
