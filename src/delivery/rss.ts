/**
 * AdFeed — RSS Feed
 *
 * Renders the change store's recent records as an RSS 2.0 document.
 * Every render reads the store; nothing is cached between requests.
 */

import { XMLBuilder } from 'fast-xml-parser';
import type { AdLedger, AdRecord, Arrival } from '../types';
import { DEFAULT_RECENT_LIMIT } from '../store';

// ============================================================
// TYPES
// ============================================================

export interface FeedSynthesizerConfig {
  store: Pick<AdLedger, 'recent'>;
  /** Public URL of the feed itself */
  feedLink: string;
  /** How far back records are published (default: 7 days) */
  windowMs?: number;
  /** Maximum items per render (default: 100) */
  limit?: number;
  /** Arrivals kept in memory for /api/arrivals (default: 50) */
  arrivalLimit?: number;
  now?: () => Date;
}

// ============================================================
// CONSTANTS
// ============================================================

export const FEED_TITLE = 'Marketplace Ad Feed';
export const FEED_DESCRIPTION = 'New listings matching the configured marketplace searches';
export const DEFAULT_FEED_WINDOW_MS = 7 * 24 * 60 * 60 * 1000;
export const DEFAULT_ARRIVAL_LIMIT = 50;

const builder = new XMLBuilder({
  ignoreAttributes: false,
  attributeNamePrefix: '@_',
  format: true,
  indentBy: '  ',
});

export function feedLink(serverIp: string, serverPort: number): string {
  return `http://${serverIp}:${serverPort}/rss`;
}

function toItem(record: AdRecord) {
  return {
    title: `${record.title} - ${record.price}`,
    link: record.url,
    description: `Price: ${record.price} | Title: ${record.title}`,
    guid: { '#text': record.id, '@_isPermaLink': 'false' },
    pubDate: record.lastChecked.toUTCString(),
  };
}

// ============================================================
// SYNTHESIZER
// ============================================================

export class FeedSynthesizer {
  private readonly store: Pick<AdLedger, 'recent'>;
  private readonly link: string;
  private readonly windowMs: number;
  private readonly limit: number;
  private readonly arrivalLimit: number;
  private readonly now: () => Date;
  private arrivals: Arrival[] = [];

  constructor(config: FeedSynthesizerConfig) {
    this.store = config.store;
    this.link = config.feedLink;
    this.windowMs = config.windowMs ?? DEFAULT_FEED_WINDOW_MS;
    this.limit = config.limit ?? DEFAULT_RECENT_LIMIT;
    this.arrivalLimit = config.arrivalLimit ?? DEFAULT_ARRIVAL_LIMIT;
    this.now = config.now ?? (() => new Date());
  }

  /**
   * Build the feed from the records checked within the window, newest first.
   */
  render(): string {
    const now = this.now();
    const records = this.store.recent(new Date(now.getTime() - this.windowMs), this.limit);

    return builder.build({
      '?xml': { '@_version': '1.0', '@_encoding': 'UTF-8' },
      rss: {
        '@_version': '2.0',
        channel: {
          title: FEED_TITLE,
          link: this.link,
          description: FEED_DESCRIPTION,
          lastBuildDate: now.toUTCString(),
          item: records.map(toItem),
        },
      },
    });
  }

  /**
   * Remember an arrival reported by the scheduler. Newest first, bounded.
   */
  recordArrival(arrival: Arrival): void {
    this.arrivals = [arrival, ...this.arrivals].slice(0, this.arrivalLimit);
  }

  recentArrivals(): Arrival[] {
    return [...this.arrivals];
  }
}
