/**
 * AdFeed — Ad Extractor
 *
 * Turns a raw search page into candidate records.
 *
 * MarketplaceExtractor reads the rendered marketplace search markup:
 * every anchor pointing at /marketplace/item/ is one listing, with the
 * title in the line-clamped span and the price in the first dir="auto" span.
 */

import { createHash } from 'crypto';
import * as cheerio from 'cheerio';
import type { CandidateRecord, Target } from '../types';
import { logger } from '../lib/logger';

const log = logger.child({ component: 'extractor' });

export interface AdExtractor {
  extract(rawContent: string, target: Target, currency: string): CandidateRecord[];
}

export const MARKETPLACE_ORIGIN = 'https://facebook.com';

const LISTING_SELECTOR = "a[href^='/marketplace/item/']";
const TITLE_SELECTOR = "span[style*='-webkit-line-clamp']";
const PRICE_SELECTOR = "span[dir='auto']";

/**
 * Stable ad id: MD5 hex digest of the canonical listing URL.
 */
export function adHash(url: string): string {
  return createHash('md5').update(url, 'utf8').digest('hex');
}

/**
 * Absolute listing URL with the query string dropped.
 */
export function normalizeListingUrl(href: string, origin: string = MARKETPLACE_ORIGIN): string {
  const path = href.split('?')[0];
  return `${origin}${path}`;
}

/**
 * A price is kept when it is in the configured currency or marked free.
 */
export function isAcceptedPrice(price: string, currency: string): boolean {
  return price.startsWith(currency) || price.toLowerCase().includes('free');
}

export class MarketplaceExtractor implements AdExtractor {
  constructor(private readonly origin: string = MARKETPLACE_ORIGIN) {}

  extract(rawContent: string, target: Target, currency: string): CandidateRecord[] {
    const $ = cheerio.load(rawContent);
    const seen = new Set<string>();
    const candidates: CandidateRecord[] = [];

    $(LISTING_SELECTOR).each((_, element) => {
      const link = $(element);
      const href = link.attr('href');
      if (!href) return;

      const sourceUrl = normalizeListingUrl(href, this.origin);
      if (seen.has(sourceUrl)) return;
      seen.add(sourceUrl);

      const title = link.find(TITLE_SELECTOR).first().text().trim();
      const price = link.find(PRICE_SELECTOR).first().text().trim();
      if (!title || !price) return;

      if (!isAcceptedPrice(price, currency)) return;

      candidates.push({ title, price, sourceUrl, originTarget: target.url });
    });

    log.debug('Candidates extracted', {
      target: target.url,
      listings: seen.size,
      candidates: candidates.length,
    });

    return candidates;
  }
}
