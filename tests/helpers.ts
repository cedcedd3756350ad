/**
 * Shared fixtures for tests
 */

import type { ConfigDocument, ConfigSnapshot } from '../src/types';
import { toSnapshot } from '../src/config';

export const SOFA_SEARCH = 'https://facebook.com/marketplace/nyc/search?query=sofa';
export const LAMP_SEARCH = 'https://facebook.com/marketplace/nyc/search?query=lamp';

export function makeDocument(overrides: Partial<ConfigDocument> = {}): ConfigDocument {
  return {
    server_ip: '127.0.0.1',
    server_port: 5000,
    currency: '$',
    poll_interval_minutes: 15,
    log_filename: 'adfeed.log',
    database_name: 'adfeed.db',
    url_filters: {
      [SOFA_SEARCH]: { level1: ['sofa'], level2: ['leather'] },
      [LAMP_SEARCH]: { level1: ['lamp'] },
    },
    ...overrides,
  };
}

export function makeSnapshot(overrides: Partial<ConfigDocument> = {}): ConfigSnapshot {
  return toSnapshot(makeDocument(overrides));
}

export interface PageListing {
  id: string;
  title: string;
  price: string;
}

/**
 * Minimal marketplace search page markup.
 */
export function searchPage(listings: PageListing[]): string {
  const anchors = listings
    .map(
      (l) => `<a href="/marketplace/item/${l.id}/?ref=search">
        <span style="-webkit-line-clamp: 2;">${l.title}</span>
        <span dir="auto">${l.price}</span>
      </a>`
    )
    .join('\n');
  return `<html><body><div role="main">${anchors}</div></body></html>`;
}

export function listingUrl(id: string): string {
  return `https://facebook.com/marketplace/item/${id}/`;
}
