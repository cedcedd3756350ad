/**
 * AdFeed — Sources Module
 */

export {
  HttpPageFetcher,
  FetchError,
  isSoftBlocked,
  USER_AGENTS,
  DEFAULT_FETCH_TIMEOUT_MS,
  DEFAULT_RETRY_POLICY,
  type PageFetcher,
  type RetryPolicy,
  type RetrySleep,
  type FetchOptions,
  type HttpPageFetcherConfig,
} from './fetcher';
export {
  MarketplaceExtractor,
  adHash,
  normalizeListingUrl,
  isAcceptedPrice,
  MARKETPLACE_ORIGIN,
  type AdExtractor,
} from './extractor';
