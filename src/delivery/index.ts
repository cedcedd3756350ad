/**
 * AdFeed — Delivery Module
 */

export {
  FeedSynthesizer,
  feedLink,
  FEED_TITLE,
  FEED_DESCRIPTION,
  DEFAULT_FEED_WINDOW_MS,
  DEFAULT_ARRIVAL_LIMIT,
  type FeedSynthesizerConfig,
} from './rss';
