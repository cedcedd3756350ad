/**
 * AdFeed — Store Module
 */

export {
  ChangeStore,
  StoreError,
  DEFAULT_RETENTION_MS,
  DEFAULT_RECENT_LIMIT,
  type ChangeStoreConfig,
} from './change-store';
