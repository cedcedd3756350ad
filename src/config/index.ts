/**
 * AdFeed — Config Module
 */

export { ConfigManager, type ApplyListener, type ConfigManagerOptions } from './manager';
export { ConfigFile, ConfigError, contentHash, type ConfigBackup } from './file';
export {
  validateConfigDocument,
  toSnapshot,
  toDocument,
  serializeDocument,
  type ValidationResult,
} from './validation';
export { classifyChanges, describeChanges, FIELD_EFFECTS } from './classify';
