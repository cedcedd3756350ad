/**
 * AdFeed — Type Exports
 */

export type {
  CandidateRecord,
  AdRecord,
  AdSighting,
  UpsertOutcome,
  Arrival,
  AdLedger,
} from './ad';
export { CandidateRecordSchema } from './ad';

export type {
  FilterSpec,
  Target,
  ConfigDocument,
  ConfigField,
  ConfigSnapshot,
  ChangeEffect,
  FieldChange,
  ConfigUpdateStatus,
  ConfigUpdateResult,
} from './config';
export { ConfigDocumentSchema, LEVEL_KEY_PATTERN, MAX_POLL_INTERVAL_MINUTES } from './config';
