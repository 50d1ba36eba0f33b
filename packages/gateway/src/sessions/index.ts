export { SessionStore, type SessionStoreOptions } from './session-store.js';

export {
  buildTranscriptView,
  DEFAULT_KEEP_RECENT_TURNS,
  type TranscriptView,
  type TranscriptViewOptions,
} from './transcript-view.js';

export {
  evaluateFreshness,
  lastDailyBoundary,
  nextDailyReset,
  dailyResetCron,
  type Freshness,
  type ResetPolicy,
} from './reset-policy.js';

export type {
  ArchivedSession,
  ResetReason,
  RunRecord,
  SessionOrigin,
  SessionRecord,
  TokenUsage,
  Transcript,
  TranscriptTurn,
  TurnInput,
  TurnRole,
} from './types.js';
