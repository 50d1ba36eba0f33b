/**
 * Type definitions for session state
 */

import type { ChatType } from '../ingest/message.js';

export type TurnRole = 'user' | 'assistant' | 'tool';

/**
 * Turn as handed to the store
 */
export interface TurnInput {
  role: TurnRole;
  content: string;
  /** Tool name for tool-result turns */
  toolName?: string;
  /** Defaults to the store clock */
  timestamp?: number;
  metadata?: Record<string, unknown>;
}

/**
 * Turn as persisted; `seq` is contiguous per session id and never reused
 */
export interface TranscriptTurn {
  seq: number;
  role: TurnRole;
  content: string;
  toolName?: string;
  timestamp: number;
  metadata?: Record<string, unknown>;
}

export interface Transcript {
  sessionKey: string;
  sessionId: string;
  turns: readonly TranscriptTurn[];
}

/**
 * Where a session's traffic comes from (recorded on the index entry)
 */
export interface SessionOrigin {
  agentId?: string;
  provider?: string;
  chatType?: ChatType;
  peerId?: string;
  peerName?: string;
  accountId?: string;
}

export interface TokenUsage {
  inputTokens: number;
  outputTokens: number;
  totalTokens: number;
}

export interface SessionRecord extends SessionOrigin {
  sessionKey: string;
  sessionId: string;
  usage: TokenUsage;
  lastMessage?: string;
  lastReply?: string;
  /** Free-form per-session state kept across runs (cleared on reset) */
  context: Record<string, unknown>;
  createdAt: number;
  updatedAt: number;
}

export type ResetReason = 'idle' | 'daily' | 'manual';

export interface ArchivedSession {
  sessionId: string;
  sessionKey: string;
  reason: ResetReason;
  archivedAt: number;
  turnCount: number;
  record: SessionRecord;
}

export interface RunRecord {
  usage?: Partial<TokenUsage>;
  lastMessage?: string;
  lastReply?: string;
}
