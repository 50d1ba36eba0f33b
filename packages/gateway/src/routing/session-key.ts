/**
 * Session Key Utilities
 *
 * Session keys are pure functions of their inputs so the same conversation
 * lands on the same key across calls and process restarts.
 *
 * Formats:
 * - `agent:<agentId>:<scopeKey>` conversational sessions
 * - `cron:<jobId>` scheduled job sessions
 * - `hook:<hookId>` webhook-triggered sessions
 */

import type { ChatType } from '../ingest/message.js';

/**
 * How direct-message sessions collapse or separate across channels/peers/accounts
 */
export type ScopeMode = 'main' | 'per-peer' | 'per-channel-peer' | 'per-account-channel-peer';

export const SCOPE_MODES: readonly ScopeMode[] = [
  'main',
  'per-peer',
  'per-channel-peer',
  'per-account-channel-peer',
];

export const DEFAULT_ACCOUNT_ID = 'default';
export const SESSION_LANE_PREFIX = 'session:';

export interface SessionKeyInput {
  agentId: string;
  scopeMode: ScopeMode;
  provider: string;
  peerId: string;
  accountId?: string;
  chatType: ChatType;
  groupId?: string;
  threadId?: string;
}

export type ParsedSessionKey =
  | { kind: 'agent'; agentId: string; scopeKey: string }
  | { kind: 'cron'; jobId: string }
  | { kind: 'hook'; hookId: string };

export function isScopeMode(value: unknown): value is ScopeMode {
  return SCOPE_MODES.some((mode) => mode === value);
}

function normalizeName(value: string): string {
  return value.trim().toLowerCase();
}

function normalizeId(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

/**
 * Build the scope part of an agent session key
 *
 * @example
 * ```typescript
 * buildScopeKey({ agentId: 'main', scopeMode: 'per-channel-peer', provider: 'Telegram',
 *   peerId: '42', chatType: 'dm' })
 * // → 'telegram:dm:42'
 * ```
 */
export function buildScopeKey(input: Omit<SessionKeyInput, 'agentId'>): string {
  const provider = normalizeName(input.provider);
  const peerId = input.peerId.trim();
  const groupId = normalizeId(input.groupId) ?? peerId;
  const threadId = normalizeId(input.threadId);

  switch (input.chatType) {
    case 'thread':
      if (threadId) {
        return `${provider}:thread:${threadId}`;
      }
      return `${provider}:group:${groupId}`;
    case 'group':
    case 'channel':
      return `${provider}:group:${groupId}`;
    case 'dm':
      break;
  }

  switch (input.scopeMode) {
    case 'main':
      return 'main';
    case 'per-peer':
      return `dm:${peerId}`;
    case 'per-channel-peer':
      return `${provider}:dm:${peerId}`;
    case 'per-account-channel-peer': {
      const accountId = normalizeId(input.accountId) ?? DEFAULT_ACCOUNT_ID;
      return `${provider}:${accountId}:dm:${peerId}`;
    }
  }
}

/**
 * Build a conversational session key
 *
 * @returns Session key in format "agent:{agentId}:{scopeKey}"
 */
export function buildSessionKey(input: SessionKeyInput): string {
  return `agent:${normalizeName(input.agentId)}:${buildScopeKey(input)}`;
}

export function buildCronSessionKey(jobId: string): string {
  return `cron:${jobId.trim()}`;
}

export function buildHookSessionKey(hookId: string): string {
  return `hook:${hookId.trim()}`;
}

/**
 * Parse a session key into its components
 *
 * @returns Parsed components or null if invalid
 */
export function parseSessionKey(sessionKey: string): ParsedSessionKey | null {
  const key = sessionKey.startsWith(SESSION_LANE_PREFIX)
    ? sessionKey.slice(SESSION_LANE_PREFIX.length)
    : sessionKey;
  const [kind, ...rest] = key.split(':');

  if (kind === 'cron' && rest.length > 0 && rest.join(':')) {
    return { kind: 'cron', jobId: rest.join(':') };
  }
  if (kind === 'hook' && rest.length > 0 && rest.join(':')) {
    return { kind: 'hook', hookId: rest.join(':') };
  }
  if (kind === 'agent' && rest.length >= 2 && rest[0]) {
    const scopeKey = rest.slice(1).join(':');
    if (!scopeKey) {
      return null;
    }
    return { kind: 'agent', agentId: rest[0], scopeKey };
  }
  return null;
}

/**
 * Resolve session lane name from session key
 * Ensures consistent naming: "agent:main:main" → "session:agent:main:main"
 */
export function resolveSessionLane(sessionKey: string): string {
  const cleaned = sessionKey.trim() || 'main';
  return cleaned.startsWith(SESSION_LANE_PREFIX) ? cleaned : `${SESSION_LANE_PREFIX}${cleaned}`;
}

/**
 * Inverse of resolveSessionLane
 */
export function sessionKeyFromLane(laneKey: string): string {
  return laneKey.startsWith(SESSION_LANE_PREFIX) ? laneKey.slice(SESSION_LANE_PREFIX.length) : laneKey;
}
