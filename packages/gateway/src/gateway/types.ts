/**
 * Gateway boundary types: agent runtime, channel adapters, runtime settings
 */

import type { InboundMessage, ChatType } from '../ingest/message.js';
import type { AgentDefinition } from '../routing/agent-router.js';
import type { ScopeMode } from '../routing/session-key.js';
import type { ResetPolicy } from '../sessions/reset-policy.js';
import type { TranscriptTurn } from '../sessions/types.js';
import type { QueueMode, QueueSettings } from '../concurrency/types.js';

// ============================================================================
// Agent runtime
// ============================================================================

export type ResponseBlock =
  | { type: 'text'; text: string }
  | { type: 'tool_use'; name: string; input: unknown }
  | { type: 'tool_result'; name: string; content: string };

export interface RunUsage {
  inputTokens: number;
  outputTokens: number;
  /** Defaults to input + output */
  totalTokens?: number;
}

export interface AgentRunRequest {
  sessionKey: string;
  agentId: string;
  /** Pruned view of the stored transcript, excluding this batch */
  transcript: readonly TranscriptTurn[];
  /** The new batch, in arrival order */
  messages: readonly InboundMessage[];
  /** True when the batch was collapsed by the summarize overflow policy */
  summarize: boolean;
  /** Number of queued units folded into this batch */
  collapsed: number;
  /** Check between tool steps; stop and yield nothing more once aborted */
  signal: AbortSignal;
  /** Messages steered into this run since the last call */
  takeSteering: () => InboundMessage[];
  /** Session context map as of the start of the run */
  context: Readonly<Record<string, unknown>>;
  /** Merge keys into the session context (undefined removes a key) */
  updateContext: (patch: Record<string, unknown>) => void;
}

/**
 * Opaque agent runtime. Yields response blocks and returns token usage
 * (undefined when the runtime does not report it).
 */
export interface AgentExecutor {
  run(request: AgentRunRequest): AsyncGenerator<ResponseBlock, RunUsage | undefined, void>;
}

// ============================================================================
// Channel adapters
// ============================================================================

export interface DeliveryTarget {
  peerId: string;
  chatType: ChatType;
  accountId?: string;
  threadId?: string;
  replyToId?: string;
}

export interface SendOptions {
  sessionKey: string;
  agentId: string;
}

export interface DeliveryResult {
  delivered: boolean;
  messageId?: string;
}

export interface ChannelAdapter {
  readonly provider: string;
  send(target: DeliveryTarget, body: string, options: SendOptions): Promise<DeliveryResult>;
}

// ============================================================================
// Completion reporting
// ============================================================================

export type CompletionStatus = 'completed' | 'failed' | 'cancelled';

export interface CompletionSummary {
  unitId: string;
  sessionKey: string;
  agentId: string;
  status: CompletionStatus;
  inputTokens: number;
  outputTokens: number;
  totalTokens: number;
  /** Assistant reply text (absent when cancelled or failed before a reply) */
  reply?: string;
  delivered: boolean;
  error?: string;
  durationMs: number;
}

export type CompletionListener = (summary: CompletionSummary) => void;

// ============================================================================
// Settings
// ============================================================================

export interface IngestSettings {
  dedupeTtlMs: number;
  dedupeMaxEntries: number;
  dedupeSweepMs: number;
  debounceMs: number;
  /** Per-provider debounce window overrides */
  debounceByChannel: Record<string, number>;
  inboundCapacity: number;
}

export interface DeliverySettings {
  /** Retries after the first failed send */
  retries: number;
  backoffMs: number;
  maxBackoffMs: number;
  /** Sent to the user when a run fails; nothing is sent when unset */
  failureReply?: string;
}

export interface TranscriptSettings {
  keepRecentTurns: number;
  maxChars?: number;
  maxTurns?: number;
}

export interface ScheduledJobSettings {
  id: string;
  name: string;
  cronExpr: string;
  body: string;
  enabled: boolean;
  /** Agent that runs the job (default: the router's default agent) */
  agentId?: string;
}

export interface GatewaySettings {
  agents: AgentDefinition[];
  scopeMode: ScopeMode;
  reset: ResetPolicy;
  transcript: TranscriptSettings;
  ingest: IngestSettings;
  queue: QueueSettings;
  delivery: DeliverySettings;
  jobs: ScheduledJobSettings[];
  /** Timezone for cron jobs and the daily reset sweep */
  timezone?: string;
}

export interface SubmitOptions {
  agentId?: string;
  /** Global lane (default: "cron" for scheduled work, "hook" for hooks) */
  globalLane?: string;
  mode?: QueueMode;
}
