/**
 * Configuration types (YAML file shape, snake_case keys)
 */

import type { ScopeMode } from '../routing/session-key.js';
import type { OverflowPolicy, QueueMode } from '../concurrency/types.js';

export interface AgentBindingConfig {
  /** Peer ids, or "<provider>:<peerId>" */
  peers?: string[];
  /** Guild / team / group ids */
  teams?: string[];
  accounts?: string[];
  /** Provider names */
  channels?: string[];
}

export interface AgentConfig {
  id: string;
  scope_mode?: ScopeMode;
  bindings?: AgentBindingConfig;
}

export interface SessionConfig {
  /** SQLite database path (~ is expanded) */
  database: string;
  /** Router-wide DM scope mode */
  scope_mode: ScopeMode;
  /** Reset after this many idle minutes (null disables) */
  idle_minutes: number | null;
  /** Local hour 0-23 of the daily reset (null disables) */
  daily_reset_hour: number | null;
  /** IANA timezone for the daily reset and cron jobs */
  timezone?: string;
  /** User/assistant turns never pruned from the context view */
  keep_recent_turns: number;
  /** Character budget for the context view (null for no limit) */
  max_context_chars: number | null;
  /** Turn budget for the context view (null for no limit) */
  max_context_turns: number | null;
  /** Attempts per database operation */
  store_retries: number;
}

export interface IngestConfig {
  dedupe_ttl_ms: number;
  dedupe_max_entries: number;
  dedupe_sweep_ms: number;
  debounce_ms: number;
  /** Per-provider debounce window overrides, e.g. { telegram: 1500 } */
  debounce_by_channel: Record<string, number>;
  inbound_capacity: number;
}

export interface QueueConfig {
  mode: QueueMode;
  /** Max pending units per session lane */
  cap: number;
  overflow: OverflowPolicy;
  /** Capacity of the "main" global lane */
  max_concurrent_runs: number;
  /** Extra global lanes and their capacity, e.g. { cron: 1, hook: 2 } */
  lanes: Record<string, number>;
}

export interface DeliveryConfig {
  retries: number;
  backoff_ms: number;
  max_backoff_ms: number;
  /** Sent to the user when a run fails (null sends nothing) */
  failure_reply: string | null;
}

export interface JobEntryConfig {
  id: string;
  name?: string;
  /** Cron expression; quote it in YAML when it starts with "*" */
  cron: string;
  body: string;
  agent?: string;
  enabled?: boolean;
}

export type ConfigLogLevel = 'debug' | 'info' | 'warn' | 'error' | 'none';

export const CONFIG_LOG_LEVELS: readonly ConfigLogLevel[] = ['debug', 'info', 'warn', 'error', 'none'];

export interface LoggingConfig {
  level: ConfigLogLevel;
}

export interface LanewayConfig {
  version: number;
  agents: AgentConfig[];
  session: SessionConfig;
  ingest: IngestConfig;
  queue: QueueConfig;
  delivery: DeliveryConfig;
  jobs: JobEntryConfig[];
  logging: LoggingConfig;
}

/**
 * What a config file may leave out; mergeWithDefaults fills the rest
 */
export interface PartialLanewayConfig {
  version?: number;
  agents?: AgentConfig[];
  session?: Partial<SessionConfig>;
  ingest?: Partial<IngestConfig>;
  queue?: Partial<QueueConfig>;
  delivery?: Partial<DeliveryConfig>;
  jobs?: JobEntryConfig[];
  logging?: Partial<LoggingConfig>;
}

export const DEFAULT_CONFIG: LanewayConfig = {
  version: 1,
  agents: [{ id: 'main' }],
  session: {
    database: '~/.laneway/sessions.db',
    scope_mode: 'per-channel-peer',
    idle_minutes: 120,
    daily_reset_hour: 4,
    keep_recent_turns: 12,
    max_context_chars: null,
    max_context_turns: null,
    store_retries: 3,
  },
  ingest: {
    dedupe_ttl_ms: 300000, // 5 minutes
    dedupe_max_entries: 10000,
    dedupe_sweep_ms: 60000,
    debounce_ms: 1000,
    debounce_by_channel: {},
    inbound_capacity: 1000,
  },
  queue: {
    mode: 'collect',
    cap: 20,
    overflow: 'drop-old',
    max_concurrent_runs: 4,
    lanes: { cron: 1, hook: 2 },
  },
  delivery: {
    retries: 3,
    backoff_ms: 500,
    max_backoff_ms: 10000,
    failure_reply: null,
  },
  jobs: [],
  logging: {
    level: 'info',
  },
};

/**
 * Paths for Laneway files
 */
export const LANEWAY_PATHS = {
  /** Laneway home directory */
  HOME: '~/.laneway',
  /** Configuration file */
  CONFIG: '~/.laneway/config.yaml',
  /** Session database */
  DATABASE: '~/.laneway/sessions.db',
} as const;
