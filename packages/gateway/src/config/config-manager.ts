/**
 * Configuration Manager
 *
 * Loads, validates and writes the YAML configuration at ~/.laneway/config.yaml
 * and converts it into the runtime settings the Gateway consumes.
 */

import { readFile, writeFile, mkdir } from 'node:fs/promises';
import { existsSync } from 'node:fs';
import { homedir } from 'node:os';
import { dirname } from 'node:path';
import * as yaml from 'js-yaml';
import { setLogLevel } from '@laneway/core/debug-logger';
import { ConfigurationError } from '@laneway/core/errors';

import { isScopeMode, SCOPE_MODES } from '../routing/session-key.js';
import {
  isOverflowPolicy,
  isQueueMode,
  OVERFLOW_POLICIES,
  QUEUE_MODES,
} from '../concurrency/types.js';
import { CronScheduler } from '../scheduler/cron-scheduler.js';
import { SessionStore } from '../sessions/session-store.js';
import type { GatewaySettings } from '../gateway/types.js';
import {
  CONFIG_LOG_LEVELS,
  DEFAULT_CONFIG,
  LANEWAY_PATHS,
  type AgentBindingConfig,
  type AgentConfig,
  type JobEntryConfig,
  type LanewayConfig,
  type PartialLanewayConfig,
} from './types.js';

type RawMap = Record<string, unknown>;
type Env = Record<string, string | undefined>;

/**
 * Expand ~ to home directory
 */
export function expandPath(path: string): string {
  if (path.startsWith('~')) {
    return path.replace('~', homedir());
  }
  return path;
}

/**
 * Substitute `${VAR}` and `${VAR:-fallback}` references
 */
export function expandEnv(text: string, env: Env = process.env): string {
  return text.replace(
    /\$\{([A-Za-z_][A-Za-z0-9_]*)(?::-([^}]*))?\}/g,
    (_match, name: string, fallback: string | undefined) => env[name] ?? fallback ?? ''
  );
}

export function getConfigPath(path: string = LANEWAY_PATHS.CONFIG): string {
  return expandPath(path);
}

export function configExists(path?: string): boolean {
  return existsSync(getConfigPath(path));
}

// ============================================================================
// Parsing
// ============================================================================

function isRecord(value: unknown): value is RawMap {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function fail(key: string, message: string, received?: unknown): never {
  throw new ConfigurationError(
    key,
    message,
    received !== undefined ? { received: String(received).substring(0, 100) } : {}
  );
}

function section(raw: RawMap, key: string): RawMap | undefined {
  const value = raw[key];
  if (value === undefined || value === null) return undefined;
  if (!isRecord(value)) fail(key, 'must be a mapping', value);
  return value;
}

function list(raw: RawMap, key: string, path: string): unknown[] | undefined {
  const value = raw[key];
  if (value === undefined || value === null) return undefined;
  if (!Array.isArray(value)) fail(`${path}.${key}`, 'must be a list', value);
  return value;
}

function num(raw: RawMap, key: string, path: string): number | undefined {
  const value = raw[key];
  if (value === undefined) return undefined;
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    fail(`${path}.${key}`, 'must be a number', value);
  }
  return value;
}

/** `null` is kept: it switches the setting off */
function nullableNum(raw: RawMap, key: string, path: string): number | null | undefined {
  return raw[key] === null ? null : num(raw, key, path);
}

function str(raw: RawMap, key: string, path: string): string | undefined {
  const value = raw[key];
  if (value === undefined || value === null) return undefined;
  if (typeof value === 'number') return String(value);
  if (typeof value !== 'string') fail(`${path}.${key}`, 'must be a string', value);
  return value;
}

function nullableStr(raw: RawMap, key: string, path: string): string | null | undefined {
  return raw[key] === null ? null : str(raw, key, path);
}

function bool(raw: RawMap, key: string, path: string): boolean | undefined {
  const value = raw[key];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== 'boolean') fail(`${path}.${key}`, 'must be true or false', value);
  return value;
}

function strings(raw: RawMap, key: string, path: string): string[] | undefined {
  return list(raw, key, path)?.map((item) => {
    if (typeof item !== 'string' && typeof item !== 'number') {
      fail(`${path}.${key}`, 'must be a list of strings', item);
    }
    return String(item);
  });
}

function numberMap(raw: RawMap, key: string, path: string): Record<string, number> | undefined {
  const value = section(raw, key);
  if (!value) return undefined;
  const result: Record<string, number> = {};
  for (const name of Object.keys(value)) {
    const entry = num(value, name, `${path}.${key}`);
    if (entry !== undefined) result[name] = entry;
  }
  return result;
}

function oneOf<T extends string>(
  raw: RawMap,
  key: string,
  path: string,
  allowed: readonly T[]
): T | undefined {
  const value = str(raw, key, path);
  if (value === undefined) return undefined;
  const match = allowed.find((candidate) => candidate === value);
  if (match === undefined) fail(`${path}.${key}`, `must be one of: ${allowed.join(', ')}`, value);
  return match;
}

function parseAgent(item: unknown, index: number): AgentConfig {
  const path = `agents[${index}]`;
  if (!isRecord(item)) fail(path, 'must be a mapping', item);
  const id = str(item, 'id', path);
  if (!id) fail(`${path}.id`, 'is required');

  const rawBindings = isRecord(item.bindings) ? item.bindings : undefined;
  if (item.bindings !== undefined && item.bindings !== null && !rawBindings) {
    fail(`${path}.bindings`, 'must be a mapping', item.bindings);
  }
  let bindings: AgentBindingConfig | undefined;
  if (rawBindings) {
    const bindingPath = `${path}.bindings`;
    bindings = {
      peers: strings(rawBindings, 'peers', bindingPath),
      teams: strings(rawBindings, 'teams', bindingPath),
      accounts: strings(rawBindings, 'accounts', bindingPath),
      channels: strings(rawBindings, 'channels', bindingPath),
    };
  }

  return { id, scope_mode: oneOf(item, 'scope_mode', path, SCOPE_MODES), bindings };
}

function parseJob(item: unknown, index: number): JobEntryConfig {
  const path = `jobs[${index}]`;
  if (!isRecord(item)) fail(path, 'must be a mapping', item);
  const id = str(item, 'id', path);
  const cron = str(item, 'cron', path);
  if (!id) fail(`${path}.id`, 'is required');
  if (!cron) fail(`${path}.cron`, 'is required');
  return {
    id,
    name: str(item, 'name', path),
    cron,
    body: str(item, 'body', path) ?? '',
    agent: str(item, 'agent', path),
    enabled: bool(item, 'enabled', path),
  };
}

/**
 * Parse YAML text (after env expansion) into a partial configuration.
 * Type errors are reported here; range checks belong to validateConfig.
 *
 * @throws ConfigurationError on YAML syntax errors or wrongly typed values
 */
export function parseConfig(text: string, env: Env = process.env): PartialLanewayConfig {
  let raw: unknown;
  try {
    raw = yaml.load(expandEnv(text, env));
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    if (message.includes('unidentified alias')) {
      fail(
        'yaml',
        `${message}. Hint: cron expressions starting with "*" must be quoted, e.g. cron: "*/10 * * * *"`
      );
    }
    fail('yaml', message);
  }

  if (raw === undefined || raw === null) {
    return {};
  }
  if (!isRecord(raw)) {
    fail('config', 'top level must be a mapping', raw);
  }

  const session = section(raw, 'session');
  const ingest = section(raw, 'ingest');
  const queue = section(raw, 'queue');
  const delivery = section(raw, 'delivery');
  const logging = section(raw, 'logging');

  return {
    version: num(raw, 'version', 'config'),
    agents: list(raw, 'agents', 'config')?.map(parseAgent),
    session: session && {
      database: str(session, 'database', 'session'),
      scope_mode: oneOf(session, 'scope_mode', 'session', SCOPE_MODES),
      idle_minutes: nullableNum(session, 'idle_minutes', 'session'),
      daily_reset_hour: nullableNum(session, 'daily_reset_hour', 'session'),
      timezone: str(session, 'timezone', 'session'),
      keep_recent_turns: num(session, 'keep_recent_turns', 'session'),
      max_context_chars: nullableNum(session, 'max_context_chars', 'session'),
      max_context_turns: nullableNum(session, 'max_context_turns', 'session'),
      store_retries: num(session, 'store_retries', 'session'),
    },
    ingest: ingest && {
      dedupe_ttl_ms: num(ingest, 'dedupe_ttl_ms', 'ingest'),
      dedupe_max_entries: num(ingest, 'dedupe_max_entries', 'ingest'),
      dedupe_sweep_ms: num(ingest, 'dedupe_sweep_ms', 'ingest'),
      debounce_ms: num(ingest, 'debounce_ms', 'ingest'),
      debounce_by_channel: numberMap(ingest, 'debounce_by_channel', 'ingest'),
      inbound_capacity: num(ingest, 'inbound_capacity', 'ingest'),
    },
    queue: queue && {
      mode: oneOf(queue, 'mode', 'queue', QUEUE_MODES),
      cap: num(queue, 'cap', 'queue'),
      overflow: oneOf(queue, 'overflow', 'queue', OVERFLOW_POLICIES),
      max_concurrent_runs: num(queue, 'max_concurrent_runs', 'queue'),
      lanes: numberMap(queue, 'lanes', 'queue'),
    },
    delivery: delivery && {
      retries: num(delivery, 'retries', 'delivery'),
      backoff_ms: num(delivery, 'backoff_ms', 'delivery'),
      max_backoff_ms: num(delivery, 'max_backoff_ms', 'delivery'),
      failure_reply: nullableStr(delivery, 'failure_reply', 'delivery'),
    },
    jobs: list(raw, 'jobs', 'config')?.map(parseJob),
    logging: logging && {
      level: oneOf(logging, 'level', 'logging', CONFIG_LOG_LEVELS),
    },
  };
}

// ============================================================================
// Defaults and validation
// ============================================================================

function pick<T>(value: T | undefined, fallback: T): T {
  return value === undefined ? fallback : value;
}

/**
 * Fill every missing field from DEFAULT_CONFIG
 */
export function mergeWithDefaults(config: PartialLanewayConfig): LanewayConfig {
  const session = config.session ?? {};
  const ingest = config.ingest ?? {};
  const queue = config.queue ?? {};
  const delivery = config.delivery ?? {};
  const defaults = DEFAULT_CONFIG;

  return {
    version: pick(config.version, defaults.version),
    agents: pick(config.agents, defaults.agents),
    session: {
      database: pick(session.database, defaults.session.database),
      scope_mode: pick(session.scope_mode, defaults.session.scope_mode),
      idle_minutes: pick(session.idle_minutes, defaults.session.idle_minutes),
      daily_reset_hour: pick(session.daily_reset_hour, defaults.session.daily_reset_hour),
      timezone: pick(session.timezone, defaults.session.timezone),
      keep_recent_turns: pick(session.keep_recent_turns, defaults.session.keep_recent_turns),
      max_context_chars: pick(session.max_context_chars, defaults.session.max_context_chars),
      max_context_turns: pick(session.max_context_turns, defaults.session.max_context_turns),
      store_retries: pick(session.store_retries, defaults.session.store_retries),
    },
    ingest: {
      dedupe_ttl_ms: pick(ingest.dedupe_ttl_ms, defaults.ingest.dedupe_ttl_ms),
      dedupe_max_entries: pick(ingest.dedupe_max_entries, defaults.ingest.dedupe_max_entries),
      dedupe_sweep_ms: pick(ingest.dedupe_sweep_ms, defaults.ingest.dedupe_sweep_ms),
      debounce_ms: pick(ingest.debounce_ms, defaults.ingest.debounce_ms),
      debounce_by_channel: {
        ...defaults.ingest.debounce_by_channel,
        ...ingest.debounce_by_channel,
      },
      inbound_capacity: pick(ingest.inbound_capacity, defaults.ingest.inbound_capacity),
    },
    queue: {
      mode: pick(queue.mode, defaults.queue.mode),
      cap: pick(queue.cap, defaults.queue.cap),
      overflow: pick(queue.overflow, defaults.queue.overflow),
      max_concurrent_runs: pick(queue.max_concurrent_runs, defaults.queue.max_concurrent_runs),
      lanes: { ...defaults.queue.lanes, ...queue.lanes },
    },
    delivery: {
      retries: pick(delivery.retries, defaults.delivery.retries),
      backoff_ms: pick(delivery.backoff_ms, defaults.delivery.backoff_ms),
      max_backoff_ms: pick(delivery.max_backoff_ms, defaults.delivery.max_backoff_ms),
      failure_reply: pick(delivery.failure_reply, defaults.delivery.failure_reply),
    },
    jobs: pick(config.jobs, defaults.jobs),
    logging: {
      level: pick(config.logging?.level, defaults.logging.level),
    },
  };
}

function isInteger(value: number, min: number, max = Number.MAX_SAFE_INTEGER): boolean {
  return Number.isInteger(value) && value >= min && value <= max;
}

/**
 * Validate configuration
 *
 * @returns Array of validation errors (empty if valid)
 */
export function validateConfig(config: LanewayConfig): string[] {
  const errors: string[] = [];

  if (config.version !== 1) {
    errors.push(`Unsupported config version: ${config.version}`);
  }

  if (config.agents.length === 0) {
    errors.push('agents must list at least one agent');
  }
  const agentIds = new Set<string>();
  for (const agent of config.agents) {
    const id = agent.id.trim().toLowerCase();
    if (!id) {
      errors.push('agents[].id must not be empty');
      continue;
    }
    if (agentIds.has(id)) {
      errors.push(`agents: duplicate id "${id}"`);
    }
    agentIds.add(id);
    if (agent.scope_mode !== undefined && !isScopeMode(agent.scope_mode)) {
      errors.push(`agents.${id}.scope_mode must be one of: ${SCOPE_MODES.join(', ')}`);
    }
  }

  const { session, ingest, queue, delivery } = config;
  if (!session.database) {
    errors.push('session.database is required');
  }
  if (!isScopeMode(session.scope_mode)) {
    errors.push(`session.scope_mode must be one of: ${SCOPE_MODES.join(', ')}`);
  }
  if (session.idle_minutes !== null && !(session.idle_minutes > 0)) {
    errors.push('session.idle_minutes must be greater than 0 (or null to disable)');
  }
  if (session.daily_reset_hour !== null && !isInteger(session.daily_reset_hour, 0, 23)) {
    errors.push('session.daily_reset_hour must be an integer between 0 and 23 (or null to disable)');
  }
  if (session.timezone !== undefined) {
    try {
      new Intl.DateTimeFormat('en-US', { timeZone: session.timezone });
    } catch {
      errors.push(`session.timezone is not a known IANA timezone: ${session.timezone}`);
    }
  }
  if (!isInteger(session.keep_recent_turns, 0)) {
    errors.push('session.keep_recent_turns must be a non-negative integer');
  }
  if (session.max_context_chars !== null && !isInteger(session.max_context_chars, 1)) {
    errors.push('session.max_context_chars must be a positive integer (or null for no limit)');
  }
  if (session.max_context_turns !== null && !isInteger(session.max_context_turns, 1)) {
    errors.push('session.max_context_turns must be a positive integer (or null for no limit)');
  }
  if (!isInteger(session.store_retries, 1, 20)) {
    errors.push('session.store_retries must be between 1 and 20');
  }

  if (!(ingest.dedupe_ttl_ms > 0)) {
    errors.push('ingest.dedupe_ttl_ms must be greater than 0');
  }
  if (!isInteger(ingest.dedupe_max_entries, 1)) {
    errors.push('ingest.dedupe_max_entries must be a positive integer');
  }
  if (!(ingest.dedupe_sweep_ms >= 1000)) {
    errors.push('ingest.dedupe_sweep_ms must be at least 1000ms');
  }
  if (!(ingest.debounce_ms >= 0)) {
    errors.push('ingest.debounce_ms must not be negative');
  }
  for (const [channel, windowMs] of Object.entries(ingest.debounce_by_channel)) {
    if (!(windowMs >= 0)) {
      errors.push(`ingest.debounce_by_channel.${channel} must not be negative`);
    }
  }
  if (!isInteger(ingest.inbound_capacity, 1)) {
    errors.push('ingest.inbound_capacity must be a positive integer');
  }

  if (!isQueueMode(queue.mode)) {
    errors.push(`queue.mode must be one of: ${QUEUE_MODES.join(', ')}`);
  }
  if (!isOverflowPolicy(queue.overflow)) {
    errors.push(`queue.overflow must be one of: ${OVERFLOW_POLICIES.join(', ')}`);
  }
  if (!isInteger(queue.cap, 1)) {
    errors.push('queue.cap must be a positive integer');
  }
  if (!isInteger(queue.max_concurrent_runs, 1)) {
    errors.push('queue.max_concurrent_runs must be a positive integer');
  }
  for (const [lane, capacity] of Object.entries(queue.lanes)) {
    if (lane === 'main') {
      errors.push('queue.lanes.main is reserved; use queue.max_concurrent_runs');
    } else if (!isInteger(capacity, 1)) {
      errors.push(`queue.lanes.${lane} must be a positive integer`);
    }
  }

  if (!isInteger(delivery.retries, 0, 10)) {
    errors.push('delivery.retries must be between 0 and 10');
  }
  if (!(delivery.backoff_ms >= 0)) {
    errors.push('delivery.backoff_ms must not be negative');
  }
  if (!(delivery.max_backoff_ms >= delivery.backoff_ms)) {
    errors.push('delivery.max_backoff_ms must be at least delivery.backoff_ms');
  }
  if (delivery.failure_reply !== null && !delivery.failure_reply.trim()) {
    errors.push('delivery.failure_reply must not be empty (use null to disable)');
  }

  const jobIds = new Set<string>();
  for (const job of config.jobs) {
    if (!job.id.trim()) {
      errors.push('jobs[].id must not be empty');
      continue;
    }
    if (jobIds.has(job.id)) {
      errors.push(`jobs: duplicate id "${job.id}"`);
    }
    jobIds.add(job.id);
    if (!CronScheduler.validate(job.cron)) {
      errors.push(`jobs.${job.id}.cron is not a valid cron expression: ${job.cron}`);
    }
    if (job.agent !== undefined && !agentIds.has(job.agent.trim().toLowerCase())) {
      errors.push(`jobs.${job.id}.agent refers to unknown agent "${job.agent}"`);
    }
  }

  if (!CONFIG_LOG_LEVELS.some((level) => level === config.logging.level)) {
    errors.push(`logging.level must be one of: ${CONFIG_LOG_LEVELS.join(', ')}`);
  }

  return errors;
}

// ============================================================================
// File I/O
// ============================================================================

/**
 * Load, merge and validate the configuration file
 *
 * @throws ConfigurationError if the file is missing, unparsable or invalid
 */
export async function loadConfig(path?: string, env: Env = process.env): Promise<LanewayConfig> {
  const configPath = getConfigPath(path);

  if (!existsSync(configPath)) {
    fail('config', `Configuration file not found: ${configPath}`);
  }

  const content = await readFile(configPath, 'utf-8');
  const config = mergeWithDefaults(parseConfig(content, env));
  const errors = validateConfig(config);
  if (errors.length > 0) {
    throw new ConfigurationError('config', `Invalid configuration in ${configPath}: ${errors.join('; ')}`, {
      errors,
    });
  }
  return config;
}

export async function saveConfig(config: LanewayConfig, path?: string): Promise<void> {
  const configPath = getConfigPath(path);
  const configDir = dirname(configPath);

  if (!existsSync(configDir)) {
    await mkdir(configDir, { recursive: true });
  }

  const content = yaml.dump(config, {
    indent: 2,
    lineWidth: 120,
    noRefs: true,
    skipInvalid: true,
  });

  const fileContent = `# Laneway Gateway Configuration
# Generated: ${new Date().toISOString()}

${content}`;

  await writeFile(configPath, fileContent, 'utf-8');
}

/**
 * Write DEFAULT_CONFIG to disk
 *
 * @returns Path to created config file
 * @throws ConfigurationError if the file exists and overwrite is false
 */
export async function createDefaultConfig(path?: string, overwrite = false): Promise<string> {
  const configPath = getConfigPath(path);

  if (existsSync(configPath) && !overwrite) {
    fail('config', `Configuration file already exists: ${configPath}`);
  }

  await saveConfig(DEFAULT_CONFIG, configPath);
  return configPath;
}

// ============================================================================
// Runtime conversion
// ============================================================================

/**
 * Convert the file shape into Gateway settings
 */
export function toGatewaySettings(config: LanewayConfig): GatewaySettings {
  const { session, ingest, queue, delivery } = config;
  const debounceByChannel: Record<string, number> = {};
  for (const [channel, windowMs] of Object.entries(ingest.debounce_by_channel)) {
    debounceByChannel[channel.trim().toLowerCase()] = windowMs;
  }

  return {
    agents: config.agents.map((agent) => ({
      id: agent.id,
      scopeMode: agent.scope_mode,
      bindings: agent.bindings,
    })),
    scopeMode: session.scope_mode,
    reset: {
      idleMinutes: session.idle_minutes ?? undefined,
      dailyResetHour: session.daily_reset_hour ?? undefined,
      timezone: session.timezone,
    },
    transcript: {
      keepRecentTurns: session.keep_recent_turns,
      maxChars: session.max_context_chars ?? undefined,
      maxTurns: session.max_context_turns ?? undefined,
    },
    ingest: {
      dedupeTtlMs: ingest.dedupe_ttl_ms,
      dedupeMaxEntries: ingest.dedupe_max_entries,
      dedupeSweepMs: ingest.dedupe_sweep_ms,
      debounceMs: ingest.debounce_ms,
      debounceByChannel,
      inboundCapacity: ingest.inbound_capacity,
    },
    queue: {
      mode: queue.mode,
      cap: queue.cap,
      overflow: queue.overflow,
      globalLanes: { ...queue.lanes, main: queue.max_concurrent_runs },
    },
    delivery: {
      retries: delivery.retries,
      backoffMs: delivery.backoff_ms,
      maxBackoffMs: delivery.max_backoff_ms,
      failureReply: delivery.failure_reply ?? undefined,
    },
    jobs: config.jobs.map((job) => ({
      id: job.id,
      name: job.name ?? job.id,
      cronExpr: job.cron,
      body: job.body,
      enabled: job.enabled ?? true,
      agentId: job.agent,
    })),
    timezone: session.timezone,
  };
}

/**
 * Open the session database named in the configuration
 */
export function openSessionStore(config: LanewayConfig): SessionStore {
  return SessionStore.open(expandPath(config.session.database), {
    retries: config.session.store_retries,
  });
}

/**
 * Push logging.level into the shared DebugLogger
 */
export function applyLogLevel(config: LanewayConfig): void {
  setLogLevel(config.logging.level.toUpperCase());
}
