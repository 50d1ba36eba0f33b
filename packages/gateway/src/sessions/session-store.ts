/**
 * Session store for lane-routed conversations
 *
 * Persists an index record per session key and an append-only transcript per
 * session id. Reset never deletes history: the index record is copied into
 * `session_archive` and the transcript turns are flagged archived.
 *
 * Every mutation for a session key is issued from inside that key's queue
 * lane (capacity 1), so the store needs no locking of its own; each multi-row
 * write is still wrapped in a transaction so readers never see half of it.
 */

import Database from 'better-sqlite3';
import { randomUUID } from 'node:crypto';
import { DebugLogger } from '@laneway/core/debug-logger';
import { SessionStoreError } from '@laneway/core/errors';
import { RetryExhaustedError, retrySync } from '@laneway/core/retry';
import { isChatType } from '../ingest/message.js';
import type {
  ArchivedSession,
  ResetReason,
  RunRecord,
  SessionOrigin,
  SessionRecord,
  Transcript,
  TranscriptTurn,
  TurnInput,
  TurnRole,
} from './types.js';

const logger = new DebugLogger('SessionStore');

// ============================================================================
// Database row types
// ============================================================================

interface IndexRow {
  session_key: string;
  session_id: string;
  agent_id: string | null;
  provider: string | null;
  chat_type: string | null;
  peer_id: string | null;
  peer_name: string | null;
  account_id: string | null;
  input_tokens: number;
  output_tokens: number;
  total_tokens: number;
  last_message: string | null;
  last_reply: string | null;
  context: string | null;
  created_at: number;
  updated_at: number;
}

interface TurnRow {
  seq: number;
  role: string;
  content: string;
  tool_name: string | null;
  metadata: string | null;
  created_at: number;
}

interface ArchiveRow {
  session_id: string;
  session_key: string;
  reason: string;
  record: string;
  turn_count: number;
  archived_at: number;
}

export interface SessionStoreOptions {
  /** Attempts per database operation before giving up (default: 3) */
  retries?: number;
  /** Max length of stored last message/reply snippets (default: 500) */
  snippetLength?: number;
  now?: () => number;
}

const TURN_ROLES: readonly TurnRole[] = ['user', 'assistant', 'tool'];
const RESET_REASONS: readonly ResetReason[] = ['idle', 'daily', 'manual'];

function isTurnRole(value: string): value is TurnRole {
  return TURN_ROLES.some((role) => role === value);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isResetReason(value: string): value is ResetReason {
  return RESET_REASONS.some((reason) => reason === value);
}

// ============================================================================
// SessionStore Class
// ============================================================================

export class SessionStore {
  private db: Database.Database;
  private readonly retries: number;
  private readonly snippetLength: number;
  private readonly now: () => number;

  constructor(db: Database.Database, options: SessionStoreOptions = {}) {
    this.db = db;
    this.retries = Math.max(1, options.retries ?? 3);
    this.snippetLength = options.snippetLength ?? 500;
    this.now = options.now ?? Date.now;
    this.runMigration();
  }

  /**
   * Open (or create) a file-backed store
   */
  static open(path: string, options: SessionStoreOptions = {}): SessionStore {
    const db = new Database(path);
    if (path !== ':memory:') {
      db.pragma('journal_mode = WAL');
    }
    return new SessionStore(db, options);
  }

  private runMigration(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS session_index (
        session_key TEXT PRIMARY KEY,
        session_id TEXT NOT NULL UNIQUE,
        agent_id TEXT,
        provider TEXT,
        chat_type TEXT,
        peer_id TEXT,
        peer_name TEXT,
        account_id TEXT,
        input_tokens INTEGER NOT NULL DEFAULT 0,
        output_tokens INTEGER NOT NULL DEFAULT 0,
        total_tokens INTEGER NOT NULL DEFAULT 0,
        last_message TEXT,
        last_reply TEXT,
        context TEXT,
        created_at INTEGER NOT NULL,
        updated_at INTEGER NOT NULL
      );

      CREATE TABLE IF NOT EXISTS session_turns (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        session_id TEXT NOT NULL,
        session_key TEXT NOT NULL,
        seq INTEGER NOT NULL,
        role TEXT NOT NULL,
        content TEXT NOT NULL,
        tool_name TEXT,
        metadata TEXT,
        created_at INTEGER NOT NULL,
        archived INTEGER NOT NULL DEFAULT 0,
        UNIQUE(session_id, seq)
      );

      CREATE INDEX IF NOT EXISTS idx_session_turns_session
        ON session_turns(session_id, archived, seq);

      CREATE TABLE IF NOT EXISTS session_archive (
        session_id TEXT PRIMARY KEY,
        session_key TEXT NOT NULL,
        reason TEXT NOT NULL,
        record TEXT NOT NULL,
        turn_count INTEGER NOT NULL,
        archived_at INTEGER NOT NULL
      );

      CREATE INDEX IF NOT EXISTS idx_session_archive_key
        ON session_archive(session_key, archived_at);
    `);

    // Databases created before the context column existed
    const columns = this.db.prepare('PRAGMA table_info(session_index)').all() as Array<{ name: string }>;
    if (!columns.some((column) => column.name === 'context')) {
      this.db.exec('ALTER TABLE session_index ADD COLUMN context TEXT');
    }
  }

  /**
   * Merge keys into the session's context map. An undefined value removes the key.
   *
   * @returns The context after the update
   */
  updateContext(sessionKey: string, patch: Record<string, unknown>): Record<string, unknown> {
    return this.withRetry('updateContext', sessionKey, () =>
      this.db.transaction((): Record<string, unknown> => {
        const record = this.ensure(sessionKey);
        const context: Record<string, unknown> = { ...record.context };
        for (const [key, value] of Object.entries(patch)) {
          if (value === undefined) {
            delete context[key];
          } else {
            context[key] = value;
          }
        }
        this.db
          .prepare('UPDATE session_index SET context = ?, updated_at = ? WHERE session_key = ?')
          .run(JSON.stringify(context), this.now(), sessionKey);
        return context;
      })()
    );
  }

  /**
   * Load the live transcript, creating an empty one (and index entry) for unknown keys
   */
  load(sessionKey: string): Transcript {
    return this.withRetry('load', sessionKey, () => {
      const record = this.ensure(sessionKey);
      const rows = this.db
        .prepare(
          `SELECT seq, role, content, tool_name, metadata, created_at
           FROM session_turns
           WHERE session_id = ? AND archived = 0
           ORDER BY seq ASC`
        )
        .all(record.sessionId) as TurnRow[];
      return {
        sessionKey,
        sessionId: record.sessionId,
        turns: rows.map((row) => this.rowToTurn(row)),
      };
    });
  }

  append(sessionKey: string, turn: TurnInput): TranscriptTurn {
    const [stored] = this.appendMany(sessionKey, [turn]);
    return stored;
  }

  /**
   * Append turns in one transaction
   */
  appendMany(sessionKey: string, turns: TurnInput[]): TranscriptTurn[] {
    if (turns.length === 0) {
      return [];
    }
    return this.withRetry('append', sessionKey, () =>
      this.db.transaction((): TranscriptTurn[] => {
        const record = this.ensure(sessionKey);
        const { next } = this.db
          .prepare('SELECT COALESCE(MAX(seq), 0) + 1 AS next FROM session_turns WHERE session_id = ?')
          .get(record.sessionId) as { next: number };

        const insert = this.db.prepare(
          `INSERT INTO session_turns
             (session_id, session_key, seq, role, content, tool_name, metadata, created_at)
           VALUES (?, ?, ?, ?, ?, ?, ?, ?)`
        );

        const now = this.now();
        const stored: TranscriptTurn[] = turns.map((turn, offset) => {
          const timestamp = turn.timestamp ?? now;
          const entry: TranscriptTurn = {
            seq: next + offset,
            role: turn.role,
            content: turn.content,
            timestamp,
            ...(turn.toolName ? { toolName: turn.toolName } : {}),
            ...(turn.metadata ? { metadata: turn.metadata } : {}),
          };
          insert.run(
            record.sessionId,
            sessionKey,
            entry.seq,
            entry.role,
            entry.content,
            turn.toolName ?? null,
            turn.metadata ? JSON.stringify(turn.metadata) : null,
            timestamp
          );
          return entry;
        });

        this.db
          .prepare('UPDATE session_index SET updated_at = ? WHERE session_key = ?')
          .run(now, sessionKey);
        return stored;
      })()
    );
  }

  /**
   * Index record for a key, created fresh when unknown
   */
  index(sessionKey: string): SessionRecord {
    return this.withRetry('index', sessionKey, () => this.ensure(sessionKey));
  }

  /**
   * Index record without creating one
   */
  peek(sessionKey: string): SessionRecord | null {
    return this.withRetry('peek', sessionKey, () => {
      const row = this.db
        .prepare('SELECT * FROM session_index WHERE session_key = ?')
        .get(sessionKey) as IndexRow | undefined;
      return row ? this.rowToRecord(row) : null;
    });
  }

  /**
   * Record channel identity for a session (only provided fields change)
   */
  touch(sessionKey: string, origin: SessionOrigin): SessionRecord {
    return this.withRetry('touch', sessionKey, () => {
      this.ensure(sessionKey, origin);
      this.db
        .prepare(
          `UPDATE session_index SET
             agent_id = COALESCE(?, agent_id),
             provider = COALESCE(?, provider),
             chat_type = COALESCE(?, chat_type),
             peer_id = COALESCE(?, peer_id),
             peer_name = COALESCE(?, peer_name),
             account_id = COALESCE(?, account_id)
           WHERE session_key = ?`
        )
        .run(
          origin.agentId ?? null,
          origin.provider ?? null,
          origin.chatType ?? null,
          origin.peerId ?? null,
          origin.peerName ?? null,
          origin.accountId ?? null,
          sessionKey
        );
      return this.ensure(sessionKey);
    });
  }

  /**
   * Accumulate usage and snippets after a completed agent run
   */
  recordRun(sessionKey: string, run: RunRecord): SessionRecord {
    return this.withRetry('recordRun', sessionKey, () => {
      this.ensure(sessionKey);
      const input = run.usage?.inputTokens ?? 0;
      const output = run.usage?.outputTokens ?? 0;
      const total = run.usage?.totalTokens ?? input + output;
      this.db
        .prepare(
          `UPDATE session_index SET
             input_tokens = input_tokens + ?,
             output_tokens = output_tokens + ?,
             total_tokens = total_tokens + ?,
             last_message = COALESCE(?, last_message),
             last_reply = COALESCE(?, last_reply),
             updated_at = ?
           WHERE session_key = ?`
        )
        .run(
          input,
          output,
          total,
          run.lastMessage !== undefined ? this.truncate(run.lastMessage) : null,
          run.lastReply !== undefined ? this.truncate(run.lastReply) : null,
          this.now(),
          sessionKey
        );
      return this.ensure(sessionKey);
    });
  }

  /**
   * Archive the record and transcript, then clear the index entry.
   * The next access to the key starts a new session id.
   *
   * @returns Archived session, or null when the key had no live session
   */
  reset(sessionKey: string, reason: ResetReason = 'manual'): ArchivedSession | null {
    return this.withRetry('reset', sessionKey, () =>
      this.db.transaction((): ArchivedSession | null => {
        const row = this.db
          .prepare('SELECT * FROM session_index WHERE session_key = ?')
          .get(sessionKey) as IndexRow | undefined;
        if (!row) {
          return null;
        }

        const record = this.rowToRecord(row);
        const { count } = this.db
          .prepare('SELECT COUNT(*) AS count FROM session_turns WHERE session_id = ?')
          .get(record.sessionId) as { count: number };
        const archivedAt = this.now();

        this.db
          .prepare('UPDATE session_turns SET archived = 1 WHERE session_id = ?')
          .run(record.sessionId);
        this.db
          .prepare(
            `INSERT INTO session_archive (session_id, session_key, reason, record, turn_count, archived_at)
             VALUES (?, ?, ?, ?, ?, ?)`
          )
          .run(record.sessionId, sessionKey, reason, JSON.stringify(record), count, archivedAt);
        this.db.prepare('DELETE FROM session_index WHERE session_key = ?').run(sessionKey);

        logger.info(`Session reset: key=${sessionKey} id=${record.sessionId} reason=${reason} turns=${count}`);
        return { sessionId: record.sessionId, sessionKey, reason, archivedAt, turnCount: count, record };
      })()
    );
  }

  /**
   * Explicit compaction: keep the newest `keepTurns` live turns, archive the rest
   *
   * @returns Number of turns moved out of the live transcript
   */
  compact(sessionKey: string, keepTurns: number): number {
    const keep = Math.max(0, Math.floor(keepTurns));
    return this.withRetry('compact', sessionKey, () => {
      const record = this.ensure(sessionKey);
      const result = this.db
        .prepare(
          `UPDATE session_turns SET archived = 1
           WHERE session_id = ? AND archived = 0 AND seq NOT IN (
             SELECT seq FROM session_turns
             WHERE session_id = ? AND archived = 0
             ORDER BY seq DESC LIMIT ?
           )`
        )
        .run(record.sessionId, record.sessionId, keep);
      return result.changes;
    });
  }

  /**
   * All live index records, most recently updated first
   */
  list(): SessionRecord[] {
    return this.withRetry('list', '*', () =>
      (this.db.prepare('SELECT * FROM session_index ORDER BY updated_at DESC').all() as IndexRow[]).map(
        (row) => this.rowToRecord(row)
      )
    );
  }

  listArchived(sessionKey?: string): ArchivedSession[] {
    return this.withRetry('listArchived', sessionKey ?? '*', () => {
      const rows = (
        sessionKey
          ? this.db
              .prepare('SELECT * FROM session_archive WHERE session_key = ? ORDER BY archived_at ASC')
              .all(sessionKey)
          : this.db.prepare('SELECT * FROM session_archive ORDER BY archived_at ASC').all()
      ) as ArchiveRow[];
      return rows.map((row) => this.rowToArchive(row));
    });
  }

  /**
   * Full transcript of any session id, archived turns included
   */
  loadArchived(sessionId: string): TranscriptTurn[] {
    return this.withRetry('loadArchived', sessionId, () =>
      (
        this.db
          .prepare(
            `SELECT seq, role, content, tool_name, metadata, created_at
             FROM session_turns WHERE session_id = ? ORDER BY seq ASC`
          )
          .all(sessionId) as TurnRow[]
      ).map((row) => this.rowToTurn(row))
    );
  }

  close(): void {
    this.db.close();
  }

  // ==========================================================================
  // Private helpers
  // ==========================================================================

  private ensure(sessionKey: string, origin: SessionOrigin = {}): SessionRecord {
    const existing = this.db
      .prepare('SELECT * FROM session_index WHERE session_key = ?')
      .get(sessionKey) as IndexRow | undefined;
    if (existing) {
      return this.rowToRecord(existing);
    }

    const now = this.now();
    const sessionId = randomUUID();
    this.db
      .prepare(
        `INSERT INTO session_index
           (session_key, session_id, agent_id, provider, chat_type, peer_id, peer_name, account_id, created_at, updated_at)
         VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`
      )
      .run(
        sessionKey,
        sessionId,
        origin.agentId ?? null,
        origin.provider ?? null,
        origin.chatType ?? null,
        origin.peerId ?? null,
        origin.peerName ?? null,
        origin.accountId ?? null,
        now,
        now
      );
    logger.debug(`Session created: key=${sessionKey} id=${sessionId}`);

    return {
      sessionKey,
      sessionId,
      agentId: origin.agentId,
      provider: origin.provider,
      chatType: origin.chatType,
      peerId: origin.peerId,
      peerName: origin.peerName,
      accountId: origin.accountId,
      usage: { inputTokens: 0, outputTokens: 0, totalTokens: 0 },
      context: {},
      createdAt: now,
      updatedAt: now,
    };
  }

  private withRetry<T>(operation: string, sessionKey: string, fn: () => T): T {
    try {
      return retrySync(fn, this.retries, (error, attempt) => {
        logger.warn(`Retrying ${operation} for ${sessionKey} (attempt ${attempt}/${this.retries}):`, error);
      });
    } catch (error) {
      if (error instanceof RetryExhaustedError) {
        logger.error(`Session store ${operation} failed for ${sessionKey}:`, error.lastError);
        throw new SessionStoreError(operation, error.message, error.attempts, { sessionKey });
      }
      throw error;
    }
  }

  private rowToRecord(row: IndexRow): SessionRecord {
    return {
      sessionKey: row.session_key,
      sessionId: row.session_id,
      agentId: row.agent_id ?? undefined,
      provider: row.provider ?? undefined,
      chatType: isChatType(row.chat_type) ? row.chat_type : undefined,
      peerId: row.peer_id ?? undefined,
      peerName: row.peer_name ?? undefined,
      accountId: row.account_id ?? undefined,
      usage: {
        inputTokens: row.input_tokens,
        outputTokens: row.output_tokens,
        totalTokens: row.total_tokens,
      },
      lastMessage: row.last_message ?? undefined,
      lastReply: row.last_reply ?? undefined,
      context: this.parseContext(row.context),
      createdAt: row.created_at,
      updatedAt: row.updated_at,
    };
  }

  private parseContext(raw: string | null): Record<string, unknown> {
    if (!raw) {
      return {};
    }
    try {
      const parsed: unknown = JSON.parse(raw);
      return isRecord(parsed) ? parsed : {};
    } catch (error) {
      logger.warn('Corrupt session context, starting empty:', error);
      return {};
    }
  }

  private rowToTurn(row: TurnRow): TranscriptTurn {
    const turn: TranscriptTurn = {
      seq: row.seq,
      role: isTurnRole(row.role) ? row.role : 'assistant',
      content: row.content,
      timestamp: row.created_at,
    };
    if (row.tool_name) {
      turn.toolName = row.tool_name;
    }
    if (row.metadata) {
      try {
        const metadata: Record<string, unknown> = JSON.parse(row.metadata);
        turn.metadata = metadata;
      } catch (error) {
        logger.warn(`Corrupt turn metadata (seq=${row.seq}), ignoring:`, error);
      }
    }
    return turn;
  }

  private rowToArchive(row: ArchiveRow): ArchivedSession {
    const record: SessionRecord = JSON.parse(row.record);
    return {
      sessionId: row.session_id,
      sessionKey: row.session_key,
      reason: isResetReason(row.reason) ? row.reason : 'manual',
      archivedAt: row.archived_at,
      turnCount: row.turn_count,
      record,
    };
  }

  private truncate(text: string): string {
    if (text.length <= this.snippetLength) return text;
    return text.slice(0, this.snippetLength - 3) + '...';
  }
}
