/**
 * Unit tests for SessionStore
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import Database from 'better-sqlite3';
import { SessionStore } from '../../src/sessions/session-store.js';

const KEY = 'agent:main:telegram:dm:42';

describe('SessionStore', () => {
  let db: Database.Database;
  let store: SessionStore;
  let now: number;

  beforeEach(() => {
    now = 1_700_000_000_000;
    db = new Database(':memory:');
    store = new SessionStore(db, { now: () => now });
  });

  afterEach(() => {
    db.close();
  });

  describe('load()', () => {
    it('should create an empty session for an unknown key', () => {
      const transcript = store.load(KEY);
      expect(transcript.sessionKey).toBe(KEY);
      expect(transcript.sessionId).toMatch(/^[0-9a-f-]{36}$/);
      expect(transcript.turns).toEqual([]);
    });

    it('should return the same session id on repeated loads', () => {
      const first = store.load(KEY);
      const second = store.load(KEY);
      expect(second.sessionId).toBe(first.sessionId);
    });
  });

  describe('append()', () => {
    it('should round-trip turns in order with contiguous seq numbers', () => {
      store.append(KEY, { role: 'user', content: 'hi', metadata: { messageId: 'm1' } });
      now += 10;
      store.appendMany(KEY, [
        { role: 'tool', content: '{"ok":true}', toolName: 'search' },
        { role: 'assistant', content: 'hello!' },
      ]);

      const { turns } = store.load(KEY);
      expect(turns).toEqual([
        { seq: 1, role: 'user', content: 'hi', timestamp: 1_700_000_000_000, metadata: { messageId: 'm1' } },
        { seq: 2, role: 'tool', content: '{"ok":true}', toolName: 'search', timestamp: 1_700_000_000_010 },
        { seq: 3, role: 'assistant', content: 'hello!', timestamp: 1_700_000_000_010 },
      ]);
    });

    it('should bump updatedAt', () => {
      store.load(KEY);
      now += 5000;
      store.append(KEY, { role: 'user', content: 'later' });
      expect(store.peek(KEY)?.updatedAt).toBe(1_700_000_005_000);
      expect(store.peek(KEY)?.createdAt).toBe(1_700_000_000_000);
    });

    it('should ignore an empty batch', () => {
      expect(store.appendMany(KEY, [])).toEqual([]);
      expect(store.peek(KEY)).toBeNull();
    });
  });

  describe('touch()', () => {
    it('should record origin fields without clearing existing ones', () => {
      store.touch(KEY, { agentId: 'main', provider: 'telegram', chatType: 'dm', peerId: '42' });
      const record = store.touch(KEY, { peerName: 'Alice' });
      expect(record.agentId).toBe('main');
      expect(record.provider).toBe('telegram');
      expect(record.chatType).toBe('dm');
      expect(record.peerName).toBe('Alice');
    });
  });

  describe('recordRun()', () => {
    it('should accumulate usage and keep snippets', () => {
      store.recordRun(KEY, { usage: { inputTokens: 10, outputTokens: 5 }, lastMessage: 'q1', lastReply: 'a1' });
      const record = store.recordRun(KEY, {
        usage: { inputTokens: 3, outputTokens: 2, totalTokens: 7 },
        lastReply: 'a2',
      });
      expect(record.usage).toEqual({ inputTokens: 13, outputTokens: 7, totalTokens: 22 });
      expect(record.lastMessage).toBe('q1');
      expect(record.lastReply).toBe('a2');
    });

    it('should truncate long snippets', () => {
      const short = new SessionStore(db, { snippetLength: 10, now: () => now });
      const record = short.recordRun(KEY, { lastReply: 'abcdefghijklmnop' });
      expect(record.lastReply).toBe('abcdefg...');
    });
  });

  describe('updateContext()', () => {
    it('should merge keys and remove undefined ones', () => {
      store.updateContext(KEY, { topic: 'billing', step: 1 });
      now += 50;
      const context = store.updateContext(KEY, { step: undefined, lang: 'en' });

      expect(context).toEqual({ topic: 'billing', lang: 'en' });
      expect(store.peek(KEY)?.context).toEqual({ topic: 'billing', lang: 'en' });
      expect(store.peek(KEY)?.updatedAt).toBe(1_700_000_000_050);
    });

    it('should start empty after a reset', () => {
      store.updateContext(KEY, { topic: 'billing' });
      store.reset(KEY);
      expect(store.load(KEY).turns).toEqual([]);
      expect(store.peek(KEY)?.context).toEqual({});
    });

    it('should add the context column to an older database', () => {
      const legacy = new Database(':memory:');
      legacy.exec(`
        CREATE TABLE session_index (
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
          created_at INTEGER NOT NULL,
          updated_at INTEGER NOT NULL
        );
        INSERT INTO session_index (session_key, session_id, created_at, updated_at)
          VALUES ('agent:main:main', 'legacy-session', 1, 1);
      `);

      const upgraded = new SessionStore(legacy, { now: () => now });

      expect(upgraded.peek('agent:main:main')?.context).toEqual({});
      expect(upgraded.updateContext('agent:main:main', { migrated: true })).toEqual({ migrated: true });
      legacy.close();
    });
  });

  describe('reset()', () => {
    it('should archive the session and start a new one', () => {
      store.append(KEY, { role: 'user', content: 'one' });
      store.append(KEY, { role: 'assistant', content: 'two' });
      const before = store.load(KEY).sessionId;

      now += 1000;
      const archived = store.reset(KEY, 'idle');

      expect(archived?.sessionId).toBe(before);
      expect(archived?.reason).toBe('idle');
      expect(archived?.turnCount).toBe(2);
      expect(archived?.archivedAt).toBe(1_700_000_001_000);

      const after = store.load(KEY);
      expect(after.sessionId).not.toBe(before);
      expect(after.turns).toEqual([]);
      expect(store.loadArchived(before).map((turn) => turn.content)).toEqual(['one', 'two']);
    });

    it('should list archives per key', () => {
      store.load(KEY);
      store.reset(KEY, 'daily');
      store.load('agent:main:main');
      store.reset('agent:main:main');

      expect(store.listArchived(KEY).map((entry) => entry.reason)).toEqual(['daily']);
      expect(store.listArchived()).toHaveLength(2);
    });

    it('should return null for an unknown key', () => {
      expect(store.reset('agent:main:nobody')).toBeNull();
    });

    it('should restart seq numbers for the new session', () => {
      store.append(KEY, { role: 'user', content: 'old' });
      store.reset(KEY);
      expect(store.append(KEY, { role: 'user', content: 'new' }).seq).toBe(1);
    });
  });

  describe('compact()', () => {
    it('should keep only the newest turns live', () => {
      for (let i = 1; i <= 5; i++) {
        store.append(KEY, { role: i % 2 === 1 ? 'user' : 'assistant', content: `t${i}` });
      }
      expect(store.compact(KEY, 2)).toBe(3);
      expect(store.load(KEY).turns.map((turn) => turn.seq)).toEqual([4, 5]);
      expect(store.append(KEY, { role: 'user', content: 't6' }).seq).toBe(6);
    });
  });

  describe('list()', () => {
    it('should order records by most recent update', () => {
      store.load('a');
      now += 1;
      store.load('b');
      now += 1;
      store.append('a', { role: 'user', content: 'x' });
      expect(store.list().map((record) => record.sessionKey)).toEqual(['a', 'b']);
    });
  });

  describe('open()', () => {
    it('should open an in-memory store', () => {
      const opened = SessionStore.open(':memory:');
      expect(opened.index('k').sessionKey).toBe('k');
      opened.close();
    });
  });
});
