/**
 * Unit tests for session key utilities
 */

import { describe, it, expect } from 'vitest';
import {
  SCOPE_MODES,
  buildCronSessionKey,
  buildHookSessionKey,
  buildScopeKey,
  buildSessionKey,
  isScopeMode,
  parseSessionKey,
  resolveSessionLane,
  sessionKeyFromLane,
  type SessionKeyInput,
} from '../../src/routing/session-key.js';

const dm: SessionKeyInput = {
  agentId: 'main',
  scopeMode: 'per-channel-peer',
  provider: 'telegram',
  peerId: '42',
  chatType: 'dm',
};

describe('buildSessionKey()', () => {
  it('should derive DM keys per scope mode', () => {
    expect(buildSessionKey({ ...dm, scopeMode: 'main' })).toBe('agent:main:main');
    expect(buildSessionKey({ ...dm, scopeMode: 'per-peer' })).toBe('agent:main:dm:42');
    expect(buildSessionKey({ ...dm, scopeMode: 'per-channel-peer' })).toBe('agent:main:telegram:dm:42');
    expect(buildSessionKey({ ...dm, scopeMode: 'per-account-channel-peer' })).toBe(
      'agent:main:telegram:default:dm:42'
    );
    expect(
      buildSessionKey({ ...dm, scopeMode: 'per-account-channel-peer', accountId: 'bot-b' })
    ).toBe('agent:main:telegram:bot-b:dm:42');
  });

  it('should return byte-identical keys for identical inputs', () => {
    for (const scopeMode of SCOPE_MODES) {
      const first = buildSessionKey({ ...dm, scopeMode });
      const second = buildSessionKey({ ...dm, scopeMode });
      expect(Buffer.from(second).equals(Buffer.from(first))).toBe(true);
    }
  });

  it('should normalize provider and agent id case', () => {
    expect(buildSessionKey({ ...dm, agentId: ' Main ', provider: 'Telegram' })).toBe(
      'agent:main:telegram:dm:42'
    );
  });

  it('should key group chats by group regardless of scope mode', () => {
    const group: SessionKeyInput = { ...dm, chatType: 'group', provider: 'discord', groupId: 'g-7' };
    expect(buildSessionKey({ ...group, scopeMode: 'main' })).toBe('agent:main:discord:group:g-7');
    expect(buildSessionKey({ ...group, scopeMode: 'per-peer' })).toBe('agent:main:discord:group:g-7');
  });

  it('should fall back to the peer id when a group id is missing', () => {
    expect(buildScopeKey({ ...dm, chatType: 'channel', peerId: 'C01' })).toBe('telegram:group:C01');
  });

  it('should key threads by thread id', () => {
    expect(buildScopeKey({ ...dm, chatType: 'thread', provider: 'slack', threadId: '171.5' })).toBe(
      'slack:thread:171.5'
    );
    expect(buildScopeKey({ ...dm, chatType: 'thread', provider: 'slack', groupId: 'C9' })).toBe(
      'slack:group:C9'
    );
  });
});

describe('cron and hook keys', () => {
  it('should prefix job and hook ids', () => {
    expect(buildCronSessionKey(' nightly ')).toBe('cron:nightly');
    expect(buildHookSessionKey('github')).toBe('hook:github');
  });
});

describe('parseSessionKey()', () => {
  it('should parse agent keys', () => {
    expect(parseSessionKey('agent:main:telegram:dm:42')).toEqual({
      kind: 'agent',
      agentId: 'main',
      scopeKey: 'telegram:dm:42',
    });
  });

  it('should parse cron, hook and lane-prefixed keys', () => {
    expect(parseSessionKey('cron:daily')).toEqual({ kind: 'cron', jobId: 'daily' });
    expect(parseSessionKey('hook:gh:push')).toEqual({ kind: 'hook', hookId: 'gh:push' });
    expect(parseSessionKey('session:agent:main:main')).toEqual({
      kind: 'agent',
      agentId: 'main',
      scopeKey: 'main',
    });
  });

  it('should reject malformed keys', () => {
    expect(parseSessionKey('agent:main')).toBeNull();
    expect(parseSessionKey('cron:')).toBeNull();
    expect(parseSessionKey('other:x')).toBeNull();
  });
});

describe('session lanes', () => {
  it('should prefix once and strip back', () => {
    expect(resolveSessionLane('agent:main:main')).toBe('session:agent:main:main');
    expect(resolveSessionLane('session:agent:main:main')).toBe('session:agent:main:main');
    expect(resolveSessionLane('  ')).toBe('session:main');
    expect(sessionKeyFromLane('session:cron:x')).toBe('cron:x');
  });

  it('should recognize scope modes', () => {
    expect(isScopeMode('per-peer')).toBe(true);
    expect(isScopeMode('per-thread')).toBe(false);
  });
});
