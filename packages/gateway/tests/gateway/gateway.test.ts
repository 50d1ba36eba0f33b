/**
 * Integration tests for Gateway (in-memory store, fake runtime and adapter)
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import Database from 'better-sqlite3';
import { silentLogger } from '@laneway/core/debug-logger';
import { QueueClosedError } from '@laneway/core/errors';
import { Gateway, RESET_SWEEP_JOB_ID } from '../../src/gateway/gateway.js';
import type { CompletionSummary, GatewaySettings } from '../../src/gateway/types.js';
import { SessionStore } from '../../src/sessions/session-store.js';
import { FakeAdapter, FakeExecutor } from '../helpers/fakes.js';
import { makeMessage } from '../helpers/messages.js';

const KEY = 'agent:main:telegram:dm:42';
const MINUTE = 60_000;

const tick = (): Promise<void> => new Promise((resolve) => setImmediate(resolve));
const sleep = (ms: number): Promise<void> => new Promise((resolve) => setTimeout(resolve, ms));

function makeSettings(overrides: Partial<GatewaySettings> = {}): GatewaySettings {
  return {
    agents: [{ id: 'main' }],
    scopeMode: 'per-channel-peer',
    reset: {},
    transcript: { keepRecentTurns: 12 },
    ingest: {
      dedupeTtlMs: 60_000,
      dedupeMaxEntries: 1000,
      dedupeSweepMs: 60_000,
      debounceMs: 0,
      debounceByChannel: {},
      inboundCapacity: 100,
    },
    queue: { mode: 'collect', cap: 20, overflow: 'drop-old', globalLanes: { main: 4, cron: 1, hook: 2 } },
    delivery: { retries: 2, backoffMs: 10, maxBackoffMs: 100 },
    jobs: [],
    ...overrides,
  };
}

describe('Gateway', () => {
  let db: Database.Database;
  let now: number;
  let store: SessionStore;
  let executor: FakeExecutor;
  let adapter: FakeAdapter;
  let gateway: Gateway;
  let completions: CompletionSummary[];

  const createGateway = (settings: GatewaySettings = makeSettings()): Gateway => {
    gateway = new Gateway({
      settings,
      store,
      executor,
      adapters: [adapter],
      now: () => now,
      logger: silentLogger,
      sleep: async () => {},
    });
    gateway.onCompletion((summary) => completions.push(summary));
    gateway.start();
    return gateway;
  };

  const peerMessage = (body: string, overrides: Parameters<typeof makeMessage>[0] = {}) =>
    makeMessage({ peerId: '42', senderId: '42', body, ...overrides });

  beforeEach(() => {
    now = Date.UTC(2026, 0, 10, 12, 0);
    db = new Database(':memory:');
    store = new SessionStore(db, { now: () => now });
    executor = new FakeExecutor();
    adapter = new FakeAdapter();
    completions = [];
  });

  afterEach(async () => {
    executor.release();
    await gateway.stop({ drain: false });
    db.close();
  });

  describe('inbound pipeline', () => {
    it('should route a message to its session, persist the turns and deliver the reply', async () => {
      createGateway();
      const message = peerMessage('hello');

      expect(gateway.ingest(message)).toBe(true);
      await gateway.whenIdle();

      expect(executor.requests).toHaveLength(1);
      expect(executor.requests[0].sessionKey).toBe(KEY);
      expect(executor.requests[0].transcript).toEqual([]);

      expect(completions).toHaveLength(1);
      expect(completions[0]).toMatchObject({
        unitId: 'unit-1',
        sessionKey: KEY,
        agentId: 'main',
        status: 'completed',
        inputTokens: 10,
        outputTokens: 4,
        totalTokens: 14,
        reply: 'echo: hello',
        delivered: true,
      });
      expect(completions[0].error).toBeUndefined();

      expect(adapter.sent).toEqual([
        {
          target: {
            peerId: '42',
            chatType: 'dm',
            accountId: undefined,
            threadId: undefined,
            replyToId: message.messageId,
          },
          body: 'echo: hello',
          options: { sessionKey: KEY, agentId: 'main' },
        },
      ]);

      const turns = store.load(KEY).turns;
      expect(turns.map((turn) => [turn.role, turn.content])).toEqual([
        ['user', 'hello'],
        ['assistant', 'echo: hello'],
      ]);
      expect(turns[0].metadata).toEqual({
        messageId: message.messageId,
        senderId: '42',
        senderName: 'Tester',
      });

      const record = store.peek(KEY);
      expect(record?.usage).toEqual({ inputTokens: 10, outputTokens: 4, totalTokens: 14 });
      expect(record?.provider).toBe('telegram');
      expect(record?.lastReply).toBe('echo: hello');
    });

    it('should run a re-delivered message only once', async () => {
      createGateway();
      const message = peerMessage('once');

      gateway.ingest(message);
      gateway.ingest(message);
      await gateway.whenIdle();

      expect(executor.requests).toHaveLength(1);
      expect(completions).toHaveLength(1);
    });

    it('should treat a re-delivery under a differently cased provider as a duplicate', async () => {
      createGateway();

      gateway.ingest(peerMessage('once', { messageId: 'dup-1' }));
      gateway.ingest(peerMessage('once', { provider: 'Telegram', messageId: 'dup-1' }));
      await gateway.whenIdle();

      expect(executor.requests).toHaveLength(1);
      expect(store.load(KEY).turns.map((turn) => turn.content)).toEqual(['once', 'echo: once']);
    });

    it('should ignore deleted messages', async () => {
      createGateway();

      gateway.ingest(peerMessage('gone', { deleted: true }));
      await gateway.whenIdle();

      expect(executor.requests).toHaveLength(0);
    });

    it('should treat an edit as a new message', async () => {
      createGateway();
      const original = peerMessage('first draft');

      gateway.ingest(original);
      await gateway.whenIdle();
      gateway.ingest(
        peerMessage('final draft', {
          messageId: original.messageId,
          edited: true,
          timestamp: original.timestamp + 5000,
        })
      );
      await gateway.whenIdle();

      expect(executor.requests.map((request) => request.messages[0].body)).toEqual([
        'first draft',
        'final draft',
      ]);
    });

    it('should coalesce a burst into a single run', async () => {
      createGateway(
        makeSettings({
          ingest: { ...makeSettings().ingest, debounceMs: 30 },
        })
      );

      gateway.ingest(peerMessage('M1'));
      gateway.ingest(peerMessage('M2'));
      gateway.ingest(peerMessage('M3'));
      await sleep(100);
      await gateway.whenIdle();

      expect(executor.requests).toHaveLength(1);
      expect(executor.requests[0].messages.map((message) => message.body)).toEqual(['M1', 'M2', 'M3']);
      expect(completions[0].reply).toBe('echo: M1 | M2 | M3');
    });

    it('should keep different peers in different sessions', async () => {
      createGateway();

      gateway.ingest(peerMessage('a'));
      gateway.ingest(makeMessage({ peerId: '77', senderId: '77', body: 'b' }));
      await gateway.whenIdle();

      expect(completions.map((summary) => summary.sessionKey).sort()).toEqual([
        'agent:main:telegram:dm:42',
        'agent:main:telegram:dm:77',
      ]);
    });

    it('should drop messages when no agent is configured', async () => {
      createGateway(makeSettings({ agents: [] }));

      gateway.ingest(peerMessage('anyone?'));
      await gateway.whenIdle();

      expect(executor.requests).toHaveLength(0);
      expect(completions).toHaveLength(0);
    });

    it('should record tool results in the transcript', async () => {
      executor.toolResults = [{ name: 'lookup', content: 'found 3 items' }];
      createGateway();

      gateway.ingest(peerMessage('search'));
      await gateway.whenIdle();

      expect(store.load(KEY).turns.map((turn) => [turn.role, turn.toolName ?? null])).toEqual([
        ['user', null],
        ['tool', 'lookup'],
        ['assistant', null],
      ]);
    });
  });

  describe('busy sessions', () => {
    it('should collect messages that arrive during a run into the next run', async () => {
      executor.hold();
      createGateway();

      gateway.ingest(peerMessage('m1'));
      gateway.ingest(peerMessage('m2'));
      gateway.ingest(peerMessage('m3'));
      await tick();
      expect(executor.requests).toHaveLength(1);
      expect(gateway.getStats().queue.pendingUnits).toBe(1);

      executor.release();
      await gateway.whenIdle();

      expect(executor.requests).toHaveLength(2);
      expect(executor.requests[1].messages.map((message) => message.body)).toEqual(['m2', 'm3']);
      expect(executor.requests[1].transcript.map((turn) => turn.content)).toEqual(['m1', 'echo: m1']);
    });

    it('should cancel the running turn in interrupt mode', async () => {
      executor.hold();
      createGateway(
        makeSettings({
          queue: { mode: 'interrupt', cap: 20, overflow: 'drop-old', globalLanes: { main: 4 } },
        })
      );

      gateway.ingest(peerMessage('m1'));
      gateway.ingest(peerMessage('m2'));
      await tick();
      executor.release();
      await gateway.whenIdle();

      expect(completions.map((summary) => summary.status)).toEqual(['cancelled', 'completed']);
      expect(completions[0].error).toBe(`Run cancelled on session:${KEY}: interrupted`);
      expect(completions[0].delivered).toBe(false);
      expect(completions[1].reply).toBe('echo: m2');
      expect(store.load(KEY).turns.map((turn) => turn.content)).toEqual(['m1', 'm2', 'echo: m2']);
    });

    it('should keep steered messages when the run fails', async () => {
      executor.hold();
      executor.failure = new Error('runtime crashed');
      createGateway(
        makeSettings({
          queue: { mode: 'steer', cap: 20, overflow: 'drop-old', globalLanes: { main: 4 } },
        })
      );

      gateway.ingest(peerMessage('m1'));
      await tick();
      gateway.ingest(peerMessage('m2'));
      await tick();
      executor.release();
      await gateway.whenIdle();

      expect(completions.map((summary) => [summary.status, summary.error])).toEqual([['failed', 'runtime crashed']]);
      expect(executor.steered).toEqual(['m2']);
      expect(store.load(KEY).turns.map((turn) => turn.content)).toEqual(['m1', 'm2']);
    });

    it('should hand collapsed work to the runtime as a summary run', async () => {
      executor.hold();
      createGateway(
        makeSettings({
          queue: { mode: 'followup', cap: 1, overflow: 'summarize', globalLanes: { main: 4 } },
        })
      );

      gateway.ingest(peerMessage('m1'));
      gateway.ingest(peerMessage('m2'));
      gateway.ingest(peerMessage('m3'));
      await tick();
      executor.release();
      await gateway.whenIdle();

      expect(executor.requests).toHaveLength(2);
      expect(executor.requests[1]).toMatchObject({ summarize: true, collapsed: 2 });
      expect(store.load(KEY).turns.map((turn) => turn.content)).toEqual([
        'm1',
        'echo: m1',
        '[2 queued requests were collapsed; summarize them and answer together]',
        'm2',
        'm3',
        'echo: m2 | m3',
      ]);
    });
  });

  describe('delivery', () => {
    it('should retry a failed send', async () => {
      adapter.failures = 2;
      createGateway();

      gateway.ingest(peerMessage('retry me'));
      await gateway.whenIdle();

      expect(adapter.sent).toHaveLength(1);
      expect(completions[0]).toMatchObject({ status: 'completed', delivered: true });
    });

    it('should report a delivery failure after the retries are spent', async () => {
      adapter.failures = 3;
      createGateway();

      gateway.ingest(peerMessage('lost'));
      await gateway.whenIdle();

      expect(completions[0]).toMatchObject({
        status: 'failed',
        delivered: false,
        reply: 'echo: lost',
        error: 'Delivery via telegram failed: network down',
      });
      expect(store.load(KEY).turns.map((turn) => turn.content)).toEqual(['lost', 'echo: lost']);
    });
  });

  describe('run failures', () => {
    it('should send the configured failure reply when the runtime fails', async () => {
      executor.failure = new Error('runtime crashed');
      createGateway(
        makeSettings({
          delivery: { retries: 2, backoffMs: 10, maxBackoffMs: 100, failureReply: 'Sorry, something went wrong.' },
        })
      );

      gateway.ingest(peerMessage('hi'));
      await gateway.whenIdle();

      expect(completions[0]).toMatchObject({ status: 'failed', delivered: true, error: 'runtime crashed' });
      expect(completions[0].reply).toBeUndefined();
      expect(adapter.sent.map((sent) => sent.body)).toEqual(['Sorry, something went wrong.']);
      const turns = store.load(KEY).turns;
      expect(turns.map((turn) => [turn.role, turn.content])).toEqual([
        ['user', 'hi'],
        ['assistant', 'Sorry, something went wrong.'],
      ]);
      expect(turns[1].metadata).toEqual({ error: 'runtime crashed' });
    });

    it('should stay silent on failure without a failure reply', async () => {
      executor.failure = new Error('runtime crashed');
      createGateway();

      gateway.ingest(peerMessage('hi'));
      await gateway.whenIdle();

      expect(completions[0]).toMatchObject({ status: 'failed', delivered: false });
      expect(adapter.sent).toEqual([]);
      expect(store.load(KEY).turns.map((turn) => turn.content)).toEqual(['hi']);
    });

    it('should fail the run and keep serving the session when the store cannot write', async () => {
      let failures = 3;
      db.function('fail_turn_insert', () => {
        if (failures > 0) {
          failures--;
          throw new Error('disk I/O error');
        }
        return null;
      });
      db.exec('CREATE TRIGGER fail_turns BEFORE INSERT ON session_turns BEGIN SELECT fail_turn_insert(); END;');
      createGateway(
        makeSettings({
          queue: { mode: 'followup', cap: 20, overflow: 'drop-old', globalLanes: { main: 4 } },
        })
      );

      gateway.ingest(peerMessage('m1'));
      gateway.ingest(peerMessage('m2'));
      await gateway.whenIdle();

      expect(completions.map((summary) => summary.status)).toEqual(['failed', 'completed']);
      expect(completions[0].error).toBe('Session store append failed after 3 attempt(s): disk I/O error');
      expect(failures).toBe(0);
      expect(executor.requests.map((request) => request.messages.map((message) => message.body))).toEqual([['m2']]);
      expect(store.load(KEY).turns.map((turn) => turn.content)).toEqual(['m2', 'echo: m2']);
    });
  });

  describe('session context', () => {
    it('should hand the context map to the runtime and persist its updates', async () => {
      executor.contextPatch = { topic: 'billing' };
      createGateway();

      gateway.ingest(peerMessage('m1'));
      await gateway.whenIdle();
      executor.contextPatch = null;
      gateway.ingest(peerMessage('m2'));
      await gateway.whenIdle();

      expect(executor.requests.map((request) => request.context)).toEqual([{}, { topic: 'billing' }]);
      expect(store.peek(KEY)?.context).toEqual({ topic: 'billing' });
    });

    it('should cap the transcript view at the configured turn count', async () => {
      createGateway(makeSettings({ transcript: { keepRecentTurns: 1, maxTurns: 2 } }));

      gateway.ingest(peerMessage('m1'));
      await gateway.whenIdle();
      gateway.ingest(peerMessage('m2'));
      await gateway.whenIdle();

      expect(executor.requests[1].transcript.map((turn) => turn.content)).toEqual(['m1', 'echo: m1']);
      gateway.ingest(peerMessage('m3'));
      await gateway.whenIdle();
      expect(executor.requests[2].transcript.map((turn) => turn.content)).toEqual(['m2', 'echo: m2']);
    });
  });

  describe('scheduled and webhook work', () => {
    it('should run scheduled jobs on their own session', async () => {
      createGateway();

      const result = gateway.submitScheduled('digest', 'Morning digest');
      await gateway.whenIdle();

      expect(result.status).toBe('started');
      expect(executor.requests[0].sessionKey).toBe('cron:digest');
      expect(executor.requests[0].messages[0]).toMatchObject({
        provider: 'cron',
        peerId: 'digest',
        senderId: 'scheduler',
        body: 'Morning digest',
      });
      expect(completions[0]).toMatchObject({
        sessionKey: 'cron:digest',
        agentId: 'main',
        status: 'completed',
        delivered: false,
      });
    });

    it('should run webhook payloads on their hook session', async () => {
      createGateway(makeSettings({ agents: [{ id: 'main' }, { id: 'ops' }] }));

      gateway.submitHook('deploys', 'build finished', { agentId: 'ops' });
      await gateway.whenIdle();

      expect(completions[0]).toMatchObject({ sessionKey: 'hook:deploys', agentId: 'ops' });
      expect(executor.requests[0].messages[0].senderId).toBe('webhook');
    });

    it('should register configured jobs and the reset sweep', async () => {
      createGateway(
        makeSettings({
          reset: { dailyResetHour: 4 },
          jobs: [
            { id: 'digest', name: 'Digest', cronExpr: '0 9 * * *', body: 'Morning digest', enabled: true },
          ],
        })
      );

      expect(gateway.listJobs().map((job) => job.id)).toEqual(['digest', RESET_SWEEP_JOB_ID]);

      const run = await gateway.runJob('digest');
      await gateway.whenIdle();

      expect(run.output).toBe('unit-1');
      expect(completions[0].sessionKey).toBe('cron:digest');
    });

    it('should reconcile jobs on config reload', () => {
      createGateway(
        makeSettings({
          reset: { dailyResetHour: 4 },
          jobs: [{ id: 'digest', name: 'Digest', cronExpr: '0 9 * * *', body: 'x', enabled: true }],
        })
      );

      gateway.applyConfig(
        makeSettings({
          jobs: [{ id: 'weekly', name: 'Weekly', cronExpr: '0 9 * * 1', body: 'y', enabled: true }],
        })
      );

      expect(gateway.listJobs().map((job) => job.id)).toEqual(['weekly']);
    });
  });

  describe('session resets', () => {
    it('should start a new session after the idle timeout', async () => {
      createGateway(makeSettings({ reset: { idleMinutes: 120 } }));

      gateway.ingest(peerMessage('before'));
      await gateway.whenIdle();
      const firstId = store.load(KEY).sessionId;

      now += 121 * MINUTE;
      gateway.ingest(peerMessage('after'));
      await gateway.whenIdle();

      expect(store.load(KEY).sessionId).not.toBe(firstId);
      expect(store.listArchived(KEY).map((entry) => entry.reason)).toEqual(['idle']);
      expect(executor.requests[1].transcript).toEqual([]);
    });

    it('should reuse the session inside the idle window', async () => {
      createGateway(makeSettings({ reset: { idleMinutes: 120 } }));

      gateway.ingest(peerMessage('before'));
      await gateway.whenIdle();
      const firstId = store.load(KEY).sessionId;

      now += 60 * MINUTE;
      gateway.ingest(peerMessage('after'));
      await gateway.whenIdle();

      expect(store.load(KEY).sessionId).toBe(firstId);
      expect(executor.requests[1].transcript.map((turn) => turn.content)).toEqual(['before', 'echo: before']);
    });

    it('should reset an idle session immediately', async () => {
      createGateway();
      gateway.ingest(peerMessage('hi'));
      await gateway.whenIdle();

      const outcome = gateway.resetSession(KEY);

      expect(outcome.deferred).toBe(false);
      expect(outcome.archived?.turnCount).toBe(2);
      expect(store.peek(KEY)).toBeNull();
    });

    it('should defer a reset until a busy session settles', async () => {
      executor.hold();
      createGateway();
      gateway.ingest(peerMessage('long task'));
      await tick();

      expect(gateway.resetSession(KEY)).toEqual({ deferred: true, archived: null });
      expect(gateway.getStats().pendingResets).toBe(1);

      executor.release();
      await gateway.whenIdle();

      expect(store.listArchived(KEY).map((entry) => [entry.reason, entry.turnCount])).toEqual([
        ['manual', 2],
      ]);
      expect(gateway.getStats().pendingResets).toBe(0);
    });

    it('should sweep stale sessions', async () => {
      createGateway(makeSettings({ reset: { idleMinutes: 120 } }));
      gateway.ingest(peerMessage('hi'));
      await gateway.whenIdle();

      expect(gateway.sweepSessions()).toEqual([]);
      now += 121 * MINUTE;
      expect(gateway.sweepSessions().map((entry) => entry.sessionKey)).toEqual([KEY]);
    });
  });

  describe('stop()', () => {
    it('should drain queued work and refuse new input', async () => {
      executor.hold();
      createGateway(makeSettings({ queue: { mode: 'followup', cap: 20, overflow: 'drop-old', globalLanes: { main: 4 } } }));

      gateway.ingest(peerMessage('one'));
      gateway.ingest(peerMessage('two'));
      await tick();

      const stopping = gateway.stop();
      expect(gateway.ingest(peerMessage('late'))).toBe(false);
      expect(() => gateway.submitScheduled('digest', 'x')).toThrow(QueueClosedError);

      executor.release();
      await stopping;

      expect(completions.map((summary) => summary.status)).toEqual(['completed', 'completed']);
    });

    it('should cancel running work when not draining', async () => {
      executor.hold();
      createGateway();

      gateway.ingest(peerMessage('stuck'));
      await tick();
      await gateway.stop({ drain: false });

      expect(completions.map((summary) => summary.status)).toEqual(['cancelled']);
      expect(completions[0].error).toBe(`Run cancelled on session:${KEY}: shutdown`);
    });
  });
});
