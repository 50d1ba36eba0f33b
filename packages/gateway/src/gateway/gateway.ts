/**
 * Gateway - owns the inbound pipeline and the lane scheduler
 *
 * Data flow:
 *   adapter → ingest() → InboundChannel → deleted filter → Deduplicator
 *     → Debouncer → AgentRouter → QueueManager (session lane → global lane)
 *     → run: reset check, transcript view, AgentExecutor, persist, deliver
 *
 * Everything up to the queue is synchronous and never waits on a run; only
 * the executor call inside a lane is long-running.
 */

import { DebugLogger, type Logger } from '@laneway/core/debug-logger';
import {
  DeliveryError,
  NoAgentConfiguredError,
  QueueClosedError,
  RunCancelledError,
  errorMessage,
} from '@laneway/core/errors';
import { RetryExhaustedError, withRetry } from '@laneway/core/retry';

import { Deduplicator } from '../ingest/deduplicator.js';
import { Debouncer } from '../ingest/debouncer.js';
import { InboundChannel } from '../ingest/inbound-channel.js';
import {
  buildDebounceKey,
  createInboundMessage,
  dedupeIdFor,
  type InboundMessage,
} from '../ingest/message.js';
import { AgentRouter, type RouteResolution } from '../routing/agent-router.js';
import {
  buildCronSessionKey,
  buildHookSessionKey,
  resolveSessionLane,
  sessionKeyFromLane,
} from '../routing/session-key.js';
import { QueueManager } from '../concurrency/queue-manager.js';
import type { EnqueueResult, QueueStats, RunContext, WorkUnit } from '../concurrency/types.js';
import { CronScheduler } from '../scheduler/cron-scheduler.js';
import type { CronJob, JobResult } from '../scheduler/types.js';
import type { SessionStore } from '../sessions/session-store.js';
import { buildTranscriptView } from '../sessions/transcript-view.js';
import { dailyResetCron, evaluateFreshness } from '../sessions/reset-policy.js';
import type { ArchivedSession, ResetReason, TurnInput } from '../sessions/types.js';
import type {
  AgentExecutor,
  ChannelAdapter,
  CompletionListener,
  CompletionStatus,
  CompletionSummary,
  GatewaySettings,
  RunUsage,
  ScheduledJobSettings,
  SubmitOptions,
} from './types.js';

export const RESET_SWEEP_JOB_ID = 'session-reset-sweep';
export const CRON_LANE = 'cron';
export const HOOK_LANE = 'hook';

export interface GatewayOptions {
  settings: GatewaySettings;
  store: SessionStore;
  executor: AgentExecutor;
  adapters?: ChannelAdapter[];
  now?: () => number;
  /** Passed to every component; each creates its own DebugLogger when omitted */
  logger?: Logger;
  /** Injectable sleep for delivery backoff (tests) */
  sleep?: (ms: number) => Promise<void>;
}

export interface ResetOutcome {
  /** True when the lane was busy and the reset waits for it to settle */
  deferred: boolean;
  archived: ArchivedSession | null;
}

export interface GatewayStats {
  queue: QueueStats;
  inbound: { backlog: number; rejected: number };
  dedupeEntries: number;
  debouncing: number;
  pendingResets: number;
}

interface RunOutput {
  reply: string;
  usage: Required<RunUsage>;
  delivered: boolean;
  deliveryError?: string;
}

/**
 * The queue aborts with a RunCancelledError carrying the reason (interrupted, shutdown, ...)
 */
function cancellationOf(context: RunContext<InboundMessage>): RunCancelledError {
  const reason: unknown = context.signal.reason;
  return reason instanceof RunCancelledError ? reason : new RunCancelledError(context.laneKey);
}

export class Gateway {
  private settings: GatewaySettings;
  private readonly store: SessionStore;
  private readonly executor: AgentExecutor;
  private readonly adapters = new Map<string, ChannelAdapter>();
  private readonly inbound: InboundChannel<InboundMessage>;
  private readonly dedup: Deduplicator;
  private readonly debouncer: Debouncer<InboundMessage>;
  private readonly router: AgentRouter;
  private readonly queue: QueueManager<InboundMessage>;
  private readonly scheduler: CronScheduler;
  private readonly logger: Logger;
  private readonly now: () => number;
  private readonly sleep?: (ms: number) => Promise<void>;
  private readonly pendingResets = new Map<string, ResetReason>();
  private readonly completionListeners = new Set<CompletionListener>();
  private consumer: Promise<void> | null = null;
  private started = false;
  private stopped = false;
  private syntheticSeq = 0;

  constructor(options: GatewayOptions) {
    const { settings } = options;
    this.settings = settings;
    this.store = options.store;
    this.executor = options.executor;
    this.now = options.now ?? Date.now;
    this.sleep = options.sleep;
    this.logger = options.logger ?? new DebugLogger('Gateway');

    for (const adapter of options.adapters ?? []) {
      this.registerAdapter(adapter);
    }

    this.router = new AgentRouter(settings.agents, { defaultScopeMode: settings.scopeMode });
    this.inbound = new InboundChannel<InboundMessage>({
      capacity: settings.ingest.inboundCapacity,
      logger: options.logger,
    });
    this.dedup = new Deduplicator({
      ttlMs: settings.ingest.dedupeTtlMs,
      maxEntries: settings.ingest.dedupeMaxEntries,
      now: this.now,
      logger: options.logger,
    });
    this.debouncer = new Debouncer<InboundMessage>({
      defaultWindowMs: settings.ingest.debounceMs,
      windowFor: (_key, message) => this.settings.ingest.debounceByChannel[message.provider.toLowerCase()],
      onFlush: (_key, batch) => this.route(batch),
      logger: options.logger,
    });
    this.queue = new QueueManager<InboundMessage>({
      ...settings.queue,
      runner: (unit, context) => this.runUnit(unit, context),
      now: this.now,
      logger: options.logger,
    });
    this.scheduler = new CronScheduler({ timezone: settings.timezone }, options.logger);

    this.queue.onEvent((event) => {
      if (event.type === 'idle') {
        this.applyDeferredReset(sessionKeyFromLane(event.laneKey));
      }
    });
  }

  registerAdapter(adapter: ChannelAdapter): void {
    this.adapters.set(adapter.provider.toLowerCase(), adapter);
  }

  /**
   * Start the consumer loop, dedup sweeper and cron jobs. Calling it twice is a no-op.
   */
  start(): void {
    if (this.started) {
      return;
    }
    this.started = true;

    this.consumer = this.inbound.consume((message) => this.accept(message));
    this.dedup.startSweeper(this.settings.ingest.dedupeSweepMs);
    this.syncJobs();
    this.logger.info(
      `Gateway started: agents=${this.router.listAgents().join(',')} jobs=${this.scheduler.listJobs().length}`
    );
  }

  /**
   * Hand a normalized message to the pipeline without waiting
   *
   * @returns false when the gateway is stopped or the inbound channel is full
   */
  ingest(message: InboundMessage): boolean {
    if (this.stopped) {
      return false;
    }
    return this.inbound.push(message);
  }

  onCompletion(listener: CompletionListener): () => void {
    this.completionListeners.add(listener);
    return () => {
      this.completionListeners.delete(listener);
    };
  }

  /**
   * Run a scheduled job's body on its `cron:<jobId>` session
   */
  submitScheduled(jobId: string, body: string, options: SubmitOptions = {}): EnqueueResult {
    return this.submitSynthetic('cron', buildCronSessionKey(jobId), jobId, body, {
      ...options,
      globalLane: options.globalLane ?? CRON_LANE,
    });
  }

  /**
   * Run a webhook payload on its `hook:<hookId>` session
   */
  submitHook(hookId: string, body: string, options: SubmitOptions = {}): EnqueueResult {
    return this.submitSynthetic('hook', buildHookSessionKey(hookId), hookId, body, {
      ...options,
      globalLane: options.globalLane ?? HOOK_LANE,
    });
  }

  /**
   * Archive a session now, or right before its lane runs again if it is busy
   */
  resetSession(sessionKey: string, reason: ResetReason = 'manual'): ResetOutcome {
    if (this.queue.isBusy(resolveSessionLane(sessionKey))) {
      this.pendingResets.set(sessionKey, reason);
      this.logger.debug(`Reset deferred for busy session ${sessionKey} (${reason})`);
      return { deferred: true, archived: null };
    }
    this.pendingResets.delete(sessionKey);
    return { deferred: false, archived: this.store.reset(sessionKey, reason) };
  }

  /**
   * Apply the idle/daily reset policy to every session whose lane is idle
   */
  sweepSessions(): ArchivedSession[] {
    const archived: ArchivedSession[] = [];
    const now = this.now();

    for (const record of this.store.list()) {
      if (this.queue.isBusy(resolveSessionLane(record.sessionKey))) {
        continue;
      }
      const freshness = evaluateFreshness(record, now, this.settings.reset);
      if (!freshness.fresh) {
        const result = this.store.reset(record.sessionKey, freshness.reason);
        if (result) archived.push(result);
      }
    }

    if (archived.length > 0) {
      this.logger.info(`Session sweep archived ${archived.length} session(s)`);
    }
    return archived;
  }

  /**
   * Hot reload. In-flight and pending lane work is left untouched.
   *
   * @throws ValidationError when the agent table is invalid (nothing is applied)
   */
  applyConfig(settings: GatewaySettings): void {
    this.router.update(settings.agents, { defaultScopeMode: settings.scopeMode });
    this.settings = settings;
    this.debouncer.updateWindows(settings.ingest.debounceMs, (_key, message) =>
      this.settings.ingest.debounceByChannel[message.provider.toLowerCase()]
    );
    this.queue.updateSettings(settings.queue);
    if (this.started && !this.stopped) {
      this.syncJobs();
    }
    this.logger.info('Configuration applied');
  }

  /**
   * Stop ingestion, then drain or cancel outstanding work
   */
  async stop(options: { drain?: boolean } = {}): Promise<void> {
    if (this.stopped) {
      return;
    }
    const drain = options.drain ?? true;
    this.stopped = true;

    this.inbound.close();
    await this.consumer;

    if (drain) {
      this.debouncer.flushAll();
      await this.debouncer.idle();
    } else {
      this.debouncer.dispose();
    }

    this.dedup.stop();
    this.scheduler.shutdown();
    await this.queue.shutdown(drain ? 'drain' : 'cancel');
    this.logger.info(`Gateway stopped (${drain ? 'drained' : 'cancelled'})`);
  }

  /**
   * Resolves once ingested messages have reached the queue and every lane is idle.
   * Open debounce windows are not waited for.
   */
  async whenIdle(): Promise<void> {
    await this.inbound.whenDrained();
    await this.debouncer.idle();
    await this.queue.whenIdle();
  }

  /**
   * Registered cron jobs, the reset sweep included
   */
  listJobs(): CronJob[] {
    return this.scheduler.listJobs();
  }

  /**
   * Fire a cron job outside its schedule
   *
   * @throws SchedulerError (JOB_NOT_FOUND) for unknown ids
   */
  runJob(jobId: string): Promise<JobResult> {
    return this.scheduler.runNow(jobId);
  }

  getStats(): GatewayStats {
    return {
      queue: this.queue.getStats(),
      inbound: { backlog: this.inbound.size, rejected: this.inbound.rejectedCount },
      dedupeEntries: this.dedup.size,
      debouncing: this.debouncer.pendingKeys.length,
      pendingResets: this.pendingResets.size,
    };
  }

  // ---------------------------------------------------------------------------
  // Pipeline
  // ---------------------------------------------------------------------------

  private accept(message: InboundMessage): void {
    if (message.deleted) {
      this.logger.debug(`Deleted message ignored: ${message.provider}:${message.messageId}`);
      return;
    }
    if (!this.dedup.admit(message.provider, dedupeIdFor(message))) {
      return;
    }
    this.debouncer.offer(buildDebounceKey(message), message);
  }

  private route(batch: InboundMessage[]): void {
    const head = batch[0];
    if (!head) {
      return;
    }

    let resolution: RouteResolution;
    try {
      resolution = this.router.resolve(head);
    } catch (error) {
      if (error instanceof NoAgentConfiguredError) {
        this.logger.error(`Dropping ${batch.length} message(s) from ${head.provider}:${head.peerId}: ${error.message}`);
        return;
      }
      throw error;
    }

    this.enqueue(resolution.sessionKey, resolution.agentId, batch);
  }

  private enqueue(
    sessionKey: string,
    agentId: string,
    items: InboundMessage[],
    options: SubmitOptions = {}
  ): EnqueueResult {
    const laneKey = resolveSessionLane(sessionKey);
    const result = this.queue.enqueue(
      laneKey,
      { sessionKey, agentId, items, globalLane: options.globalLane },
      options.mode
    );
    this.logger.debug(`Enqueue ${laneKey}: ${result.status} pending=${result.pending}`);
    return result;
  }

  private submitSynthetic(
    provider: 'cron' | 'hook',
    sessionKey: string,
    sourceId: string,
    body: string,
    options: SubmitOptions
  ): EnqueueResult {
    if (this.stopped) {
      throw new QueueClosedError(resolveSessionLane(sessionKey));
    }
    const timestamp = this.now();
    this.syntheticSeq += 1;
    const message = createInboundMessage({
      provider,
      peerId: sourceId,
      senderId: provider === 'cron' ? 'scheduler' : 'webhook',
      body,
      chatType: 'dm',
      messageId: `${provider}:${sourceId}:${timestamp}:${this.syntheticSeq}`,
      timestamp,
    });
    const agentId = options.agentId ?? this.router.defaultAgentId();
    return this.enqueue(sessionKey, agentId, [message], {
      ...options,
      mode: options.mode ?? 'followup',
    });
  }

  // ---------------------------------------------------------------------------
  // Runs
  // ---------------------------------------------------------------------------

  /**
   * Lane runner. Never throws: every outcome becomes a completion summary.
   */
  private async runUnit(unit: WorkUnit<InboundMessage>, context: RunContext<InboundMessage>): Promise<void> {
    const startedAt = this.now();
    let status: CompletionStatus = 'completed';
    let output: RunOutput | null = null;
    let failure: string | undefined;
    let delivered = false;

    try {
      output = await this.execute(unit, context);
      delivered = output.delivered;
      if (output.deliveryError) {
        status = 'failed';
        failure = output.deliveryError;
      }
    } catch (error) {
      if (context.signal.aborted || error instanceof RunCancelledError) {
        status = 'cancelled';
        this.logger.debug(`Run cancelled: ${unit.sessionKey} unit=${unit.id}`);
      } else {
        status = 'failed';
        this.logger.error(`Run failed: ${unit.sessionKey} unit=${unit.id}: ${errorMessage(error)}`);
        delivered = await this.sendFailureReply(unit, errorMessage(error));
      }
      failure = errorMessage(error);
    }

    this.notify({
      unitId: unit.id,
      sessionKey: unit.sessionKey,
      agentId: unit.agentId,
      status,
      inputTokens: output?.usage.inputTokens ?? 0,
      outputTokens: output?.usage.outputTokens ?? 0,
      totalTokens: output?.usage.totalTokens ?? 0,
      reply: output?.reply,
      delivered,
      error: failure,
      durationMs: this.now() - startedAt,
    });
  }

  private async execute(
    unit: WorkUnit<InboundMessage>,
    context: RunContext<InboundMessage>
  ): Promise<RunOutput> {
    const { sessionKey, agentId } = unit;
    const head = unit.items[0];
    const last = unit.items[unit.items.length - 1];
    if (!head || !last) {
      throw new Error(`Unit ${unit.id} has no messages`);
    }

    this.applyResetPolicy(sessionKey);

    const record = this.store.touch(sessionKey, {
      agentId,
      provider: head.provider,
      chatType: head.chatType,
      peerId: head.peerId,
      peerName: head.peerName,
      accountId: head.accountId,
    });
    const transcript = this.store.load(sessionKey);
    const view = buildTranscriptView(transcript.turns, {
      keepRecentTurns: this.settings.transcript.keepRecentTurns,
      maxChars: this.settings.transcript.maxChars,
      maxTurns: this.settings.transcript.maxTurns,
    });

    const incoming: TurnInput[] = [];
    if (unit.kind === 'summary') {
      incoming.push({
        role: 'user',
        content: `[${unit.collapsed} queued requests were collapsed; summarize them and answer together]`,
        timestamp: head.timestamp,
        metadata: { synthetic: true, collapsed: unit.collapsed },
      });
    }
    incoming.push(...unit.items.map((message) => this.toUserTurn(message)));
    this.store.appendMany(sessionKey, incoming);

    const steered: InboundMessage[] = [];
    const generator = this.executor.run({
      sessionKey,
      agentId,
      transcript: view.turns,
      messages: unit.items,
      summarize: unit.kind === 'summary',
      collapsed: unit.collapsed,
      signal: context.signal,
      // Steered messages are persisted as soon as the runtime takes them; the
      // queue no longer holds them once taken
      takeSteering: () => {
        const taken = context.takeSteering();
        if (taken.length > 0) {
          this.store.appendMany(sessionKey, taken.map((message) => this.toUserTurn(message)));
          steered.push(...taken);
        }
        return taken;
      },
      context: record.context,
      updateContext: (patch) => {
        this.store.updateContext(sessionKey, patch);
      },
    });

    const texts: string[] = [];
    const toolTurns: TurnInput[] = [];
    let usage: RunUsage | undefined;

    for (;;) {
      if (context.signal.aborted) {
        await generator.return(undefined);
        throw cancellationOf(context);
      }
      const step = await generator.next();
      if (step.done) {
        usage = step.value;
        break;
      }
      const block = step.value;
      if (block.type === 'text') {
        texts.push(block.text);
      } else if (block.type === 'tool_result') {
        toolTurns.push({ role: 'tool', content: block.content, toolName: block.name, timestamp: this.now() });
      }
    }
    if (context.signal.aborted) {
      throw cancellationOf(context);
    }

    const reply = texts.join('');
    const inputTokens = usage?.inputTokens ?? 0;
    const outputTokens = usage?.outputTokens ?? 0;
    const totals = {
      inputTokens,
      outputTokens,
      totalTokens: usage?.totalTokens ?? inputTokens + outputTokens,
    };

    const closing: TurnInput[] = [...toolTurns];
    if (reply) {
      closing.push({ role: 'assistant', content: reply, timestamp: this.now() });
    }
    if (closing.length > 0) {
      this.store.appendMany(sessionKey, closing);
    }
    this.store.recordRun(sessionKey, {
      usage: totals,
      lastMessage: (steered[steered.length - 1] ?? last).body,
      lastReply: reply || undefined,
    });

    const delivery = await this.deliver(unit, last, reply);
    return { reply, usage: totals, ...delivery };
  }

  private async deliver(
    unit: WorkUnit<InboundMessage>,
    last: InboundMessage,
    reply: string
  ): Promise<{ delivered: boolean; deliveryError?: string }> {
    if (!reply) {
      return { delivered: false };
    }
    const adapter = this.adapters.get(last.provider.toLowerCase());
    if (!adapter) {
      this.logger.debug(`No adapter for ${last.provider}; reply for ${unit.sessionKey} kept in transcript only`);
      return { delivered: false };
    }

    const { retries, backoffMs, maxBackoffMs } = this.settings.delivery;
    try {
      const result = await withRetry(
        () =>
          adapter.send(
            {
              peerId: last.peerId,
              chatType: last.chatType,
              accountId: last.accountId,
              threadId: last.threadId,
              replyToId: last.messageId,
            },
            reply,
            { sessionKey: unit.sessionKey, agentId: unit.agentId }
          ),
        {
          attempts: retries + 1,
          baseDelayMs: backoffMs,
          maxDelayMs: maxBackoffMs,
          sleep: this.sleep,
          onRetry: (error, attempt, delayMs) => {
            this.logger.warn(
              `Delivery to ${adapter.provider} failed (attempt ${attempt}), retrying in ${delayMs}ms: ${errorMessage(error)}`
            );
          },
        }
      );
      return { delivered: result.delivered };
    } catch (error) {
      const cause = error instanceof RetryExhaustedError ? error.lastError : error;
      const failure = new DeliveryError(adapter.provider, errorMessage(cause), {
        sessionKey: unit.sessionKey,
        attempts: retries + 1,
      });
      this.logger.error(failure.message);
      return { delivered: false, deliveryError: failure.message };
    }
  }

  /**
   * Record and send the configured failure reply
   *
   * @returns true when the reply reached the user
   */
  private async sendFailureReply(unit: WorkUnit<InboundMessage>, error: string): Promise<boolean> {
    const text = this.settings.delivery.failureReply;
    const last = unit.items[unit.items.length - 1];
    if (!text || !last) {
      return false;
    }
    try {
      this.store.append(unit.sessionKey, { role: 'assistant', content: text, metadata: { error } });
    } catch (storeError) {
      this.logger.error(`Failure reply for ${unit.sessionKey} not recorded: ${errorMessage(storeError)}`);
    }
    const result = await this.deliver(unit, last, text);
    return result.delivered;
  }

  private toUserTurn(message: InboundMessage): TurnInput {
    return {
      role: 'user',
      content: message.body,
      timestamp: message.timestamp,
      metadata: {
        messageId: message.messageId,
        senderId: message.senderId,
        ...(message.senderName ? { senderName: message.senderName } : {}),
        ...(message.media.length > 0 ? { media: message.media.map((ref) => ref.url) } : {}),
      },
    };
  }

  private notify(summary: CompletionSummary): void {
    for (const listener of this.completionListeners) {
      try {
        listener(summary);
      } catch (error) {
        this.logger.error('Completion listener threw:', error);
      }
    }
  }

  // ---------------------------------------------------------------------------
  // Session resets
  // ---------------------------------------------------------------------------

  /**
   * Called inside the lane before a run
   */
  private applyResetPolicy(sessionKey: string): void {
    const deferred = this.pendingResets.get(sessionKey);
    if (deferred) {
      this.pendingResets.delete(sessionKey);
      this.store.reset(sessionKey, deferred);
      return;
    }

    const record = this.store.peek(sessionKey);
    if (!record) {
      return;
    }
    const freshness = evaluateFreshness(record, this.now(), this.settings.reset);
    if (!freshness.fresh) {
      this.logger.info(`Session ${sessionKey} is stale (${freshness.reason}), starting fresh`);
      this.store.reset(sessionKey, freshness.reason);
    }
  }

  private applyDeferredReset(sessionKey: string): void {
    const reason = this.pendingResets.get(sessionKey);
    if (!reason) {
      return;
    }
    this.pendingResets.delete(sessionKey);
    try {
      this.store.reset(sessionKey, reason);
    } catch (error) {
      this.logger.error(`Deferred reset of ${sessionKey} failed: ${errorMessage(error)}`);
    }
  }

  // ---------------------------------------------------------------------------
  // Scheduled jobs
  // ---------------------------------------------------------------------------

  /**
   * Reconcile registered cron jobs with the current settings
   */
  private syncJobs(): void {
    const wanted = new Map<string, ScheduledJobSettings>();
    for (const job of this.settings.jobs) {
      wanted.set(job.id, job);
    }

    for (const job of this.scheduler.listJobs()) {
      if (job.id === RESET_SWEEP_JOB_ID) continue;
      const next = wanted.get(job.id);
      const unchanged =
        next !== undefined &&
        next.cronExpr === job.cronExpr &&
        next.enabled === job.enabled &&
        next.body === job.body &&
        next.name === job.name;
      if (!unchanged) {
        this.scheduler.removeJob(job.id);
      } else {
        wanted.delete(job.id);
      }
    }

    for (const job of wanted.values()) {
      this.scheduler.addJob(
        { id: job.id, name: job.name, cronExpr: job.cronExpr, body: job.body, enabled: job.enabled },
        () => {
          const current = this.settings.jobs.find((entry) => entry.id === job.id);
          const result = this.submitScheduled(job.id, job.body, { agentId: current?.agentId });
          return result.unitId ?? 'dropped';
        }
      );
    }

    const hour = this.settings.reset.dailyResetHour;
    const sweep = this.scheduler.getJob(RESET_SWEEP_JOB_ID);
    const sweepExpr = hour !== undefined ? dailyResetCron(hour) : undefined;
    if (sweep && sweep.cronExpr !== sweepExpr) {
      this.scheduler.removeJob(RESET_SWEEP_JOB_ID);
    }
    if (sweepExpr && (!sweep || sweep.cronExpr !== sweepExpr)) {
      this.scheduler.addJob(
        { id: RESET_SWEEP_JOB_ID, name: 'Session reset sweep', cronExpr: sweepExpr },
        () => `${this.sweepSessions().length}`
      );
    }
  }
}
