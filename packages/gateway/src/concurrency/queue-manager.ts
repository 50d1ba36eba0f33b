/**
 * Lane-aware Queue Manager
 *
 * Pump-pattern scheduler with 2-stage admission:
 * - Session lanes ("session:<key>"): capacity fixed at 1, so a transcript is
 *   never touched by two runs at once
 * - Global lanes ("main", "cron", ...): capacity N, shared across sessions,
 *   slots handed to waiters in FIFO order
 *
 * All state changes happen synchronously inside enqueue/release, so each lane
 * has exactly one mutation path on the event loop. Only the runner is async,
 * and it starts on a microtask after the call that granted its slot.
 *
 * @example
 * ```typescript
 * const queue = new QueueManager<InboundMessage>({
 *   runner: async (unit, ctx) => executor.run(unit, ctx.signal),
 *   globalLanes: { main: 4 },
 * });
 *
 * queue.enqueue(resolveSessionLane(sessionKey), { sessionKey, agentId, items: batch });
 * ```
 */

import { DebugLogger, type Logger } from '@laneway/core/debug-logger';
import { QueueClosedError, RunCancelledError, ValidationError } from '@laneway/core/errors';
import type {
  EnqueueRequest,
  EnqueueResult,
  EnqueueStatus,
  GlobalLaneStats,
  LaneSnapshot,
  QueueEvent,
  QueueEventHandler,
  QueueManagerOptions,
  QueueMode,
  QueueSettings,
  QueueStats,
  ShutdownMode,
  UnitRunner,
  WorkUnit,
} from './types.js';

export const DEFAULT_GLOBAL_LANE = 'main';
export const DEFAULT_QUEUE_CAP = 20;

const DEFAULT_SETTINGS: QueueSettings = {
  mode: 'collect',
  cap: DEFAULT_QUEUE_CAP,
  overflow: 'drop-old',
  globalLanes: { [DEFAULT_GLOBAL_LANE]: 4 },
};

interface ActiveRun<T> {
  unit: WorkUnit<T>;
  controller: AbortController;
  steering: T[];
  phase: 'waiting' | 'running';
  slotHeld: boolean;
}

interface SessionLaneState<T> {
  laneKey: string;
  pending: WorkUnit<T>[];
  active: ActiveRun<T> | null;
  /** Pending units queued by interrupt; they stay ahead of everything else in arrival order */
  interrupting: Set<string>;
}

interface GlobalLaneState<T> {
  name: string;
  capacity: number;
  active: number;
  waiters: Array<{ lane: SessionLaneState<T>; run: ActiveRun<T> }>;
}

export class QueueManager<T> {
  private readonly lanes = new Map<string, SessionLaneState<T>>();
  private readonly globals = new Map<string, GlobalLaneState<T>>();
  private readonly handlers = new Set<QueueEventHandler>();
  private readonly runner: UnitRunner<T>;
  private readonly logger: Logger;
  private readonly now: () => number;
  private readonly warnAfterMs: number;
  private settings: QueueSettings;
  private closed = false;
  private cancelling = false;
  private idleWaiters: Array<() => void> = [];
  private unitSeq = 0;

  constructor(options: QueueManagerOptions<T>) {
    this.runner = options.runner;
    this.logger = options.logger ?? new DebugLogger('QueueManager');
    this.now = options.now ?? Date.now;
    this.warnAfterMs = options.warnAfterMs ?? 2000;
    this.settings = {
      mode: options.mode ?? DEFAULT_SETTINGS.mode,
      cap: Math.max(1, Math.floor(options.cap ?? DEFAULT_SETTINGS.cap)),
      overflow: options.overflow ?? DEFAULT_SETTINGS.overflow,
      globalLanes: { ...DEFAULT_SETTINGS.globalLanes, ...options.globalLanes },
    };
    for (const [name, capacity] of Object.entries(this.settings.globalLanes)) {
      this.getGlobalLane(name).capacity = Math.max(1, Math.floor(capacity));
    }
  }

  /**
   * Hand a batch to a session lane. Never blocks: the unit either starts now,
   * waits in the lane, or is folded into existing work according to `mode`.
   *
   * @throws QueueClosedError after shutdown() has been called
   */
  enqueue(laneKey: string, request: EnqueueRequest<T>, mode?: QueueMode): EnqueueResult {
    if (this.closed) {
      throw new QueueClosedError(laneKey);
    }
    if (request.items.length === 0) {
      throw new ValidationError('items', 'must contain at least one item', request.items.length);
    }

    const effectiveMode = mode ?? this.settings.mode;
    const lane = this.laneState(laneKey);

    if (!lane.active) {
      const unit = this.createUnit(laneKey, request);
      this.emit({ type: 'enqueued', laneKey, unitId: unit.id });
      this.startUnit(lane, unit);
      return this.result(lane, 'started', unit.id);
    }

    switch (effectiveMode) {
      case 'collect': {
        const target = this.lastMergeable(lane);
        if (target) {
          target.items.push(...request.items);
          this.logger.debug(`Merged: lane=${laneKey} unit=${target.id} items=${target.items.length}`);
          this.emit({ type: 'merged', laneKey, unitId: target.id });
          return this.result(lane, 'merged', target.id);
        }
        return this.admit(lane, this.createUnit(laneKey, request), 'queued', false);
      }

      case 'followup':
        return this.admit(lane, this.createUnit(laneKey, request), 'queued', false);

      case 'steer': {
        const run = lane.active;
        run.steering.push(...request.items);
        this.logger.debug(`Steered: lane=${laneKey} unit=${run.unit.id} buffered=${run.steering.length}`);
        this.emit({ type: 'steered', laneKey, unitId: run.unit.id });
        return this.result(lane, 'steered', run.unit.id);
      }

      case 'interrupt': {
        const run = lane.active;
        const result = this.admit(lane, this.createUnit(laneKey, request), 'interrupted', true);
        if (result.status !== 'dropped') {
          this.cancelRun(lane, run, 'interrupted');
        }
        return { ...result, pending: lane.pending.length };
      }
    }
  }

  /**
   * Mark a unit as settled and start whatever the lane has next.
   * Returns false when the unit is not the lane's active unit (already released).
   */
  release(laneKey: string, unitId: string): boolean {
    const lane = this.lanes.get(laneKey);
    const run = lane?.active;
    if (!lane || !run || run.unit.id !== unitId) {
      return false;
    }

    lane.active = null;
    if (run.slotHeld) {
      run.slotHeld = false;
      this.releaseSlot(run.unit.globalLane);
    } else {
      this.removeWaiter(run);
    }

    // Steered items the runner never picked up run next
    if (run.steering.length > 0 && !this.cancelling) {
      const leftover = this.createUnit(laneKey, {
        sessionKey: run.unit.sessionKey,
        agentId: run.unit.agentId,
        globalLane: run.unit.globalLane,
        items: run.steering.splice(0),
      });
      const position = run.controller.signal.aborted ? this.frontIndex(lane) : 0;
      lane.pending.splice(position, 0, leftover);
      this.emit({ type: 'enqueued', laneKey, unitId: leftover.id });
    }

    this.pump(lane);
    return true;
  }

  /**
   * Subscribe to lifecycle events
   *
   * @returns Unsubscribe function
   */
  onEvent(handler: QueueEventHandler): () => void {
    this.handlers.add(handler);
    return () => {
      this.handlers.delete(handler);
    };
  }

  /**
   * Abort the active run of a lane without queueing anything
   */
  cancel(laneKey: string, reason = 'cancelled'): boolean {
    const lane = this.lanes.get(laneKey);
    if (!lane?.active) {
      return false;
    }
    this.cancelRun(lane, lane.active, reason);
    return true;
  }

  /**
   * Drop pending (not running) units of a lane
   *
   * @returns Number of units removed
   */
  clearPending(laneKey: string): number {
    const lane = this.lanes.get(laneKey);
    if (!lane) {
      return 0;
    }
    const removed = lane.pending.splice(0);
    lane.interrupting.clear();
    for (const unit of removed) {
      this.emit({ type: 'dropped', laneKey, unitId: unit.id });
    }
    this.pump(lane);
    return removed.length;
  }

  isBusy(laneKey: string): boolean {
    return this.lanes.get(laneKey)?.active != null;
  }

  pendingCount(laneKey: string): number {
    return this.lanes.get(laneKey)?.pending.length ?? 0;
  }

  getLane(laneKey: string): LaneSnapshot {
    const lane = this.lanes.get(laneKey);
    const run = lane?.active ?? null;
    return {
      laneKey,
      status: run ? run.phase : 'idle',
      runningUnitId: run ? run.unit.id : null,
      pendingUnitIds: lane ? lane.pending.map((unit) => unit.id) : [],
      steeringItems: run ? run.steering.length : 0,
    };
  }

  getStats(): QueueStats {
    let busyLanes = 0;
    let pendingUnits = 0;
    for (const lane of this.lanes.values()) {
      if (lane.active) busyLanes++;
      pendingUnits += lane.pending.length;
    }

    const globalLanes: Record<string, GlobalLaneStats> = {};
    for (const [name, state] of this.globals) {
      globalLanes[name] = {
        capacity: state.capacity,
        active: state.active,
        waiting: state.waiters.length,
      };
    }

    return {
      lanes: this.lanes.size,
      busyLanes,
      pendingUnits,
      globalLanes,
      closed: this.closed,
    };
  }

  getSettings(): QueueSettings {
    return { ...this.settings, globalLanes: { ...this.settings.globalLanes } };
  }

  /**
   * Hot reload. Running and pending units are left as they are; a new cap
   * applies to the next admission, a larger global capacity is used at once.
   */
  updateSettings(update: Partial<QueueSettings>): void {
    this.settings = {
      mode: update.mode ?? this.settings.mode,
      cap: update.cap !== undefined ? Math.max(1, Math.floor(update.cap)) : this.settings.cap,
      overflow: update.overflow ?? this.settings.overflow,
      globalLanes: { ...this.settings.globalLanes, ...update.globalLanes },
    };

    for (const [name, capacity] of Object.entries(update.globalLanes ?? {})) {
      const state = this.getGlobalLane(name);
      state.capacity = Math.max(1, Math.floor(capacity));
      this.grantSlots(state);
    }
    this.logger.info(
      `Settings updated: mode=${this.settings.mode} cap=${this.settings.cap} overflow=${this.settings.overflow}`
    );
  }

  /**
   * Stop accepting work.
   * - drain: pending units still run
   * - cancel: pending units are dropped and active runs are aborted
   *
   * Resolves once every lane is idle.
   */
  shutdown(mode: ShutdownMode = 'drain'): Promise<void> {
    this.closed = true;
    this.cancelling = mode === 'cancel';
    this.logger.info(`Shutting down (${mode}): ${this.getStats().busyLanes} busy lane(s)`);

    if (mode === 'cancel') {
      for (const lane of [...this.lanes.values()]) {
        for (const unit of lane.pending.splice(0)) {
          this.emit({ type: 'dropped', laneKey: lane.laneKey, unitId: unit.id });
        }
        if (lane.active) {
          this.cancelRun(lane, lane.active, 'shutdown');
        }
      }
    }

    return this.whenIdle();
  }

  /**
   * Resolves when no lane has active or pending work
   */
  whenIdle(): Promise<void> {
    if (this.lanes.size === 0) {
      return Promise.resolve();
    }
    return new Promise((resolve) => {
      this.idleWaiters.push(resolve);
    });
  }

  get isClosed(): boolean {
    return this.closed;
  }

  // ---------------------------------------------------------------------------
  // Internals
  // ---------------------------------------------------------------------------

  private laneState(laneKey: string): SessionLaneState<T> {
    let lane = this.lanes.get(laneKey);
    if (!lane) {
      lane = { laneKey, pending: [], active: null, interrupting: new Set() };
      this.lanes.set(laneKey, lane);
    }
    return lane;
  }

  private getGlobalLane(name: string): GlobalLaneState<T> {
    let state = this.globals.get(name);
    if (!state) {
      state = { name, capacity: 1, active: 0, waiters: [] };
      this.globals.set(name, state);
    }
    return state;
  }

  private createUnit(laneKey: string, request: EnqueueRequest<T>): WorkUnit<T> {
    this.unitSeq += 1;
    return {
      id: `unit-${this.unitSeq}`,
      laneKey,
      sessionKey: request.sessionKey,
      agentId: request.agentId,
      globalLane: request.globalLane?.trim() || DEFAULT_GLOBAL_LANE,
      items: [...request.items],
      kind: 'normal',
      collapsed: 1,
      enqueuedAt: this.now(),
    };
  }

  private lastMergeable(lane: SessionLaneState<T>): WorkUnit<T> | undefined {
    const last = lane.pending[lane.pending.length - 1];
    return last && last.kind === 'normal' ? last : undefined;
  }

  /**
   * Add a unit to the pending list, applying the overflow policy
   */
  private admit(
    lane: SessionLaneState<T>,
    unit: WorkUnit<T>,
    status: EnqueueStatus,
    atFront: boolean
  ): EnqueueResult {
    const { laneKey } = lane;

    if (lane.pending.length + 1 <= this.settings.cap) {
      this.insert(lane, unit, atFront);
      this.emit({ type: 'enqueued', laneKey, unitId: unit.id });
      return this.result(lane, status, unit.id);
    }

    switch (this.settings.overflow) {
      case 'drop-new':
        this.logger.warn(
          `Overflow: lane=${laneKey} cap=${this.settings.cap} policy=drop-new dropped=${unit.id}`
        );
        this.emit({ type: 'dropped', laneKey, unitId: unit.id });
        return this.result(lane, 'dropped', null, [unit.id]);

      case 'drop-old': {
        const dropped: string[] = [];
        while (lane.pending.length + 1 > this.settings.cap) {
          const oldest = lane.pending.shift();
          if (!oldest) break;
          lane.interrupting.delete(oldest.id);
          dropped.push(oldest.id);
          this.emit({ type: 'dropped', laneKey, unitId: oldest.id });
        }
        this.logger.warn(
          `Overflow: lane=${laneKey} cap=${this.settings.cap} policy=drop-old dropped=${dropped.join(',')}`
        );
        this.insert(lane, unit, atFront);
        this.emit({ type: 'enqueued', laneKey, unitId: unit.id });
        return this.result(lane, status, unit.id, dropped);
      }

      case 'summarize': {
        const ordered = [...lane.pending];
        ordered.splice(atFront ? this.frontIndex(lane) : ordered.length, 0, unit);
        const summary: WorkUnit<T> = {
          ...unit,
          items: ordered.flatMap((entry) => entry.items),
          kind: 'summary',
          collapsed: ordered.reduce((sum, entry) => sum + entry.collapsed, 0),
          enqueuedAt: Math.min(...ordered.map((entry) => entry.enqueuedAt)),
        };
        const folded = lane.pending.splice(0).map((entry) => entry.id);
        lane.interrupting.clear();
        lane.pending.push(summary);
        if (atFront) {
          lane.interrupting.add(summary.id);
        }
        this.logger.warn(
          `Overflow: lane=${laneKey} cap=${this.settings.cap} policy=summarize collapsed=${summary.collapsed}`
        );
        this.emit({ type: 'summarized', laneKey, unitId: summary.id });
        return this.result(lane, 'summarized', summary.id, folded);
      }
    }
  }

  private insert(lane: SessionLaneState<T>, unit: WorkUnit<T>, atFront: boolean): void {
    if (atFront) {
      lane.pending.splice(this.frontIndex(lane), 0, unit);
      lane.interrupting.add(unit.id);
    } else {
      lane.pending.push(unit);
    }
  }

  /**
   * Position behind the interrupting units already waiting at the head of the lane
   */
  private frontIndex(lane: SessionLaneState<T>): number {
    let index = 0;
    while (index < lane.pending.length && lane.interrupting.has(lane.pending[index].id)) {
      index++;
    }
    return index;
  }

  private result(
    lane: SessionLaneState<T>,
    status: EnqueueStatus,
    unitId: string | null,
    droppedUnitIds: string[] = []
  ): EnqueueResult {
    return { status, laneKey: lane.laneKey, unitId, pending: lane.pending.length, droppedUnitIds };
  }

  /**
   * Start the next pending unit, or retire the lane when nothing is left
   */
  private pump(lane: SessionLaneState<T>): void {
    if (lane.active) {
      return;
    }

    const next = lane.pending.shift();
    if (next) {
      lane.interrupting.delete(next.id);
      this.startUnit(lane, next);
      return;
    }

    this.lanes.delete(lane.laneKey);
    this.emit({ type: 'idle', laneKey: lane.laneKey });
    if (this.lanes.size === 0) {
      const waiters = this.idleWaiters;
      this.idleWaiters = [];
      for (const resolve of waiters) resolve();
    }
  }

  private startUnit(lane: SessionLaneState<T>, unit: WorkUnit<T>): void {
    const run: ActiveRun<T> = {
      unit,
      controller: new AbortController(),
      steering: [],
      phase: 'waiting',
      slotHeld: false,
    };
    lane.active = run;

    const global = this.getGlobalLane(unit.globalLane);
    global.waiters.push({ lane, run });
    this.grantSlots(global);
  }

  /**
   * Hand free global slots to waiters in arrival order
   */
  private grantSlots(global: GlobalLaneState<T>): void {
    while (global.active < global.capacity && global.waiters.length > 0) {
      const waiter = global.waiters.shift();
      if (!waiter) break;
      global.active += 1;
      const { lane, run } = waiter;
      run.slotHeld = true;
      run.phase = 'running';

      const waitedMs = this.now() - run.unit.enqueuedAt;
      if (waitedMs >= this.warnAfterMs) {
        this.logger.warn(`Long wait: lane=${lane.laneKey} unit=${run.unit.id} waited=${waitedMs}ms`);
      }
      // Runner starts off the caller's stack
      queueMicrotask(() => {
        void this.execute(lane, run);
      });
    }
  }

  private releaseSlot(name: string): void {
    const global = this.getGlobalLane(name);
    global.active = Math.max(0, global.active - 1);
    this.grantSlots(global);
  }

  private removeWaiter(run: ActiveRun<T>): void {
    const global = this.globals.get(run.unit.globalLane);
    if (!global) return;
    global.waiters = global.waiters.filter((waiter) => waiter.run !== run);
  }

  private cancelRun(lane: SessionLaneState<T>, run: ActiveRun<T>, reason: string): void {
    if (!run.controller.signal.aborted) {
      this.logger.debug(`Cancelling: lane=${lane.laneKey} unit=${run.unit.id} reason=${reason}`);
      run.controller.abort(new RunCancelledError(lane.laneKey, reason));
    }
    // A unit still waiting for a global slot never reached the runner
    if (run.phase === 'waiting') {
      this.emit({ type: 'cancelled', laneKey: lane.laneKey, unitId: run.unit.id });
      this.release(lane.laneKey, run.unit.id);
    }
  }

  private async execute(lane: SessionLaneState<T>, run: ActiveRun<T>): Promise<void> {
    const { unit, controller } = run;
    const { laneKey } = lane;
    if (lane.active !== run) {
      return;
    }
    this.emit({ type: 'started', laneKey, unitId: unit.id });

    const startTime = this.now();
    try {
      await this.runner(unit, {
        laneKey,
        signal: controller.signal,
        takeSteering: () => run.steering.splice(0),
      });
      if (controller.signal.aborted) {
        this.emit({ type: 'cancelled', laneKey, unitId: unit.id });
      } else {
        this.logger.debug(
          `Unit done: lane=${laneKey} unit=${unit.id} duration=${this.now() - startTime}ms`
        );
        this.emit({ type: 'completed', laneKey, unitId: unit.id });
      }
    } catch (err) {
      const error = err instanceof Error ? err : new Error(String(err));
      if (controller.signal.aborted) {
        this.logger.debug(`Unit cancelled: lane=${laneKey} unit=${unit.id}`);
        this.emit({ type: 'cancelled', laneKey, unitId: unit.id, error });
      } else {
        this.logger.error(`Unit failed: lane=${laneKey} unit=${unit.id}: ${error.message}`);
        this.emit({ type: 'failed', laneKey, unitId: unit.id, error });
      }
    } finally {
      this.release(laneKey, unit.id);
    }
  }

  private emit(event: Omit<QueueEvent, 'timestamp'>): void {
    const full: QueueEvent = { ...event, timestamp: this.now() };
    for (const handler of this.handlers) {
      try {
        handler(full);
      } catch (err) {
        this.logger.error(`Event handler error (${event.type}):`, err);
      }
    }
  }
}
