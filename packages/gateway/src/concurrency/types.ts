/**
 * Lane-based Queue Types
 */

import type { Logger } from '@laneway/core/debug-logger';

/**
 * What happens to a message that arrives while its session lane is busy
 */
export type QueueMode = 'collect' | 'followup' | 'steer' | 'interrupt';

export const QUEUE_MODES: readonly QueueMode[] = ['collect', 'followup', 'steer', 'interrupt'];

/**
 * What happens when a lane's pending count would exceed the cap
 */
export type OverflowPolicy = 'drop-old' | 'drop-new' | 'summarize';

export const OVERFLOW_POLICIES: readonly OverflowPolicy[] = ['drop-old', 'drop-new', 'summarize'];

export function isQueueMode(value: unknown): value is QueueMode {
  return QUEUE_MODES.some((mode) => mode === value);
}

export function isOverflowPolicy(value: unknown): value is OverflowPolicy {
  return OVERFLOW_POLICIES.some((policy) => policy === value);
}

/**
 * One schedulable run: a batch of items for one session
 */
export interface WorkUnit<T> {
  id: string;
  laneKey: string;
  sessionKey: string;
  agentId: string;
  /** Global lane this unit takes a slot from while it runs */
  globalLane: string;
  items: T[];
  /** `summary` units were collapsed by the summarize overflow policy */
  kind: 'normal' | 'summary';
  /** Number of units folded into this one (1 for a plain unit) */
  collapsed: number;
  enqueuedAt: number;
}

export interface EnqueueRequest<T> {
  sessionKey: string;
  agentId: string;
  items: T[];
  /** Default: "main" */
  globalLane?: string;
}

export type EnqueueStatus =
  | 'started'
  | 'queued'
  | 'merged'
  | 'steered'
  | 'interrupted'
  | 'dropped'
  | 'summarized';

export interface EnqueueResult {
  status: EnqueueStatus;
  laneKey: string;
  /** Unit that now carries the items (null when they were dropped) */
  unitId: string | null;
  /** Pending units in the lane after this call */
  pending: number;
  /** Units discarded by the overflow policy during this call */
  droppedUnitIds: string[];
}

/**
 * Passed to the runner with every unit
 */
export interface RunContext<T> {
  laneKey: string;
  /** Aborted with a RunCancelledError when the run is interrupted or cancelled */
  signal: AbortSignal;
  /** Drain items steered into this run since the last call */
  takeSteering: () => T[];
}

export type UnitRunner<T> = (unit: WorkUnit<T>, context: RunContext<T>) => Promise<void>;

export type QueueEventType =
  | 'enqueued'
  | 'merged'
  | 'steered'
  | 'started'
  | 'completed'
  | 'failed'
  | 'cancelled'
  | 'dropped'
  | 'summarized'
  | 'idle';

export interface QueueEvent {
  type: QueueEventType;
  laneKey: string;
  unitId?: string;
  error?: Error;
  timestamp: number;
}

export type QueueEventHandler = (event: QueueEvent) => void;

/**
 * Settings that may change at runtime through updateSettings()
 */
export interface QueueSettings {
  /** Mode used when enqueue() is called without one (default: collect) */
  mode: QueueMode;
  /** Max pending units per session lane (default: 20) */
  cap: number;
  overflow: OverflowPolicy;
  /** Capacity per global lane; "main" is the cross-session run limit */
  globalLanes: Record<string, number>;
}

export interface QueueManagerOptions<T> extends Partial<QueueSettings> {
  runner: UnitRunner<T>;
  /** Warn when a unit waited longer than this before starting (default: 2000) */
  warnAfterMs?: number;
  now?: () => number;
  logger?: Logger;
}

export type LaneStatus = 'idle' | 'waiting' | 'running';

export interface LaneSnapshot {
  laneKey: string;
  /** `waiting` means the head unit is queued for a global lane slot */
  status: LaneStatus;
  runningUnitId: string | null;
  pendingUnitIds: string[];
  steeringItems: number;
}

export interface GlobalLaneStats {
  capacity: number;
  active: number;
  waiting: number;
}

export interface QueueStats {
  lanes: number;
  busyLanes: number;
  pendingUnits: number;
  globalLanes: Record<string, GlobalLaneStats>;
  closed: boolean;
}

export type ShutdownMode = 'drain' | 'cancel';
