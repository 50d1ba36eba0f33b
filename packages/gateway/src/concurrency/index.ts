/**
 * Lane-based Concurrency
 *
 * - Session lanes: one run at a time per session, FIFO
 * - Global lanes: cap total concurrent runs across sessions
 * - 2-stage admission: session lane → global lane
 */

export { QueueManager, DEFAULT_GLOBAL_LANE, DEFAULT_QUEUE_CAP } from './queue-manager.js';

export {
  QUEUE_MODES,
  OVERFLOW_POLICIES,
  isQueueMode,
  isOverflowPolicy,
  type QueueMode,
  type OverflowPolicy,
  type WorkUnit,
  type EnqueueRequest,
  type EnqueueResult,
  type EnqueueStatus,
  type RunContext,
  type UnitRunner,
  type QueueEvent,
  type QueueEventType,
  type QueueEventHandler,
  type QueueSettings,
  type QueueManagerOptions,
  type LaneStatus,
  type LaneSnapshot,
  type GlobalLaneStats,
  type QueueStats,
  type ShutdownMode,
} from './types.js';
