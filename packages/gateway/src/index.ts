/**
 * @laneway/gateway
 *
 * Inbound routing, deduplication, debouncing, session keys, durable sessions
 * and the lane-aware run queue for a multi-channel assistant gateway.
 */

export * from './ingest/index.js';
export * from './routing/index.js';
export * from './sessions/index.js';
export * from './concurrency/index.js';
export * from './scheduler/index.js';
export * from './config/index.js';
export * from './gateway/index.js';
