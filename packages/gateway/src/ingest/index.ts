export {
  createInboundMessage,
  buildDebounceKey,
  dedupeIdFor,
  isChatType,
  CHAT_TYPES,
  type ChatType,
  type InboundMessage,
  type InboundMessageInput,
  type MediaRef,
} from './message.js';

export {
  Deduplicator,
  DEFAULT_DEDUPE_TTL_MS,
  DEFAULT_DEDUPE_MAX_ENTRIES,
  type DeduplicatorOptions,
} from './deduplicator.js';

export {
  Debouncer,
  DEFAULT_DEBOUNCE_MS,
  type DebouncerOptions,
  type FlushHandler,
} from './debouncer.js';

export {
  InboundChannel,
  DEFAULT_INBOUND_CAPACITY,
  type InboundChannelOptions,
} from './inbound-channel.js';
