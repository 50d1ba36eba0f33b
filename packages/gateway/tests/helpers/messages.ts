/**
 * Inbound message fixtures shared by the gateway tests
 */

import { createInboundMessage, type InboundMessage, type InboundMessageInput } from '../../src/ingest/message.js';

let counter = 0;

export function makeMessage(overrides: Partial<InboundMessageInput> = {}): InboundMessage {
  counter++;
  return createInboundMessage({
    provider: 'telegram',
    peerId: 'user-1',
    senderId: 'user-1',
    senderName: 'Tester',
    body: `message ${counter}`,
    chatType: 'dm',
    messageId: `msg-${counter}`,
    timestamp: 1_700_000_000_000 + counter,
    ...overrides,
  });
}
