/**
 * Inbound message model shared by every stage of the pipeline
 */

import { ValidationError } from '@laneway/core/errors';

export type ChatType = 'dm' | 'group' | 'channel' | 'thread';

export const CHAT_TYPES: readonly ChatType[] = ['dm', 'group', 'channel', 'thread'];

/**
 * Media attached to an inbound message (adapters download or proxy the bytes)
 */
export interface MediaRef {
  kind: 'image' | 'audio' | 'video' | 'file';
  url: string;
  mimeType?: string;
  name?: string;
}

/**
 * Normalized message produced by a channel adapter
 */
export interface InboundMessage {
  /** Channel/provider id (telegram, discord, slack...) */
  readonly provider: string;
  /** Bot account on the provider, for multi-account deployments */
  readonly accountId?: string;
  /** Conversation partner: DM user, group or channel id */
  readonly peerId: string;
  readonly peerName?: string;
  readonly senderId: string;
  readonly senderName?: string;
  readonly body: string;
  readonly chatType: ChatType;
  /** Guild / team / workspace the chat belongs to */
  readonly teamId?: string;
  readonly groupId?: string;
  readonly threadId?: string;
  readonly replyToId?: string;
  readonly media: readonly Readonly<MediaRef>[];
  /** Provider-assigned message id */
  readonly messageId: string;
  /** Milliseconds since epoch */
  readonly timestamp: number;
  readonly edited: boolean;
  readonly deleted: boolean;
}

export type InboundMessageInput = Omit<InboundMessage, 'media' | 'edited' | 'deleted'> & {
  media?: MediaRef[];
  edited?: boolean;
  deleted?: boolean;
};

export function isChatType(value: unknown): value is ChatType {
  return CHAT_TYPES.some((type) => type === value);
}

function requireText(field: string, value: string | undefined): string {
  if (typeof value !== 'string' || value.trim().length === 0) {
    throw new ValidationError(field, 'must be a non-empty string', value);
  }
  return value;
}

/**
 * Validate adapter output and freeze it.
 *
 * @throws ValidationError for missing identity fields, unknown chat types or bad timestamps
 */
export function createInboundMessage(input: InboundMessageInput): InboundMessage {
  requireText('provider', input.provider);
  requireText('peerId', input.peerId);
  requireText('senderId', input.senderId);
  requireText('messageId', input.messageId);

  if (!isChatType(input.chatType)) {
    throw new ValidationError('chatType', `must be one of ${CHAT_TYPES.join(', ')}`, input.chatType);
  }
  if (!Number.isFinite(input.timestamp)) {
    throw new ValidationError('timestamp', 'must be a finite number of milliseconds', input.timestamp);
  }
  if (typeof input.body !== 'string') {
    throw new ValidationError('body', 'must be a string', input.body);
  }

  const media = Object.freeze((input.media ?? []).map((ref) => Object.freeze({ ...ref })));

  return Object.freeze({
    ...input,
    media,
    edited: input.edited ?? false,
    deleted: input.deleted ?? false,
  });
}

/**
 * Pre-routing identity used to group bursts from one sender in one conversation
 */
export function buildDebounceKey(message: InboundMessage): string {
  const provider = message.provider.trim().toLowerCase();
  const base = `${provider}:${message.accountId ?? 'default'}:${message.peerId}:${message.senderId}`;
  return message.threadId ? `${base}:thread:${message.threadId}` : base;
}

/**
 * Id used for duplicate detection.
 * An edit carries the original message id, so the edit time keeps it distinct.
 */
export function dedupeIdFor(message: InboundMessage): string {
  return message.edited ? `${message.messageId}#edit@${message.timestamp}` : message.messageId;
}
