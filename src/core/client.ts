import type { RawUser } from '../raw/index.js';
import type { Story } from '../parsers/media.js';
import type { ForumTopic } from '../parsers/topic.js';
import type { Message } from './message.js';

export interface ClientIdentity {
  id: number;
  isBot: boolean;
}

/**
 * What the decoder needs from the surrounding client.
 *
 * Chat ids are marked ids. Failures reject with the transport's RPC errors
 * (see rpc-errors.ts); the decoder decides per call site which codes it absorbs.
 */
export interface DecoderClient {
  /** Logged-in account, or null before sign-in */
  readonly me: ClientIdentity | null;

  fetchUsers(ids: number[]): Promise<RawUser[]>;

  /** Fetch and decode a message by id, resolving its own reply up to `replyDepth` */
  fetchMessageById(chatId: number, messageId: number, replyDepth: number): Promise<Message | null>;

  /** Fetch and decode the message that `messageId` replies to */
  fetchReplyTarget(chatId: number, messageId: number, replyDepth: number): Promise<Message | null>;

  /** Fetch and decode the message pinned by the service message `messageId` */
  fetchPinnedMessage(chatId: number, messageId: number): Promise<Message | null>;

  fetchTopic(chatId: number, topicId: number): Promise<ForumTopic | null>;

  fetchStory(peerId: number, storyId: number): Promise<Story | null>;
}
