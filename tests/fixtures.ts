import { vi } from 'vitest';

import type { DecoderClient } from '../src/core/client.js';
import type { PeerTables } from '../src/core/message-decoder.js';
import type {
  RawChat,
  RawDocumentFull,
  RawForumTopic,
  RawMessageContent,
  RawMessageService,
  RawPhotoFull,
  RawUser,
} from '../src/raw/index.js';

export const DATE = 1700000000;

export const ALICE: RawUser = { _: 'user', id: 100, first_name: 'Alice', username: 'alice' };
export const SELF: RawUser = { _: 'user', id: 1, first_name: 'Me', self: true };
export const BOT: RawUser = { _: 'user', id: 500, first_name: 'Helper', username: 'helper_bot', bot: true };

export const GROUP: RawChat = { _: 'chat', id: 200, title: 'Test group' };
export const FORUM: RawChat = { _: 'channel', id: 300, title: 'Forum', megagroup: true, forum: true };
export const NEWS: RawChat = { _: 'channel', id: 400, title: 'News', broadcast: true, username: 'newsroom' };

export const TOPIC: RawForumTopic = {
  _: 'forumTopic',
  id: 40,
  date: DATE,
  title: 'General chatter',
  icon_color: 0x6fb9f0,
  top_message: 40,
  from_id: { _: 'peerUser', user_id: 100 },
};

export function makeTables(extra: { users?: RawUser[]; chats?: RawChat[]; topics?: RawForumTopic[] } = {}): PeerTables {
  const tables: PeerTables = {
    users: new Map([ALICE, BOT, ...(extra.users ?? [])].map((user) => [user.id, user])),
    chats: new Map([GROUP, FORUM, NEWS, ...(extra.chats ?? [])].map((chat) => [chat.id, chat])),
  };
  if (extra.topics) tables.topics = new Map(extra.topics.map((topic) => [topic.id, topic]));
  return tables;
}

export function makeContent(overrides: Partial<RawMessageContent> = {}): RawMessageContent {
  return {
    _: 'message',
    id: 10,
    date: DATE,
    peer_id: { _: 'peerChat', chat_id: 200 },
    from_id: { _: 'peerUser', user_id: 100 },
    message: 'hello',
    ...overrides,
  };
}

export function makeService(action: RawMessageService['action'], overrides: Partial<RawMessageService> = {}): RawMessageService {
  return {
    _: 'messageService',
    id: 11,
    date: DATE,
    peer_id: { _: 'peerChat', chat_id: 200 },
    from_id: { _: 'peerUser', user_id: 100 },
    action,
    ...overrides,
  };
}

export function makePhoto(): RawPhotoFull {
  return {
    _: 'photo',
    id: 7n,
    access_hash: 0n,
    date: DATE,
    dc_id: 2,
    sizes: [
      { _: 'photoSize', type: 'm', w: 320, h: 240, size: 1000 },
      { _: 'photoSize', type: 'x', w: 800, h: 600, size: 5000 },
    ],
  };
}

export function makeDocument(
  attributes: RawDocumentFull['attributes'],
  overrides: Partial<RawDocumentFull> = {},
): RawDocumentFull {
  return {
    _: 'document',
    id: 9n,
    access_hash: 0n,
    date: DATE,
    mime_type: 'application/octet-stream',
    size: 2048,
    dc_id: 2,
    attributes,
    ...overrides,
  };
}

export function makeClient(me: DecoderClient['me'] = { id: 1, isBot: false }) {
  return {
    me,
    fetchUsers: vi.fn<DecoderClient['fetchUsers']>(async () => []),
    fetchMessageById: vi.fn<DecoderClient['fetchMessageById']>(async () => null),
    fetchReplyTarget: vi.fn<DecoderClient['fetchReplyTarget']>(async () => null),
    fetchPinnedMessage: vi.fn<DecoderClient['fetchPinnedMessage']>(async () => null),
    fetchTopic: vi.fn<DecoderClient['fetchTopic']>(async () => null),
    fetchStory: vi.fn<DecoderClient['fetchStory']>(async () => null),
  } satisfies DecoderClient;
}
