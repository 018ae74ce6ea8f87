import type { RawChat, RawPeer, RawUser } from '../raw/index.js';
import { getChannelId, getPeerId, getRawPeerId } from '../utils/peer.js';

export type ChatType = 'private' | 'bot' | 'group' | 'supergroup' | 'channel';

export interface Chat {
  /** Marked id */
  id: number;
  type: ChatType;
  title?: string;
  username?: string;
  firstName?: string;
  lastName?: string;
  isForum?: boolean;
  isVerified?: boolean;
  isScam?: boolean;
  isFake?: boolean;
  isRestricted?: boolean;
  hasProtectedContent?: boolean;
  membersCount?: number;
}

export function parseUserChat(user: RawUser): Chat {
  if (user._ === 'userEmpty') return { id: user.id, type: 'private' };

  const chat: Chat = { id: user.id, type: user.bot ? 'bot' : 'private' };
  if (user.username !== undefined) chat.username = user.username;
  if (user.first_name !== undefined) chat.firstName = user.first_name;
  if (user.last_name !== undefined) chat.lastName = user.last_name;
  if (user.verified) chat.isVerified = true;
  if (user.scam) chat.isScam = true;
  if (user.fake) chat.isFake = true;
  return chat;
}

/** Map a group, supergroup or channel record to a chat */
export function parseChatRecord(record: RawChat): Chat {
  switch (record._) {
    case 'chat': {
      const chat: Chat = { id: -record.id, type: 'group', title: record.title };
      if (record.participants_count !== undefined) chat.membersCount = record.participants_count;
      return chat;
    }
    case 'chatForbidden':
      return { id: -record.id, type: 'group', title: record.title, isRestricted: true };
    case 'channel': {
      const chat: Chat = {
        id: getChannelId(record.id),
        type: record.megagroup ? 'supergroup' : 'channel',
        title: record.title,
      };
      if (record.username !== undefined) chat.username = record.username;
      if (record.forum) chat.isForum = true;
      if (record.verified) chat.isVerified = true;
      if (record.scam) chat.isScam = true;
      if (record.fake) chat.isFake = true;
      if (record.noforwards) chat.hasProtectedContent = true;
      if (record.participants_count !== undefined) chat.membersCount = record.participants_count;
      return chat;
    }
    case 'channelForbidden':
      return {
        id: getChannelId(record.id),
        type: record.megagroup ? 'supergroup' : 'channel',
        title: record.title,
        isRestricted: true,
      };
  }
}

/**
 * Resolve the chat a peer points at through the side tables.
 * A peer missing from the tables still yields a chat carrying its id and kind.
 */
export function parsePeerChat(peer: RawPeer, users: Map<number, RawUser>, chats: Map<number, RawChat>): Chat {
  const rawId = getRawPeerId(peer);

  if (peer._ === 'peerUser') {
    const user = users.get(rawId);
    return user ? parseUserChat(user) : { id: getPeerId(peer), type: 'private' };
  }

  const record = chats.get(rawId);
  if (record) return parseChatRecord(record);

  return { id: getPeerId(peer), type: peer._ === 'peerChat' ? 'group' : 'channel' };
}
