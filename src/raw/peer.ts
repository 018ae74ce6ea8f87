/**
 * Raw wire records for peers, users, chats and forum topics.
 *
 * Shapes mirror the TL schema as delivered by the transport: the constructor
 * name sits in `_`, fields keep their wire (snake_case) names.
 */

export interface PeerUser {
  _: 'peerUser';
  user_id: number;
}

export interface PeerChat {
  _: 'peerChat';
  chat_id: number;
}

export interface PeerChannel {
  _: 'peerChannel';
  channel_id: number;
}

export type RawPeer = PeerUser | PeerChat | PeerChannel;

export interface RawUserFull {
  _: 'user';
  id: number;
  access_hash?: bigint;
  first_name?: string;
  last_name?: string;
  username?: string;
  phone?: string;
  lang_code?: string;
  bot?: boolean;
  self?: boolean;
  contact?: boolean;
  deleted?: boolean;
  verified?: boolean;
  premium?: boolean;
  scam?: boolean;
  fake?: boolean;
}

export interface RawUserEmpty {
  _: 'userEmpty';
  id: number;
}

export type RawUser = RawUserFull | RawUserEmpty;

/** Basic group. */
export interface RawChatBasic {
  _: 'chat';
  id: number;
  title: string;
  participants_count?: number;
  deactivated?: boolean;
}

export interface RawChatForbidden {
  _: 'chatForbidden';
  id: number;
  title: string;
}

/** Channel or supergroup (`megagroup`). */
export interface RawChannel {
  _: 'channel';
  id: number;
  title: string;
  username?: string;
  broadcast?: boolean;
  megagroup?: boolean;
  forum?: boolean;
  verified?: boolean;
  scam?: boolean;
  fake?: boolean;
  noforwards?: boolean;
  participants_count?: number;
}

export interface RawChannelForbidden {
  _: 'channelForbidden';
  id: number;
  title: string;
  broadcast?: boolean;
  megagroup?: boolean;
}

export type RawChat = RawChatBasic | RawChatForbidden | RawChannel | RawChannelForbidden;

export interface RawForumTopicFull {
  _: 'forumTopic';
  id: number;
  date: number;
  title: string;
  icon_color: number;
  icon_emoji_id?: bigint;
  top_message: number;
  from_id: RawPeer;
  unread_count?: number;
  closed?: boolean;
  pinned?: boolean;
  hidden?: boolean;
  my?: boolean;
}

export interface RawForumTopicDeleted {
  _: 'forumTopicDeleted';
  id: number;
}

export type RawForumTopic = RawForumTopicFull | RawForumTopicDeleted;
