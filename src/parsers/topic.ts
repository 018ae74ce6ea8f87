import type { RawChat, RawForumTopic, RawUser } from '../raw/index.js';
import { timestampToDate } from '../utils/peer.js';
import { parsePeerChat, type Chat } from './chat.js';

export interface ForumTopic {
  id: number;
  title: string;
  iconColor: number;
  iconCustomEmojiId?: bigint;
  date?: Date;
  creator?: Chat;
  topMessageId: number;
  unreadCount: number;
  isClosed: boolean;
  isPinned: boolean;
  isHidden: boolean;
  isMy: boolean;
}

/** Deleted topics give null */
export function parseForumTopic(
  topic: RawForumTopic | undefined,
  users: Map<number, RawUser>,
  chats: Map<number, RawChat>,
): ForumTopic | null {
  if (!topic || topic._ === 'forumTopicDeleted') return null;

  const parsed: ForumTopic = {
    id: topic.id,
    title: topic.title,
    iconColor: topic.icon_color,
    date: timestampToDate(topic.date),
    creator: parsePeerChat(topic.from_id, users, chats),
    topMessageId: topic.top_message,
    unreadCount: topic.unread_count ?? 0,
    isClosed: !!topic.closed,
    isPinned: !!topic.pinned,
    isHidden: !!topic.hidden,
    isMy: !!topic.my,
  };
  if (topic.icon_emoji_id !== undefined) parsed.iconCustomEmojiId = topic.icon_emoji_id;
  return parsed;
}
