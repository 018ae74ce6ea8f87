import type { RawMessageEntity, RawUser } from '../raw/index.js';
import { parseUser, type User } from './user.js';

export const MessageEntityType = {
  MENTION: 'mention',
  HASHTAG: 'hashtag',
  CASHTAG: 'cashtag',
  BOT_COMMAND: 'bot_command',
  URL: 'url',
  EMAIL: 'email',
  PHONE_NUMBER: 'phone_number',
  BANK_CARD: 'bank_card',
  BOLD: 'bold',
  ITALIC: 'italic',
  UNDERLINE: 'underline',
  STRIKETHROUGH: 'strikethrough',
  SPOILER: 'spoiler',
  CODE: 'code',
  PRE: 'pre',
  TEXT_LINK: 'text_link',
  TEXT_MENTION: 'text_mention',
  CUSTOM_EMOJI: 'custom_emoji',
  BLOCKQUOTE: 'blockquote',
} as const;

export type MessageEntityType = (typeof MessageEntityType)[keyof typeof MessageEntityType];

/** A formatting span over UTF-16 code units. */
export interface MessageEntity {
  type: MessageEntityType;
  offset: number;
  length: number;
  /** text_link */
  url?: string;
  /** text_mention */
  user?: User;
  /** pre */
  language?: string;
  /** custom_emoji */
  customEmojiId?: bigint;
  /** blockquote */
  collapsed?: boolean;
}

/**
 * Convert a raw entity. Returns null for kinds with no domain counterpart
 * (unknown entities); callers drop those and keep the rest in order.
 */
export function parseEntity(entity: RawMessageEntity, users: Map<number, RawUser>): MessageEntity | null {
  const span = { offset: entity.offset, length: entity.length };

  switch (entity._) {
    case 'messageEntityMention': return { type: 'mention', ...span };
    case 'messageEntityHashtag': return { type: 'hashtag', ...span };
    case 'messageEntityCashtag': return { type: 'cashtag', ...span };
    case 'messageEntityBotCommand': return { type: 'bot_command', ...span };
    case 'messageEntityUrl': return { type: 'url', ...span };
    case 'messageEntityEmail': return { type: 'email', ...span };
    case 'messageEntityPhone': return { type: 'phone_number', ...span };
    case 'messageEntityBankCard': return { type: 'bank_card', ...span };
    case 'messageEntityBold': return { type: 'bold', ...span };
    case 'messageEntityItalic': return { type: 'italic', ...span };
    case 'messageEntityUnderline': return { type: 'underline', ...span };
    case 'messageEntityStrike': return { type: 'strikethrough', ...span };
    case 'messageEntitySpoiler': return { type: 'spoiler', ...span };
    case 'messageEntityCode': return { type: 'code', ...span };
    case 'messageEntityPre':
      return entity.language ? { type: 'pre', ...span, language: entity.language } : { type: 'pre', ...span };
    case 'messageEntityTextUrl':
      return { type: 'text_link', ...span, url: entity.url };
    case 'messageEntityMentionName': {
      const user = parseUser(users.get(entity.user_id));
      return user ? { type: 'text_mention', ...span, user } : { type: 'text_mention', ...span };
    }
    case 'messageEntityCustomEmoji':
      return { type: 'custom_emoji', ...span, customEmojiId: entity.document_id };
    case 'messageEntityBlockquote':
      return entity.collapsed ? { type: 'blockquote', ...span, collapsed: true } : { type: 'blockquote', ...span };
    case 'messageEntityUnknown':
      return null;
  }
}

/** Parse a list of raw entities, dropping the ones that fail to parse */
export function parseEntities(entities: RawMessageEntity[] | undefined, users: Map<number, RawUser>): MessageEntity[] {
  const parsed: MessageEntity[] = [];
  for (const entity of entities ?? []) {
    const result = parseEntity(entity, users);
    if (result) parsed.push(result);
  }
  return parsed;
}
