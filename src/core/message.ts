/**
 * Normalized message model.
 *
 * A Message is a flat record: every field besides `id` and `raw` is optional
 * and set only when the source record carries it. `service` and `media` name
 * the field that holds the payload, so `message[message.service]` is always
 * populated when the tag is set.
 */

import type { RawMessage } from '../raw/index.js';
import type { Chat } from '../parsers/chat.js';
import type {
  Animation,
  Audio,
  Document,
  Photo,
  Sticker,
  Video,
  VideoNote,
  Voice,
} from '../parsers/document.js';
import type { MessageEntity } from '../parsers/entity.js';
import type { ReplyMarkup } from '../parsers/markup.js';
import type {
  Contact,
  Dice,
  Game,
  Giveaway,
  GiveawayWinners,
  Invoice,
  Location,
  PaidMediaInfo,
  Poll,
  Story,
  Venue,
  WebPage,
} from '../parsers/media.js';
import type { Reaction } from '../parsers/reactions.js';
import type {
  ChatJoinType,
  ForumTopicCreated,
  ForumTopicEdited,
  GameHighScore,
  Gift,
  GiftCode,
  GiveawayCompleted,
  GiveawayCreated,
  PhoneCallEnded,
  PhoneCallStarted,
  RefundedPayment,
  RequestedChats,
  SuccessfulPayment,
  VideoChatEnded,
  VideoChatMembersInvited,
  VideoChatScheduled,
  WebAppData,
  WriteAccessAllowed,
} from '../parsers/service.js';
import type { ForumTopic } from '../parsers/topic.js';
import type { User } from '../parsers/user.js';
import { getChannelId } from '../utils/peer.js';
import { Str } from './str.js';

export interface Message {
  id: number;
  raw: RawMessage;
  empty?: true;
  businessConnectionId?: string;

  // Identity
  chat?: Chat;
  date?: Date;
  editDate?: Date;

  // Sender
  fromUser?: User;
  senderChat?: Chat;
  senderBusinessBot?: User;
  viaBot?: User;
  authorSignature?: string;
  senderBoostCount?: number;

  // Service
  service?: MessageServiceType;
  newChatMembers?: User[];
  chatJoinType?: ChatJoinType;
  leftChatMember?: User;
  newChatTitle?: string;
  newChatPhoto?: Photo;
  deleteChatPhoto?: true;
  migrateToChatId?: number;
  migrateFromChatId?: number;
  groupChatCreated?: true;
  channelChatCreated?: true;
  customAction?: string;
  forumTopicCreated?: ForumTopicCreated;
  forumTopicEdited?: ForumTopicEdited;
  forumTopicClosed?: true;
  forumTopicReopened?: true;
  generalTopicHidden?: true;
  generalTopicUnhidden?: true;
  videoChatScheduled?: VideoChatScheduled;
  videoChatStarted?: true;
  videoChatEnded?: VideoChatEnded;
  videoChatMembersInvited?: VideoChatMembersInvited;
  phoneCallStarted?: PhoneCallStarted;
  phoneCallEnded?: PhoneCallEnded;
  webAppData?: WebAppData;
  giveawayCreated?: GiveawayCreated;
  giveawayCompleted?: GiveawayCompleted;
  giftCode?: GiftCode;
  requestedChats?: RequestedChats;
  successfulPayment?: SuccessfulPayment;
  refundedPayment?: RefundedPayment;
  chatTtlPeriod?: number;
  boostsApplied?: number;
  gift?: Gift;
  connectedWebsite?: string;
  writeAccessAllowed?: WriteAccessAllowed;
  screenshotTaken?: true;
  contactRegistered?: true;
  pinnedMessage?: Message;
  gameHighScore?: GameHighScore;

  // Media
  media?: MessageMediaType;
  hasMediaSpoiler?: boolean;
  photo?: Photo;
  location?: Location;
  contact?: Contact;
  venue?: Venue;
  game?: Game;
  giveaway?: Giveaway;
  giveawayWinners?: GiveawayWinners;
  invoice?: Invoice;
  story?: Story;
  webPage?: WebPage;
  poll?: Poll;
  dice?: Dice;
  paidMedia?: PaidMediaInfo;
  animation?: Animation;
  sticker?: Sticker;
  videoNote?: VideoNote;
  video?: Video;
  alternativeVideos?: Video[];
  voice?: Voice;
  audio?: Audio;
  document?: Document;
  mediaGroupId?: bigint;
  showCaptionAboveMedia?: boolean;
  videoProcessingPending?: boolean;

  // Text
  text?: Str;
  entities?: MessageEntity[];
  caption?: Str;
  captionEntities?: MessageEntity[];
  quote?: boolean;
  quoteText?: Str;
  quoteEntities?: MessageEntity[];

  // Reply linkage
  replyToMessageId?: number;
  replyToTopMessageId?: number;
  replyToMessage?: Message;
  replyToStoryId?: number;
  replyToStoryUserId?: number;
  replyToStory?: Story;

  // Topic
  topicMessage?: boolean;
  messageThreadId?: number;
  topic?: ForumTopic;

  // Forward linkage
  forwardDate?: Date;
  forwardFrom?: User;
  forwardFromChat?: Chat;
  forwardFromMessageId?: number;
  forwardSignature?: string;
  forwardSenderName?: string;
  automaticForward?: boolean;

  // Flags and counters
  outgoing?: boolean;
  mentioned?: boolean;
  scheduled?: boolean;
  fromScheduled?: boolean;
  fromOffline?: boolean;
  editHidden?: boolean;
  hasProtectedContent?: boolean;
  views?: number;
  forwards?: number;
  effectId?: bigint;
  reactions?: Reaction[];
  replyMarkup?: ReplyMarkup;
}

export const MessageServiceType = {
  NEW_CHAT_MEMBERS: 'newChatMembers',
  LEFT_CHAT_MEMBER: 'leftChatMember',
  NEW_CHAT_TITLE: 'newChatTitle',
  NEW_CHAT_PHOTO: 'newChatPhoto',
  DELETE_CHAT_PHOTO: 'deleteChatPhoto',
  MIGRATE_TO_CHAT_ID: 'migrateToChatId',
  MIGRATE_FROM_CHAT_ID: 'migrateFromChatId',
  GROUP_CHAT_CREATED: 'groupChatCreated',
  CHANNEL_CHAT_CREATED: 'channelChatCreated',
  CUSTOM_ACTION: 'customAction',
  FORUM_TOPIC_CREATED: 'forumTopicCreated',
  FORUM_TOPIC_EDITED: 'forumTopicEdited',
  FORUM_TOPIC_CLOSED: 'forumTopicClosed',
  FORUM_TOPIC_REOPENED: 'forumTopicReopened',
  GENERAL_TOPIC_HIDDEN: 'generalTopicHidden',
  GENERAL_TOPIC_UNHIDDEN: 'generalTopicUnhidden',
  VIDEO_CHAT_SCHEDULED: 'videoChatScheduled',
  VIDEO_CHAT_STARTED: 'videoChatStarted',
  VIDEO_CHAT_ENDED: 'videoChatEnded',
  VIDEO_CHAT_MEMBERS_INVITED: 'videoChatMembersInvited',
  PHONE_CALL_STARTED: 'phoneCallStarted',
  PHONE_CALL_ENDED: 'phoneCallEnded',
  WEB_APP_DATA: 'webAppData',
  GIVEAWAY_CREATED: 'giveawayCreated',
  GIVEAWAY_COMPLETED: 'giveawayCompleted',
  GIFT_CODE: 'giftCode',
  REQUESTED_CHATS: 'requestedChats',
  SUCCESSFUL_PAYMENT: 'successfulPayment',
  REFUNDED_PAYMENT: 'refundedPayment',
  CHAT_TTL_CHANGED: 'chatTtlPeriod',
  BOOST_APPLY: 'boostsApplied',
  GIFT: 'gift',
  CONNECTED_WEBSITE: 'connectedWebsite',
  WRITE_ACCESS_ALLOWED: 'writeAccessAllowed',
  SCREENSHOT_TAKEN: 'screenshotTaken',
  CONTACT_REGISTERED: 'contactRegistered',
  PINNED_MESSAGE: 'pinnedMessage',
  GAME_HIGH_SCORE: 'gameHighScore',
} as const satisfies Record<string, keyof Message>;

export type MessageServiceType = (typeof MessageServiceType)[keyof typeof MessageServiceType];

export const MessageMediaType = {
  PHOTO: 'photo',
  LOCATION: 'location',
  CONTACT: 'contact',
  VENUE: 'venue',
  GAME: 'game',
  GIVEAWAY: 'giveaway',
  GIVEAWAY_WINNERS: 'giveawayWinners',
  INVOICE: 'invoice',
  STORY: 'story',
  WEB_PAGE: 'webPage',
  POLL: 'poll',
  DICE: 'dice',
  PAID_MEDIA: 'paidMedia',
  ANIMATION: 'animation',
  STICKER: 'sticker',
  VIDEO_NOTE: 'videoNote',
  VIDEO: 'video',
  VOICE: 'voice',
  AUDIO: 'audio',
  DOCUMENT: 'document',
} as const satisfies Record<string, keyof Message>;

export type MessageMediaType = (typeof MessageMediaType)[keyof typeof MessageMediaType];

const PUBLIC_LINK_TYPES: ReadonlySet<Chat['type']> = new Set(['group', 'supergroup', 'channel']);

/** Public t.me link to the message; undefined for messages without a chat */
export function messageLink(message: Message): string | undefined {
  const { chat } = message;
  if (!chat) return undefined;
  if (PUBLIC_LINK_TYPES.has(chat.type) && chat.username) {
    return `https://t.me/${chat.username}/${message.id}`;
  }
  return `https://t.me/c/${getChannelId(chat.id)}/${message.id}`;
}

/** Text body or media caption, whichever the message carries */
export function messageContent(message: Message): Str {
  return message.text ?? message.caption ?? new Str('');
}
