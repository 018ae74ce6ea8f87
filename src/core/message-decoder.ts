/**
 * Raw message record → Message.
 *
 * Decoding is mostly a pure mapping over the record and the peer tables that
 * came with it. A few fields need the client: private-chat peers missing from
 * the tables, pinned and replied-to messages, giveaway launches, stories and
 * forum topics. Those lookups run one after another, and the "not found" /
 * "not accessible" RPC errors listed per call site leave the field unset.
 * Any other error is passed through to the caller.
 */

import type { Logger } from 'pino';
import type {
  RawChat,
  RawFwdHeader,
  RawForumTopic,
  RawMessage,
  RawMessageContent,
  RawMessageMedia,
  RawMessageService,
  RawMessagesResponse,
  RawUser,
} from '../raw/index.js';
import { logger as rootLogger } from '../middleware/logger.js';
import { config } from '../utils/config.js';
import { getPeerId, timestampToDate } from '../utils/peer.js';
import { parsePeerChat, type Chat } from '../parsers/chat.js';
import { parseEntities } from '../parsers/entity.js';
import { parseReplyMarkup } from '../parsers/markup.js';
import { parseMedia } from '../parsers/media.js';
import { parseReactions } from '../parsers/reactions.js';
import { parseGameHighScore, parseServiceAction } from '../parsers/service.js';
import { parseForumTopic } from '../parsers/topic.js';
import { parseUser } from '../parsers/user.js';
import type { DecoderClient } from './client.js';
import { MessageServiceType, type Message } from './message.js';
import type { MessageCache } from './message-cache.js';
import { INACCESSIBLE_CODES, isRpcError } from './rpc-errors.js';
import { Str } from './str.js';

export interface PeerTables {
  /** Users keyed by raw user id. May gain entries fetched during decoding. */
  users: Map<number, RawUser>;
  /** Groups and channels keyed by raw id */
  chats: Map<number, RawChat>;
  /** Forum topics keyed by topic id */
  topics?: Map<number, RawForumTopic>;
}

export interface DecodeOptions {
  isScheduled?: boolean;
  /** Reply hops to follow; 0 disables reply resolution */
  replyDepth?: number;
  businessConnectionId?: string;
  /** Already-fetched raw reply target, decoded in place of a lookup */
  prefetchedReplyTarget?: RawMessage;
}

export interface MessageDecoderOptions {
  client: DecoderClient;
  cache: MessageCache;
  logger?: Logger;
  /** Default for `DecodeOptions.replyDepth` */
  replyDepth?: number;
}

export interface MessageDecoder {
  decode(raw: RawMessage, tables: PeerTables, options?: DecodeOptions): Promise<Message>;
  decodeMessages(response: RawMessagesResponse, options?: DecodeOptions): Promise<Message[]>;
}

const PEER_LOOKUP_CODES = ['PEER_ID_INVALID'] as const;
const MESSAGE_LOOKUP_CODES = ['MESSAGE_IDS_EMPTY', 'CHANNEL_PRIVATE'] as const;

export function buildPeerTables(response: Pick<RawMessagesResponse, 'users' | 'chats' | 'topics'>): PeerTables {
  const tables: PeerTables = {
    users: new Map(response.users.map((user) => [user.id, user])),
    chats: new Map(response.chats.map((chat) => [chat.id, chat])),
  };
  if (response.topics) tables.topics = new Map(response.topics.map((topic) => [topic.id, topic]));
  return tables;
}

function hasBlockquote(message: Message): boolean {
  return (message.entities ?? message.captionEntities ?? []).some((entity) => entity.type === 'blockquote');
}

/** Web pages and absent or unsupported media leave the body as text */
function bodyIsText(media: RawMessageMedia | undefined): boolean {
  if (!media) return true;
  return media._ === 'messageMediaEmpty' || media._ === 'messageMediaUnsupported' || media._ === 'messageMediaWebPage';
}

function isAutomaticForward(fwd: RawFwdHeader, chats: Map<number, RawChat>): boolean {
  if (!fwd.saved_from_peer || !fwd.saved_from_msg_id) return false;
  if (fwd.saved_from_peer._ !== 'peerChannel') return false;
  const source = chats.get(fwd.saved_from_peer.channel_id);
  return source?._ === 'channel' && !!source.broadcast;
}

export function createMessageDecoder(options: MessageDecoderOptions): MessageDecoder {
  const { client, cache } = options;
  const log = (options.logger ?? rootLogger).child({ module: 'message-decoder' });
  const defaultReplyDepth = options.replyDepth ?? config.REPLY_DEPTH;

  /** Run a client lookup; the listed RPC errors yield undefined, others rethrow */
  async function lookup<T>(
    what: string,
    codes: readonly string[],
    fields: Record<string, unknown>,
    fn: () => Promise<T>,
  ): Promise<T | undefined> {
    try {
      return await fn();
    } catch (err) {
      if (!isRpcError(err, codes)) throw err;
      log.debug({ err, ...fields }, `${what} unavailable`);
      return undefined;
    }
  }

  /** Both ends of a private chat must be known before chats can be built */
  async function ensurePrivatePeers(raw: RawMessageService | RawMessageContent, tables: PeerTables): Promise<void> {
    const from = raw.from_id;
    const peer = raw.peer_id;
    if (from?._ !== 'peerUser' || peer._ !== 'peerUser') return;
    if (tables.users.has(from.user_id) && tables.users.has(peer.user_id)) return;

    const fetched = await lookup('Private chat peers', PEER_LOOKUP_CODES, { messageId: raw.id }, () =>
      client.fetchUsers([from.user_id, peer.user_id]),
    );
    for (const user of fetched ?? []) tables.users.set(user.id, user);
  }

  function applySender(message: Message, raw: RawMessageService | RawMessageContent, tables: PeerTables): void {
    const senderPeer = raw.from_id ?? raw.peer_id;
    if (senderPeer._ === 'peerUser') {
      const user = parseUser(tables.users.get(senderPeer.user_id));
      if (user) message.fromUser = user;
    } else {
      message.senderChat = parsePeerChat(senderPeer, tables.users, tables.chats);
    }
  }

  function baseMessage(
    raw: RawMessageService | RawMessageContent,
    chat: Chat,
    decodeOptions: DecodeOptions,
  ): Message {
    const message: Message = {
      id: raw.id,
      raw,
      chat,
      date: timestampToDate(raw.date),
    };
    if (decodeOptions.businessConnectionId) message.businessConnectionId = decodeOptions.businessConnectionId;
    return message;
  }

  async function decodeService(
    raw: RawMessageService,
    tables: PeerTables,
    replyDepth: number,
    decodeOptions: DecodeOptions,
  ): Promise<Message> {
    const chat = parsePeerChat(raw.peer_id, tables.users, tables.chats);
    const message = baseMessage(raw, chat, decodeOptions);
    applySender(message, raw, tables);

    const payload = parseServiceAction(raw, tables);
    if (payload) {
      Object.assign(message, payload satisfies Partial<Message>);
    } else if (raw.action._ !== 'messageActionPinMessage' && raw.action._ !== 'messageActionGameScore') {
      log.debug({ messageId: raw.id, action: raw.action._ }, 'Service action carries no payload');
    }

    const completed = message.giveawayCompleted;
    if (completed?.giveawayMessageId !== undefined) {
      const giveawayMessageId = completed.giveawayMessageId;
      const giveawayMessage = await lookup(
        'Giveaway message',
        MESSAGE_LOOKUP_CODES,
        { chatId: chat.id, messageId: giveawayMessageId },
        () => client.fetchMessageById(chat.id, giveawayMessageId, 0),
      );
      if (giveawayMessage) completed.giveawayMessage = giveawayMessage;
    }

    if (raw.action._ === 'messageActionPinMessage') {
      const pinned = await lookup('Pinned message', MESSAGE_LOOKUP_CODES, { chatId: chat.id, messageId: raw.id }, () =>
        client.fetchPinnedMessage(chat.id, raw.id),
      );
      if (pinned) {
        message.pinnedMessage = pinned;
        message.service = MessageServiceType.PINNED_MESSAGE;
      }
    }

    if (raw.action._ === 'messageActionGameScore') {
      const score = parseGameHighScore(raw, tables.users);
      if (score) message.gameHighScore = score;

      if (raw.reply_to && replyDepth > 0) {
        const target = await lookup('Game message', MESSAGE_LOOKUP_CODES, { chatId: chat.id, messageId: raw.id }, () =>
          client.fetchReplyTarget(chat.id, raw.id, 0),
        );
        if (target) {
          message.replyToMessage = target;
          message.service = MessageServiceType.GAME_HIGH_SCORE;
        }
      }
    }

    cache.put(chat.id, raw.id, message);

    if (raw.reply_to?._ === 'messageReplyHeader' && raw.reply_to.forum_topic) {
      message.topicMessage = true;
      message.messageThreadId = raw.reply_to.reply_to_top_id || raw.reply_to.reply_to_msg_id || 1;
    }

    return message;
  }

  function applyForward(message: Message, fwd: RawFwdHeader, tables: PeerTables): void {
    message.forwardDate = timestampToDate(fwd.date);
    if (fwd.from_id) {
      if (fwd.from_id._ === 'peerUser') {
        const user = parseUser(tables.users.get(fwd.from_id.user_id));
        if (user) message.forwardFrom = user;
      } else {
        message.forwardFromChat = parsePeerChat(fwd.from_id, tables.users, tables.chats);
        if (fwd.channel_post !== undefined) message.forwardFromMessageId = fwd.channel_post;
        if (fwd.post_author !== undefined) message.forwardSignature = fwd.post_author;
      }
    } else if (fwd.from_name) {
      message.forwardSenderName = fwd.from_name;
    }
    if (isAutomaticForward(fwd, tables.chats)) message.automaticForward = true;
  }

  function applyContentFields(
    message: Message,
    raw: RawMessageContent,
    tables: PeerTables,
    decodeOptions: DecodeOptions,
  ): void {
    message.outgoing = !!raw.out;
    message.mentioned = !!raw.mentioned;
    message.scheduled = !!decodeOptions.isScheduled;
    message.fromScheduled = !!raw.from_scheduled;
    message.fromOffline = !!raw.offline;
    message.editHidden = !!raw.edit_hide;
    message.hasProtectedContent = !!raw.noforwards;
    message.showCaptionAboveMedia = !!raw.invert_media;
    message.videoProcessingPending = !!raw.video_processing_pending;

    const editDate = timestampToDate(raw.edit_date);
    if (editDate) message.editDate = editDate;
    if (raw.views !== undefined) message.views = raw.views;
    if (raw.forwards !== undefined) message.forwards = raw.forwards;
    if (raw.grouped_id !== undefined) message.mediaGroupId = raw.grouped_id;
    if (raw.effect !== undefined) message.effectId = raw.effect;
    if (raw.post_author !== undefined) message.authorSignature = raw.post_author;
    if (raw.from_boosts_applied !== undefined) message.senderBoostCount = raw.from_boosts_applied;

    const viaBot = raw.via_bot_id ? parseUser(tables.users.get(raw.via_bot_id)) : null;
    if (viaBot) message.viaBot = viaBot;
    const businessBot = raw.via_business_bot_id ? parseUser(tables.users.get(raw.via_business_bot_id)) : null;
    if (businessBot) message.senderBusinessBot = businessBot;
  }

  async function resolveReply(
    message: Message,
    raw: RawMessageContent,
    chat: Chat,
    tables: PeerTables,
    replyDepth: number,
    decodeOptions: DecodeOptions,
  ): Promise<void> {
    const replyTo = raw.reply_to;

    if (decodeOptions.prefetchedReplyTarget) {
      message.replyToMessage = await decode(decodeOptions.prefetchedReplyTarget, tables, {
        replyDepth: 0,
        businessConnectionId: decodeOptions.businessConnectionId,
      });
      return;
    }

    if (replyTo?._ === 'messageReplyStoryHeader') {
      const me = client.me;
      if (me && !me.isBot) {
        const story = await client.fetchStory(getPeerId(replyTo.peer), replyTo.story_id);
        if (story) message.replyToStory = story;
      }
      return;
    }

    const replyToMessageId = message.replyToMessageId;
    if (replyTo?._ !== 'messageReplyHeader' || replyToMessageId === undefined) return;

    const replyPeer = replyTo.reply_to_peer_id;
    const replyChatId = replyPeer ? getPeerId(replyPeer) : chat.id;
    const cached = cache.get(replyChatId, replyToMessageId);
    if (cached) {
      message.replyToMessage = cached;
      return;
    }

    const target = await lookup(
      'Reply target',
      MESSAGE_LOOKUP_CODES,
      { chatId: replyChatId, messageId: replyToMessageId },
      () => replyPeer
        ? client.fetchMessageById(replyChatId, replyToMessageId, replyDepth - 1)
        : client.fetchReplyTarget(chat.id, raw.id, replyDepth - 1),
    );
    if (target) message.replyToMessage = target;
  }

  async function decodeContent(
    raw: RawMessageContent,
    tables: PeerTables,
    replyDepth: number,
    decodeOptions: DecodeOptions,
  ): Promise<Message> {
    const entities = parseEntities(raw.entities, tables.users);
    const chat = parsePeerChat(raw.peer_id, tables.users, tables.chats);
    const message = baseMessage(raw, chat, decodeOptions);
    applySender(message, raw, tables);
    applyContentFields(message, raw, tables, decodeOptions);

    if (raw.fwd_from) applyForward(message, raw.fwd_from, tables);

    const media = raw.media ? parseMedia(raw.media, tables) : null;
    if (media) {
      Object.assign(message, media satisfies Partial<Message>);
    } else if (raw.media && raw.media._ !== 'messageMediaEmpty') {
      log.debug({ messageId: raw.id, media: raw.media._ }, 'Media not decoded');
    }

    const replyMarkup = parseReplyMarkup(raw.reply_markup);
    if (replyMarkup) message.replyMarkup = replyMarkup;

    const reactions = parseReactions(raw.reactions);
    if (reactions) message.reactions = reactions.reactions;

    const textual = bodyIsText(raw.media);
    if (raw.message) {
      const body = new Str(raw.message, entities);
      if (textual) {
        message.text = body;
        if (entities.length > 0) message.entities = entities;
      } else {
        message.caption = body;
        if (entities.length > 0) message.captionEntities = entities;
      }
    }

    if (hasBlockquote(message)) message.quote = true;

    const replyTo = raw.reply_to;
    if (replyTo?._ === 'messageReplyHeader') {
      if (replyTo.reply_to_msg_id) message.replyToMessageId = replyTo.reply_to_msg_id;
      if (replyTo.reply_to_top_id) message.replyToTopMessageId = replyTo.reply_to_top_id;

      if (replyTo.forum_topic) {
        const threadId = replyTo.reply_to_top_id || replyTo.reply_to_msg_id || 1;
        message.topicMessage = true;
        message.messageThreadId = threadId;
        const topic = parseForumTopic(tables.topics?.get(threadId), tables.users, tables.chats);
        if (topic) message.topic = topic;
      } else if (replyTo.quote) {
        message.quote = true;
        if (textual && replyTo.quote_text) {
          const quoteEntities = parseEntities(replyTo.quote_entities, tables.users);
          message.quoteText = new Str(replyTo.quote_text, quoteEntities);
          if (quoteEntities.length > 0) message.quoteEntities = quoteEntities;
        }
      }
    } else if (replyTo?._ === 'messageReplyStoryHeader') {
      message.replyToStoryId = replyTo.story_id;
      message.replyToStoryUserId = getPeerId(replyTo.peer);
    }

    if (raw.reply_to && replyDepth > 0) await resolveReply(message, raw, chat, tables, replyDepth, decodeOptions);

    const me = client.me;
    if (!message.topic && chat.isForum && me && !me.isBot) {
      const topicId = message.messageThreadId ?? 1;
      const topic = await lookup('Forum topic', INACCESSIBLE_CODES, { chatId: chat.id, topicId }, () =>
        client.fetchTopic(chat.id, topicId),
      );
      if (topic) message.topic = topic;
    }

    if (!message.poll) cache.put(chat.id, raw.id, message);

    return message;
  }

  async function decode(raw: RawMessage, tables: PeerTables, decodeOptions: DecodeOptions = {}): Promise<Message> {
    if (raw._ === 'messageEmpty') {
      const message: Message = { id: raw.id, raw, empty: true };
      if (decodeOptions.businessConnectionId) message.businessConnectionId = decodeOptions.businessConnectionId;
      return message;
    }

    const replyDepth = decodeOptions.replyDepth ?? defaultReplyDepth;
    await ensurePrivatePeers(raw, tables);

    return raw._ === 'messageService'
      ? decodeService(raw, tables, replyDepth, decodeOptions)
      : decodeContent(raw, tables, replyDepth, decodeOptions);
  }

  async function decodeMessages(response: RawMessagesResponse, decodeOptions: DecodeOptions = {}): Promise<Message[]> {
    const tables = buildPeerTables(response);
    const messages: Message[] = [];
    for (const raw of response.messages) {
      messages.push(await decode(raw, tables, decodeOptions));
    }
    log.debug({ count: messages.length }, 'Decoded message batch');
    return messages;
  }

  return { decode, decodeMessages };
}
