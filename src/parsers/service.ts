import type { RawChat, RawMessageAction, RawMessageService, RawPeer, RawUser } from '../raw/index.js';
import type { Message } from '../core/message.js';
import { Str } from '../core/str.js';
import { getChannelId, getRawPeerId, timestampToDate } from '../utils/peer.js';
import { parsePeerChat, type Chat } from './chat.js';
import { parseDocument, parsePhoto, type Photo, type Sticker } from './document.js';
import { parseEntities } from './entity.js';
import { parseUser, parseUsers, type User } from './user.js';

export type ChatJoinType = 'by_add' | 'by_link' | 'by_request';

export interface ForumTopicCreated {
  title: string;
  iconColor: number;
  iconCustomEmojiId?: bigint;
}

export interface ForumTopicEdited {
  title?: string;
  iconCustomEmojiId?: bigint;
}

export interface VideoChatScheduled {
  startDate?: Date;
}

export interface VideoChatEnded {
  duration: number;
}

export interface VideoChatMembersInvited {
  users: User[];
}

export type PhoneCallDiscardReason = 'missed' | 'disconnect' | 'hangup' | 'busy';

export interface PhoneCallStarted {
  id: bigint;
  isVideo: boolean;
}

export interface PhoneCallEnded extends PhoneCallStarted {
  reason: PhoneCallDiscardReason;
  duration?: number;
}

export interface WebAppData {
  data: string;
  buttonText: string;
}

export interface GiveawayCreated {
  starCount?: number;
}

export interface GiveawayCompleted {
  winnerCount: number;
  unclaimedCount: number;
  isStarGiveaway: boolean;
  giveawayMessageId?: number;
  /** Resolved by the decoder through the client */
  giveawayMessage?: Message;
}

export interface GiftCode {
  viaGiveaway: boolean;
  isUnclaimed: boolean;
  boostedChat?: Chat;
  months: number;
  slug: string;
  currency?: string;
  amount?: number;
  text?: Str;
}

export interface RequestedChats {
  buttonId: number;
  chats: Chat[];
  users: User[];
}

export interface SuccessfulPayment {
  currency: string;
  totalAmount: number;
  invoicePayload?: string;
  telegramPaymentChargeId?: string;
  providerPaymentChargeId?: string;
  isRecurring: boolean;
  isFirstRecurring: boolean;
  subscriptionExpirationDate?: Date;
}

export interface RefundedPayment {
  currency: string;
  totalAmount: number;
  invoicePayload?: string;
  telegramPaymentChargeId: string;
  providerPaymentChargeId: string;
}

export type Gift =
  | {
    isUnique: false;
    id: bigint;
    sticker?: Sticker;
    starCount: number;
    text?: Str;
    isLimited: boolean;
    isNameHidden: boolean;
    isSaved: boolean;
    isConverted: boolean;
    convertStarCount?: number;
  }
  | {
    isUnique: true;
    id: bigint;
    title: string;
    name: string;
    number: number;
    owner?: Chat;
    isUpgrade: boolean;
    isTransferred: boolean;
    isSaved: boolean;
  };

export interface WriteAccessAllowed {
  fromRequest: boolean;
  webAppName?: string;
  fromAttachmentMenu: boolean;
}

export interface GameHighScore {
  score: number;
  user?: User;
}

/** Service payload keyed by the Message field that carries it. */
export type ServicePayload =
  | { service: 'newChatMembers'; newChatMembers: User[]; chatJoinType: ChatJoinType }
  | { service: 'leftChatMember'; leftChatMember: User }
  | { service: 'newChatTitle'; newChatTitle: string }
  | { service: 'newChatPhoto'; newChatPhoto: Photo }
  | { service: 'deleteChatPhoto'; deleteChatPhoto: true }
  | { service: 'migrateToChatId'; migrateToChatId: number }
  | { service: 'migrateFromChatId'; migrateFromChatId: number }
  | { service: 'groupChatCreated'; groupChatCreated: true }
  | { service: 'channelChatCreated'; channelChatCreated: true }
  | { service: 'customAction'; customAction: string; text: Str }
  | { service: 'forumTopicCreated'; forumTopicCreated: ForumTopicCreated }
  | { service: 'forumTopicEdited'; forumTopicEdited: ForumTopicEdited }
  | { service: 'forumTopicClosed'; forumTopicClosed: true }
  | { service: 'forumTopicReopened'; forumTopicReopened: true }
  | { service: 'generalTopicHidden'; generalTopicHidden: true }
  | { service: 'generalTopicUnhidden'; generalTopicUnhidden: true }
  | { service: 'videoChatScheduled'; videoChatScheduled: VideoChatScheduled }
  | { service: 'videoChatStarted'; videoChatStarted: true }
  | { service: 'videoChatEnded'; videoChatEnded: VideoChatEnded }
  | { service: 'videoChatMembersInvited'; videoChatMembersInvited: VideoChatMembersInvited }
  | { service: 'phoneCallStarted'; phoneCallStarted: PhoneCallStarted }
  | { service: 'phoneCallEnded'; phoneCallEnded: PhoneCallEnded }
  | { service: 'webAppData'; webAppData: WebAppData }
  | { service: 'giveawayCreated'; giveawayCreated: GiveawayCreated }
  | { service: 'giveawayCompleted'; giveawayCompleted: GiveawayCompleted }
  | { service: 'giftCode'; giftCode: GiftCode }
  | { service: 'requestedChats'; requestedChats: RequestedChats }
  | { service: 'successfulPayment'; successfulPayment: SuccessfulPayment }
  | { service: 'refundedPayment'; refundedPayment: RefundedPayment }
  | { service: 'chatTtlPeriod'; chatTtlPeriod: number }
  | { service: 'boostsApplied'; boostsApplied: number }
  | { service: 'gift'; gift: Gift }
  | { service: 'connectedWebsite'; connectedWebsite: string }
  | { service: 'writeAccessAllowed'; writeAccessAllowed: WriteAccessAllowed }
  | { service: 'screenshotTaken'; screenshotTaken: true }
  | { service: 'contactRegistered'; contactRegistered: true };

interface Tables {
  users: Map<number, RawUser>;
  chats: Map<number, RawChat>;
}

const DISCARD_REASONS = {
  phoneCallDiscardReasonMissed: 'missed',
  phoneCallDiscardReasonDisconnect: 'disconnect',
  phoneCallDiscardReasonHangup: 'hangup',
  phoneCallDiscardReasonBusy: 'busy',
} as const;

function decodePayload(payload: Uint8Array | undefined): string | undefined {
  return payload ? new TextDecoder().decode(payload) : undefined;
}

function splitPeers(peers: RawPeer[], tables: Tables): { chats: Chat[]; users: User[] } {
  const chats: Chat[] = [];
  const users: User[] = [];
  for (const peer of peers) {
    if (peer._ === 'peerUser') {
      const user = parseUser(tables.users.get(peer.user_id));
      if (user) users.push(user);
    } else {
      chats.push(parsePeerChat(peer, tables.users, tables.chats));
    }
  }
  return { chats, users };
}

function joinedMember(message: RawMessageService, tables: Tables, chatJoinType: ChatJoinType): ServicePayload | null {
  const member = parseUser(tables.users.get(getRawPeerId(message.from_id) ?? 0));
  return member ? { service: 'newChatMembers', newChatMembers: [member], chatJoinType } : null;
}

/**
 * Topic edits carry no explicit kind, so it is inferred from the flags set.
 * The second `hidden` check can never pass once the first one failed; the
 * unhidden branch is kept until the protocol's intent is confirmed.
 */
function parseTopicEdit(action: Extract<RawMessageAction, { _: 'messageActionTopicEdit' }>): ServicePayload {
  if (action.title) {
    const edited: ForumTopicEdited = { title: action.title };
    if (action.icon_emoji_id !== undefined) edited.iconCustomEmojiId = action.icon_emoji_id;
    return { service: 'forumTopicEdited', forumTopicEdited: edited };
  }
  if (action.hidden) return { service: 'generalTopicHidden', generalTopicHidden: true };
  if (action.closed) return { service: 'forumTopicClosed', forumTopicClosed: true };
  if (action.hidden) return { service: 'generalTopicUnhidden', generalTopicUnhidden: true };
  return { service: 'forumTopicReopened', forumTopicReopened: true };
}

function parseGift(action: Extract<RawMessageAction, { _: 'messageActionStarGift' | 'messageActionStarGiftUnique' }>, tables: Tables): Gift {
  if (action._ === 'messageActionStarGiftUnique') {
    const gift: Gift = {
      isUnique: true,
      id: action.gift.id,
      title: action.gift.title,
      name: action.gift.slug,
      number: action.gift.num,
      isUpgrade: !!action.upgrade,
      isTransferred: !!action.transferred,
      isSaved: !!action.saved,
    };
    if (action.gift.owner_id) gift.owner = parsePeerChat(action.gift.owner_id, tables.users, tables.chats);
    return gift;
  }

  const gift: Gift = {
    isUnique: false,
    id: action.gift.id,
    starCount: action.gift.stars,
    isLimited: !!action.gift.limited,
    isNameHidden: !!action.name_hidden,
    isSaved: !!action.saved,
    isConverted: !!action.converted,
  };
  const sticker = parseDocument(action.gift.sticker);
  if (sticker?.media === 'sticker') gift.sticker = sticker.sticker;
  if (action.message) gift.text = new Str(action.message.text, parseEntities(action.message.entities, tables.users));
  if (action.convert_stars !== undefined) gift.convertStarCount = action.convert_stars;
  return gift;
}

/**
 * Decode the synchronous part of a service action.
 *
 * Returns null for actions that carry no payload of their own (pins and game
 * scores are resolved later by the decoder) and for records that cannot be
 * mapped, which leaves the message without a service tag.
 */
export function parseServiceAction(message: RawMessageService, tables: Tables): ServicePayload | null {
  const { action } = message;

  switch (action._) {
    case 'messageActionChatAddUser':
      return { service: 'newChatMembers', newChatMembers: parseUsers(action.users, tables.users), chatJoinType: 'by_add' };
    case 'messageActionChatJoinedByLink':
      return joinedMember(message, tables, 'by_link');
    case 'messageActionChatJoinedByRequest':
      return joinedMember(message, tables, 'by_request');
    case 'messageActionChatDeleteUser': {
      const user = parseUser(tables.users.get(action.user_id));
      return user ? { service: 'leftChatMember', leftChatMember: user } : null;
    }
    case 'messageActionChatEditTitle':
      return { service: 'newChatTitle', newChatTitle: action.title };
    case 'messageActionChatEditPhoto': {
      const photo = parsePhoto(action.photo);
      return photo ? { service: 'newChatPhoto', newChatPhoto: photo } : null;
    }
    case 'messageActionChatDeletePhoto':
      return { service: 'deleteChatPhoto', deleteChatPhoto: true };
    case 'messageActionChatMigrateTo':
      return action.channel_id
        ? { service: 'migrateToChatId', migrateToChatId: getChannelId(action.channel_id) }
        : null;
    case 'messageActionChannelMigrateFrom':
      return action.chat_id ? { service: 'migrateFromChatId', migrateFromChatId: -action.chat_id } : null;
    case 'messageActionChatCreate':
      return { service: 'groupChatCreated', groupChatCreated: true };
    case 'messageActionChannelCreate':
      return { service: 'channelChatCreated', channelChatCreated: true };
    case 'messageActionCustomAction':
      return { service: 'customAction', customAction: action.message, text: new Str(action.message) };
    case 'messageActionTopicCreate': {
      const created: ForumTopicCreated = { title: action.title, iconColor: action.icon_color };
      if (action.icon_emoji_id !== undefined) created.iconCustomEmojiId = action.icon_emoji_id;
      return { service: 'forumTopicCreated', forumTopicCreated: created };
    }
    case 'messageActionTopicEdit':
      return parseTopicEdit(action);
    case 'messageActionGroupCallScheduled':
      return { service: 'videoChatScheduled', videoChatScheduled: { startDate: timestampToDate(action.schedule_date) } };
    case 'messageActionGroupCall':
      return action.duration
        ? { service: 'videoChatEnded', videoChatEnded: { duration: action.duration } }
        : { service: 'videoChatStarted', videoChatStarted: true };
    case 'messageActionInviteToGroupCall':
      return {
        service: 'videoChatMembersInvited',
        videoChatMembersInvited: { users: parseUsers(action.users, tables.users) },
      };
    case 'messageActionPhoneCall': {
      const call: PhoneCallStarted = { id: action.call_id, isVideo: !!action.video };
      if (!action.reason) return { service: 'phoneCallStarted', phoneCallStarted: call };
      const ended: PhoneCallEnded = { ...call, reason: DISCARD_REASONS[action.reason._] };
      if (action.duration !== undefined) ended.duration = action.duration;
      return { service: 'phoneCallEnded', phoneCallEnded: ended };
    }
    case 'messageActionWebViewDataSentMe':
      return { service: 'webAppData', webAppData: { data: action.data, buttonText: action.text } };
    case 'messageActionGiveawayLaunch':
      return {
        service: 'giveawayCreated',
        giveawayCreated: action.stars !== undefined ? { starCount: action.stars } : {},
      };
    case 'messageActionGiveawayResults': {
      const completed: GiveawayCompleted = {
        winnerCount: action.winners_count,
        unclaimedCount: action.unclaimed_count,
        isStarGiveaway: !!action.stars,
      };
      if (message.reply_to?._ === 'messageReplyHeader' && message.reply_to.reply_to_msg_id) {
        completed.giveawayMessageId = message.reply_to.reply_to_msg_id;
      }
      return { service: 'giveawayCompleted', giveawayCompleted: completed };
    }
    case 'messageActionGiftCode': {
      const code: GiftCode = {
        viaGiveaway: !!action.via_giveaway,
        isUnclaimed: !!action.unclaimed,
        months: action.months,
        slug: action.slug,
      };
      if (action.boost_peer) code.boostedChat = parsePeerChat(action.boost_peer, tables.users, tables.chats);
      if (action.currency !== undefined) code.currency = action.currency;
      if (action.amount !== undefined) code.amount = action.amount;
      if (action.message) code.text = new Str(action.message.text, parseEntities(action.message.entities, tables.users));
      return { service: 'giftCode', giftCode: code };
    }
    case 'messageActionRequestedPeer':
    case 'messageActionRequestedPeerSentMe':
      return {
        service: 'requestedChats',
        requestedChats: { buttonId: action.button_id, ...splitPeers(action.peers, tables) },
      };
    case 'messageActionPaymentSent':
    case 'messageActionPaymentSentMe': {
      const payment: SuccessfulPayment = {
        currency: action.currency,
        totalAmount: action.total_amount,
        isRecurring: !!action.recurring_used,
        isFirstRecurring: !!action.recurring_init,
      };
      const payload = decodePayload(action.payload);
      if (payload !== undefined) payment.invoicePayload = payload;
      if (action.charge) {
        payment.telegramPaymentChargeId = action.charge.id;
        payment.providerPaymentChargeId = action.charge.provider_charge_id;
      }
      const until = timestampToDate(action.subscription_until_date);
      if (until) payment.subscriptionExpirationDate = until;
      return { service: 'successfulPayment', successfulPayment: payment };
    }
    case 'messageActionPaymentRefunded': {
      const refund: RefundedPayment = {
        currency: action.currency,
        totalAmount: action.total_amount,
        telegramPaymentChargeId: action.charge.id,
        providerPaymentChargeId: action.charge.provider_charge_id,
      };
      const payload = decodePayload(action.payload);
      if (payload !== undefined) refund.invoicePayload = payload;
      return { service: 'refundedPayment', refundedPayment: refund };
    }
    case 'messageActionSetMessagesTTL':
      return { service: 'chatTtlPeriod', chatTtlPeriod: action.period };
    case 'messageActionBoostApply':
      return { service: 'boostsApplied', boostsApplied: action.boosts };
    case 'messageActionStarGift':
    case 'messageActionStarGiftUnique':
      return { service: 'gift', gift: parseGift(action, tables) };
    case 'messageActionBotAllowed': {
      if (action.domain) return { service: 'connectedWebsite', connectedWebsite: action.domain };
      const allowed: WriteAccessAllowed = {
        fromRequest: !!action.from_request,
        fromAttachmentMenu: !!action.attach_menu,
      };
      if (action.app) allowed.webAppName = action.app.short_name;
      return { service: 'writeAccessAllowed', writeAccessAllowed: allowed };
    }
    case 'messageActionScreenshotTaken':
      return { service: 'screenshotTaken', screenshotTaken: true };
    case 'messageActionContactSignUp':
      return { service: 'contactRegistered', contactRegistered: true };
    case 'messageActionPinMessage':
    case 'messageActionGameScore':
    case 'messageActionEmpty':
    case 'messageActionHistoryClear':
      return null;
  }
}

export function parseGameHighScore(message: RawMessageService, users: Map<number, RawUser>): GameHighScore | null {
  if (message.action._ !== 'messageActionGameScore') return null;
  const score: GameHighScore = { score: message.action.score };
  const user = parseUser(users.get(getRawPeerId(message.from_id ?? message.peer_id)));
  if (user) score.user = user;
  return score;
}
