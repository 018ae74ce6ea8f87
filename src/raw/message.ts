import type { RawChat, RawForumTopic, RawPeer, RawUser } from './peer.js';
import type { RawDocument, RawMessageMedia, RawPhoto } from './media.js';
import type { RawMessageEntity, RawTextWithEntities } from './entity.js';

// ── Service actions ─────────────────────────────────────────────────

export type RawMessageAction =
  | { _: 'messageActionEmpty' }
  | { _: 'messageActionChatCreate'; title: string; users: number[] }
  | { _: 'messageActionChannelCreate'; title: string }
  | { _: 'messageActionChatEditTitle'; title: string }
  | { _: 'messageActionChatEditPhoto'; photo: RawPhoto }
  | { _: 'messageActionChatDeletePhoto' }
  | { _: 'messageActionChatAddUser'; users: number[] }
  | { _: 'messageActionChatDeleteUser'; user_id: number }
  | { _: 'messageActionChatJoinedByLink'; inviter_id: number }
  | { _: 'messageActionChatJoinedByRequest' }
  | { _: 'messageActionChatMigrateTo'; channel_id: number }
  | { _: 'messageActionChannelMigrateFrom'; title: string; chat_id: number }
  | { _: 'messageActionPinMessage' }
  | { _: 'messageActionGameScore'; game_id: bigint; score: number }
  | { _: 'messageActionCustomAction'; message: string }
  | { _: 'messageActionTopicCreate'; title: string; icon_color: number; icon_emoji_id?: bigint }
  | { _: 'messageActionTopicEdit'; title?: string; icon_emoji_id?: bigint; closed?: boolean; hidden?: boolean }
  | { _: 'messageActionGroupCallScheduled'; schedule_date: number }
  | { _: 'messageActionGroupCall'; duration?: number }
  | { _: 'messageActionInviteToGroupCall'; users: number[] }
  | {
    _: 'messageActionPhoneCall';
    call_id: bigint;
    video?: boolean;
    reason?: { _: 'phoneCallDiscardReasonMissed' | 'phoneCallDiscardReasonDisconnect' | 'phoneCallDiscardReasonHangup' | 'phoneCallDiscardReasonBusy' };
    duration?: number;
  }
  | { _: 'messageActionWebViewDataSentMe'; text: string; data: string }
  | { _: 'messageActionGiveawayLaunch'; stars?: number }
  | { _: 'messageActionGiveawayResults'; winners_count: number; unclaimed_count: number; stars?: boolean }
  | {
    _: 'messageActionGiftCode';
    via_giveaway?: boolean;
    unclaimed?: boolean;
    boost_peer?: RawPeer;
    months: number;
    slug: string;
    currency?: string;
    amount?: number;
    message?: RawTextWithEntities;
  }
  | { _: 'messageActionRequestedPeer' | 'messageActionRequestedPeerSentMe'; button_id: number; peers: RawPeer[] }
  | {
    _: 'messageActionPaymentSent' | 'messageActionPaymentSentMe';
    currency: string;
    total_amount: number;
    payload?: Uint8Array;
    charge?: { id: string; provider_charge_id: string };
    recurring_init?: boolean;
    recurring_used?: boolean;
    subscription_until_date?: number;
  }
  | { _: 'messageActionPaymentRefunded'; peer: RawPeer; currency: string; total_amount: number; payload?: Uint8Array; charge: { id: string; provider_charge_id: string } }
  | { _: 'messageActionSetMessagesTTL'; period: number }
  | { _: 'messageActionBoostApply'; boosts: number }
  | {
    _: 'messageActionStarGift';
    gift: { id: bigint; sticker: RawDocument; stars: number; limited?: boolean };
    message?: RawTextWithEntities;
    name_hidden?: boolean;
    saved?: boolean;
    converted?: boolean;
    convert_stars?: number;
  }
  | {
    _: 'messageActionStarGiftUnique';
    gift: { id: bigint; title: string; slug: string; num: number; owner_id?: RawPeer };
    upgrade?: boolean;
    transferred?: boolean;
    saved?: boolean;
  }
  | { _: 'messageActionBotAllowed'; domain?: string; app?: { short_name: string }; attach_menu?: boolean; from_request?: boolean }
  | { _: 'messageActionScreenshotTaken' }
  | { _: 'messageActionContactSignUp' }
  | { _: 'messageActionHistoryClear' };

// ── Reply / forward headers ─────────────────────────────────────────

export interface RawMessageReplyHeader {
  _: 'messageReplyHeader';
  reply_to_msg_id?: number;
  reply_to_peer_id?: RawPeer;
  reply_to_top_id?: number;
  forum_topic?: boolean;
  quote?: boolean;
  quote_text?: string;
  quote_entities?: RawMessageEntity[];
  quote_offset?: number;
}

export interface RawMessageReplyStoryHeader {
  _: 'messageReplyStoryHeader';
  peer: RawPeer;
  story_id: number;
}

export type RawReplyHeader = RawMessageReplyHeader | RawMessageReplyStoryHeader;

export interface RawFwdHeader {
  date: number;
  from_id?: RawPeer;
  from_name?: string;
  channel_post?: number;
  post_author?: string;
  saved_from_peer?: RawPeer;
  saved_from_msg_id?: number;
  imported?: boolean;
}

// ── Keyboards ───────────────────────────────────────────────────────

export type RawKeyboardButton =
  | { _: 'keyboardButton'; text: string }
  | { _: 'keyboardButtonUrl'; text: string; url: string }
  | { _: 'keyboardButtonCallback'; text: string; data: Uint8Array; requires_password?: boolean }
  | { _: 'keyboardButtonRequestPhone'; text: string }
  | { _: 'keyboardButtonRequestGeoLocation'; text: string }
  | { _: 'keyboardButtonSwitchInline'; text: string; query: string; same_peer?: boolean }
  | { _: 'keyboardButtonGame'; text: string }
  | { _: 'keyboardButtonBuy'; text: string }
  | { _: 'keyboardButtonWebView' | 'keyboardButtonSimpleWebView'; text: string; url: string }
  | { _: 'keyboardButtonUserProfile'; text: string; user_id: number }
  | { _: 'keyboardButtonCopy'; text: string; copy_text: string };

export interface RawKeyboardButtonRow {
  buttons: RawKeyboardButton[];
}

export type RawReplyMarkup =
  | { _: 'replyKeyboardHide'; selective?: boolean }
  | { _: 'replyKeyboardForceReply'; single_use?: boolean; selective?: boolean; placeholder?: string }
  | {
    _: 'replyKeyboardMarkup';
    rows: RawKeyboardButtonRow[];
    resize?: boolean;
    single_use?: boolean;
    selective?: boolean;
    persistent?: boolean;
    placeholder?: string;
  }
  | { _: 'replyInlineMarkup'; rows: RawKeyboardButtonRow[] };

// ── Reactions ───────────────────────────────────────────────────────

export type RawReaction =
  | { _: 'reactionEmoji'; emoticon: string }
  | { _: 'reactionCustomEmoji'; document_id: bigint }
  | { _: 'reactionPaid' }
  | { _: 'reactionEmpty' };

export interface RawReactionCount {
  reaction: RawReaction;
  count: number;
  chosen_order?: number;
}

export interface RawMessageReactions {
  results: RawReactionCount[];
  min?: boolean;
  can_see_list?: boolean;
}

// ── Messages ────────────────────────────────────────────────────────

export interface RawMessageEmpty {
  _: 'messageEmpty';
  id: number;
  peer_id?: RawPeer;
}

export interface RawMessageService {
  _: 'messageService';
  id: number;
  date: number;
  peer_id: RawPeer;
  from_id?: RawPeer;
  action: RawMessageAction;
  reply_to?: RawReplyHeader;
  out?: boolean;
  mentioned?: boolean;
  silent?: boolean;
  post?: boolean;
  ttl_period?: number;
}

export interface RawMessageContent {
  _: 'message';
  id: number;
  date: number;
  peer_id: RawPeer;
  from_id?: RawPeer;
  message: string;
  entities?: RawMessageEntity[];
  media?: RawMessageMedia;
  reply_to?: RawReplyHeader;
  fwd_from?: RawFwdHeader;
  reply_markup?: RawReplyMarkup;
  reactions?: RawMessageReactions;
  via_bot_id?: number;
  via_business_bot_id?: number;
  from_boosts_applied?: number;
  views?: number;
  forwards?: number;
  edit_date?: number;
  post_author?: string;
  grouped_id?: bigint;
  effect?: bigint;
  out?: boolean;
  mentioned?: boolean;
  media_unread?: boolean;
  silent?: boolean;
  post?: boolean;
  from_scheduled?: boolean;
  edit_hide?: boolean;
  pinned?: boolean;
  noforwards?: boolean;
  invert_media?: boolean;
  offline?: boolean;
  video_processing_pending?: boolean;
}

export type RawMessage = RawMessageEmpty | RawMessageService | RawMessageContent;

/** A `messages.Messages`-style response: messages plus the peers they reference. */
export interface RawMessagesResponse {
  messages: RawMessage[];
  users: RawUser[];
  chats: RawChat[];
  topics?: RawForumTopic[];
}
