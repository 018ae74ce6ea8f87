import type {
  MediaGiveaway,
  MediaGiveawayResults,
  MediaPoll,
  MediaWebPage,
  RawChat,
  RawExtendedMedia,
  RawGame,
  RawGeoPoint,
  RawMessageMedia,
  RawUser,
} from '../raw/index.js';
import { Str } from '../core/str.js';
import { timestampToDate } from '../utils/peer.js';
import { parsePeerChat, type Chat } from './chat.js';
import {
  parseDocument,
  parseDocumentMedia,
  parsePhoto,
  type Animation,
  type Document,
  type DocumentMedia,
  type Photo,
  type Video,
} from './document.js';
import { parseEntities } from './entity.js';
import { parseUsers, type User } from './user.js';

export interface Location {
  longitude: number;
  latitude: number;
  accuracyRadius?: number;
}

export interface Contact {
  phoneNumber: string;
  firstName: string;
  lastName?: string;
  userId?: number;
  vcard?: string;
}

export interface Venue {
  location: Location;
  title: string;
  address: string;
  provider?: string;
  venueId?: string;
  venueType?: string;
}

export interface Game {
  id: bigint;
  shortName: string;
  title: string;
  description: string;
  photo?: Photo;
  animation?: Animation;
}

export interface Giveaway {
  chats: Chat[];
  quantity: number;
  months?: number;
  starCount?: number;
  expirationDate?: Date;
  countryCodes?: string[];
  prizeDescription?: string;
  newSubscribers: boolean;
  hasPublicWinners: boolean;
}

export interface GiveawayWinners {
  chat: Chat;
  giveawayMessageId: number;
  winnersCount: number;
  unclaimedCount: number;
  winners: User[];
  months?: number;
  starCount?: number;
  expirationDate?: Date;
  prizeDescription?: string;
  onlyNewMembers: boolean;
  isRefunded: boolean;
}

export interface Invoice {
  title: string;
  description: string;
  currency: string;
  totalAmount: number;
  startParameter: string;
  isTest: boolean;
  shippingAddressRequested: boolean;
  receiptMessageId?: number;
}

export interface Story {
  id: number;
  chat: Chat;
  isMention: boolean;
}

export interface WebPage {
  id: bigint;
  url: string;
  displayUrl: string;
  type?: string;
  siteName?: string;
  title?: string;
  description?: string;
  embedUrl?: string;
  duration?: number;
  author?: string;
  photo?: Photo;
  document?: Document;
  forceLargeMedia: boolean;
  forceSmallMedia: boolean;
  isManual: boolean;
  isSafe: boolean;
}

export interface PollOption {
  text: Str;
  voterCount: number;
  data: Uint8Array;
}

export interface Poll {
  id: bigint;
  question: Str;
  options: PollOption[];
  totalVoterCount: number;
  isClosed: boolean;
  isAnonymous: boolean;
  type: 'regular' | 'quiz';
  allowsMultipleAnswers: boolean;
  chosenOptionIds?: number[];
  correctOptionId?: number;
  explanation?: Str;
  openPeriod?: number;
  closeDate?: Date;
}

export interface Dice {
  emoji: string;
  value: number;
}

export type PaidMedia =
  | { type: 'preview'; width?: number; height?: number; duration?: number }
  | { type: 'photo'; photo: Photo }
  | { type: 'video'; video: Video };

export interface PaidMediaInfo {
  starCount: number;
  paidMedia: PaidMedia[];
}

export type ParsedMedia =
  | DocumentMedia
  | { media: 'photo'; photo: Photo; hasMediaSpoiler: boolean }
  | { media: 'location'; location: Location }
  | { media: 'contact'; contact: Contact }
  | { media: 'venue'; venue: Venue }
  | { media: 'game'; game: Game }
  | { media: 'giveaway'; giveaway: Giveaway }
  | { media: 'giveawayWinners'; giveawayWinners: GiveawayWinners }
  | { media: 'invoice'; invoice: Invoice }
  | { media: 'story'; story: Story }
  | { media: 'webPage'; webPage: WebPage }
  | { media: 'poll'; poll: Poll }
  | { media: 'dice'; dice: Dice }
  | { media: 'paidMedia'; paidMedia: PaidMediaInfo };

interface Tables {
  users: Map<number, RawUser>;
  chats: Map<number, RawChat>;
}

export function parseLocation(geo: RawGeoPoint): Location | null {
  if (geo._ !== 'geoPoint') return null;
  const location: Location = { longitude: geo.long, latitude: geo.lat };
  if (geo.accuracy_radius !== undefined) location.accuracyRadius = geo.accuracy_radius;
  return location;
}

function parseGame(game: RawGame): Game {
  const parsed: Game = {
    id: game.id,
    shortName: game.short_name,
    title: game.title,
    description: game.description,
  };
  const photo = parsePhoto(game.photo);
  if (photo) parsed.photo = photo;
  if (game.document) {
    const doc = parseDocument(game.document);
    if (doc?.media === 'animation') parsed.animation = doc.animation;
  }
  return parsed;
}

function channelChat(channelId: number, tables: Tables): Chat {
  return parsePeerChat({ _: 'peerChannel', channel_id: channelId }, tables.users, tables.chats);
}

function parseGiveaway(media: MediaGiveaway, tables: Tables): Giveaway {
  const giveaway: Giveaway = {
    chats: media.channels.map((id) => channelChat(id, tables)),
    quantity: media.quantity,
    expirationDate: timestampToDate(media.until_date),
    newSubscribers: !!media.only_new_subscribers,
    hasPublicWinners: !!media.winners_are_visible,
  };
  if (media.months !== undefined) giveaway.months = media.months;
  if (media.stars !== undefined) giveaway.starCount = media.stars;
  if (media.countries_iso2?.length) giveaway.countryCodes = media.countries_iso2;
  if (media.prize_description !== undefined) giveaway.prizeDescription = media.prize_description;
  return giveaway;
}

function parseGiveawayWinners(media: MediaGiveawayResults, tables: Tables): GiveawayWinners {
  const winners: GiveawayWinners = {
    chat: channelChat(media.channel_id, tables),
    giveawayMessageId: media.launch_msg_id,
    winnersCount: media.winners_count,
    unclaimedCount: media.unclaimed_count,
    winners: parseUsers(media.winners, tables.users),
    expirationDate: timestampToDate(media.until_date),
    onlyNewMembers: !!media.only_new_subscribers,
    isRefunded: !!media.refunded,
  };
  if (media.months !== undefined) winners.months = media.months;
  if (media.stars !== undefined) winners.starCount = media.stars;
  if (media.prize_description !== undefined) winners.prizeDescription = media.prize_description;
  return winners;
}

function parseWebPage(media: MediaWebPage): WebPage | null {
  const page = media.webpage;
  if (page._ !== 'webPage') return null;

  const parsed: WebPage = {
    id: page.id,
    url: page.url,
    displayUrl: page.display_url,
    forceLargeMedia: !!media.force_large_media,
    forceSmallMedia: !!media.force_small_media,
    isManual: !!media.manual,
    isSafe: !!media.safe,
  };
  if (page.type !== undefined) parsed.type = page.type;
  if (page.site_name !== undefined) parsed.siteName = page.site_name;
  if (page.title !== undefined) parsed.title = page.title;
  if (page.description !== undefined) parsed.description = page.description;
  if (page.embed_url !== undefined) parsed.embedUrl = page.embed_url;
  if (page.duration !== undefined) parsed.duration = page.duration;
  if (page.author !== undefined) parsed.author = page.author;
  const photo = parsePhoto(page.photo);
  if (photo) parsed.photo = photo;
  if (page.document) {
    const doc = parseDocument(page.document);
    if (doc?.media === 'document') parsed.document = doc.document;
  }
  return parsed;
}

function sameBytes(a: Uint8Array, b: Uint8Array): boolean {
  return a.length === b.length && a.every((byte, i) => byte === b[i]);
}

function parsePoll(media: MediaPoll, users: Map<number, RawUser>): Poll {
  const { poll, results } = media;
  const chosen: number[] = [];
  let correctOptionId: number | undefined;

  const options = poll.answers.map((answer, index): PollOption => {
    const result = results.results?.find((r) => sameBytes(r.option, answer.option));
    if (result?.chosen) chosen.push(index);
    if (result?.correct) correctOptionId = index;
    return {
      text: new Str(answer.text.text, parseEntities(answer.text.entities, users)),
      voterCount: result?.voters ?? 0,
      data: answer.option,
    };
  });

  const parsed: Poll = {
    id: poll.id,
    question: new Str(poll.question.text, parseEntities(poll.question.entities, users)),
    options,
    totalVoterCount: results.total_voters ?? 0,
    isClosed: !!poll.closed,
    isAnonymous: !poll.public_voters,
    type: poll.quiz ? 'quiz' : 'regular',
    allowsMultipleAnswers: !!poll.multiple_choice,
  };
  if (chosen.length > 0) parsed.chosenOptionIds = chosen;
  if (correctOptionId !== undefined) parsed.correctOptionId = correctOptionId;
  if (results.solution) parsed.explanation = new Str(results.solution, parseEntities(results.solution_entities, users));
  if (poll.close_period !== undefined) parsed.openPeriod = poll.close_period;
  const closeDate = timestampToDate(poll.close_date);
  if (closeDate) parsed.closeDate = closeDate;
  return parsed;
}

function parsePaidMediaItem(item: RawExtendedMedia): PaidMedia | null {
  if (item._ === 'messageExtendedMediaPreview') {
    const preview: Extract<PaidMedia, { type: 'preview' }> = { type: 'preview' };
    if (item.w !== undefined) preview.width = item.w;
    if (item.h !== undefined) preview.height = item.h;
    if (item.video_duration !== undefined) preview.duration = item.video_duration;
    return preview;
  }

  const inner = item.media;
  if (inner._ === 'messageMediaPhoto') {
    const photo = parsePhoto(inner.photo, inner.ttl_seconds);
    return photo ? { type: 'photo', photo } : null;
  }
  if (inner._ === 'messageMediaDocument') {
    const doc = parseDocumentMedia(inner);
    return doc?.media === 'video' ? { type: 'video', video: doc.video } : null;
  }
  return null;
}

/**
 * Decode a media attachment. Unsupported or malformed media returns null and the
 * message is then treated as carrying no media at all.
 */
export function parseMedia(media: RawMessageMedia, tables: Tables): ParsedMedia | null {
  switch (media._) {
    case 'messageMediaPhoto': {
      const photo = parsePhoto(media.photo, media.ttl_seconds);
      return photo ? { media: 'photo', photo, hasMediaSpoiler: !!media.spoiler } : null;
    }
    case 'messageMediaGeo': {
      const location = parseLocation(media.geo);
      return location ? { media: 'location', location } : null;
    }
    case 'messageMediaContact': {
      const contact: Contact = { phoneNumber: media.phone_number, firstName: media.first_name };
      if (media.last_name) contact.lastName = media.last_name;
      if (media.user_id) contact.userId = media.user_id;
      if (media.vcard) contact.vcard = media.vcard;
      return { media: 'contact', contact };
    }
    case 'messageMediaVenue': {
      const location = parseLocation(media.geo);
      if (!location) return null;
      const venue: Venue = { location, title: media.title, address: media.address };
      if (media.provider) venue.provider = media.provider;
      if (media.venue_id) venue.venueId = media.venue_id;
      if (media.venue_type) venue.venueType = media.venue_type;
      return { media: 'venue', venue };
    }
    case 'messageMediaGame':
      return { media: 'game', game: parseGame(media.game) };
    case 'messageMediaGiveaway':
      return { media: 'giveaway', giveaway: parseGiveaway(media, tables) };
    case 'messageMediaGiveawayResults':
      return { media: 'giveawayWinners', giveawayWinners: parseGiveawayWinners(media, tables) };
    case 'messageMediaInvoice': {
      const invoice: Invoice = {
        title: media.title,
        description: media.description,
        currency: media.currency,
        totalAmount: media.total_amount,
        startParameter: media.start_param,
        isTest: !!media.test,
        shippingAddressRequested: !!media.shipping_address_requested,
      };
      if (media.receipt_msg_id !== undefined) invoice.receiptMessageId = media.receipt_msg_id;
      return { media: 'invoice', invoice };
    }
    case 'messageMediaStory':
      return {
        media: 'story',
        story: {
          id: media.id,
          chat: parsePeerChat(media.peer, tables.users, tables.chats),
          isMention: !!media.via_mention,
        },
      };
    case 'messageMediaDocument':
      return parseDocumentMedia(media);
    case 'messageMediaWebPage': {
      const webPage = parseWebPage(media);
      return webPage ? { media: 'webPage', webPage } : null;
    }
    case 'messageMediaPoll':
      return { media: 'poll', poll: parsePoll(media, tables.users) };
    case 'messageMediaDice':
      return { media: 'dice', dice: { emoji: media.emoticon, value: media.value } };
    case 'messageMediaPaidMedia': {
      const paidMedia: PaidMedia[] = [];
      for (const item of media.extended_media) {
        const parsed = parsePaidMediaItem(item);
        if (parsed) paidMedia.push(parsed);
      }
      return { media: 'paidMedia', paidMedia: { starCount: media.stars_amount, paidMedia } };
    }
    case 'messageMediaUnsupported':
    case 'messageMediaEmpty':
      return null;
  }
}
