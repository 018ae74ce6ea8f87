import type { RawPeer } from './peer.js';
import type { RawMessageEntity, RawTextWithEntities } from './entity.js';

// ── Photos ──────────────────────────────────────────────────────────

export interface RawPhotoSize {
  _: 'photoSize' | 'photoSizeProgressive' | 'photoCachedSize' | 'photoStrippedSize';
  type: string;
  w?: number;
  h?: number;
  size?: number;
  sizes?: number[];
}

export interface RawPhotoFull {
  _: 'photo';
  id: bigint;
  access_hash: bigint;
  date: number;
  dc_id: number;
  sizes: RawPhotoSize[];
  has_stickers?: boolean;
}

export interface RawPhotoEmpty {
  _: 'photoEmpty';
  id: bigint;
}

export type RawPhoto = RawPhotoFull | RawPhotoEmpty;

// ── Documents ───────────────────────────────────────────────────────

export interface AttrImageSize {
  _: 'documentAttributeImageSize';
  w: number;
  h: number;
}

export interface AttrAnimated {
  _: 'documentAttributeAnimated';
}

export interface AttrSticker {
  _: 'documentAttributeSticker';
  alt: string;
  mask?: boolean;
  stickerset_id?: bigint;
}

export interface AttrVideo {
  _: 'documentAttributeVideo';
  duration: number;
  w: number;
  h: number;
  round_message?: boolean;
  supports_streaming?: boolean;
  nosound?: boolean;
}

export interface AttrAudio {
  _: 'documentAttributeAudio';
  duration: number;
  voice?: boolean;
  title?: string;
  performer?: string;
  waveform?: Uint8Array;
}

export interface AttrFilename {
  _: 'documentAttributeFilename';
  file_name: string;
}

export interface AttrCustomEmoji {
  _: 'documentAttributeCustomEmoji';
  alt: string;
  free?: boolean;
}

export type RawDocumentAttribute =
  | AttrImageSize
  | AttrAnimated
  | AttrSticker
  | AttrVideo
  | AttrAudio
  | AttrFilename
  | AttrCustomEmoji;

export interface RawDocumentFull {
  _: 'document';
  id: bigint;
  access_hash: bigint;
  date: number;
  mime_type: string;
  size: number;
  dc_id: number;
  attributes: RawDocumentAttribute[];
}

export interface RawDocumentEmpty {
  _: 'documentEmpty';
  id: bigint;
}

export type RawDocument = RawDocumentFull | RawDocumentEmpty;

// ── Web pages, polls, misc ──────────────────────────────────────────

export interface RawWebPageFull {
  _: 'webPage';
  id: bigint;
  url: string;
  display_url: string;
  type?: string;
  site_name?: string;
  title?: string;
  description?: string;
  photo?: RawPhoto;
  document?: RawDocument;
  embed_url?: string;
  duration?: number;
  author?: string;
}

export interface RawWebPageEmpty {
  _: 'webPageEmpty' | 'webPagePending' | 'webPageNotModified';
  id?: bigint;
  url?: string;
}

export type RawWebPage = RawWebPageFull | RawWebPageEmpty;

export interface RawGeoPointFull {
  _: 'geoPoint';
  long: number;
  lat: number;
  accuracy_radius?: number;
}

export interface RawGeoPointEmpty {
  _: 'geoPointEmpty';
}

export type RawGeoPoint = RawGeoPointFull | RawGeoPointEmpty;

export interface RawPollAnswer {
  text: RawTextWithEntities;
  option: Uint8Array;
}

export interface RawPoll {
  id: bigint;
  question: RawTextWithEntities;
  answers: RawPollAnswer[];
  closed?: boolean;
  public_voters?: boolean;
  multiple_choice?: boolean;
  quiz?: boolean;
  close_period?: number;
  close_date?: number;
}

export interface RawPollAnswerVoters {
  option: Uint8Array;
  voters: number;
  chosen?: boolean;
  correct?: boolean;
}

export interface RawPollResults {
  results?: RawPollAnswerVoters[];
  total_voters?: number;
  solution?: string;
  solution_entities?: RawMessageEntity[];
}

export interface RawGame {
  id: bigint;
  access_hash: bigint;
  short_name: string;
  title: string;
  description: string;
  photo: RawPhoto;
  document?: RawDocument;
}

export type RawExtendedMedia =
  | { _: 'messageExtendedMediaPreview'; w?: number; h?: number; video_duration?: number }
  | { _: 'messageExtendedMedia'; media: RawMessageMedia };

// ── Message media union ─────────────────────────────────────────────

export interface MediaPhoto {
  _: 'messageMediaPhoto';
  photo?: RawPhoto;
  spoiler?: boolean;
  ttl_seconds?: number;
}

export interface MediaGeo {
  _: 'messageMediaGeo';
  geo: RawGeoPoint;
}

export interface MediaContact {
  _: 'messageMediaContact';
  phone_number: string;
  first_name: string;
  last_name: string;
  vcard: string;
  user_id: number;
}

export interface MediaVenue {
  _: 'messageMediaVenue';
  geo: RawGeoPoint;
  title: string;
  address: string;
  provider: string;
  venue_id: string;
  venue_type: string;
}

export interface MediaGame {
  _: 'messageMediaGame';
  game: RawGame;
}

export interface MediaGiveaway {
  _: 'messageMediaGiveaway';
  channels: number[];
  quantity: number;
  months?: number;
  stars?: number;
  until_date: number;
  countries_iso2?: string[];
  prize_description?: string;
  only_new_subscribers?: boolean;
  winners_are_visible?: boolean;
}

export interface MediaGiveawayResults {
  _: 'messageMediaGiveawayResults';
  channel_id: number;
  launch_msg_id: number;
  winners_count: number;
  unclaimed_count: number;
  winners: number[];
  months?: number;
  stars?: number;
  until_date: number;
  prize_description?: string;
  only_new_subscribers?: boolean;
  refunded?: boolean;
}

export interface MediaInvoice {
  _: 'messageMediaInvoice';
  title: string;
  description: string;
  currency: string;
  total_amount: number;
  start_param: string;
  test?: boolean;
  shipping_address_requested?: boolean;
  receipt_msg_id?: number;
}

export interface MediaStory {
  _: 'messageMediaStory';
  peer: RawPeer;
  id: number;
  via_mention?: boolean;
}

export interface MediaDocument {
  _: 'messageMediaDocument';
  document?: RawDocument;
  alt_documents?: RawDocument[];
  video_cover?: RawPhoto;
  video_timestamp?: number;
  spoiler?: boolean;
  ttl_seconds?: number;
}

export interface MediaWebPage {
  _: 'messageMediaWebPage';
  webpage: RawWebPage;
  force_large_media?: boolean;
  force_small_media?: boolean;
  manual?: boolean;
  safe?: boolean;
}

export interface MediaPoll {
  _: 'messageMediaPoll';
  poll: RawPoll;
  results: RawPollResults;
}

export interface MediaDice {
  _: 'messageMediaDice';
  value: number;
  emoticon: string;
}

export interface MediaPaidMedia {
  _: 'messageMediaPaidMedia';
  stars_amount: number;
  extended_media: RawExtendedMedia[];
}

export interface MediaUnsupported {
  _: 'messageMediaUnsupported' | 'messageMediaEmpty';
}

export type RawMessageMedia =
  | MediaPhoto
  | MediaGeo
  | MediaContact
  | MediaVenue
  | MediaGame
  | MediaGiveaway
  | MediaGiveawayResults
  | MediaInvoice
  | MediaStory
  | MediaDocument
  | MediaWebPage
  | MediaPoll
  | MediaDice
  | MediaPaidMedia
  | MediaUnsupported;
