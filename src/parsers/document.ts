/**
 * Photo and document decoding.
 *
 * A document's kind is decided by its attributes, in this order:
 * animated → sticker → video (round → video note) → audio (voice → voice) → plain document.
 */

import type {
  AttrAudio,
  AttrVideo,
  MediaDocument,
  RawDocument,
  RawDocumentAttribute,
  RawDocumentFull,
  RawPhoto,
} from '../raw/index.js';
import { timestampToDate } from '../utils/peer.js';

export interface Photo {
  id: bigint;
  date?: Date;
  width: number;
  height: number;
  fileSize: number;
  ttlSeconds?: number;
  hasStickers?: boolean;
}

interface FileBase {
  id: bigint;
  mimeType: string;
  fileSize: number;
  date?: Date;
}

export interface Document extends FileBase {
  fileName?: string;
}

export interface Animation extends Document {
  width: number;
  height: number;
  duration: number;
}

export interface Video extends Document {
  width: number;
  height: number;
  duration: number;
  supportsStreaming: boolean;
  ttlSeconds?: number;
  cover?: Photo;
  startTimestamp?: number;
}

export interface VideoNote extends FileBase {
  length: number;
  duration: number;
  ttlSeconds?: number;
}

export interface Audio extends Document {
  duration: number;
  performer?: string;
  title?: string;
}

export interface Voice extends FileBase {
  duration: number;
  waveform?: Uint8Array;
  ttlSeconds?: number;
}

export interface Sticker extends Document {
  width: number;
  height: number;
  emoji?: string;
  setId?: bigint;
  isAnimated: boolean;
  isVideo: boolean;
  isMask: boolean;
}

export type DocumentMedia =
  | { media: 'animation'; animation: Animation; hasMediaSpoiler: boolean }
  | { media: 'sticker'; sticker: Sticker }
  | { media: 'videoNote'; videoNote: VideoNote }
  | { media: 'video'; video: Video; alternativeVideos?: Video[]; hasMediaSpoiler: boolean }
  | { media: 'voice'; voice: Voice }
  | { media: 'audio'; audio: Audio }
  | { media: 'document'; document: Document };

type AttributeOf<K extends RawDocumentAttribute['_']> = Extract<RawDocumentAttribute, { _: K }>;

function findAttribute<K extends RawDocumentAttribute['_']>(
  doc: RawDocumentFull,
  kind: K,
): AttributeOf<K> | undefined {
  return doc.attributes.find((attr): attr is AttributeOf<K> => attr._ === kind);
}

export function parsePhoto(photo: RawPhoto | undefined, ttlSeconds?: number): Photo | null {
  if (!photo || photo._ === 'photoEmpty') return null;

  let best: { w: number; h: number; size: number } | null = null;
  for (const size of photo.sizes) {
    if (!size.w || !size.h) continue;
    // Progressive sizes list every prefix length; the full file is the last one.
    const bytes = size.size ?? size.sizes?.[size.sizes.length - 1] ?? 0;
    if (!best || size.w * size.h > best.w * best.h) {
      best = { w: size.w, h: size.h, size: bytes };
    }
  }
  if (!best) return null;

  const parsed: Photo = {
    id: photo.id,
    date: timestampToDate(photo.date),
    width: best.w,
    height: best.h,
    fileSize: best.size,
  };
  if (ttlSeconds !== undefined) parsed.ttlSeconds = ttlSeconds;
  if (photo.has_stickers) parsed.hasStickers = true;
  return parsed;
}

function fileBase(doc: RawDocumentFull): FileBase {
  return {
    id: doc.id,
    mimeType: doc.mime_type,
    fileSize: doc.size,
    date: timestampToDate(doc.date),
  };
}

function documentBase(doc: RawDocumentFull, fileName: string | undefined): Document {
  const base: Document = fileBase(doc);
  if (fileName !== undefined) base.fileName = fileName;
  return base;
}

export function parseVideo(
  doc: RawDocumentFull,
  attr: AttrVideo,
  fileName: string | undefined,
  extra: { ttlSeconds?: number; cover?: RawPhoto; startTimestamp?: number } = {},
): Video {
  const video: Video = {
    ...documentBase(doc, fileName),
    width: attr.w,
    height: attr.h,
    duration: attr.duration,
    supportsStreaming: !!attr.supports_streaming,
  };
  if (extra.ttlSeconds !== undefined) video.ttlSeconds = extra.ttlSeconds;
  const cover = parsePhoto(extra.cover);
  if (cover) video.cover = cover;
  if (extra.startTimestamp !== undefined) video.startTimestamp = extra.startTimestamp;
  return video;
}

function parseAudioKind(doc: RawDocumentFull, attr: AttrAudio, fileName: string | undefined, ttlSeconds?: number): DocumentMedia {
  if (attr.voice) {
    const voice: Voice = { ...fileBase(doc), duration: attr.duration };
    if (attr.waveform) voice.waveform = attr.waveform;
    if (ttlSeconds !== undefined) voice.ttlSeconds = ttlSeconds;
    return { media: 'voice', voice };
  }

  const audio: Audio = { ...documentBase(doc, fileName), duration: attr.duration };
  if (attr.performer !== undefined) audio.performer = attr.performer;
  if (attr.title !== undefined) audio.title = attr.title;
  return { media: 'audio', audio };
}

/** Alternate qualities: genuine documents carrying a video attribute, others skipped */
export function parseAlternativeVideos(altDocs: RawDocument[] | undefined): Video[] {
  const videos: Video[] = [];
  for (const alt of altDocs ?? []) {
    if (alt._ !== 'document') continue;
    const attr = findAttribute(alt, 'documentAttributeVideo');
    if (!attr) continue;
    videos.push(parseVideo(alt, attr, findAttribute(alt, 'documentAttributeFilename')?.file_name));
  }
  return videos;
}

/** Per-message extras that only a media attachment carries */
export interface DocumentOptions {
  spoiler?: boolean;
  ttlSeconds?: number;
  videoCover?: RawPhoto;
  videoTimestamp?: number;
  altDocuments?: RawDocument[];
}

export function parseDocument(doc: RawDocument | undefined, options: DocumentOptions = {}): DocumentMedia | null {
  if (!doc || doc._ !== 'document') return null;

  const fileName = findAttribute(doc, 'documentAttributeFilename')?.file_name;
  const videoAttr = findAttribute(doc, 'documentAttributeVideo');

  if (findAttribute(doc, 'documentAttributeAnimated')) {
    const size = videoAttr ?? findAttribute(doc, 'documentAttributeImageSize');
    const animation: Animation = {
      ...documentBase(doc, fileName),
      width: size?.w ?? 0,
      height: size?.h ?? 0,
      duration: videoAttr?.duration ?? 0,
    };
    return { media: 'animation', animation, hasMediaSpoiler: !!options.spoiler };
  }

  const stickerAttr = findAttribute(doc, 'documentAttributeSticker');
  if (stickerAttr) {
    const size = findAttribute(doc, 'documentAttributeImageSize') ?? videoAttr;
    const sticker: Sticker = {
      ...documentBase(doc, fileName),
      width: size?.w ?? 512,
      height: size?.h ?? 512,
      isAnimated: doc.mime_type === 'application/x-tgsticker',
      isVideo: doc.mime_type === 'video/webm',
      isMask: !!stickerAttr.mask,
    };
    if (stickerAttr.alt) sticker.emoji = stickerAttr.alt;
    if (stickerAttr.stickerset_id !== undefined) sticker.setId = stickerAttr.stickerset_id;
    return { media: 'sticker', sticker };
  }

  if (videoAttr) {
    if (videoAttr.round_message) {
      const videoNote: VideoNote = { ...fileBase(doc), length: videoAttr.w, duration: videoAttr.duration };
      if (options.ttlSeconds !== undefined) videoNote.ttlSeconds = options.ttlSeconds;
      return { media: 'videoNote', videoNote };
    }

    const video = parseVideo(doc, videoAttr, fileName, {
      ttlSeconds: options.ttlSeconds,
      cover: options.videoCover,
      startTimestamp: options.videoTimestamp,
    });
    const alternativeVideos = parseAlternativeVideos(options.altDocuments);
    return alternativeVideos.length > 0
      ? { media: 'video', video, alternativeVideos, hasMediaSpoiler: !!options.spoiler }
      : { media: 'video', video, hasMediaSpoiler: !!options.spoiler };
  }

  const audioAttr = findAttribute(doc, 'documentAttributeAudio');
  if (audioAttr) return parseAudioKind(doc, audioAttr, fileName, options.ttlSeconds);

  return { media: 'document', document: documentBase(doc, fileName) };
}

export function parseDocumentMedia(media: MediaDocument): DocumentMedia | null {
  return parseDocument(media.document, {
    spoiler: media.spoiler,
    ttlSeconds: media.ttl_seconds,
    videoCover: media.video_cover,
    videoTimestamp: media.video_timestamp,
    altDocuments: media.alt_documents,
  });
}
