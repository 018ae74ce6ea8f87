/**
 * Peer id utilities.
 *
 * Raw ids are what the wire carries inside a peer (`user_id`, `chat_id`,
 * `channel_id`). Marked ids fold the peer kind into the sign:
 *   users     →  id
 *   groups    → -id
 *   channels  → -1000000000000 - id
 */

import type { RawPeer } from '../raw/index.js';

export const MAX_CHANNEL_ID = -1000000000000;

export type PeerKind = 'user' | 'chat' | 'channel';

/** Raw id carried by the peer, or undefined when there is no peer */
export function getRawPeerId(peer: RawPeer): number;
export function getRawPeerId(peer: RawPeer | undefined): number | undefined;
export function getRawPeerId(peer: RawPeer | undefined): number | undefined {
  if (!peer) return undefined;
  switch (peer._) {
    case 'peerUser':
      return peer.user_id;
    case 'peerChat':
      return peer.chat_id;
    case 'peerChannel':
      return peer.channel_id;
  }
}

/** Marked (signed) id of a peer */
export function getPeerId(peer: RawPeer): number {
  switch (peer._) {
    case 'peerUser':
      return peer.user_id;
    case 'peerChat':
      return -peer.chat_id;
    case 'peerChannel':
      return MAX_CHANNEL_ID - peer.channel_id;
  }
}

/**
 * Convert between a raw channel id and its marked form.
 * The mapping is its own inverse, so it also recovers the raw id from a marked one.
 */
export function getChannelId(id: number): number {
  return MAX_CHANNEL_ID - id;
}

/** Classify a marked id */
export function getPeerKind(markedId: number): PeerKind {
  if (markedId >= 0) return 'user';
  if (markedId > MAX_CHANNEL_ID) return 'chat';
  return 'channel';
}

/** Convert a unix timestamp (seconds) to a Date; 0 and missing map to undefined */
export function timestampToDate(ts: number | undefined): Date | undefined {
  if (!ts) return undefined;
  return new Date(ts * 1000);
}
