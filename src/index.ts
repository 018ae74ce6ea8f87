export type * from './raw/index.js';
export type { DecoderClient, ClientIdentity } from './core/client.js';
export {
  createMessageDecoder,
  buildPeerTables,
  type DecodeOptions,
  type MessageDecoder,
  type MessageDecoderOptions,
  type PeerTables,
} from './core/message-decoder.js';
export { createMessageCache, type MessageCache, type LruMessageCache } from './core/message-cache.js';
export { MessageServiceType, MessageMediaType, messageLink, messageContent, type Message } from './core/message.js';
export { Str, reindexEntities } from './core/str.js';
export {
  rpcError,
  isRpcError,
  getRpcErrorCode,
  NOT_FOUND_CODES,
  INACCESSIBLE_CODES,
  type RpcErrorCode,
} from './core/rpc-errors.js';
export { unparse, escapeHtml, type MarkupDialect } from './text/unparse.js';
export { MessageEntityType, type MessageEntity } from './parsers/entity.js';
export type { Chat, ChatType } from './parsers/chat.js';
export type { User } from './parsers/user.js';
export type * from './parsers/document.js';
export type * from './parsers/media.js';
export type * from './parsers/markup.js';
export type * from './parsers/reactions.js';
export type * from './parsers/service.js';
export type { ForumTopic } from './parsers/topic.js';
export { getChannelId, getPeerId, getPeerKind, MAX_CHANNEL_ID } from './utils/peer.js';
