export type * from './peer.js';
export type * from './entity.js';
export type * from './media.js';
export type * from './message.js';
