import { Boom, isBoom } from '@hapi/boom';

/** The requested object does not exist (or the id list resolved to nothing) */
export const NOT_FOUND_CODES = ['MESSAGE_IDS_EMPTY', 'PEER_ID_INVALID'] as const;

/** The object exists but this account may not see it */
export const INACCESSIBLE_CODES = ['CHANNEL_PRIVATE', 'CHANNEL_FORUM_MISSING'] as const;

export type RpcErrorCode = (typeof NOT_FOUND_CODES)[number] | (typeof INACCESSIBLE_CODES)[number];

export interface RpcErrorData {
  code: string;
}

function isNotFound(code: string): boolean {
  return NOT_FOUND_CODES.some((c) => c === code);
}

/**
 * Build the error a transport raises for an RPC failure.
 * NotFound codes map to 400, everything else to 406.
 */
export function rpcError(code: RpcErrorCode | string, message: string = code): Boom<RpcErrorData> {
  return new Boom<RpcErrorData>(message, {
    statusCode: isNotFound(code) ? 400 : 406,
    data: { code },
  });
}

export function getRpcErrorCode(err: unknown): string | undefined {
  if (!isBoom(err)) return undefined;
  const data: unknown = err.data;
  if (!data || typeof data !== 'object' || !('code' in data)) return undefined;
  return typeof data.code === 'string' ? data.code : undefined;
}

/** True when `err` is an RPC error whose code is one of `codes` */
export function isRpcError(err: unknown, codes: readonly string[]): boolean {
  const code = getRpcErrorCode(err);
  return code !== undefined && codes.includes(code);
}
