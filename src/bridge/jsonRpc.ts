import { ProtocolError } from '../errors.js';

export type JsonRpcId = string | number | null;

export const JSON_RPC_VERSION = '2.0';
export const METHOD_NOT_FOUND = -32601;
export const INTERNAL_ERROR = -32603;

export type IncomingRpc =
  | { kind: 'request'; id: JsonRpcId; method: string; params: Record<string, unknown> }
  | { kind: 'notification'; method: string; params: Record<string, unknown> }
  | { kind: 'response'; id: JsonRpcId }
  | { kind: 'invalid'; reason: string };

export type RpcResult = {
  jsonrpc: typeof JSON_RPC_VERSION;
  id: JsonRpcId;
  result: unknown;
};

export type RpcError = {
  jsonrpc: typeof JSON_RPC_VERSION;
  id: JsonRpcId;
  error: { code: number; message: string };
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readId(value: unknown): JsonRpcId | undefined {
  if (value === null || typeof value === 'string' || typeof value === 'number') {
    return value;
  }
  return undefined;
}

/** Classifies one JSON-RPC frame. Throws ProtocolError when the text is not JSON. */
export function parseRpcMessage(text: string): IncomingRpc {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (error) {
    throw new ProtocolError('Invalid JSON-RPC frame', { cause: error });
  }

  if (!isRecord(parsed)) {
    return { kind: 'invalid', reason: 'frame is not an object' };
  }

  const id = readId(parsed.id);
  const method = parsed.method;
  if (typeof method === 'string') {
    const params = isRecord(parsed.params) ? parsed.params : {};
    if (id === undefined) {
      return { kind: 'notification', method, params };
    }
    return { kind: 'request', id, method, params };
  }

  if ('result' in parsed || 'error' in parsed) {
    return { kind: 'response', id: id ?? null };
  }

  return { kind: 'invalid', reason: 'frame has no method' };
}

export function rpcResult(id: JsonRpcId, result: unknown): RpcResult {
  return { jsonrpc: JSON_RPC_VERSION, id, result };
}

export function rpcError(id: JsonRpcId, code: number, message: string): RpcError {
  return { jsonrpc: JSON_RPC_VERSION, id, error: { code, message } };
}
