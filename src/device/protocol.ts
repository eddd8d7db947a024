import { ProtocolError } from '../errors.js';

export const AUDIO_SAMPLE_RATE = 24_000;
export const AUDIO_FRAME_DURATION_MS = 60;

export type InboundDeviceMessage =
  | { type: 'hello' }
  | { type: 'listen'; state: string }
  | { type: 'audio'; data: Buffer }
  | { type: 'image'; data: Buffer }
  | { type: 'mcp'; payload: unknown }
  | { type: 'wheel'; direction: string }
  | { type: 'button'; action: string }
  | { type: 'status'; payload: unknown }
  | { type: 'unrecognized'; messageType: string };

export type Emotion = 'neutral' | 'cool' | 'thinking' | 'confident' | 'shocked';

export type JsonRpcRequest = {
  jsonrpc: '2.0';
  id: number;
  method: string;
  params: Record<string, unknown>;
};

export type OutboundDeviceMessage =
  | {
      type: 'hello';
      transport: 'websocket';
      session_id: string;
      audio_params: { sample_rate: number; frame_duration: number };
    }
  | { type: 'mcp'; payload: JsonRpcRequest }
  | { type: 'tts'; state: 'stop' }
  | { type: 'tts'; state: 'sentence_start'; text: string }
  | { type: 'llm'; emotion: Emotion }
  | { type: 'alert'; status: string; message: string; emotion: Emotion }
  | { type: 'request_frame' }
  | { type: 'audio_play'; payload: { data: string } };

const HEX_PATTERN = /^[0-9a-fA-F]*$/;

/** Strict hex decoding; Buffer.from silently truncates at the first bad digit. */
export function decodeHex(value: string): Buffer {
  if (value.length % 2 !== 0 || !HEX_PATTERN.test(value)) {
    throw new ProtocolError('Payload is not valid hex');
  }
  return Buffer.from(value, 'hex');
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function stringField(source: Record<string, unknown>, key: string): string {
  const value = source[key];
  return typeof value === 'string' ? value : '';
}

function hexPayload(payload: unknown): Buffer {
  if (!isRecord(payload)) {
    return Buffer.alloc(0);
  }
  const data = payload.data;
  if (data === undefined || data === null) {
    return Buffer.alloc(0);
  }
  if (typeof data !== 'string') {
    throw new ProtocolError('Payload data must be a hex string');
  }
  return decodeHex(data);
}

/**
 * Parses one JSON text frame from the device. Throws ProtocolError for
 * malformed JSON, a non-object envelope or bad hex; unknown types come back as
 * the `unrecognized` variant.
 */
export function parseDeviceMessage(text: string): InboundDeviceMessage {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (error) {
    throw new ProtocolError('Invalid JSON from device', { cause: error });
  }

  if (!isRecord(parsed)) {
    throw new ProtocolError('Device message must be a JSON object');
  }

  const type = stringField(parsed, 'type');
  const payload = parsed.payload;
  const payloadFields = isRecord(payload) ? payload : {};

  switch (type) {
    case 'hello':
      return { type };
    case 'listen':
      return { type, state: stringField(parsed, 'state') };
    case 'audio':
      return { type, data: hexPayload(payload) };
    case 'image':
      return { type, data: hexPayload(payload) };
    case 'mcp':
      return { type, payload: payload ?? {} };
    case 'wheel':
      return { type, direction: stringField(payloadFields, 'direction') };
    case 'button':
      return { type, action: stringField(payloadFields, 'action') };
    case 'status':
      return { type, payload: payload ?? {} };
    default:
      return { type: 'unrecognized', messageType: type };
  }
}

export function helloReply(sessionId: string): OutboundDeviceMessage {
  return {
    type: 'hello',
    transport: 'websocket',
    session_id: sessionId,
    audio_params: { sample_rate: AUDIO_SAMPLE_RATE, frame_duration: AUDIO_FRAME_DURATION_MS }
  };
}

export function jsonRpcRequest(
  id: number,
  method: string,
  params: Record<string, unknown>
): OutboundDeviceMessage {
  return { type: 'mcp', payload: { jsonrpc: '2.0', id, method, params } };
}

export function visionInitialize(id: number, url: string, token: string): OutboundDeviceMessage {
  return jsonRpcRequest(id, 'initialize', { capabilities: { vision: { url, token } } });
}

export function toolCall(
  id: number,
  name: string,
  args: Record<string, unknown>
): OutboundDeviceMessage {
  return jsonRpcRequest(id, 'tools/call', { name, arguments: args });
}

export const ttsStop = (): OutboundDeviceMessage => ({ type: 'tts', state: 'stop' });

export const ttsSentence = (text: string): OutboundDeviceMessage => ({
  type: 'tts',
  state: 'sentence_start',
  text
});

export const emotion = (value: Emotion): OutboundDeviceMessage => ({ type: 'llm', emotion: value });

export const alert = (status: string, message: string, value: Emotion): OutboundDeviceMessage => ({
  type: 'alert',
  status,
  message,
  emotion: value
});

export const requestFrame = (): OutboundDeviceMessage => ({ type: 'request_frame' });

export const audioPlay = (audio: Buffer): OutboundDeviceMessage => ({
  type: 'audio_play',
  payload: { data: audio.toString('hex') }
});

export function encodeDeviceMessage(message: OutboundDeviceMessage): string {
  return JSON.stringify(message);
}
