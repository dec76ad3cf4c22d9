import { z } from 'zod';

import { ProtocolDecodeError, ProtocolEncodeError, type DecodeErrorCode } from './errors';

export type JsonValue = string | number | boolean | null | JsonValue[] | { [key: string]: JsonValue };

export const MessageTypeSchema = z.string().min(1);

/**
 * Envelope fields checked on every inbound frame. The payload is not run
 * through a schema: `JSON.parse` already yields a JSON value, and handlers
 * that need a shape validate it with `onParsed`.
 */
export const MessageEnvelopeSchema = z.object({
  type: MessageTypeSchema,
});

export interface Message<TPayload extends JsonValue = JsonValue> {
  type: string;
  payload: TPayload;
}

/**
 * Raw inbound frame as delivered by a socket: text, a binary buffer, or the
 * list of chunks `ws` hands over for fragmented binary messages.
 */
export type RawFrame = string | ArrayBuffer | ArrayBufferView | ArrayBufferView[];

export type DecodeResult =
  | { ok: true; raw: string; message: Message }
  | { ok: false; raw?: string; code: DecodeErrorCode; error: string };

// Built-in message types exchanged by the server and the web client.

export const SESSION_MESSAGE_TYPE = 'session';
export const ERROR_MESSAGE_TYPE = 'error';
export const PING_MESSAGE_TYPE = 'ping';
export const PONG_MESSAGE_TYPE = 'pong';

export const SessionPayloadSchema = z.object({
  id: z.string().min(1),
  createdAt: z.string(),
});
export type SessionPayload = z.infer<typeof SessionPayloadSchema>;

export const ErrorPayloadSchema = z.object({
  code: z.string(),
  message: z.string(),
  retryAfterMs: z.number().int().nonnegative().optional(),
});
export type ErrorPayload = z.infer<typeof ErrorPayloadSchema>;

export const PingPayloadSchema = z
  .object({
    nonce: z.string().optional(),
  })
  .nullable();
export type PingPayload = z.infer<typeof PingPayloadSchema>;

export const PongPayloadSchema = z.object({
  nonce: z.string().optional(),
  timestampMs: z.number().int().nonnegative(),
});
export type PongPayload = z.infer<typeof PongPayloadSchema>;

const decoder = new TextDecoder();

/**
 * Encode a message as the single JSON text frame sent over the wire.
 */
export function encodeMessage(message: Message): string {
  if (typeof message.type !== 'string' || message.type.length === 0) {
    throw new ProtocolEncodeError(String(message.type), 'Message type must be a non-empty string');
  }

  let encoded: string | undefined;
  try {
    encoded = JSON.stringify({ type: message.type, payload: message.payload ?? null });
  } catch (err) {
    throw new ProtocolEncodeError(message.type, `Payload for "${message.type}" is not serialisable`, {
      cause: err,
    });
  }
  if (encoded === undefined) {
    throw new ProtocolEncodeError(message.type, `Payload for "${message.type}" is not serialisable`);
  }
  return encoded;
}

/**
 * Decode one inbound frame. Accepts text, `ArrayBuffer`s, typed-array views
 * and chunk lists; anything else is reported as `unsupported_frame`.
 */
export function decodeFrame(frame: unknown): DecodeResult {
  const text = frameToText(frame);
  if (text === undefined) {
    return { ok: false, code: 'unsupported_frame', error: 'Frame is neither text nor binary data' };
  }

  let parsed: JsonValue;
  try {
    parsed = JSON.parse(text);
  } catch {
    return { ok: false, raw: text, code: 'invalid_json', error: 'Frame is not valid JSON' };
  }

  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    return { ok: false, raw: text, code: 'invalid_envelope', error: 'Frame is not a JSON object' };
  }

  const envelope = MessageEnvelopeSchema.safeParse(parsed);
  if (!envelope.success) {
    return { ok: false, raw: text, code: 'missing_type', error: 'Frame has no string "type" field' };
  }

  // Absent payloads decode to null so handlers always receive a JSON value.
  const payload = Object.hasOwn(parsed, 'payload') ? (parsed['payload'] ?? null) : null;
  return { ok: true, raw: text, message: { type: envelope.data.type, payload } };
}

export function decodeMessage(frame: unknown): Message {
  const result = decodeFrame(frame);
  if (!result.ok) {
    throw new ProtocolDecodeError(result.code, result.error, result.raw);
  }
  return result.message;
}

function frameToText(frame: unknown): string | undefined {
  if (typeof frame === 'string') {
    return frame;
  }
  if (Array.isArray(frame)) {
    const chunks: Uint8Array[] = [];
    for (const chunk of frame) {
      if (!ArrayBuffer.isView(chunk)) {
        return undefined;
      }
      chunks.push(viewToBytes(chunk));
    }
    const total = chunks.reduce((sum, chunk) => sum + chunk.byteLength, 0);
    const joined = new Uint8Array(total);
    let offset = 0;
    for (const chunk of chunks) {
      joined.set(chunk, offset);
      offset += chunk.byteLength;
    }
    return decoder.decode(joined);
  }
  if (frame instanceof ArrayBuffer) {
    return decoder.decode(new Uint8Array(frame));
  }
  if (ArrayBuffer.isView(frame)) {
    return decoder.decode(viewToBytes(frame));
  }
  return undefined;
}

function viewToBytes(view: ArrayBufferView): Uint8Array {
  return new Uint8Array(view.buffer, view.byteOffset, view.byteLength);
}
