import { describe, expect, it } from 'vitest';

import { ProtocolDecodeError, ProtocolEncodeError } from './errors';
import {
  decodeFrame,
  decodeMessage,
  encodeMessage,
  type JsonValue,
  type Message,
} from './protocol';

describe('encodeMessage', () => {
  it('writes one JSON object with type and payload', () => {
    const frame = encodeMessage({ type: 'send-notice', payload: { content: 'Hi' } });
    expect(frame).toBe('{"type":"send-notice","payload":{"content":"Hi"}}');
  });

  it('rejects an empty type', () => {
    expect(() => encodeMessage({ type: '', payload: null })).toThrow(ProtocolEncodeError);
  });

  it('rejects payloads that cannot be serialised', () => {
    const payload: { [key: string]: JsonValue } = {};
    payload['self'] = payload;
    expect(() => encodeMessage({ type: 'loop', payload })).toThrow(
      'Payload for "loop" is not serialisable',
    );
  });
});

describe('decodeFrame', () => {
  it('decodes a text frame', () => {
    const result = decodeFrame('{"type":"send-notice","payload":{"content":"Hi"}}');
    expect(result.ok).toBe(true);
    if (!result.ok) {
      throw new Error('expected a decoded message');
    }
    expect(result.message).toEqual({ type: 'send-notice', payload: { content: 'Hi' } });
  });

  it('treats a missing payload as null', () => {
    const result = decodeFrame('{"type":"ping"}');
    expect(result).toEqual({ ok: true, raw: '{"type":"ping"}', message: { type: 'ping', payload: null } });
  });

  it('accepts typed arrays, ArrayBuffers and chunk lists', () => {
    const encoder = new TextEncoder();
    const bytes = encoder.encode('{"type":"bytes","payload":1}');
    const buffer = new ArrayBuffer(bytes.byteLength);
    new Uint8Array(buffer).set(bytes);

    expect(decodeMessage(bytes)).toEqual({ type: 'bytes', payload: 1 });
    expect(decodeMessage(buffer)).toEqual({ type: 'bytes', payload: 1 });
    expect(
      decodeMessage([Buffer.from('{"type":"chunked",'), Buffer.from('"payload":[1,2]}')]),
    ).toEqual({ type: 'chunked', payload: [1, 2] });
  });

  it('reports invalid JSON', () => {
    const result = decodeFrame('not json');
    expect(result).toEqual({
      ok: false,
      raw: 'not json',
      code: 'invalid_json',
      error: 'Frame is not valid JSON',
    });
  });

  it('reports non-object envelopes', () => {
    const result = decodeFrame('[1,2]');
    expect(result.ok).toBe(false);
    if (result.ok) {
      throw new Error('expected a failure');
    }
    expect(result.code).toBe('invalid_envelope');
  });

  it.each(['{"payload":1}', '{"type":""}', '{"type":5}'])('reports a missing type in %s', (raw) => {
    const result = decodeFrame(raw);
    expect(result.ok).toBe(false);
    if (result.ok) {
      throw new Error('expected a failure');
    }
    expect(result.code).toBe('missing_type');
  });

  it('decodes deeply nested payloads without validating their shape', () => {
    const depth = 20_000;
    const raw = `{"type":"deep","payload":${'['.repeat(depth)}${']'.repeat(depth)}}`;

    const result = decodeFrame(raw);

    expect(result.ok).toBe(true);
    if (!result.ok) {
      throw new Error('expected a decoded message');
    }
    expect(result.message.type).toBe('deep');
    expect(Array.isArray(result.message.payload)).toBe(true);
  });

  it('reports unsupported frame values', () => {
    const result = decodeFrame(42);
    expect(result).toEqual({
      ok: false,
      code: 'unsupported_frame',
      error: 'Frame is neither text nor binary data',
    });
  });
});

describe('decodeMessage', () => {
  it('throws ProtocolDecodeError with the failure code', () => {
    let caught: unknown;
    try {
      decodeMessage('{oops');
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(ProtocolDecodeError);
    if (!(caught instanceof ProtocolDecodeError)) {
      throw new Error('expected ProtocolDecodeError');
    }
    expect(caught.code).toBe('invalid_json');
    expect(caught.raw).toBe('{oops');
  });

  it('returns structurally equal payloads after encoding', () => {
    const message: Message = {
      type: 'table-update',
      payload: {
        rows: [
          { id: 1, label: 'first', selected: true },
          { id: 2, label: null, selected: false },
        ],
        total: 2.5,
        tags: [],
      },
    };
    expect(decodeMessage(encodeMessage(message))).toEqual(message);
  });

  it('keeps __proto__ keys in payloads', () => {
    const frame = '{"type":"t","payload":{"__proto__":{"a":1},"b":2}}';

    const { payload } = decodeMessage(frame);

    const keys = payload !== null && typeof payload === 'object' ? Object.keys(payload) : [];
    expect(keys).toEqual(['__proto__', 'b']);
    expect(encodeMessage({ type: 't', payload })).toBe(frame);
  });
});
