import { describe, expect, it, vi } from 'vitest';

import { Channel, type FrameTransportListener, type Logger, type Message } from '@duplex-hub/shared';

import { createBrowserSocketTransport } from './browserSocketTransport';

class FakeBrowserSocket extends EventTarget {
  readyState = 1;
  binaryType = 'blob';
  readonly send = vi.fn();
  readonly close = vi.fn();
}

function createTestLogger(): Logger {
  return {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  };
}

function createListener(): FrameTransportListener {
  return {
    open: vi.fn(),
    frame: vi.fn(),
    close: vi.fn(),
    error: vi.fn(),
  };
}

describe('createBrowserSocketTransport', () => {
  it('sends text only while open', () => {
    const socket = new FakeBrowserSocket();
    const transport = createBrowserSocketTransport(socket as unknown as WebSocket);

    expect(transport.sendText('{"type":"a","payload":null}')).toBe(true);
    socket.readyState = 3;
    expect(transport.sendText('{"type":"b","payload":null}')).toBe(false);

    expect(socket.send).toHaveBeenCalledTimes(1);
    expect(socket.send).toHaveBeenCalledWith('{"type":"a","payload":null}');
  });

  it('maps close codes browsers reject to a normal closure', () => {
    const socket = new FakeBrowserSocket();
    const transport = createBrowserSocketTransport(socket as unknown as WebSocket);

    transport.close(1011, 'transport error');

    expect(socket.close).toHaveBeenCalledWith(1000, 'transport error');
  });

  it('keeps application close codes', () => {
    const socket = new FakeBrowserSocket();
    const transport = createBrowserSocketTransport(socket as unknown as WebSocket);

    transport.close(4001, 'logged out');

    expect(socket.close).toHaveBeenCalledWith(4001, 'logged out');
  });

  it('reports socket errors and stops forwarding after unsubscribe', () => {
    const socket = new FakeBrowserSocket();
    const transport = createBrowserSocketTransport(socket as unknown as WebSocket);
    const listener = createListener();
    const unsubscribe = transport.subscribe(listener);

    socket.dispatchEvent(new Event('error'));
    unsubscribe();
    socket.dispatchEvent(new Event('error'));

    expect(listener.error).toHaveBeenCalledTimes(1);
    expect(listener.error).toHaveBeenCalledWith(new Error('WebSocket connection error'));
  });

  it('decodes binary frames delivered as ArrayBuffers', () => {
    const socket = new FakeBrowserSocket();
    const channel = new Channel(createBrowserSocketTransport(socket as unknown as WebSocket), {
      logger: createTestLogger(),
    });
    const received: Message[] = [];
    channel.onMessage((message) => {
      received.push(message);
    });

    const bytes = new TextEncoder().encode('{"type":"update","payload":[1,2]}');
    const data = bytes.buffer.slice(bytes.byteOffset, bytes.byteOffset + bytes.byteLength);
    socket.dispatchEvent(new MessageEvent('message', { data }));

    expect(socket.binaryType).toBe('arraybuffer');
    expect(received).toEqual([{ type: 'update', payload: [1, 2] }]);
  });
});
