import { WebSocket, type RawData } from 'ws';

import type { FrameTransport, FrameTransportListener } from '@duplex-hub/shared';

/**
 * Adapts a `ws` socket to the FrameTransport surface a Channel consumes.
 * Text and binary frames are both handed over as raw bytes; the protocol
 * decoder reads them as UTF-8 JSON.
 */
export function createWsTransport(socket: WebSocket): FrameTransport {
  const listeners = new Set<FrameTransportListener>();

  const reportError = (err: Error): void => {
    for (const listener of [...listeners]) {
      listener.error(err);
    }
  };

  return {
    isOpen() {
      return socket.readyState === WebSocket.OPEN;
    },
    sendText(frame) {
      if (socket.readyState !== WebSocket.OPEN) {
        return false;
      }
      socket.send(frame, (err) => {
        if (err) {
          reportError(err);
        }
      });
      return true;
    },
    close(code, reason) {
      if (socket.readyState === WebSocket.CLOSING || socket.readyState === WebSocket.CLOSED) {
        return;
      }
      socket.close(code, reason);
    },
    subscribe(listener) {
      listeners.add(listener);

      const onOpen = (): void => listener.open();
      const onMessage = (data: RawData): void => listener.frame(data);
      const onClose = (code: number, reason: Buffer): void =>
        listener.close({ code, reason: reason.toString('utf8') });
      const onError = (err: Error): void => listener.error(err);

      socket.on('open', onOpen);
      socket.on('message', onMessage);
      socket.on('close', onClose);
      socket.on('error', onError);

      return () => {
        listeners.delete(listener);
        socket.off('open', onOpen);
        socket.off('message', onMessage);
        socket.off('close', onClose);
        socket.off('error', onError);
      };
    },
  };
}
