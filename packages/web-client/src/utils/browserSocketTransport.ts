import { NORMAL_CLOSURE, type FrameTransport } from '@duplex-hub/shared';

// WebSocket.readyState values; the constructor's static copies are absent outside browsers.
const SOCKET_OPEN = 1;
const SOCKET_CLOSING = 2;
const SOCKET_CLOSED = 3;

/**
 * Browsers only accept 1000 and the 3000-4999 range from application code.
 */
function toClientCloseCode(code: number): number {
  return code === NORMAL_CLOSURE || (code >= 3000 && code <= 4999) ? code : NORMAL_CLOSURE;
}

export function createBrowserSocketTransport(socket: WebSocket): FrameTransport {
  socket.binaryType = 'arraybuffer';

  return {
    isOpen() {
      return socket.readyState === SOCKET_OPEN;
    },
    sendText(frame) {
      if (socket.readyState !== SOCKET_OPEN) {
        return false;
      }
      socket.send(frame);
      return true;
    },
    close(code, reason) {
      if (socket.readyState === SOCKET_CLOSING || socket.readyState === SOCKET_CLOSED) {
        return;
      }
      socket.close(toClientCloseCode(code), reason);
    },
    subscribe(listener) {
      const onOpen = (): void => listener.open();
      const onMessage = (event: MessageEvent): void => listener.frame(event.data);
      const onClose = (event: CloseEvent): void =>
        listener.close({ code: event.code, reason: event.reason });
      const onError = (): void => listener.error(new Error('WebSocket connection error'));

      socket.addEventListener('open', onOpen);
      socket.addEventListener('message', onMessage);
      socket.addEventListener('close', onClose);
      socket.addEventListener('error', onError);

      return () => {
        socket.removeEventListener('open', onOpen);
        socket.removeEventListener('message', onMessage);
        socket.removeEventListener('close', onClose);
        socket.removeEventListener('error', onError);
      };
    },
  };
}
