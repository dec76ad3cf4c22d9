import type { Server } from 'node:http';

import { WebSocketServer, type WebSocket } from 'ws';

import {
  Channel,
  INTERNAL_ERROR,
  PING_MESSAGE_TYPE,
  PONG_MESSAGE_TYPE,
  PingPayloadSchema,
  SESSION_MESSAGE_TYPE,
  defaultLogger,
  describeError,
  isChannelClosedError,
  type Logger,
} from '@duplex-hub/shared';

import type { Session } from './session';
import { SessionRegistry } from './sessionRegistry';
import { createWsTransport } from './wsTransport';

export interface MessageServerOptions {
  /**
   * Existing HTTP server to attach to. Without it the server listens on
   * `port`, or accepts connections only through `handleConnection`.
   */
  server?: Server;
  port?: number;
  path?: string;
  maxPayloadBytes?: number;
  maxMessagesPerMinute?: number;
  logger?: Logger;
  registry?: SessionRegistry;
  /**
   * Application setup for each new session, typically handler registration.
   * A failing hook closes the session.
   */
  onSession?: (session: Session) => void | Promise<void>;
}

export interface MessageServer {
  readonly wss: WebSocketServer;
  readonly registry: SessionRegistry;
  handleConnection(socket: WebSocket): Promise<Session>;
  close(): Promise<void>;
}

export function createMessageServer(options: MessageServerOptions = {}): MessageServer {
  const logger = options.logger ?? defaultLogger;
  const registry =
    options.registry ??
    new SessionRegistry({
      logger,
      ...(options.maxMessagesPerMinute !== undefined
        ? { maxMessagesPerMinute: options.maxMessagesPerMinute }
        : {}),
    });

  const wss = new WebSocketServer({
    ...(options.server
      ? { server: options.server }
      : options.port !== undefined
        ? { port: options.port }
        : { noServer: true }),
    ...(options.path ? { path: options.path } : {}),
    ...(options.maxPayloadBytes !== undefined ? { maxPayload: options.maxPayloadBytes } : {}),
  });

  async function handleConnection(socket: WebSocket): Promise<Session> {
    const session = registry.onConnect(
      (sessionId) => new Channel(createWsTransport(socket), { logger, label: sessionId }),
    );

    session.onParsed(PING_MESSAGE_TYPE, PingPayloadSchema, (payload) => {
      const nonce = payload?.nonce;
      session.emit(PONG_MESSAGE_TYPE, {
        ...(nonce !== undefined ? { nonce } : {}),
        timestampMs: Date.now(),
      });
    });

    try {
      session.emit(SESSION_MESSAGE_TYPE, session.describe());
    } catch (err) {
      if (!isChannelClosedError(err)) {
        throw err;
      }
      logger.debug('[ws] session closed before handshake', { sessionId: session.id });
      return session;
    }

    if (options.onSession) {
      try {
        await options.onSession(session);
      } catch (err) {
        logger.error('[ws] session setup failed', {
          sessionId: session.id,
          error: describeError(err),
        });
        session.close(INTERNAL_ERROR, 'session setup failed');
      }
    }
    return session;
  }

  wss.on('connection', (socket) => {
    handleConnection(socket).catch((err: unknown) => {
      logger.error('[ws] failed to accept connection', { error: describeError(err) });
      socket.terminate();
    });
  });

  wss.on('error', (err) => {
    logger.error('[ws] server error', { error: err.message });
  });

  return {
    wss,
    registry,
    handleConnection,
    close() {
      registry.closeAll();
      return new Promise<void>((resolve, reject) => {
        wss.close((err) => {
          if (err) {
            reject(err);
            return;
          }
          resolve();
        });
      });
    },
  };
}
