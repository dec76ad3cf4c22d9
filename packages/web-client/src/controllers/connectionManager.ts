import type { z } from 'zod';

import {
  Channel,
  ChannelClosedError,
  Dispatcher,
  NORMAL_CLOSURE,
  SESSION_MESSAGE_TYPE,
  SessionPayloadSchema,
  defaultLogger,
  type ChannelCloseEvent,
  type HandlerCallback,
  type HandlerError,
  type HandlerHandle,
  type JsonValue,
  type Logger,
  type Message,
} from '@duplex-hub/shared';

import { createBrowserSocketTransport } from '../utils/browserSocketTransport';

export type ConnectionStatus = 'idle' | 'connecting' | 'connected' | 'reconnecting' | 'disconnected';

export interface ConnectionManagerOptions {
  createWebSocketUrl: () => string;
  createSocket?: (url: string) => WebSocket;
  setStatus?: (status: ConnectionStatus) => void;
  logger?: Logger;
  reconnectDelayMs?: number;
  maxReconnectDelayMs?: number;
  onHandlerError?: (error: HandlerError) => void;
}

const DEFAULT_RECONNECT_DELAY_MS = 1000;
const DEFAULT_MAX_RECONNECT_DELAY_MS = 30_000;

/**
 * Browser side of the message channel. Handlers are registered once and
 * survive reconnects; every connection gets a fresh Channel and, from the
 * server's point of view, a fresh session.
 */
export class ConnectionManager {
  private readonly dispatcher: Dispatcher;
  private readonly logger: Logger;
  private channel: Channel | undefined;
  private currentStatus: ConnectionStatus = 'idle';
  private currentSessionId: string | undefined;
  private reconnectAttempts = 0;
  private reconnectTimeoutId: ReturnType<typeof setTimeout> | null = null;
  private intentionalClose = false;

  constructor(private readonly options: ConnectionManagerOptions) {
    this.logger = options.logger ?? defaultLogger;
    this.dispatcher = new Dispatcher({
      send: (message) => this.requireChannel().send(message),
      logger: this.logger,
      ...(options.onHandlerError ? { onHandlerError: options.onHandlerError } : {}),
    });

    this.dispatcher.onParsed(SESSION_MESSAGE_TYPE, SessionPayloadSchema, (session) => {
      this.currentSessionId = session.id;
      this.reconnectAttempts = 0;
      this.setStatus('connected');
    });
  }

  get status(): ConnectionStatus {
    return this.currentStatus;
  }

  get sessionId(): string | undefined {
    return this.currentSessionId;
  }

  isConnected(): boolean {
    return this.channel?.isOpen() ?? false;
  }

  connect(): void {
    if (this.reconnectTimeoutId !== null) {
      clearTimeout(this.reconnectTimeoutId);
      this.reconnectTimeoutId = null;
    }

    const existing = this.channel;
    if (existing && (existing.state === 'open' || existing.state === 'connecting')) {
      this.logger.debug('[client] connect: channel already active', { state: existing.state });
      return;
    }

    this.intentionalClose = false;
    this.setStatus('connecting');

    const createSocket = this.options.createSocket ?? ((url: string) => new WebSocket(url));
    const socket = createSocket(this.options.createWebSocketUrl());
    const channel = new Channel(createBrowserSocketTransport(socket), {
      logger: this.logger,
      label: 'client',
    });
    this.channel = channel;

    channel.onMessage((message) => {
      if (this.channel !== channel) {
        return;
      }
      this.dispatcher.enqueue(message);
    });
    channel.onClose((event) => this.handleClose(channel, event));
  }

  disconnect(code = NORMAL_CLOSURE, reason = 'client disconnect'): void {
    this.intentionalClose = true;
    if (this.reconnectTimeoutId !== null) {
      clearTimeout(this.reconnectTimeoutId);
      this.reconnectTimeoutId = null;
    }
    const channel = this.channel;
    if (!channel) {
      this.setStatus('disconnected');
      return;
    }
    channel.close(code, reason);
  }

  on(type: string, callback: HandlerCallback): HandlerHandle {
    return this.dispatcher.on(type, callback);
  }

  onParsed<T>(
    type: string,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    callback: (payload: T, message: Message) => void | Promise<void>,
  ): HandlerHandle {
    return this.dispatcher.onParsed(type, schema, callback);
  }

  off(handle: HandlerHandle): void {
    this.dispatcher.off(handle);
  }

  /**
   * Sends a message to the server. Throws ChannelClosedError while no
   * connection is open.
   */
  emit(type: string, payload: JsonValue = null): void {
    this.dispatcher.emit(type, payload);
  }

  whenIdle(): Promise<void> {
    return this.dispatcher.whenIdle();
  }

  private requireChannel(): Channel {
    if (!this.channel) {
      throw new ChannelClosedError('closed', 'Not connected');
    }
    return this.channel;
  }

  private handleClose(channel: Channel, event: ChannelCloseEvent): void {
    if (this.channel !== channel) {
      return;
    }
    this.channel = undefined;
    this.currentSessionId = undefined;
    this.logger.info('[client] connection closed', {
      code: event.code,
      reason: event.reason,
      initiatedBy: event.initiatedBy,
    });

    if (this.intentionalClose) {
      this.setStatus('disconnected');
      return;
    }
    this.scheduleReconnect();
  }

  private scheduleReconnect(): void {
    if (this.reconnectTimeoutId !== null) {
      return;
    }

    const baseDelay = this.options.reconnectDelayMs ?? DEFAULT_RECONNECT_DELAY_MS;
    const maxDelay = this.options.maxReconnectDelayMs ?? DEFAULT_MAX_RECONNECT_DELAY_MS;
    const delay = Math.min(baseDelay * Math.pow(2, this.reconnectAttempts), maxDelay);
    this.reconnectAttempts += 1;

    this.setStatus('reconnecting');
    this.logger.info(`[client] reconnecting in ${delay}ms`, { attempt: this.reconnectAttempts });

    this.reconnectTimeoutId = setTimeout(() => {
      this.reconnectTimeoutId = null;
      this.connect();
    }, delay);
  }

  private setStatus(status: ConnectionStatus): void {
    if (this.currentStatus === status) {
      return;
    }
    this.currentStatus = status;
    this.options.setStatus?.(status);
  }
}
