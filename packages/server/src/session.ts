import type { z } from 'zod';

import {
  Dispatcher,
  ERROR_MESSAGE_TYPE,
  NORMAL_CLOSURE,
  defaultLogger,
  isChannelClosedError,
  type Channel,
  type ChannelState,
  type CloseListener,
  type HandlerCallback,
  type HandlerError,
  type HandlerHandle,
  type JsonValue,
  type Logger,
  type Message,
  type SessionPayload,
} from '@duplex-hub/shared';

import type { RateLimiter } from './rateLimit';

export interface SessionOptions {
  id: string;
  channel: Channel;
  createdAt?: Date;
  logger?: Logger;
  rateLimiter?: RateLimiter;
  onHandlerError?: (error: HandlerError) => void;
}

/**
 * One connected peer: the Channel it talks over and the Dispatcher that
 * routes its inbound messages. Inbound messages are dispatched one at a
 * time, in arrival order.
 */
export class Session {
  readonly id: string;
  readonly createdAt: Date;
  readonly channel: Channel;
  readonly dispatcher: Dispatcher;
  private readonly logger: Logger;
  private readonly rateLimiter: RateLimiter | undefined;

  constructor(options: SessionOptions) {
    this.id = options.id;
    this.createdAt = options.createdAt ?? new Date();
    this.channel = options.channel;
    this.logger = options.logger ?? defaultLogger;
    this.rateLimiter = options.rateLimiter;
    this.dispatcher = new Dispatcher({
      send: (message) => this.channel.send(message),
      sessionId: this.id,
      logger: this.logger,
      ...(options.onHandlerError ? { onHandlerError: options.onHandlerError } : {}),
    });

    this.channel.onMessage((message) => this.accept(message));
  }

  get state(): ChannelState {
    return this.channel.state;
  }

  isOpen(): boolean {
    return this.channel.isOpen();
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

  emit(type: string, payload: JsonValue = null): void {
    this.dispatcher.emit(type, payload);
  }

  onClose(callback: CloseListener): () => void {
    return this.channel.onClose(callback);
  }

  close(code = NORMAL_CLOSURE, reason = 'session closed'): void {
    this.channel.close(code, reason);
  }

  whenIdle(): Promise<void> {
    return this.dispatcher.whenIdle();
  }

  describe(): SessionPayload {
    return { id: this.id, createdAt: this.createdAt.toISOString() };
  }

  private accept(message: Message): void {
    if (this.rateLimiter) {
      const result = this.rateLimiter.check();
      if (!result.allowed) {
        this.logger.warn('[session] rate limit exceeded, dropping message', {
          sessionId: this.id,
          type: message.type,
          retryAfterMs: result.retryAfterMs,
        });
        this.notifyRateLimited(result.retryAfterMs);
        return;
      }
    }
    this.dispatcher.enqueue(message);
  }

  private notifyRateLimited(retryAfterMs: number | undefined): void {
    try {
      this.emit(ERROR_MESSAGE_TYPE, {
        code: 'rate_limited',
        message: 'Too many messages in a short period; please wait before sending more.',
        ...(retryAfterMs !== undefined ? { retryAfterMs } : {}),
      });
    } catch (err) {
      if (!isChannelClosedError(err)) {
        throw err;
      }
      this.logger.debug('[session] channel closed before rate limit notice', { sessionId: this.id });
    }
  }
}
