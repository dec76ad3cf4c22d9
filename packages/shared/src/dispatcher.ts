import type { z } from 'zod';

import { ChannelClosedError, HandlerError, describeError } from './errors';
import { defaultLogger, type Logger } from './logger';
import type { JsonValue, Message } from './protocol';

export type HandlerCallback = (payload: JsonValue, message: Message) => void | Promise<void>;

export type MessageSender = (message: Message) => void;

export interface HandlerHandle {
  readonly id: number;
  readonly type: string;
}

export interface DispatchResult {
  handled: number;
  failed: HandlerError[];
}

export interface DispatcherOptions {
  /**
   * Outbound path used by `emit`, normally the bound Channel's `send`.
   */
  send?: MessageSender;
  sessionId?: string;
  logger?: Logger;
  onHandlerError?: (error: HandlerError) => void;
}

type Registration = {
  handle: HandlerHandle;
  callback: HandlerCallback;
  active: boolean;
};

/**
 * Routes inbound messages to the handlers registered for their type and
 * emits outbound messages through the bound sender.
 *
 * Handlers run in registration order. Registering the same callback twice
 * means it runs twice per message. A failing handler is reported and the
 * remaining handlers still run.
 */
export class Dispatcher {
  private readonly registrations = new Map<string, Registration[]>();
  private readonly logger: Logger;
  private nextId = 1;
  private disposed = false;
  private queue: Promise<void> = Promise.resolve();

  constructor(private readonly options: DispatcherOptions = {}) {
    this.logger = options.logger ?? defaultLogger;
  }

  get sessionId(): string | undefined {
    return this.options.sessionId;
  }

  get isDisposed(): boolean {
    return this.disposed;
  }

  on(type: string, callback: HandlerCallback): HandlerHandle {
    if (typeof type !== 'string' || type.length === 0) {
      throw new TypeError('Message type must be a non-empty string');
    }

    const handle: HandlerHandle = { id: this.nextId++, type };
    if (this.disposed) {
      this.logger.debug('[dispatcher] ignoring registration on disposed dispatcher', {
        sessionId: this.options.sessionId,
        type,
      });
      return handle;
    }

    let list = this.registrations.get(type);
    if (!list) {
      list = [];
      this.registrations.set(type, list);
    }
    list.push({ handle, callback, active: true });
    return handle;
  }

  /**
   * Registers a handler whose payload is validated first. A payload the schema
   * rejects is reported as a HandlerError and the callback is not called.
   */
  onParsed<T>(
    type: string,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    callback: (payload: T, message: Message) => void | Promise<void>,
  ): HandlerHandle {
    return this.on(type, (payload, message) => {
      const result = schema.safeParse(payload);
      if (!result.success) {
        const issues = result.error.issues.map((issue) => issue.message).join('; ');
        throw new HandlerError(
          type,
          this.options.sessionId,
          `Payload for "${type}" failed validation: ${issues}`,
          { cause: result.error },
        );
      }
      return callback(result.data, message);
    });
  }

  off(handle: HandlerHandle): void {
    const list = this.registrations.get(handle.type);
    if (!list) {
      return;
    }
    const index = list.findIndex((registration) => registration.handle === handle);
    if (index === -1) {
      return;
    }
    const [removed] = list.splice(index, 1);
    if (removed) {
      removed.active = false;
    }
    if (list.length === 0) {
      this.registrations.delete(handle.type);
    }
  }

  listenerCount(type?: string): number {
    if (type !== undefined) {
      return this.registrations.get(type)?.length ?? 0;
    }
    let total = 0;
    for (const list of this.registrations.values()) {
      total += list.length;
    }
    return total;
  }

  async dispatch(message: Message): Promise<DispatchResult> {
    const list = this.registrations.get(message.type);
    if (!list || list.length === 0) {
      this.logger.debug('[dispatcher] no handler for message type', {
        sessionId: this.options.sessionId,
        type: message.type,
      });
      return { handled: 0, failed: [] };
    }

    const failed: HandlerError[] = [];
    let handled = 0;
    for (const registration of [...list]) {
      // Skips handlers removed by an earlier handler or by dispose().
      if (!registration.active) {
        continue;
      }
      try {
        await registration.callback(message.payload, message);
        handled += 1;
      } catch (err) {
        const error =
          err instanceof HandlerError
            ? err
            : new HandlerError(
                message.type,
                this.options.sessionId,
                `Handler for "${message.type}" failed: ${describeError(err)}`,
                { cause: err },
              );
        failed.push(error);
        this.reportHandlerError(error);
      }
    }
    return { handled, failed };
  }

  /**
   * Queues a message behind the ones already accepted so each message's
   * handlers finish before the next message is dispatched.
   */
  enqueue(message: Message): void {
    this.queue = this.queue
      .then(() => this.dispatch(message))
      .then(
        () => undefined,
        (err: unknown) => {
          this.logger.error('[dispatcher] dispatch queue failure', {
            sessionId: this.options.sessionId,
            type: message.type,
            error: describeError(err),
          });
        },
      );
  }

  whenIdle(): Promise<void> {
    return this.queue;
  }

  emit(type: string, payload: JsonValue = null): void {
    const send = this.options.send;
    if (!send) {
      throw new ChannelClosedError('closed', 'Dispatcher has no channel to send through');
    }
    send({ type, payload });
  }

  dispose(): void {
    if (this.disposed) {
      return;
    }
    this.disposed = true;
    for (const list of this.registrations.values()) {
      for (const registration of list) {
        registration.active = false;
      }
    }
    this.registrations.clear();
    this.logger.debug('[dispatcher] disposed', { sessionId: this.options.sessionId });
  }

  private reportHandlerError(error: HandlerError): void {
    this.logger.error('[dispatcher] handler failed', {
      sessionId: error.sessionId,
      type: error.type,
      error: error.message,
    });
    const hook = this.options.onHandlerError;
    if (!hook) {
      return;
    }
    try {
      hook(error);
    } catch (hookErr) {
      this.logger.error('[dispatcher] onHandlerError hook failed', {
        sessionId: error.sessionId,
        error: describeError(hookErr),
      });
    }
  }
}
