import { randomUUID } from 'node:crypto';

import {
  GOING_AWAY,
  defaultLogger,
  encodeMessage,
  isChannelClosedError,
  type Channel,
  type ChannelCloseEvent,
  type HandlerError,
  type JsonValue,
  type Logger,
} from '@duplex-hub/shared';

import { RateLimiter } from './rateLimit';
import { Session } from './session';

export type ChannelFactory = (sessionId: string) => Channel;

export interface SessionRegistryOptions {
  logger?: Logger;
  createId?: () => string;
  /**
   * Inbound messages allowed per session per minute. Zero or less disables the limit.
   */
  maxMessagesPerMinute?: number;
  onHandlerError?: (error: HandlerError) => void;
}

const RATE_LIMIT_WINDOW_MS = 60_000;
const MAX_ID_ATTEMPTS = 5;

/**
 * Process-wide directory of live sessions. A session is added when its
 * connection is accepted and removed, with its handlers cleared, as soon as
 * its channel reports closure.
 */
export class SessionRegistry {
  private readonly sessions = new Map<string, Session>();
  private readonly logger: Logger;
  private readonly createId: () => string;

  constructor(private readonly options: SessionRegistryOptions = {}) {
    this.logger = options.logger ?? defaultLogger;
    this.createId = options.createId ?? randomUUID;
  }

  get size(): number {
    return this.sessions.size;
  }

  onConnect(channelFactory: ChannelFactory): Session {
    const id = this.nextId();
    const channel = channelFactory(id);
    const maxMessagesPerMinute = this.options.maxMessagesPerMinute ?? 0;
    const session = new Session({
      id,
      channel,
      logger: this.logger,
      ...(maxMessagesPerMinute > 0
        ? {
            rateLimiter: new RateLimiter({
              maxEvents: maxMessagesPerMinute,
              windowMs: RATE_LIMIT_WINDOW_MS,
            }),
          }
        : {}),
      ...(this.options.onHandlerError ? { onHandlerError: this.options.onHandlerError } : {}),
    });

    this.sessions.set(id, session);
    // Registered before application code sees the session, so removal runs first.
    channel.onClose((event) => this.release(session, event));

    this.logger.info('[sessions] connected', { sessionId: id, active: this.sessions.size });
    return session;
  }

  get(sessionId: string): Session | undefined {
    return this.sessions.get(sessionId);
  }

  has(sessionId: string): boolean {
    return this.sessions.has(sessionId);
  }

  list(): Session[] {
    return Array.from(this.sessions.values());
  }

  /**
   * Sends one message to every open session and returns how many accepted it.
   * Sessions that close while the broadcast runs are skipped.
   */
  broadcast(type: string, payload: JsonValue = null): number {
    // Fails once for an unencodable message instead of once per session.
    encodeMessage({ type, payload });

    let delivered = 0;
    for (const session of this.list()) {
      if (!session.isOpen()) {
        continue;
      }
      try {
        session.emit(type, payload);
        delivered += 1;
      } catch (err) {
        if (!isChannelClosedError(err)) {
          throw err;
        }
        this.logger.debug('[sessions] broadcast skipped closed session', {
          sessionId: session.id,
          type,
        });
      }
    }
    return delivered;
  }

  closeAll(code = GOING_AWAY, reason = 'server shutting down'): void {
    for (const session of this.list()) {
      session.close(code, reason);
    }
  }

  private release(session: Session, event: ChannelCloseEvent): void {
    if (this.sessions.get(session.id) === session) {
      this.sessions.delete(session.id);
    }
    session.dispatcher.dispose();
    this.logger.info('[sessions] disconnected', {
      sessionId: session.id,
      code: event.code,
      reason: event.reason,
      initiatedBy: event.initiatedBy,
      active: this.sessions.size,
    });
  }

  private nextId(): string {
    for (let attempt = 0; attempt < MAX_ID_ATTEMPTS; attempt += 1) {
      const id = this.createId();
      if (id && !this.sessions.has(id)) {
        return id;
      }
    }
    throw new Error('Unable to allocate a unique session id');
  }
}
