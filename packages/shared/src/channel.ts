import { ChannelClosedError, describeError, type ChannelState } from './errors';
import { defaultLogger, type Logger } from './logger';
import { decodeFrame, encodeMessage, type DecodeResult, type Message } from './protocol';
import {
  ABNORMAL_CLOSURE,
  INTERNAL_ERROR,
  NORMAL_CLOSURE,
  type FrameTransport,
  type TransportCloseEvent,
} from './transport';

export interface ChannelCloseEvent {
  code: number;
  reason: string;
  initiatedBy: 'local' | 'remote' | 'error';
}

export type MessageListener = (message: Message) => void;
export type CloseListener = (event: ChannelCloseEvent) => void;

export interface ChannelOptions {
  logger?: Logger;
  /**
   * Included in log lines; usually the session id.
   */
  label?: string;
}

type ListenerEntry<T> = { callback: T };

/**
 * Channel owns one duplex connection to exactly one peer and moves whole
 * Messages across it.
 *
 * State only moves forward: connecting -> open -> closing -> closed. Once
 * closing, the channel never reopens; a new connection needs a new Channel.
 */
export class Channel {
  readonly label: string | undefined;
  private currentState: ChannelState;
  private closeRequested = false;
  private closeEvent: ChannelCloseEvent | undefined;
  private messageListeners: ListenerEntry<MessageListener>[] = [];
  private closeListeners: ListenerEntry<CloseListener>[] = [];
  private readonly logger: Logger;
  private readonly unsubscribeTransport: () => void;

  constructor(
    private readonly transport: FrameTransport,
    options: ChannelOptions = {},
  ) {
    this.label = options.label;
    this.logger = options.logger ?? defaultLogger;
    this.currentState = transport.isOpen() ? 'open' : 'connecting';
    this.unsubscribeTransport = transport.subscribe({
      open: () => this.handleOpen(),
      frame: (data) => this.handleFrame(data),
      close: (event) => this.handleTransportClose(event),
      error: (err) => this.handleTransportError(err),
    });
  }

  get state(): ChannelState {
    return this.currentState;
  }

  isOpen(): boolean {
    return this.currentState === 'open';
  }

  send(message: Message): void {
    if (this.currentState !== 'open') {
      throw new ChannelClosedError(this.currentState);
    }

    const frame = encodeMessage(message);

    let accepted: boolean;
    try {
      accepted = this.transport.sendText(frame);
    } catch (err) {
      this.handleTransportError(err instanceof Error ? err : new Error(String(err)));
      throw new ChannelClosedError(this.currentState, `Send failed: ${describeError(err)}`);
    }

    if (!accepted) {
      // The socket closed underneath us; its close event finishes the shutdown.
      this.currentState = 'closing';
      throw new ChannelClosedError(this.currentState, 'Connection no longer accepts frames');
    }
  }

  onMessage(callback: MessageListener): () => void {
    const entry: ListenerEntry<MessageListener> = { callback };
    this.messageListeners.push(entry);
    return () => {
      this.messageListeners = this.messageListeners.filter((candidate) => candidate !== entry);
    };
  }

  onClose(callback: CloseListener): () => void {
    const closed = this.closeEvent;
    if (closed) {
      queueMicrotask(() => this.invokeCloseListener(callback, closed));
      return () => undefined;
    }
    const entry: ListenerEntry<CloseListener> = { callback };
    this.closeListeners.push(entry);
    return () => {
      this.closeListeners = this.closeListeners.filter((candidate) => candidate !== entry);
    };
  }

  close(code = NORMAL_CLOSURE, reason = 'closed'): void {
    if (this.currentState === 'closing' || this.currentState === 'closed') {
      return;
    }
    this.closeRequested = true;
    this.currentState = 'closing';
    try {
      this.transport.close(code, reason);
    } catch (err) {
      this.handleTransportError(err instanceof Error ? err : new Error(String(err)));
    }
  }

  private handleOpen(): void {
    if (this.currentState !== 'connecting') {
      return;
    }
    this.currentState = 'open';
    this.logger.debug('[channel] open', { label: this.label });
  }

  private handleFrame(data: unknown): void {
    if (this.currentState !== 'open') {
      this.logger.debug('[channel] ignoring frame outside open state', {
        label: this.label,
        state: this.currentState,
      });
      return;
    }

    let result: DecodeResult;
    try {
      result = decodeFrame(data);
    } catch (err) {
      this.logger.warn('[channel] dropping undecodable frame', {
        label: this.label,
        error: describeError(err),
      });
      return;
    }
    if (!result.ok) {
      this.logger.warn('[channel] dropping malformed frame', {
        label: this.label,
        code: result.code,
        error: result.error,
      });
      return;
    }

    for (const entry of [...this.messageListeners]) {
      try {
        entry.callback(result.message);
      } catch (err) {
        this.logger.error('[channel] message listener failed', {
          label: this.label,
          type: result.message.type,
          error: describeError(err),
        });
      }
    }
  }

  private handleTransportClose(event: TransportCloseEvent): void {
    this.finish({
      code: event.code,
      reason: event.reason,
      initiatedBy: this.closeRequested ? 'local' : 'remote',
    });
  }

  private handleTransportError(err: Error): void {
    if (this.currentState === 'closed') {
      return;
    }
    this.logger.error('[channel] transport failure', { label: this.label, error: err.message });
    this.finish({ code: ABNORMAL_CLOSURE, reason: err.message, initiatedBy: 'error' });
    try {
      this.transport.close(INTERNAL_ERROR, 'transport error');
    } catch (closeErr) {
      this.logger.debug('[channel] transport close after failure threw', {
        label: this.label,
        error: describeError(closeErr),
      });
    }
  }

  private finish(event: ChannelCloseEvent): void {
    if (this.closeEvent) {
      return;
    }
    this.currentState = 'closed';
    this.closeEvent = event;
    this.unsubscribeTransport();
    this.messageListeners = [];

    const listeners = this.closeListeners;
    this.closeListeners = [];
    for (const entry of listeners) {
      this.invokeCloseListener(entry.callback, event);
    }
  }

  private invokeCloseListener(callback: CloseListener, event: ChannelCloseEvent): void {
    try {
      callback(event);
    } catch (err) {
      this.logger.error('[channel] close listener failed', {
        label: this.label,
        error: describeError(err),
      });
    }
  }
}
