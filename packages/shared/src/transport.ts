export interface TransportCloseEvent {
  code: number;
  reason: string;
}

export interface FrameTransportListener {
  open(): void;
  /**
   * Raw frame data, usually a `RawFrame`; the protocol decoder rejects anything else.
   */
  frame(data: unknown): void;
  close(event: TransportCloseEvent): void;
  error(err: Error): void;
}

/**
 * The surface a Channel needs from one physical duplex connection. Adapters
 * exist for `ws` sockets (server), DOM WebSockets (browser) and an in-memory
 * pair (tests and in-process peers).
 */
export interface FrameTransport {
  isOpen(): boolean;
  /**
   * Writes one text frame. Returns false when the connection no longer
   * accepts frames; nothing is transmitted in that case.
   */
  sendText(frame: string): boolean;
  close(code: number, reason: string): void;
  subscribe(listener: FrameTransportListener): () => void;
}

export const NORMAL_CLOSURE = 1000;
export const GOING_AWAY = 1001;
export const ABNORMAL_CLOSURE = 1006;
export const INTERNAL_ERROR = 1011;
