import type { FrameTransport, FrameTransportListener, TransportCloseEvent } from './transport';

type MemoryTransportState = 'connecting' | 'open' | 'closing' | 'closed';

/**
 * One end of an in-process duplex link. Frames and close notifications are
 * delivered on a later microtask, in the order they were sent.
 */
export class MemoryTransport implements FrameTransport {
  /**
   * Frames this end accepted for delivery. Only filled when the transport was
   * created with `recordSent`, for tests that inspect the wire.
   */
  readonly sent: string[] = [];
  private state: MemoryTransportState;
  private peer: MemoryTransport | undefined;
  private readonly listeners = new Set<FrameTransportListener>();

  constructor(
    open: boolean,
    private readonly recordSent = false,
  ) {
    this.state = open ? 'open' : 'connecting';
  }

  link(peer: MemoryTransport): void {
    this.peer = peer;
  }

  isOpen(): boolean {
    return this.state === 'open';
  }

  sendText(frame: string): boolean {
    const peer = this.peer;
    if (this.state !== 'open' || !peer) {
      return false;
    }
    if (this.recordSent) {
      this.sent.push(frame);
    }
    queueMicrotask(() => peer.receive(frame));
    return true;
  }

  close(code: number, reason: string): void {
    if (this.state === 'closing' || this.state === 'closed') {
      return;
    }
    this.state = 'closing';
    const peer = this.peer;
    queueMicrotask(() => {
      peer?.finishClose({ code, reason });
      this.finishClose({ code, reason });
    });
  }

  subscribe(listener: FrameTransportListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /**
   * Moves a pair created with `open: false` into the open state.
   */
  markOpen(): void {
    if (this.state !== 'connecting') {
      return;
    }
    this.state = 'open';
    for (const listener of [...this.listeners]) {
      listener.open();
    }
  }

  /**
   * Simulates a socket-level failure on this end.
   */
  fail(err: Error): void {
    if (this.state === 'closed') {
      return;
    }
    for (const listener of [...this.listeners]) {
      listener.error(err);
    }
  }

  private receive(frame: string): void {
    if (this.state === 'closed') {
      return;
    }
    for (const listener of [...this.listeners]) {
      listener.frame(frame);
    }
  }

  private finishClose(event: TransportCloseEvent): void {
    if (this.state === 'closed') {
      return;
    }
    this.state = 'closed';
    for (const listener of [...this.listeners]) {
      listener.close(event);
    }
  }
}

export interface MemoryTransportPair {
  server: MemoryTransport;
  client: MemoryTransport;
}

export interface MemoryTransportPairOptions {
  open?: boolean;
  recordSent?: boolean;
}

export function createMemoryTransportPair(options: MemoryTransportPairOptions = {}): MemoryTransportPair {
  const open = options.open ?? true;
  const recordSent = options.recordSent ?? false;
  const server = new MemoryTransport(open, recordSent);
  const client = new MemoryTransport(open, recordSent);
  server.link(client);
  client.link(server);
  return { server, client };
}
