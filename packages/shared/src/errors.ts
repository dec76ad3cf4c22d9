export type ChannelState = 'connecting' | 'open' | 'closing' | 'closed';

export type DecodeErrorCode = 'unsupported_frame' | 'invalid_json' | 'invalid_envelope' | 'missing_type';

export class ChannelClosedError extends Error {
  readonly state: ChannelState;

  constructor(state: ChannelState, message = `Channel is ${state}`) {
    super(message);
    this.name = 'ChannelClosedError';
    this.state = state;
  }
}

export class ProtocolDecodeError extends Error {
  readonly code: DecodeErrorCode;
  readonly raw: string | undefined;

  constructor(code: DecodeErrorCode, message: string, raw?: string) {
    super(message);
    this.name = 'ProtocolDecodeError';
    this.code = code;
    this.raw = raw;
  }
}

export class ProtocolEncodeError extends Error {
  readonly type: string;

  constructor(type: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ProtocolEncodeError';
    this.type = type;
  }
}

/**
 * Raised at the dispatcher boundary when an application callback throws,
 * rejects, or receives a payload its schema rejects.
 */
export class HandlerError extends Error {
  readonly type: string;
  readonly sessionId: string | undefined;

  constructor(
    type: string,
    sessionId: string | undefined,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'HandlerError';
    this.type = type;
    this.sessionId = sessionId;
  }
}

export function isChannelClosedError(err: unknown): err is ChannelClosedError {
  return err instanceof ChannelClosedError;
}

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
