import { isLogLevel, type LogLevel } from '@duplex-hub/shared';

export interface EnvConfig {
  port: number;
  /**
   * HTTP path that accepts WebSocket upgrades.
   */
  wsPath: string;
  logLevel: LogLevel;
  /**
   * Largest inbound frame accepted by the socket layer, in bytes.
   */
  maxPayloadBytes: number;
  /**
   * Per-session inbound limit over a sliding one-minute window.
   * Zero disables the limit.
   */
  maxMessagesPerMinute: number;
}

const DEFAULT_PORT = 3000;
const DEFAULT_WS_PATH = '/ws';
const DEFAULT_MAX_PAYLOAD_BYTES = 1024 * 1024;
const DEFAULT_MAX_MESSAGES_PER_MINUTE = 600;

export function loadEnvConfig(env: NodeJS.ProcessEnv = process.env): EnvConfig {
  const port = parseInteger(env['PORT'], DEFAULT_PORT, 1);

  const wsPathEnv = env['WS_PATH']?.trim();
  const wsPath = wsPathEnv && wsPathEnv.startsWith('/') ? wsPathEnv : DEFAULT_WS_PATH;

  const logLevelEnv = env['LOG_LEVEL']?.trim().toLowerCase();
  const logLevel: LogLevel = isLogLevel(logLevelEnv) ? logLevelEnv : 'info';

  const maxPayloadBytes = parseInteger(env['MAX_PAYLOAD_BYTES'], DEFAULT_MAX_PAYLOAD_BYTES, 1);
  const maxMessagesPerMinute = parseInteger(
    env['MAX_MESSAGES_PER_MINUTE'],
    DEFAULT_MAX_MESSAGES_PER_MINUTE,
    0,
  );

  return { port, wsPath, logLevel, maxPayloadBytes, maxMessagesPerMinute };
}

function parseInteger(value: string | undefined, fallback: number, min: number): number {
  if (value === undefined || value.trim() === '') {
    return fallback;
  }
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < min) {
    return fallback;
  }
  return parsed;
}
