import http from 'node:http';

import { createLogger } from '@duplex-hub/shared';

import { registerDemoHandlers } from './demoHandlers';
import { loadEnvConfig, type EnvConfig } from './envConfig';
import { createMessageServer, type MessageServer } from './messageServer';

export { createMessageServer, type MessageServer, type MessageServerOptions } from './messageServer';
export { SessionRegistry, type ChannelFactory, type SessionRegistryOptions } from './sessionRegistry';
export { Session, type SessionOptions } from './session';
export { RateLimiter, type RateLimitCheckResult, type RateLimiterOptions } from './rateLimit';
export { createWsTransport } from './wsTransport';
export { loadEnvConfig, type EnvConfig } from './envConfig';
export { registerDemoHandlers } from './demoHandlers';

export interface RunningServer {
  config: EnvConfig;
  httpServer: http.Server;
  messageServer: MessageServer;
  shutdown(): Promise<void>;
}

export async function runServer(config: EnvConfig = loadEnvConfig()): Promise<RunningServer> {
  const logger = createLogger({ level: config.logLevel });

  const httpServer = http.createServer((req, res) => {
    if (req.method === 'GET' && req.url === '/healthz') {
      res.writeHead(200, { 'Content-Type': 'application/json' });
      res.end(JSON.stringify({ ok: true, sessions: messageServer.registry.size }));
      return;
    }
    res.writeHead(404, { 'Content-Type': 'text/plain' });
    res.end('Not found');
  });

  const messageServer = createMessageServer({
    server: httpServer,
    path: config.wsPath,
    maxPayloadBytes: config.maxPayloadBytes,
    maxMessagesPerMinute: config.maxMessagesPerMinute,
    logger,
    onSession: registerDemoHandlers,
  });

  await new Promise<void>((resolve) => {
    httpServer.listen(config.port, '0.0.0.0', resolve);
  });
  logger.info(`Message server listening on http://0.0.0.0:${config.port} (WS path: ${config.wsPath})`);

  let stopping: Promise<void> | undefined;
  const shutdown = (): Promise<void> => {
    if (!stopping) {
      logger.info('[shutdown] Closing sessions...');
      stopping = messageServer.close().then(
        () =>
          new Promise<void>((resolve, reject) => {
            httpServer.close((err) => (err ? reject(err) : resolve()));
          }),
      );
    }
    return stopping;
  };

  return { config, httpServer, messageServer, shutdown };
}
