#!/usr/bin/env node
import dotenv from 'dotenv';

import { runServer } from './index';

async function main(): Promise<void> {
  dotenv.config();
  const running = await runServer();

  const stop = (signal: string): void => {
    console.log(`[shutdown] ${signal} received`);
    running.shutdown().then(
      () => process.exit(0),
      (err: unknown) => {
        console.error('[shutdown] Failed to stop cleanly:', err);
        process.exit(1);
      },
    );
  };

  process.once('SIGINT', () => stop('SIGINT'));
  process.once('SIGTERM', () => stop('SIGTERM'));
}

main().catch((err: unknown) => {
  console.error('Failed to start message server:', err);
  process.exit(1);
});
