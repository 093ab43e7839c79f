#!/usr/bin/env node

/**
 * Room chat server - entry point
 */

import { getConfig, printConfigInfo } from './config.js';
import { ChatServer } from './presentation/ChatServer.js';
import { errorMessage } from './core/errors.js';

async function main(): Promise<void> {
  const config = getConfig();
  printConfigInfo(config);

  const server = new ChatServer(config);
  let stopping = false;

  const shutdown = async (signal: string): Promise<void> => {
    if (stopping) return;
    stopping = true;
    console.error(`\n[Main] Received ${signal}, shutting down gracefully...`);
    try {
      await server.shutdown();
      process.exit(0);
    } catch (error) {
      console.error(`[Main] Shutdown failed: ${errorMessage(error)}`);
      process.exit(1);
    }
  };

  process.on('SIGINT', () => void shutdown('SIGINT'));
  process.on('SIGTERM', () => void shutdown('SIGTERM'));
  process.on('unhandledRejection', (reason) => {
    console.error('[Main] Unhandled rejection:', reason);
    void shutdown('UNHANDLED_REJECTION');
  });

  try {
    await server.start();
    server.printStats();
  } catch (error) {
    console.error(`[Main] Fatal error during startup: ${errorMessage(error)}`);
    await server.shutdown();
    process.exit(1);
  }
}

void main();
