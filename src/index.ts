#!/usr/bin/env node

import path from 'path';
import { MirrorServer } from './server/mcpServer.js';
import { MirrorConfigManager } from './config/mirrorConfig.js';
import { log } from './utils/logger.js';
import { isEntryPoint } from './utils/entryPoint.js';

/**
 * Parse command line arguments
 */
export function parseArgs(args: string[]): { configPath?: string } {
  const result: { configPath?: string } = {};

  for (let i = 0; i < args.length; i++) {
    if (args[i] === '--config' || args[i] === '-c') {
      if (i + 1 < args.length) {
        result.configPath = args[i + 1];
        i++;
      } else {
        throw new Error('--config requires a file path');
      }
    }
  }

  return result;
}

/**
 * Main entry point for the branch-mirror MCP server
 */
async function main(): Promise<void> {
  const { configPath } = parseArgs(process.argv.slice(2));

  const absoluteConfigPath = path.resolve(configPath || MirrorConfigManager.CONFIG_FILE);
  log.info(`Using config file: ${absoluteConfigPath}`);
  await MirrorConfigManager.initialize(absoluteConfigPath);

  const server = new MirrorServer();

  const signalHandlers = new Map<NodeJS.Signals, () => void>();

  const shutdown = async (signal: string): Promise<void> => {
    log.info(`Received ${signal}, shutting down gracefully...`);

    for (const [eventName, handler] of signalHandlers) {
      process.removeListener(eventName, handler);
    }
    signalHandlers.clear();

    try {
      await server.stop();
      process.exit(0);
    } catch (error) {
      log.error('Error during shutdown:', error);
      process.exit(1);
    }
  };

  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    const handler = () => {
      void shutdown(signal);
    };
    signalHandlers.set(signal, handler);
    process.on(signal, handler);
  }

  process.on('unhandledRejection', (reason: unknown) => {
    log.error('Unhandled Rejection:', reason);
    void shutdown('unhandledRejection');
  });

  await server.start();
}

// Only run if this file is executed directly
if (isEntryPoint(import.meta.url)) {
  main().catch((error: unknown) => {
    log.error('Fatal error:', error);
    process.exit(1);
  });
}
