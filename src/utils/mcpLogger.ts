import type { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { log } from './logger.js';

type McpLogLevel = 'debug' | 'info' | 'warning';

let connectedServer: Server | undefined;

/**
 * Route mcpLogger messages to the client of a connected server
 */
export function attachLogServer(server: Server): void {
  connectedServer = server;
}

export function detachLogServer(): void {
  connectedServer = undefined;
}

/**
 * MCP logging via server.sendLoggingMessage(). Without a connected server
 * (CLI, tests, startup) messages go to the stderr logger instead.
 */
function sendLog(level: McpLogLevel, logger: string, data: unknown): void {
  const server = connectedServer;
  const text = () => `[${logger}] ${typeof data === 'string' ? data : JSON.stringify(data)}`;
  if (!server) {
    log[level === 'warning' ? 'warn' : level](text());
    return;
  }

  server.sendLoggingMessage({ level, logger, data }).catch((error: unknown) => {
    // Client may have disconnected; keep the message on stderr
    log.warn(text(), error);
  });
}

export const mcpLogger = {
  debug(logger: string, data: unknown): void {
    sendLog('debug', logger, data);
  },

  info(logger: string, data: unknown): void {
    sendLog('info', logger, data);
  },

  warning(logger: string, data: unknown): void {
    sendLog('warning', logger, data);
  }
};
