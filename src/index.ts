#!/usr/bin/env node

/**
 * Entity research engine - MCP server entry point
 */

import { getConfig, printConfigInfo } from './config.js';
import { ConfigError, describeError } from './core/errors.js';
import { McpServer } from './presentation/McpServer.js';
import { setLogLevel } from './utils/logger.js';

async function main() {
  let mcpServer: McpServer | null = null;

  try {
    const config = getConfig();
    setLogLevel(config.server.logLevel);
    printConfigInfo(config);

    mcpServer = new McpServer(config);
    await mcpServer.start();
    mcpServer.printStats();
  } catch (error) {
    console.error(error instanceof ConfigError ? error.message : `Fatal error in main(): ${describeError(error)}`);
    process.exit(1);
  }

  if (!mcpServer) return;
  const server = mcpServer;
  const shutdown = async (signal: string) => {
    console.error(`Received ${signal}, shutting down gracefully...`);
    try {
      await server.shutdown();
      process.exit(0);
    } catch (error) {
      console.error(`Shutdown failed: ${describeError(error)}`);
      process.exit(1);
    }
  };

  process.on('SIGINT', () => void shutdown('SIGINT'));
  process.on('SIGTERM', () => void shutdown('SIGTERM'));

  process.on('uncaughtException', (error) => {
    console.error('Uncaught Exception:', error);
    void shutdown('UNCAUGHT_EXCEPTION');
  });

  process.on('unhandledRejection', (reason) => {
    console.error('Unhandled Rejection:', reason);
    void shutdown('UNHANDLED_REJECTION');
  });
}

void main();
