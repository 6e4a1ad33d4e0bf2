#!/usr/bin/env node

/**
 * Research Job Server - Entry Point
 */

import { ConfigError, getConfig, printConfigInfo } from './config.js';
import { McpServer } from './presentation/McpServer.js';

async function main() {
  let server: McpServer | null = null;

  try {
    // Load configuration
    const config = getConfig();

    // Print configuration info
    printConfigInfo(config);

    server = new McpServer(config);
    await server.start();

    // Print statistics
    server.printStats();

    let shuttingDown = false;
    const shutdown = async (signal: string, exitCode: number = 0) => {
      if (shuttingDown) return;
      shuttingDown = true;
      console.error(`\n\n📛 Received ${signal}, shutting down gracefully...`);

      try {
        await server?.shutdown();
      } catch (error) {
        console.error('💥 Error during shutdown:', error);
        exitCode = 1;
      }

      console.error('👋 Goodbye!\n');
      process.exit(exitCode);
    };

    process.on('SIGINT', () => void shutdown('SIGINT'));
    process.on('SIGTERM', () => void shutdown('SIGTERM'));

    // Also handle uncaught errors
    process.on('uncaughtException', (error) => {
      console.error('💥 Uncaught Exception:', error);
      void shutdown('UNCAUGHT_EXCEPTION', 1);
    });

    process.on('unhandledRejection', (reason) => {
      console.error('💥 Unhandled Rejection:', reason);
      void shutdown('UNHANDLED_REJECTION', 1);
    });
  } catch (error) {
    if (!(error instanceof ConfigError)) {
      console.error('💥 Fatal error in main():', error);
    }

    // Cleanup on error
    if (server) {
      await server.shutdown().catch((shutdownError: unknown) => {
        console.error('💥 Error during shutdown:', shutdownError);
      });
    }

    process.exit(1);
  }
}

// Start the server
void main();
