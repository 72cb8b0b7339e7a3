#!/usr/bin/env node

import { EnvironmentConfig } from './config/environment.js';
import { logger } from './observability/logger.js';
import { ApiHttpServer } from './server/http-server.js';

const VERSION = '0.1.0';

async function main() {
  try {
    EnvironmentConfig.load();
    EnvironmentConfig.logConfiguration();
    const config = EnvironmentConfig.toAppConfig();

    logger.info('Starting dashboard API', {
      environment: config.environment,
      gateway: config.gateway.nodes.length > 0 ? 'remote' : 'local',
    });

    const server = new ApiHttpServer({ config, version: VERSION });
    await server.start();

    // Handle graceful shutdown
    const handleShutdown = async (signal: string) => {
      logger.info('Received shutdown signal, shutting down gracefully', { signal });
      try {
        await server.stop();
        logger.info('Server stopped successfully');
        process.exit(0);
      } catch (error) {
        logger.error('Error during shutdown', error);
        process.exit(1);
      }
    };

    process.on('SIGINT', () => void handleShutdown('SIGINT'));
    process.on('SIGTERM', () => void handleShutdown('SIGTERM'));
  } catch (error) {
    logger.error('Server startup failed', error);
    process.exit(1);
  }
}

main().catch((error) => {
  logger.error('Unhandled server error', error);
  process.exit(1);
});
