import dotenv from 'dotenv';

// Load environment variables before any other imports
dotenv.config();

import app from './app';
import config from './config';
import Logger from './utils/logger';

const logger = Logger.createServiceLogger('Server');

function startServer(): void {
  if (!config.googleMaps.apiKey) {
    logger.warn('GOOGLE_MAPS_API_KEY is not set, place endpoints will answer 503');
  }
  if (config.auth.apiKeys.length === 0) {
    logger.warn('No API key configured (API_KEY_1, API_KEY_2, MASTER_API_KEY), every API request will answer 401');
  }

  const server = app.listen(config.port, config.host, () => {
    logger.info('Place Reconciliation Service started successfully', {
      port: config.port,
      host: config.host,
      environment: config.environment,
      defaultLanguage: config.defaultLanguage,
      defaultCountry: config.defaultCountry,
      version: process.env.npm_package_version || '0.1.0'
    });
  });

  server.keepAliveTimeout = 30000;
  server.headersTimeout = 35000;

  const gracefulShutdown = (signal: string): void => {
    logger.info(`Received ${signal}, starting graceful shutdown`);

    server.close((error) => {
      if (error) {
        logger.error('Error while closing the HTTP server', { error: error.message });
        process.exit(1);
      }
      logger.info('HTTP server closed');
      process.exit(0);
    });

    setTimeout(() => {
      logger.error('Forced shutdown after timeout');
      process.exit(1);
    }, 10000).unref();
  };

  process.on('SIGTERM', () => gracefulShutdown('SIGTERM'));
  process.on('SIGINT', () => gracefulShutdown('SIGINT'));
}

startServer();
