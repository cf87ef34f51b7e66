/**
 * Health Check Routes
 */

import { Router, Request, Response } from 'express';
import config from '../config';
import { HealthCheckResponse } from '../types/api';
import Logger from '../utils/logger';

const router = Router();
const logger = Logger.createServiceLogger('HealthRoutes');

/**
 * Basic health check endpoint
 * Degraded when no Google Maps API key is configured: only injected payloads can be parsed
 */
router.get('/health', (req: Request, res: Response) => {
  const configured = config.googleMaps.apiKey.length > 0;

  const health: HealthCheckResponse = {
    status: configured ? 'healthy' : 'degraded',
    timestamp: new Date().toISOString(),
    services: {
      googleMaps: {
        configured,
        baseUrl: config.googleMaps.baseUrl
      }
    }
  };

  if (!configured) {
    logger.warn('Health check: Google Maps API key missing');
  }

  res.status(configured ? 200 : 503).json({
    ...health,
    version: process.env.npm_package_version || '0.1.0',
    uptime: Math.round(process.uptime())
  });
});

/**
 * Liveness probe
 */
router.get('/health/live', (req: Request, res: Response) => {
  res.status(200).json({ status: 'alive', timestamp: new Date().toISOString() });
});

export default router;
