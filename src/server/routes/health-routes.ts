/**
 * Health and greeting routes
 */

import { Router, Request, Response } from 'express';
import { checkDatabase, type Database } from '../../database/database.js';
import { logger } from '../../observability/logger.js';

export interface HealthRoutesOptions {
  database?: Database;
  version: string;
}

export function setupHealthRoutes(router: Router, options: HealthRoutesOptions): void {
  router.get('/', (_req: Request, res: Response) => {
    res.type('text/plain').send('Hello from the dashboard API!');
  });

  router.get('/health', async (_req: Request, res: Response) => {
    try {
      const database = await checkDatabase(options.database);
      res.json({
        status: database === 'unavailable' ? 'degraded' : 'healthy',
        timestamp: new Date().toISOString(),
        version: options.version,
        database,
      });
    } catch (error) {
      logger.error('Health check failed', error);
      res.status(500).json({ status: 'unhealthy', timestamp: new Date().toISOString() });
    }
  });
}
