import { Router, Request, Response } from 'express';
import { Database } from '../db/client';
import { Logger } from '../utils/logger';

/**
 * GET /health - process liveness plus a round trip to the catalog store.
 */
export function createHealthRouter(db: Database, logger: Logger): Router {
  const router = Router();

  router.get('/', async (_req: Request, res: Response): Promise<void> => {
    try {
      await db.withClient((client) => client.query('SELECT 1'));
      res.status(200).json({ status: 'ok', database: 'up' });
    } catch (error) {
      logger.warn('Health check could not reach the catalog store', {
        error: error instanceof Error ? error.message : String(error),
      });
      res.status(503).json({ status: 'degraded', database: 'down' });
    }
  });

  return router;
}
