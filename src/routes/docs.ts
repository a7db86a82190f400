import { Router, Request, Response } from 'express';
import openapiDocument from '../docs/openapi.json';

/**
 * GET /api/openapi.json - OpenAPI 3 description of the catalog endpoints.
 */
export function createDocsRouter(): Router {
  const router = Router();

  router.get('/', (_req: Request, res: Response): void => {
    res.status(200).json(openapiDocument);
  });

  return router;
}
