import express, { Application, Request, Response } from 'express';
import cors from 'cors';
import { Database } from './db/client';
import { createBooksRouter } from './routes/books';
import { createDocsRouter } from './routes/docs';
import { createHealthRouter } from './routes/health';
import { createErrorHandler, createRequestLogger } from './middleware';
import { BookService } from './services/bookService';
import { Logger } from './utils/logger';

export interface AppDependencies {
  db: Database;
  logger: Logger;
  trustProxy?: boolean;
}

export function createApp({ db, logger, trustProxy = false }: AppDependencies): Application {
  const app: Application = express();

  // Honour X-Forwarded-* when building absolute pagination links behind a proxy
  app.set('trust proxy', trustProxy);

  // Middleware
  app.use(cors());
  app.use(createRequestLogger(logger));

  // Routes
  app.use('/health', createHealthRouter(db, logger));
  app.use('/api/openapi.json', createDocsRouter());
  app.use('/api/books', createBooksRouter(new BookService(db, logger)));

  // 404 handler (must be before error handler)
  app.use((_req: Request, res: Response) => {
    res.status(404).json({
      error: {
        code: 'NOT_FOUND',
        message: 'Resource not found',
      },
    });
  });

  // Global error handler (must be last)
  app.use(createErrorHandler(logger));

  return app;
}

export default createApp;
