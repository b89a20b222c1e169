/**
 * Express application for the submission surface
 */

import compression from 'compression';
import express, { type NextFunction, type Request, type Response } from 'express';
import morgan from 'morgan';
import { InvalidTaskDataError, toErrorResponse } from '~/lib/errors';
import { getLogger } from '~/lib/log/logger';
import { crawlRouter } from '~/routes/api.crawl';
import { healthRouter } from '~/routes/api.health';
import { resultRouter } from '~/routes/api.result.$taskId';
import type { ApiDependencies } from '~/routes/types';

const log = getLogger({ module: 'App' });

export function createApp(deps: ApiDependencies): express.Express {
  const app = express();

  // Trust proxy for correct client IP
  app.set('trust proxy', true);

  app.use(compression());

  // Request logging
  if (process.env.NODE_ENV === 'development') {
    app.use(morgan('dev'));
  }

  app.use(express.json({ limit: '64kb' }));

  app.use(crawlRouter(deps));
  app.use(resultRouter(deps));
  app.use(healthRouter(deps));

  app.use((req: Request, res: Response) => {
    res.status(404).json(toErrorResponse(new Error(`No route for ${req.method} ${req.path}`), {
      path: req.originalUrl,
      method: req.method,
    }));
  });

  // Body parser failures (malformed JSON, oversized body) and anything a route let through
  app.use((error: unknown, req: Request, res: Response, _next: NextFunction) => {
    const context = { path: req.originalUrl, method: req.method };
    if (error instanceof SyntaxError) {
      res.status(400).json(toErrorResponse(new InvalidTaskDataError('Request body is not valid JSON.'), context));
      return;
    }
    log.error({ err: error }, 'unhandled request error');
    res.status(500).json(toErrorResponse(error, context));
  });

  return app;
}
