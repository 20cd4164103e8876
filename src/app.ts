import type { Server } from 'http';
import express, { type Express, type RequestHandler } from 'express';
import helmet from 'helmet';
import rateLimit from 'express-rate-limit';
import type { PipelineContext } from './services/stage';
import { DEFAULT_REFINEMENT_ITERATIONS } from './services/planner';
import { createPlansRouter } from './api/routes/plans';
import { createSummariesRouter } from './api/routes/summaries';
import { apiKeyAuth } from './middleware/auth';

export interface AppOptions {
  pipeline: PipelineContext;
  /** When empty, the pipeline routes are unauthenticated. */
  apiKey?: string;
  refinementIterations?: number;
  /** Requests per minute per client on the pipeline routes. */
  rateLimitPerMinute?: number;
}

export function createApp(options: AppOptions): Express {
  const app = express();

  app.use(helmet());
  app.use(express.json({ limit: '1mb' }));

  const pipelineLimiter = rateLimit({
    windowMs: 60_000,
    limit: options.rateLimitPerMinute ?? 10,
    standardHeaders: true,
    legacyHeaders: false,
  });
  const requireKey: RequestHandler = options.apiKey ? apiKeyAuth(options.apiKey) : (_req, _res, next) => next();

  app.use(
    '/api/plans',
    pipelineLimiter,
    requireKey,
    createPlansRouter(options.pipeline, options.refinementIterations ?? DEFAULT_REFINEMENT_ITERATIONS),
  );
  app.use('/api/summaries', pipelineLimiter, requireKey, createSummariesRouter(options.pipeline));

  // Health check
  app.get('/api/health', (_req, res) => {
    res.json({ status: 'ok', timestamp: new Date().toISOString() });
  });

  return app;
}

/** Resolves once the server is bound; bind failures such as EADDRINUSE reject. */
export function listen(app: Express, port: number, host?: string): Promise<Server> {
  return new Promise((resolve, reject) => {
    const onListen = (err?: Error) => {
      if (err) reject(err);
      else resolve(server);
    };
    const server = host === undefined ? app.listen(port, onListen) : app.listen(port, host, onListen);
    server.once('error', reject);
  });
}
