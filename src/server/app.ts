import { Hono } from 'hono';
import { cors } from 'hono/cors';
import { logger } from 'hono/logger';
import type { Domain, RankingRun } from '../app/types/ranking';
import { DEFAULT_ENGINE_CONFIGS, type EngineConfig } from '../app/engine/config';
import { ListFormatError, RankingConfigError } from '../app/engine/errors';
import { createConsoleLogger, type PipelineLogger } from '../app/engine/pipelines';
import { RankingCache } from '../app/utils/rankingCache';
import { PayloadError } from './payloads';
import { createRankingRoutes } from './routes/rankings';

export interface AppDeps {
  cache?: RankingCache<RankingRun>;
  log?: PipelineLogger;
  configs?: Record<Domain, EngineConfig>;
}

export function createApp(deps: AppDeps = {}) {
  const cache = deps.cache ?? new RankingCache<RankingRun>();
  const log = deps.log ?? createConsoleLogger('API');
  const configs = deps.configs ?? DEFAULT_ENGINE_CONFIGS;

  const app = new Hono();

  // Request log
  app.use('*', logger((message) => log.info(message)));

  // Enable CORS for all routes and methods
  app.use(
    '/*',
    cors({
      origin: '*',
      allowHeaders: ['Content-Type', 'Authorization'],
      allowMethods: ['GET', 'POST', 'OPTIONS'],
      exposeHeaders: ['Content-Length', 'Content-Disposition'],
      maxAge: 600,
    }),
  );

  // Error handler
  app.onError((err, c) => {
    if (err instanceof PayloadError || err instanceof ListFormatError) {
      return c.json({ success: false, error: { code: 'INVALID_PAYLOAD', message: err.message } }, 400);
    }
    if (err instanceof RankingConfigError) {
      log.warn(`Configuration error: ${err.message}`, { ...err.context });
      return c.json(
        { success: false, error: { code: 'CONFIG_ERROR', message: err.message, context: err.context } },
        422,
      );
    }
    log.error(`${c.req.method} ${c.req.path}: ${err.message}`, { stack: err.stack });
    return c.json({ success: false, error: { code: 'INTERNAL_ERROR', message: err.message } }, 500);
  });

  // Health check
  app.get('/health', (c) => c.json({ status: 'ok', cache: cache.getStatus() }));

  app.route('/rankings', createRankingRoutes({ cache, log, configs }));

  return app;
}
