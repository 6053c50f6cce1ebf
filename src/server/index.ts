import 'dotenv/config';
import { serve } from '@hono/node-server';
import type { RankingRun } from '../app/types/ranking';
import { DEFAULT_ENGINE_CONFIGS, loadRuntimeConfig, withOverrides } from '../app/engine/config';
import { createConsoleLogger } from '../app/engine/pipelines';
import { RankingCache } from '../app/utils/rankingCache';
import { createApp } from './app';

const runtime = loadRuntimeConfig();
const log = createConsoleLogger('API');

const app = createApp({
  log,
  cache: new RankingCache<RankingRun>(runtime.cacheTtlMs),
  configs: {
    cp: withOverrides(DEFAULT_ENGINE_CONFIGS.cp, { window_size: runtime.windowSize }),
    hdd: withOverrides(DEFAULT_ENGINE_CONFIGS.hdd, { window_size: runtime.windowSize }),
  },
});

serve({ fetch: app.fetch, port: runtime.port }, (info) => {
  log.info(`Listening on http://localhost:${info.port}`);
});
