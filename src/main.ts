// ═══════════════════════════════════════════════════════════════════════════════
// Telemetry Ranking — Batch entry point
// ═══════════════════════════════════════════════════════════════════════════════
//
//   npm run rank                    rank both domains, compare, unify, store
//   npm run rank -- --since 2026-01-01
//
// Without SUPABASE_URL / SUPABASE_SERVICE_ROLE_KEY the job runs on mock
// records and keeps results in memory.
//
// ═══════════════════════════════════════════════════════════════════════════════

import 'dotenv/config';
import { DEFAULT_ENGINE_CONFIGS, isSupabaseConfigured, loadRuntimeConfig, withOverrides } from './app/engine/config';
import { createConsoleLogger, runRankingJob } from './app/engine/pipelines';
import { createMockRegistry, type ProviderRegistry } from './app/engine/providers';
import { createSupabaseStore } from './app/engine/supabaseStore';
import { roundScore } from './app/types/ranking';

const log = createConsoleLogger('Ranking');

function readSince(argv: readonly string[]): string | undefined {
  const index = argv.indexOf('--since');
  return index >= 0 ? argv[index + 1] : undefined;
}

async function main(): Promise<void> {
  const runtime = loadRuntimeConfig();

  let registry: ProviderRegistry;
  if (isSupabaseConfigured(runtime)) {
    const store = createSupabaseStore(runtime);
    registry = { source: store, sink: store };
  } else {
    log.warn('Supabase not configured, using mock records and an in-memory sink');
    registry = createMockRegistry();
  }

  const result = await runRankingJob({
    registry,
    log,
    since: readSince(process.argv.slice(2)),
    configs: {
      cp: withOverrides(DEFAULT_ENGINE_CONFIGS.cp, { window_size: runtime.windowSize }),
      hdd: withOverrides(DEFAULT_ENGINE_CONFIGS.hdd, { window_size: runtime.windowSize }),
    },
  });

  for (const entry of result.unified?.entries.slice(0, 10) ?? []) {
    log.info(`#${entry.position} ${entry.entity_id} ${roundScore(entry.unified_score)} ${entry.category}`);
  }

  if (result.status === 'failed') {
    log.error(result.message ?? 'Job failed', { warnings: result.warnings });
    process.exitCode = 1;
  }
}

main().catch((err: unknown) => {
  log.error('Job aborted', { error: err instanceof Error ? err.message : String(err) });
  process.exitCode = 1;
});
