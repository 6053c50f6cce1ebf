// ═══════════════════════════════════════════════════════════════════════════════
// RANKING ROUTES
// ═══════════════════════════════════════════════════════════════════════════════
//
// Endpoints (mounted under /rankings):
//   POST /compare              Body: { left: {label, entries}, right: {label, entries} }
//                              ?format=csv for the two-table CSV
//   POST /unified              Body: { cp: records, hdd: records, run_timestamp? }
//   POST /:domain              Body: { records, run_timestamp?, expected_entities? }
//   GET  /:domain/latest       Latest cached run
//   GET  /:domain/latest.csv   ?table=composite (default) | areas
//   GET  /:domain/summary      ?top=10
//
// Every successful ranking is cached as the domain's latest run.
//
// ═══════════════════════════════════════════════════════════════════════════════

import { Hono, type Context } from 'hono';
import type { Domain, MetricRecord, RankingRun } from '../../app/types/ranking';
import { isDomain } from '../../app/types/ranking';
import type { EngineConfig } from '../../app/engine/config';
import { logConditions, type PipelineLogger } from '../../app/engine/pipelines';
import { compareRankings, summarizeRanking } from '../../app/engine/rankingComparator';
import { runRanking, toCompositeRows, type RunOptions } from '../../app/engine/rankingEngine';
import { unifyRankings } from '../../app/engine/unifiedScoring';
import { buildAreaRankingCsv, buildComparisonCsv, buildCompositeCsv } from '../../app/utils/csv';
import { buildLatestRunKey, type RankingCache } from '../../app/utils/rankingCache';
import {
  PayloadError,
  parseExpectedEntities,
  parseLabeledRanking,
  parseRecords,
  parseRunTimestamp,
  readJsonBody,
} from '../payloads';

export interface RankingRouteDeps {
  cache: RankingCache<RankingRun>;
  log: PipelineLogger;
  configs: Record<Domain, EngineConfig>;
}

const CSV_CONTENT_TYPE = 'text/csv; charset=utf-8';

function notFound(c: Context, message: string) {
  return c.json({ success: false, error: { code: 'NOT_FOUND', message } }, 404);
}

function readDomain(c: Context): Domain | null {
  const domain = c.req.param('domain');
  return isDomain(domain) ? domain : null;
}

function readTop(raw: string | undefined): number {
  if (raw === undefined) return 10;
  const top = Number(raw);
  if (!Number.isInteger(top) || top < 1) throw new PayloadError('top', 'must be a positive integer');
  return top;
}

export function createRankingRoutes(deps: RankingRouteDeps) {
  const rankings = new Hono();
  const { cache, log, configs } = deps;

  const rank = (domain: Domain, records: readonly MetricRecord[], options: RunOptions) => {
    const run = runRanking(records, configs[domain], options);
    logConditions(log, domain, run.conditions);
    cache.set(buildLatestRunKey(domain), run);
    return run;
  };

  // ─── COMPARE ──────────────────────────────────────────────────────────────
  rankings.post('/compare', async (c) => {
    const body = await readJsonBody(c);
    const result = compareRankings(
      parseLabeledRanking(body.left, 'left'),
      parseLabeledRanking(body.right, 'right'),
    );

    if (c.req.query('format') === 'csv') {
      c.header('Content-Type', CSV_CONTENT_TYPE);
      return c.body(buildComparisonCsv(result));
    }
    return c.json({ success: true, data: result });
  });

  // ─── UNIFIED ──────────────────────────────────────────────────────────────
  rankings.post('/unified', async (c) => {
    const body = await readJsonBody(c);
    const run_timestamp = parseRunTimestamp(body.run_timestamp);
    const cpRecords = parseRecords(body.cp ?? [], 'cp');
    const hddRecords = parseRecords(body.hdd ?? [], 'hdd');

    const cp = rank('cp', cpRecords, { run_timestamp });
    const hdd = rank('hdd', hddRecords, { run_timestamp });
    const unified = unifyRankings({ cp: cp.entries, hdd: hdd.entries });

    return c.json({ success: true, data: unified });
  });

  // ─── RANK ONE DOMAIN ──────────────────────────────────────────────────────
  rankings.post('/:domain', async (c) => {
    const domain = readDomain(c);
    if (!domain) return notFound(c, `Unknown domain '${c.req.param('domain')}'`);

    const body = await readJsonBody(c);
    const run = rank(domain, parseRecords(body.records), {
      run_timestamp: parseRunTimestamp(body.run_timestamp),
      expected_entities: parseExpectedEntities(body.expected_entities),
    });

    return c.json({ success: true, data: run });
  });

  // ─── LATEST ───────────────────────────────────────────────────────────────
  rankings.get('/:domain/latest', (c) => {
    const domain = readDomain(c);
    if (!domain) return notFound(c, `Unknown domain '${c.req.param('domain')}'`);

    const run = cache.get(buildLatestRunKey(domain));
    if (!run) return notFound(c, `No ${domain} ranking has been computed yet`);
    return c.json({ success: true, data: run });
  });

  rankings.get('/:domain/latest.csv', (c) => {
    const domain = readDomain(c);
    if (!domain) return notFound(c, `Unknown domain '${c.req.param('domain')}'`);

    const run = cache.get(buildLatestRunKey(domain));
    if (!run) return notFound(c, `No ${domain} ranking has been computed yet`);

    const table = c.req.query('table') ?? 'composite';
    if (table !== 'composite' && table !== 'areas') {
      throw new PayloadError('table', "must be 'composite' or 'areas'");
    }

    c.header('Content-Type', CSV_CONTENT_TYPE);
    c.header('Content-Disposition', `attachment; filename="${domain}_${table}.csv"`);
    return c.body(table === 'areas'
      ? buildAreaRankingCsv(run.area_rows, run.window_size)
      : buildCompositeCsv(toCompositeRows(run)));
  });

  // ─── SUMMARY ──────────────────────────────────────────────────────────────
  rankings.get('/:domain/summary', (c) => {
    const domain = readDomain(c);
    if (!domain) return notFound(c, `Unknown domain '${c.req.param('domain')}'`);

    const run = cache.get(buildLatestRunKey(domain));
    if (!run) return notFound(c, `No ${domain} ranking has been computed yet`);
    return c.json({ success: true, data: summarizeRanking(run.entries, readTop(c.req.query('top'))) });
  });

  return rankings;
}
