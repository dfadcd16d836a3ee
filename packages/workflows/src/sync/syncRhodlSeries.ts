/**
 * RHODL Ratio Sync Workflow
 * =========================
 *
 * Control-plane workflow: fetch → filter → cache → sheet.
 *
 * Architecture (Ports & Adapters):
 * - ctx.ports.source.fetchSeries() for the remote series (CoinGlass)
 * - ctx.ports.cache.write() for the local JSON copy
 * - ctx.ports.sheet for the worksheet and its cursor
 * - ctx.ports.clock for timings
 *
 * Every step is awaited in order and the first failure aborts the run:
 * a fetch or parse failure leaves the cache file and the sheet untouched,
 * a cache failure leaves the sheet untouched.
 *
 * This workflow follows the workflow contract:
 * - Validates spec with Zod
 * - Takes all dependencies from the context
 * - Returns JSON-serializable results
 */

import { z } from 'zod';
import { DateTime } from 'luxon';
import { DEFAULT_CUTOFF_DATE, filterSeries, isIsoDate, SYNC_MODES, type SyncMode } from '@rhodl-sync/core';
import { ValidationError } from '@rhodl-sync/utils';
import type { SyncWorkflowContext } from '../types.js';
import { syncSeriesToSheet, type SheetSyncResult } from './sheetSync.js';

/**
 * Sync Spec
 */
export const SyncRhodlSeriesSpecSchema = z.object({
  mode: z.enum(['rewrite', 'append']).default('rewrite'),
  cutoffDate: z
    .string()
    .refine(isIsoDate, 'cutoffDate must be a YYYY-MM-DD calendar date')
    .default(DEFAULT_CUTOFF_DATE),
});

export type SyncRhodlSeriesSpec = z.input<typeof SyncRhodlSeriesSpecSchema>;

/**
 * Sync Result (JSON-serializable)
 */
export type SyncRhodlSeriesResult = {
  runId: string;
  source: string;
  mode: SyncMode;
  cutoffDate: string;
  pointsFetched: number;
  pointsKept: number;
  firstDate: string | null;
  lastDate: string | null;
  cachePath: string;
  sheet: SheetSyncResult;
  startedAtISO: string;
  completedAtISO: string;
  durationMs: number;
};

function toISO(ms: number): string {
  return DateTime.fromMillis(ms, { zone: 'utc' }).toISO() ?? new Date(ms).toISOString();
}

export async function syncRhodlSeries(
  spec: SyncRhodlSeriesSpec,
  ctx: SyncWorkflowContext
): Promise<SyncRhodlSeriesResult> {
  const { ports } = ctx;
  const startedAtMs = ports.clock.nowMs();

  // 1. Validate spec
  const parsed = SyncRhodlSeriesSpecSchema.safeParse(spec);
  if (!parsed.success) {
    const msg = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new ValidationError(`Invalid sync spec: ${msg}`, {
      spec,
      allowedModes: SYNC_MODES,
    });
  }
  const { mode, cutoffDate } = parsed.data;

  const runId = ctx.ids.newRunId();
  const logger = ctx.logger;
  logger.info('Starting RHODL Ratio sync', { runId, mode, cutoffDate, source: ports.source.name });

  // 2. Fetch
  const fetched = await ports.source.fetchSeries();

  // 3. Filter
  const series = filterSeries(fetched, cutoffDate);
  logger.info('Filtered series', {
    runId,
    fetched: fetched.length,
    kept: series.length,
    dropped: fetched.length - series.length,
  });

  // 4. Local cache
  const cacheResult = await ports.cache.write(series);

  // 5. Sheet
  const sheet = await syncSeriesToSheet(series, mode, ports.sheet, logger);

  const completedAtMs = ports.clock.nowMs();
  const result: SyncRhodlSeriesResult = {
    runId,
    source: ports.source.name,
    mode,
    cutoffDate,
    pointsFetched: fetched.length,
    pointsKept: series.length,
    firstDate: series.length > 0 ? series[0].date : null,
    lastDate: series.length > 0 ? series[series.length - 1].date : null,
    cachePath: cacheResult.path,
    sheet,
    startedAtISO: toISO(startedAtMs),
    completedAtISO: toISO(completedAtMs),
    durationMs: completedAtMs - startedAtMs,
  };

  logger.info('RHODL Ratio sync complete', {
    runId,
    mode,
    rowsWritten: sheet.rowsWritten,
    strategy: sheet.strategy,
    durationMs: result.durationMs,
  });

  return result;
}
