/**
 * Tests for syncRhodlSeries
 *
 * Tests cover:
 * - Spec validation and defaults
 * - Filtering at the cutoff before the cache and the sheet see the series
 * - Failure ordering: fetch/parse errors touch nothing, cache errors skip the sheet
 * - Result shape and timings
 */

import { describe, it, expect } from 'vitest';
import { FetchError, ParseError, PersistError, ValidationError } from '@rhodl-sync/utils';
import type { Series } from '@rhodl-sync/core';
import { syncRhodlSeries, type SyncRhodlSeriesSpec } from '../../src/sync/syncRhodlSeries';
import { InMemorySheetStore } from '../helpers/InMemorySheetStore';
import { createTestContext, failingSource, fixedSource, memoryCache } from '../helpers/fakes';

const FETCHED: Series = [
  { date: '2011-06-01', value: 1.2 },
  { date: '2012-01-01', value: 0.8 },
  { date: '2012-01-02', value: 0.9 },
];

describe('syncRhodlSeries', () => {
  it('filters, caches and rewrites the sheet by default', async () => {
    const cache = memoryCache();
    const ctx = createTestContext({ source: fixedSource(FETCHED), cache });

    const result = await syncRhodlSeries({}, ctx);

    expect(cache.written).toEqual([FETCHED.slice(1)]);
    expect(ctx.sheet.rows).toEqual([
      ['2012-01-01', 0.8],
      ['2012-01-02', 0.9],
    ]);
    expect(ctx.sheet.cursor).toBe('2012-01-02');
    expect(result).toEqual({
      runId: 'run-1',
      source: 'fixed',
      mode: 'rewrite',
      cutoffDate: '2012-01-01',
      pointsFetched: 3,
      pointsKept: 2,
      firstDate: '2012-01-01',
      lastDate: '2012-01-02',
      cachePath: '/tmp/rhodl_daily.json',
      sheet: {
        mode: 'rewrite',
        strategy: 'rewrite',
        rowsWritten: 2,
        highWaterMark: null,
        highWaterMarkSource: null,
        startRow: 2,
        cursor: '2012-01-02',
      },
      startedAtISO: '2024-03-13T06:00:00.000Z',
      completedAtISO: '2024-03-13T06:00:00.250Z',
      durationMs: 250,
    });
  });

  it('honours a cutoff override', async () => {
    const ctx = createTestContext({ source: fixedSource(FETCHED) });

    const result = await syncRhodlSeries({ cutoffDate: '2012-01-02' }, ctx);

    expect(result.pointsKept).toBe(1);
    expect(ctx.sheet.rows).toEqual([['2012-01-02', 0.9]]);
  });

  it('appends only new dates in append mode', async () => {
    const sheet = new InMemorySheetStore({ rows: [['2012-01-01', 0.8]], cursor: '2012-01-01' });
    const ctx = createTestContext({ source: fixedSource(FETCHED), sheet });

    const result = await syncRhodlSeries({ mode: 'append' }, ctx);

    expect(result.sheet.rowsWritten).toBe(1);
    expect(result.sheet.startRow).toBe(3);
    expect(sheet.rows).toEqual([
      ['2012-01-01', 0.8],
      ['2012-01-02', 0.9],
    ]);
  });

  it('reports an empty series without failing', async () => {
    const ctx = createTestContext({ source: fixedSource([{ date: '2010-01-01', value: 3 }]) });

    const result = await syncRhodlSeries({}, ctx);

    expect(result.pointsKept).toBe(0);
    expect(result.firstDate).toBeNull();
    expect(result.lastDate).toBeNull();
    expect(result.sheet.rowsWritten).toBe(0);
  });

  it('rejects an unknown mode before fetching', async () => {
    const source = fixedSource(FETCHED);
    const ctx = createTestContext({ source });
    const spec = { mode: 'merge' } as unknown as SyncRhodlSeriesSpec;

    await expect(syncRhodlSeries(spec, ctx)).rejects.toBeInstanceOf(ValidationError);
    expect(source.fetchSeries).not.toHaveBeenCalled();
  });

  it('rejects a cutoff that is not a calendar date', async () => {
    const ctx = createTestContext({ source: fixedSource(FETCHED) });

    await expect(syncRhodlSeries({ cutoffDate: '2012-13-01' }, ctx)).rejects.toThrow(
      'Invalid sync spec: cutoffDate: cutoffDate must be a YYYY-MM-DD calendar date'
    );
  });

  it('leaves cache and sheet untouched when a record cannot be parsed', async () => {
    const cache = memoryCache();
    const ctx = createTestContext({
      source: failingSource(new ParseError('Record 1 is missing a ratio field', 1)),
      cache,
    });

    await expect(syncRhodlSeries({ mode: 'append' }, ctx)).rejects.toBeInstanceOf(ParseError);
    expect(cache.write).not.toHaveBeenCalled();
    expect(ctx.sheet.calls).toEqual([]);
  });

  it('leaves cache and sheet untouched when the fetch fails', async () => {
    const cache = memoryCache();
    const ctx = createTestContext({
      source: failingSource(new FetchError('CoinGlass responded with HTTP 503', 'CoinGlass', 503)),
      cache,
    });

    await expect(syncRhodlSeries({}, ctx)).rejects.toBeInstanceOf(FetchError);
    expect(cache.write).not.toHaveBeenCalled();
    expect(ctx.sheet.calls).toEqual([]);
  });

  it('does not touch the sheet when the cache write fails', async () => {
    const ctx = createTestContext({
      source: fixedSource(FETCHED),
      cache: {
        write: async () => {
          throw new PersistError('Failed to write series cache to /ro/x.json: EACCES', '/ro/x.json');
        },
      },
    });

    await expect(syncRhodlSeries({}, ctx)).rejects.toBeInstanceOf(PersistError);
    expect(ctx.sheet.calls).toEqual([]);
  });
});
