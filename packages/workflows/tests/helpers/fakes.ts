import { vi } from 'vitest';
import type { ClockPort, Series, SeriesCachePort, SeriesSourcePort } from '@rhodl-sync/core';
import type { SyncWorkflowContext } from '../../src/types';
import { InMemorySheetStore } from './InMemorySheetStore';

export function dailySeries(from: string, days: number, start = 1): Series {
  const base = Date.parse(`${from}T00:00:00Z`);
  return Array.from({ length: days }, (_, i) => ({
    date: new Date(base + i * 86_400_000).toISOString().slice(0, 10),
    value: start + i / 10,
  }));
}

export function fixedSource(series: Series): SeriesSourcePort {
  return { name: 'fixed', fetchSeries: vi.fn(async () => series) };
}

export function failingSource(error: Error): SeriesSourcePort {
  return {
    name: 'failing',
    fetchSeries: vi.fn(async () => {
      throw error;
    }),
  };
}

export function memoryCache(): SeriesCachePort & { written: Series[] } {
  const written: Series[] = [];
  return {
    written,
    write: vi.fn(async (series: Series) => {
      written.push(series);
      return { path: '/tmp/rhodl_daily.json', pointsWritten: series.length };
    }),
  };
}

export function steppingClock(startMs: number, stepMs: number): ClockPort {
  let now = startMs - stepMs;
  return {
    nowMs: () => {
      now += stepMs;
      return now;
    },
  };
}

export function silentLogger(): SyncWorkflowContext['logger'] {
  return { info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn() };
}

export function createTestContext(
  overrides: Partial<SyncWorkflowContext['ports']> = {}
): SyncWorkflowContext & { sheet: InMemorySheetStore } {
  const sheet = overrides.sheet instanceof InMemorySheetStore ? overrides.sheet : new InMemorySheetStore();
  return {
    sheet,
    ports: {
      source: overrides.source ?? fixedSource([]),
      cache: overrides.cache ?? memoryCache(),
      sheet,
      clock: overrides.clock ?? steppingClock(Date.parse('2024-03-13T06:00:00Z'), 250),
    },
    logger: silentLogger(),
    ids: { newRunId: () => 'run-1' },
  };
}
