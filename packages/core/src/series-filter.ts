import type { IsoDate, Series } from './domain/series.js';

/**
 * Earliest date kept in the synced series
 */
export const DEFAULT_CUTOFF_DATE: IsoDate = '2012-01-01';

/**
 * Drop every point dated strictly before the cutoff. Order is preserved.
 */
export function filterSeries(series: Series, cutoff: IsoDate = DEFAULT_CUTOFF_DATE): Series {
  return series.filter((point) => point.date >= cutoff);
}
