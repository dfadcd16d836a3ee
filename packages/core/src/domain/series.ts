/**
 * Series Domain Types
 * ===================
 * A daily metric series as it flows through the sync pipeline.
 */

import { DateTime } from 'luxon';

/**
 * Calendar date in ISO 8601 day granularity (YYYY-MM-DD).
 *
 * ISO day strings sort lexicographically in chronological order, so plain
 * string comparison is used for every date comparison in this package.
 */
export type IsoDate = string;

/**
 * One observation of the series
 */
export type DataPoint = Readonly<{
  date: IsoDate;
  value: number;
}>;

/**
 * Ascending by date, unique per date
 */
export type Series = ReadonlyArray<DataPoint>;

/**
 * Sheet sync strategy, selected once per run
 */
export type SyncMode = 'rewrite' | 'append';

export const SYNC_MODES: readonly SyncMode[] = ['rewrite', 'append'] as const;

const ISO_DAY_PATTERN = /^\d{4}-\d{2}-\d{2}$/;

/**
 * Check that a string is a real calendar day in YYYY-MM-DD form
 */
export function isIsoDate(value: string): value is IsoDate {
  if (!ISO_DAY_PATTERN.test(value)) return false;
  return DateTime.fromISO(value, { zone: 'utc' }).isValid;
}

/**
 * Last date of an ascending series, or null when empty
 */
export function latestDate(series: Series): IsoDate | null {
  return series.length > 0 ? series[series.length - 1].date : null;
}

/**
 * Points strictly newer than the given date, in series order.
 * A null mark selects the whole series.
 */
export function pointsAfter(series: Series, mark: IsoDate | null): Series {
  if (mark === null) return series.slice();
  return series.filter((point) => point.date > mark);
}

/**
 * Result of ordering a raw list of points
 */
export type OrderedSeries = {
  series: Series;
  /** True when the input was not already ascending */
  reordered: boolean;
  /** Number of points dropped because a later point had the same date */
  duplicatesDropped: number;
};

/**
 * Sort ascending by date and keep the last occurrence of each date.
 *
 * Array.prototype.sort is stable, so among equal dates the original input
 * order is preserved and "last" means last in the provider's response.
 */
export function orderSeries(points: ReadonlyArray<DataPoint>): OrderedSeries {
  let reordered = false;
  for (let i = 1; i < points.length; i++) {
    if (points[i].date < points[i - 1].date) {
      reordered = true;
      break;
    }
  }

  const sorted = points.slice().sort((a, b) => (a.date < b.date ? -1 : a.date > b.date ? 1 : 0));

  const byDate = new Map<IsoDate, DataPoint>();
  for (const point of sorted) {
    byDate.set(point.date, point);
  }

  // Map keeps first-insertion order, which is already ascending
  const series = Array.from(byDate.values());

  return {
    series,
    reordered,
    duplicatesDropped: points.length - series.length,
  };
}
