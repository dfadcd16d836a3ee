/**
 * Series Cache Port
 *
 * Local, human-readable copy of the last synced series. Diagnostic only:
 * nothing in the sync pipeline reads it back.
 */

import type { Series } from '../domain/series.js';

export type SeriesCacheWriteResult = {
  path: string;
  pointsWritten: number;
};

export interface SeriesCachePort {
  /** Replace any previous artifact with this series */
  write(series: Series): Promise<SeriesCacheWriteResult>;
}
