/**
 * Series Source Port
 *
 * Port interface for remote providers of a daily metric series.
 * Adapters (in packages/api-clients) implement this port.
 */

import type { Series } from '../domain/series.js';

export interface SeriesSourcePort {
  /** Provider name, used in logs */
  readonly name: string;

  /**
   * Fetch the full history, normalized, ascending and unique by date.
   *
   * One outbound request per call, no retries.
   */
  fetchSeries(): Promise<Series>;
}
