/**
 * JSON Series Cache
 * =================
 * Writes the filtered series to a local JSON file for inspection. The file
 * is an array of { date, value } records, ascending, 2-space indented.
 */

import { promises as fs } from 'fs';
import * as path from 'path';
import { z } from 'zod';
import type { Series, SeriesCachePort, SeriesCacheWriteResult } from '@rhodl-sync/core';
import { PersistError } from '@rhodl-sync/utils';
import { logger } from '../logger.js';

const CachedSeriesSchema = z.array(
  z.object({
    date: z.string().regex(/^\d{4}-\d{2}-\d{2}$/),
    value: z.number(),
  })
);

export function serializeSeries(series: Series): string {
  const records = series.map((point) => ({ date: point.date, value: point.value }));
  return `${JSON.stringify(records, null, 2)}\n`;
}

export class JsonSeriesCache implements SeriesCachePort {
  constructor(private readonly filePath: string) {}

  /**
   * Replace the cache file; parent directories are created as needed
   */
  async write(series: Series): Promise<SeriesCacheWriteResult> {
    try {
      await fs.mkdir(path.dirname(this.filePath), { recursive: true });
      await fs.writeFile(this.filePath, serializeSeries(series), 'utf-8');
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new PersistError(
        `Failed to write series cache to ${this.filePath}: ${reason}`,
        this.filePath,
        { points: series.length },
        error
      );
    }

    logger.info('Series cache written', { path: this.filePath, points: series.length });

    return { path: this.filePath, pointsWritten: series.length };
  }

  /**
   * Read a cache file back
   */
  async read(): Promise<Series> {
    let text: string;
    try {
      text = await fs.readFile(this.filePath, 'utf-8');
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new PersistError(`Failed to read series cache ${this.filePath}: ${reason}`, this.filePath, {}, error);
    }

    let json: unknown;
    try {
      json = JSON.parse(text);
    } catch (error) {
      throw new PersistError(`Series cache ${this.filePath} is not valid JSON`, this.filePath, {}, error);
    }

    const parsed = CachedSeriesSchema.safeParse(json);
    if (!parsed.success) {
      throw new PersistError(`Series cache ${this.filePath} has an unexpected shape`, this.filePath, {
        issues: parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`),
      });
    }

    return parsed.data;
  }
}
