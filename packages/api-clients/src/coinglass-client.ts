/**
 * CoinGlass API Client
 * ====================
 * Fetches the Bitcoin RHODL Ratio history and normalizes it into a Series.
 */

import { DateTime } from 'luxon';
import { z } from 'zod';
import type { AxiosInstance } from 'axios';
import { orderSeries, isIsoDate, type DataPoint, type Series, type SeriesSourcePort } from '@rhodl-sync/core';
import { createPackageLogger, FetchError, ParseError } from '@rhodl-sync/utils';
import { BaseApiClient } from './base-client.js';

const logger = createPackageLogger('@rhodl-sync/api-clients');

export const COINGLASS_RHODL_PATH = '/api/index/bitcoin-rhodl-ratio';

export interface CoinglassClientConfig {
  apiKey: string;
  baseURL?: string;
  timeoutMs?: number;
  /** Optional axios instance for testing */
  axiosInstance?: AxiosInstance;
}

/**
 * One record as the provider sends it. Fields are optional here so that a
 * missing one is reported as a ParseError with the record index.
 */
const RawRhodlRecordSchema = z
  .object({
    date: z.string().optional(),
    timestamp: z.union([z.number(), z.string()]).optional(),
    ratio: z.union([z.number(), z.string()]).nullable().optional(),
    rhodl_ratio: z.union([z.number(), z.string()]).nullable().optional(),
  })
  .passthrough();

export type RawRhodlRecord = z.infer<typeof RawRhodlRecordSchema>;

const EnvelopeSchema = z
  .object({
    code: z.union([z.string(), z.number()]).optional(),
    msg: z.string().optional(),
    data: z.unknown(),
  })
  .passthrough();

/**
 * Pull the record array out of a response body.
 *
 * Accepts a bare array or the provider envelope { code, msg, data }.
 */
export function extractRecords(body: unknown): unknown[] {
  if (Array.isArray(body)) {
    return body;
  }

  const envelope = EnvelopeSchema.safeParse(body);
  if (!envelope.success) {
    throw new FetchError('Unexpected CoinGlass response shape', 'CoinGlass', undefined, {
      preview: JSON.stringify(body)?.slice(0, 200),
    });
  }

  const { code, msg, data } = envelope.data;
  if (code !== undefined && String(code) !== '0') {
    throw new FetchError(
      `CoinGlass reported failure (code ${String(code)}): ${msg ?? 'no message'}`,
      'CoinGlass',
      undefined,
      { providerCode: String(code) }
    );
  }

  if (!Array.isArray(data)) {
    throw new FetchError('CoinGlass response carries no record array', 'CoinGlass', undefined, {
      preview: JSON.stringify(body)?.slice(0, 200),
    });
  }

  return data;
}

function parseRecordDate(record: RawRhodlRecord, index: number): string {
  if (record.date !== undefined) {
    const parsed = DateTime.fromISO(record.date.trim(), { zone: 'utc' });
    const date = parsed.isValid ? parsed.toISODate() : null;
    if (!date || !isIsoDate(date)) {
      throw new ParseError(`Record ${index} has an invalid date: ${record.date}`, index);
    }
    return date;
  }

  if (record.timestamp !== undefined) {
    const ms = typeof record.timestamp === 'number' ? record.timestamp : Number(record.timestamp.trim());
    if (!Number.isFinite(ms) || (typeof record.timestamp === 'string' && record.timestamp.trim() === '')) {
      throw new ParseError(`Record ${index} has an invalid timestamp: ${record.timestamp}`, index);
    }
    const date = DateTime.fromMillis(ms, { zone: 'utc' }).toISODate();
    if (!date) {
      throw new ParseError(`Record ${index} has an out-of-range timestamp: ${ms}`, index);
    }
    return date;
  }

  throw new ParseError(`Record ${index} is missing a date field`, index);
}

function parseRecordValue(record: RawRhodlRecord, index: number): number {
  const raw = record.ratio ?? record.rhodl_ratio;
  if (raw === undefined || raw === null) {
    throw new ParseError(`Record ${index} is missing a ratio field`, index);
  }

  const value = typeof raw === 'number' ? raw : raw.trim() === '' ? Number.NaN : Number(raw);
  if (!Number.isFinite(value)) {
    throw new ParseError(`Record ${index} has a non-numeric ratio: ${String(raw)}`, index);
  }
  return value;
}

/**
 * Map one provider record onto a DataPoint
 */
export function normalizeRecord(raw: unknown, index: number): DataPoint {
  const parsed = RawRhodlRecordSchema.safeParse(raw);
  if (!parsed.success) {
    const msg = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new ParseError(`Record ${index} is malformed: ${msg}`, index);
  }

  return {
    date: parseRecordDate(parsed.data, index),
    value: parseRecordValue(parsed.data, index),
  };
}

/**
 * Normalize every record, then sort ascending and keep the last point per date
 */
export function normalizeRecords(records: ReadonlyArray<unknown>): Series {
  const points = records.map((record, index) => normalizeRecord(record, index));
  const { series, reordered, duplicatesDropped } = orderSeries(points);

  if (reordered || duplicatesDropped > 0) {
    logger.warn('CoinGlass series was not ascending and unique; normalized it', {
      received: points.length,
      kept: series.length,
      reordered,
      duplicatesDropped,
    });
  }

  return series;
}

/**
 * CoinGlass client; implements SeriesSourcePort for the RHODL Ratio
 */
export class CoinglassClient extends BaseApiClient implements SeriesSourcePort {
  readonly name = 'CoinGlass RHODL Ratio';

  constructor(config: CoinglassClientConfig) {
    super({
      baseURL: config.baseURL ?? 'https://open-api-v4.coinglass.com',
      timeout: config.timeoutMs ?? 30000,
      apiName: 'CoinGlass',
      headers: {
        accept: 'application/json',
        'CG-API-KEY': config.apiKey,
        'User-Agent': 'rhodl-sync/1.0',
      },
      axiosInstance: config.axiosInstance,
    });
  }

  /**
   * Fetch the full RHODL Ratio history
   */
  async fetchRhodlSeries(): Promise<Series> {
    const body = await this.get<unknown>(COINGLASS_RHODL_PATH);
    const records = extractRecords(body);
    const series = normalizeRecords(records);

    logger.info('Fetched RHODL Ratio series', {
      points: series.length,
      first: series[0]?.date,
      last: series[series.length - 1]?.date,
    });

    return series;
  }

  fetchSeries(): Promise<Series> {
    return this.fetchRhodlSeries();
  }
}
