/**
 * Configuration loading from environment variables
 *
 * Provides typed configuration for the data provider, the target
 * spreadsheet and the local cache.
 */

import * as fs from 'fs';
import * as path from 'path';
import { config as loadDotenv } from 'dotenv';
import { z } from 'zod';
import { ConfigurationError } from '../errors.js';

export const DEFAULT_COINGLASS_BASE_URL = 'https://open-api-v4.coinglass.com';
export const DEFAULT_WORKSHEET_TITLE = 'RHODL Ratio Raw Data';
export const DEFAULT_OUTFILE = path.join('json_data', 'rhodl_daily.json');

export interface CoinglassConfig {
  apiKey: string;
  baseUrl: string;
  timeoutMs: number;
}

export interface SheetsConfig {
  spreadsheetId: string;
  serviceAccountFile: string;
  worksheetTitle: string;
}

export interface SeriesConfig {
  cutoffDate: string;
  outfile: string;
}

export interface SyncConfig {
  coinglass: CoinglassConfig;
  sheets: SheetsConfig;
  series: SeriesConfig;
}

const REQUIRED_KEYS = ['COINGLASS_API_KEY', 'GOOGLE_SHEET_ID', 'GOOGLE_SERVICE_ACCOUNT'] as const;

const blankToUndefined = (value: unknown) =>
  typeof value === 'string' && value.trim() === '' ? undefined : value;

const optionalString = z.preprocess(blankToUndefined, z.string().trim().optional());

const SyncEnvSchema = z.object({
  COINGLASS_API_KEY: optionalString,
  GOOGLE_SHEET_ID: optionalString,
  GOOGLE_SERVICE_ACCOUNT: optionalString,
  COINGLASS_BASE_URL: z.preprocess(
    blankToUndefined,
    z.string().url('COINGLASS_BASE_URL must be a URL').default(DEFAULT_COINGLASS_BASE_URL)
  ),
  COINGLASS_TIMEOUT_MS: z.preprocess(
    blankToUndefined,
    z.coerce.number().int().positive('COINGLASS_TIMEOUT_MS must be positive').default(30000)
  ),
  RHODL_WORKSHEET_TITLE: z.preprocess(
    blankToUndefined,
    z.string().trim().default(DEFAULT_WORKSHEET_TITLE)
  ),
  RHODL_CUTOFF_DATE: z.preprocess(
    blankToUndefined,
    z
      .string()
      .regex(/^\d{4}-\d{2}-\d{2}$/, 'RHODL_CUTOFF_DATE must be YYYY-MM-DD')
      .default('2012-01-01')
  ),
  RHODL_OUTFILE: z.preprocess(blankToUndefined, z.string().default(DEFAULT_OUTFILE)),
});

export type SyncEnv = z.infer<typeof SyncEnvSchema>;

export interface LoadSyncConfigOptions {
  /** Environment to read; defaults to process.env */
  env?: NodeJS.ProcessEnv;
  /** Base for relative paths; defaults to process.cwd() */
  cwd?: string;
  /** Override RHODL_OUTFILE */
  outfile?: string;
}

/**
 * Load a dotenv file into process.env. A missing file is not an error,
 * the variables may come from the real environment.
 */
export function loadEnvFile(envFile?: string, cwd: string = process.cwd()): string {
  const resolved = path.resolve(cwd, envFile ?? '.env');
  if (envFile && !fs.existsSync(resolved)) {
    throw new ConfigurationError(`Env file not found at ${resolved}`, 'envFile', {
      path: resolved,
    });
  }
  loadDotenv({ path: resolved });
  return resolved;
}

/**
 * Validate the environment and build the run configuration
 */
export function loadSyncConfig(options: LoadSyncConfigOptions = {}): SyncConfig {
  const env = options.env ?? process.env;
  const cwd = options.cwd ?? process.cwd();

  const parsed = SyncEnvSchema.safeParse(env);
  if (!parsed.success) {
    const msg = parsed.error.issues.map((i) => i.message).join('; ');
    throw new ConfigurationError(`Invalid configuration: ${msg}`, undefined, {
      issues: parsed.error.issues.map((i) => ({ path: i.path.join('.'), message: i.message })),
    });
  }

  const values = parsed.data;
  const apiKey = values.COINGLASS_API_KEY;
  const spreadsheetId = values.GOOGLE_SHEET_ID;
  const serviceAccountSetting = values.GOOGLE_SERVICE_ACCOUNT;
  if (!apiKey || !spreadsheetId || !serviceAccountSetting) {
    const missing = REQUIRED_KEYS.filter((key) => !values[key]);
    throw new ConfigurationError(
      `Missing required environment variables: ${missing.join(', ')}`,
      missing[0],
      { missing }
    );
  }

  const serviceAccountFile = path.resolve(cwd, serviceAccountSetting);
  if (!fs.existsSync(serviceAccountFile)) {
    throw new ConfigurationError(
      `Service account JSON not found at ${serviceAccountFile}`,
      'GOOGLE_SERVICE_ACCOUNT',
      { path: serviceAccountFile }
    );
  }

  return {
    coinglass: {
      apiKey,
      baseUrl: values.COINGLASS_BASE_URL,
      timeoutMs: values.COINGLASS_TIMEOUT_MS,
    },
    sheets: {
      spreadsheetId,
      serviceAccountFile,
      worksheetTitle: values.RHODL_WORKSHEET_TITLE,
    },
    series: {
      cutoffDate: values.RHODL_CUTOFF_DATE,
      outfile: path.resolve(cwd, options.outfile ?? values.RHODL_OUTFILE),
    },
  };
}
