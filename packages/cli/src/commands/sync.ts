/**
 * Sync Command - fetch the RHODL Ratio and push it to the sheet
 *
 * rhodl-sync            rewrite the worksheet with the full filtered series
 * rhodl-sync --append   write only dates newer than the sheet's high-water mark
 */

import type { Command } from 'commander';
import { loadEnvFile, loadSyncConfig, ValidationError, type SyncConfig } from '@rhodl-sync/utils';
import {
  createSyncContext,
  syncRhodlSeries,
  type SyncRhodlSeriesResult,
  type SyncWorkflowContext,
} from '@rhodl-sync/workflows';
import { syncSchema, type SyncCommandOptions } from '../command-defs/sync.js';

export interface SyncCommandDeps {
  loadEnvFile: (envFile?: string) => string;
  loadConfig: (options: { outfile?: string }) => SyncConfig;
  createContext: (config: SyncConfig) => SyncWorkflowContext;
  runSync: typeof syncRhodlSeries;
  /** Receives the one-line JSON summary */
  writeOut: (line: string) => void;
}

export const defaultSyncDeps: SyncCommandDeps = {
  loadEnvFile: (envFile) => loadEnvFile(envFile),
  loadConfig: (options) => loadSyncConfig(options),
  createContext: (config) => createSyncContext(config),
  runSync: syncRhodlSeries,
  writeOut: (line) => {
    process.stdout.write(`${line}\n`);
  },
};

/**
 * Run one sync with already-parsed commander options
 */
export async function syncHandler(
  rawOptions: unknown,
  deps: SyncCommandDeps = defaultSyncDeps
): Promise<SyncRhodlSeriesResult> {
  const parsed = syncSchema.safeParse(rawOptions);
  if (!parsed.success) {
    const msg = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new ValidationError(`Invalid options: ${msg}`);
  }
  const options: SyncCommandOptions = parsed.data;

  deps.loadEnvFile(options.envFile);
  const config = deps.loadConfig({ outfile: options.outfile });
  const ctx = deps.createContext(config);

  const result = await deps.runSync(
    { mode: options.append ? 'append' : 'rewrite', cutoffDate: config.series.cutoffDate },
    ctx
  );

  deps.writeOut(JSON.stringify(result));
  return result;
}

/**
 * Add the sync options and action to a commander program
 */
export function registerSyncCommand(program: Command, deps: SyncCommandDeps = defaultSyncDeps): Command {
  return program
    .option('--append', 'append only dates newer than the sheet high-water mark', false)
    .option('--outfile <path>', 'where to write the local JSON copy of the series')
    .option('--env-file <path>', 'dotenv file to load (default: ./.env)')
    .action(async (options: unknown) => {
      await syncHandler(options, deps);
    });
}
