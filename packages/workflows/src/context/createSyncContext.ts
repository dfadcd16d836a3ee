import { v4 as uuidv4 } from 'uuid';
import { createSystemClock } from '@rhodl-sync/core';
import { CoinglassClient } from '@rhodl-sync/api-clients';
import { GoogleSheetStore, JsonSeriesCache } from '@rhodl-sync/storage';
import { createPackageLogger, type SyncConfig } from '@rhodl-sync/utils';
import type { SyncPorts, SyncWorkflowContext, WorkflowLogger } from '../types.js';

export interface SyncContextOverrides {
  ports?: Partial<SyncPorts>;
  logger?: WorkflowLogger;
  ids?: SyncWorkflowContext['ids'];
}

/**
 * Create the production context for syncRhodlSeries
 *
 * This wires up:
 * - CoinGlass client (series source)
 * - JSON file cache
 * - Google Sheets store (service account auth)
 * - System clock and UUID run ids
 *
 * Any port can be replaced through overrides.
 */
export function createSyncContext(
  config: SyncConfig,
  overrides: SyncContextOverrides = {}
): SyncWorkflowContext {
  const ports: SyncPorts = {
    source:
      overrides.ports?.source ??
      new CoinglassClient({
        apiKey: config.coinglass.apiKey,
        baseURL: config.coinglass.baseUrl,
        timeoutMs: config.coinglass.timeoutMs,
      }),
    cache: overrides.ports?.cache ?? new JsonSeriesCache(config.series.outfile),
    sheet:
      overrides.ports?.sheet ??
      new GoogleSheetStore({
        spreadsheetId: config.sheets.spreadsheetId,
        worksheetTitle: config.sheets.worksheetTitle,
        serviceAccountFile: config.sheets.serviceAccountFile,
      }),
    clock: overrides.ports?.clock ?? createSystemClock(),
  };

  return {
    ports,
    logger: overrides.logger ?? createPackageLogger('@rhodl-sync/workflows'),
    ids: overrides.ids ?? { newRunId: () => uuidv4() },
  };
}
