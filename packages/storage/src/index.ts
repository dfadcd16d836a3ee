/**
 * @rhodl-sync/storage
 *
 * Local series cache and the Google Sheets adapter.
 */

export { JsonSeriesCache, serializeSeries } from './cache/json-series-cache.js';
export {
  GoogleSheetStore,
  createSheetsApi,
  quoteSheetTitle,
  SHEETS_SCOPE,
  SHEET_HEADER,
  CURSOR_METADATA_KEY,
} from './sheets/google-sheet-store.js';
export type { GoogleSheetStoreConfig } from './sheets/google-sheet-store.js';
export { statusOf, toSheetError } from './sheets/sheets-errors.js';
export type { SheetCallKind } from './sheets/sheets-errors.js';
export { logger } from './logger.js';
