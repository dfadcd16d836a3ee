/**
 * Google Sheet Store
 * ==================
 * SheetStorePort over one worksheet of a Google spreadsheet (Sheets API v4).
 *
 * Layout:
 * - A1:B1 header, A = date text, B = value number, from row 2 down
 * - Other columns are never read or written
 * - The sync cursor lives in worksheet-level developer metadata, outside the
 *   cells people edit
 */

import { google, type sheets_v4 } from 'googleapis';
import {
  FIRST_DATA_ROW,
  isIsoDate,
  type IsoDate,
  type SheetRow,
  type SheetStorePort,
} from '@rhodl-sync/core';
import { ConfigurationError, LogHelpers, SheetAccessError } from '@rhodl-sync/utils';
import { logger } from '../logger.js';
import { toSheetError, type SheetCallKind } from './sheets-errors.js';

export const SHEETS_SCOPE = 'https://www.googleapis.com/auth/spreadsheets';
export const SHEET_HEADER = ['Date', 'RHODL Ratio'] as const;
export const CURSOR_METADATA_KEY = 'rhodl_sync.last_synced_date';

const NEW_SHEET_ROWS = 1000;
const NEW_SHEET_COLUMNS = 26;

export interface GoogleSheetStoreConfig {
  spreadsheetId: string;
  worksheetTitle: string;
  /** Service account JSON key; required unless sheetsApi is given */
  serviceAccountFile?: string;
  /** Optional Sheets client for testing */
  sheetsApi?: sheets_v4.Sheets;
  /** Header written to A1:B1 */
  header?: readonly [string, string];
}

type WorksheetInfo = {
  sheetId: number;
  rowCount: number;
};

/**
 * Build an authenticated Sheets v4 client from a service account key file
 */
export function createSheetsApi(serviceAccountFile: string): sheets_v4.Sheets {
  const auth = new google.auth.GoogleAuth({
    keyFile: serviceAccountFile,
    scopes: [SHEETS_SCOPE],
  });
  return google.sheets({ version: 'v4', auth });
}

/**
 * Quote a worksheet title for A1 notation
 */
export function quoteSheetTitle(title: string): string {
  return `'${title.replace(/'/g, "''")}'`;
}

export class GoogleSheetStore implements SheetStorePort {
  private readonly sheets: sheets_v4.Sheets;
  private readonly spreadsheetId: string;
  private readonly worksheetTitle: string;
  private readonly header: readonly [string, string];
  private worksheet?: WorksheetInfo;

  constructor(config: GoogleSheetStoreConfig) {
    this.spreadsheetId = config.spreadsheetId;
    this.worksheetTitle = config.worksheetTitle;
    this.header = config.header ?? SHEET_HEADER;

    if (config.sheetsApi) {
      this.sheets = config.sheetsApi;
    } else if (config.serviceAccountFile) {
      this.sheets = createSheetsApi(config.serviceAccountFile);
    } else {
      throw new ConfigurationError(
        'GoogleSheetStore needs a service account file',
        'GOOGLE_SERVICE_ACCOUNT'
      );
    }
  }

  private range(a1: string): string {
    return `${quoteSheetTitle(this.worksheetTitle)}!${a1}`;
  }

  /**
   * Run one Sheets API call with timing and error mapping
   */
  private async call<T>(
    kind: SheetCallKind,
    operation: string,
    range: string,
    fn: () => Promise<T>
  ): Promise<T> {
    const startedAt = Date.now();
    try {
      const result = await fn();
      LogHelpers.sheetCall(logger, operation, range, Date.now() - startedAt, {
        spreadsheetId: this.spreadsheetId,
      });
      return result;
    } catch (error) {
      throw toSheetError(error, kind, this.spreadsheetId, operation, range);
    }
  }

  async ensureWorksheet(): Promise<void> {
    await this.getWorksheet();
  }

  private async getWorksheet(): Promise<WorksheetInfo> {
    if (this.worksheet) {
      return this.worksheet;
    }

    const response = await this.call('read', 'spreadsheets.get', this.worksheetTitle, () =>
      this.sheets.spreadsheets.get({
        spreadsheetId: this.spreadsheetId,
        fields: 'sheets.properties(sheetId,title,gridProperties.rowCount)',
      })
    );

    const existing = (response.data.sheets ?? [])
      .map((sheet) => sheet.properties)
      .find((properties) => properties?.title === this.worksheetTitle);

    if (existing && typeof existing.sheetId === 'number') {
      this.worksheet = {
        sheetId: existing.sheetId,
        rowCount: existing.gridProperties?.rowCount ?? 0,
      };
      return this.worksheet;
    }

    this.worksheet = await this.createWorksheet();
    return this.worksheet;
  }

  private async createWorksheet(): Promise<WorksheetInfo> {
    const response = await this.call('write', 'addSheet', this.worksheetTitle, () =>
      this.sheets.spreadsheets.batchUpdate({
        spreadsheetId: this.spreadsheetId,
        requestBody: {
          requests: [
            {
              addSheet: {
                properties: {
                  title: this.worksheetTitle,
                  gridProperties: { rowCount: NEW_SHEET_ROWS, columnCount: NEW_SHEET_COLUMNS },
                },
              },
            },
          ],
        },
      })
    );

    const sheetId = response.data.replies?.[0]?.addSheet?.properties?.sheetId;
    if (typeof sheetId !== 'number') {
      throw new SheetAccessError(
        `Sheets API did not return an id for new worksheet '${this.worksheetTitle}'`,
        this.spreadsheetId
      );
    }

    const headerRange = this.range('A1:B1');
    await this.call('write', 'values.update', headerRange, () =>
      this.sheets.spreadsheets.values.update({
        spreadsheetId: this.spreadsheetId,
        range: headerRange,
        valueInputOption: 'RAW',
        requestBody: { values: [[...this.header]] },
      })
    );

    logger.info('Created worksheet', { worksheet: this.worksheetTitle, sheetId });

    return { sheetId, rowCount: NEW_SHEET_ROWS };
  }

  /**
   * Grow the grid so that the given 1-based row exists
   */
  private async ensureRowCapacity(lastRow: number): Promise<void> {
    const worksheet = await this.getWorksheet();
    if (lastRow <= worksheet.rowCount) {
      return;
    }

    const length = lastRow - worksheet.rowCount;
    await this.call('write', 'appendDimension', this.worksheetTitle, () =>
      this.sheets.spreadsheets.batchUpdate({
        spreadsheetId: this.spreadsheetId,
        requestBody: {
          requests: [{ appendDimension: { sheetId: worksheet.sheetId, dimension: 'ROWS', length } }],
        },
      })
    );
    worksheet.rowCount = lastRow;
  }

  async readDateColumn(): Promise<string[]> {
    await this.getWorksheet();
    const range = this.range(`A${FIRST_DATA_ROW}:A`);
    const response = await this.call('read', 'values.get', range, () =>
      this.sheets.spreadsheets.values.get({
        spreadsheetId: this.spreadsheetId,
        range,
        majorDimension: 'ROWS',
      })
    );

    const values: unknown[][] = response.data.values ?? [];
    return values.map((row) => (row.length > 0 && row[0] !== null && row[0] !== undefined ? String(row[0]) : ''));
  }

  async replaceRows(rows: ReadonlyArray<SheetRow>): Promise<void> {
    await this.getWorksheet();

    const clearRange = this.range('A:B');
    await this.call('write', 'values.clear', clearRange, () =>
      this.sheets.spreadsheets.values.clear({
        spreadsheetId: this.spreadsheetId,
        range: clearRange,
        requestBody: {},
      })
    );

    const lastRow = rows.length + 1;
    await this.ensureRowCapacity(lastRow);

    const range = this.range(`A1:B${lastRow}`);
    await this.call('write', 'values.update', range, () =>
      this.sheets.spreadsheets.values.update({
        spreadsheetId: this.spreadsheetId,
        range,
        valueInputOption: 'RAW',
        requestBody: { values: [[...this.header], ...rows.map((row) => [...row])] },
      })
    );
  }

  async writeRowsAt(startRow: number, rows: ReadonlyArray<SheetRow>): Promise<void> {
    if (rows.length === 0) {
      return;
    }

    const lastRow = startRow + rows.length - 1;
    await this.ensureRowCapacity(lastRow);

    const range = this.range(`A${startRow}:B${lastRow}`);
    await this.call('write', 'values.update', range, () =>
      this.sheets.spreadsheets.values.update({
        spreadsheetId: this.spreadsheetId,
        range,
        valueInputOption: 'RAW',
        requestBody: { values: rows.map((row) => [...row]) },
      })
    );
  }

  private async findCursorMetadata(): Promise<sheets_v4.Schema$DeveloperMetadata[]> {
    const worksheet = await this.getWorksheet();
    const response = await this.call('read', 'developerMetadata.search', CURSOR_METADATA_KEY, () =>
      this.sheets.spreadsheets.developerMetadata.search({
        spreadsheetId: this.spreadsheetId,
        requestBody: {
          dataFilters: [
            {
              developerMetadataLookup: {
                metadataKey: CURSOR_METADATA_KEY,
                metadataLocation: { sheetId: worksheet.sheetId },
                locationMatchingStrategy: 'EXACT_LOCATION',
              },
            },
          ],
        },
      })
    );

    return (response.data.matchedDeveloperMetadata ?? []).flatMap((match) =>
      match.developerMetadata ? [match.developerMetadata] : []
    );
  }

  async readCursor(): Promise<IsoDate | null> {
    const entries = await this.findCursorMetadata();
    const value = entries[0]?.metadataValue;
    if (value === undefined || value === null) {
      return null;
    }
    if (!isIsoDate(value)) {
      logger.warn('Ignoring sync cursor that is not a YYYY-MM-DD date', {
        worksheet: this.worksheetTitle,
        value,
      });
      return null;
    }
    return value;
  }

  async writeCursor(date: IsoDate | null): Promise<void> {
    const worksheet = await this.getWorksheet();
    const entries = await this.findCursorMetadata();
    const ids = entries.flatMap((entry) =>
      typeof entry.metadataId === 'number' ? [entry.metadataId] : []
    );

    let requests: sheets_v4.Schema$Request[];
    if (date === null) {
      requests = ids.map((metadataId) => ({
        deleteDeveloperMetadata: {
          dataFilter: { developerMetadataLookup: { metadataId } },
        },
      }));
    } else if (ids.length > 0) {
      requests = [
        {
          updateDeveloperMetadata: {
            dataFilters: ids.map((metadataId) => ({ developerMetadataLookup: { metadataId } })),
            developerMetadata: { metadataValue: date },
            fields: 'metadataValue',
          },
        },
      ];
    } else {
      requests = [
        {
          createDeveloperMetadata: {
            developerMetadata: {
              metadataKey: CURSOR_METADATA_KEY,
              metadataValue: date,
              location: { sheetId: worksheet.sheetId },
              visibility: 'DOCUMENT',
            },
          },
        },
      ];
    }

    if (requests.length === 0) {
      return;
    }

    await this.call('write', 'developerMetadata', CURSOR_METADATA_KEY, () =>
      this.sheets.spreadsheets.batchUpdate({
        spreadsheetId: this.spreadsheetId,
        requestBody: { requests },
      })
    );
  }
}
