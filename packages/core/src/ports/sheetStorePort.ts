/**
 * Sheet Store Port
 *
 * Port interface over the two-column (date, value) data region of one
 * worksheet, plus the code-owned sync cursor that records the last date
 * written by this program.
 *
 * Row numbers are 1-based sheet rows. Row 1 holds the header; data starts
 * at row 2.
 */

import type { IsoDate } from '../domain/series.js';

/**
 * A row as written to columns A (date text) and B (value number)
 */
export type SheetRow = readonly [IsoDate, number];

export const FIRST_DATA_ROW = 2;

export interface SheetStorePort {
  /**
   * Make sure the target worksheet exists; creates it with a header row if not
   */
  ensureWorksheet(): Promise<void>;

  /**
   * Column A values below the header, top to bottom.
   * Trailing blank cells are not included; interior blanks are returned as ''.
   */
  readDateColumn(): Promise<string[]>;

  /**
   * Clear columns A and B, then write the header and the given rows from row 1
   */
  replaceRows(rows: ReadonlyArray<SheetRow>): Promise<void>;

  /**
   * Write rows into columns A and B starting at the given sheet row
   */
  writeRowsAt(startRow: number, rows: ReadonlyArray<SheetRow>): Promise<void>;

  /**
   * Last date recorded by a previous sync, or null if none was stored
   */
  readCursor(): Promise<IsoDate | null>;

  /**
   * Store the last synced date; null removes it
   */
  writeCursor(date: IsoDate | null): Promise<void>;
}
