/**
 * Sheet Sync
 * ==========
 *
 * Reconciles a filtered series with the worksheet behind a SheetStorePort.
 *
 * - rewrite: clear A:B, write header + every point, set the cursor to the
 *   last date (clear it for an empty series)
 * - append: write only points newer than the high-water mark, directly
 *   below the last populated row of column A. The high-water mark is the
 *   later of the stored cursor and the greatest date in column A, so rows
 *   deleted by hand are not re-added and rows written without a cursor
 *   update are not written twice. An empty data region falls back to a
 *   full rewrite.
 *
 * The cursor never moves backwards in append mode.
 */

import {
  FIRST_DATA_ROW,
  isIsoDate,
  latestDate,
  pointsAfter,
  type IsoDate,
  type Series,
  type SheetRow,
  type SheetStorePort,
  type SyncMode,
} from '@rhodl-sync/core';
import { createPackageLogger } from '@rhodl-sync/utils';
import type { WorkflowLogger } from '../types.js';

const defaultLogger = createPackageLogger('@rhodl-sync/workflows');

export type SheetSyncStrategy = 'rewrite' | 'append' | 'append-as-rewrite';

/**
 * Outcome of one sheet sync (JSON-serializable)
 */
export type SheetSyncResult = {
  mode: SyncMode;
  strategy: SheetSyncStrategy;
  rowsWritten: number;
  /** High-water mark the append was computed against (null for rewrites) */
  highWaterMark: IsoDate | null;
  /** Where the high-water mark came from */
  highWaterMarkSource: 'cursor' | 'column' | null;
  /** First sheet row written, null when nothing was written */
  startRow: number | null;
  /** Cursor value after the sync */
  cursor: IsoDate | null;
};

export function toSheetRows(series: Series): SheetRow[] {
  return series.map((point) => [point.date, point.value] as const);
}

/**
 * Greatest YYYY-MM-DD date in a column, ignoring the header, blanks and
 * anything else that is not a date
 */
export function columnHighWaterMark(column: ReadonlyArray<string>): IsoDate | null {
  let mark: IsoDate | null = null;
  for (const cell of column) {
    const value = cell.trim();
    if (isIsoDate(value) && (mark === null || value > mark)) {
      mark = value;
    }
  }
  return mark;
}

export function isDataRegionEmpty(column: ReadonlyArray<string>): boolean {
  return column.every((cell) => cell.trim() === '');
}

/**
 * First free row below the populated part of column A
 */
export function nextFreeRow(column: ReadonlyArray<string>): number {
  let populated = column.length;
  while (populated > 0 && column[populated - 1].trim() === '') {
    populated--;
  }
  return FIRST_DATA_ROW + populated;
}

export function resolveHighWaterMark(
  cursor: IsoDate | null,
  column: ReadonlyArray<string>
): { mark: IsoDate | null; source: 'cursor' | 'column' | null } {
  const fromColumn = columnHighWaterMark(column);
  if (fromColumn !== null && (cursor === null || fromColumn > cursor)) {
    // No cursor yet, or rows landed without their cursor update
    return { mark: fromColumn, source: 'column' };
  }
  if (cursor !== null) {
    return { mark: cursor, source: 'cursor' };
  }
  return { mark: null, source: null };
}

/**
 * Replace the data region with the whole series
 */
export async function rewriteSheet(
  series: Series,
  store: SheetStorePort,
  logger: WorkflowLogger = defaultLogger,
  mode: SyncMode = 'rewrite'
): Promise<SheetSyncResult> {
  await store.replaceRows(toSheetRows(series));

  const cursor = latestDate(series);
  await store.writeCursor(cursor);

  logger.info('Rewrote sheet data region', { rowsWritten: series.length, cursor });

  return {
    mode,
    strategy: mode === 'append' ? 'append-as-rewrite' : 'rewrite',
    rowsWritten: series.length,
    highWaterMark: null,
    highWaterMarkSource: null,
    startRow: series.length > 0 ? FIRST_DATA_ROW : null,
    cursor,
  };
}

/**
 * Append only the points the sheet has not seen
 */
export async function appendToSheet(
  series: Series,
  store: SheetStorePort,
  logger: WorkflowLogger = defaultLogger
): Promise<SheetSyncResult> {
  const column = await store.readDateColumn();

  if (isDataRegionEmpty(column)) {
    logger.info('Sheet data region is empty; appending the full series');
    return rewriteSheet(series, store, logger, 'append');
  }

  const storedCursor = await store.readCursor();
  const { mark, source } = resolveHighWaterMark(storedCursor, column);
  const fresh = pointsAfter(series, mark);

  if (fresh.length === 0) {
    // Seed or repair the cursor from the column
    if (mark !== null && mark !== storedCursor) {
      await store.writeCursor(mark);
    }

    logger.info('Sheet is up to date; nothing to append', { highWaterMark: mark, source });

    return {
      mode: 'append',
      strategy: 'append',
      rowsWritten: 0,
      highWaterMark: mark,
      highWaterMarkSource: source,
      startRow: null,
      cursor: mark,
    };
  }

  const startRow = nextFreeRow(column);
  await store.writeRowsAt(startRow, toSheetRows(fresh));

  const cursor = latestDate(fresh);
  await store.writeCursor(cursor);

  logger.info('Appended new rows to sheet', {
    rowsWritten: fresh.length,
    startRow,
    highWaterMark: mark,
    source,
    cursor,
  });

  return {
    mode: 'append',
    strategy: 'append',
    rowsWritten: fresh.length,
    highWaterMark: mark,
    highWaterMarkSource: source,
    startRow,
    cursor,
  };
}

/**
 * Reconcile the series with the sheet under the chosen mode
 */
export async function syncSeriesToSheet(
  series: Series,
  mode: SyncMode,
  store: SheetStorePort,
  logger: WorkflowLogger = defaultLogger
): Promise<SheetSyncResult> {
  await store.ensureWorksheet();

  switch (mode) {
    case 'rewrite':
      return rewriteSheet(series, store, logger);
    case 'append':
      return appendToSheet(series, store, logger);
  }
}
