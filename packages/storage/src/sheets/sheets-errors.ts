/**
 * Map googleapis / gaxios failures onto SheetAccessError and SheetWriteError.
 */

import { SheetAccessError, SheetWriteError } from '@rhodl-sync/utils';

/**
 * Statuses that mean the service account cannot see or use the spreadsheet
 */
const ACCESS_STATUSES = new Set([401, 403, 404]);

export type SheetCallKind = 'read' | 'write';

/**
 * HTTP status of a gaxios error, if it carries one
 */
export function statusOf(error: unknown): number | undefined {
  if (typeof error !== 'object' || error === null) {
    return undefined;
  }
  if (
    'response' in error &&
    typeof error.response === 'object' &&
    error.response !== null &&
    'status' in error.response &&
    typeof error.response.status === 'number'
  ) {
    return error.response.status;
  }
  if ('status' in error && typeof error.status === 'number') {
    return error.status;
  }
  if ('code' in error && typeof error.code === 'number') {
    return error.code;
  }
  return undefined;
}

export function toSheetError(
  error: unknown,
  kind: SheetCallKind,
  spreadsheetId: string,
  operation: string,
  range: string
): SheetAccessError | SheetWriteError {
  if (error instanceof SheetAccessError || error instanceof SheetWriteError) {
    return error;
  }

  const status = statusOf(error);
  const reason = error instanceof Error ? error.message : String(error);
  const statusText = status !== undefined ? ` (HTTP ${status})` : '';
  const context = { operation };

  if (kind === 'read' || (status !== undefined && ACCESS_STATUSES.has(status))) {
    return new SheetAccessError(
      `Cannot access spreadsheet during ${operation} of ${range}${statusText}: ${reason}`,
      spreadsheetId,
      status,
      context,
      error
    );
  }

  return new SheetWriteError(
    `Sheets API rejected ${operation} of ${range}${statusText}: ${reason}`,
    spreadsheetId,
    status,
    range,
    context,
    error
  );
}
