import { describe, it, expect } from 'vitest';
import {
  AppError,
  FetchError,
  ParseError,
  PersistError,
  SheetAccessError,
  SheetWriteError,
  ConfigurationError,
  ValidationError,
} from '../../src/errors';

describe('errors', () => {
  it('gives each run error its own code', () => {
    expect(new FetchError('down', 'CoinGlass', 503).code).toBe('FETCH_ERROR');
    expect(new ParseError('bad record', 3).code).toBe('PARSE_ERROR');
    expect(new PersistError('disk full', '/tmp/out.json').code).toBe('PERSIST_ERROR');
    expect(new SheetAccessError('forbidden', 'sheet-1', 403).code).toBe('SHEET_ACCESS_ERROR');
    expect(new SheetWriteError('quota', 'sheet-1', 429, 'A2:B3').code).toBe('SHEET_WRITE_ERROR');
    expect(new ConfigurationError('missing', 'COINGLASS_API_KEY').code).toBe('CONFIGURATION_ERROR');
    expect(new ValidationError('invalid').code).toBe('VALIDATION_ERROR');
  });

  it('sets the name from the subclass', () => {
    const error = new ParseError('bad record', 3);
    expect(error.name).toBe('ParseError');
    expect(error).toBeInstanceOf(AppError);
    expect(error).toBeInstanceOf(Error);
  });

  it('carries structured context', () => {
    const error = new SheetWriteError('quota', 'sheet-1', 429, 'A2:B3', { worksheet: 'Data' });
    expect(error.context).toEqual({
      spreadsheetId: 'sheet-1',
      apiStatusCode: 429,
      range: 'A2:B3',
      worksheet: 'Data',
    });
    expect(error.toJSON()).toMatchObject({
      name: 'SheetWriteError',
      message: 'quota',
      code: 'SHEET_WRITE_ERROR',
      statusCode: 502,
    });
  });

  it('keeps the underlying cause', () => {
    const cause = new Error('ENOSPC');
    const error = new PersistError('disk full', '/tmp/out.json', undefined, cause);
    expect(error.cause).toBe(cause);
    expect(error.path).toBe('/tmp/out.json');
  });
});
