import { describe, it, expect, vi, beforeEach } from 'vitest';
import { handleError } from '../../src/error-handler';
import { AppError, ParseError } from '../../src/errors';
import { logger } from '../../src/logger';

vi.mock('../../src/logger', () => ({
  logger: {
    warn: vi.fn(),
    error: vi.fn(),
    info: vi.fn(),
    debug: vi.fn(),
  },
}));

describe('error-handler', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  describe('handleError', () => {
    it('logs operational errors as warnings with their context', () => {
      const error = new ParseError('Record 2 is missing its value', 2);
      const result = handleError(error, { runId: 'run-1' });

      expect(result).toEqual({
        handled: true,
        message: 'Record 2 is missing its value',
        code: 'PARSE_ERROR',
        operational: true,
      });
      expect(logger.warn).toHaveBeenCalledWith(
        'Operational error occurred',
        expect.objectContaining({
          recordIndex: 2,
          runId: 'run-1',
          error: expect.objectContaining({
            name: 'ParseError',
            code: 'PARSE_ERROR',
            statusCode: 422,
          }),
        })
      );
    });

    it('logs programming errors as errors', () => {
      const error = new AppError('Programming error', 'PROG_ERROR', 500, {}, false);
      const result = handleError(error);

      expect(result.operational).toBe(false);
      expect(result.code).toBe('PROG_ERROR');
      expect(logger.error).toHaveBeenCalledWith('Application error occurred', error, {});
    });

    it('wraps non-Error values', () => {
      const result = handleError('boom');

      expect(result).toEqual({
        handled: true,
        message: 'boom',
        code: 'UNKNOWN_ERROR',
        operational: false,
      });
      expect(logger.error).toHaveBeenCalledWith(
        'Unknown error occurred',
        expect.any(Error),
        undefined
      );
    });
  });
});
