/**
 * Unit tests for the CLI error handler
 */

import { describe, it, expect, vi } from 'vitest';
import { handleError } from '@rhodl-sync/utils';
import {
  formatError,
  handleCliError,
  sanitizeErrorMessage,
  secretsFromEnv,
} from '../../src/core/error-handler';

vi.mock('@rhodl-sync/utils', async (importOriginal) => {
  const actual = await importOriginal<typeof import('@rhodl-sync/utils')>();
  return {
    ...actual,
    handleError: vi.fn((error: unknown) => ({
      handled: true,
      message: error instanceof Error ? error.message : String(error),
      code: error instanceof actual.AppError ? error.code : 'UNKNOWN_ERROR',
      operational: error instanceof actual.AppError,
    })),
  };
});

describe('ErrorHandler', () => {
  describe('formatError', () => {
    it('should format Error objects', () => {
      expect(formatError(new Error('CoinGlass responded with HTTP 503 Service Unavailable'))).toBe(
        'CoinGlass responded with HTTP 503 Service Unavailable'
      );
    });

    it('should format string errors', () => {
      expect(formatError('String error')).toBe('String error');
    });

    it('should handle unknown error types', () => {
      expect(formatError({ unexpected: 'object' })).toBe('An unexpected error occurred');
    });

    it('should redact known secret values', () => {
      const error = new Error('GET /api?key=test-key-123 failed');
      expect(formatError(error, ['test-key-123'])).toBe('GET /api?key=[REDACTED] failed');
    });
  });

  describe('sanitizeErrorMessage', () => {
    it('should redact credential assignments but keep the label', () => {
      expect(sanitizeErrorMessage('Request failed: api_key=abc123def')).toBe(
        'Request failed: api_key=[REDACTED]'
      );
      expect(sanitizeErrorMessage('header CG-API-KEY: abc123 rejected')).toBe(
        'header CG-API-KEY: [REDACTED] rejected'
      );
    });

    it('should redact bearer tokens', () => {
      expect(sanitizeErrorMessage('Bearer abc.def.ghi expired')).toBe('Bearer [REDACTED] expired');
    });

    it('should keep variable names in configuration errors', () => {
      const message = 'Missing required environment variables: COINGLASS_API_KEY, GOOGLE_SHEET_ID';
      expect(sanitizeErrorMessage(message)).toBe(message);
    });

    it('should ignore very short secrets', () => {
      expect(sanitizeErrorMessage('abc failed', ['abc'])).toBe('abc failed');
    });
  });

  describe('secretsFromEnv', () => {
    it('should collect the API key when set', () => {
      expect(secretsFromEnv({ COINGLASS_API_KEY: 'test-key' })).toEqual(['test-key']);
      expect(secretsFromEnv({})).toEqual([]);
    });
  });

  describe('handleCliError', () => {
    it('should log through handleError and return a sanitized message', () => {
      const error = new Error('upstream said api_key=test-key');

      const result = handleCliError(error, { argv: ['--append'] }, []);

      expect(handleError).toHaveBeenCalledWith(error, { argv: ['--append'] });
      expect(result).toEqual({ message: 'upstream said api_key=[REDACTED]', code: 'UNKNOWN_ERROR' });
    });
  });
});
