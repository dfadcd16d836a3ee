/**
 * Error Handler - User-friendly error messages, no secret leakage
 */

import { handleError } from '@rhodl-sync/utils';

const REDACTED = '[REDACTED]';

/**
 * Credential-looking assignments: the label is kept, the value is redacted
 */
const SENSITIVE_ASSIGNMENTS = [
  /(api[_-]?key|cg-api-key|token|secret|password|private[_-]?key)(["']?\s*[:=]\s*["']?)([^\s"',;&]+)/gi,
  /(bearer|authorization:?)(\s+)([^\s"',;]+)/gi,
];

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Remove known secret values and credential assignments from a message
 */
export function sanitizeErrorMessage(message: string, secrets: ReadonlyArray<string> = []): string {
  let sanitized = message;

  for (const secret of secrets) {
    if (secret.length >= 4) {
      sanitized = sanitized.replace(new RegExp(escapeRegExp(secret), 'g'), REDACTED);
    }
  }

  for (const pattern of SENSITIVE_ASSIGNMENTS) {
    sanitized = sanitized.replace(pattern, (_match, label: string, separator: string) => {
      return `${label}${separator}${REDACTED}`;
    });
  }

  return sanitized;
}

/**
 * Format error for user display
 */
export function formatError(error: unknown, secrets: ReadonlyArray<string> = []): string {
  if (error instanceof Error) {
    return sanitizeErrorMessage(error.message, secrets);
  }

  if (typeof error === 'string') {
    return sanitizeErrorMessage(error, secrets);
  }

  return 'An unexpected error occurred';
}

/**
 * Secret values present in the environment
 */
export function secretsFromEnv(env: NodeJS.ProcessEnv = process.env): string[] {
  const key = env.COINGLASS_API_KEY;
  return key ? [key] : [];
}

/**
 * Log the error with context and return the message for CLI output
 */
export function handleCliError(
  error: unknown,
  context?: Record<string, unknown>,
  secrets: ReadonlyArray<string> = secretsFromEnv()
): { message: string; code: string } {
  const { code } = handleError(error, context);
  return { message: formatError(error, secrets), code };
}
