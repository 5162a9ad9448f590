/**
 * Error helpers for logging failures that may echo secret material
 */

import { getErrorMessage, isError, isNodeError, SweepError } from './types/errors.js';

/**
 * Error masking for sensitive data
 * Removes potential secrets from error messages
 */
export function maskError(error: Error): Error {
  const maskedMessage = maskText(error.message);
  const masked = new Error(maskedMessage);
  masked.name = error.name;
  masked.stack = error.stack?.replace(error.message, maskedMessage);
  return masked;
}

export function maskText(text: string): string {
  return text
    .replace(/gh[ps]_[a-zA-Z0-9]{30,}/g, '***REDACTED***') // GitHub tokens (ghp_, ghs_)
    .replace(/AKIA[A-Z0-9]{16}/g, '***REDACTED***') // AWS access keys
    .replace(/eyJ[a-zA-Z0-9_-]+\.[a-zA-Z0-9_-]+\.[a-zA-Z0-9_-]+/g, '***REDACTED***') // JWTs
    .replace(/sk_live_[a-zA-Z0-9]{24,}/g, '***REDACTED***') // Stripe keys
    .replace(/\b[A-Z0-9]{20,}\b/g, '***REDACTED***'); // Generic long alphanumeric (AWS-like keys)
}

/**
 * Log-friendly description of an unknown failure: name, masked message and,
 * when present, the system error code and the wrapped cause.
 */
export function describeError(error: unknown): Record<string, unknown> {
  if (!isError(error)) {
    return { error: maskText(getErrorMessage(error)) };
  }
  const out: Record<string, unknown> = { error: maskError(error).message, errorName: error.name };
  if (error instanceof SweepError) out.stage = error.stage;
  if (isNodeError(error) && error.code) out.code = error.code;
  if (error.cause !== undefined) out.cause = maskText(getErrorMessage(error.cause));
  return out;
}
