/**
 * ReforgeError - base error class for reforge
 */

import { ErrorCode, ErrorCategory, getErrorCategory, getErrorMessage, isFatalError } from './error-codes';

export class ReforgeError extends Error {
  public readonly code: ErrorCode;
  public readonly category: ErrorCategory;
  public readonly context?: string;
  public readonly details?: Record<string, unknown>;

  constructor(code: ErrorCode, context?: string, details?: Record<string, unknown>) {
    const baseMessage = getErrorMessage(code);
    const fullMessage = context
      ? `[${code}] ${baseMessage}: ${context}`
      : `[${code}] ${baseMessage}`;

    super(fullMessage);
    this.name = 'ReforgeError';
    this.code = code;
    this.category = getErrorCategory(code);
    this.context = context;
    this.details = details;

    // Ensure proper prototype chain for instanceof checks
    Object.setPrototypeOf(this, ReforgeError.prototype);

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, ReforgeError);
    }
  }

  get fatal(): boolean {
    return isFatalError(this.code);
  }
}

/**
 * Render any thrown value as a single line message
 */
export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
