/**
 * AuditError - error type for the boundaries around the audit engine
 *
 * Detectors never raise for data reasons. These errors come from the layers
 * that build tables and load configuration.
 */

export enum ErrorCode {
  // Configuration Errors
  CONFIG_PARSE_ERROR = 'CONFIG_PARSE_ERROR',
  CONFIG_VALIDATION_ERROR = 'CONFIG_VALIDATION_ERROR',
  UNKNOWN_DETECTOR = 'UNKNOWN_DETECTOR',

  // Input Errors
  MALFORMED_INPUT = 'MALFORMED_INPUT',

  // Generic
  UNKNOWN = 'UNKNOWN',
}

export class AuditError extends Error {
  public readonly code: ErrorCode;
  public readonly context?: Record<string, unknown>;
  public readonly timestamp: number;

  constructor(code: ErrorCode, message: string, context?: Record<string, unknown>) {
    super(message);
    this.name = 'AuditError';
    this.code = code;
    this.context = context;
    this.timestamp = Date.now();
  }

  getUserMessage(): string {
    return getUserFriendlyMessage(this.code, this.message);
  }

  /**
   * Convert to JSON for logging
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      context: this.context,
      timestamp: this.timestamp,
      stack: this.stack,
    };
  }
}

export function getUserFriendlyMessage(code: ErrorCode, details?: string): string {
  const messages: Record<ErrorCode, string> = {
    [ErrorCode.CONFIG_PARSE_ERROR]: 'Configuration has an invalid format. Please check its syntax.',
    [ErrorCode.CONFIG_VALIDATION_ERROR]: 'Configuration values are not allowed.',
    [ErrorCode.UNKNOWN_DETECTOR]: 'A configured detector does not exist.',
    [ErrorCode.MALFORMED_INPUT]: 'Input rows are not in the expected tabular shape.',
    [ErrorCode.UNKNOWN]: 'An unexpected error occurred.',
  };

  const baseMessage = messages[code] || messages[ErrorCode.UNKNOWN];
  return details ? `${baseMessage} (${details})` : baseMessage;
}

export function isAuditError(error: unknown): error is AuditError {
  return error instanceof AuditError;
}
