/**
 * Error handling utilities and error types
 */

import axios from 'axios';

export enum ErrorType {
  // Transient errors - should retry
  NETWORK_ERROR = 'NETWORK_ERROR',
  DEADLINE_EXCEEDED = 'DEADLINE_EXCEEDED',
  RESOURCE_EXHAUSTED = 'RESOURCE_EXHAUSTED', // 429
  SERVER_ERROR = 'SERVER_ERROR', // 5xx errors

  // Permanent errors - don't retry
  PERMISSION_DENIED = 'PERMISSION_DENIED',
  AUTHENTICATION_ERROR = 'AUTHENTICATION_ERROR',
  MALFORMED_DATA = 'MALFORMED_DATA',
  NOT_FOUND = 'NOT_FOUND',
  CONFIGURATION_ERROR = 'CONFIGURATION_ERROR',
  STORE_CORRUPTION = 'STORE_CORRUPTION',
  UNKNOWN_ERROR = 'UNKNOWN_ERROR',
}

const TRANSIENT_TYPES: ReadonlySet<ErrorType> = new Set([
  ErrorType.NETWORK_ERROR,
  ErrorType.DEADLINE_EXCEEDED,
  ErrorType.RESOURCE_EXHAUSTED,
  ErrorType.SERVER_ERROR,
]);

export function isTransient(type: ErrorType): boolean {
  return TRANSIENT_TYPES.has(type);
}

export interface ErrorDetails {
  type: ErrorType;
  message: string;
  originalError?: unknown;
  context?: Record<string, unknown>;
  retryable?: boolean;
  httpStatus?: number;
}

export class AppError extends Error {
  public readonly type: ErrorType;
  public readonly retryable: boolean;
  public readonly context?: Record<string, unknown>;
  public readonly httpStatus?: number;
  public readonly originalError?: unknown;

  constructor(details: ErrorDetails) {
    super(details.message);
    this.name = 'AppError';
    this.type = details.type;
    this.retryable = details.retryable ?? isTransient(details.type);
    this.context = details.context;
    this.httpStatus = details.httpStatus;
    this.originalError = details.originalError;

    // Maintains proper stack trace for where our error was thrown
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, AppError);
    }
  }

  toJSON() {
    return {
      type: this.type,
      message: this.message,
      retryable: this.retryable,
      context: this.context,
      httpStatus: this.httpStatus,
    };
  }
}

/**
 * Programmer error, such as using a store before it was initialized. Never
 * classified or retried.
 */
export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

const NETWORK_CODES = new Set(['ECONNRESET', 'ETIMEDOUT', 'ENOTFOUND', 'ECONNREFUSED', 'EAI_AGAIN', 'ENETUNREACH']);
const DEADLINE_CODES = new Set(['ECONNABORTED', 'ERR_CANCELED']);

function messageOf(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (typeof error === 'string') return error;
  return 'Unknown error occurred';
}

function codeOf(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

function detailOf(data: unknown): string | undefined {
  if (typeof data === 'string' && data) return data;
  if (typeof data === 'object' && data !== null) {
    if ('error' in data && typeof data.error === 'string') return data.error;
    if ('message' in data && typeof data.message === 'string') return data.message;
  }
  return undefined;
}

function typeForStatus(status: number): ErrorType | undefined {
  if (status === 429) return ErrorType.RESOURCE_EXHAUSTED;
  if (status === 401) return ErrorType.AUTHENTICATION_ERROR;
  if (status === 403) return ErrorType.PERMISSION_DENIED;
  if (status === 404) return ErrorType.NOT_FOUND;
  if (status === 400 || status === 422) return ErrorType.MALFORMED_DATA;
  if (status === 408 || status === 504) return ErrorType.DEADLINE_EXCEEDED;
  if (status >= 500) return ErrorType.SERVER_ERROR;
  return undefined;
}

const STATUS_LABELS: Partial<Record<ErrorType, string>> = {
  [ErrorType.RESOURCE_EXHAUSTED]: 'Rate limit exceeded',
  [ErrorType.AUTHENTICATION_ERROR]: 'Authentication failed',
  [ErrorType.PERMISSION_DENIED]: 'Permission denied',
  [ErrorType.NOT_FOUND]: 'Resource not found',
  [ErrorType.MALFORMED_DATA]: 'Remote rejected record',
  [ErrorType.DEADLINE_EXCEEDED]: 'Request timeout',
  [ErrorType.SERVER_ERROR]: 'Server error',
};

/**
 * Classify an error and create an AppError
 */
export function classifyError(error: unknown, context?: Record<string, unknown>): AppError {
  // If it's already an AppError, return it
  if (error instanceof AppError) {
    return error;
  }

  const message = messageOf(error);

  // Check for HTTP errors
  if (axios.isAxiosError(error) && error.response) {
    const status = error.response.status;
    const type = typeForStatus(status);

    if (type) {
      const retryAfter: unknown = error.response.headers['retry-after'];
      return new AppError({
        type,
        message: `${STATUS_LABELS[type] ?? 'HTTP error'} (${status}): ${detailOf(error.response.data) ?? message}`,
        httpStatus: status,
        context: type === ErrorType.RESOURCE_EXHAUSTED && retryAfter !== undefined ? { ...context, retryAfter } : context,
        originalError: error,
      });
    }
  }

  const code = codeOf(error);

  // Network/timeout errors
  if (code && DEADLINE_CODES.has(code)) {
    return new AppError({
      type: ErrorType.DEADLINE_EXCEEDED,
      message: `Request timeout: ${message}`,
      context,
      originalError: error,
    });
  }

  if (code && NETWORK_CODES.has(code)) {
    return new AppError({
      type: ErrorType.NETWORK_ERROR,
      message: `Network error: ${message}`,
      context,
      originalError: error,
    });
  }

  if (axios.isAxiosError(error) && !error.response && error.request) {
    return new AppError({
      type: ErrorType.NETWORK_ERROR,
      message: `No response from remote: ${message}`,
      context,
      originalError: error,
    });
  }

  // Unknown error
  return new AppError({
    type: ErrorType.UNKNOWN_ERROR,
    message,
    context,
    originalError: error,
  });
}

/**
 * Sleep utility for retry delays
 */
export function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

/**
 * Format error for logging
 */
export function formatError(error: unknown): string {
  if (error instanceof AppError) {
    const parts = [
      `[${error.type}] ${error.message}`,
      error.context ? `Context: ${JSON.stringify(error.context)}` : '',
      error.httpStatus ? `HTTP ${error.httpStatus}` : '',
    ].filter(Boolean);
    return parts.join(' | ');
  }

  if (axios.isAxiosError(error) && error.response) {
    return `HTTP ${error.response.status}: ${JSON.stringify(error.response.data)}`;
  }

  if (error instanceof UsageError) {
    return `[USAGE] ${error.message}`;
  }

  return error instanceof Error ? error.message : String(error);
}
