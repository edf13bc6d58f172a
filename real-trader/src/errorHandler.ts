import { BrokerError, type BrokerErrorKind } from '../../shared/src/index.js';
import type { AlpacaErrorBody, ErrorHandlingResult } from './types.js';

const TRANSIENT_STATUSES = new Set([408, 429, 500, 502, 503, 504]);
const AUTH_STATUSES = new Set([401, 403]);
const REJECTION_STATUSES = new Set([400, 404, 409, 422]);

function isAlpacaErrorBody(value: unknown): value is AlpacaErrorBody {
  return typeof value === 'object' && value !== null && ('message' in value || 'code' in value);
}

export function classifyStatus(status: number): BrokerErrorKind {
  if (TRANSIENT_STATUSES.has(status)) return 'transient';
  if (AUTH_STATUSES.has(status)) return 'auth';
  if (REJECTION_STATUSES.has(status)) return 'rejected';
  return status >= 500 ? 'transient' : 'unknown';
}

/**
 * Maps an HTTP error response to a BrokerError. `body` is the parsed JSON
 * (or raw text) of the response.
 */
export function parseAlpacaError(status: number, body: unknown, operation: string): BrokerError {
  let detail = `HTTP ${status}`;
  let code: number | undefined;

  if (isAlpacaErrorBody(body)) {
    code = body.code;
    if (body.message) detail = `${body.message} (HTTP ${status})`;
  } else if (typeof body === 'string' && body.trim()) {
    detail = `${body.trim()} (HTTP ${status})`;
  }

  return new BrokerError(`${operation}: ${detail}`, classifyStatus(status), { status, code });
}

// Errors thrown by fetch itself: timeouts, aborts, DNS and socket failures
export function toBrokerError(error: unknown, operation: string): BrokerError {
  if (error instanceof BrokerError) return error;

  if (error instanceof Error) {
    if (error.name === 'TimeoutError' || error.name === 'AbortError') {
      return new BrokerError(`${operation}: request timed out`, 'transient');
    }
    if (error.name === 'TypeError') {
      return new BrokerError(`${operation}: network error (${error.message})`, 'transient');
    }
    return new BrokerError(`${operation}: ${error.message}`, 'unknown');
  }

  return new BrokerError(`${operation}: ${String(error)}`, 'unknown');
}

export class AlpacaErrorHandler {
  private readonly maxRetries: number;
  private readonly baseRetryDelay: number;

  constructor(options: { maxRetries?: number; retryDelay?: number } = {}) {
    this.maxRetries = options.maxRetries ?? 2;
    this.baseRetryDelay = options.retryDelay ?? 1000;
  }

  getMaxRetries(): number {
    return this.maxRetries;
  }

  handleError(error: BrokerError, attempt: number): ErrorHandlingResult {
    const shouldRetry = this.shouldRetry(error) && attempt < this.maxRetries;
    return {
      shouldRetry,
      retryDelay: shouldRetry ? this.getRetryDelay(error, attempt) : 0,
      logLevel: this.getLogLevel(error),
      message: error.message,
    };
  }

  shouldRetry(error: BrokerError): boolean {
    return error.kind === 'transient';
  }

  getRetryDelay(error: BrokerError, attempt: number): number {
    // Rate limits back off harder than plain transient failures
    const base = error.status === 429 ? this.baseRetryDelay * 5 : this.baseRetryDelay;
    return Math.min(30000, base * Math.pow(2, attempt));
  }

  private getLogLevel(error: BrokerError): ErrorHandlingResult['logLevel'] {
    switch (error.kind) {
      case 'transient':
        return 'warn';
      case 'rejected':
      case 'auth':
      case 'unknown':
        return 'error';
    }
  }
}
