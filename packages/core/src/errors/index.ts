/**
 * @relaygate/core - Error taxonomy
 *
 * Adapter errors are thrown by completion adapters and classified by the
 * Execution Client into an AttemptOutcome. Request-level errors are the only
 * failures surfaced to callers of `route()`.
 */

import type { AttemptOutcome } from '../types/index.js';

// ---------------------------------------------------------------------------
// Base
// ---------------------------------------------------------------------------

export class RelaygateError extends Error {
  readonly code: string;

  constructor(message: string, code: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'RelaygateError';
    this.code = code;
  }
}

// ---------------------------------------------------------------------------
// Adapter errors
// ---------------------------------------------------------------------------

export type AdapterErrorKind = Exclude<AttemptOutcome, 'success' | 'cancelled'>;

export abstract class AdapterError extends RelaygateError {
  abstract readonly kind: AdapterErrorKind;
}

export class AuthError extends AdapterError {
  readonly kind = 'auth_error';

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'ADAPTER_AUTH', options);
    this.name = 'AuthError';
  }
}

export class RateLimitError extends AdapterError {
  readonly kind = 'rate_limit';

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'ADAPTER_RATE_LIMIT', options);
    this.name = 'RateLimitError';
  }
}

export class ProviderTimeoutError extends AdapterError {
  readonly kind = 'timeout';

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'ADAPTER_TIMEOUT', options);
    this.name = 'ProviderTimeoutError';
  }
}

export class TransportError extends AdapterError {
  readonly kind = 'transport_error';

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'ADAPTER_TRANSPORT', options);
    this.name = 'TransportError';
  }
}

export class MalformedResponseError extends AdapterError {
  readonly kind = 'malformed_response';

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'ADAPTER_MALFORMED', options);
    this.name = 'MalformedResponseError';
  }
}

// ---------------------------------------------------------------------------
// HTTP helpers
// ---------------------------------------------------------------------------

/**
 * Carries an HTTP status code so the Execution Client can classify it.
 */
export class HttpError extends RelaygateError {
  constructor(
    message: string,
    public readonly statusCode: number,
  ) {
    super(message, 'HTTP_ERROR');
    this.name = 'HttpError';
  }
}

/**
 * Map an HTTP status code onto the adapter failure taxonomy.
 *
 *   - 401, 403        -> auth_error
 *   - 429             -> rate_limit
 *   - 408, 504        -> timeout
 *   - anything else   -> transport_error (5xx, 0 for network failures, 4xx)
 */
export function classifyHttpStatus(statusCode: number): AdapterErrorKind {
  if (statusCode === 401 || statusCode === 403) {
    return 'auth_error';
  }
  if (statusCode === 429) {
    return 'rate_limit';
  }
  if (statusCode === 408 || statusCode === 504) {
    return 'timeout';
  }
  return 'transport_error';
}

/**
 * Build the adapter error matching an HTTP failure.
 */
export function adapterErrorFromStatus(statusCode: number, message: string): AdapterError {
  switch (classifyHttpStatus(statusCode)) {
    case 'auth_error':
      return new AuthError(message);
    case 'rate_limit':
      return new RateLimitError(message);
    case 'timeout':
      return new ProviderTimeoutError(message);
    case 'malformed_response':
      return new MalformedResponseError(message);
    case 'transport_error':
      return new TransportError(message);
  }
}

// ---------------------------------------------------------------------------
// Request-level errors
// ---------------------------------------------------------------------------

/** No eligible backend for the request. Fatal, raised before any execution. */
export class NoProviderAvailableError extends RelaygateError {
  constructor(
    message: string,
    public readonly requestId?: string,
  ) {
    super(message, 'NO_PROVIDER_AVAILABLE');
    this.name = 'NoProviderAvailableError';
  }
}

export type RejectionReason = 'unsafe' | 'low_confidence' | 'judge_failure';

/** The answer was refused by verification. Never carries the refused content. */
export class VerificationRejectedError extends RelaygateError {
  constructor(
    message: string,
    public readonly reason: RejectionReason,
    public readonly requestId: string,
  ) {
    super(message, 'VERIFICATION_REJECTED');
    this.name = 'VerificationRejectedError';
  }
}

export class RequestCancelledError extends RelaygateError {
  constructor(public readonly requestId: string) {
    super(`Request "${requestId}" was cancelled`, 'REQUEST_CANCELLED');
    this.name = 'RequestCancelledError';
  }
}

// ---------------------------------------------------------------------------
// Configuration errors
// ---------------------------------------------------------------------------

export class EscalationChainError extends RelaygateError {
  constructor(message: string) {
    super(message, 'ESCALATION_CHAIN_INVALID');
    this.name = 'EscalationChainError';
  }
}

export class ConfigValidationError extends RelaygateError {
  constructor(
    message: string,
    public readonly issues: Array<{ path: string; message: string }>,
  ) {
    super(message, 'CONFIG_INVALID');
    this.name = 'ConfigValidationError';
  }
}

/**
 * Normalise an unknown thrown value into a message string.
 */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
