import { z } from 'zod';
import type { TokenEndpointErrorResponse } from '../types/provider.js';
import {
  ERROR_INVALID_SCOPE,
  REAUTHENTICATE_ERRORS,
  TRANSIENT_ERRORS,
  SCOPE_REJECTION_AADSTS_CODES,
} from './error-codes.js';

/**
 * How a failed token endpoint call should be handled
 *
 * - `scope_rejected`: the scope parameter was refused; retry once without it
 * - `reauthenticate`: the refresh token is invalid, expired or revoked
 * - `transient`: network failure, timeout or provider outage
 * - `fatal`: client credentials or request are wrong; never retried
 */
export type ProviderErrorKind = 'scope_rejected' | 'reauthenticate' | 'transient' | 'fatal';

export const tokenErrorResponseSchema = z
  .object({
    error: z.string().min(1),
    error_description: z.string().optional(),
    error_uri: z.string().optional(),
    error_codes: z.array(z.number()).optional(),
    correlation_id: z.string().optional(),
    trace_id: z.string().optional(),
  })
  .passthrough();

/**
 * Failure talking to the OAuth provider's token endpoint
 */
export class ProviderError extends Error {
  public readonly kind: ProviderErrorKind;
  public readonly description: string;
  public readonly status?: number;
  public readonly code?: string;
  public readonly providerCodes: readonly number[];
  public readonly correlationId?: string;

  constructor(
    kind: ProviderErrorKind,
    description: string,
    options?: {
      status?: number;
      code?: string;
      providerCodes?: readonly number[];
      correlationId?: string;
      cause?: unknown;
    }
  ) {
    super(description);
    this.name = 'ProviderError';
    this.kind = kind;
    this.description = description;
    this.status = options?.status;
    this.code = options?.code;
    this.providerCodes = options?.providerCodes ?? [];
    this.correlationId = options?.correlationId;

    if (options?.cause !== undefined) {
      this.cause = options.cause;
    }

    Error.captureStackTrace(this, this.constructor);
  }

  get retryable(): boolean {
    return this.kind === 'transient';
  }

  static transient(description: string, options?: { status?: number; cause?: unknown }): ProviderError {
    return new ProviderError('transient', description, options);
  }

  static fatal(description: string, options?: { status?: number; cause?: unknown }): ProviderError {
    return new ProviderError('fatal', description, options);
  }

  /**
   * Build from a non-2xx token endpoint response
   */
  static fromResponse(status: number, body: unknown): ProviderError {
    const parsed = tokenErrorResponseSchema.safeParse(body);
    const errorBody = parsed.success ? parsed.data : null;

    return new ProviderError(
      classifyTokenError(status, errorBody),
      errorBody?.error_description ?? errorBody?.error ?? `HTTP ${status}`,
      {
        status,
        code: errorBody?.error,
        providerCodes: errorBody?.error_codes,
        correlationId: errorBody?.correlation_id,
      }
    );
  }
}

/**
 * Does the provider object to the scope parameter rather than the grant?
 */
export function isScopeRejection(body: TokenEndpointErrorResponse): boolean {
  if (body.error === ERROR_INVALID_SCOPE) {
    return true;
  }

  const codes = body.error_codes ?? [];
  if (codes.some((code) => SCOPE_REJECTION_AADSTS_CODES.includes(code))) {
    return true;
  }

  const description = body.error_description ?? '';
  return SCOPE_REJECTION_AADSTS_CODES.some((code) => description.includes(`AADSTS${code}:`));
}

/**
 * Classify a token endpoint failure
 */
export function classifyTokenError(
  status: number,
  body: TokenEndpointErrorResponse | null
): ProviderErrorKind {
  if (body) {
    if (isScopeRejection(body)) {
      return 'scope_rejected';
    }
    if (REAUTHENTICATE_ERRORS.includes(body.error)) {
      return 'reauthenticate';
    }
    if (TRANSIENT_ERRORS.includes(body.error)) {
      return 'transient';
    }
  }

  if (status >= 500 || status === 429) {
    return 'transient';
  }

  return 'fatal';
}
