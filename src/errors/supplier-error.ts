import {
  type SupplierErrorCategory,
  SUPPLIER_AUTH_REQUIRED,
  SUPPLIER_CONFIG_ERROR,
  SUPPLIER_PROVIDER_TRANSIENT,
  SUPPLIER_PROVIDER_FATAL,
  SUPPLIER_STATUS_CODES,
  SUPPLIER_PUBLIC_MESSAGES,
} from './error-codes.js';
import type { DecodeError } from './decode-error.js';
import type { ProviderError } from './provider-error.js';

/**
 * Why the supplier could not produce an access token
 */
export type SupplierFailureReason =
  | 'no_artifact'
  | 'undecodable_artifact'
  | 'grant_rejected'
  | 'provider_unavailable'
  | 'provider_rejected_client'
  | 'scope_rejected';

/**
 * Supplier error response body
 */
export interface SupplierErrorResponse {
  error: SupplierErrorCategory;
  error_description: string;
}

/**
 * The single failure type handed to tool logic.
 *
 * Every decode and provider failure is folded into one of four categories,
 * so callers never inspect provider-specific codes.
 */
export class SupplierError extends Error {
  public readonly category: SupplierErrorCategory;
  public readonly reason: SupplierFailureReason;
  public readonly statusCode: 401 | 500 | 503;

  constructor(
    category: SupplierErrorCategory,
    reason: SupplierFailureReason,
    message: string,
    options?: { cause?: Error }
  ) {
    super(message);
    this.name = 'SupplierError';
    this.category = category;
    this.reason = reason;
    this.statusCode = SUPPLIER_STATUS_CODES[category];

    if (options?.cause) {
      this.cause = options.cause;
    }

    Error.captureStackTrace(this, this.constructor);
  }

  get retryable(): boolean {
    return this.category === SUPPLIER_PROVIDER_TRANSIENT;
  }

  /**
   * Operator-only failures: deployment problems, not user problems
   */
  get isOperatorFacing(): boolean {
    return this.category === SUPPLIER_CONFIG_ERROR || this.category === SUPPLIER_PROVIDER_FATAL;
  }

  /**
   * User-safe JSON response body
   */
  toJSON(): SupplierErrorResponse {
    return {
      error: this.category,
      error_description: SUPPLIER_PUBLIC_MESSAGES[this.category],
    };
  }

  static noArtifact(): SupplierError {
    return new SupplierError(SUPPLIER_AUTH_REQUIRED, 'no_artifact', 'No stored token artifact');
  }

  static undecodable(cause: DecodeError): SupplierError {
    return new SupplierError(SUPPLIER_AUTH_REQUIRED, 'undecodable_artifact', cause.message, { cause });
  }

  /**
   * Map a provider failure onto the supplier taxonomy
   */
  static fromProviderError(cause: ProviderError): SupplierError {
    switch (cause.kind) {
      case 'reauthenticate':
        return new SupplierError(SUPPLIER_AUTH_REQUIRED, 'grant_rejected', cause.description, { cause });

      case 'transient':
        return new SupplierError(SUPPLIER_PROVIDER_TRANSIENT, 'provider_unavailable', cause.description, {
          cause,
        });

      case 'scope_rejected':
        // Already retried without scopes and still refused
        return new SupplierError(SUPPLIER_PROVIDER_FATAL, 'scope_rejected', cause.description, { cause });

      case 'fatal':
        return new SupplierError(SUPPLIER_PROVIDER_FATAL, 'provider_rejected_client', cause.description, {
          cause,
        });
    }
  }
}
