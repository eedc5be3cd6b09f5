import type { ErrorHandler, MiddlewareHandler } from 'hono';
import { HTTPException } from 'hono/http-exception';
import type { RelayEnv } from '../types/hono.js';
import { SupplierError } from '../errors/supplier-error.js';
import { ConfigError } from '../errors/config-error.js';
import { ProviderError } from '../errors/provider-error.js';
import { SignInError } from '../errors/signin-error.js';
import { SUPPLIER_CONFIG_ERROR, SUPPLIER_PUBLIC_MESSAGES } from '../errors/error-codes.js';
import {
  TOKEN_CACHE_CONTROL,
  TOKEN_PRAGMA,
  HEADER_CACHE_CONTROL,
  HEADER_PRAGMA,
  HEADER_RETRY_AFTER,
  TRANSIENT_RETRY_AFTER_SECONDS,
} from '../config/constants.js';

/**
 * Global error handler
 *
 * Operators get the full error in the log; users get a category and a
 * message that never includes provider detail or token material.
 */
export const relayErrorHandler: ErrorHandler<RelayEnv> = (err, c) => {
  c.header(HEADER_CACHE_CONTROL, TOKEN_CACHE_CONTROL);
  c.header(HEADER_PRAGMA, TOKEN_PRAGMA);

  if (err instanceof ProviderError) {
    return supplierErrorResponse(SupplierError.fromProviderError(err), c);
  }

  if (err instanceof SupplierError) {
    return supplierErrorResponse(err, c);
  }

  if (err instanceof ConfigError) {
    console.error('Configuration error:', err);
    return c.json(
      {
        error: SUPPLIER_CONFIG_ERROR,
        error_description: SUPPLIER_PUBLIC_MESSAGES[SUPPLIER_CONFIG_ERROR],
      },
      500
    );
  }

  if (err instanceof SignInError) {
    console.warn(`Sign-in failed: ${err.code}: ${err.description}`);
    return c.json(err.toJSON(), err.statusCode);
  }

  if (err instanceof HTTPException) {
    return err.getResponse();
  }

  console.error('Unhandled error:', err);

  return c.json(
    {
      error: 'server_error',
      error_description:
        process.env['NODE_ENV'] === 'production' ? 'An unexpected error occurred' : err.message,
    },
    500
  );
};

function supplierErrorResponse(err: SupplierError, c: Parameters<ErrorHandler<RelayEnv>>[1]) {
  if (err.isOperatorFacing) {
    console.error(`Token supplier ${err.category} (${err.reason}):`, err);
  } else if (err.retryable) {
    console.warn(`Token supplier ${err.category} (${err.reason}): ${err.message}`);
    c.header(HEADER_RETRY_AFTER, String(TRANSIENT_RETRY_AFTER_SECONDS));
  }

  return c.json(err.toJSON(), err.statusCode);
}

/**
 * Security headers middleware
 */
export function securityHeaders(): MiddlewareHandler<RelayEnv> {
  return async (c, next) => {
    await next();

    // Prevent clickjacking
    c.header('X-Frame-Options', 'DENY');

    // Prevent MIME type sniffing
    c.header('X-Content-Type-Options', 'nosniff');

    // Referrer policy
    c.header('Referrer-Policy', 'strict-origin-when-cross-origin');

    // Strict Transport Security (enable in production with HTTPS)
    if (process.env['NODE_ENV'] === 'production') {
      c.header('Strict-Transport-Security', 'max-age=31536000; includeSubDomains');
    }
  };
}

/**
 * Request logging middleware
 */
export function requestLogger(): MiddlewareHandler<RelayEnv> {
  return async (c, next) => {
    const start = Date.now();
    const method = c.req.method;
    const path = c.req.path;

    await next();

    const duration = Date.now() - start;
    const status = c.res.status;

    // Path only: query strings on the sign-in callback carry authorization codes
    console.log(
      JSON.stringify({
        timestamp: new Date().toISOString(),
        method,
        path,
        status,
        duration,
      })
    );
  };
}
