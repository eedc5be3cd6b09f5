import type { Context, MiddlewareHandler } from 'hono';
import { getCookie, setCookie, deleteCookie } from 'hono/cookie';
import type { RelayEnv } from '../types/hono.js';
import type { EncryptedArtifact } from '../types/token.js';
import type { ArtifactAttributes, ArtifactSink } from '../host/auth-hooks.js';
import type { TokenSupplier, SupplierResult } from '../services/token-supplier.js';
import { type TokenKey, encodeTokenBundle } from '../crypto/token-codec.js';
import { SUPPLIER_AUTH_REQUIRED } from '../errors/error-codes.js';

/**
 * Artifact sink writing `__Host-` prefixed cookies on the outgoing response
 */
export class HonoCookieSink implements ArtifactSink {
  private readonly c: Context;

  constructor(c: Context) {
    this.c = c;
  }

  store(artifact: EncryptedArtifact, attributes: ArtifactAttributes): void {
    setCookie(this.c, attributes.name, artifact, {
      prefix: 'host',
      path: attributes.path,
      httpOnly: attributes.httpOnly,
      secure: attributes.secure,
      sameSite: attributes.sameSite,
      maxAge: attributes.maxAge,
    });
  }

  clear(attributes: ArtifactAttributes): void {
    deleteCookie(this.c, attributes.name, {
      prefix: 'host',
      path: attributes.path,
      httpOnly: attributes.httpOnly,
      secure: attributes.secure,
      sameSite: attributes.sameSite,
    });
  }
}

/**
 * Read the stored artifact from the request's `__Host-` cookie
 */
export function readArtifact(c: Context, attributes: ArtifactAttributes): EncryptedArtifact | undefined {
  return getCookie(c, attributes.name, 'host');
}

export interface TokenCookiesOptions {
  supplier: TokenSupplier;
  key: TokenKey;
  attributes: ArtifactAttributes;
}

/**
 * Expose `getAccessToken` on the context
 *
 * Persists a rotated refresh token by overwriting the cookie, and clears a
 * cookie that can no longer produce tokens (undecodable, or the grant was
 * revoked) so the browser stops sending it.
 */
export function tokenCookies(options: TokenCookiesOptions): MiddlewareHandler<RelayEnv> {
  const { supplier, key, attributes } = options;

  return async (c, next) => {
    const sink = new HonoCookieSink(c);

    c.set('getAccessToken', async (): Promise<SupplierResult> => {
      const result = await supplier.getAccessToken(readArtifact(c, attributes));

      if (result.ok) {
        const rotated = result.value.rotatedBundle;
        if (rotated) {
          sink.store(encodeTokenBundle(rotated, key), attributes);
        }
      } else if (result.error.category === SUPPLIER_AUTH_REQUIRED && result.error.reason !== 'no_artifact') {
        sink.clear(attributes);
      }

      return result;
    });

    await next();
  };
}
