/**
 * Refresh-token custody record
 *
 * Immutable once created. A provider that rotates the refresh token
 * produces a new bundle; the old one is never edited.
 */
export interface TokenBundle {
  readonly refreshToken: string;
  readonly scopes: readonly string[];
  readonly issuedAt: Date;
}

/**
 * Opaque, base64url-encoded output of the token codec (a cookie value)
 */
export type EncryptedArtifact = string;

/**
 * Short-lived credential for the downstream resource API.
 * Never persisted past the call it was obtained for.
 */
export interface AccessToken {
  readonly value: string;
  readonly expiresAt: Date;
}

/**
 * Successful refresh-token redemption
 */
export interface TokenGrant {
  accessToken: AccessToken;
  /** Present only when the provider rotated the refresh token */
  refreshToken?: string;
  /** Scopes reported by the provider, or the ones requested if it reported none */
  scopes: readonly string[];
  /** True when the scope-less retry produced this grant */
  scopeFallback: boolean;
}

/**
 * Create a frozen token bundle
 */
export function createTokenBundle(params: {
  refreshToken: string;
  scopes: readonly string[];
  issuedAt: Date;
}): TokenBundle {
  return Object.freeze({
    refreshToken: params.refreshToken,
    scopes: Object.freeze([...params.scopes]),
    issuedAt: new Date(params.issuedAt.getTime()),
  });
}
