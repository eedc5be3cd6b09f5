import type { AccessToken, EncryptedArtifact, TokenBundle } from '../types/token.js';
import { createTokenBundle } from '../types/token.js';
import { type Result, ok, err } from '../types/result.js';
import { SupplierError } from '../errors/supplier-error.js';
import { type TokenKey, decodeTokenBundle } from '../crypto/token-codec.js';
import type { ProviderClient } from './provider-client.js';

/**
 * Per-call supplier states. Nothing is carried from one call to the next.
 */
export type SupplierState =
  | 'no_artifact'
  | 'decoding'
  | 'redeeming'
  | 'retrying'
  | 'succeeded'
  | 'failed';

export interface SuppliedToken {
  accessToken: AccessToken;
  scopes: readonly string[];
  /**
   * Replacement bundle when the provider rotated the refresh token.
   * The caller re-encodes it and overwrites the stored artifact.
   */
  rotatedBundle?: TokenBundle;
}

export type SupplierResult = Result<SuppliedToken, SupplierError>;

export interface TokenSupplierOptions {
  key: TokenKey;
  providerClient: ProviderClient;
  /** Requested when a bundle carries no scopes of its own */
  defaultScopes: readonly string[];
  now?: () => Date;
  onTransition?: (state: SupplierState) => void;
}

/**
 * Turns a stored artifact into a fresh access token, once per downstream call
 *
 * Access tokens are never cached: each call redeems the refresh token again,
 * so any replica holding the shared secret can serve any user.
 */
export class TokenSupplier {
  private readonly key: TokenKey;
  private readonly providerClient: ProviderClient;
  private readonly defaultScopes: readonly string[];
  private readonly now: () => Date;
  private readonly onTransition?: (state: SupplierState) => void;

  constructor(options: TokenSupplierOptions) {
    this.key = options.key;
    this.providerClient = options.providerClient;
    this.defaultScopes = options.defaultScopes;
    this.now = options.now ?? (() => new Date());
    this.onTransition = options.onTransition;
  }

  async getAccessToken(artifact: EncryptedArtifact | null | undefined): Promise<SupplierResult> {
    if (!artifact) {
      this.transition('no_artifact');
      return this.fail(SupplierError.noArtifact());
    }

    this.transition('decoding');
    const decoded = decodeTokenBundle(artifact, this.key);
    if (!decoded.ok) {
      return this.fail(SupplierError.undecodable(decoded.error));
    }

    const bundle = decoded.value;
    const scopes = bundle.scopes.length > 0 ? bundle.scopes : this.defaultScopes;

    this.transition('redeeming');
    const redeemed = await this.providerClient.redeem(bundle.refreshToken, scopes, {
      onScopeRetry: () => this.transition('retrying'),
    });

    if (!redeemed.ok) {
      return this.fail(SupplierError.fromProviderError(redeemed.error));
    }

    const grant = redeemed.value;
    const supplied: SuppliedToken = {
      accessToken: grant.accessToken,
      scopes: grant.scopes,
    };

    if (grant.refreshToken) {
      supplied.rotatedBundle = createTokenBundle({
        refreshToken: grant.refreshToken,
        scopes: bundle.scopes,
        issuedAt: this.now(),
      });
    }

    this.transition('succeeded');
    return ok(supplied);
  }

  private fail(error: SupplierError): SupplierResult {
    this.transition('failed');
    return err(error);
  }

  private transition(state: SupplierState): void {
    this.onTransition?.(state);
  }
}
