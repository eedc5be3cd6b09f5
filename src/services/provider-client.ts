import { z } from 'zod';
import type { FetchLike, ProviderConfig, TokenEndpointResponse } from '../types/provider.js';
import type { TokenGrant } from '../types/token.js';
import { type Result, ok, err } from '../types/result.js';
import { ProviderError } from '../errors/provider-error.js';
import { scopeService } from './scope-service.js';
import {
  GRANT_TYPE_AUTHORIZATION_CODE,
  GRANT_TYPE_REFRESH_TOKEN,
  DEFAULT_ACCESS_TOKEN_TTL,
  DEFAULT_PROVIDER_TIMEOUT_MS,
  CONTENT_TYPE_FORM,
  CONTENT_TYPE_JSON,
  HEADER_CONTENT_TYPE,
  HEADER_USER_AGENT,
  USER_AGENT,
} from '../config/constants.js';

export interface ProviderClientOptions {
  config: ProviderConfig;
  /** Per-request timeout; expiry counts as a transient failure */
  timeoutMs?: number;
  fetch?: FetchLike;
  now?: () => Date;
  userAgent?: string;
}

export interface RedeemOptions {
  /** Called just before the scope-less retry is sent */
  onScopeRetry?: () => void;
}

const tokenResponseSchema = z
  .object({
    access_token: z.string().min(1),
    token_type: z.string().optional(),
    expires_in: z.coerce.number().int().nonnegative().optional(),
    refresh_token: z.string().min(1).optional(),
    id_token: z.string().optional(),
    scope: z.string().optional(),
  })
  .passthrough();

/**
 * Client for the OAuth provider's token endpoint
 *
 * Holds no per-user state; the only suspension points are the outbound
 * requests, each bounded by the configured timeout.
 */
export class ProviderClient {
  private readonly config: ProviderConfig;
  private readonly timeoutMs: number;
  private readonly fetchFn: FetchLike;
  private readonly now: () => Date;
  private readonly userAgent: string;

  constructor(options: ProviderClientOptions) {
    this.config = options.config;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_PROVIDER_TIMEOUT_MS;
    this.fetchFn = options.fetch ?? ((input, init) => fetch(input, init));
    this.now = options.now ?? (() => new Date());
    this.userAgent = options.userAgent ?? USER_AGENT;
  }

  /**
   * Redeem a refresh token for an access token
   *
   * RFC 6749 Section 6. A rejection aimed at the scope parameter is retried
   * exactly once without it, letting the provider fall back to the scopes the
   * user already consented to. Nothing else is retried here.
   */
  async redeem(
    refreshToken: string,
    scopes: readonly string[],
    options: RedeemOptions = {}
  ): Promise<Result<TokenGrant, ProviderError>> {
    const first = await this.requestRefresh(refreshToken, scopes, false);
    if (first.ok || first.error.kind !== 'scope_rejected' || scopes.length === 0) {
      return first;
    }

    options.onScopeRetry?.();
    return this.requestRefresh(refreshToken, [], true);
  }

  /**
   * Exchange an authorization code at sign-in
   *
   * Returns the raw token endpoint body, which the host hands to its
   * authentication hooks unmodified.
   */
  async exchangeAuthorizationCode(params: {
    code: string;
    redirectUri: string;
    codeVerifier?: string;
  }): Promise<Result<Record<string, unknown>, ProviderError>> {
    const form = new URLSearchParams();
    form.set('grant_type', GRANT_TYPE_AUTHORIZATION_CODE);
    form.set('client_id', this.config.clientId);
    form.set('client_secret', this.config.clientSecret);
    form.set('code', params.code);
    form.set('redirect_uri', params.redirectUri);

    if (params.codeVerifier) {
      form.set('code_verifier', params.codeVerifier);
    }

    const response = await this.postForm(form);
    if (!response.ok) {
      return response;
    }

    const parsed = tokenResponseSchema.safeParse(response.value);
    if (!parsed.success) {
      return err(ProviderError.transient('Token endpoint returned no access_token'));
    }

    return ok(parsed.data);
  }

  private async requestRefresh(
    refreshToken: string,
    scopes: readonly string[],
    scopeFallback: boolean
  ): Promise<Result<TokenGrant, ProviderError>> {
    const form = new URLSearchParams();
    form.set('grant_type', GRANT_TYPE_REFRESH_TOKEN);
    form.set('client_id', this.config.clientId);
    form.set('client_secret', this.config.clientSecret);
    form.set('refresh_token', refreshToken);

    if (scopes.length > 0) {
      form.set('scope', scopeService.formatScopes(scopes));
    }

    const response = await this.postForm(form);
    if (!response.ok) {
      return response;
    }

    const parsed = tokenResponseSchema.safeParse(response.value);
    if (!parsed.success) {
      return err(ProviderError.transient('Token refresh returned no access_token'));
    }

    return ok(this.toGrant(parsed.data, refreshToken, scopes, scopeFallback));
  }

  private toGrant(
    body: TokenEndpointResponse,
    refreshToken: string,
    requestedScopes: readonly string[],
    scopeFallback: boolean
  ): TokenGrant {
    const issuedAt = this.now().getTime();
    const expiresIn = body.expires_in ?? DEFAULT_ACCESS_TOKEN_TTL;
    const grantedScopes = scopeService.parseScopes(body.scope);

    const grant: TokenGrant = {
      accessToken: Object.freeze({
        value: body.access_token,
        expiresAt: new Date(issuedAt + expiresIn * 1000),
      }),
      scopes: grantedScopes.length > 0 ? grantedScopes : [...requestedScopes],
      scopeFallback,
    };

    if (body.refresh_token && body.refresh_token !== refreshToken) {
      grant.refreshToken = body.refresh_token;
    }

    return grant;
  }

  /**
   * POST a form to the token endpoint and read the JSON body
   */
  private async postForm(form: URLSearchParams): Promise<Result<unknown, ProviderError>> {
    const signal = AbortSignal.timeout(this.timeoutMs);

    let response: Response;
    try {
      response = await this.fetchFn(this.config.tokenEndpoint, {
        method: 'POST',
        headers: {
          [HEADER_CONTENT_TYPE]: CONTENT_TYPE_FORM,
          Accept: CONTENT_TYPE_JSON,
          [HEADER_USER_AGENT]: this.userAgent,
        },
        body: form.toString(),
        signal,
      });
    } catch (error) {
      return err(toTransportError(error, this.timeoutMs));
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch (error) {
      if (signal.aborted) {
        return err(toTransportError(signal.reason, this.timeoutMs));
      }
      if (response.ok) {
        return err(ProviderError.transient('Token endpoint returned an unreadable body', { cause: error }));
      }
      body = null;
    }

    if (!response.ok) {
      return err(ProviderError.fromResponse(response.status, body));
    }

    return ok(body);
  }
}

function toTransportError(error: unknown, timeoutMs: number): ProviderError {
  if (error instanceof Error && (error.name === 'TimeoutError' || error.name === 'AbortError')) {
    return ProviderError.transient(`Token endpoint did not respond within ${timeoutMs}ms`, { cause: error });
  }
  return ProviderError.transient('Token endpoint request failed', { cause: error });
}
