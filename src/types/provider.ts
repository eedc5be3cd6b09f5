/**
 * OAuth provider settings, read once at startup
 */
export interface ProviderConfig {
  readonly tokenEndpoint: string;
  readonly authorizationEndpoint: string;
  readonly clientId: string;
  readonly clientSecret: string;
  readonly tenantId: string;
  readonly defaultScopes: readonly string[];
}

/**
 * Successful token endpoint response
 * RFC 6749 Section 5.1
 */
export interface TokenEndpointResponse {
  access_token: string;
  token_type?: string;
  expires_in?: number;
  refresh_token?: string;
  id_token?: string;
  scope?: string;
}

/**
 * Token endpoint error response
 * RFC 6749 Section 5.2, plus the Microsoft identity platform extensions
 */
export interface TokenEndpointErrorResponse {
  error: string;
  error_description?: string;
  error_uri?: string;
  error_codes?: number[];
  correlation_id?: string;
  trace_id?: string;
}

/**
 * Minimal fetch signature, so tests can route requests into an in-process app
 */
export type FetchLike = (input: string | URL | Request, init?: RequestInit) => Promise<Response>;
