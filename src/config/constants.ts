/**
 * Token relay constants
 */

// Grant types
export const GRANT_TYPE_AUTHORIZATION_CODE = 'authorization_code' as const;
export const GRANT_TYPE_REFRESH_TOKEN = 'refresh_token' as const;

// Response types
export const RESPONSE_TYPE_CODE = 'code' as const;

// Code challenge methods (RFC 9700: S256 only)
export const CODE_CHALLENGE_METHOD_S256 = 'S256' as const;

// Provider
export const PROVIDER_MICROSOFT = 'microsoft' as const;
export const DEFAULT_MICROSOFT_AUTHORITY = 'https://login.microsoftonline.com';

// OpenID Connect scopes
export const OPENID_SCOPE = 'openid' as const;
export const PROFILE_SCOPE = 'profile' as const;
export const OFFLINE_ACCESS_SCOPE = 'offline_access' as const;

// Default TTLs (in seconds)
export const DEFAULT_ACCESS_TOKEN_TTL = 3600; // 1 hour, when the provider omits expires_in
export const DEFAULT_TOKEN_COOKIE_MAX_AGE = 7776000; // 90 days
export const SIGNIN_STATE_MAX_AGE = 600; // 10 minutes

// Provider call timeout (in milliseconds)
export const DEFAULT_PROVIDER_TIMEOUT_MS = 5000;

// Cookies
export const DEFAULT_TOKEN_COOKIE_NAME = 'ms_graph';
export const SIGNIN_STATE_COOKIE_NAME = 'ms_signin';
export const SIGNIN_STATE_PURPOSE = 'signin-state';

// Minimum length of the shared secret used for key derivation
export const MIN_ENCRYPTION_KEY_LENGTH = 16;

// HTTP headers
export const HEADER_CONTENT_TYPE = 'Content-Type';
export const HEADER_CACHE_CONTROL = 'Cache-Control';
export const HEADER_PRAGMA = 'Pragma';
export const HEADER_RETRY_AFTER = 'Retry-After';
export const HEADER_USER_AGENT = 'User-Agent';

// Content types
export const CONTENT_TYPE_JSON = 'application/json';
export const CONTENT_TYPE_FORM = 'application/x-www-form-urlencoded';

// Cache control for responses touching token state
export const TOKEN_CACHE_CONTROL = 'no-store';
export const TOKEN_PRAGMA = 'no-cache';

// Seconds a client should wait after a transient provider failure
export const TRANSIENT_RETRY_AFTER_SECONDS = 5;

export const USER_AGENT = 'graph-token-relay/0.1.0';
