/**
 * Token endpoint error codes
 * RFC 6749 Section 5.2, OpenID Connect Core Section 3.1.2.6
 */

export const ERROR_INVALID_REQUEST = 'invalid_request' as const;
export const ERROR_INVALID_CLIENT = 'invalid_client' as const;
export const ERROR_INVALID_GRANT = 'invalid_grant' as const;
export const ERROR_UNAUTHORIZED_CLIENT = 'unauthorized_client' as const;
export const ERROR_UNSUPPORTED_GRANT_TYPE = 'unsupported_grant_type' as const;
export const ERROR_INVALID_SCOPE = 'invalid_scope' as const;
export const ERROR_SERVER_ERROR = 'server_error' as const;
export const ERROR_TEMPORARILY_UNAVAILABLE = 'temporarily_unavailable' as const;
export const ERROR_INTERACTION_REQUIRED = 'interaction_required' as const;
export const ERROR_CONSENT_REQUIRED = 'consent_required' as const;
export const ERROR_LOGIN_REQUIRED = 'login_required' as const;

/**
 * Provider errors that mean the refresh token itself is no longer usable
 */
export const REAUTHENTICATE_ERRORS: readonly string[] = [
  ERROR_INVALID_GRANT,
  ERROR_INTERACTION_REQUIRED,
  ERROR_CONSENT_REQUIRED,
  ERROR_LOGIN_REQUIRED,
];

/**
 * Provider errors that may clear up on their own
 */
export const TRANSIENT_ERRORS: readonly string[] = [
  ERROR_SERVER_ERROR,
  ERROR_TEMPORARILY_UNAVAILABLE,
];

/**
 * Microsoft identity platform (AADSTS) codes that reject the scope parameter
 * rather than the grant:
 * - 70011: the provided value for the input parameter 'scope' is not valid
 * - 28000: scope contains more than one resource
 * - 28002: scope is not valid for the requested resource
 * - 28003: scope cannot be empty
 */
export const SCOPE_REJECTION_AADSTS_CODES: readonly number[] = [70011, 28000, 28002, 28003];

// Supplier error categories
export const SUPPLIER_AUTH_REQUIRED = 'auth_required' as const;
export const SUPPLIER_CONFIG_ERROR = 'config_error' as const;
export const SUPPLIER_PROVIDER_TRANSIENT = 'provider_transient' as const;
export const SUPPLIER_PROVIDER_FATAL = 'provider_fatal' as const;

export type SupplierErrorCategory =
  | typeof SUPPLIER_AUTH_REQUIRED
  | typeof SUPPLIER_CONFIG_ERROR
  | typeof SUPPLIER_PROVIDER_TRANSIENT
  | typeof SUPPLIER_PROVIDER_FATAL;

/**
 * HTTP status codes for supplier errors
 */
export const SUPPLIER_STATUS_CODES: Record<SupplierErrorCategory, 401 | 500 | 503> = {
  [SUPPLIER_AUTH_REQUIRED]: 401,
  [SUPPLIER_CONFIG_ERROR]: 500,
  [SUPPLIER_PROVIDER_TRANSIENT]: 503,
  [SUPPLIER_PROVIDER_FATAL]: 500,
};

/**
 * Messages safe to show end users. Operator detail goes to the log instead.
 */
export const SUPPLIER_PUBLIC_MESSAGES: Record<SupplierErrorCategory, string> = {
  [SUPPLIER_AUTH_REQUIRED]: 'Sign in with Microsoft to continue.',
  [SUPPLIER_CONFIG_ERROR]: 'The Microsoft integration is not configured correctly. Contact your administrator.',
  [SUPPLIER_PROVIDER_TRANSIENT]: 'Microsoft is temporarily unavailable. Try again shortly.',
  [SUPPLIER_PROVIDER_FATAL]: 'The Microsoft integration is not configured correctly. Contact your administrator.',
};
