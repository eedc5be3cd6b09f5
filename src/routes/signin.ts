import { Hono } from 'hono';
import { getCookie, setCookie, deleteCookie } from 'hono/cookie';
import { zValidator } from '@hono/zod-validator';
import { z } from 'zod';
import * as jose from 'jose';
import type { RelayEnv } from '../types/hono.js';
import type { ProviderConfig } from '../types/provider.js';
import type { AuthHookRegistry } from '../host/auth-hooks.js';
import type { ProviderClient } from '../services/provider-client.js';
import { scopeService } from '../services/scope-service.js';
import { SignInError } from '../errors/signin-error.js';
import { HonoCookieSink } from '../middleware/token-cookies.js';
import { type TokenKey, sealPayload, openPayload } from '../crypto/token-codec.js';
import { generateState, generateNonce } from '../crypto/random.js';
import { generateCodeVerifier, generateCodeChallenge } from '../crypto/pkce.js';
import { constantTimeCompare } from '../crypto/hash.js';
import {
  PROVIDER_MICROSOFT,
  OPENID_SCOPE,
  PROFILE_SCOPE,
  RESPONSE_TYPE_CODE,
  CODE_CHALLENGE_METHOD_S256,
  SIGNIN_STATE_COOKIE_NAME,
  SIGNIN_STATE_PURPOSE,
  SIGNIN_STATE_MAX_AGE,
} from '../config/constants.js';

export interface SignInRoutesOptions {
  provider: ProviderConfig;
  providerClient: ProviderClient;
  hooks: AuthHookRegistry;
  key: TokenKey;
  baseUrl: string;
  now?: () => Date;
}

/**
 * Sign-in state carried across the provider redirect in a sealed cookie
 */
const signInStateSchema = z.object({
  state: z.string().min(1),
  codeVerifier: z.string().min(43),
  nonce: z.string().min(1),
  returnTo: z.string().optional(),
  createdAt: z.number().int(),
});

type SignInState = z.infer<typeof signInStateSchema>;

const initiateQuerySchema = z.object({
  return_to: z.string().optional(),
});

// URL parsing drops tabs and newlines and reads "\" as "/"
const UNSAFE_PATH_CHARACTERS = /[\s\x00-\x1f\x7f\\]/;

/**
 * Resolve `return_to` against the service origin
 *
 * @returns the path, query and fragment to redirect to, or `null` when the
 *          value is not a path on this origin
 */
export function resolveReturnTo(value: string, baseUrl: string): string | null {
  if (!value.startsWith('/') || UNSAFE_PATH_CHARACTERS.test(value)) {
    return null;
  }

  let resolved: URL;
  try {
    resolved = new URL(value, baseUrl);
  } catch {
    return null;
  }

  if (resolved.origin !== new URL(baseUrl).origin) {
    return null;
  }

  return `${resolved.pathname}${resolved.search}${resolved.hash}`;
}

const callbackQuerySchema = z.object({
  code: z.string().optional(),
  state: z.string().optional(),
  error: z.string().optional(),
  error_description: z.string().optional(),
});

const idTokenClaimsSchema = z
  .object({
    sub: z.string().optional(),
    oid: z.string().optional(),
    name: z.string().optional(),
    preferred_username: z.string().optional(),
    email: z.string().optional(),
    nonce: z.string().optional(),
  })
  .passthrough();

type IdTokenClaims = z.infer<typeof idTokenClaimsSchema>;

/**
 * Read display claims from the ID token
 *
 * The token came straight from the token endpoint over TLS, so its signature
 * is not re-verified here (OpenID Connect Core Section 3.1.3.7).
 */
function readIdTokenClaims(idToken: unknown): IdTokenClaims | null {
  if (typeof idToken !== 'string') {
    return null;
  }

  try {
    const parsed = idTokenClaimsSchema.safeParse(jose.decodeJwt(idToken));
    return parsed.success ? parsed.data : null;
  } catch {
    return null;
  }
}

function validationFailed(description: string): never {
  throw SignInError.invalidRequest(description);
}

/**
 * Create the host's sign-in routes for Microsoft
 *
 * Routes:
 * - GET /signin/microsoft - Redirect to the provider
 * - GET /signin/microsoft/callback - Exchange the code and fire sign-in hooks
 */
export function createSignInRoutes(options: SignInRoutesOptions): Hono<RelayEnv> {
  const { provider, providerClient, hooks, key, baseUrl } = options;
  const now = options.now ?? (() => new Date());
  const router = new Hono<RelayEnv>();

  const callbackUrl = `${baseUrl}/signin/${PROVIDER_MICROSOFT}/callback`;
  const stateCookieOptions = {
    prefix: 'host',
    path: '/',
    httpOnly: true,
    secure: true,
    // The callback arrives as a cross-site navigation from the provider
    sameSite: 'Lax',
  } as const;

  /**
   * GET /signin/microsoft
   */
  router.get(
    '/',
    zValidator('query', initiateQuerySchema, (result) => {
      if (!result.success) {
        validationFailed('Malformed sign-in parameters');
      }
    }),
    (c) => {
      const query = c.req.valid('query');

      let returnTo: string | undefined;
      if (query.return_to !== undefined) {
        const resolved = resolveReturnTo(query.return_to, baseUrl);
        if (resolved === null) {
          throw SignInError.invalidRequest('return_to must be a same-origin path');
        }
        returnTo = resolved;
      }

      const signInState: SignInState = {
        state: generateState(),
        codeVerifier: generateCodeVerifier(),
        nonce: generateNonce(),
        returnTo,
        createdAt: now().getTime(),
      };

      setCookie(
        c,
        SIGNIN_STATE_COOKIE_NAME,
        sealPayload(JSON.stringify(signInState), key, SIGNIN_STATE_PURPOSE),
        { ...stateCookieOptions, maxAge: SIGNIN_STATE_MAX_AGE }
      );

      const scopes = scopeService.withOfflineAccess([OPENID_SCOPE, PROFILE_SCOPE, ...provider.defaultScopes]);

      const authorizeUrl = new URL(provider.authorizationEndpoint);
      authorizeUrl.searchParams.set('client_id', provider.clientId);
      authorizeUrl.searchParams.set('response_type', RESPONSE_TYPE_CODE);
      authorizeUrl.searchParams.set('redirect_uri', callbackUrl);
      authorizeUrl.searchParams.set('response_mode', 'query');
      authorizeUrl.searchParams.set('scope', scopeService.formatScopes(scopes));
      authorizeUrl.searchParams.set('state', signInState.state);
      authorizeUrl.searchParams.set('nonce', signInState.nonce);
      authorizeUrl.searchParams.set('code_challenge', generateCodeChallenge(signInState.codeVerifier));
      authorizeUrl.searchParams.set('code_challenge_method', CODE_CHALLENGE_METHOD_S256);

      return c.redirect(authorizeUrl.toString());
    }
  );

  /**
   * GET /signin/microsoft/callback
   */
  router.get(
    '/callback',
    zValidator('query', callbackQuerySchema, (result) => {
      if (!result.success) {
        validationFailed('Malformed callback parameters');
      }
    }),
    async (c) => {
      const query = c.req.valid('query');

      // One-time use, whatever the outcome
      const sealedState = getCookie(c, SIGNIN_STATE_COOKIE_NAME, 'host');
      deleteCookie(c, SIGNIN_STATE_COOKIE_NAME, stateCookieOptions);

      if (query.error) {
        throw SignInError.accessDenied(
          `Identity provider error: ${query.error}${query.error_description ? ` - ${query.error_description}` : ''}`
        );
      }

      if (!query.code) {
        throw SignInError.invalidRequest('Missing authorization code');
      }

      if (!query.state || !sealedState) {
        throw SignInError.invalidState('Missing state parameter');
      }

      const opened = openPayload(sealedState, key, SIGNIN_STATE_PURPOSE);
      if (!opened.ok) {
        throw SignInError.invalidState();
      }

      let stateJson: unknown;
      try {
        stateJson = JSON.parse(opened.value);
      } catch {
        throw SignInError.invalidState();
      }

      const parsedState = signInStateSchema.safeParse(stateJson);
      if (!parsedState.success) {
        throw SignInError.invalidState();
      }

      const signInState = parsedState.data;
      if (now().getTime() - signInState.createdAt > SIGNIN_STATE_MAX_AGE * 1000) {
        throw SignInError.invalidState('Sign-in state has expired');
      }

      if (!constantTimeCompare(query.state, signInState.state)) {
        throw SignInError.invalidState('State mismatch');
      }

      const exchanged = await providerClient.exchangeAuthorizationCode({
        code: query.code,
        redirectUri: callbackUrl,
        codeVerifier: signInState.codeVerifier,
      });

      if (!exchanged.ok) {
        throw exchanged.error;
      }

      const tokenResponse = exchanged.value;
      const claims = readIdTokenClaims(tokenResponse['id_token']);

      if (claims?.nonce !== undefined && claims.nonce !== signInState.nonce) {
        throw SignInError.invalidState('ID token nonce mismatch');
      }

      // The refresh-token interceptor is one of these hooks
      const hookErrors = await hooks.emit({
        provider: PROVIDER_MICROSOFT,
        tokenResponse,
        sink: new HonoCookieSink(c),
      });

      const [firstError] = hookErrors;
      if (firstError) {
        throw firstError;
      }

      if (signInState.returnTo) {
        return c.redirect(signInState.returnTo);
      }

      return c.json({
        success: true,
        provider: PROVIDER_MICROSOFT,
        user: {
          id: claims?.oid ?? claims?.sub ?? null,
          name: claims?.name ?? null,
          username: claims?.preferred_username ?? claims?.email ?? null,
        },
      });
    }
  );

  return router;
}
