import { z } from 'zod';
import type {
  ArtifactAttributes,
  AuthenticationEvent,
  AuthenticationHost,
} from '../host/auth-hooks.js';
import type { TokenBundle } from '../types/token.js';
import { createTokenBundle } from '../types/token.js';
import { type Result, ok, err } from '../types/result.js';
import { ConfigError } from '../errors/config-error.js';
import { type TokenKey, encodeTokenBundle } from '../crypto/token-codec.js';
import { scopeService } from './scope-service.js';
import { DEFAULT_TOKEN_COOKIE_MAX_AGE, DEFAULT_TOKEN_COOKIE_NAME, PROVIDER_MICROSOFT } from '../config/constants.js';

export interface CallbackInterceptorOptions {
  key: TokenKey;
  /** Scopes recorded when the provider's response omits `scope` */
  defaultScopes: readonly string[];
  /** Only sign-ins through this provider are captured */
  provider?: string;
  cookieName?: string;
  cookieMaxAge?: number;
  now?: () => Date;
}

// Access and ID tokens are the host's concern and are not read here
const callbackTokenResponseSchema = z.object({
  refresh_token: z.string().min(1).optional(),
  scope: z.string().optional(),
});

/**
 * Captures the provider's refresh token at sign-in and stores it,
 * encrypted, through the event's artifact sink
 */
export class CallbackInterceptor {
  private readonly key: TokenKey;
  private readonly defaultScopes: readonly string[];
  private readonly provider: string;
  private readonly now: () => Date;
  private readonly registrations = new WeakMap<AuthenticationHost, () => void>();

  readonly attributes: ArtifactAttributes;

  constructor(options: CallbackInterceptorOptions) {
    this.key = options.key;
    this.defaultScopes = options.defaultScopes;
    this.provider = options.provider ?? PROVIDER_MICROSOFT;
    this.now = options.now ?? (() => new Date());
    this.attributes = Object.freeze({
      name: options.cookieName ?? DEFAULT_TOKEN_COOKIE_NAME,
      maxAge: options.cookieMaxAge ?? DEFAULT_TOKEN_COOKIE_MAX_AGE,
      httpOnly: true,
      secure: true,
      sameSite: 'Strict',
      path: '/',
    });
  }

  /**
   * Register against the host's sign-in hook. Registering twice with the
   * same host keeps the first registration.
   *
   * @returns a function that removes the registration
   */
  register(host: AuthenticationHost): () => void {
    const existing = this.registrations.get(host);
    if (existing) {
      return existing;
    }

    const remove = host.onAuthenticated((event) => this.handle(event));
    const unregister = () => {
      remove();
      this.registrations.delete(host);
    };

    this.registrations.set(host, unregister);
    return unregister;
  }

  /**
   * Handle one sign-in
   *
   * @returns the stored bundle, `null` for another provider's sign-in, or a
   *          ConfigError when the provider issued no refresh token
   */
  handle(event: AuthenticationEvent): Result<TokenBundle | null, ConfigError> {
    if (event.provider !== this.provider) {
      return ok(null);
    }

    const parsed = callbackTokenResponseSchema.safeParse(event.tokenResponse);
    if (!parsed.success || !parsed.data.refresh_token) {
      return err(ConfigError.missingRefreshToken(this.provider));
    }

    const granted = scopeService.parseScopes(parsed.data.scope);

    const bundle = createTokenBundle({
      refreshToken: parsed.data.refresh_token,
      scopes: granted.length > 0 ? granted : this.defaultScopes,
      issuedAt: this.now(),
    });

    event.sink.store(encodeTokenBundle(bundle, this.key), this.attributes);

    return ok(bundle);
  }
}
