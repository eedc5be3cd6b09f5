import { Hono } from 'hono';
import type { RelayEnv } from './types/hono.js';
import type { FetchLike } from './types/provider.js';
import type { Config } from './config/index.js';
import { AuthHookRegistry } from './host/auth-hooks.js';
import { TokenKey } from './crypto/token-codec.js';
import { ProviderClient } from './services/provider-client.js';
import { TokenSupplier, type SupplierState } from './services/token-supplier.js';
import { CallbackInterceptor } from './services/callback-interceptor.js';
import { relayErrorHandler, securityHeaders, requestLogger } from './middleware/error-handler.js';
import { tokenCookies } from './middleware/token-cookies.js';
import { createSignInRoutes } from './routes/signin.js';
import { createSessionRoutes } from './routes/session.js';
import { PROVIDER_MICROSOFT } from './config/constants.js';

export interface TokenRelayServerOptions {
  config: Config;
  /**
   * Outbound HTTP to the provider's token endpoint
   */
  fetch?: FetchLike;
  now?: () => Date;
  enableLogging?: boolean;
  /**
   * Sign-in hooks to fire after the code exchange. The refresh-token
   * interceptor is registered on it; pass one in to add your own hooks.
   */
  hooks?: AuthHookRegistry;
}

export interface TokenRelayServer {
  app: Hono<RelayEnv>;
  supplier: TokenSupplier;
  interceptor: CallbackInterceptor;
  hooks: AuthHookRegistry;
}

/**
 * Create the Microsoft Graph token relay
 */
export function createTokenRelayServer(options: TokenRelayServerOptions): TokenRelayServer {
  const { config, fetch, now, enableLogging = true, hooks = new AuthHookRegistry() } = options;

  const key = TokenKey.fromSecret(config.secrets.encryptionKey);

  const providerClient = new ProviderClient({
    config: config.provider,
    timeoutMs: config.http.timeoutMs,
    fetch,
    now,
  });

  const onTransition =
    config.logging.level === 'debug'
      ? (state: SupplierState) => console.debug(`Token supplier -> ${state}`)
      : undefined;

  const supplier = new TokenSupplier({
    key,
    providerClient,
    defaultScopes: config.provider.defaultScopes,
    now,
    onTransition,
  });

  const interceptor = new CallbackInterceptor({
    key,
    defaultScopes: config.provider.defaultScopes,
    provider: PROVIDER_MICROSOFT,
    cookieName: config.cookie.name,
    cookieMaxAge: config.cookie.maxAge,
    now,
  });
  interceptor.register(hooks);

  const app = new Hono<RelayEnv>();

  // Global error handler
  app.onError(relayErrorHandler);

  // Security headers
  app.use('*', securityHeaders());

  // Logging
  if (enableLogging) {
    app.use('*', requestLogger());
  }

  // Health check
  app.get('/health', (c) => c.json({ status: 'ok' }));

  // c.var.getAccessToken for everything below
  app.use('*', tokenCookies({ supplier, key, attributes: interceptor.attributes }));

  app.route(
    `/signin/${PROVIDER_MICROSOFT}`,
    createSignInRoutes({
      provider: config.provider,
      providerClient,
      hooks,
      key,
      baseUrl: config.server.baseUrl,
      now,
    })
  );

  app.route('/', createSessionRoutes({ attributes: interceptor.attributes }));

  return { app, supplier, interceptor, hooks };
}
