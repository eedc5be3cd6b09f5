import { Hono } from 'hono';
import type { RelayEnv } from '../types/hono.js';
import type { ArtifactAttributes } from '../host/auth-hooks.js';
import { HonoCookieSink } from '../middleware/token-cookies.js';
import { scopeService } from '../services/scope-service.js';
import {
  HEADER_CACHE_CONTROL,
  HEADER_PRAGMA,
  TOKEN_CACHE_CONTROL,
  TOKEN_PRAGMA,
} from '../config/constants.js';

export interface SessionRoutesOptions {
  attributes: ArtifactAttributes;
}

/**
 * Create session routes
 *
 * Routes:
 * - GET /session - Whether the stored grant still yields access tokens
 * - POST /signout - Forget the stored grant
 */
export function createSessionRoutes(options: SessionRoutesOptions): Hono<RelayEnv> {
  const { attributes } = options;
  const router = new Hono<RelayEnv>();

  // GET /session
  router.get('/session', async (c) => {
    const result = await c.var.getAccessToken();

    if (!result.ok) {
      throw result.error;
    }

    const { accessToken, scopes } = result.value;

    c.header(HEADER_CACHE_CONTROL, TOKEN_CACHE_CONTROL);
    c.header(HEADER_PRAGMA, TOKEN_PRAGMA);

    // The token itself never leaves the server
    return c.json({
      authenticated: true,
      expires_at: accessToken.expiresAt.toISOString(),
      scope: scopeService.formatScopes(scopes),
    });
  });

  // POST /signout
  router.post('/signout', (c) => {
    new HonoCookieSink(c).clear(attributes);

    c.header(HEADER_CACHE_CONTROL, TOKEN_CACHE_CONTROL);
    return c.json({ success: true });
  });

  return router;
}
