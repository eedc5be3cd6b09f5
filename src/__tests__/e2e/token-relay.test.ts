import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { encodeTokenBundle, decodeTokenBundle } from '../../crypto/token-codec.js';
import { createTokenBundle } from '../../types/token.js';
import {
  createTestContext,
  getSetCookies,
  cookieHeader,
  T0,
  TOKEN_COOKIE,
  type TestContext,
} from '../test-setup.js';

describe('Token relay', () => {
  let ctx: TestContext;
  let artifact: string;

  beforeEach(() => {
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});

    ctx = createTestContext();
    artifact = encodeTokenBundle(
      createTokenBundle({ refreshToken: 'RT1', scopes: ['Files.Read'], issuedAt: T0 }),
      ctx.key
    );
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  function getSession(cookie?: string) {
    return ctx.server.app.request('/session', {
      headers: cookie === undefined ? {} : { Cookie: cookieHeader({ [TOKEN_COOKIE]: cookie }) },
    });
  }

  describe('GET /health', () => {
    it('should report ok', async () => {
      const res = await ctx.server.app.request('/health');

      expect(res.status).toBe(200);
      expect(await res.json()).toEqual({ status: 'ok' });
      expect(res.headers.get('X-Frame-Options')).toBe('DENY');
      expect(res.headers.get('X-Content-Type-Options')).toBe('nosniff');
    });
  });

  describe('GET /session', () => {
    it('should ask the user to sign in when no cookie is present', async () => {
      const res = await getSession();

      expect(res.status).toBe(401);
      expect(await res.json()).toEqual({
        error: 'auth_required',
        error_description: 'Sign in with Microsoft to continue.',
      });
      expect(res.headers.get('Cache-Control')).toBe('no-store');
      expect(res.headers.getSetCookie()).toEqual([]);
      expect(ctx.endpoint.requests).toHaveLength(0);
    });

    it('should redeem the cookie for a fresh access token', async () => {
      ctx.endpoint.replyJson({ access_token: 'AT1', token_type: 'Bearer', expires_in: 3600, scope: 'Files.Read' });

      const res = await getSession(artifact);

      expect(res.status).toBe(200);
      expect(await res.json()).toEqual({
        authenticated: true,
        expires_at: '2025-01-01T01:00:00.000Z',
        scope: 'Files.Read',
      });
      expect(res.headers.get('Cache-Control')).toBe('no-store');
      expect(res.headers.get('Pragma')).toBe('no-cache');
      expect(res.headers.getSetCookie()).toEqual([]);

      const [request] = ctx.endpoint.requests;
      expect(request?.params.get('grant_type')).toBe('refresh_token');
      expect(request?.params.get('refresh_token')).toBe('RT1');
      expect(request?.params.get('scope')).toBe('Files.Read');
    });

    it('should never return the access token itself', async () => {
      ctx.endpoint.replyJson({ access_token: 'AT1', expires_in: 3600 });

      const res = await getSession(artifact);

      expect(await res.text()).not.toContain('AT1');
    });

    it('should overwrite the cookie when the provider rotates the refresh token', async () => {
      ctx.clock.now = new Date(T0.getTime() + 86400 * 1000);
      ctx.endpoint.replyJson({ access_token: 'AT1', refresh_token: 'RT2', expires_in: 3600 });

      const res = await getSession(artifact);

      expect(res.status).toBe(200);

      const cookie = getSetCookies(res).get(TOKEN_COOKIE);
      expect(cookie?.attributes).toEqual(
        expect.arrayContaining(['Max-Age=7776000', 'Path=/', 'HttpOnly', 'Secure', 'SameSite=Strict'])
      );

      const decoded = decodeTokenBundle(cookie?.value ?? '', ctx.key);
      expect(decoded.ok).toBe(true);
      if (!decoded.ok) return;
      expect(decoded.value.refreshToken).toBe('RT2');
      expect(decoded.value.scopes).toEqual(['Files.Read']);
      expect(decoded.value.issuedAt.toISOString()).toBe('2025-01-02T00:00:00.000Z');
    });

    it('should clear the cookie when the grant was revoked', async () => {
      ctx.endpoint.replyJson(
        {
          error: 'invalid_grant',
          error_description: 'AADSTS50173: The provided grant has expired due to it being revoked.',
          error_codes: [50173],
        },
        400
      );

      const res = await getSession(artifact);

      expect(res.status).toBe(401);
      expect(await res.json()).toEqual({
        error: 'auth_required',
        error_description: 'Sign in with Microsoft to continue.',
      });

      const cookie = getSetCookies(res).get(TOKEN_COOKIE);
      expect(cookie?.value).toBe('');
      expect(cookie?.attributes).toContain('Max-Age=0');
    });

    it('should clear a cookie that cannot be decoded without calling the provider', async () => {
      const bytes = Buffer.from(artifact, 'base64url');
      bytes[20] = (bytes[20] ?? 0) ^ 0x01;

      const res = await getSession(bytes.toString('base64url'));

      expect(res.status).toBe(401);
      expect(getSetCookies(res).get(TOKEN_COOKIE)?.value).toBe('');
      expect(ctx.endpoint.requests).toHaveLength(0);
    });

    it('should report a provider outage as retryable and keep the cookie', async () => {
      ctx.endpoint.replyJson({ error: 'temporarily_unavailable', error_description: 'Try later' }, 503);

      const res = await getSession(artifact);

      expect(res.status).toBe(503);
      expect(res.headers.get('Retry-After')).toBe('5');
      expect(await res.json()).toEqual({
        error: 'provider_transient',
        error_description: 'Microsoft is temporarily unavailable. Try again shortly.',
      });
      expect(res.headers.getSetCookie()).toEqual([]);
      expect(console.warn).toHaveBeenCalledWith(
        'Token supplier provider_transient (provider_unavailable): Try later'
      );
    });

    it('should hide client misconfiguration from the user and log it', async () => {
      ctx.endpoint.replyJson(
        { error: 'invalid_client', error_description: 'AADSTS7000215: Invalid client secret provided.' },
        401
      );

      const res = await getSession(artifact);

      expect(res.status).toBe(500);
      expect(await res.json()).toEqual({
        error: 'provider_fatal',
        error_description: 'The Microsoft integration is not configured correctly. Contact your administrator.',
      });
      expect(res.headers.getSetCookie()).toEqual([]);
      expect(console.error).toHaveBeenCalledTimes(1);
    });

    it('should retry without scopes when the provider rejects them', async () => {
      ctx.endpoint
        .replyJson({ error: 'invalid_scope', error_description: 'AADSTS70011: Invalid scope.' }, 400)
        .replyJson({ access_token: 'AT1', expires_in: 3600, scope: 'Files.Read' });

      const res = await getSession(artifact);

      expect(res.status).toBe(200);
      expect(ctx.endpoint.requests.map((r) => r.params.get('scope'))).toEqual(['Files.Read', null]);
    });

    it('should read the cookie under a configured name', async () => {
      const custom = createTestContext({ TOKEN_COOKIE_NAME: 'graph' });
      custom.endpoint.replyJson({ access_token: 'AT1' });

      const res = await custom.server.app.request('/session', {
        headers: { Cookie: cookieHeader({ '__Host-graph': artifact }) },
      });

      expect(res.status).toBe(200);
    });
  });

  describe('POST /signout', () => {
    it('should clear the token cookie', async () => {
      const res = await ctx.server.app.request('/signout', {
        method: 'POST',
        headers: { Cookie: cookieHeader({ [TOKEN_COOKIE]: artifact }) },
      });

      expect(res.status).toBe(200);
      expect(await res.json()).toEqual({ success: true });

      const cookie = getSetCookies(res).get(TOKEN_COOKIE);
      expect(cookie?.value).toBe('');
      expect(cookie?.attributes).toEqual(
        expect.arrayContaining(['Max-Age=0', 'Path=/', 'HttpOnly', 'Secure', 'SameSite=Strict'])
      );
      expect(ctx.endpoint.requests).toHaveLength(0);
    });
  });

  describe('c.var.getAccessToken', () => {
    it('should hand tool routes a fresh token per call', async () => {
      ctx.endpoint.replyJson({ access_token: 'AT1' }).replyJson({ access_token: 'AT2' });

      ctx.server.app.get('/tools/files', async (c) => {
        const first = await c.var.getAccessToken();
        const second = await c.var.getAccessToken();
        return c.json({
          first: first.ok ? first.value.accessToken.value : null,
          second: second.ok ? second.value.accessToken.value : null,
        });
      });

      const res = await ctx.server.app.request('/tools/files', {
        headers: { Cookie: cookieHeader({ [TOKEN_COOKIE]: artifact }) },
      });

      expect(await res.json()).toEqual({ first: 'AT1', second: 'AT2' });
    });
  });
});
