import { describe, it, expect } from 'vitest';
import { inspect } from 'node:util';
import {
  TokenKey,
  encodeTokenBundle,
  decodeTokenBundle,
  sealPayload,
  openPayload,
  TOKEN_BUNDLE_PURPOSE,
} from '../../crypto/token-codec.js';
import { createTokenBundle } from '../../types/token.js';
import { T0, TEST_ENCRYPTION_KEY } from '../test-setup.js';

const BASE64URL_ALPHABET = 'ABCDEFGHIJKLMNOPQRSTUVWXYZabcdefghijklmnopqrstuvwxyz0123456789-_';

describe('TokenCodec', () => {
  const key = TokenKey.fromSecret(TEST_ENCRYPTION_KEY);

  const bundle = createTokenBundle({
    refreshToken: 'RT1',
    scopes: ['Files.Read'],
    issuedAt: T0,
  });

  describe('round trip', () => {
    it('should decode what it encodes', () => {
      const artifact = encodeTokenBundle(bundle, key);
      const decoded = decodeTokenBundle(artifact, key);

      expect(decoded.ok).toBe(true);
      if (!decoded.ok) return;

      expect(decoded.value.refreshToken).toBe('RT1');
      expect(decoded.value.scopes).toEqual(['Files.Read']);
      expect(decoded.value.issuedAt.getTime()).toBe(T0.getTime());
    });

    it('should preserve scope order and unicode refresh tokens', () => {
      const original = createTokenBundle({
        refreshToken: 'rt-ünïcødé-✓',
        scopes: ['User.Read', 'Files.Read', 'Mail.Send'],
        issuedAt: T0,
      });

      const decoded = decodeTokenBundle(encodeTokenBundle(original, key), key);

      expect(decoded.ok && decoded.value.refreshToken).toBe('rt-ünïcødé-✓');
      expect(decoded.ok && decoded.value.scopes).toEqual(['User.Read', 'Files.Read', 'Mail.Send']);
    });

    it('should round trip an empty scope list', () => {
      const original = createTokenBundle({ refreshToken: 'RT1', scopes: [], issuedAt: T0 });
      const decoded = decodeTokenBundle(encodeTokenBundle(original, key), key);

      expect(decoded.ok && decoded.value.scopes).toEqual([]);
    });

    it('should return frozen bundles', () => {
      const decoded = decodeTokenBundle(encodeTokenBundle(bundle, key), key);

      expect(decoded.ok).toBe(true);
      if (!decoded.ok) return;

      expect(Object.isFrozen(decoded.value)).toBe(true);
      expect(Object.isFrozen(decoded.value.scopes)).toBe(true);
    });

    it('should produce a different artifact each time', () => {
      expect(encodeTokenBundle(bundle, key)).not.toBe(encodeTokenBundle(bundle, key));
    });

    it('should produce URL- and cookie-safe artifacts', () => {
      expect(encodeTokenBundle(bundle, key)).toMatch(/^[A-Za-z0-9_-]+$/);
    });

    it('should not contain the refresh token in clear', () => {
      const artifact = encodeTokenBundle(bundle, key);
      const raw = Buffer.from(artifact, 'base64url').toString('latin1');

      expect(raw.includes('RT1')).toBe(false);
    });

    it('should decode with a key derived again from the same secret', () => {
      const artifact = encodeTokenBundle(bundle, key);
      const decoded = decodeTokenBundle(artifact, TokenKey.fromSecret(TEST_ENCRYPTION_KEY));

      expect(decoded.ok).toBe(true);
    });
  });

  describe('tamper detection', () => {
    it('should reject a flip of any single byte', () => {
      const artifact = encodeTokenBundle(bundle, key);
      const bytes = Buffer.from(artifact, 'base64url');

      for (let i = 0; i < bytes.length; i++) {
        const tampered = Buffer.from(bytes);
        tampered[i] = (tampered[i] ?? 0) ^ 0x01;

        const decoded = decodeTokenBundle(tampered.toString('base64url'), key);
        expect(decoded.ok, `byte ${i}`).toBe(false);
      }
    });

    it('should reject a substitution of any single character', () => {
      const artifact = encodeTokenBundle(bundle, key);

      for (let i = 0; i < artifact.length; i++) {
        const current = artifact.charAt(i);
        const replacement = BASE64URL_ALPHABET.charAt((BASE64URL_ALPHABET.indexOf(current) + 1) % 64);
        const tampered = artifact.slice(0, i) + replacement + artifact.slice(i + 1);

        const decoded = decodeTokenBundle(tampered, key);
        expect(decoded.ok, `character ${i}`).toBe(false);
      }
    });

    it('should report a changed version byte as unsupported', () => {
      const bytes = Buffer.from(encodeTokenBundle(bundle, key), 'base64url');
      bytes[0] = 2;

      const decoded = decodeTokenBundle(bytes.toString('base64url'), key);

      expect(decoded.ok).toBe(false);
      if (decoded.ok) return;
      expect(decoded.error.reason).toBe('unsupported_version');
    });

    it('should report a changed ciphertext byte as an authentication failure', () => {
      const bytes = Buffer.from(encodeTokenBundle(bundle, key), 'base64url');
      const last = bytes.length - 1;
      bytes[last] = (bytes[last] ?? 0) ^ 0xff;

      const decoded = decodeTokenBundle(bytes.toString('base64url'), key);

      expect(decoded.ok).toBe(false);
      if (decoded.ok) return;
      expect(decoded.error.reason).toBe('authentication_failed');
    });

    it('should reject truncated artifacts', () => {
      const artifact = encodeTokenBundle(bundle, key);

      for (const length of [0, 4, 20, 38, artifact.length - 4]) {
        expect(decodeTokenBundle(artifact.slice(0, length), key).ok).toBe(false);
      }
    });

    it('should reject characters outside the base64url alphabet', () => {
      const artifact = encodeTokenBundle(bundle, key);

      for (const suffix of ['=', '+', '/', ' ', '.']) {
        const decoded = decodeTokenBundle(`${artifact}${suffix}`, key);
        expect(decoded.ok).toBe(false);
        if (decoded.ok) continue;
        expect(decoded.error.reason).toBe('malformed');
      }
    });

    it('should reject a header-only artifact as malformed', () => {
      const decoded = decodeTokenBundle(Buffer.alloc(28, 1).toString('base64url'), key);

      expect(decoded.ok).toBe(false);
      if (decoded.ok) return;
      expect(decoded.error.reason).toBe('malformed');
    });
  });

  describe('key mismatch', () => {
    it('should fail to decode under a different secret', () => {
      const artifact = encodeTokenBundle(bundle, key);
      const decoded = decodeTokenBundle(artifact, TokenKey.fromSecret('another-test-secret'));

      expect(decoded.ok).toBe(false);
      if (decoded.ok) return;
      expect(decoded.error.reason).toBe('authentication_failed');
    });

    it('should not echo artifact contents in the error', () => {
      const artifact = encodeTokenBundle(bundle, key);
      const decoded = decodeTokenBundle(artifact, TokenKey.fromSecret('another-test-secret'));

      expect(decoded.ok).toBe(false);
      if (decoded.ok) return;
      expect(decoded.error.message).toBe(
        'Artifact failed authentication (tampered, or sealed under another key)'
      );
    });
  });

  describe('purpose binding', () => {
    it('should not open a payload sealed for another purpose', () => {
      const sealed = sealPayload('{"state":"abc"}', key, 'signin-state');

      expect(openPayload(sealed, key, 'signin-state')).toEqual({ ok: true, value: '{"state":"abc"}' });
      expect(openPayload(sealed, key, TOKEN_BUNDLE_PURPOSE).ok).toBe(false);
    });

    it('should not decode a sealed non-bundle payload as a bundle', () => {
      const sealed = sealPayload('{"rt":"RT1"}', key, TOKEN_BUNDLE_PURPOSE);
      const decoded = decodeTokenBundle(sealed, key);

      expect(decoded.ok).toBe(false);
      if (decoded.ok) return;
      expect(decoded.error.reason).toBe('invalid_payload');
    });

    it('should reject a sealed payload that is not JSON', () => {
      const decoded = decodeTokenBundle(sealPayload('not json', key, TOKEN_BUNDLE_PURPOSE), key);

      expect(decoded.ok).toBe(false);
      if (decoded.ok) return;
      expect(decoded.error.reason).toBe('invalid_payload');
    });
  });

  describe('TokenKey', () => {
    it('should never print key material', () => {
      expect(String(key)).toBe('[TokenKey]');
      expect(JSON.stringify({ key })).toBe('{"key":"[TokenKey]"}');
      expect(inspect(key)).toBe('[TokenKey]');
    });
  });
});
