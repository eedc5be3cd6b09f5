import { createHash } from 'node:crypto';
import { generateRandomBase64Url } from './random.js';

/**
 * Generate a PKCE code verifier
 * RFC 7636 Section 4.1
 *
 * 48 random bytes encode to 64 base64url characters, inside the 43-128 range
 */
export function generateCodeVerifier(): string {
  return generateRandomBase64Url(48);
}

/**
 * Generate a code challenge from a code verifier using S256 method
 * RFC 7636 Section 4.2
 *
 * code_challenge = BASE64URL(SHA256(code_verifier))
 */
export function generateCodeChallenge(codeVerifier: string): string {
  return createHash('sha256').update(codeVerifier, 'ascii').digest('base64url');
}
