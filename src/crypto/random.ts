import { randomBytes } from 'node:crypto';

/**
 * Generate cryptographically secure random bytes as base64url string
 */
export function generateRandomBase64Url(length: number): string {
  return randomBytes(length).toString('base64url');
}

/**
 * Generate an OAuth `state` value for the sign-in redirect
 */
export function generateState(length: number = 32): string {
  return generateRandomBase64Url(length);
}

/**
 * Generate an OpenID Connect `nonce`
 */
export function generateNonce(length: number = 16): string {
  return generateRandomBase64Url(length);
}
