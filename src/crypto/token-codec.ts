import { createCipheriv, createDecipheriv, randomBytes, scryptSync } from 'node:crypto';
import { inspect } from 'node:util';
import { z } from 'zod';
import type { EncryptedArtifact, TokenBundle } from '../types/token.js';
import { createTokenBundle } from '../types/token.js';
import { type Result, ok, err } from '../types/result.js';
import { DecodeError } from '../errors/decode-error.js';

const ALGORITHM = 'aes-256-gcm';
const FORMAT_VERSION = 1;
const VERSION_LENGTH = 1;
const IV_LENGTH = 12;
const AUTH_TAG_LENGTH = 16;
const KEY_LENGTH = 32;
const HEADER_LENGTH = VERSION_LENGTH + IV_LENGTH + AUTH_TAG_LENGTH;

// Fixed salt: the key must be identical on every replica sharing the secret
const KDF_SALT = 'graph-token-relay/token-key/v1';

const BASE64URL_PATTERN = /^[A-Za-z0-9_-]+$/;

/**
 * Purpose label bound into the authenticated data of the token artifact
 */
export const TOKEN_BUNDLE_PURPOSE = 'token-bundle';

/**
 * Symmetric key derived from the shared secret.
 * Prints as a placeholder so it cannot leak through logs.
 */
export class TokenKey {
  private readonly material: Buffer;

  private constructor(material: Buffer) {
    this.material = material;
  }

  /**
   * Derive a key from the shared secret using scrypt
   */
  static fromSecret(secret: string): TokenKey {
    return new TokenKey(scryptSync(secret, KDF_SALT, KEY_LENGTH));
  }

  /** @internal */
  bytes(): Buffer {
    return this.material;
  }

  toString(): string {
    return '[TokenKey]';
  }

  toJSON(): string {
    return '[TokenKey]';
  }

  [inspect.custom](): string {
    return '[TokenKey]';
  }
}

function additionalData(version: number, purpose: string): Buffer {
  return Buffer.concat([Buffer.from([version]), Buffer.from(purpose, 'utf8')]);
}

/**
 * Seal a UTF-8 payload for a given purpose
 * Returns format: base64url(version + iv + authTag + ciphertext)
 */
export function sealPayload(plaintext: string, key: TokenKey, purpose: string): EncryptedArtifact {
  const iv = randomBytes(IV_LENGTH);

  const cipher = createCipheriv(ALGORITHM, key.bytes(), iv, { authTagLength: AUTH_TAG_LENGTH });
  cipher.setAAD(additionalData(FORMAT_VERSION, purpose));
  const encrypted = Buffer.concat([cipher.update(plaintext, 'utf8'), cipher.final()]);
  const authTag = cipher.getAuthTag();

  return Buffer.concat([Buffer.from([FORMAT_VERSION]), iv, authTag, encrypted]).toString('base64url');
}

/**
 * Open a sealed payload. Fails on any tampering, key mismatch or purpose mismatch.
 */
export function openPayload(
  artifact: EncryptedArtifact,
  key: TokenKey,
  purpose: string
): Result<string, DecodeError> {
  if (!BASE64URL_PATTERN.test(artifact)) {
    return err(DecodeError.malformed());
  }

  const combined = Buffer.from(artifact, 'base64url');

  // Reject non-canonical encodings (e.g. altered padding bits in the last character)
  if (combined.toString('base64url') !== artifact) {
    return err(DecodeError.malformed());
  }

  if (combined.length < HEADER_LENGTH) {
    return err(DecodeError.malformed());
  }

  const version = combined[0];
  if (version !== FORMAT_VERSION) {
    return err(DecodeError.unsupportedVersion());
  }

  const iv = combined.subarray(VERSION_LENGTH, VERSION_LENGTH + IV_LENGTH);
  const authTag = combined.subarray(VERSION_LENGTH + IV_LENGTH, HEADER_LENGTH);
  const ciphertext = combined.subarray(HEADER_LENGTH);

  try {
    const decipher = createDecipheriv(ALGORITHM, key.bytes(), iv, { authTagLength: AUTH_TAG_LENGTH });
    decipher.setAAD(additionalData(version, purpose));
    decipher.setAuthTag(authTag);

    const decrypted = Buffer.concat([decipher.update(ciphertext), decipher.final()]);
    return ok(decrypted.toString('utf8'));
  } catch {
    return err(DecodeError.authenticationFailed());
  }
}

const bundlePayloadSchema = z.object({
  rt: z.string().min(1),
  scp: z.array(z.string()),
  iat: z.number().int().nonnegative(),
});

type BundlePayload = z.infer<typeof bundlePayloadSchema>;

/**
 * Encode a token bundle into a client-storable artifact
 */
export function encodeTokenBundle(bundle: TokenBundle, key: TokenKey): EncryptedArtifact {
  const payload: BundlePayload = {
    rt: bundle.refreshToken,
    scp: [...bundle.scopes],
    iat: bundle.issuedAt.getTime(),
  };
  return sealPayload(JSON.stringify(payload), key, TOKEN_BUNDLE_PURPOSE);
}

/**
 * Decode an artifact produced by {@link encodeTokenBundle}
 */
export function decodeTokenBundle(
  artifact: EncryptedArtifact,
  key: TokenKey
): Result<TokenBundle, DecodeError> {
  const opened = openPayload(artifact, key, TOKEN_BUNDLE_PURPOSE);
  if (!opened.ok) {
    return opened;
  }

  let json: unknown;
  try {
    json = JSON.parse(opened.value);
  } catch {
    return err(DecodeError.invalidPayload());
  }

  const parsed = bundlePayloadSchema.safeParse(json);
  if (!parsed.success) {
    return err(DecodeError.invalidPayload());
  }

  return ok(
    createTokenBundle({
      refreshToken: parsed.data.rt,
      scopes: parsed.data.scp,
      issuedAt: new Date(parsed.data.iat),
    })
  );
}
