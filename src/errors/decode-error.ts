export type DecodeErrorReason =
  | 'malformed'
  | 'unsupported_version'
  | 'authentication_failed'
  | 'invalid_payload';

const DECODE_ERROR_MESSAGES: Record<DecodeErrorReason, string> = {
  malformed: 'Artifact is not a well-formed sealed value',
  unsupported_version: 'Artifact was sealed with an unsupported format version',
  authentication_failed: 'Artifact failed authentication (tampered, or sealed under another key)',
  invalid_payload: 'Artifact payload does not match the expected shape',
};

/**
 * An encrypted artifact could not be opened.
 * Deliberately carries no artifact bytes or payload fragments.
 */
export class DecodeError extends Error {
  public readonly reason: DecodeErrorReason;

  constructor(reason: DecodeErrorReason) {
    super(DECODE_ERROR_MESSAGES[reason]);
    this.name = 'DecodeError';
    this.reason = reason;
    Error.captureStackTrace(this, this.constructor);
  }

  static malformed(): DecodeError {
    return new DecodeError('malformed');
  }

  static unsupportedVersion(): DecodeError {
    return new DecodeError('unsupported_version');
  }

  static authenticationFailed(): DecodeError {
    return new DecodeError('authentication_failed');
  }

  static invalidPayload(): DecodeError {
    return new DecodeError('invalid_payload');
  }
}
