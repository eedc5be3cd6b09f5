export type SignInErrorCode = 'access_denied' | 'invalid_request' | 'invalid_state';

/**
 * Sign-in error response body
 */
export interface SignInErrorResponse {
  error: SignInErrorCode;
  error_description: string;
}

/**
 * Failure of the host's own sign-in redirect flow
 */
export class SignInError extends Error {
  public readonly code: SignInErrorCode;
  public readonly statusCode: 400 | 403;
  public readonly description: string;

  constructor(code: SignInErrorCode, description: string) {
    super(description);
    this.name = 'SignInError';
    this.code = code;
    this.statusCode = code === 'access_denied' ? 403 : 400;
    this.description = description;
    Error.captureStackTrace(this, this.constructor);
  }

  toJSON(): SignInErrorResponse {
    return {
      error: this.code,
      error_description: this.description,
    };
  }

  static accessDenied(description: string): SignInError {
    return new SignInError('access_denied', description);
  }

  static invalidRequest(description: string): SignInError {
    return new SignInError('invalid_request', description);
  }

  static invalidState(description: string = 'Invalid or expired sign-in state'): SignInError {
    return new SignInError('invalid_state', description);
  }
}
