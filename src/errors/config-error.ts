/**
 * Deployment misconfiguration
 *
 * Fatal: raised at startup for missing or invalid settings, and when a
 * sign-in succeeds without granting the refresh capability this service
 * depends on. Never retried.
 */
export class ConfigError extends Error {
  public readonly code = 'config_error' as const;
  public readonly issues: readonly string[];

  constructor(message: string, issues: readonly string[] = [], options?: { cause?: Error }) {
    super(issues.length > 0 ? `${message}: ${issues.join('; ')}` : message);
    this.name = 'ConfigError';
    this.issues = issues;

    if (options?.cause) {
      this.cause = options.cause;
    }

    Error.captureStackTrace(this, this.constructor);
  }

  static invalidEnvironment(issues: readonly string[]): ConfigError {
    return new ConfigError('Invalid configuration', issues);
  }

  static missingRefreshToken(provider: string): ConfigError {
    return new ConfigError(
      `Sign-in with ${provider} returned no refresh token; ensure the offline_access scope is requested and granted`
    );
  }
}
