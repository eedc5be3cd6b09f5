import type { EncryptedArtifact } from '../types/token.js';
import type { Result } from '../types/result.js';

/**
 * Cookie attributes for a stored artifact.
 * Always HttpOnly, Secure and SameSite=Strict under the `__Host-` prefix.
 */
export interface ArtifactAttributes {
  name: string;
  maxAge: number;
  httpOnly: true;
  secure: true;
  sameSite: 'Strict';
  path: '/';
}

/**
 * Where the caller keeps the encrypted artifact (e.g. the outgoing response)
 */
export interface ArtifactSink {
  store(artifact: EncryptedArtifact, attributes: ArtifactAttributes): void;
  clear(attributes: ArtifactAttributes): void;
}

/**
 * Fired by the host once per successful sign-in
 */
export interface AuthenticationEvent {
  /** Identity provider the user signed in with */
  provider: string;
  /** The provider's token endpoint response, unmodified */
  tokenResponse: unknown;
  sink: ArtifactSink;
}

export type AuthenticationHookResult = Result<unknown, Error>;

export type AuthenticationHook = (
  event: AuthenticationEvent
) => AuthenticationHookResult | Promise<AuthenticationHookResult>;

/**
 * Registration point the host exposes for observing sign-ins
 */
export interface AuthenticationHost {
  /**
   * @returns a function that removes the hook
   */
  onAuthenticated(hook: AuthenticationHook): () => void;
}

/**
 * In-process hook registry used by this server's own sign-in routes
 */
export class AuthHookRegistry implements AuthenticationHost {
  private readonly hooks = new Set<AuthenticationHook>();

  onAuthenticated(hook: AuthenticationHook): () => void {
    this.hooks.add(hook);
    return () => {
      this.hooks.delete(hook);
    };
  }

  /**
   * Run every hook in registration order
   *
   * A hook that throws or rejects is reported like one that returned an
   * error; the hooks after it still run.
   *
   * @returns the errors reported by hooks, empty when all succeeded
   */
  async emit(event: AuthenticationEvent): Promise<Error[]> {
    const errors: Error[] = [];

    for (const hook of [...this.hooks]) {
      try {
        const result = await hook(event);
        if (!result.ok) {
          errors.push(result.error);
        }
      } catch (error) {
        errors.push(error instanceof Error ? error : new Error(String(error)));
      }
    }

    return errors;
  }
}
