import { OFFLINE_ACCESS_SCOPE } from '../config/constants.js';

/**
 * Service for OAuth scope parsing and formatting
 */
export class ScopeService {
  /**
   * Parse a space-delimited scope string into an array
   */
  parseScopes(scopeString: string | undefined): string[] {
    if (!scopeString) {
      return [];
    }
    return this.normalizeScopes(scopeString.split(' '));
  }

  /**
   * Convert scope array to space-delimited string
   */
  formatScopes(scopes: readonly string[]): string {
    return scopes.join(' ');
  }

  /**
   * Trim, drop empties and duplicates, keeping first-seen order
   */
  normalizeScopes(scopes: readonly string[]): string[] {
    const seen = new Set<string>();
    const result: string[] = [];

    for (const raw of scopes) {
      const scope = raw.trim();
      if (scope.length === 0 || seen.has(scope)) {
        continue;
      }
      seen.add(scope);
      result.push(scope);
    }

    return result;
  }

  /**
   * Ensure offline_access is requested so the provider issues a refresh token
   */
  withOfflineAccess(scopes: readonly string[]): string[] {
    return this.normalizeScopes([...scopes, OFFLINE_ACCESS_SCOPE]);
  }
}

// Singleton instance
export const scopeService = new ScopeService();
