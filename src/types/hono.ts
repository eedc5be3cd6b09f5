import type { Context } from 'hono';
import type { SupplierResult } from '../services/token-supplier.js';

/**
 * Extended Hono context variables for the token relay
 */
export interface RelayVariables {
  /**
   * Fresh access token for the current request.
   * Call immediately before each downstream API call; never cache the result.
   */
  getAccessToken: () => Promise<SupplierResult>;
}

export type RelayEnv = { Variables: RelayVariables };

/**
 * Relay-aware Hono context
 */
export type RelayContext = Context<RelayEnv>;
