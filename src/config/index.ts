import { readFileSync, existsSync } from 'node:fs';
import { z } from 'zod';
import type { ProviderConfig } from '../types/provider.js';
import { ConfigError } from '../errors/config-error.js';
import { scopeService } from '../services/scope-service.js';
import * as constants from './constants.js';

/**
 * Read a secret from file (Docker secrets) or environment variable
 * Supports both `VAR_FILE` (path to file) and `VAR` (direct value) patterns
 */
function readSecret(env: NodeJS.ProcessEnv, envVar: string): string | undefined {
  // Check for file-based secret first (Docker secrets pattern)
  const filePath = env[`${envVar}_FILE`];

  if (filePath && existsSync(filePath)) {
    try {
      return readFileSync(filePath, 'utf-8').trim();
    } catch {
      console.warn(`Warning: Could not read secret from ${filePath}`);
    }
  }

  // Fall back to direct environment variable
  return readVariable(env, envVar);
}

/**
 * Read a plain variable, treating blank values as unset
 */
function readVariable(env: NodeJS.ProcessEnv, envVar: string): string | undefined {
  const value = env[envVar]?.trim();
  return value ? value : undefined;
}

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

const required = z.string({ required_error: 'Required' }).min(1, 'Required');

const environmentSchema = z.object({
  MICROSOFT_CLIENT_TENANT_ID: required,
  MICROSOFT_CLIENT_ID: required,
  MICROSOFT_CLIENT_SECRET: required,
  MICROSOFT_OAUTH_SCOPE: required
    .transform((value) => scopeService.parseScopes(value))
    .refine((scopes) => scopes.length > 0, 'Must list at least one scope'),
  ENCRYPTION_KEY: z
    .string({ required_error: 'Required' })
    .min(constants.MIN_ENCRYPTION_KEY_LENGTH, `Must be at least ${constants.MIN_ENCRYPTION_KEY_LENGTH} characters`),
  MICROSOFT_AUTHORITY: z.string().url().default(constants.DEFAULT_MICROSOFT_AUTHORITY),
  TOKEN_COOKIE_NAME: z
    .string()
    .regex(/^[A-Za-z0-9_-]+$/, 'Must contain only letters, digits, "-" and "_"')
    .default(constants.DEFAULT_TOKEN_COOKIE_NAME),
  // Browsers cap Max-Age at 400 days
  TOKEN_COOKIE_MAX_AGE: z.coerce.number().int().positive().max(34560000).default(constants.DEFAULT_TOKEN_COOKIE_MAX_AGE),
  PROVIDER_TIMEOUT_MS: z.coerce.number().int().positive().default(constants.DEFAULT_PROVIDER_TIMEOUT_MS),
  PORT: z.coerce.number().int().min(1).max(65535).default(3000),
  HOST: z.string().default('0.0.0.0'),
  BASE_URL: z.string().url().optional(),
  NODE_ENV: z.string().default('development'),
  LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),
});

/**
 * Application configuration loaded from environment
 */
export interface Config {
  readonly server: {
    readonly port: number;
    readonly host: string;
    readonly nodeEnv: string;
    readonly baseUrl: string;
  };
  readonly provider: ProviderConfig;
  readonly http: {
    readonly timeoutMs: number;
  };
  readonly cookie: {
    readonly name: string;
    readonly maxAge: number;
  };
  readonly secrets: {
    readonly encryptionKey: string;
  };
  readonly logging: {
    readonly level: LogLevel;
  };
}

/**
 * Load configuration from environment variables
 *
 * @throws ConfigError listing every missing or invalid setting
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const result = environmentSchema.safeParse({
    MICROSOFT_CLIENT_TENANT_ID: readVariable(env, 'MICROSOFT_CLIENT_TENANT_ID'),
    MICROSOFT_CLIENT_ID: readVariable(env, 'MICROSOFT_CLIENT_ID'),
    MICROSOFT_CLIENT_SECRET: readSecret(env, 'MICROSOFT_CLIENT_SECRET'),
    MICROSOFT_OAUTH_SCOPE: readVariable(env, 'MICROSOFT_OAUTH_SCOPE'),
    ENCRYPTION_KEY: readSecret(env, 'ENCRYPTION_KEY'),
    MICROSOFT_AUTHORITY: readVariable(env, 'MICROSOFT_AUTHORITY'),
    TOKEN_COOKIE_NAME: readVariable(env, 'TOKEN_COOKIE_NAME'),
    TOKEN_COOKIE_MAX_AGE: readVariable(env, 'TOKEN_COOKIE_MAX_AGE'),
    PROVIDER_TIMEOUT_MS: readVariable(env, 'PROVIDER_TIMEOUT_MS'),
    PORT: readVariable(env, 'PORT'),
    HOST: readVariable(env, 'HOST'),
    BASE_URL: readVariable(env, 'BASE_URL'),
    NODE_ENV: readVariable(env, 'NODE_ENV'),
    LOG_LEVEL: readVariable(env, 'LOG_LEVEL'),
  });

  if (!result.success) {
    throw ConfigError.invalidEnvironment(
      result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
    );
  }

  const vars = result.data;
  const authority = vars.MICROSOFT_AUTHORITY.replace(/\/+$/, '');
  const tenantPath = encodeURIComponent(vars.MICROSOFT_CLIENT_TENANT_ID);
  const publicHost = vars.HOST === '0.0.0.0' ? 'localhost' : vars.HOST;

  return Object.freeze({
    server: Object.freeze({
      port: vars.PORT,
      host: vars.HOST,
      nodeEnv: vars.NODE_ENV,
      baseUrl: (vars.BASE_URL ?? `http://${publicHost}:${vars.PORT}`).replace(/\/+$/, ''),
    }),
    provider: Object.freeze({
      tokenEndpoint: `${authority}/${tenantPath}/oauth2/v2.0/token`,
      authorizationEndpoint: `${authority}/${tenantPath}/oauth2/v2.0/authorize`,
      clientId: vars.MICROSOFT_CLIENT_ID,
      clientSecret: vars.MICROSOFT_CLIENT_SECRET,
      tenantId: vars.MICROSOFT_CLIENT_TENANT_ID,
      defaultScopes: Object.freeze(vars.MICROSOFT_OAUTH_SCOPE),
    }),
    http: Object.freeze({
      timeoutMs: vars.PROVIDER_TIMEOUT_MS,
    }),
    cookie: Object.freeze({
      name: vars.TOKEN_COOKIE_NAME,
      maxAge: vars.TOKEN_COOKIE_MAX_AGE,
    }),
    secrets: Object.freeze({
      encryptionKey: vars.ENCRYPTION_KEY,
    }),
    logging: Object.freeze({
      level: vars.LOG_LEVEL,
    }),
  });
}

// Singleton config instance
let config: Config | null = null;

/**
 * Get the current configuration (loads if not already loaded)
 */
export function getConfig(): Config {
  if (!config) {
    config = loadConfig();
  }
  return config;
}

/**
 * Reset configuration (useful for testing)
 */
export function resetConfig(): void {
  config = null;
}

// Re-export constants
export { constants };
