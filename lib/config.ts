import path from 'path';
import bcrypt from 'bcrypt';
import { ConfigError } from './errors.js';

export interface AppConfig {
  /** bcrypt hash of the shared API key accepted by POST /login. */
  readonly apiKeyHash: string;
  readonly jwtSecret: string;
  readonly jwtExpirationMinutes: number;
  readonly dataFile: string;
  readonly port: number;
  /** Path prefixes reachable without a session token. */
  readonly publicPaths: readonly string[];
}

const REQUIRED_VARS = ['API_KEY_HASH', 'JWT_SECRET', 'JWT_EXPIRATION_MINUTES'] as const;

export const DEFAULT_PUBLIC_PATHS: readonly string[] = [
  '/login',
  '/apidocs',
  '/apispec',
  '/flasgger',
];
export const DEFAULT_PORT = 5050;

function parsePositiveInt(name: string, raw: string): number {
  const value = raw.trim();
  if (!/^\d+$/.test(value) || Number(value) < 1) {
    throw new ConfigError(`${name} must be a positive integer`);
  }
  return Number(value);
}

function assertBcryptHash(hash: string): void {
  try {
    bcrypt.getRounds(hash);
  } catch (err) {
    throw new ConfigError(
      `API_KEY_HASH is not a valid bcrypt hash (${err instanceof Error ? err.message : String(err)})`
    );
  }
}

/**
 * Builds the process configuration from environment variables.
 * Throws ConfigError naming every missing variable, so the caller can exit
 * before accepting connections.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const missing = REQUIRED_VARS.filter((name) => !env[name] || !env[name]?.trim());
  if (missing.length > 0) {
    throw new ConfigError(`Missing required environment variables: ${missing.join(', ')}`);
  }

  const apiKeyHash = (env.API_KEY_HASH ?? '').trim();
  assertBcryptHash(apiKeyHash);

  const config: AppConfig = {
    apiKeyHash,
    jwtSecret: env.JWT_SECRET ?? '',
    jwtExpirationMinutes: parsePositiveInt(
      'JWT_EXPIRATION_MINUTES',
      env.JWT_EXPIRATION_MINUTES ?? ''
    ),
    dataFile: path.resolve(env.DATA_FILE?.trim() || path.join('data', 'users.json')),
    port: env.PORT?.trim() ? parsePositiveInt('PORT', env.PORT) : DEFAULT_PORT,
    publicPaths: DEFAULT_PUBLIC_PATHS,
  };

  return Object.freeze(config);
}
