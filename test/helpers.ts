import fs from 'fs';
import os from 'os';
import path from 'path';
import bcrypt from 'bcrypt';
import { DEFAULT_PUBLIC_PATHS, type AppConfig } from '../lib/config.js';

export const TEST_API_KEY = 'test-secret';
export const TEST_JWT_SECRET = 'test-jwt-secret';
// Lowest cost bcrypt accepts, to keep the suite fast.
export const TEST_API_KEY_HASH = bcrypt.hashSync(TEST_API_KEY, 4);

// 2026-01-01T00:00:00.000Z
export const T0 = Date.UTC(2026, 0, 1);

export function makeTempDir(): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), 'users-api-test-'));
}

export function makeTestConfig(dataFile: string, overrides: Partial<AppConfig> = {}): AppConfig {
  return Object.freeze({
    apiKeyHash: TEST_API_KEY_HASH,
    jwtSecret: TEST_JWT_SECRET,
    jwtExpirationMinutes: 30,
    dataFile,
    port: 0,
    publicPaths: DEFAULT_PUBLIC_PATHS,
    ...overrides,
  });
}
