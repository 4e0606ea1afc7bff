import crypto from 'crypto';
import bcrypt from 'bcrypt';
import { z } from 'zod';
import type { AppConfig } from './config.js';
import type { TokenHeader, TokenPayload, TokenVerification } from '../types/auth.js';

const TOKEN_HEADER: TokenHeader = { alg: 'HS256', typ: 'JWT' };

const tokenHeaderSchema = z.object({ alg: z.literal('HS256') });

const tokenPayloadSchema = z.object({
  iat: z.number(),
  exp: z.number(),
});

/**
 * Checks a presented API key against the configured bcrypt hash.
 * Anything other than a string is a mismatch.
 */
export async function verifyApiKey(
  presented: unknown,
  config: Pick<AppConfig, 'apiKeyHash'>
): Promise<boolean> {
  if (typeof presented !== 'string') {
    return false;
  }
  return bcrypt.compare(presented, config.apiKeyHash);
}

function base64UrlEncode(str: string): string {
  return Buffer.from(str).toString('base64url');
}

function sign(input: string, secret: string): string {
  return crypto.createHmac('sha256', secret).update(input).digest('base64url');
}

// JSON.parse of a base64url segment; undefined when the segment is not JSON.
function decodeSegment(segment: string): unknown {
  try {
    return JSON.parse(Buffer.from(segment, 'base64url').toString('utf8'));
  } catch {
    return undefined;
  }
}

function signaturesMatch(actual: string, expected: string): boolean {
  const a = Buffer.from(actual);
  const b = Buffer.from(expected);
  return a.length === b.length && crypto.timingSafeEqual(a, b);
}

/** Mints an HS256 session token valid for the configured number of minutes. */
export function issueToken(
  config: Pick<AppConfig, 'jwtSecret' | 'jwtExpirationMinutes'>,
  now: number = Date.now()
): string {
  const iat = Math.floor(now / 1000);
  const payload: TokenPayload = {
    iat,
    exp: iat + config.jwtExpirationMinutes * 60,
  };

  const encodedHeader = base64UrlEncode(JSON.stringify(TOKEN_HEADER));
  const encodedPayload = base64UrlEncode(JSON.stringify(payload));
  const signature = sign(`${encodedHeader}.${encodedPayload}`, config.jwtSecret);

  return `${encodedHeader}.${encodedPayload}.${signature}`;
}

/**
 * Verifies signature first, then expiry. A token stays valid up to and
 * including its `exp` second.
 */
export function verifyToken(
  token: string,
  secret: string,
  now: number = Date.now()
): TokenVerification {
  const segments = token.split('.');
  if (segments.length !== 3) {
    return { ok: false, reason: 'invalid' };
  }
  const [encodedHeader, encodedPayload, signature] = segments;

  const header = tokenHeaderSchema.safeParse(decodeSegment(encodedHeader));
  if (!header.success) {
    return { ok: false, reason: 'invalid' };
  }

  const expectedSignature = sign(`${encodedHeader}.${encodedPayload}`, secret);
  if (!signaturesMatch(signature, expectedSignature)) {
    return { ok: false, reason: 'invalid' };
  }

  const payload = tokenPayloadSchema.safeParse(decodeSegment(encodedPayload));
  if (!payload.success) {
    return { ok: false, reason: 'invalid' };
  }

  if (now > payload.data.exp * 1000) {
    return { ok: false, reason: 'expired' };
  }

  return { ok: true, payload: payload.data };
}
