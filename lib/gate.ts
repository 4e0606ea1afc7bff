import http from 'http';
import { verifyToken } from './auth.js';
import type { AppConfig } from './config.js';

export type GateDecision =
  | { state: 'exempt' }
  | { state: 'authorized'; expiresAt: number }
  | { state: 'rejected'; error: string };

// Get token from Authorization header. Null only when the header is absent
// or empty; without the Bearer scheme the whole value is taken as the token.
export function getTokenFromHeader(req: http.IncomingMessage): string | null {
  const authHeader = req.headers.authorization;
  if (!authHeader) {
    return null;
  }
  return authHeader.startsWith('Bearer ') ? authHeader.substring(7) : authHeader;
}

export function isPublicPath(pathname: string, publicPaths: readonly string[]): boolean {
  return publicPaths.some((prefix) => pathname === prefix || pathname.startsWith(`${prefix}/`));
}

/**
 * Decides whether a request may reach a handler. Runs before routing, so
 * unknown paths are gated like known ones.
 */
export function checkRequest(
  req: http.IncomingMessage,
  pathname: string,
  config: Pick<AppConfig, 'jwtSecret' | 'publicPaths'>,
  now: number = Date.now()
): GateDecision {
  if (req.method === 'OPTIONS' || isPublicPath(pathname, config.publicPaths)) {
    return { state: 'exempt' };
  }

  const token = getTokenFromHeader(req);
  if (token === null) {
    return { state: 'rejected', error: 'Unauthorized' };
  }

  const result = verifyToken(token, config.jwtSecret, now);
  if (!result.ok) {
    return {
      state: 'rejected',
      error: result.reason === 'expired' ? 'Token expired' : 'Invalid token',
    };
  }

  return { state: 'authorized', expiresAt: result.payload.exp };
}
