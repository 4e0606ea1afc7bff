import http from 'http';
import { verifyApiKey, issueToken } from '../lib/auth.js';
import { AuthError, ValidationError } from '../lib/errors.js';
import { isJsonObject, parseBody, sendJson } from '../lib/http.js';
import type { LoginResponse } from '../types/auth.js';
import type { RouteContext } from './context.js';

// POST /login - exchange the shared API key for a session token
export async function handleLogin(
  req: http.IncomingMessage,
  res: http.ServerResponse,
  ctx: RouteContext
): Promise<void> {
  const body = await parseBody(req);

  if (!isJsonObject(body) || !('api_key' in body)) {
    throw new ValidationError('api_key is required');
  }

  if (!(await verifyApiKey(body.api_key, ctx.config))) {
    throw new AuthError('Invalid API key');
  }

  const response: LoginResponse = {
    token: issueToken(ctx.config, ctx.now()),
  };

  sendJson(res, 200, response);
}
