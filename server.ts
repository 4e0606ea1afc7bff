import http from 'http';
import dotenv from 'dotenv';
import { loadConfig, type AppConfig } from './lib/config.js';
import {
  HttpError,
  MethodNotAllowedError,
  NotFoundError,
  StoreCorruptError,
  ValidationError,
} from './lib/errors.js';
import { checkRequest } from './lib/gate.js';
import { corsHeaders, sendError } from './lib/http.js';
import { UserStore } from './lib/user-store.js';
import { handleLogin } from './routes/auth.js';
import type { RouteContext } from './routes/context.js';
import {
  handleCreateUser,
  handleDeleteUser,
  handleGetUser,
  handleListUsers,
  handleUpdateUser,
} from './routes/users.js';

export interface ServerOptions {
  config: AppConfig;
  /** Defaults to a store on `config.dataFile`. */
  store?: UserStore;
  /** Clock in milliseconds; token issue and expiry checks read it. */
  now?: () => number;
}

async function route(
  req: http.IncomingMessage,
  res: http.ServerResponse,
  pathname: string,
  ctx: RouteContext
): Promise<void> {
  if (pathname === '/login') {
    if (req.method === 'POST') {
      return handleLogin(req, res, ctx);
    }
    throw new MethodNotAllowedError();
  }

  if (pathname === '/users') {
    if (req.method === 'GET') {
      return handleListUsers(req, res, ctx);
    }
    if (req.method === 'POST') {
      return handleCreateUser(req, res, ctx);
    }
    throw new MethodNotAllowedError();
  }

  // Handle /users/:id routes
  const userMatch = pathname.match(/^\/users\/(\d+)$/);
  if (userMatch) {
    const userId = Number(userMatch[1]);
    if (req.method === 'GET') {
      return handleGetUser(req, res, ctx, userId);
    }
    if (req.method === 'PUT') {
      return handleUpdateUser(req, res, ctx, userId);
    }
    if (req.method === 'DELETE') {
      return handleDeleteUser(req, res, ctx, userId);
    }
    throw new MethodNotAllowedError();
  }

  throw new NotFoundError('Not found');
}

// An absolute-form target such as `http://%zz/users` does not parse.
function parsePathname(url: string | undefined): string {
  try {
    return new URL(url ?? '/', 'http://localhost').pathname;
  } catch {
    throw new ValidationError('Invalid URL');
  }
}

function handleFailure(res: http.ServerResponse, err: unknown): void {
  if (err instanceof StoreCorruptError) {
    console.error(`Store corrupt at ${err.filePath}: ${err.detail}`);
  }
  if (err instanceof HttpError) {
    sendError(res, err.status, err.message);
    return;
  }
  console.error('Unhandled request error:', err);
  if (res.headersSent) {
    res.end();
    return;
  }
  sendError(res, 500, 'Internal server error');
}

export function createServer(options: ServerOptions): http.Server {
  const { config } = options;
  const ctx: RouteContext = {
    config,
    store: options.store ?? new UserStore(config.dataFile),
    now: options.now ?? Date.now,
  };

  return http.createServer(async (req, res) => {
    console.log(`[${new Date().toISOString()}] ${req.method} ${req.url}`);

    if (req.method === 'OPTIONS') {
      res.writeHead(204, corsHeaders);
      res.end();
      return;
    }

    try {
      const pathname = parsePathname(req.url);

      const decision = checkRequest(req, pathname, config, ctx.now());
      if (decision.state === 'rejected') {
        console.warn(`Rejected ${req.method} ${pathname}: ${decision.error}`);
        sendError(res, 401, decision.error);
        return;
      }

      await route(req, res, pathname, ctx);
    } catch (err) {
      handleFailure(res, err);
    }
  });
}

function start(): void {
  dotenv.config();

  let config: AppConfig;
  try {
    config = loadConfig(process.env);
  } catch (err) {
    console.error(err instanceof Error ? err.message : err);
    process.exit(1);
  }

  const server = createServer({ config });
  server.listen(config.port, () => {
    console.log(`Server running on http://localhost:${config.port}`);
    console.log(`Users stored in ${config.dataFile}`);
  });
}

if (require.main === module) {
  start();
}
