import http from 'http';
import { NotFoundError, ValidationError } from '../lib/errors.js';
import { isJsonObject, parseBody, sendJson } from '../lib/http.js';
import { nextId } from '../lib/user-store.js';
import type { JsonObject } from '../types/json.js';
import {
  USER_FIELDS,
  type CreateUserRequest,
  type DeleteUserResponse,
  type UpdateUserRequest,
  type User,
} from '../types/user.js';
import type { RouteContext } from './context.js';

function pickFields(body: JsonObject): UpdateUserRequest {
  const fields: UpdateUserRequest = {};
  for (const field of USER_FIELDS) {
    if (field in body) {
      fields[field] = body[field];
    }
  }
  return fields;
}

async function readNonEmptyBody(req: http.IncomingMessage): Promise<JsonObject> {
  const body = await parseBody(req);
  if (!isJsonObject(body) || Object.keys(body).length === 0) {
    throw new ValidationError('Request body is required');
  }
  return body;
}

// Presence only: a field sent as null is present, values are not checked.
function parseCreateRequest(body: JsonObject): CreateUserRequest {
  const missing = USER_FIELDS.filter((field) => !(field in body));
  if (missing.length > 0) {
    throw new ValidationError(`Missing required fields: ${missing.join(', ')}`);
  }
  return { name: body.name, email: body.email, age: body.age };
}

// GET /users
export async function handleListUsers(
  _req: http.IncomingMessage,
  res: http.ServerResponse,
  ctx: RouteContext
): Promise<void> {
  sendJson(res, 200, ctx.store.load());
}

// POST /users
export async function handleCreateUser(
  req: http.IncomingMessage,
  res: http.ServerResponse,
  ctx: RouteContext
): Promise<void> {
  const request = parseCreateRequest(await readNonEmptyBody(req));

  const user = ctx.store.transact((users) => {
    const created: User = { id: nextId(users), ...request };
    users.push(created);
    return { result: created, changed: true };
  });

  sendJson(res, 201, user);
}

// GET /users/:id
export async function handleGetUser(
  _req: http.IncomingMessage,
  res: http.ServerResponse,
  ctx: RouteContext,
  userId: number
): Promise<void> {
  const user = ctx.store.load().find((u) => u.id === userId);
  if (!user) {
    throw new NotFoundError('User not found');
  }
  sendJson(res, 200, user);
}

// PUT /users/:id - only the fields present in the body are overwritten
export async function handleUpdateUser(
  req: http.IncomingMessage,
  res: http.ServerResponse,
  ctx: RouteContext,
  userId: number
): Promise<void> {
  const changes = pickFields(await readNonEmptyBody(req));

  const user = ctx.store.transact((users) => {
    const existing = users.find((u) => u.id === userId);
    if (!existing) {
      throw new NotFoundError('User not found');
    }
    Object.assign(existing, changes);
    return { result: existing, changed: true };
  });

  sendJson(res, 200, user);
}

// DELETE /users/:id
export async function handleDeleteUser(
  _req: http.IncomingMessage,
  res: http.ServerResponse,
  ctx: RouteContext,
  userId: number
): Promise<void> {
  ctx.store.transact((users) => {
    const index = users.findIndex((u) => u.id === userId);
    if (index === -1) {
      throw new NotFoundError('User not found');
    }
    users.splice(index, 1);
    return { result: undefined, changed: true };
  });

  const response: DeleteUserResponse = { message: `User ${userId} deleted` };
  sendJson(res, 200, response);
}
