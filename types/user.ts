import type { JsonValue } from './json.js';

/**
 * A stored user. `name`, `email` and `age` keep whatever JSON value the
 * client sent (normally a string, a string and an integer).
 */
export interface User {
  id: number;
  name: JsonValue;
  email: JsonValue;
  age: JsonValue;
}

export type UserField = 'name' | 'email' | 'age';

export const USER_FIELDS: readonly UserField[] = ['name', 'email', 'age'];

export type CreateUserRequest = Pick<User, UserField>;

export type UpdateUserRequest = Partial<Pick<User, UserField>>;

export interface DeleteUserResponse {
  message: string;
}
