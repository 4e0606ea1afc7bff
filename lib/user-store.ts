import fs from 'fs';
import path from 'path';
import { z } from 'zod';
import { StoreCorruptError } from './errors.js';
import type { JsonValue } from '../types/json.js';
import type { User } from '../types/user.js';

const jsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(jsonValueSchema),
    z.record(jsonValueSchema),
  ])
);

const userSchema = z.object({
  id: z.number().int().positive(),
  name: jsonValueSchema,
  email: jsonValueSchema,
  age: jsonValueSchema,
});

// z.custom hands back the record it was given, so keys the schema does not
// name survive in their original order.
const storedUserSchema = z.custom<User>((value) => userSchema.safeParse(value).success, {
  message: 'Expected a user with a positive integer id, name, email and age',
});

const userFileSchema = z.array(storedUserSchema);

/** 1 for an empty store, otherwise one past the highest id present. */
export function nextId(users: readonly User[]): number {
  return users.reduce((max, user) => Math.max(max, user.id), 0) + 1;
}

export interface StoreMutation<T> {
  result: T;
  /** Whether `users` was modified and has to be written back. */
  changed: boolean;
}

/**
 * Users persisted as one JSON array in a single file. Nothing is cached:
 * every call reads the file again.
 */
export class UserStore {
  constructor(public readonly filePath: string) {}

  load(): User[] {
    let raw: string;
    try {
      raw = fs.readFileSync(this.filePath, 'utf-8');
    } catch (err) {
      if (err instanceof Error && 'code' in err && err.code === 'ENOENT') {
        return [];
      }
      throw err;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (err) {
      throw new StoreCorruptError(this.filePath, err instanceof Error ? err.message : String(err));
    }

    const users = userFileSchema.safeParse(parsed);
    if (!users.success) {
      const issue = users.error.issues[0];
      throw new StoreCorruptError(
        this.filePath,
        issue ? `${issue.path.join('.') || 'root'}: ${issue.message}` : 'Invalid content'
      );
    }
    return users.data;
  }

  /** Replaces the whole file; written beside it first, then renamed over it. */
  save(users: readonly User[]): void {
    fs.mkdirSync(path.dirname(this.filePath), { recursive: true });
    const tmpPath = `${this.filePath}.tmp`;
    fs.writeFileSync(tmpPath, `${JSON.stringify(users, null, 2)}\n`, 'utf-8');
    fs.renameSync(tmpPath, this.filePath);
  }

  /**
   * Load, mutate and save without yielding to the event loop, so no other
   * request can read or write the file in between.
   */
  transact<T>(mutate: (users: User[]) => StoreMutation<T>): T {
    const users = this.load();
    const { result, changed } = mutate(users);
    if (changed) {
      this.save(users);
    }
    return result;
  }
}
