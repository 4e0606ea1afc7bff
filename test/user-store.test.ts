import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import fs from 'fs';
import path from 'path';
import { StoreCorruptError } from '../lib/errors.js';
import { UserStore, nextId } from '../lib/user-store.js';
import type { User } from '../types/user.js';
import { makeTempDir } from './helpers.js';

describe('User Store Tests', () => {
  let tempDir: string;
  let filePath: string;
  let store: UserStore;

  const alice: User = { id: 1, name: 'Alice', email: 'a@a.com', age: 25 };
  const bob: User = { id: 2, name: 'Bob', email: 'b@b.com', age: 30 };

  beforeEach(() => {
    tempDir = makeTempDir();
    filePath = path.join(tempDir, 'users.json');
    store = new UserStore(filePath);
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  describe('load', () => {
    it('should return an empty list when the file does not exist', () => {
      expect(store.load()).toEqual([]);
    });

    it('should return records in file order', () => {
      fs.writeFileSync(filePath, JSON.stringify([bob, alice]));

      expect(store.load()).toEqual([bob, alice]);
    });

    it('should keep non-string field values as stored', () => {
      const odd = { id: 7, name: null, email: ['x@x.com'], age: '25' };
      fs.writeFileSync(filePath, JSON.stringify([odd]));

      expect(store.load()).toEqual([odd]);
    });

    it('should throw StoreCorruptError for content that is not JSON', () => {
      fs.writeFileSync(filePath, 'not json');

      expect(() => store.load()).toThrow(StoreCorruptError);
    });

    it('should throw StoreCorruptError when the file is not an array', () => {
      fs.writeFileSync(filePath, JSON.stringify({ users: [alice] }));

      expect(() => store.load()).toThrow(StoreCorruptError);
    });

    it('should throw StoreCorruptError for a record without an integer id', () => {
      fs.writeFileSync(filePath, JSON.stringify([{ id: '1', name: 'A', email: 'a', age: 1 }]));

      expect(() => store.load()).toThrow(StoreCorruptError);
    });

    it('should throw StoreCorruptError for an empty file', () => {
      fs.writeFileSync(filePath, '');

      expect(() => store.load()).toThrow(StoreCorruptError);
    });
  });

  describe('save', () => {
    it('should write a human-readable JSON array', () => {
      store.save([alice]);

      expect(fs.readFileSync(filePath, 'utf-8')).toBe(
        '[\n  {\n    "id": 1,\n    "name": "Alice",\n    "email": "a@a.com",\n    "age": 25\n  }\n]\n'
      );
    });

    it('should create the parent directory', () => {
      const nested = new UserStore(path.join(tempDir, 'nested', 'dir', 'users.json'));

      nested.save([alice]);

      expect(nested.load()).toEqual([alice]);
    });

    it('should leave no temporary file behind', () => {
      store.save([alice]);

      expect(fs.readdirSync(tempDir)).toEqual(['users.json']);
    });

    it('should preserve content on save(load())', () => {
      store.save([bob, alice]);
      const before = fs.readFileSync(filePath, 'utf-8');

      store.save(store.load());

      expect(fs.readFileSync(filePath, 'utf-8')).toBe(before);
      expect(store.load()).toEqual([bob, alice]);
    });

    it('should keep unknown keys and key order on save(load())', () => {
      const stored = [{ name: 'A', id: 1, email: 'a', age: 1, role: 'admin' }];
      const content = `${JSON.stringify(stored, null, 2)}\n`;
      fs.writeFileSync(filePath, content);

      store.save(store.load());

      expect(fs.readFileSync(filePath, 'utf-8')).toBe(content);
    });

    it('should replace the whole file', () => {
      store.save([alice, bob]);
      store.save([bob]);

      expect(store.load()).toEqual([bob]);
    });
  });

  describe('nextId', () => {
    it('should return 1 for an empty store', () => {
      expect(nextId([])).toBe(1);
    });

    it('should return one past the highest id regardless of order', () => {
      expect(nextId([{ ...bob, id: 5 }, alice])).toBe(6);
    });

    it('should not refill gaps', () => {
      expect(nextId([alice, { ...bob, id: 4 }])).toBe(5);
    });
  });

  describe('transact', () => {
    it('should save when the mutation reports a change', () => {
      const result = store.transact((users) => {
        users.push(alice);
        return { result: users.length, changed: true };
      });

      expect(result).toBe(1);
      expect(store.load()).toEqual([alice]);
    });

    it('should not write when nothing changed', () => {
      store.transact((users) => ({ result: users.length, changed: false }));

      expect(fs.existsSync(filePath)).toBe(false);
    });

    it('should not write when the mutation throws', () => {
      store.save([alice]);

      expect(() =>
        store.transact((users) => {
          users.push(bob);
          throw new Error('boom');
        })
      ).toThrow('boom');
      expect(store.load()).toEqual([alice]);
    });

    it('should propagate StoreCorruptError without touching the file', () => {
      fs.writeFileSync(filePath, '[{');

      expect(() => store.transact(() => ({ result: null, changed: true }))).toThrow(
        StoreCorruptError
      );
      expect(fs.readFileSync(filePath, 'utf-8')).toBe('[{');
    });
  });
});
