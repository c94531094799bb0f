/**
 * In-process stand-in for a MongoDB Db, for tests.
 *
 * Supports the subset of the driver the gateway uses: find (with projection,
 * sort, skip, limit), findOne, insertOne, updateOne ($set, $unset, $addToSet,
 * $pull, $push, $inc), deleteOne, deleteMany and createIndex with unique
 * enforcement. Filters support equality (including array membership), $or,
 * $and, $in, $nin, $eq, $ne, $lt, $lte, $gt, $gte and $exists.
 */

import { Db, MongoServerError, ObjectId } from 'mongodb';

type Doc = Record<string, unknown>;
type SortSpec = Record<string, 1 | -1> | Array<[string, 1 | -1]>;

function isPlainObject(value: unknown): value is Doc {
  return (
    typeof value === 'object' &&
    value !== null &&
    !Array.isArray(value) &&
    !(value instanceof Date) &&
    !(value instanceof ObjectId) &&
    !(value instanceof RegExp)
  );
}

function clone<T>(value: T): T;
function clone(value: unknown): unknown {
  if (Array.isArray(value)) return value.map((item) => clone(item));
  if (value instanceof Date) return new Date(value.getTime());
  if (isPlainObject(value)) {
    const copy: Doc = {};
    for (const [key, item] of Object.entries(value)) copy[key] = clone(item);
    return copy;
  }
  return value;
}

function getPath(doc: Doc, path: string): unknown {
  let current: unknown = doc;
  for (const part of path.split('.')) {
    if (!isPlainObject(current)) return undefined;
    current = current[part];
  }
  return current;
}

function setPath(doc: Doc, path: string, value: unknown): void {
  const parts = path.split('.');
  let current: Doc = doc;
  for (const part of parts.slice(0, -1)) {
    const next = current[part];
    if (!isPlainObject(next)) {
      current[part] = {};
    }
    const child = current[part];
    if (isPlainObject(child)) current = child;
  }
  current[parts[parts.length - 1]] = value;
}

function comparable(value: unknown): unknown {
  if (value instanceof ObjectId) return `oid:${value.toHexString()}`;
  if (value instanceof Date) return value.getTime();
  return value;
}

function deepEqual(a: unknown, b: unknown): boolean {
  const left = comparable(a);
  const right = comparable(b);
  if (Array.isArray(left) && Array.isArray(right)) {
    return left.length === right.length && left.every((item, i) => deepEqual(item, right[i]));
  }
  if (isPlainObject(left) && isPlainObject(right)) {
    const keys = Object.keys(left);
    return (
      keys.length === Object.keys(right).length &&
      keys.every((key) => deepEqual(left[key], right[key]))
    );
  }
  // Missing and null compare equal, as in MongoDB
  if ((left === undefined || left === null) && (right === undefined || right === null)) {
    return true;
  }
  return left === right;
}

/** Equality where an array field matches any of its elements */
function fieldEquals(fieldValue: unknown, expected: unknown): boolean {
  if (Array.isArray(fieldValue) && !Array.isArray(expected)) {
    return fieldValue.some((item) => deepEqual(item, expected));
  }
  return deepEqual(fieldValue, expected);
}

function compare(fieldValue: unknown, operand: unknown): number | null {
  const left = comparable(fieldValue);
  const right = comparable(operand);
  if (typeof left === 'number' && typeof right === 'number') return left - right;
  if (typeof left === 'string' && typeof right === 'string') return left < right ? -1 : left > right ? 1 : 0;
  return null;
}

function matchesOperator(fieldValue: unknown, operator: string, operand: unknown): boolean {
  switch (operator) {
    case '$eq':
      return fieldEquals(fieldValue, operand);
    case '$ne':
      return !fieldEquals(fieldValue, operand);
    case '$in':
      return Array.isArray(operand) && operand.some((item) => fieldEquals(fieldValue, item));
    case '$nin':
      return Array.isArray(operand) && !operand.some((item) => fieldEquals(fieldValue, item));
    case '$exists':
      return (fieldValue !== undefined) === Boolean(operand);
    case '$lt':
    case '$lte':
    case '$gt':
    case '$gte': {
      const result = compare(fieldValue, operand);
      if (result === null) return false;
      if (operator === '$lt') return result < 0;
      if (operator === '$lte') return result <= 0;
      if (operator === '$gt') return result > 0;
      return result >= 0;
    }
    default:
      throw new Error(`Unsupported query operator in test store: ${operator}`);
  }
}

export function matches(doc: Doc, filter: Doc): boolean {
  return Object.entries(filter).every(([key, condition]) => {
    if (key === '$or') {
      return Array.isArray(condition) && condition.some((sub) => isPlainObject(sub) && matches(doc, sub));
    }
    if (key === '$and') {
      return Array.isArray(condition) && condition.every((sub) => isPlainObject(sub) && matches(doc, sub));
    }

    const fieldValue = getPath(doc, key);
    if (isPlainObject(condition) && Object.keys(condition).some((op) => op.startsWith('$'))) {
      return Object.entries(condition).every(([op, operand]) => matchesOperator(fieldValue, op, operand));
    }
    return fieldEquals(fieldValue, condition);
  });
}

function project(doc: Doc, projection: Doc | undefined): Doc {
  if (!projection) return clone(doc);
  const included = Object.entries(projection).filter(([, flag]) => flag === 1 || flag === true);
  const result: Doc = { _id: doc._id };
  for (const [key] of included) {
    const value = getPath(doc, key);
    if (value !== undefined) setPath(result, key, clone(value));
  }
  if (projection._id === 0) delete result._id;
  return result;
}

function sortEntries(spec: SortSpec): Array<[string, 1 | -1]> {
  return Array.isArray(spec) ? spec : Object.entries(spec);
}

class InMemoryCursor {
  private sortSpec: SortSpec | undefined;
  private skipCount = 0;
  private limitCount = 0;

  constructor(
    private readonly load: () => Doc[],
    private readonly projection: Doc | undefined
  ) {}

  sort(spec: SortSpec): this {
    this.sortSpec = spec;
    return this;
  }

  skip(count: number): this {
    this.skipCount = count;
    return this;
  }

  limit(count: number): this {
    this.limitCount = count;
    return this;
  }

  async toArray(): Promise<Doc[]> {
    let docs = this.load();
    if (this.sortSpec) {
      const entries = sortEntries(this.sortSpec);
      docs = [...docs].sort((a, b) => {
        for (const [field, direction] of entries) {
          const result = compare(getPath(a, field), getPath(b, field)) ?? 0;
          if (result !== 0) return result * direction;
        }
        return 0;
      });
    }
    docs = docs.slice(this.skipCount);
    if (this.limitCount > 0) docs = docs.slice(0, this.limitCount);
    return docs.map((doc) => project(doc, this.projection));
  }
}

interface IndexEntry {
  keys: Record<string, 1 | -1>;
  unique: boolean;
}

export class InMemoryCollection {
  readonly documents: Doc[] = [];
  readonly indexes: IndexEntry[] = [];
  private failure: Error | null = null;

  constructor(readonly collectionName: string) {}

  /** Make every following operation on this collection reject with `error` */
  failWith(error: Error | null): void {
    this.failure = error;
  }

  private checkFailure(): void {
    if (this.failure) throw this.failure;
  }

  private assertUnique(candidate: Doc): void {
    for (const index of this.indexes.filter((entry) => entry.unique)) {
      const fields = Object.keys(index.keys);
      const clash = this.documents.some(
        (doc) =>
          !deepEqual(doc._id, candidate._id) &&
          fields.every((field) => deepEqual(getPath(doc, field), getPath(candidate, field)))
      );
      if (clash) {
        throw new MongoServerError({
          message: `E11000 duplicate key error collection: ${this.collectionName} index: ${fields.join('_')}`,
          code: 11000,
        });
      }
    }
  }

  find(filter: Doc = {}, options: { projection?: Doc } = {}): InMemoryCursor {
    return new InMemoryCursor(() => {
      this.checkFailure();
      return this.documents.filter((doc) => matches(doc, filter));
    }, options.projection);
  }

  async findOne(filter: Doc = {}): Promise<Doc | null> {
    this.checkFailure();
    const doc = this.documents.find((candidate) => matches(candidate, filter));
    return doc ? clone(doc) : null;
  }

  async insertOne(document: Doc): Promise<{ acknowledged: true; insertedId: unknown }> {
    this.checkFailure();
    if (document._id === undefined) {
      // The driver assigns the id on the caller's object
      document._id = new ObjectId();
    }
    const stored = clone(document);
    this.assertUnique(stored);
    this.documents.push(stored);
    return { acknowledged: true, insertedId: document._id };
  }

  async updateOne(
    filter: Doc,
    update: Doc
  ): Promise<{ acknowledged: true; matchedCount: number; modifiedCount: number }> {
    this.checkFailure();
    const index = this.documents.findIndex((doc) => matches(doc, filter));
    if (index === -1) {
      return { acknowledged: true, matchedCount: 0, modifiedCount: 0 };
    }

    const before = this.documents[index];
    const after = applyUpdate(clone(before), update);
    this.assertUnique(after);
    this.documents[index] = after;
    return { acknowledged: true, matchedCount: 1, modifiedCount: deepEqual(before, after) ? 0 : 1 };
  }

  async deleteOne(filter: Doc): Promise<{ acknowledged: true; deletedCount: number }> {
    this.checkFailure();
    const index = this.documents.findIndex((doc) => matches(doc, filter));
    if (index === -1) {
      return { acknowledged: true, deletedCount: 0 };
    }
    this.documents.splice(index, 1);
    return { acknowledged: true, deletedCount: 1 };
  }

  async deleteMany(filter: Doc): Promise<{ acknowledged: true; deletedCount: number }> {
    this.checkFailure();
    const remaining = this.documents.filter((doc) => !matches(doc, filter));
    const deletedCount = this.documents.length - remaining.length;
    this.documents.splice(0, this.documents.length, ...remaining);
    return { acknowledged: true, deletedCount };
  }

  async createIndex(keys: Record<string, 1 | -1>, options: { unique?: boolean } = {}): Promise<string> {
    this.checkFailure();
    this.indexes.push({ keys, unique: options.unique === true });
    return Object.entries(keys)
      .map(([field, direction]) => `${field}_${direction}`)
      .join('_');
  }
}

function applyUpdate(doc: Doc, update: Doc): Doc {
  for (const [operator, fields] of Object.entries(update)) {
    if (!isPlainObject(fields)) continue;
    for (const [path, value] of Object.entries(fields)) {
      switch (operator) {
        case '$set':
          setPath(doc, path, clone(value));
          break;
        case '$unset':
          delete doc[path];
          break;
        case '$inc': {
          const current = getPath(doc, path);
          setPath(doc, path, (typeof current === 'number' ? current : 0) + Number(value));
          break;
        }
        case '$push':
        case '$addToSet': {
          const current = getPath(doc, path);
          const list = Array.isArray(current) ? [...current] : [];
          const items = isPlainObject(value) && Array.isArray(value.$each) ? value.$each : [value];
          for (const item of items) {
            if (operator === '$push' || !list.some((existing) => deepEqual(existing, item))) {
              list.push(clone(item));
            }
          }
          setPath(doc, path, list);
          break;
        }
        case '$pull': {
          const current = getPath(doc, path);
          if (Array.isArray(current)) {
            setPath(
              doc,
              path,
              current.filter((item) => !deepEqual(item, value))
            );
          }
          break;
        }
        default:
          throw new Error(`Unsupported update operator in test store: ${operator}`);
      }
    }
  }
  return doc;
}

export class InMemoryDb {
  private readonly collections = new Map<string, InMemoryCollection>();

  collection(name: string): InMemoryCollection {
    let collection = this.collections.get(name);
    if (!collection) {
      collection = new InMemoryCollection(name);
      this.collections.set(name, collection);
    }
    return collection;
  }

  /** The fake, typed as the driver's Db for code under test */
  asDb(): Db {
    return this as unknown as Db;
  }
}
