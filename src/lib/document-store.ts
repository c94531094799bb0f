// Generic insert / find / update / delete over the known collections,
// with timestamp bookkeeping and visibility filtering on reads

import { ObjectId } from 'mongodb';
import type { Collection, Db, Document, Sort, UpdateFilter, WithId } from 'mongodb';
import { subDays } from 'date-fns';
import type { GatewayConfig } from './config';
import {
  COLLECTION_NAMES,
  getCollectionDefinition,
  validateFields,
  type CollectionDocuments,
  type CollectionName,
} from './collections';
import { ValidationError, toStoreError } from './errors';
import { augmentQuery } from './visibility';

export const DEFAULT_FIND_LIMIT = 100;
export const MAX_FIND_LIMIT = 1000;

/** A document as returned to callers: `_id` is always a string */
export interface StoredDocument extends Document {
  _id: string;
}

export interface FindOptions {
  /** When set, the query is narrowed to what this actor may see */
  actorId?: string;
  limit?: number;
  skip?: number;
  sort?: Sort;
}

/**
 * A query as callers write it. Ids may be given in their string form;
 * they are converted to ObjectIds before the query reaches the driver.
 */
export type Query = Document;

export type CleanupReport = Record<CollectionName, number>;

/**
 * Convert a stored document's `_id` to its canonical string form.
 */
export function normalizeId(document: WithId<Document>): StoredDocument {
  return { ...document, _id: String(document._id) };
}

/**
 * Callers pass ids as strings; stored ids are ObjectIds. Convert a top-level
 * `_id` string (or `$in` list of strings) that is a valid ObjectId.
 */
export function toObjectIdQuery(query: Query): Query {
  const id: unknown = query._id;

  if (typeof id === 'string' && ObjectId.isValid(id)) {
    return { ...query, _id: new ObjectId(id) };
  }

  if (typeof id === 'object' && id !== null && '$in' in id && Array.isArray(id.$in)) {
    const ids: unknown[] = id.$in;
    const condition: Document = {
      ...id,
      $in: ids.map((value) =>
        typeof value === 'string' && ObjectId.isValid(value) ? new ObjectId(value) : value
      ),
    };
    return { ...query, _id: condition };
  }

  return query;
}

function clampLimit(limit: number | undefined): number {
  if (limit === undefined) {
    return DEFAULT_FIND_LIMIT;
  }
  if (!Number.isInteger(limit) || limit < 1) {
    throw new ValidationError('limit must be a positive integer');
  }
  return Math.min(limit, MAX_FIND_LIMIT);
}

function assertValidFields(collection: CollectionName, fields: Document): void {
  const problem = validateFields(collection, fields);
  if (problem) {
    throw new ValidationError(problem);
  }
}

export class DocumentStore {
  constructor(
    private readonly db: Db,
    private readonly config: GatewayConfig
  ) {}

  /**
   * Typed access to a collection for callers that know its shape.
   */
  collection<C extends CollectionName>(name: C): Collection<CollectionDocuments[C]> {
    return this.db.collection<CollectionDocuments[C]>(name);
  }

  /**
   * Insert a document, stamping bookkeeping timestamps the caller left out.
   * Returns the new document's id.
   */
  async insert(collection: CollectionName, document: Document): Promise<string> {
    assertValidFields(collection, document);

    const now = new Date();
    const stamped: Document = {
      ...document,
      created_at: document.created_at ?? now,
      updated_at: document.updated_at ?? now,
    };

    const activityField = getCollectionDefinition(collection).activityField;
    if (activityField && stamped[activityField] === undefined) {
      stamped[activityField] = now;
    }

    try {
      const result = await this.db.collection(collection).insertOne(stamped);
      return result.insertedId.toString();
    } catch (error) {
      console.error(`❌ Failed to insert into ${collection}:`, error);
      throw toStoreError(`Failed to insert document into ${collection}`, error);
    }
  }

  /**
   * Find documents, narrowed to the actor's visible set when `actorId` is given.
   * Nothing matching is an empty list, not an error.
   */
  async find(
    collection: CollectionName,
    query: Query = {},
    options: FindOptions = {}
  ): Promise<StoredDocument[]> {
    const limit = clampLimit(options.limit);
    const skip = options.skip ?? 0;
    if (!Number.isInteger(skip) || skip < 0) {
      throw new ValidationError('skip must be a non-negative integer');
    }

    try {
      let effectiveQuery = toObjectIdQuery(query);
      if (options.actorId !== undefined) {
        effectiveQuery = await augmentQuery(
          this.db,
          collection,
          options.actorId,
          effectiveQuery,
          this.config.adminId
        );
      }

      let cursor = this.db.collection(collection).find(effectiveQuery);
      if (options.sort) {
        cursor = cursor.sort(options.sort);
      }

      const documents = await cursor.skip(skip).limit(limit).toArray();
      return documents.map(normalizeId);
    } catch (error) {
      console.error(`❌ Failed to find documents in ${collection}:`, error);
      throw toStoreError(`Failed to find documents in ${collection}`, error);
    }
  }

  async findOne(
    collection: CollectionName,
    query: Query = {},
    actorId?: string
  ): Promise<StoredDocument | null> {
    const [document] = await this.find(collection, query, { actorId, limit: 1 });
    return document ?? null;
  }

  /**
   * Apply `patch` to the first matching document.
   *
   * `updated_at` is always set to now. The collection's activity field
   * (workflow `timestamp`, agent `last_active`) is not client-settable: if the
   * patch sets it, it is replaced with now.
   *
   * Returns whether a document was modified; no match is `false`.
   */
  async update(
    collection: CollectionName,
    query: Query,
    patch: UpdateFilter<Document>
  ): Promise<boolean> {
    assertValidFields(collection, patch.$set ?? {});

    const now = new Date();
    const $set: Document = { ...(patch.$set ?? {}), updated_at: now };

    const activityField = getCollectionDefinition(collection).activityField;
    if (activityField && activityField in $set) {
      $set[activityField] = now;
    }

    try {
      const result = await this.db
        .collection(collection)
        .updateOne(toObjectIdQuery(query), { ...patch, $set });
      return result.modifiedCount === 1;
    } catch (error) {
      console.error(`❌ Failed to update document in ${collection}:`, error);
      throw toStoreError(`Failed to update document in ${collection}`, error);
    }
  }

  /**
   * Remove at most one matching document.
   */
  async delete(collection: CollectionName, query: Query): Promise<boolean> {
    try {
      const result = await this.db.collection(collection).deleteOne(toObjectIdQuery(query));
      return result.deletedCount === 1;
    } catch (error) {
      console.error(`❌ Failed to delete document from ${collection}:`, error);
      throw toStoreError(`Failed to delete document from ${collection}`, error);
    }
  }

  /**
   * Delete every document created before the retention horizon, across all
   * collections. The first failing collection aborts the sweep.
   */
  async cleanup(retentionDays: number = this.config.retentionDays): Promise<CleanupReport> {
    if (!Number.isInteger(retentionDays) || retentionDays < 0) {
      throw new ValidationError('retentionDays must be a non-negative integer');
    }

    const cutoff = subDays(new Date(), retentionDays);
    const report: CleanupReport = {
      users: 0,
      teams: 0,
      chats: 0,
      sessions: 0,
      messages: 0,
      workflows: 0,
      agents: 0,
    };

    for (const name of COLLECTION_NAMES) {
      try {
        const result = await this.db.collection(name).deleteMany({ created_at: { $lt: cutoff } });
        report[name] = result.deletedCount;
        console.log(`[Cleanup] Deleted ${result.deletedCount} old documents from ${name}`);
      } catch (error) {
        console.error(`[Cleanup] Failed to clean up ${name}:`, error);
        throw toStoreError(`Failed to clean up ${name}`, error);
      }
    }

    return report;
  }
}
