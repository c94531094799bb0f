// MongoDB connection and index bootstrap for the gateway.
// Each gateway owns its own client; there is no module-level cached connection.

import { MongoClient, Db } from 'mongodb';
import type { GatewayConfig } from './config';
import {
  COLLECTION_NAMES,
  getCollectionDefinition,
  type CollectionName,
  type IndexDefinition,
} from './collections';
import { StoreError, isIndexConflictError } from './errors';

export interface MongoDBConnection {
  client: MongoClient;
  db: Db;
}

/**
 * Connect to MongoDB and make sure every collection's indexes exist.
 * The client's pool is shared by all concurrent gateway calls.
 */
export async function connectToDatabase(config: GatewayConfig): Promise<MongoDBConnection> {
  const client = new MongoClient(config.mongodbUri, {
    maxPoolSize: 10,
    minPoolSize: 2,
    serverSelectionTimeoutMS: 5000,
    socketTimeoutMS: 45000,
  });

  try {
    await client.connect();
  } catch (error) {
    throw new StoreError(`Failed to connect to MongoDB database ${config.databaseName}`, error);
  }

  const db = client.db(config.databaseName);

  try {
    await ensureIndexes(db);
  } catch (error) {
    await client.close();
    throw error;
  }

  console.log(`✅ Connected to MongoDB database: ${config.databaseName}`);

  return { client, db };
}

/**
 * Create a single index.
 *
 * A unique index that cannot be built is fatal, even when an index with the
 * same keys already exists: it may not enforce uniqueness. Other conflicts
 * are skipped with a warning and other failures are logged.
 */
async function createIndex(db: Db, collectionName: CollectionName, index: IndexDefinition): Promise<void> {
  const label = `${collectionName} ${JSON.stringify(index.keys)}`;
  try {
    await db.collection(collectionName).createIndex(index.keys, index.unique ? { unique: true } : {});
  } catch (error: unknown) {
    if (index.unique) {
      throw new StoreError(`Failed to create unique index on ${label}`, error);
    }

    if (isIndexConflictError(error)) {
      // An index with these keys already exists with different options
      console.warn(`⚠️  Index conflict on ${label} - skipping`);
      return;
    }

    console.error(`❌ Failed to create index on ${label}:`, error);
  }
}

/**
 * Create indexes for all collections.
 *
 * Indexes are created concurrently; a non-unique failure does not stop the
 * others.
 */
export async function ensureIndexes(db: Db): Promise<void> {
  await Promise.all(
    COLLECTION_NAMES.flatMap((name) =>
      getCollectionDefinition(name).indexes.map((index) => createIndex(db, name, index))
    )
  );

  console.log('✅ MongoDB indexes ensured');
}

/**
 * Close a MongoDB connection.
 * Use this for graceful shutdown.
 */
export async function closeConnection(connection: MongoDBConnection): Promise<void> {
  await connection.client.close();
  console.log('MongoDB connection closed');
}
