/**
 * Tenant data gateway
 *
 * Typed collections over MongoDB with per-actor visibility filtering,
 * versioned agent registration, team management and age-based cleanup.
 *
 * ```ts
 * const gateway = await createDataGateway(getGatewayConfig());
 * const chats = await gateway.findDocuments('chats', {}, { actorId: 'user-1' });
 * await gateway.close();
 * ```
 */

import type { Db, Document, UpdateFilter } from 'mongodb';
import { AgentRegistry } from './lib/agent-registry';
import type { CollectionName } from './lib/collections';
import { withDefaults, type GatewayConfig } from './lib/config';
import {
  DocumentStore,
  type CleanupReport,
  type FindOptions,
  type Query,
  type StoredDocument,
} from './lib/document-store';
import type { RegistrationError, Result, ValidationError } from './lib/errors';
import { closeConnection, connectToDatabase, type MongoDBConnection } from './lib/mongodb';
import { TeamService } from './lib/teams';
import type {
  AgentRegistration,
  RegisterAgentRequest,
  RegisteredAgentFilters,
  RegistrationOutcome,
} from './types/agent-registration';
import type { RegistrationAgentType } from './types/mongodb';

export class DataGateway {
  readonly store: DocumentStore;
  readonly agents: AgentRegistry;
  readonly teams: TeamService;
  readonly config: GatewayConfig;

  constructor(
    db: Db,
    config: Partial<GatewayConfig> = {},
    private readonly connection?: MongoDBConnection
  ) {
    this.config = withDefaults(config);
    this.store = new DocumentStore(db, this.config);
    this.agents = new AgentRegistry(this.store);
    this.teams = new TeamService(this.store, this.config.adminId);
  }

  insertDocument(collection: CollectionName, document: Document): Promise<string> {
    return this.store.insert(collection, document);
  }

  findDocuments(
    collection: CollectionName,
    query: Query = {},
    options: FindOptions = {}
  ): Promise<StoredDocument[]> {
    return this.store.find(collection, query, options);
  }

  findDocument(
    collection: CollectionName,
    query: Query,
    actorId?: string
  ): Promise<StoredDocument | null> {
    return this.store.findOne(collection, query, actorId);
  }

  updateDocument(
    collection: CollectionName,
    query: Query,
    patch: UpdateFilter<Document>
  ): Promise<boolean> {
    return this.store.update(collection, query, patch);
  }

  deleteDocument(collection: CollectionName, query: Query): Promise<boolean> {
    return this.store.delete(collection, query);
  }

  registerAgent(
    request: RegisterAgentRequest
  ): Promise<Result<RegistrationOutcome, ValidationError | RegistrationError>> {
    return this.agents.register(request);
  }

  getAgentRegistration(
    actorId: string,
    name: string,
    type: RegistrationAgentType
  ): Promise<AgentRegistration | null> {
    return this.agents.get(actorId, name, type);
  }

  listRegisteredAgents(
    actorId: string,
    filters?: RegisteredAgentFilters
  ): Promise<AgentRegistration[]> {
    return this.agents.list(actorId, filters);
  }

  cleanup(retentionDays?: number): Promise<CleanupReport> {
    return this.store.cleanup(retentionDays);
  }

  async close(): Promise<void> {
    if (this.connection) {
      await closeConnection(this.connection);
    }
  }
}

/**
 * Connect to MongoDB, ensure indexes, and return a ready gateway.
 */
export async function createDataGateway(config: GatewayConfig): Promise<DataGateway> {
  const connection = await connectToDatabase(config);
  return new DataGateway(connection.db, config, connection);
}

export { getGatewayConfig, type GatewayConfig } from './lib/config';
export { COLLECTION_NAMES, isCollectionName, type CollectionName } from './lib/collections';
export { getChatIdsForUser, getTeamIdsForUser } from './lib/team-resolver';
export { augmentQuery } from './lib/visibility';
export { ensureIndexes } from './lib/mongodb';
export {
  AccessDeniedError,
  GatewayError,
  NotFoundError,
  RegistrationError,
  StoreError,
  ValidationError,
  type Result,
} from './lib/errors';
export type { CleanupReport, FindOptions, Query, StoredDocument } from './lib/document-store';
export * from './types/mongodb';
export * from './types/agent-registration';
export * from './types/teams';
