// Versioned agent registration: one agent per (user_id, name, type),
// upgraded in place when registered again

import type { Filter, WithId } from 'mongodb';
import type { DocumentStore } from './document-store';
import {
  RegistrationError,
  ValidationError,
  fail,
  isDuplicateKeyError,
  ok,
  toStoreError,
  type Result,
} from './errors';
import {
  REGISTRATION_AGENT_TYPES,
  SEMVER_PATTERN,
  type Agent,
  type OpaqueMap,
  type RegistrationAgentType,
} from '../types/mongodb';
import {
  DEFAULT_AGENT_CONFIGS,
  type AgentRegistration,
  type RegisterAgentRequest,
  type RegisteredAgentFilters,
  type RegistrationOutcome,
} from '../types/agent-registration';

export function isRegistrationAgentType(value: string): value is RegistrationAgentType {
  return REGISTRATION_AGENT_TYPES.some((type) => type === value);
}

export function isSemanticVersion(value: string): boolean {
  return SEMVER_PATTERN.test(value);
}

/**
 * Overlay caller-supplied config on the type's defaults, key by key.
 */
export function mergeAgentConfig(type: RegistrationAgentType, config: OpaqueMap = {}): OpaqueMap {
  return { ...DEFAULT_AGENT_CONFIGS[type], ...config };
}

const REQUIRED_FIELDS = ['user_id', 'name', 'system_message', 'src', 'command'] as const;

function toRegistration(document: WithId<Agent>): AgentRegistration {
  const { _id, ...rest } = document;
  return { ...rest, _id: _id.toString() };
}

export class AgentRegistry {
  constructor(private readonly store: DocumentStore) {}

  /**
   * Register a new agent, or upgrade the existing one with the same
   * (user_id, name, type).
   *
   * Invalid input comes back as a failed result; store failures are thrown.
   */
  async register(
    request: RegisterAgentRequest
  ): Promise<Result<RegistrationOutcome, ValidationError | RegistrationError>> {
    const missing = REQUIRED_FIELDS.filter((field) => request[field].trim() === '');
    if (missing.length > 0) {
      return fail(new ValidationError(`Missing required fields: ${missing.join(', ')}`));
    }

    const { type } = request;
    if (!isRegistrationAgentType(type)) {
      return fail(
        new ValidationError(
          `Invalid agent type "${type}". Must be one of: ${REGISTRATION_AGENT_TYPES.join(', ')}`
        )
      );
    }

    if (!isSemanticVersion(request.version)) {
      return fail(
        new ValidationError('Version must be in semantic versioning format (e.g., 1.0.0)')
      );
    }

    const config = mergeAgentConfig(type, request.config);
    const existing = await this.findRegistered(request.user_id, request.name, type);

    if (existing) {
      const now = new Date();
      const updated = await this.store.update(
        'agents',
        { _id: existing._id },
        {
          $set: {
            version: request.version,
            config,
            system_message: request.system_message,
            src: request.src,
            command: request.command,
            description: request.description ?? null,
            capabilities: request.capabilities ?? existing.capabilities,
            metadata: request.metadata ?? existing.metadata,
            last_active: now,
          },
        }
      );

      if (!updated) {
        return fail(
          new RegistrationError(`Failed to update agent ${request.name} (${type}) for ${request.user_id}`)
        );
      }

      console.log(
        `[Agents] Updated ${request.name} (${type}) for ${request.user_id}: ${existing.version} -> ${request.version}`
      );
      return ok({ id: existing._id.toString(), action: 'updated' });
    }

    const now = new Date();
    const agent: Omit<Agent, '_id'> = {
      user_id: request.user_id,
      creator_id: request.user_id,
      team_id: request.team_id ?? null,
      name: request.name,
      description: request.description ?? null,
      type,
      version: request.version,
      config,
      system_message: request.system_message,
      src: request.src,
      command: request.command,
      status: 'active',
      capabilities: request.capabilities ?? [],
      metadata: request.metadata ?? {},
      last_active: now,
      created_at: now,
      updated_at: now,
    };

    try {
      const id = await this.store.insert('agents', agent);
      console.log(`[Agents] Registered ${request.name} (${type}) ${request.version} for ${request.user_id}`);
      return ok({ id, action: 'inserted' });
    } catch (error) {
      // A concurrent registration of the same key won the race
      if (error instanceof Error && isDuplicateKeyError(error.cause)) {
        return fail(new ValidationError('agent already exists for this user'));
      }
      throw error;
    }
  }

  /**
   * Exact-match lookup. A missing registration is `null`, not an error.
   */
  async get(
    actorId: string,
    name: string,
    type: RegistrationAgentType
  ): Promise<AgentRegistration | null> {
    const agent = await this.findRegistered(actorId, name, type);
    return agent ? toRegistration(agent) : null;
  }

  /**
   * The actor's registered agents, most recently active first.
   */
  async list(actorId: string, filters: RegisteredAgentFilters = {}): Promise<AgentRegistration[]> {
    const query: Filter<Agent> = { user_id: actorId };
    if (filters.type) {
      query.type = filters.type;
    }
    if (filters.status) {
      query.status = filters.status;
    }

    try {
      const agents = await this.store
        .collection('agents')
        .find(query)
        .sort({ last_active: -1 })
        .toArray();
      return agents.map(toRegistration);
    } catch (error) {
      throw toStoreError(`Failed to list agents for ${actorId}`, error);
    }
  }

  private async findRegistered(
    actorId: string,
    name: string,
    type: RegistrationAgentType
  ): Promise<WithId<Agent> | null> {
    try {
      return await this.store.collection('agents').findOne({ user_id: actorId, name, type });
    } catch (error) {
      throw toStoreError(`Failed to look up agent ${name} (${type})`, error);
    }
  }
}
