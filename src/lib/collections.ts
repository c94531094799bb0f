// Collection registry: the known collections, their visibility rules,
// bookkeeping fields and indexes

import type { Document } from 'mongodb';
import {
  AGENT_STATUSES,
  MESSAGE_TYPES,
  REGISTRATION_AGENT_TYPES,
  SEMVER_PATTERN,
  WORKFLOW_STATUSES,
  type Agent,
  type Chat,
  type Message,
  type Session,
  type Team,
  type User,
  type Workflow,
} from '../types/mongodb';

export const COLLECTION_NAMES = [
  'users',
  'teams',
  'chats',
  'sessions',
  'messages',
  'workflows',
  'agents',
] as const;

export type CollectionName = (typeof COLLECTION_NAMES)[number];

export interface CollectionDocuments {
  users: User;
  teams: Team;
  chats: Chat;
  sessions: Session;
  messages: Message;
  workflows: Workflow;
  agents: Agent;
}

/**
 * How an actor's identity narrows reads on a collection.
 *
 * - "chat-access":   owner, access_users, or a member of the chat's team
 * - "owner-or-team": owner or a member of the document's team
 * - "chat-scoped":   belongs to a chat the actor can see
 * - "none":          no implicit filter (callers check ownership themselves)
 */
export type VisibilityRule = 'chat-access' | 'owner-or-team' | 'chat-scoped' | 'none';

export interface IndexDefinition {
  keys: Record<string, 1 | -1>;
  unique?: boolean;
}

/**
 * Checks the fields being written (a whole document on insert, the `$set`
 * fields on update). Returns a message for the first bad value, or null.
 * Fields that are absent are not checked.
 */
export type FieldValidator = (fields: Document) => string | null;

export interface CollectionDefinition {
  visibility: VisibilityRule;
  /** Timestamp the gateway owns: stamped on insert, forced to now on update */
  activityField?: 'timestamp' | 'last_active';
  indexes: IndexDefinition[];
  validators?: FieldValidator[];
}

const createdAt: IndexDefinition = { keys: { created_at: -1 } };

function oneOf(field: string, allowed: readonly string[]): FieldValidator {
  return (fields) => {
    const value: unknown = fields[field];
    if (value === undefined || (typeof value === 'string' && allowed.includes(value))) {
      return null;
    }
    return `Invalid ${field} "${String(value)}". Must be one of: ${allowed.join(', ')}`;
  };
}

function semanticVersion(field: string): FieldValidator {
  return (fields) => {
    const value: unknown = fields[field];
    if (value === undefined || (typeof value === 'string' && SEMVER_PATTERN.test(value))) {
      return null;
    }
    return 'Version must be in semantic versioning format (e.g., 1.0.0)';
  };
}

export const COLLECTIONS = {
  users: {
    visibility: 'none',
    indexes: [
      { keys: { email: 1 }, unique: true },
      { keys: { user_id: 1 }, unique: true },
      createdAt,
    ],
  },
  teams: {
    visibility: 'none',
    indexes: [{ keys: { owner_id: 1 } }, { keys: { users: 1 } }, createdAt],
  },
  chats: {
    visibility: 'chat-access',
    indexes: [
      { keys: { user_id: 1 } },
      { keys: { session_id: 1 } },
      { keys: { team_id: 1 } },
      { keys: { access_users: 1 } },
      createdAt,
    ],
  },
  sessions: {
    visibility: 'chat-scoped',
    indexes: [{ keys: { chat_id: 1 } }, { keys: { user_id: 1 } }, createdAt],
  },
  messages: {
    visibility: 'chat-scoped',
    indexes: [
      { keys: { chat_id: 1 } },
      { keys: { session_id: 1 } },
      { keys: { sender_id: 1 } },
      { keys: { type: 1 } },
      { keys: { timestamp: -1 } },
      createdAt,
    ],
    validators: [oneOf('type', MESSAGE_TYPES)],
  },
  workflows: {
    visibility: 'owner-or-team',
    activityField: 'timestamp',
    indexes: [
      { keys: { user_id: 1 } },
      { keys: { chat_id: 1 } },
      { keys: { team_id: 1 } },
      { keys: { status: 1 } },
      { keys: { version: 1 } },
      createdAt,
    ],
    validators: [semanticVersion('version'), oneOf('status', WORKFLOW_STATUSES)],
  },
  agents: {
    visibility: 'owner-or-team',
    activityField: 'last_active',
    indexes: [
      { keys: { user_id: 1 } },
      { keys: { type: 1 } },
      { keys: { version: 1 } },
      { keys: { status: 1 } },
      { keys: { team_id: 1 } },
      { keys: { user_id: 1, version: 1 } },
      { keys: { user_id: 1, type: 1 } },
      { keys: { user_id: 1, name: 1, type: 1 }, unique: true },
      { keys: { last_active: -1 } },
      createdAt,
    ],
    validators: [
      semanticVersion('version'),
      oneOf('type', REGISTRATION_AGENT_TYPES),
      oneOf('status', AGENT_STATUSES),
    ],
  },
} satisfies Record<CollectionName, CollectionDefinition>;

export function getCollectionDefinition(name: CollectionName): CollectionDefinition {
  return COLLECTIONS[name];
}

/**
 * The first problem with `fields` for this collection, or null.
 */
export function validateFields(name: CollectionName, fields: Document): string | null {
  for (const validator of getCollectionDefinition(name).validators ?? []) {
    const problem = validator(fields);
    if (problem) {
      return problem;
    }
  }
  return null;
}

export function isCollectionName(value: string): value is CollectionName {
  return COLLECTION_NAMES.some((name) => name === value);
}
