// MongoDB collection type definitions

import { ObjectId } from 'mongodb';

/** Semantically opaque nested key/value data (metadata, config, graphs) */
export type OpaqueMap = Record<string, unknown>;

// ============================================================================
// Shared fields
// ============================================================================

export interface BaseDocument {
  _id?: ObjectId;
  created_at: Date;
  updated_at: Date;
  creator_id: string; // Actor who created this document
  team_id?: string | null; // String form of the owning team's _id
}

// ============================================================================
// User Collection
// ============================================================================

export interface UserIdentity {
  provider: string;
  user_id: string;
  connection: string;
  isSocial: boolean;
}

export interface User extends BaseDocument {
  user_id: string;
  email: string;
  email_verified: boolean;
  name: string;
  nickname: string;
  given_name?: string;
  family_name?: string;
  picture?: string;
  identities: UserIdentity[];
  last_ip?: string;
  last_login?: Date;
  logins_count: number;
  blocked_for: string[];
  guardian_authenticators: string[];
  passkeys: string[];
}

// ============================================================================
// Team Collection
// ============================================================================

export interface Team extends BaseDocument {
  name: string;
  description?: string;
  owner_id: string;
  users: string[]; // Member ids; the owner is always one of them
  metadata: OpaqueMap;
}

// ============================================================================
// Chat Collection
// ============================================================================

export interface Chat extends BaseDocument {
  user_id: string; // Owner
  session_id: string;
  title?: string;
  access_users: string[]; // Extra actors allowed to see this chat
  metadata: OpaqueMap;
}

// ============================================================================
// Session Collection
// ============================================================================

export interface Session extends BaseDocument {
  chat_id: string;
  user_id: string;
  timestamp: Date;
  device_id: string;
  ip: string;
  status: string; // 'active' unless the caller says otherwise
  metadata: OpaqueMap;
}

// ============================================================================
// Message Collection
// ============================================================================

export const MESSAGE_TYPES = ['text', 'image', 'file', 'json', 'system'] as const;
export type MessageType = (typeof MESSAGE_TYPES)[number];

export interface Message extends BaseDocument {
  sender_id: string;
  chat_id: string;
  session_id: string;
  timestamp: Date;
  text: string;
  url?: string;
  json?: OpaqueMap;
  type: MessageType;
  metadata: OpaqueMap;
}

// ============================================================================
// Workflow Collection
// ============================================================================

export const WORKFLOW_STATUSES = ['draft', 'active', 'completed', 'archived'] as const;
export type WorkflowStatus = (typeof WORKFLOW_STATUSES)[number];

export interface Workflow extends BaseDocument {
  user_id: string;
  chat_id: string;
  graph: OpaqueMap;
  timestamp: Date;
  name: string;
  version: string; // Semantic version, e.g. 1.0.0
  description?: string;
  tech_spec?: OpaqueMap;
  status: WorkflowStatus;
  metadata: OpaqueMap;
}

// ============================================================================
// Agent Collection
// ============================================================================

export const AGENT_TYPES = [
  'workflow_creator',
  'problem_understanding',
  'task_executor',
  'code_generator',
  'data_processor',
  'system',
] as const;
export type AgentType = (typeof AGENT_TYPES)[number];

// Registration also accepts agents backed by an external model runtime
export const REGISTRATION_AGENT_TYPES = [...AGENT_TYPES, 'gemini'] as const;
export type RegistrationAgentType = (typeof REGISTRATION_AGENT_TYPES)[number];

export const AGENT_STATUSES = ['active', 'inactive', 'archived'] as const;
export type AgentStatus = (typeof AGENT_STATUSES)[number];

export interface Agent extends BaseDocument {
  user_id: string;
  name: string;
  description?: string | null;
  type: RegistrationAgentType;
  version: string;
  config: OpaqueMap;
  system_message: string;
  src: string;
  command: string;
  status: AgentStatus;
  capabilities: string[];
  metadata: OpaqueMap;
  last_active: Date;
  performance_metrics?: OpaqueMap;
}

// ============================================================================
// Results returned to callers
// ============================================================================

/** A document as handed back to callers, with its _id normalised to a string */
export type WithStringId<T extends BaseDocument> = Omit<T, '_id'> & { _id: string };

export const SEMVER_PATTERN = /^\d+\.\d+\.\d+$/;
