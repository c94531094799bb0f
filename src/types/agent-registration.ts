/**
 * Agent Registration Types
 *
 * An agent is registered per (user_id, name, type). Registering the same key
 * again upgrades the stored agent in place rather than adding a second one.
 */

import type { Agent, AgentStatus, OpaqueMap, RegistrationAgentType, WithStringId } from './mongodb';

export interface RegisterAgentRequest {
  user_id: string; // Registering actor
  name: string;
  type: string; // Checked against REGISTRATION_AGENT_TYPES
  version: string; // Semantic version, e.g. 1.2.0
  config: OpaqueMap;
  system_message: string;
  src: string;
  command: string;
  description?: string;
  capabilities?: string[];
  metadata?: OpaqueMap;
  team_id?: string;
}

export type RegistrationAction = 'inserted' | 'updated';

export interface RegistrationOutcome {
  id: string;
  action: RegistrationAction;
}

export interface RegisteredAgentFilters {
  type?: RegistrationAgentType;
  status?: AgentStatus;
}

export type AgentRegistration = WithStringId<Agent>;

/**
 * Baseline configuration for each agent type. Caller-supplied keys win;
 * keys the caller leaves out are taken from here.
 */
export const DEFAULT_AGENT_CONFIGS: Record<RegistrationAgentType, OpaqueMap> = {
  workflow_creator: {
    model: 'gpt-4o',
    temperature: 0.2,
    max_tokens: 4096,
    output_format: 'graph',
  },
  problem_understanding: {
    model: 'gpt-4o',
    temperature: 0.3,
    max_tokens: 2048,
    clarifying_questions: true,
  },
  task_executor: {
    model: 'gpt-4o-mini',
    temperature: 0,
    max_tokens: 2048,
    timeout_seconds: 300,
    max_retries: 2,
  },
  code_generator: {
    model: 'gpt-4o',
    temperature: 0.1,
    max_tokens: 8192,
    language: 'python',
  },
  data_processor: {
    model: 'gpt-4o-mini',
    temperature: 0,
    max_tokens: 4096,
    batch_size: 100,
  },
  system: {
    temperature: 0,
    max_tokens: 1024,
  },
  gemini: {
    model: 'gemini-1.5-pro',
    temperature: 0.2,
    max_output_tokens: 8192,
  },
};
