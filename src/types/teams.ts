// Team types for team management and sharing

import type { OpaqueMap, Team, WithStringId } from './mongodb';

export interface CreateTeamRequest {
  name: string;
  description?: string;
  users?: string[]; // Initial member ids; the creator is always added
  metadata?: OpaqueMap;
  team_id?: string; // Parent team, if any
}

export interface UpdateTeamRequest {
  name?: string;
  description?: string;
  users?: string[];
  metadata?: OpaqueMap;
}

export type TeamRecord = WithStringId<Team>;
