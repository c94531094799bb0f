// Team management: creation, ownership checks and membership changes.
// Only the owner (or the admin actor) may change or delete a team.

import { ObjectId } from 'mongodb';
import type { WithId } from 'mongodb';
import type { DocumentStore } from './document-store';
import {
  AccessDeniedError,
  NotFoundError,
  ValidationError,
  fail,
  ok,
  toStoreError,
  type GatewayError,
  type Result,
} from './errors';
import type { Team } from '../types/mongodb';
import type { CreateTeamRequest, TeamRecord, UpdateTeamRequest } from '../types/teams';

function toTeamRecord(team: WithId<Team>): TeamRecord {
  const { _id, ...rest } = team;
  return { ...rest, _id: _id.toString() };
}

function isMember(team: Team, actorId: string): boolean {
  return team.owner_id === actorId || team.users.includes(actorId);
}

export class TeamService {
  constructor(
    private readonly store: DocumentStore,
    private readonly adminId: string
  ) {}

  async create(actorId: string, request: CreateTeamRequest): Promise<Result<TeamRecord>> {
    if (!request.name || request.name.trim() === '') {
      return fail(new ValidationError('Missing required fields: name'));
    }

    const users = request.users ?? [];
    const now = new Date();
    const team: Omit<Team, '_id'> = {
      name: request.name.trim(),
      description: request.description,
      owner_id: actorId,
      users: users.includes(actorId) ? [...users] : [...users, actorId],
      metadata: request.metadata ?? {},
      creator_id: actorId,
      team_id: request.team_id ?? null,
      created_at: now,
      updated_at: now,
    };

    const id = await this.store.insert('teams', team);
    console.log(`[Teams] Team created: ${team.name} (${id}) by ${actorId}`);

    return ok({ ...team, _id: id });
  }

  /**
   * A team is visible to its owner, its members and the admin.
   */
  async get(actorId: string, teamId: string): Promise<Result<TeamRecord>> {
    const loaded = await this.load(teamId);
    if (!loaded.success) {
      return loaded;
    }

    const team = loaded.data;
    if (actorId !== this.adminId && !isMember(team, actorId)) {
      return fail(new AccessDeniedError('Not authorized to access this team'));
    }

    return ok(toTeamRecord(team));
  }

  /**
   * Teams the actor owns or belongs to.
   */
  async listForUser(actorId: string): Promise<TeamRecord[]> {
    try {
      const teams = await this.store
        .collection('teams')
        .find({ $or: [{ owner_id: actorId }, { users: actorId }] })
        .sort({ created_at: -1 })
        .toArray();
      return teams.map(toTeamRecord);
    } catch (error) {
      throw toStoreError(`Failed to list teams for ${actorId}`, error);
    }
  }

  async update(
    actorId: string,
    teamId: string,
    patch: UpdateTeamRequest
  ): Promise<Result<TeamRecord>> {
    const loaded = await this.loadOwned(actorId, teamId, 'update');
    if (!loaded.success) {
      return loaded;
    }

    const team = loaded.data;
    const changes: UpdateTeamRequest = {};
    if (patch.name !== undefined) changes.name = patch.name;
    if (patch.description !== undefined) changes.description = patch.description;
    if (patch.metadata !== undefined) changes.metadata = patch.metadata;
    if (patch.users !== undefined) {
      // The owner stays a member whatever the new list says
      changes.users = patch.users.includes(team.owner_id)
        ? patch.users
        : [...patch.users, team.owner_id];
    }

    const updated = await this.store.update('teams', { _id: team._id }, { $set: changes });
    if (!updated) {
      return fail(new ValidationError('No changes made to team'));
    }

    return this.get(actorId, teamId);
  }

  async delete(actorId: string, teamId: string): Promise<Result<true>> {
    const loaded = await this.loadOwned(actorId, teamId, 'delete');
    if (!loaded.success) {
      return loaded;
    }

    const deleted = await this.store.delete('teams', { _id: loaded.data._id });
    if (!deleted) {
      return fail(new NotFoundError('Team not found'));
    }

    console.log(`[Teams] Team deleted: ${loaded.data.name} (${teamId}) by ${actorId}`);
    return ok(true);
  }

  async addMember(actorId: string, teamId: string, memberId: string): Promise<Result<TeamRecord>> {
    const loaded = await this.loadOwned(actorId, teamId, 'add members to');
    if (!loaded.success) {
      return loaded;
    }

    const team = loaded.data;
    if (isMember(team, memberId)) {
      return fail(new ValidationError('User is already a member of this team'));
    }

    const updated = await this.store.update(
      'teams',
      { _id: team._id },
      { $addToSet: { users: memberId } }
    );
    if (!updated) {
      return fail(new ValidationError('User already in team or failed to add'));
    }

    console.log(`[Teams] Member added to team ${team.name}: ${memberId} by ${actorId}`);
    return this.get(actorId, teamId);
  }

  /**
   * Remove a member. The owner cannot be removed this way.
   */
  async removeMember(
    actorId: string,
    teamId: string,
    memberId: string
  ): Promise<Result<TeamRecord>> {
    const loaded = await this.loadOwned(actorId, teamId, 'remove members from');
    if (!loaded.success) {
      return loaded;
    }

    const team = loaded.data;
    if (memberId === team.owner_id) {
      return fail(new ValidationError('Cannot remove the team owner'));
    }

    if (!team.users.includes(memberId)) {
      return fail(new ValidationError('User is not a member of this team'));
    }

    const updated = await this.store.update(
      'teams',
      { _id: team._id },
      { $pull: { users: memberId } }
    );
    if (!updated) {
      return fail(new ValidationError('User not in team or failed to remove'));
    }

    console.log(`[Teams] Member removed from team ${team.name}: ${memberId} by ${actorId}`);
    return this.get(actorId, teamId);
  }

  private async load(teamId: string): Promise<Result<WithId<Team>, GatewayError>> {
    if (!ObjectId.isValid(teamId)) {
      return fail(new ValidationError('Invalid team ID format'));
    }

    let team: WithId<Team> | null;
    try {
      team = await this.store.collection('teams').findOne({ _id: new ObjectId(teamId) });
    } catch (error) {
      throw toStoreError(`Failed to load team ${teamId}`, error);
    }

    if (!team) {
      return fail(new NotFoundError('Team not found'));
    }
    return ok(team);
  }

  private async loadOwned(
    actorId: string,
    teamId: string,
    action: string
  ): Promise<Result<WithId<Team>, GatewayError>> {
    const loaded = await this.load(teamId);
    if (!loaded.success) {
      return loaded;
    }

    if (actorId !== this.adminId && actorId !== loaded.data.owner_id) {
      return fail(new AccessDeniedError(`Only the team owner can ${action} this team`));
    }
    return loaded;
  }
}
