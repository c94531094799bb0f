/**
 * Tests for teams.ts
 *
 * Covers:
 * - creation always includes the owner as a member
 * - read access for owner, members and admin
 * - owner-only update / delete / membership changes, with admin override
 * - the owner can never be removed
 */

import { ObjectId } from 'mongodb';
import { TeamService } from '@/lib/teams';
import { DocumentStore } from '@/lib/document-store';
import { getTeamIdsForUser } from '@/lib/team-resolver';
import { withDefaults } from '@/lib/config';
import { AccessDeniedError, NotFoundError, ValidationError, type Result } from '@/lib/errors';
import type { TeamRecord } from '@/types/teams';
import { InMemoryDb } from '@/test-utils/in-memory-db';

const ADMIN = 'admin';

let memory: InMemoryDb;
let teams: TeamService;

beforeEach(() => {
  jest.spyOn(console, 'log').mockImplementation(() => {});
  jest.spyOn(console, 'error').mockImplementation(() => {});
  memory = new InMemoryDb();
  teams = new TeamService(new DocumentStore(memory.asDb(), withDefaults({ adminId: ADMIN })), ADMIN);
});

afterEach(() => {
  jest.restoreAllMocks();
});

function unwrap<T>(result: Result<T>): T {
  if (!result.success) {
    throw result.error;
  }
  return result.data;
}

function errorOf<T>(result: Result<T>) {
  if (result.success) {
    throw new Error('expected a failed result');
  }
  return result.error;
}

async function createTeam(owner = 'alice', users: string[] = ['bob']): Promise<TeamRecord> {
  return unwrap(await teams.create(owner, { name: 'Platform', users }));
}

// ─────────────────────────────────────────────────────────────────────────────
// create / get / list
// ─────────────────────────────────────────────────────────────────────────────
describe('create', () => {
  it('should add the owner to the member list', async () => {
    const team = await createTeam('alice', ['bob']);

    expect(team.owner_id).toBe('alice');
    expect(team.users).toEqual(['bob', 'alice']);
    expect(memory.collection('teams').documents[0]).toMatchObject({
      name: 'Platform',
      owner_id: 'alice',
      creator_id: 'alice',
      users: ['bob', 'alice'],
    });
    expect(console.log).toHaveBeenCalledWith(`[Teams] Team created: Platform (${team._id}) by alice`);
  });

  it('should not duplicate an owner already listed', async () => {
    const team = await createTeam('alice', ['alice', 'bob']);
    expect(team.users).toEqual(['alice', 'bob']);
  });

  it('should reject a blank name', async () => {
    const error = errorOf(await teams.create('alice', { name: '  ' }));

    expect(error).toBeInstanceOf(ValidationError);
    expect(error.message).toBe('Missing required fields: name');
    expect(memory.collection('teams').documents).toHaveLength(0);
  });
});

describe('get', () => {
  it('should let the owner and members read the team', async () => {
    const team = await createTeam();

    expect(unwrap(await teams.get('alice', team._id)).name).toBe('Platform');
    expect(unwrap(await teams.get('bob', team._id))._id).toBe(team._id);
  });

  it('should let the admin read any team', async () => {
    const team = await createTeam();
    expect((await teams.get(ADMIN, team._id)).success).toBe(true);
  });

  it('should deny outsiders', async () => {
    const team = await createTeam();
    const error = errorOf(await teams.get('mallory', team._id));

    expect(error).toBeInstanceOf(AccessDeniedError);
    expect(error.code).toBe('FORBIDDEN');
  });

  it('should reject a malformed team id', async () => {
    const error = errorOf(await teams.get('alice', 'not-an-id'));

    expect(error).toBeInstanceOf(ValidationError);
    expect(error.message).toBe('Invalid team ID format');
  });

  it('should report a missing team', async () => {
    const error = errorOf(await teams.get('alice', new ObjectId().toString()));

    expect(error).toBeInstanceOf(NotFoundError);
    expect(error.message).toBe('Team not found');
  });
});

describe('listForUser', () => {
  it('should list owned and joined teams, newest first', async () => {
    await teams.create('alice', { name: 'First' });
    await new Promise((resolve) => setTimeout(resolve, 5));
    await teams.create('carol', { name: 'Second', users: ['alice'] });
    await teams.create('carol', { name: 'Elsewhere' });

    const listed = await teams.listForUser('alice');

    expect(listed.map((team) => team.name)).toEqual(['Second', 'First']);
  });
});

// ─────────────────────────────────────────────────────────────────────────────
// update / delete
// ─────────────────────────────────────────────────────────────────────────────
describe('update', () => {
  it('should apply the owner’s changes', async () => {
    const team = await createTeam();

    const updated = unwrap(await teams.update('alice', team._id, { name: 'Infra', description: 'Infra team' }));

    expect(updated.name).toBe('Infra');
    expect(updated.description).toBe('Infra team');
  });

  it('should keep the owner in a replaced member list', async () => {
    const team = await createTeam();

    const updated = unwrap(await teams.update('alice', team._id, { users: ['carol'] }));

    expect(updated.users).toEqual(['carol', 'alice']);
  });

  it('should deny members who are not the owner', async () => {
    const team = await createTeam();
    const error = errorOf(await teams.update('bob', team._id, { name: 'Mine' }));

    expect(error).toBeInstanceOf(AccessDeniedError);
    expect(error.message).toBe('Only the team owner can update this team');
  });

  it('should let the admin update any team', async () => {
    const team = await createTeam();
    expect(unwrap(await teams.update(ADMIN, team._id, { name: 'Renamed' })).name).toBe('Renamed');
  });
});

describe('delete', () => {
  it('should let the owner delete the team', async () => {
    const team = await createTeam();

    expect(unwrap(await teams.delete('alice', team._id))).toBe(true);
    expect(memory.collection('teams').documents).toHaveLength(0);
  });

  it('should deny members who are not the owner', async () => {
    const team = await createTeam();

    expect(errorOf(await teams.delete('bob', team._id))).toBeInstanceOf(AccessDeniedError);
    expect(memory.collection('teams').documents).toHaveLength(1);
  });

  it('should report a missing team', async () => {
    expect(errorOf(await teams.delete('alice', new ObjectId().toString()))).toBeInstanceOf(NotFoundError);
  });
});

// ─────────────────────────────────────────────────────────────────────────────
// membership
// ─────────────────────────────────────────────────────────────────────────────
describe('addMember', () => {
  it('should add a new member', async () => {
    const team = await createTeam();

    const updated = unwrap(await teams.addMember('alice', team._id, 'carol'));

    expect(updated.users).toEqual(['bob', 'alice', 'carol']);
    expect(await getTeamIdsForUser(memory.asDb(), 'carol')).toEqual([team._id]);
  });

  it('should reject an existing member', async () => {
    const team = await createTeam();
    const error = errorOf(await teams.addMember('alice', team._id, 'bob'));

    expect(error.message).toBe('User is already a member of this team');
  });

  it('should deny non-owners', async () => {
    const team = await createTeam();
    const error = errorOf(await teams.addMember('bob', team._id, 'carol'));

    expect(error.message).toBe('Only the team owner can add members to this team');
  });
});

describe('removeMember', () => {
  it('should remove a member and revoke their team access', async () => {
    const team = await createTeam();
    expect(await getTeamIdsForUser(memory.asDb(), 'bob')).toEqual([team._id]);

    const updated = unwrap(await teams.removeMember('alice', team._id, 'bob'));

    expect(updated.users).toEqual(['alice']);
    expect(await getTeamIdsForUser(memory.asDb(), 'bob')).toEqual([]);
  });

  it('should never remove the owner', async () => {
    const team = await createTeam();
    const error = errorOf(await teams.removeMember('alice', team._id, 'alice'));

    expect(error).toBeInstanceOf(ValidationError);
    expect(error.message).toBe('Cannot remove the team owner');
    expect(memory.collection('teams').documents[0].users).toEqual(['bob', 'alice']);
  });

  it('should not let the admin remove the owner either', async () => {
    const team = await createTeam();
    const error = errorOf(await teams.removeMember(ADMIN, team._id, 'alice'));

    expect(error.message).toBe('Cannot remove the team owner');
  });

  it('should reject a user who is not a member', async () => {
    const team = await createTeam();
    const error = errorOf(await teams.removeMember('alice', team._id, 'carol'));

    expect(error.message).toBe('User is not a member of this team');
  });

  it('should deny non-owners', async () => {
    const team = await createTeam('alice', ['bob', 'carol']);
    const error = errorOf(await teams.removeMember('bob', team._id, 'carol'));

    expect(error).toBeInstanceOf(AccessDeniedError);
    expect(memory.collection('teams').documents[0].users).toEqual(['bob', 'carol', 'alice']);
  });
});
