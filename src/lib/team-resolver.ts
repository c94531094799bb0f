// Resolves which teams and chats an actor can reach.
// Read-only and uncached: membership is read fresh on every call.

import type { Db } from 'mongodb';
import type { Chat, Team } from '../types/mongodb';

/**
 * Ids of the teams the actor owns or is a member of.
 *
 * A failed lookup must not block the caller's operation: it is logged and
 * treated as "no team-granted access".
 */
export async function getTeamIdsForUser(db: Db, actorId: string): Promise<string[]> {
  try {
    const teams = await db
      .collection<Team>('teams')
      .find({ $or: [{ owner_id: actorId }, { users: actorId }] }, { projection: { _id: 1 } })
      .toArray();
    return teams.map((team) => team._id.toString());
  } catch (error) {
    console.error(`[Teams] Failed to resolve teams for ${actorId}:`, error);
    return [];
  }
}

/**
 * Ids of the chats the actor owns, was given access to, or can see through a team.
 */
export async function getChatIdsForUser(db: Db, actorId: string): Promise<string[]> {
  const teamIds = await getTeamIdsForUser(db, actorId);

  try {
    const chats = await db
      .collection<Chat>('chats')
      .find(
        {
          $or: [{ user_id: actorId }, { access_users: actorId }, { team_id: { $in: teamIds } }],
        },
        { projection: { _id: 1 } }
      )
      .toArray();
    return chats.map((chat) => chat._id.toString());
  } catch (error) {
    console.error(`[Chats] Failed to resolve chats for ${actorId}:`, error);
    return [];
  }
}
