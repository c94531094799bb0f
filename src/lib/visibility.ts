// Narrows a query to the documents an actor is entitled to see

import type { Db, Document } from 'mongodb';
import { getCollectionDefinition, type CollectionName } from './collections';
import { getChatIdsForUser, getTeamIdsForUser } from './team-resolver';

/**
 * Build the access predicate for a collection, or null when the collection
 * has no implicit filter (users and teams are checked by their callers).
 */
async function accessPredicate(
  db: Db,
  collection: CollectionName,
  actorId: string
): Promise<Document | null> {
  switch (getCollectionDefinition(collection).visibility) {
    case 'chat-access': {
      const teamIds = await getTeamIdsForUser(db, actorId);
      return {
        $or: [{ user_id: actorId }, { access_users: actorId }, { team_id: { $in: teamIds } }],
      };
    }
    case 'owner-or-team': {
      const teamIds = await getTeamIdsForUser(db, actorId);
      return { $or: [{ user_id: actorId }, { team_id: { $in: teamIds } }] };
    }
    case 'chat-scoped': {
      const chatIds = await getChatIdsForUser(db, actorId);
      return { chat_id: { $in: chatIds } };
    }
    case 'none':
      return null;
  }
}

/**
 * Restrict `baseQuery` to what `actorId` may see in `collection`.
 *
 * The access predicate is ANDed with the caller's query, so it can only
 * narrow the result set; a caller-supplied `$or` or `chat_id` is kept as is.
 * The admin actor is never narrowed.
 */
export async function augmentQuery(
  db: Db,
  collection: CollectionName,
  actorId: string,
  baseQuery: Document,
  adminId: string
): Promise<Document> {
  if (actorId === adminId) {
    return baseQuery;
  }

  const predicate = await accessPredicate(db, collection, actorId);
  if (!predicate) {
    return baseQuery;
  }

  if (Object.keys(baseQuery).length === 0) {
    return predicate;
  }

  return { $and: [baseQuery, predicate] };
}
