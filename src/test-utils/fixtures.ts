/**
 * A small multi-tenant data set shared by the visibility tests.
 *
 *   team-alpha (owner alice, members alice + bob)
 *   team-beta  (owner carol, member carol)
 *
 *   chat-alice     owned by alice
 *   chat-shared    owned by carol, access_users [dave]
 *   chat-alpha     owned by carol, team_id team-alpha
 *   chat-beta      owned by erin,  team_id team-beta
 *   chat-erin      owned by erin
 */

import type { DocumentStore } from '@/lib/document-store';

export interface TenantFixture {
  teams: { alpha: string; beta: string };
  chats: { alice: string; shared: string; alpha: string; beta: string; erin: string };
  messages: { alice: string; alpha: string; beta: string; shared: string };
  sessions: { alice: string; erin: string };
  workflows: { alice: string; alpha: string; frank: string };
}

export async function seedTenants(store: DocumentStore): Promise<TenantFixture> {
  const alpha = await store.insert('teams', {
    name: 'Alpha',
    owner_id: 'alice',
    users: ['alice', 'bob'],
    creator_id: 'alice',
    metadata: {},
  });
  const beta = await store.insert('teams', {
    name: 'Beta',
    owner_id: 'carol',
    users: ['carol'],
    creator_id: 'carol',
    metadata: {},
  });

  const chat = (user_id: string, extra: Record<string, unknown> = {}) =>
    store.insert('chats', {
      user_id,
      session_id: `session-${user_id}`,
      access_users: [],
      creator_id: user_id,
      metadata: {},
      ...extra,
    });

  const chats = {
    alice: await chat('alice'),
    shared: await chat('carol', { access_users: ['dave'] }),
    alpha: await chat('carol', { team_id: alpha }),
    beta: await chat('erin', { team_id: beta }),
    erin: await chat('erin'),
  };

  const message = (chat_id: string, text: string) =>
    store.insert('messages', {
      sender_id: 'system',
      chat_id,
      session_id: 'session',
      timestamp: new Date('2026-01-01T00:00:00Z'),
      text,
      type: 'text',
      creator_id: 'system',
      metadata: {},
    });

  const messages = {
    alice: await message(chats.alice, 'hello from alice'),
    alpha: await message(chats.alpha, 'alpha team update'),
    beta: await message(chats.beta, 'beta team update'),
    shared: await message(chats.shared, 'shared with dave'),
  };

  const session = (chat_id: string, user_id: string) =>
    store.insert('sessions', {
      chat_id,
      user_id,
      timestamp: new Date('2026-01-01T00:00:00Z'),
      device_id: 'device-1',
      ip: '127.0.0.1',
      status: 'active',
      creator_id: user_id,
      metadata: {},
    });

  const sessions = {
    alice: await session(chats.alice, 'alice'),
    erin: await session(chats.erin, 'erin'),
  };

  const workflow = (user_id: string, name: string, extra: Record<string, unknown> = {}) =>
    store.insert('workflows', {
      user_id,
      chat_id: chats.alice,
      graph: {},
      name,
      version: '1.0.0',
      status: 'draft',
      creator_id: user_id,
      metadata: {},
      ...extra,
    });

  const workflows = {
    alice: await workflow('alice', 'onboarding'),
    alpha: await workflow('carol', 'alpha-release', { team_id: alpha }),
    frank: await workflow('frank', 'private'),
  };

  return { teams: { alpha, beta }, chats, messages, sessions, workflows };
}
