/**
 * DataGateway end-to-end over the in-memory store:
 * insert → visible find → update → register agent → cleanup
 */

import { subDays } from 'date-fns';
import { DataGateway, ValidationError } from '@/index';
import { ensureIndexes } from '@/lib/mongodb';
import { InMemoryDb } from '@/test-utils/in-memory-db';

let memory: InMemoryDb;
let gateway: DataGateway;

beforeEach(async () => {
  jest.spyOn(console, 'log').mockImplementation(() => {});
  jest.spyOn(console, 'error').mockImplementation(() => {});
  memory = new InMemoryDb();
  await ensureIndexes(memory.asDb());
  gateway = new DataGateway(memory.asDb(), { adminId: 'root', retentionDays: 14 });
});

afterEach(() => {
  jest.restoreAllMocks();
});

describe('DataGateway', () => {
  it('should fill in defaults for missing config', () => {
    expect(gateway.config).toEqual({
      mongodbUri: 'mongodb://localhost:27017',
      databaseName: 'workflow_automation',
      retentionDays: 14,
      adminId: 'root',
    });
  });

  it('should share chats through a team', async () => {
    const team = await gateway.teams.create('alice', { name: 'Ops', users: ['bob'] });
    if (!team.success) throw team.error;

    const chatId = await gateway.insertDocument('chats', {
      user_id: 'alice',
      session_id: 's-1',
      access_users: [],
      team_id: team.data._id,
      creator_id: 'alice',
      metadata: {},
    });
    await gateway.insertDocument('messages', { chat_id: chatId, text: 'hi', sender_id: 'alice' });

    expect((await gateway.findDocuments('chats', {}, { actorId: 'bob' })).map((chat) => chat._id)).toEqual([
      chatId,
    ]);
    expect(await gateway.findDocuments('chats', {}, { actorId: 'mallory' })).toEqual([]);
    expect((await gateway.findDocument('messages', { chat_id: chatId }, 'bob'))?.text).toBe('hi');
    expect(await gateway.findDocument('messages', { chat_id: chatId }, 'mallory')).toBeNull();
    expect(await gateway.findDocuments('messages', {}, { actorId: 'root' })).toHaveLength(1);

    const removed = await gateway.teams.removeMember('alice', team.data._id, 'bob');
    expect(removed.success).toBe(true);
    expect(await gateway.findDocuments('chats', {}, { actorId: 'bob' })).toEqual([]);
  });

  it('should update and delete documents', async () => {
    const id = await gateway.insertDocument('workflows', { user_id: 'alice', name: 'flow', status: 'draft' });

    expect(await gateway.updateDocument('workflows', { _id: id }, { $set: { status: 'active' } })).toBe(true);
    expect((await gateway.findDocument('workflows', { _id: id }, 'alice'))?.status).toBe('active');
    expect(await gateway.deleteDocument('workflows', { _id: id })).toBe(true);
    expect(await gateway.findDocument('workflows', { _id: id })).toBeNull();
  });

  it('should register, upgrade and list agents', async () => {
    const base = {
      user_id: 'alice',
      name: 'coder',
      type: 'code_generator',
      config: {},
      system_message: 'Write code.',
      src: 'agents/coder',
      command: 'coder',
    };

    const inserted = await gateway.registerAgent({ ...base, version: '0.1.0' });
    const updated = await gateway.registerAgent({ ...base, version: '0.2.0' });
    const invalid = await gateway.registerAgent({ ...base, version: 'latest' });

    expect(inserted.success && inserted.data.action).toBe('inserted');
    expect(updated.success && updated.data.action).toBe('updated');
    expect(invalid.success).toBe(false);
    if (!invalid.success) {
      expect(invalid.error).toBeInstanceOf(ValidationError);
    }

    expect((await gateway.getAgentRegistration('alice', 'coder', 'code_generator'))?.version).toBe('0.2.0');
    expect(await gateway.listRegisteredAgents('alice')).toHaveLength(1);
    expect(await gateway.findDocuments('agents', {}, { actorId: 'bob' })).toEqual([]);
  });

  it('should clean up with the configured retention period', async () => {
    await gateway.insertDocument('chats', { user_id: 'alice', created_at: subDays(new Date(), 20) });
    await gateway.insertDocument('chats', { user_id: 'alice', created_at: subDays(new Date(), 10) });

    const report = await gateway.cleanup();

    expect(report.chats).toBe(1);
    expect(memory.collection('chats').documents).toHaveLength(1);
  });

  it('should close cleanly without an owned connection', async () => {
    await expect(gateway.close()).resolves.toBeUndefined();
  });
});
