import { COLLECTION_NAMES, getCollectionDefinition, isCollectionName, validateFields } from '@/lib/collections';

describe('collection registry', () => {
  it('should recognise only the known collections', () => {
    expect(isCollectionName('chats')).toBe(true);
    expect(isCollectionName('agents')).toBe(true);
    expect(isCollectionName('conversations')).toBe(false);
    expect(isCollectionName('')).toBe(false);
  });

  it('should define a created_at index on every collection for cleanup', () => {
    for (const name of COLLECTION_NAMES) {
      expect(getCollectionDefinition(name).indexes).toContainEqual({ keys: { created_at: -1 } });
    }
  });

  it('should enforce unique email and user_id on users', () => {
    const unique = getCollectionDefinition('users').indexes.filter((index) => index.unique);
    expect(unique.map((index) => index.keys)).toEqual([{ email: 1 }, { user_id: 1 }]);
  });

  it('should key agents uniquely by user, name and type', () => {
    expect(getCollectionDefinition('agents').indexes).toContainEqual({
      keys: { user_id: 1, name: 1, type: 1 },
      unique: true,
    });
  });

  it('should map each collection to its visibility rule', () => {
    const rules = Object.fromEntries(
      COLLECTION_NAMES.map((name) => [name, getCollectionDefinition(name).visibility])
    );
    expect(rules).toEqual({
      users: 'none',
      teams: 'none',
      chats: 'chat-access',
      sessions: 'chat-scoped',
      messages: 'chat-scoped',
      workflows: 'owner-or-team',
      agents: 'owner-or-team',
    });
  });

  it('should give workflows and agents their activity timestamps', () => {
    expect(getCollectionDefinition('workflows').activityField).toBe('timestamp');
    expect(getCollectionDefinition('agents').activityField).toBe('last_active');
    expect(getCollectionDefinition('chats').activityField).toBeUndefined();
  });
});

describe('validateFields', () => {
  it('should check workflow version and status', () => {
    expect(validateFields('workflows', { version: '1.0.0', status: 'draft' })).toBeNull();
    expect(validateFields('workflows', { version: '1.0' })).toBe(
      'Version must be in semantic versioning format (e.g., 1.0.0)'
    );
    expect(validateFields('workflows', { status: 'bogus' })).toBe(
      'Invalid status "bogus". Must be one of: draft, active, completed, archived'
    );
  });

  it('should check message type and agent status', () => {
    expect(validateFields('messages', { type: 'image' })).toBeNull();
    expect(validateFields('messages', { type: 'video' })).toBe(
      'Invalid type "video". Must be one of: text, image, file, json, system'
    );
    expect(validateFields('agents', { status: 'archived' })).toBeNull();
    expect(validateFields('agents', { status: 7 })).toBe(
      'Invalid status "7". Must be one of: active, inactive, archived'
    );
  });

  it('should skip absent fields and collections without rules', () => {
    expect(validateFields('workflows', { name: 'flow' })).toBeNull();
    expect(validateFields('chats', { status: 'anything' })).toBeNull();
  });
});
