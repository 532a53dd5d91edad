import { toPresenceChange, VoiceStateSnapshot } from './presence.mapper';

function state(overrides: Partial<VoiceStateSnapshot> = {}): VoiceStateSnapshot {
  return {
    id: '333',
    guild: { id: '111', name: 'Test Guild' },
    channel: null,
    member: { displayName: 'Watched' },
    ...overrides,
  };
}

describe('toPresenceChange', () => {
  it('should map a join', () => {
    const change = toPresenceChange(
      state(),
      state({ channel: { id: '222', name: 'General' } }),
    );

    expect(change).toEqual({
      userId: '333',
      userDisplayName: 'Watched',
      guildId: '111',
      guildName: 'Test Guild',
      before: null,
      after: { channelId: '222', channelName: 'General' },
    });
  });

  it('should map a move', () => {
    const change = toPresenceChange(
      state({ channel: { id: '222', name: 'General' } }),
      state({ channel: { id: '444', name: 'Music' } }),
    );

    expect(change.before).toEqual({ channelId: '222', channelName: 'General' });
    expect(change.after).toEqual({ channelId: '444', channelName: 'Music' });
  });

  it('should fall back to the old member for display name', () => {
    const change = toPresenceChange(state(), state({ member: null }));

    expect(change.userDisplayName).toBe('Watched');
  });

  it('should fall back to the user ID when no member is cached', () => {
    const change = toPresenceChange(state({ member: null }), state({ member: null }));

    expect(change.userDisplayName).toBe('333');
  });
});
