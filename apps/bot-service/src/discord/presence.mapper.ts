import { PresenceChange, VoiceChannelRef } from '@app/shared/types/presence.types';

/** The parts of a discord.js VoiceState the orchestrator cares about. */
export interface VoiceStateSnapshot {
  id: string; // user ID
  guild: { id: string; name: string };
  channel: { id: string; name: string } | null;
  member: { displayName: string } | null;
}

function toChannelRef(channel: VoiceStateSnapshot['channel']): VoiceChannelRef | null {
  return channel ? { channelId: channel.id, channelName: channel.name } : null;
}

export function toPresenceChange(
  oldState: VoiceStateSnapshot,
  newState: VoiceStateSnapshot,
): PresenceChange {
  const member = newState.member ?? oldState.member;
  return {
    userId: newState.id,
    userDisplayName: member?.displayName ?? newState.id,
    guildId: newState.guild.id,
    guildName: newState.guild.name,
    before: toChannelRef(oldState.channel),
    after: toChannelRef(newState.channel),
  };
}
