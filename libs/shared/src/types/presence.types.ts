export interface VoiceChannelRef {
  channelId: string;
  channelName: string;
}

export interface PresenceChange {
  userId: string;
  userDisplayName: string;
  guildId: string;
  guildName: string;
  before: VoiceChannelRef | null;
  after: VoiceChannelRef | null;
}
