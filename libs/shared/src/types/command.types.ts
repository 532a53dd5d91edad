export type RecorderAction = 'start_recording' | 'stop_recording';

export interface StartRecordingCommand {
  action: 'start_recording';
  timestamp: string; // ISO-8601
  guildId: string;
  channelId: string;
  targetUserId: string;
}

export interface StopRecordingCommand {
  action: 'stop_recording';
  timestamp: string;
  guildId: string;
}

/** Record written to the command store. Snowflake IDs stay decimal strings. */
export type RecorderCommand = StartRecordingCommand | StopRecordingCommand;

export type CommandRequest =
  | Omit<StartRecordingCommand, 'timestamp'>
  | Omit<StopRecordingCommand, 'timestamp'>;
