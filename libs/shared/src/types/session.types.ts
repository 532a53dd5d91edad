import { RecorderAction } from './command.types';

export interface RecordingSession {
  guildId: string;
  channelId: string;
  channelName: string;
  targetUserId: string;
  startedAt: string;
}

export type TransitionKind =
  | 'ignored'
  | 'unchanged'
  | 'joined'
  | 'left'
  | 'moved'
  | 'test';

export interface TransitionOutcome {
  kind: TransitionKind;
  guildId: string;
  commands: RecorderAction[]; // in emission order, successful or not
  ok: boolean;
}
