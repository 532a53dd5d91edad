import { RecorderStatus } from '@app/shared/types/status.types';
import { RecordingSession } from '@app/shared/types/session.types';

export function buildStatusMessage(
  status: RecorderStatus | null,
  sessions: RecordingSession[],
): string {
  const lines = [
    status
      ? `Recorder status: ${status.status} - ${status.message}`
      : 'No status available from the recorder',
  ];

  if (sessions.length > 0) {
    lines.push('Active sessions:');
    for (const s of sessions) {
      lines.push(`- ${s.channelName} (guild ${s.guildId}) since ${s.startedAt}`);
    }
  }

  return lines.join('\n');
}
