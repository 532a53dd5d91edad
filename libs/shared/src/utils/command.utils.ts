import { CommandRequest, RecorderCommand } from '../types/command.types';

/**
 * Stamp a command request. `action` and `timestamp` lead the record and only
 * the fields of the request's variant are copied, so nothing from an earlier
 * command can leak into the store.
 */
export function buildRecorderCommand(
  request: CommandRequest,
  now: Date = new Date(),
): RecorderCommand {
  const timestamp = now.toISOString();
  switch (request.action) {
    case 'start_recording':
      return {
        action: request.action,
        timestamp,
        guildId: request.guildId,
        channelId: request.channelId,
        targetUserId: request.targetUserId,
      };
    case 'stop_recording':
      return {
        action: request.action,
        timestamp,
        guildId: request.guildId,
      };
  }
}
