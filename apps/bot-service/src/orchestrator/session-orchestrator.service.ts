import { Injectable, Inject, Logger } from '@nestjs/common';
import { ConfigType } from '@nestjs/config';
import {
  discordConfig,
  orchestratorConfig,
} from '@app/shared/config/configuration';
import { PresenceChange, VoiceChannelRef } from '@app/shared/types/presence.types';
import { RecorderAction } from '@app/shared/types/command.types';
import { SETTLED_RECORDER_STATES } from '@app/shared/types/status.types';
import {
  RecordingSession,
  TransitionKind,
  TransitionOutcome,
} from '@app/shared/types/session.types';
import { CommandChannelService } from '../bridge/command-channel.service';
import { StatusChannelService } from '../bridge/status-channel.service';
import { SessionRegistry } from './session-registry';
import { GuildTaskQueue } from './guild-task-queue';

/**
 * Turns voice presence changes of the watched user into recorder commands.
 *
 * - join: start, then one status read after a short delay
 * - leave: stop, then one status read after a longer delay
 * - move: stop, short gap, start (the recorder has no move command)
 *
 * Transitions of a guild run strictly one after another, including their
 * confirmation delays. Nothing is retried, and no method rejects.
 */
@Injectable()
export class SessionOrchestratorService {
  private readonly logger = new Logger(SessionOrchestratorService.name);
  private readonly registry = new SessionRegistry();
  private readonly queue = new GuildTaskQueue();

  constructor(
    private readonly commandChannel: CommandChannelService,
    private readonly statusChannel: StatusChannelService,
    @Inject(discordConfig.KEY)
    private readonly discordCfg: ConfigType<typeof discordConfig>,
    @Inject(orchestratorConfig.KEY)
    private readonly orchestratorCfg: ConfigType<typeof orchestratorConfig>,
  ) {}

  getWatchedUserId(): string {
    return this.discordCfg.targetUserId;
  }

  getSession(guildId: string): RecordingSession | null {
    return this.registry.get(guildId);
  }

  getSessions(): RecordingSession[] {
    return this.registry.list();
  }

  pruneSessions(maxAgeMs: number, now: number = Date.now()): RecordingSession[] {
    return this.registry.pruneOlderThan(maxAgeMs, now);
  }

  handlePresenceChange(change: PresenceChange): Promise<TransitionOutcome> {
    if (change.userId !== this.discordCfg.targetUserId) {
      return Promise.resolve(this.outcome('ignored', change.guildId, [], true));
    }

    return this.queue
      .run(change.guildId, () => this.applyTransition(change))
      .catch((err) => {
        this.logger.error(`Transition failed in guild ${change.guildId}: ${(err as Error).message}`);
        return this.outcome('unchanged', change.guildId, [], false);
      });
  }

  /**
   * Start, hold for the configured test duration, stop. Refused while a
   * session is already tracked for the guild.
   */
  runTestRecording(
    guildId: string,
    channel: VoiceChannelRef,
    userId: string,
  ): Promise<TransitionOutcome> {
    return this.queue
      .run(guildId, async () => {
        if (this.registry.get(guildId)) {
          this.logger.warn(`Test recording refused: guild ${guildId} is already recording`);
          return this.outcome('test', guildId, [], false);
        }

        const started = this.startRecording(guildId, channel, userId);
        if (!started) {
          return this.outcome('test', guildId, ['start_recording'], false);
        }

        await this.delay(this.orchestratorCfg.testRecordingMs);
        const stopped = this.stopRecording(guildId);
        return this.outcome('test', guildId, ['start_recording', 'stop_recording'], stopped);
      })
      .catch((err) => {
        this.logger.error(`Test recording failed in guild ${guildId}: ${(err as Error).message}`);
        return this.outcome('test', guildId, [], false);
      });
  }

  private async applyTransition(change: PresenceChange): Promise<TransitionOutcome> {
    const { guildId, before, after, userDisplayName } = change;

    if (!before && after) {
      this.logger.log(
        `Watched user joined: ${userDisplayName} in ${after.channelName} (guild: ${change.guildName})`,
      );
      const ok = this.startRecording(guildId, after, change.userId);
      if (ok) {
        await this.confirmStart();
      }
      return this.outcome('joined', guildId, ['start_recording'], ok);
    }

    if (before && !after) {
      this.logger.log(
        `Watched user left: ${userDisplayName} from ${before.channelName} (guild: ${change.guildName})`,
      );
      const ok = this.stopRecording(guildId);
      if (ok) {
        await this.confirmStop();
      }
      return this.outcome('left', guildId, ['stop_recording'], ok);
    }

    if (before && after && before.channelId !== after.channelId) {
      this.logger.log(
        `Watched user moved: ${userDisplayName} from ${before.channelName} to ${after.channelName}`,
      );
      const stopped = this.stopRecording(guildId);
      await this.delay(this.orchestratorCfg.moveGapMs);
      const started = this.startRecording(guildId, after, change.userId);
      if (started) {
        this.logger.log('Recording moved to new channel');
      } else {
        this.logger.error('Failed to restart recording in new channel');
      }
      return this.outcome('moved', guildId, ['stop_recording', 'start_recording'], stopped && started);
    }

    // Same channel: mute, deafen, stream toggles
    return this.outcome('unchanged', guildId, [], true);
  }

  private startRecording(guildId: string, channel: VoiceChannelRef, userId: string): boolean {
    this.logger.log(`Starting recording - guild: ${guildId}, channel: ${channel.channelName}`);
    const ok = this.commandChannel.send({
      action: 'start_recording',
      guildId,
      channelId: channel.channelId,
      targetUserId: userId,
    });

    if (ok) {
      this.registry.start({
        guildId,
        channelId: channel.channelId,
        channelName: channel.channelName,
        targetUserId: userId,
        startedAt: new Date().toISOString(),
      });
    } else {
      this.logger.error('Failed to send start command');
    }
    return ok;
  }

  private stopRecording(guildId: string): boolean {
    this.logger.log(`Stopping recording - guild: ${guildId}`);
    const ok = this.commandChannel.send({ action: 'stop_recording', guildId });
    // The user is gone either way; a failed stop leaves nothing to track
    this.registry.end(guildId);
    if (!ok) {
      this.logger.error('Failed to send stop command');
    }
    return ok;
  }

  private async confirmStart(): Promise<void> {
    await this.delay(this.orchestratorCfg.startConfirmDelayMs);
    const status = this.statusChannel.read();
    if (status) {
      this.logger.log(`Recorder response: ${status.status} - ${status.message}`);
    }
  }

  private async confirmStop(): Promise<void> {
    await this.delay(this.orchestratorCfg.stopConfirmDelayMs);
    const status = this.statusChannel.read();
    if (status && SETTLED_RECORDER_STATES.includes(status.status)) {
      this.logger.log(`Recorder left the voice channel (${status.status})`);
      return;
    }
    this.logger.warn(
      `Recorder may still be connected - status: ${status ? status.status : 'unavailable'}`,
    );
  }

  private delay(ms: number): Promise<void> {
    if (ms <= 0) return Promise.resolve();
    return new Promise((r) => setTimeout(r, ms));
  }

  private outcome(
    kind: TransitionKind,
    guildId: string,
    commands: RecorderAction[],
    ok: boolean,
  ): TransitionOutcome {
    return { kind, guildId, commands, ok };
  }
}
