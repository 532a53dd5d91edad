import { Injectable, Inject, Logger } from '@nestjs/common';
import { ConfigType } from '@nestjs/config';
import { discordConfig } from '@app/shared/config/configuration';
import { SessionOrchestratorService } from '../../orchestrator/session-orchestrator.service';
import { StatusChannelService } from '../../bridge/status-channel.service';
import { buildStatusMessage } from '../formatters/status-message.formatter';

/** Structural subset of a discord.js Message. */
export interface IncomingMessage {
  content: string;
  author: { id: string; bot: boolean };
  guildId: string | null;
  member: {
    permissions: { has(permission: 'Administrator'): boolean };
    voice: { channel: { id: string; name: string } | null };
  } | null;
  reply(content: string): Promise<unknown>;
}

@Injectable()
export class CommandHandler {
  private readonly logger = new Logger(CommandHandler.name);

  constructor(
    private readonly orchestrator: SessionOrchestratorService,
    private readonly statusChannel: StatusChannelService,
    @Inject(discordConfig.KEY)
    private readonly discordCfg: ConfigType<typeof discordConfig>,
  ) {}

  async handle(message: IncomingMessage): Promise<void> {
    if (message.author.bot) return;

    const prefix = this.discordCfg.commandPrefix;
    const content = message.content.trim();
    if (!content.startsWith(prefix)) return;

    const name = content.slice(prefix.length).split(/\s+/)[0].toLowerCase();
    switch (name) {
      case 'status':
        await this.handleStatus(message);
        break;
      case 'test_recording':
        await this.handleTestRecording(message);
        break;
      default:
        break;
    }
  }

  private async handleStatus(message: IncomingMessage): Promise<void> {
    const status = this.statusChannel.read();
    await message.reply(buildStatusMessage(status, this.orchestrator.getSessions()));
  }

  private async handleTestRecording(message: IncomingMessage): Promise<void> {
    const { guildId, member } = message;
    if (!guildId || !member) {
      await message.reply('This command only works inside a server.');
      return;
    }
    if (!member.permissions.has('Administrator')) {
      await message.reply('You need the Administrator permission to run this command.');
      return;
    }

    const channel = member.voice.channel;
    if (!channel) {
      await message.reply('You must be in a voice channel to test recording.');
      return;
    }

    this.logger.log(`Test recording requested by ${message.author.id} in guild ${guildId}`);
    const outcome = await this.orchestrator.runTestRecording(
      guildId,
      { channelId: channel.id, channelName: channel.name },
      message.author.id,
    );

    if (outcome.ok) {
      await message.reply('Test recording finished: start and stop commands sent.');
    } else if (outcome.commands.length === 0) {
      await message.reply('A recording is already active in this server.');
    } else {
      await message.reply('Failed to run test recording. Check the bot logs.');
    }
  }
}
