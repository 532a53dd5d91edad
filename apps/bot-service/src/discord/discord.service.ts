import {
  Injectable,
  Inject,
  OnModuleInit,
  OnModuleDestroy,
  Logger,
} from '@nestjs/common';
import { ConfigType } from '@nestjs/config';
import { Client, Events, GatewayIntentBits } from 'discord.js';
import { discordConfig } from '@app/shared/config/configuration';
import { SessionOrchestratorService } from '../orchestrator/session-orchestrator.service';
import { StatusChannelService } from '../bridge/status-channel.service';
import { CommandHandler, IncomingMessage } from './handlers/command.handler';
import { toPresenceChange, VoiceStateSnapshot } from './presence.mapper';

@Injectable()
export class DiscordService implements OnModuleInit, OnModuleDestroy {
  private readonly logger = new Logger(DiscordService.name);
  private client: Client | null = null;

  constructor(
    @Inject(discordConfig.KEY)
    private readonly discordCfg: ConfigType<typeof discordConfig>,
    private readonly orchestrator: SessionOrchestratorService,
    private readonly statusChannel: StatusChannelService,
    private readonly commandHandler: CommandHandler,
  ) {}

  async onModuleInit(): Promise<void> {
    if (!this.discordCfg.token) {
      throw new Error('DISCORD_TOKEN is not configured');
    }

    const client = new Client({
      intents: [
        GatewayIntentBits.Guilds,
        GatewayIntentBits.GuildVoiceStates,
        GatewayIntentBits.GuildMessages,
        GatewayIntentBits.MessageContent,
      ],
    });
    this.client = client;

    client.once(Events.ClientReady, (ready) => this.onReady(ready.user.tag, ready.guilds.cache.size));
    client.on(Events.VoiceStateUpdate, (oldState, newState) =>
      this.onVoiceStateUpdate(oldState, newState),
    );
    client.on(Events.MessageCreate, (message) => this.onMessage(message));
    client.on(Events.Error, (err) => {
      this.logger.error(`Discord client error: ${err.message}`);
    });

    await client.login(this.discordCfg.token);
  }

  async onModuleDestroy(): Promise<void> {
    if (this.client) {
      await this.client.destroy();
      this.client = null;
      this.logger.log('Discord client destroyed');
    }
  }

  onReady(tag: string, guildCount: number): void {
    this.logger.log(`Logged in as ${tag}`);
    this.logger.log(`Watching user ID: ${this.orchestrator.getWatchedUserId()}`);
    this.logger.log(`Connected to ${guildCount} guild(s)`);

    const status = this.statusChannel.read();
    if (status) {
      this.logger.log(`Recorder status: ${status.status}`);
    } else {
      this.logger.warn(
        `No status from the recorder at ${this.statusChannel.getPath()} - is the recorder process running?`,
      );
    }
  }

  onVoiceStateUpdate(oldState: VoiceStateSnapshot, newState: VoiceStateSnapshot): void {
    const change = toPresenceChange(oldState, newState);
    this.orchestrator.handlePresenceChange(change).catch((err) => {
      this.logger.error(`Voice state handling failed: ${(err as Error).message}`);
    });
  }

  onMessage(message: IncomingMessage): void {
    this.commandHandler.handle(message).catch((err) => {
      this.logger.error(`Command handling failed: ${(err as Error).message}`);
    });
  }
}
