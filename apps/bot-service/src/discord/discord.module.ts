import { Module } from '@nestjs/common';
import { BridgeModule } from '../bridge/bridge.module';
import { OrchestratorModule } from '../orchestrator/orchestrator.module';
import { DiscordService } from './discord.service';
import { CommandHandler } from './handlers/command.handler';

@Module({
  imports: [BridgeModule, OrchestratorModule],
  providers: [DiscordService, CommandHandler],
})
export class DiscordModule {}
