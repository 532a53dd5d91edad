import { Module } from '@nestjs/common';
import { SharedModule } from '@app/shared';
import { BridgeModule } from './bridge/bridge.module';
import { OrchestratorModule } from './orchestrator/orchestrator.module';
import { DiscordModule } from './discord/discord.module';

@Module({
  imports: [SharedModule, BridgeModule, OrchestratorModule, DiscordModule],
})
export class AppModule {}
