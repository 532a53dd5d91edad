import { Module } from '@nestjs/common';
import { CommandChannelService } from './command-channel.service';
import { StatusChannelService } from './status-channel.service';

@Module({
  providers: [CommandChannelService, StatusChannelService],
  exports: [CommandChannelService, StatusChannelService],
})
export class BridgeModule {}
