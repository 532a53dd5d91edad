import { Injectable, Inject, Logger } from '@nestjs/common';
import { ConfigType } from '@nestjs/config';
import { join } from 'path';
import { ipcConfig } from '@app/shared/config/configuration';
import { atomicWriteJson } from '@app/shared/utils/file.utils';
import { buildRecorderCommand } from '@app/shared/utils/command.utils';
import { CommandRequest } from '@app/shared/types/command.types';

/**
 * Sole writer of the recorder command store. Every send replaces the whole
 * record; there is no queue, so the recorder only ever sees the latest command.
 */
@Injectable()
export class CommandChannelService {
  private readonly logger = new Logger(CommandChannelService.name);
  private readonly commandsPath: string;

  constructor(
    @Inject(ipcConfig.KEY)
    private readonly ipcCfg: ConfigType<typeof ipcConfig>,
  ) {
    this.commandsPath = join(this.ipcCfg.dir, this.ipcCfg.commandsFile);
  }

  getPath(): string {
    return this.commandsPath;
  }

  send(request: CommandRequest): boolean {
    try {
      const command = buildRecorderCommand(request);
      atomicWriteJson(this.commandsPath, command);
      this.logger.log(`Sent IPC command: ${command.action} (guild ${command.guildId})`);
      return true;
    } catch (err) {
      this.logger.error(`Failed to send IPC command ${request.action}: ${(err as Error).message}`);
      return false;
    }
  }
}
