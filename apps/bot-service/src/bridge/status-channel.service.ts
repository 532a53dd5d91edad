import { Injectable, Inject, Logger } from '@nestjs/common';
import { ConfigType } from '@nestjs/config';
import { join } from 'path';
import { ipcConfig } from '@app/shared/config/configuration';
import { readStatusFile } from '@app/shared/utils/status.utils';
import { RecorderStatus } from '@app/shared/types/status.types';

@Injectable()
export class StatusChannelService {
  private readonly logger = new Logger(StatusChannelService.name);
  private readonly statusPath: string;

  constructor(
    @Inject(ipcConfig.KEY)
    private readonly ipcCfg: ConfigType<typeof ipcConfig>,
  ) {
    this.statusPath = join(this.ipcCfg.dir, this.ipcCfg.statusFile);
  }

  getPath(): string {
    return this.statusPath;
  }

  /** Absent and corrupt status both come back as null. */
  read(): RecorderStatus | null {
    const status = readStatusFile(this.statusPath);
    if (!status) {
      this.logger.debug(`No usable recorder status at ${this.statusPath}`);
    }
    return status;
  }
}
