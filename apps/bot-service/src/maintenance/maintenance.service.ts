import {
  Injectable,
  Inject,
  OnModuleInit,
  OnModuleDestroy,
  Logger,
} from '@nestjs/common';
import { ConfigType } from '@nestjs/config';
import { maintenanceConfig } from '@app/shared/config/configuration';
import { SessionOrchestratorService } from '../orchestrator/session-orchestrator.service';

@Injectable()
export class MaintenanceService implements OnModuleInit, OnModuleDestroy {
  private readonly logger = new Logger(MaintenanceService.name);
  private timer: ReturnType<typeof setInterval> | null = null;

  constructor(
    private readonly orchestrator: SessionOrchestratorService,
    @Inject(maintenanceConfig.KEY)
    private readonly maintenanceCfg: ConfigType<typeof maintenanceConfig>,
  ) {}

  onModuleInit(): void {
    this.timer = setInterval(() => this.runOnce(), this.maintenanceCfg.intervalMs);
    this.logger.log(`Maintenance scheduled (interval: ${this.maintenanceCfg.intervalMs}ms)`);
  }

  onModuleDestroy(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
  }

  /** Drops tracking for sessions that outlived the configured age. */
  runOnce(now: number = Date.now()): number {
    try {
      const pruned = this.orchestrator.pruneSessions(this.maintenanceCfg.sessionMaxAgeMs, now);
      if (pruned.length > 0) {
        this.logger.log(`Cleaned up ${pruned.length} old recording session(s)`);
      }
      return pruned.length;
    } catch (err) {
      this.logger.error(`Maintenance error: ${(err as Error).message}`);
      return 0;
    }
  }
}
