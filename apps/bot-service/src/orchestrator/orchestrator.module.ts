import { Module } from '@nestjs/common';
import { BridgeModule } from '../bridge/bridge.module';
import { SessionOrchestratorService } from './session-orchestrator.service';
import { MaintenanceService } from '../maintenance/maintenance.service';

@Module({
  imports: [BridgeModule],
  providers: [SessionOrchestratorService, MaintenanceService],
  exports: [SessionOrchestratorService],
})
export class OrchestratorModule {}
