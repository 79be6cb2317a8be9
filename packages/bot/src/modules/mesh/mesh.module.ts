import { Module } from '@nestjs/common';
import { PersonalityModule } from '../personality/personality.module';
import { SchedulerModule } from '../scheduler/scheduler.module';
import { OutboxModule } from './outbox.module';
import { BridgeTokenGuard } from './bridge-token.guard';
import { MeshBridgeController } from './mesh-bridge.controller';
import { MeshRouterService } from './mesh-router.service';

@Module({
  imports: [PersonalityModule, OutboxModule, SchedulerModule],
  controllers: [MeshBridgeController],
  providers: [MeshRouterService, BridgeTokenGuard],
  exports: [MeshRouterService],
})
export class MeshModule {}
