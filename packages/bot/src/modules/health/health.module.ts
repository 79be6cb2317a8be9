import { Module } from '@nestjs/common';
import { GameModule } from '../game/game.module';
import { DatabaseModule } from '../database/database.module';
import { OutboxModule } from '../mesh/outbox.module';
import { BridgeTokenGuard } from '../mesh/bridge-token.guard';
import { HealthController } from './health.controller';
import { MetricsController } from './metrics.controller';
import { RootController } from './root.controller';

@Module({
  imports: [GameModule, DatabaseModule, OutboxModule],
  controllers: [HealthController, MetricsController, RootController],
  providers: [BridgeTokenGuard],
})
export class HealthModule {}
