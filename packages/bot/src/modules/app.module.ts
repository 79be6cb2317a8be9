import { Module } from '@nestjs/common';
import { CommonModule } from './common/common.module';
import { ConfigModule } from './config/config.module';
import { DatabaseModule } from './database/database.module';
import { GameModule } from './game/game.module';
import { MeshModule } from './mesh/mesh.module';
import { HealthModule } from './health/health.module';

@Module({
  imports: [
    CommonModule,
    ConfigModule,
    DatabaseModule,
    GameModule,
    MeshModule,
    HealthModule,
  ],
})
export class AppModule {}
