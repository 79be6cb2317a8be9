import { Global, Module } from '@nestjs/common';
import { GAME_CONFIG, loadGameConfig } from './game-config';

@Global()
@Module({
  providers: [
    {
      provide: GAME_CONFIG,
      useFactory: () => loadGameConfig(process.env),
    },
  ],
  exports: [GAME_CONFIG],
})
export class ConfigModule {}
