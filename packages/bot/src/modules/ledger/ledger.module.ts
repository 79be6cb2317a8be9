import { Module } from '@nestjs/common';
import { DatabaseModule } from '../database/database.module';
import { DatabaseService } from '../database/database.service';
import { GAME_CONFIG, GameConfig } from '../config/game-config';
import { LEDGER } from './ledger';
import { MemoryLedger } from './memory-ledger';
import { SqliteLedgerService } from './sqlite-ledger.service';

@Module({
  imports: [DatabaseModule],
  providers: [
    {
      provide: LEDGER,
      inject: [GAME_CONFIG, DatabaseService],
      useFactory: (config: GameConfig, db: DatabaseService) =>
        config.ledgerBackend === 'sqlite' ? new SqliteLedgerService(db) : new MemoryLedger(),
    },
  ],
  exports: [LEDGER],
})
export class LedgerModule {}
