import { Module } from '@nestjs/common';
import { LedgerModule } from '../ledger/ledger.module';
import { SchedulerModule } from '../scheduler/scheduler.module';
import { ScoringModule } from '../scoring/scoring.module';
import { OutboxModule } from '../mesh/outbox.module';
import { AdminGate } from '../auth/admin-gate';
import { QuestionBankService } from './question-bank.service';
import { GameSessionService } from './game-session.service';

@Module({
  imports: [LedgerModule, SchedulerModule, ScoringModule, OutboxModule],
  providers: [AdminGate, QuestionBankService, GameSessionService],
  exports: [AdminGate, GameSessionService, LedgerModule],
})
export class GameModule {}
