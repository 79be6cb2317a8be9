import { Controller, Get } from '@nestjs/common';
import { GameSessionService } from '../game/game-session.service';
import { DatabaseService } from '../database/database.service';
import { MeshOutboxService } from '../mesh/outbox.service';

@Controller('health')
export class HealthController {
  constructor(
    private readonly session: GameSessionService,
    private readonly db: DatabaseService,
    private readonly outbox: MeshOutboxService,
  ) {}

  @Get()
  health() {
    const snapshot = this.session.snapshot();
    return {
      status: 'ok',
      uptimeSeconds: Math.round(process.uptime()),
      database: this.db.isOpen ? 'open' : 'unused',
      outbox: this.outbox.size,
      session: {
        status: snapshot.status,
        sessionNumber: snapshot.sessionNumber,
        round: snapshot.roundCounter,
        maxRounds: snapshot.maxRounds,
      },
    };
  }
}
