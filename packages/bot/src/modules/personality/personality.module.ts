import { Module } from '@nestjs/common';
import { GameModule } from '../game/game.module';
import { HackerJeopardyPersonality } from './hacker-jeopardy.personality';
import { ACTIVE_PERSONALITY } from './personality';

@Module({
  imports: [GameModule],
  providers: [HackerJeopardyPersonality, { provide: ACTIVE_PERSONALITY, useExisting: HackerJeopardyPersonality }],
  exports: [ACTIVE_PERSONALITY],
})
export class PersonalityModule {}
