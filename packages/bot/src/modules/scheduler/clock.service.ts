import { Inject, Injectable } from '@nestjs/common';
import { GAME_CONFIG, GameConfig } from '../config/game-config';

@Injectable()
export class ClockService {
  private scale: number;
  constructor(@Inject(GAME_CONFIG) config: Pick<GameConfig, 'timeScale'>) {
    const n = config.timeScale;
    this.scale = isFinite(n) && n > 0 ? n : 1;
  }
  now(): number { return Date.now(); }
  setTimeout(fn: () => void, ms: number): NodeJS.Timeout {
    const scaled = ms * this.scale;
    return setTimeout(fn, scaled);
  }
  clearTimeout(handle: NodeJS.Timeout) { clearTimeout(handle); }
}
