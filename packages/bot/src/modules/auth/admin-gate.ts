import { Inject, Injectable } from '@nestjs/common';
import { GAME_CONFIG, GameConfig, normalizeNodeId } from '../config/game-config';

/**
 * Liste des nœuds mesh autorisés à piloter la partie (start/stop/next/ban/unban/reset).
 * Les identifiants arrivent parfois avec le `!` de Meshtastic, parfois sans.
 */
@Injectable()
export class AdminGate {
  private readonly admins: ReadonlySet<string>;

  constructor(@Inject(GAME_CONFIG) config: Pick<GameConfig, 'adminNodeIds'>) {
    this.admins = new Set(config.adminNodeIds.map(normalizeNodeId));
  }

  isAdmin(nodeId: string): boolean {
    return this.admins.has(normalizeNodeId(nodeId));
  }

  get hasAdmins(): boolean {
    return this.admins.size > 0;
  }

  get adminIds(): string[] {
    return [...this.admins];
  }
}
