import { Inject, Injectable, OnModuleDestroy } from '@nestjs/common';
import type { InboundMeshMessage } from '@mesh-jeopardy/shared';
import { GAME_CONFIG, GameConfig, normalizeNodeId } from '../config/game-config';
import { StructuredLoggerService } from '../common/structured-logger.service';
import { MetricsService } from '../common/metrics.service';
import { ACTIVE_PERSONALITY, Personality } from '../personality/personality';
import { isGameCommand } from '../personality/command-parser';
import { ClockService } from '../scheduler/clock.service';
import { MeshOutboxService } from './outbox.service';
import { RateLimiter } from './rate-limiter';

export type RouteOutcome = 'handled' | 'ignored' | 'rate_limited';

const INTERNAL_ERROR_REPLY = '⚠️ Something went wrong, try again in a moment.';

/**
 * Point d'entrée des paquets texte : filtre canal public / message direct,
 * anti-spam par expéditeur, puis délègue à la personnalité active.
 * Toute réponse repart en message direct vers l'expéditeur.
 */
@Injectable()
export class MeshRouterService implements OnModuleDestroy {
  private readonly limiter: RateLimiter;

  constructor(
    @Inject(GAME_CONFIG) config: GameConfig,
    @Inject(ACTIVE_PERSONALITY) private readonly personality: Personality,
    private readonly outbox: MeshOutboxService,
    private readonly clock: ClockService,
    private readonly logger: StructuredLoggerService,
    private readonly metrics: MetricsService,
  ) {
    this.limiter = new RateLimiter(config.rateLimit, () => this.clock.now());
  }

  onModuleDestroy() {
    this.limiter.destroy();
  }

  async route(message: InboundMeshMessage): Promise<RouteOutcome> {
    const text = message.text.trim();
    const where = message.channel.kind === 'direct' ? 'direct' : `channel ${message.channel.index}`;
    this.logger.logMeshPacket('in', message.senderId, { where, length: text.length });

    // Sur le canal public seules les commandes !hj comptent, les réponses passent en DM
    if (!text || (message.channel.kind === 'channel' && !isGameCommand(text))) {
      this.metrics.inc('mesh.ignored');
      return 'ignored';
    }

    if (!this.limiter.allow(normalizeNodeId(message.senderId))) {
      this.metrics.inc('mesh.rate_limited');
      this.logger.warn('Sender rate limited', { nodeId: message.senderId });
      return 'rate_limited';
    }

    this.metrics.inc('mesh.handled');
    let reply: string | null;
    try {
      reply = await this.personality.handleMessage({ ...message, text });
    } catch (err) {
      this.metrics.inc('mesh.handler_failed');
      this.logger.error(`Personality ${this.personality.name} failed on message`, err, { nodeId: message.senderId });
      reply = INTERNAL_ERROR_REPLY;
    }
    if (reply) this.outbox.direct(message.senderId, reply);
    return 'handled';
  }
}
