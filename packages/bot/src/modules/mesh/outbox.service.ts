import { Inject, Injectable } from '@nestjs/common';
import type { Announcement, BridgeOutboxResponse, OutboundMeshMessage } from '@mesh-jeopardy/shared';
import { GAME_CONFIG, GameConfig, normalizeNodeId } from '../config/game-config';
import { StructuredLoggerService } from '../common/structured-logger.service';
import { MetricsService } from '../common/metrics.service';
import { AnnouncementSink } from '../game/announcement-sink';
import { chunkText } from './chunk-text';

const MAX_QUEUED = 1000;

/**
 * File des messages sortants, relevée par le pont radio via `GET /mesh/outbox`.
 * Les annonces partent sur le canal de jeu, les réponses en message direct.
 */
@Injectable()
export class MeshOutboxService implements AnnouncementSink {
  private queue: OutboundMeshMessage[] = [];
  private nextId = 1;

  constructor(
    @Inject(GAME_CONFIG) private readonly config: GameConfig,
    private readonly logger: StructuredLoggerService,
    private readonly metrics: MetricsService,
  ) {}

  publish(announcement: Announcement) {
    for (const text of chunkText(announcement.text, this.config.maxMessageLength)) {
      this.enqueue({ id: this.nextId++, kind: 'channel', channel: this.config.gameChannelName, text });
    }
    this.logger.logMeshPacket('out', this.config.gameChannelName, { event: announcement.type });
  }

  direct(nodeId: string, text: string) {
    const to = `!${normalizeNodeId(nodeId)}`;
    for (const chunk of chunkText(text, this.config.maxMessageLength)) {
      this.enqueue({ id: this.nextId++, kind: 'direct', to, text: chunk });
    }
    this.logger.logMeshPacket('out', to);
  }

  /** Retire au plus `limit` messages, dans l'ordre d'émission */
  drain(limit: number): BridgeOutboxResponse {
    const messages = this.queue.splice(0, Math.max(0, limit));
    return { messages, remaining: this.queue.length };
  }

  get size(): number {
    return this.queue.length;
  }

  private enqueue(message: OutboundMeshMessage) {
    if (this.queue.length >= MAX_QUEUED) {
      const dropped = this.queue.shift();
      this.metrics.inc('outbox.dropped');
      this.logger.warn('Outbox full, dropping oldest message', { droppedId: dropped?.id });
    }
    this.queue.push(message);
    this.metrics.inc(`outbox.${message.kind}`);
  }
}
