import { BadRequestException, Body, Controller, Get, HttpCode, Post, Query, UseGuards } from '@nestjs/common';
import type { BridgeOutboxResponse } from '@mesh-jeopardy/shared';
import { ClockService } from '../scheduler/clock.service';
import { BridgeTokenGuard } from './bridge-token.guard';
import { MeshRouterService, RouteOutcome } from './mesh-router.service';
import { MeshPacketSchema, OutboxQuerySchema, toInboundMessage, validatePayload } from './mesh-validation';
import { MeshOutboxService } from './outbox.service';

/**
 * API du pont radio : le processus qui tient la liaison série/TCP avec le nœud
 * pousse les paquets reçus et relève les messages à émettre.
 */
@Controller('mesh')
@UseGuards(BridgeTokenGuard)
export class MeshBridgeController {
  constructor(
    private readonly router: MeshRouterService,
    private readonly outbox: MeshOutboxService,
    private readonly clock: ClockService,
  ) {}

  @Post('packets')
  @HttpCode(202)
  async receive(@Body() body: unknown): Promise<{ outcome: RouteOutcome }> {
    const parsed = validatePayload(MeshPacketSchema, body);
    if (!parsed.success) {
      throw new BadRequestException({ error: 'invalid_packet', message: parsed.error });
    }
    // Horodatage à la réception : c'est lui qui décide si une réponse est en retard
    const outcome = await this.router.route(toInboundMessage(parsed.data, this.clock.now()));
    return { outcome };
  }

  @Get('outbox')
  drain(@Query() query: unknown): BridgeOutboxResponse {
    const parsed = validatePayload(OutboxQuerySchema, query);
    if (!parsed.success) {
      throw new BadRequestException({ error: 'invalid_query', message: parsed.error });
    }
    return this.outbox.drain(parsed.data.limit);
  }
}
