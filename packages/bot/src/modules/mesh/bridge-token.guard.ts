import { CanActivate, ExecutionContext, Inject, Injectable, UnauthorizedException } from '@nestjs/common';
import type { FastifyRequest } from 'fastify';
import { timingSafeEqual } from 'crypto';
import { GAME_CONFIG, GameConfig } from '../config/game-config';

export const BRIDGE_TOKEN_HEADER = 'x-bridge-token';

/** Sans MESH_BRIDGE_TOKEN configuré, le pont est accepté sans jeton */
@Injectable()
export class BridgeTokenGuard implements CanActivate {
  constructor(@Inject(GAME_CONFIG) private readonly config: GameConfig) {}

  canActivate(context: ExecutionContext): boolean {
    const expected = this.config.bridgeToken;
    if (!expected) return true;

    const request = context.switchToHttp().getRequest<FastifyRequest>();
    const header = request.headers[BRIDGE_TOKEN_HEADER];
    const provided = Array.isArray(header) ? header[0] : header;

    if (!provided) {
      throw new UnauthorizedException({
        error: 'missing_bridge_token',
        message: `Bridge token required in the ${BRIDGE_TOKEN_HEADER} header`,
      });
    }
    const a = Buffer.from(provided);
    const b = Buffer.from(expected);
    if (a.length !== b.length || !timingSafeEqual(a, b)) {
      throw new UnauthorizedException({ error: 'invalid_bridge_token', message: 'Invalid bridge token' });
    }
    return true;
  }
}
