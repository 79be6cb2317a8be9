import { Controller, Get } from '@nestjs/common';

@Controller()
export class RootController {
  @Get()
  root() {
    return {
      name: 'Mesh Jeopardy bot',
      status: 'ok',
      endpoints: [
        '/',
        '/health',
        '/metrics',
        '/metrics/prom',
        '/metrics/reset (POST, bridge token)',
        '/mesh/packets (POST, bridge token)',
        '/mesh/outbox (GET, bridge token)',
      ],
    };
  }
}
