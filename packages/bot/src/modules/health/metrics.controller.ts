import { Controller, Get, Header, Post, UseGuards } from '@nestjs/common';
import { MetricsService } from '../common/metrics.service';
import { BridgeTokenGuard } from '../mesh/bridge-token.guard';

@Controller('metrics')
export class MetricsController {
  constructor(private metrics: MetricsService) {}

  @Get()
  getMetrics() {
    return { counters: this.metrics.snapshot() };
  }

  @Get('prom')
  @Header('Content-Type', 'text/plain; version=0.0.4')
  getPrometheus() {
    return this.metrics.toPrometheus();
  }

  @Post('reset')
  @UseGuards(BridgeTokenGuard)
  resetAll() {
    this.metrics.resetAll();
    return { reset: true };
  }
}
