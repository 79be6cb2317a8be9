import { Module, Global } from '@nestjs/common';
import { StructuredLoggerService } from './structured-logger.service';
import { MetricsService } from './metrics.service';

@Global()
@Module({
  providers: [
    {
      provide: StructuredLoggerService,
      useFactory: () => new StructuredLoggerService('mesh-jeopardy'),
    },
    MetricsService,
  ],
  exports: [StructuredLoggerService, MetricsService],
})
export class CommonModule {}
