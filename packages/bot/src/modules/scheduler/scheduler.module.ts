import { Module } from '@nestjs/common';
import { ClockService } from './clock.service';
import { SchedulerService } from './scheduler.service';

@Module({
  providers: [ClockService, SchedulerService],
  exports: [ClockService, SchedulerService],
})
export class SchedulerModule {}
