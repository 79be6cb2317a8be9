import { Module } from '@nestjs/common';
import { ANNOUNCEMENT_SINK } from '../game/announcement-sink';
import { MeshOutboxService } from './outbox.service';

@Module({
  providers: [MeshOutboxService, { provide: ANNOUNCEMENT_SINK, useExisting: MeshOutboxService }],
  exports: [MeshOutboxService, ANNOUNCEMENT_SINK],
})
export class OutboxModule {}
