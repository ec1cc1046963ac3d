import { Body, Controller, HttpCode, HttpStatus, Inject, Post } from '@nestjs/common';

import { SyncEnvelopeDto } from './dto/sync-envelope.dto';
import { SyncService } from './sync.service';

@Controller('sync')
export class SyncController {
  constructor(@Inject(SyncService) private readonly sync: SyncService) {}

  @Post()
  @HttpCode(HttpStatus.OK)
  reconcile(@Body() envelope: SyncEnvelopeDto) {
    return this.sync.reconcile(envelope.mutations);
  }
}
