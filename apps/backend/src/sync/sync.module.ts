import { Module } from '@nestjs/common';

import { ElvModule } from '../elv/elv.module';
import { SyncController } from './sync.controller';
import { SyncService } from './sync.service';

@Module({
  imports: [ElvModule],
  controllers: [SyncController],
  providers: [SyncService],
})
export class SyncModule {}
