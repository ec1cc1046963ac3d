import { Module } from '@nestjs/common';

import { DerivedStateService } from './derived-state.service';
import { ElvController } from './elv.controller';
import { ElvService } from './elv.service';
import { EntityValidator } from './entity-validator';

@Module({
  controllers: [ElvController],
  providers: [ElvService, DerivedStateService, EntityValidator],
  exports: [ElvService, EntityValidator],
})
export class ElvModule {}
