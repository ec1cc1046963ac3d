import { Body, Controller, Get, Inject, Param, Post, Query } from '@nestjs/common';

import { ParseObjectIdPipe } from '../common/parse-object-id.pipe';
import { CreateVehicleDto } from './dto/create-vehicle.dto';
import { ListPartsQueryDto, ListVehiclesQueryDto } from './dto/list-query.dto';
import { LogEventDto } from './dto/log-event.dto';
import { RegisterPartDto } from './dto/register-part.dto';
import { ElvService } from './elv.service';

@Controller()
export class ElvController {
  constructor(@Inject(ElvService) private readonly elv: ElvService) {}

  @Post('vehicles')
  createVehicle(@Body() dto: CreateVehicleDto) {
    return this.elv.createVehicle(dto);
  }

  @Get('vehicles')
  listVehicles(@Query() query: ListVehiclesQueryDto) {
    return this.elv.listVehicles(query);
  }

  @Get('vehicles/:id')
  getVehicle(@Param('id', new ParseObjectIdPipe('vehicle id')) id: string) {
    return this.elv.getVehicle(id);
  }

  @Get('vehicles/:id/history')
  getVehicleHistory(@Param('id', new ParseObjectIdPipe('vehicle id')) id: string) {
    return this.elv.getVehicleHistory(id);
  }

  @Post('events')
  logEvent(@Body() dto: LogEventDto) {
    return this.elv.logEvent(dto);
  }

  @Post('parts')
  registerPart(@Body() dto: RegisterPartDto) {
    return this.elv.registerPart(dto);
  }

  @Get('parts')
  listParts(@Query() query: ListPartsQueryDto) {
    return this.elv.listParts(query);
  }
}
