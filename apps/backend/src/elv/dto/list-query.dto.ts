import { Type } from 'class-transformer';
import { IsIn, IsInt, IsMongoId, IsOptional, Max, Min } from 'class-validator';

import { VEHICLE_STATUSES, VehicleStatus } from '../elv.types';

export const DEFAULT_LIST_LIMIT = 50;
export const MAX_LIST_LIMIT = 200;

class LimitQueryDto {
  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(1)
  @Max(MAX_LIST_LIMIT)
  limit: number = DEFAULT_LIST_LIMIT;
}

export class ListVehiclesQueryDto extends LimitQueryDto {
  @IsOptional()
  @IsIn(VEHICLE_STATUSES)
  status?: VehicleStatus;
}

export class ListPartsQueryDto extends LimitQueryDto {
  @IsOptional()
  @IsMongoId()
  vehicle_id?: string;
}
