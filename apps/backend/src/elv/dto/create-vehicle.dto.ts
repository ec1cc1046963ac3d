import { IsArray, IsIn, IsInt, IsObject, IsOptional, IsString, IsUrl } from 'class-validator';

import {
  CONDITION_LEVELS,
  ConditionLevel,
  DAMAGE_LEVELS,
  DamageLevel,
  OpenMap,
  VEHICLE_STATUSES,
  VehicleStatus,
} from '../elv.types';

export class CreateVehicleDto {
  @IsOptional()
  @IsString()
  vin?: string;

  @IsOptional()
  @IsString()
  make?: string;

  @IsOptional()
  @IsString()
  model?: string;

  @IsOptional()
  @IsInt()
  year?: number;

  @IsOptional()
  @IsIn(CONDITION_LEVELS)
  engine_condition?: ConditionLevel;

  @IsOptional()
  @IsIn(CONDITION_LEVELS)
  body_condition?: ConditionLevel;

  @IsOptional()
  @IsIn(DAMAGE_LEVELS)
  damage_level?: DamageLevel;

  @IsOptional()
  @IsArray()
  @IsUrl({ require_protocol: true }, { each: true })
  photos?: string[];

  @IsOptional()
  @IsObject()
  last_known_location?: OpenMap;

  @IsOptional()
  @IsString()
  owner_id?: string;

  @IsOptional()
  @IsIn(VEHICLE_STATUSES)
  status?: VehicleStatus;
}
