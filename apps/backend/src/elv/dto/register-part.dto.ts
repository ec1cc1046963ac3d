import { IsIn, IsNotEmpty, IsNumber, IsOptional, IsString, Min } from 'class-validator';

import { PART_CONDITIONS, PartCondition } from '../elv.types';

export class RegisterPartDto {
  @IsOptional()
  @IsString()
  vehicle_id?: string;

  @IsString()
  @IsNotEmpty()
  name!: string;

  @IsOptional()
  @IsString()
  serial_number?: string;

  @IsOptional()
  @IsIn(PART_CONDITIONS)
  condition?: PartCondition;

  @IsOptional()
  @IsString()
  location?: string;

  @IsOptional()
  @IsNumber({ allowNaN: false, allowInfinity: false })
  @Min(0)
  price_etb?: number;
}
