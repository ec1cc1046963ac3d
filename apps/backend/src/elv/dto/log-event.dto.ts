import { IsIn, IsObject, IsOptional, IsString } from 'class-validator';

import { IsTimestamp } from '../../common/is-timestamp.decorator';
import { EVENT_TYPES, EventType, OpenMap } from '../elv.types';

export class LogEventDto {
  @IsOptional()
  @IsString()
  vehicle_id?: string;

  @IsIn(EVENT_TYPES)
  event_type!: EventType;

  @IsOptional()
  @IsString()
  actor_id?: string;

  @IsOptional()
  @IsString()
  notes?: string;

  @IsOptional()
  @IsObject()
  metadata?: OpenMap;

  @IsOptional()
  @IsObject()
  location?: OpenMap;

  /** Client-side timestamp; ingestion time is used when absent. */
  @IsOptional()
  @IsTimestamp()
  occurred_at?: string;
}
