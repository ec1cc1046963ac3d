import { Type } from 'class-transformer';
import { IsArray, IsNotEmpty, IsObject, IsString, ValidateNested } from 'class-validator';

import { IsTimestamp } from '../../common/is-timestamp.decorator';
import { Mutation } from '../sync.types';

export class MutationDto implements Mutation {
  // Any op is accepted here; unknown ones come back as ignored results.
  @IsString()
  @IsNotEmpty()
  op!: string;

  @IsObject()
  data!: Record<string, unknown>;

  @IsString()
  client_id!: string;

  @IsTimestamp()
  client_timestamp!: string;
}

export class SyncEnvelopeDto {
  @IsArray()
  @ValidateNested({ each: true })
  @Type(() => MutationDto)
  mutations!: MutationDto[];
}
