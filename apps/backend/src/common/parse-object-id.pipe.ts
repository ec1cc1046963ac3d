import { BadRequestException, Injectable, PipeTransform } from '@nestjs/common';

const OBJECT_ID_PATTERN = /^[a-fA-F0-9]{24}$/;

@Injectable()
export class ParseObjectIdPipe implements PipeTransform<string, string> {
  constructor(private readonly label = 'id') {}

  transform(value: string): string {
    if (!OBJECT_ID_PATTERN.test(value)) {
      throw new BadRequestException(`Invalid ${this.label}`);
    }

    return value.toLowerCase();
  }
}
