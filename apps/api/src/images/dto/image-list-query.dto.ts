import { IsInt, IsOptional, Max } from 'class-validator';
import { Type } from 'class-transformer';

import { PaginationQueryDto } from '../../common/dto/pagination-query.dto';
import { MAX_ID } from '@shared/constants';

export class ImageListQueryDto extends PaginationQueryDto {
  @IsOptional()
  @Type(() => Number)
  @IsInt({ message: 'eventId must be an integer' })
  @Max(MAX_ID, { message: `eventId cannot exceed ${MAX_ID}` })
  eventId?: number;
}
