import { IsInt, IsOptional, Min, Max } from 'class-validator';
import { Type } from 'class-transformer';
import { MATCH_PROVIDER, MAX_ID } from '@shared/constants';

export class MatchedImagesQueryDto {
  @Type(() => Number)
  @IsInt({ message: 'eventId must be an integer' })
  @Min(1, { message: 'eventId must be positive' })
  @Max(MAX_ID, { message: `eventId cannot exceed ${MAX_ID}` })
  eventId!: number;

  @IsOptional()
  @Type(() => Number)
  @IsInt({ message: 'page must be an integer' })
  @Min(0, { message: 'page is zero-based and cannot be negative' })
  page: number = 0;

  // -1 returns every match
  @IsOptional()
  @Type(() => Number)
  @IsInt({ message: 'pageSize must be an integer' })
  @Min(MATCH_PROVIDER.ALL_IMAGES, { message: 'pageSize must be -1 or greater' })
  pageSize: number = MATCH_PROVIDER.DEFAULT_PAGE_SIZE;
}
