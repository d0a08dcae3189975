import {
  ArrayMaxSize,
  IsArray,
  IsInt,
  IsNumber,
  IsOptional,
  Max,
  Min,
  ValidateNested,
} from 'class-validator';
import { Type } from 'class-transformer';
import { REGION_MAPPINGS, MAX_ID } from '@shared/constants';

export class RegionMappingInputDto {
  @IsInt()
  @Min(1)
  @Max(MAX_ID, { message: `requestId cannot exceed ${MAX_ID}` })
  requestId!: number;

  @IsInt()
  @Min(1)
  @Max(MAX_ID, { message: `imageId cannot exceed ${MAX_ID}` })
  imageId!: number;

  @IsInt()
  @Min(0)
  @Max(MAX_ID, { message: `indexNum cannot exceed ${MAX_ID}` })
  indexNum!: number;

  @IsOptional()
  @IsNumber()
  x1?: number | null;

  @IsOptional()
  @IsNumber()
  x2?: number | null;

  @IsOptional()
  @IsNumber()
  y1?: number | null;

  @IsOptional()
  @IsNumber()
  y2?: number | null;

  @IsOptional()
  @IsNumber()
  aspectRatio?: number | null;
}

export class BulkInsertMappingsDto {
  @IsInt({ message: 'eventId must be an integer' })
  @Min(1, { message: 'eventId must be positive' })
  @Max(MAX_ID, { message: `eventId cannot exceed ${MAX_ID}` })
  eventId!: number;

  @IsArray({ message: 'mappings must be an array' })
  @ArrayMaxSize(REGION_MAPPINGS.MAX_BATCH, {
    message: `A batch cannot hold more than ${REGION_MAPPINGS.MAX_BATCH} mappings`,
  })
  @ValidateNested({ each: true })
  @Type(() => RegionMappingInputDto)
  mappings!: RegionMappingInputDto[];
}
