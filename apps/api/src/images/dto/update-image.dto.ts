import { IsBoolean, IsInt, IsOptional, IsString, IsUrl, MaxLength, Min, MinLength, Max, ValidateIf } from 'class-validator';
import { MAX_ID } from '@shared/constants';

export class UpdateImageDto {
  // May be omitted, never null
  @ValidateIf((_object, value) => value !== undefined)
  @IsString({ message: 'Name must be a string' })
  @MinLength(1, { message: 'Name cannot be empty' })
  @MaxLength(255, { message: 'Name cannot exceed 255 characters' })
  name?: string;

  @IsOptional()
  @IsInt()
  @Min(1)
  @Max(MAX_ID, { message: `userId cannot exceed ${MAX_ID}` })
  userId?: number | null;

  @IsOptional()
  @IsInt()
  @Min(1)
  @Max(MAX_ID, { message: `eventId cannot exceed ${MAX_ID}` })
  eventId?: number | null;

  @IsOptional()
  @IsInt()
  @Min(1)
  @Max(MAX_ID, { message: `externalImageId cannot exceed ${MAX_ID}` })
  externalImageId?: number | null;

  @IsOptional()
  @IsUrl({}, { message: 'externalImageUrl must be a valid URL' })
  @MaxLength(500)
  externalImageUrl?: string | null;

  @IsOptional()
  @IsUrl({}, { message: 'mirrorUrl must be a valid URL' })
  @MaxLength(500)
  mirrorUrl?: string | null;

  @IsOptional()
  @IsString()
  @MaxLength(255)
  mirrorCid?: string | null;

  @IsOptional()
  @IsInt()
  @Min(0)
  @Max(MAX_ID, { message: `size cannot exceed ${MAX_ID}` })
  size?: number | null;

  @IsOptional()
  @IsInt()
  @Min(0)
  @Max(MAX_ID, { message: `height cannot exceed ${MAX_ID}` })
  height?: number | null;

  @IsOptional()
  @IsInt()
  @Min(0)
  @Max(MAX_ID, { message: `width cannot exceed ${MAX_ID}` })
  width?: number | null;

  @IsOptional()
  @IsString()
  @MaxLength(512)
  description?: string | null;

  @IsOptional()
  @IsString()
  @MaxLength(512)
  imageEncoding?: string | null;

  @IsOptional()
  @IsBoolean()
  isSelfie?: boolean;
}
