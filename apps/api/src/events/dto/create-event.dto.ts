import { IsString, IsDateString, IsOptional, IsInt, IsUrl, MinLength, MaxLength, Min, Max } from 'class-validator';
import { MAX_ID } from '@shared/constants';

export class CreateEventDto {
  @IsString({ message: 'Name must be a string' })
  @MinLength(1, { message: 'Name cannot be empty' })
  @MaxLength(255, { message: 'Name cannot exceed 255 characters' })
  name!: string;

  @IsOptional()
  @IsString({ message: 'Description must be a string' })
  description?: string | null;

  @IsOptional()
  @IsUrl({}, { message: 'Cover image URL must be a valid URL' })
  coverImageUrl?: string | null;

  @IsOptional()
  @IsInt()
  @Min(0)
  @Max(MAX_ID, { message: `coverImageHeight cannot exceed ${MAX_ID}` })
  coverImageHeight?: number | null;

  @IsOptional()
  @IsInt()
  @Min(0)
  @Max(MAX_ID, { message: `coverImageWidth cannot exceed ${MAX_ID}` })
  coverImageWidth?: number | null;

  @IsOptional()
  @IsString({ message: 'Location must be a string' })
  location?: string | null;

  @IsOptional()
  @IsString({ message: 'Category must be a string' })
  category?: string | null;

  @IsOptional()
  @IsDateString({}, { message: 'Event date must be a valid date' })
  eventDate?: string | null;

  @IsInt({ message: 'externalEventId must be an integer' })
  @Min(1, { message: 'externalEventId must be positive' })
  @Max(MAX_ID, { message: `externalEventId cannot exceed ${MAX_ID}` })
  externalEventId!: number;

  @IsOptional()
  @IsString({ message: 'externalEventKey must be a string' })
  @MaxLength(255)
  externalEventKey?: string | null;
}
