import { IsString, IsOptional, MaxLength, IsEmail, IsUrl } from 'class-validator';
import { Transform } from 'class-transformer';

const trim = ({ value }: { value: unknown }) => (typeof value === 'string' ? value.trim() : value);

// null clears a field, an absent field is left untouched
export class UpdateProfileDto {
  @IsOptional()
  @IsEmail({}, { message: 'Email must be valid' })
  @MaxLength(100, { message: 'Email cannot exceed 100 characters' })
  @Transform(({ value }) => (typeof value === 'string' ? value.toLowerCase().trim() : value))
  email?: string | null;

  @IsOptional()
  @IsUrl({}, { message: 'Instagram URL must be a valid URL' })
  @MaxLength(200, { message: 'Instagram URL cannot exceed 200 characters' })
  @Transform(trim)
  instagramUrl?: string | null;

  @IsOptional()
  @IsUrl({}, { message: 'Twitter URL must be a valid URL' })
  @MaxLength(200, { message: 'Twitter URL cannot exceed 200 characters' })
  @Transform(trim)
  twitterUrl?: string | null;

  @IsOptional()
  @IsUrl({}, { message: 'LinkedIn URL must be a valid URL' })
  @MaxLength(200, { message: 'LinkedIn URL cannot exceed 200 characters' })
  @Transform(trim)
  linkedinUrl?: string | null;

  @IsOptional()
  @IsString({ message: 'Description must be a string' })
  @MaxLength(2000, { message: 'Description cannot exceed 2000 characters' })
  @Transform(trim)
  description?: string | null;

  @IsOptional()
  @IsString({ message: 'Interests must be a string' })
  @MaxLength(2000, { message: 'Interests cannot exceed 2000 characters' })
  @Transform(trim)
  interests?: string | null;
}
