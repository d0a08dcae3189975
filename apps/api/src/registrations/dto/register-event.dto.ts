import { IsInt, Min, Max } from 'class-validator';
import { MAX_ID } from '@shared/constants';

export class RegisterEventDto {
  // Provider-side event id
  @IsInt({ message: 'eventId must be an integer' })
  @Min(1, { message: 'eventId must be positive' })
  @Max(MAX_ID, { message: `eventId cannot exceed ${MAX_ID}` })
  eventId!: number;
}
