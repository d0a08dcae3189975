import { RegisterEventDto } from './register-event.dto';
import { validateDto, validationMessages } from '../../../test/validation';

describe('RegisterEventDto', () => {
  it('should accept the largest storable event id', async () => {
    const dto = await validateDto(RegisterEventDto, { eventId: 2147483647 });

    expect(dto.eventId).toBe(2147483647);
  });

  it('should reject event ids beyond the integer range', async () => {
    await expect(validationMessages(RegisterEventDto, { eventId: 2147483648 })).resolves.toEqual([
      'eventId cannot exceed 2147483647',
    ]);
  });

  it('should reject unknown fields', async () => {
    await expect(validationMessages(RegisterEventDto, { eventId: 1413, userId: 7 })).resolves.toEqual([
      'property userId should not exist',
    ]);
  });
});
