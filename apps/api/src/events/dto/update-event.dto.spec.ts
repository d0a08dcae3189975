import { UpdateEventDto } from './update-event.dto';
import { validateDto, validationMessages } from '../../../test/validation';

describe('UpdateEventDto', () => {
  it('should reject a null name', async () => {
    const messages = await validationMessages(UpdateEventDto, { name: null });

    expect(messages).toContain('Name must be a string');
  });

  it('should accept a null description', async () => {
    const dto = await validateDto(UpdateEventDto, { description: null });

    expect(dto.description).toBeNull();
  });

  it('should not accept provider identity fields', async () => {
    await expect(validationMessages(UpdateEventDto, { externalEventId: 1414 })).resolves.toEqual([
      'property externalEventId should not exist',
    ]);
  });
});
