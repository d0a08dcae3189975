import { BadRequestException, Injectable, PipeTransform } from '@nestjs/common';
import { ERROR_CODES, MAX_ID } from '@shared/constants';

/**
 * Route id parameter: a decimal integer in 1..MAX_ID. Anything larger would
 * overflow the integer columns it is compared against.
 */
@Injectable()
export class ParseIdPipe implements PipeTransform<string, number> {
  transform(value: string): number {
    const id = /^\d+$/.test(value) ? Number(value) : NaN;
    if (!Number.isSafeInteger(id) || id < 1 || id > MAX_ID) {
      throw new BadRequestException({
        code: ERROR_CODES.VALIDATION_ERROR,
        message: `Id must be an integer between 1 and ${MAX_ID}`,
      });
    }
    return id;
  }
}
