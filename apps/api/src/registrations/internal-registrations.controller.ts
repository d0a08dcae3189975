import { Controller, Delete, Param, UseGuards } from '@nestjs/common';
import { AuthGuard } from '@nestjs/passport';

import { RegistrationsService } from './registrations.service';
import { ApiResponse } from '@shared/types';
import { ParseIdPipe } from '../common/pipes/parse-id.pipe';

@Controller('internal/registrations')
@UseGuards(AuthGuard('internal'))
export class InternalRegistrationsController {
  constructor(private readonly registrationsService: RegistrationsService) {}

  @Delete('event/:eventId')
  async deleteByEvent(
    @Param('eventId', ParseIdPipe) eventId: number,
  ): Promise<ApiResponse<{ deleted: number }>> {
    const deleted = await this.registrationsService.deleteByEvent(eventId);
    return { data: { deleted } };
  }
}
