import { Body, Controller, Get, Param, Post, Query, Req, UseGuards } from '@nestjs/common';
import { AuthGuard } from '@nestjs/passport';
import { Throttle } from '@nestjs/throttler';

import { RegistrationsService, toRegistrationSummary } from './registrations.service';
import { MatchReconciliationService } from './match-reconciliation.service';
import { RegisterEventDto } from './dto/register-event.dto';
import { MatchedImagesQueryDto } from './dto/matched-images-query.dto';
import { AuthenticatedRequest } from '../common/interfaces/authenticated-request';
import { ApiResponse, ImageListItem, RegisteredEvent, RegistrationSummary } from '@shared/types';
import { RATE_LIMITS } from '@shared/constants';
import { ParseIdPipe } from '../common/pipes/parse-id.pipe';

const ONE_MINUTE_MS = 60 * 1000;

@Controller('events')
@UseGuards(AuthGuard('basic'))
export class RegistrationsController {
  constructor(
    private readonly registrationsService: RegistrationsService,
    private readonly matchReconciliationService: MatchReconciliationService,
  ) {}

  @Throttle({ default: { limit: RATE_LIMITS.REGISTER_EVENT, ttl: ONE_MINUTE_MS } })
  @Post('register')
  async register(
    @Req() req: AuthenticatedRequest,
    @Body() registerEventDto: RegisterEventDto,
  ): Promise<ApiResponse<RegistrationSummary>> {
    const registration = await this.registrationsService.register(req.user, registerEventDto.eventId);
    return { data: toRegistrationSummary(registration) };
  }

  @Throttle({ default: { limit: RATE_LIMITS.MATCHED_IMAGES, ttl: ONE_MINUTE_MS } })
  @Get('matched-images')
  async getMatchedImages(
    @Req() req: AuthenticatedRequest,
    @Query() query: MatchedImagesQueryDto,
  ): Promise<ApiResponse<ImageListItem[]>> {
    const images = await this.matchReconciliationService.listMatchedImages(
      req.user,
      query.eventId,
      query.page,
      query.pageSize,
    );
    return {
      data: images,
      meta: { page: query.page, pageSize: query.pageSize, total: images.length },
    };
  }

  @Get('my-registrations')
  async getMyRegistrations(@Req() req: AuthenticatedRequest): Promise<ApiResponse<RegistrationSummary[]>> {
    const registrations = await this.registrationsService.findAllForUser(req.user.id);
    return { data: registrations.map(toRegistrationSummary) };
  }

  @Get('registration/:eventId')
  async getRegistration(
    @Req() req: AuthenticatedRequest,
    @Param('eventId', ParseIdPipe) eventId: number,
  ): Promise<ApiResponse<RegistrationSummary>> {
    const registration = await this.registrationsService.findOneForUser(req.user.id, eventId);
    return { data: toRegistrationSummary(registration) };
  }

  @Get('my-registered-events')
  async getMyRegisteredEvents(@Req() req: AuthenticatedRequest): Promise<ApiResponse<RegisteredEvent[]>> {
    const events = await this.registrationsService.findRegisteredEvents(req.user.id);
    return { data: events };
  }
}
