import { Controller, Get, Param, Query } from '@nestjs/common';

import { EventsService, toEventSummary } from './events.service';
import { PaginationQueryDto } from '../common/dto/pagination-query.dto';
import { ApiResponse, EventSummary } from '@shared/types';
import { ParseIdPipe } from '../common/pipes/parse-id.pipe';

@Controller('getEventList')
export class EventsController {
  constructor(private readonly eventsService: EventsService) {}

  @Get()
  async findAll(@Query() query: PaginationQueryDto): Promise<ApiResponse<EventSummary[]>> {
    const offset = query.offset ?? 0;
    const events = await this.eventsService.findAll(query.limit, offset);
    return {
      data: events.map(toEventSummary),
      meta: { pagination: { offset, limit: query.limit ?? null } },
    };
  }

  @Get(':id')
  async findOne(@Param('id', ParseIdPipe) id: number): Promise<ApiResponse<EventSummary>> {
    const event = await this.eventsService.findOne(id);
    return { data: toEventSummary(event) };
  }
}
