import { Body, Controller, Param, Patch, Post, UseGuards } from '@nestjs/common';
import { AuthGuard } from '@nestjs/passport';

import { EventsService, toEventSummary } from './events.service';
import { CreateEventDto } from './dto/create-event.dto';
import { UpdateEventDto } from './dto/update-event.dto';
import { ApiResponse, EventSummary } from '@shared/types';
import { ParseIdPipe } from '../common/pipes/parse-id.pipe';

@Controller('internal/events')
@UseGuards(AuthGuard('internal'))
export class InternalEventsController {
  constructor(private readonly eventsService: EventsService) {}

  @Post()
  async create(@Body() createEventDto: CreateEventDto): Promise<ApiResponse<EventSummary>> {
    const event = await this.eventsService.create(createEventDto);
    return { data: toEventSummary(event) };
  }

  @Patch(':id')
  async update(
    @Param('id', ParseIdPipe) id: number,
    @Body() updateEventDto: UpdateEventDto,
  ): Promise<ApiResponse<EventSummary>> {
    const event = await this.eventsService.update(id, updateEventDto);
    return { data: toEventSummary(event) };
  }
}
