import { ConflictException, Injectable, Logger, NotFoundException } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';

import { EventEntity } from './entities/event.entity';
import { CreateEventDto } from './dto/create-event.dto';
import { applyEventPatch, EventPatch } from './event.patch';
import { isUniqueViolation } from '../database/unique-violation';
import { EventSummary } from '@shared/types';
import { ERROR_CODES } from '@shared/constants';

@Injectable()
export class EventsService {
  private readonly logger = new Logger(EventsService.name);

  constructor(
    @InjectRepository(EventEntity)
    private readonly eventsRepository: Repository<EventEntity>,
  ) {}

  async create(createEventDto: CreateEventDto): Promise<EventEntity> {
    const existing = await this.findByExternalId(createEventDto.externalEventId);
    if (existing) {
      throw this.alreadyExists(createEventDto.externalEventId);
    }

    const event = this.eventsRepository.create({
      name: createEventDto.name,
      description: createEventDto.description ?? null,
      coverImageUrl: createEventDto.coverImageUrl ?? null,
      coverImageHeight: createEventDto.coverImageHeight ?? null,
      coverImageWidth: createEventDto.coverImageWidth ?? null,
      location: createEventDto.location ?? null,
      category: createEventDto.category ?? null,
      eventDate: createEventDto.eventDate ?? null,
      externalEventId: createEventDto.externalEventId,
      externalEventKey: createEventDto.externalEventKey ?? null,
    });

    try {
      const saved = await this.eventsRepository.save(event);
      this.logger.log(`Created event ${saved.id} for external event ${saved.externalEventId}`);
      return saved;
    } catch (error) {
      if (isUniqueViolation(error)) {
        throw this.alreadyExists(createEventDto.externalEventId);
      }
      throw error;
    }
  }

  /**
   * Most recent events first; events without a date go last.
   */
  async findAll(limit?: number, offset = 0): Promise<EventEntity[]> {
    return this.eventsRepository.find({
      order: {
        eventDate: { direction: 'DESC', nulls: 'LAST' },
        id: 'DESC',
      },
      skip: offset,
      take: limit,
    });
  }

  async findOne(id: number): Promise<EventEntity> {
    const event = await this.eventsRepository.findOne({ where: { id } });

    if (!event) {
      throw new NotFoundException({
        code: ERROR_CODES.EVENT_NOT_FOUND,
        message: `Event ${id} not found`,
      });
    }

    return event;
  }

  async findByExternalId(externalEventId: number): Promise<EventEntity | null> {
    return this.eventsRepository.findOne({ where: { externalEventId } });
  }

  async update(id: number, patch: EventPatch): Promise<EventEntity> {
    const event = applyEventPatch(await this.findOne(id), patch);
    return this.eventsRepository.save(event);
  }

  private alreadyExists(externalEventId: number): ConflictException {
    return new ConflictException({
      code: ERROR_CODES.EVENT_ALREADY_EXISTS,
      message: `Event with external id ${externalEventId} already exists`,
    });
  }
}

export function toEventSummary(event: EventEntity): EventSummary {
  return {
    id: event.id,
    name: event.name,
    description: event.description,
    coverImageUrl: event.coverImageUrl,
    coverImageHeight: event.coverImageHeight,
    coverImageWidth: event.coverImageWidth,
    location: event.location,
    category: event.category,
    eventDate: event.eventDate,
    externalEventId: event.externalEventId,
    externalEventKey: event.externalEventKey,
    createdAt: event.createdAt.toISOString(),
    updatedAt: event.updatedAt.toISOString(),
  };
}
