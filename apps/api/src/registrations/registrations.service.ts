import {
  ConflictException,
  HttpException,
  Injectable,
  InternalServerErrorException,
  Logger,
  NotFoundException,
  PreconditionFailedException,
} from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { In, Repository } from 'typeorm';

import { EventRegistrationEntity } from './entities/event-registration.entity';
import { EventEntity } from '../events/entities/event.entity';
import { UserEntity } from '../users/entities/user.entity';
import { EventsService } from '../events/events.service';
import { MatchProviderClient } from '../match-provider/match-provider.client';
import { SelfieFetcherService } from '../common/services/selfie-fetcher.service';
import { isUniqueViolation } from '../database/unique-violation';
import { RegisteredEvent, RegistrationSummary } from '@shared/types';
import { ERROR_CODES } from '@shared/constants';
import { getErrorMessage } from '@shared/utils';

@Injectable()
export class RegistrationsService {
  private readonly logger = new Logger(RegistrationsService.name);

  constructor(
    @InjectRepository(EventRegistrationEntity)
    private readonly registrationsRepository: Repository<EventRegistrationEntity>,
    @InjectRepository(EventEntity)
    private readonly eventsRepository: Repository<EventEntity>,
    private readonly eventsService: EventsService,
    private readonly selfieFetcher: SelfieFetcherService,
    private readonly matchProvider: MatchProviderClient,
  ) {}

  /**
   * Registers the user's selfie with the match provider for one event and keeps
   * the correlation ids the provider hands back.
   *
   * Checks run in a fixed order: already registered (409), no selfie (412),
   * unknown event or event without a provider key (404). The selfie is staged in
   * a temporary file only for the duration of the provider call. No database
   * transaction is open while the network calls run; the unique index on
   * (user, event) decides concurrent attempts and the loser gets a 409.
   */
  async register(user: UserEntity, externalEventId: number): Promise<EventRegistrationEntity> {
    try {
      const existing = await this.findForUser(user.id, externalEventId);
      if (existing) {
        throw this.alreadyRegistered(user.id, externalEventId);
      }

      const selfieUrl = user.selfieUrl;
      if (!selfieUrl) {
        throw new PreconditionFailedException({
          code: ERROR_CODES.SELFIE_REQUIRED,
          message: 'User must have selfie before registering for an event',
        });
      }

      const event = await this.eventsService.findByExternalId(externalEventId);
      if (!event) {
        throw new NotFoundException({
          code: ERROR_CODES.EVENT_NOT_FOUND,
          message: `Event ${externalEventId} not found`,
        });
      }
      const eventKey = event.externalEventKey;
      if (!eventKey) {
        throw new NotFoundException({
          code: ERROR_CODES.EVENT_KEY_MISSING,
          message: `Event ${externalEventId} has no provider key`,
        });
      }

      const correlation = await this.selfieFetcher.withDownloadedSelfie(selfieUrl, (selfiePath) =>
        this.matchProvider.createRequest({ externalEventId, eventKey, selfiePath }),
      );

      const registration = this.registrationsRepository.create({
        userId: user.id,
        externalEventId,
        requestId: correlation.requestId,
        requestKey: correlation.requestKey,
        redirectUrl: correlation.redirectUrl,
      });

      let saved: EventRegistrationEntity;
      try {
        saved = await this.registrationsRepository.save(registration, { transaction: false });
      } catch (error) {
        if (isUniqueViolation(error)) {
          this.logger.warn(`Concurrent registration of user ${user.id} for event ${externalEventId} lost the race`);
          throw this.alreadyRegistered(user.id, externalEventId);
        }
        throw error;
      }

      this.logger.log(
        `User ${user.id} registered for event ${externalEventId} (request ${saved.requestId})`,
      );
      return saved;
    } catch (error) {
      if (error instanceof HttpException) {
        throw error;
      }
      const errorMessage = getErrorMessage(error);
      this.logger.error(
        `Registration of user ${user.id} for event ${externalEventId} failed: ${errorMessage}`,
        error instanceof Error ? error.stack : undefined,
      );
      throw new InternalServerErrorException({
        code: ERROR_CODES.INTERNAL_ERROR,
        message: `Registration failed: ${errorMessage}`,
      });
    }
  }

  async findForUser(userId: number, externalEventId: number): Promise<EventRegistrationEntity | null> {
    return this.registrationsRepository.findOne({ where: { userId, externalEventId } });
  }

  async findOneForUser(userId: number, externalEventId: number): Promise<EventRegistrationEntity> {
    const registration = await this.findForUser(userId, externalEventId);

    if (!registration) {
      throw new NotFoundException({
        code: ERROR_CODES.REGISTRATION_NOT_FOUND,
        message: `No registration found for event ${externalEventId}`,
      });
    }

    return registration;
  }

  async findAllForUser(userId: number): Promise<EventRegistrationEntity[]> {
    return this.registrationsRepository.find({
      where: { userId },
      order: { createdAt: 'DESC', id: 'DESC' },
    });
  }

  /**
   * The user's registrations with the local event details, newest first. Event
   * fields are null for registrations whose event is not stored locally.
   */
  async findRegisteredEvents(userId: number): Promise<RegisteredEvent[]> {
    const registrations = await this.findAllForUser(userId);
    if (registrations.length === 0) {
      return [];
    }

    const events = await this.eventsRepository.find({
      where: { externalEventId: In(registrations.map((r) => r.externalEventId)) },
    });
    const eventsByExternalId = new Map(events.map((event) => [event.externalEventId, event]));

    return registrations.map((registration) => {
      const event = eventsByExternalId.get(registration.externalEventId);
      return {
        registrationId: registration.id,
        requestId: registration.requestId,
        requestKey: registration.requestKey,
        redirectUrl: registration.redirectUrl,
        registrationCreatedAt: registration.createdAt.toISOString(),
        externalEventId: registration.externalEventId,
        eventId: event?.id ?? null,
        eventName: event?.name ?? null,
        eventDescription: event?.description ?? null,
        eventCoverImageUrl: event?.coverImageUrl ?? null,
        eventDate: event?.eventDate ?? null,
        externalEventKey: event?.externalEventKey ?? null,
      };
    });
  }

  async deleteByEvent(externalEventId: number): Promise<number> {
    const result = await this.registrationsRepository.delete({ externalEventId });
    const deleted = result.affected ?? 0;
    this.logger.log(`Deleted ${deleted} registrations for event ${externalEventId}`);
    return deleted;
  }

  private alreadyRegistered(userId: number, externalEventId: number): ConflictException {
    return new ConflictException({
      code: ERROR_CODES.ALREADY_REGISTERED,
      message: `User ${userId} is already registered for event ${externalEventId}`,
    });
  }
}

export function toRegistrationSummary(registration: EventRegistrationEntity): RegistrationSummary {
  return {
    id: registration.id,
    userId: registration.userId,
    externalEventId: registration.externalEventId,
    requestId: registration.requestId,
    requestKey: registration.requestKey,
    redirectUrl: registration.redirectUrl,
    createdAt: registration.createdAt.toISOString(),
  };
}
