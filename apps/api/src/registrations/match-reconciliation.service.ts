import { BadRequestException, Injectable, Logger, NotFoundException } from '@nestjs/common';

import { RegistrationsService } from './registrations.service';
import { EventsService } from '../events/events.service';
import { ImagesService, toImageListItem } from '../images/images.service';
import { ImageEntity } from '../images/entities/image.entity';
import { UserEntity } from '../users/entities/user.entity';
import { MatchProviderClient } from '../match-provider/match-provider.client';
import { ProviderImage } from '../match-provider/match-provider.types';
import { ImageListItem } from '@shared/types';
import { ERROR_CODES } from '@shared/constants';

/**
 * Joins the provider's match list for a registration with the images we hold
 * locally. Output order is the provider's order.
 */
@Injectable()
export class MatchReconciliationService {
  private readonly logger = new Logger(MatchReconciliationService.name);

  constructor(
    private readonly registrationsService: RegistrationsService,
    private readonly eventsService: EventsService,
    private readonly imagesService: ImagesService,
    private readonly matchProvider: MatchProviderClient,
  ) {}

  async listMatchedImages(
    user: UserEntity,
    externalEventId: number,
    page: number,
    pageSize: number,
  ): Promise<ImageListItem[]> {
    const registration = await this.registrationsService.findForUser(user.id, externalEventId);
    if (!registration) {
      throw new NotFoundException({
        code: ERROR_CODES.REGISTRATION_NOT_FOUND,
        message: `Not registered for event ${externalEventId}, register first`,
      });
    }

    const event = await this.eventsService.findByExternalId(externalEventId);
    const eventKey = event?.externalEventKey;
    if (!event || !eventKey) {
      throw new BadRequestException({
        code: ERROR_CODES.EVENT_KEY_MISSING,
        message: `Event ${externalEventId} has no provider key`,
      });
    }

    const matches = await this.matchProvider.listMatchedImages({
      externalEventId,
      eventKey,
      requestId: registration.requestId,
      requestKey: registration.requestKey,
      page,
      pageSize,
    });
    if (matches.length === 0) {
      return [];
    }

    const localImages = await this.imagesService.findByExternalIds(matches.map((match) => match.id));
    const localByExternalId = new Map<number, ImageEntity>();
    for (const image of localImages) {
      if (image.externalImageId != null && !localByExternalId.has(image.externalImageId)) {
        localByExternalId.set(image.externalImageId, image);
      }
    }

    this.logger.debug(
      `Event ${externalEventId}: ${matches.length} matches, ${localByExternalId.size} stored locally`,
    );

    return matches.map((match) => {
      const local = localByExternalId.get(match.id);
      return local
        ? toImageListItem(local)
        : toMatchPlaceholder(match, user.id, event.id, externalEventId);
    });
  }
}

export function toMatchPlaceholder(
  match: ProviderImage,
  userId: number,
  eventId: number,
  externalEventId: number,
): ImageListItem {
  return {
    id: null,
    name: match.name,
    userId,
    eventId,
    externalImageId: match.id,
    externalImageUrl: match.imageUrl,
    mirrorUrl: null,
    mirrorCid: null,
    size: match.size,
    height: match.height,
    width: match.width,
    description: `Matched image from event ${externalEventId}`,
    imageEncoding: null,
    imageUrl: match.imageUrl,
    createdAt: null,
    updatedAt: null,
  };
}
