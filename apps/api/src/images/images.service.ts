import { BadRequestException, Injectable, Logger, NotFoundException } from '@nestjs/common';
import { InjectDataSource, InjectRepository } from '@nestjs/typeorm';
import { DataSource, EntityManager, In, Repository } from 'typeorm';

import { ImageEntity } from './entities/image.entity';
import { UserEntity } from '../users/entities/user.entity';
import { CreateImageDto } from './dto/create-image.dto';
import { applyImagePatch, ImagePatch } from './image.patch';
import { ImageListItem } from '@shared/types';
import { ERROR_CODES, MAX_ID } from '@shared/constants';
import { resolveImageUrl } from '@shared/utils';

export interface ImageListFilter {
  limit?: number;
  offset?: number;
  eventId?: number;
}

export interface UpdateImageInput extends ImagePatch {
  isSelfie?: boolean;
}

@Injectable()
export class ImagesService {
  private readonly logger = new Logger(ImagesService.name);

  constructor(
    @InjectDataSource()
    private readonly dataSource: DataSource,
    @InjectRepository(ImageEntity)
    private readonly imagesRepository: Repository<ImageEntity>,
  ) {}

  /**
   * Stores an image record. When `isSelfie` is set the owner's selfie fields are
   * rewritten from this image in the same transaction.
   */
  async create(createImageDto: CreateImageDto): Promise<ImageEntity> {
    const { isSelfie, ...fields } = createImageDto;

    if (fields.userId == null && fields.eventId == null) {
      throw new BadRequestException({
        code: ERROR_CODES.IMAGE_OWNER_REQUIRED,
        message: 'An image needs a userId or an eventId',
      });
    }

    return this.dataSource.transaction(async (manager) => {
      const image = await manager.save(
        manager.create(ImageEntity, {
          name: fields.name,
          userId: fields.userId ?? null,
          eventId: fields.eventId ?? null,
          externalImageId: fields.externalImageId ?? null,
          externalImageUrl: fields.externalImageUrl ?? null,
          mirrorUrl: fields.mirrorUrl ?? null,
          mirrorCid: fields.mirrorCid ?? null,
          size: fields.size ?? null,
          height: fields.height ?? null,
          width: fields.width ?? null,
          description: fields.description ?? null,
          imageEncoding: fields.imageEncoding ?? null,
        }),
      );

      if (isSelfie && image.userId != null) {
        await this.applySelfie(manager, image.userId, image);
      }

      return image;
    });
  }

  async findOne(id: number): Promise<ImageEntity> {
    const image = await this.imagesRepository.findOne({ where: { id } });

    if (!image) {
      throw new NotFoundException({
        code: ERROR_CODES.IMAGE_NOT_FOUND,
        message: `Image ${id} not found`,
      });
    }

    return image;
  }

  /**
   * Partial update. `isSelfie` re-applies the selfie rule with the values the
   * image has after the patch.
   */
  async update(id: number, input: UpdateImageInput): Promise<ImageEntity> {
    const { isSelfie, ...patch } = input;

    return this.dataSource.transaction(async (manager) => {
      const existing = await manager.findOne(ImageEntity, { where: { id } });
      if (!existing) {
        throw new NotFoundException({
          code: ERROR_CODES.IMAGE_NOT_FOUND,
          message: `Image ${id} not found`,
        });
      }

      const image = await manager.save(applyImagePatch(existing, patch));

      if (isSelfie && image.userId != null) {
        await this.applySelfie(manager, image.userId, image);
      }

      return image;
    });
  }

  async findAllForUser(userId: number): Promise<ImageEntity[]> {
    return this.imagesRepository.find({
      where: { userId },
      order: { createdAt: 'DESC', id: 'DESC' },
    });
  }

  async findOneForUser(userId: number, id: number): Promise<ImageEntity> {
    const image = await this.imagesRepository.findOne({ where: { id, userId } });

    if (!image) {
      throw new NotFoundException({
        code: ERROR_CODES.IMAGE_NOT_FOUND,
        message: 'Image not found or not owned by the current user',
      });
    }

    return image;
  }

  async listForUser(userId: number, filter: ImageListFilter): Promise<ImageEntity[]> {
    return this.imagesRepository.find({
      where: filter.eventId !== undefined ? { userId, eventId: filter.eventId } : { userId },
      order: { createdAt: 'DESC', id: 'DESC' },
      skip: filter.offset ?? 0,
      take: filter.limit,
    });
  }

  /**
   * One query for all ids. When several local rows share an external id the
   * oldest row is returned first.
   */
  async findByExternalIds(externalImageIds: number[]): Promise<ImageEntity[]> {
    // Larger ids cannot be stored, so they never match a local row
    const storable = externalImageIds.filter((id) => Math.abs(id) <= MAX_ID);
    if (storable.length === 0) {
      return [];
    }

    return this.imagesRepository.find({
      where: { externalImageId: In(storable) },
      order: { id: 'ASC' },
    });
  }

  private async applySelfie(manager: EntityManager, userId: number, image: ImageEntity): Promise<void> {
    const user = await manager.findOne(UserEntity, { where: { id: userId } });
    if (!user) {
      throw new NotFoundException({
        code: ERROR_CODES.USER_NOT_FOUND,
        message: `User with id ${userId} not found`,
      });
    }

    user.selfieUrl = resolveImageUrl(image.mirrorUrl, image.externalImageUrl);
    user.selfieCid = image.mirrorCid;
    user.selfieHeight = image.height;
    user.selfieWidth = image.width;
    await manager.save(user);

    this.logger.log(`Updated selfie of user ${userId} from image ${image.id}`);
  }
}

export function toImageListItem(image: ImageEntity): ImageListItem {
  return {
    id: image.id,
    name: image.name,
    userId: image.userId,
    eventId: image.eventId,
    externalImageId: image.externalImageId,
    externalImageUrl: image.externalImageUrl,
    mirrorUrl: image.mirrorUrl,
    mirrorCid: image.mirrorCid,
    size: image.size,
    height: image.height,
    width: image.width,
    description: image.description,
    imageEncoding: image.imageEncoding,
    imageUrl: resolveImageUrl(image.mirrorUrl, image.externalImageUrl),
    createdAt: image.createdAt.toISOString(),
    updatedAt: image.updatedAt.toISOString(),
  };
}
