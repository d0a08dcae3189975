import { Test } from '@nestjs/testing';
import { getRepositoryToken } from '@nestjs/typeorm';
import { BadRequestException, NotFoundException } from '@nestjs/common';
import { DataSource, Repository } from 'typeorm';

import { MatchReconciliationService, toMatchPlaceholder } from './match-reconciliation.service';
import { RegistrationsService } from './registrations.service';
import { EventRegistrationEntity } from './entities/event-registration.entity';
import { EventEntity } from '../events/entities/event.entity';
import { ImageEntity } from '../images/entities/image.entity';
import { UserEntity } from '../users/entities/user.entity';
import { EventsService } from '../events/events.service';
import { ImagesService } from '../images/images.service';
import { SelfieFetcherService } from '../common/services/selfie-fetcher.service';
import { MatchProviderClient } from '../match-provider/match-provider.client';
import { MatchedImagesQuery, ProviderImage } from '../match-provider/match-provider.types';
import { APP_CONFIG } from '../config/app.config';
import { createTestDataSource } from '../../test/test-database';
import { createTestConfig } from '../../test/test-config';
import { saveEvent, saveImage, saveUser } from '../../test/fixtures';

function providerImage(id: number, overrides: Partial<ProviderImage> = {}): ProviderImage {
  return {
    id,
    name: `${id}.jpg`,
    imageUrl: `https://provider.test/${id}.jpg`,
    width: 1200,
    height: 800,
    size: 4096,
    ...overrides,
  };
}

describe('MatchReconciliationService', () => {
  let dataSource: DataSource;
  let service: MatchReconciliationService;
  let registrations: Repository<EventRegistrationEntity>;
  let listMatchedImages: jest.Mock<Promise<ProviderImage[]>, [MatchedImagesQuery]>;
  let user: UserEntity;
  let event: EventEntity;

  beforeEach(async () => {
    dataSource = await createTestDataSource();
    registrations = dataSource.getRepository(EventRegistrationEntity);
    listMatchedImages = jest.fn<Promise<ProviderImage[]>, [MatchedImagesQuery]>();

    const module = await Test.createTestingModule({
      providers: [
        MatchReconciliationService,
        RegistrationsService,
        EventsService,
        ImagesService,
        SelfieFetcherService,
        { provide: APP_CONFIG, useValue: createTestConfig() },
        { provide: DataSource, useValue: dataSource },
        { provide: getRepositoryToken(EventRegistrationEntity), useValue: registrations },
        { provide: getRepositoryToken(EventEntity), useValue: dataSource.getRepository(EventEntity) },
        { provide: getRepositoryToken(ImageEntity), useValue: dataSource.getRepository(ImageEntity) },
        { provide: MatchProviderClient, useValue: { createRequest: jest.fn(), listMatchedImages } },
      ],
    }).compile();

    service = module.get(MatchReconciliationService);

    user = await saveUser(dataSource);
    event = await saveEvent(dataSource);
    await registrations.insert({ userId: user.id, externalEventId: 1413, requestId: 77, requestKey: 'k1' });
  });

  afterEach(async () => {
    await dataSource.destroy();
  });

  it('should merge local images with synthesized entries for the rest', async () => {
    const local = await saveImage(dataSource, {
      name: 'finish-line.jpg',
      eventId: event.id,
      externalImageId: 10,
      externalImageUrl: 'https://provider.test/10.jpg',
      mirrorUrl: 'https://mirror.test/10.jpg',
    });
    listMatchedImages.mockResolvedValue([providerImage(10), providerImage(11)]);

    const result = await service.listMatchedImages(user, 1413, 0, -1);

    expect(result).toHaveLength(2);
    expect(result[0]).toMatchObject({
      id: local.id,
      name: 'finish-line.jpg',
      externalImageId: 10,
      imageUrl: 'https://mirror.test/10.jpg',
    });
    expect(result[1]).toEqual({
      id: null,
      name: '11.jpg',
      userId: user.id,
      eventId: event.id,
      externalImageId: 11,
      externalImageUrl: 'https://provider.test/11.jpg',
      mirrorUrl: null,
      mirrorCid: null,
      size: 4096,
      height: 800,
      width: 1200,
      description: 'Matched image from event 1413',
      imageEncoding: null,
      imageUrl: 'https://provider.test/11.jpg',
      createdAt: null,
      updatedAt: null,
    });
  });

  it('should pass the registration and paging to the provider', async () => {
    listMatchedImages.mockResolvedValue([]);

    await service.listMatchedImages(user, 1413, 2, 25);

    expect(listMatchedImages).toHaveBeenCalledWith({
      externalEventId: 1413,
      eventKey: 'event-key',
      requestId: 77,
      requestKey: 'k1',
      page: 2,
      pageSize: 25,
    });
  });

  it('should keep the provider order', async () => {
    await saveImage(dataSource, { externalImageId: 10 });
    await saveImage(dataSource, { externalImageId: 12 });
    listMatchedImages.mockResolvedValue([providerImage(12), providerImage(11), providerImage(10)]);

    const result = await service.listMatchedImages(user, 1413, 0, 10);

    expect(result.map((image) => image.externalImageId)).toEqual([12, 11, 10]);
    expect(result.map((image) => image.id === null)).toEqual([false, true, false]);
  });

  it('should fall back to the provider url when the mirror url is empty', async () => {
    await saveImage(dataSource, {
      externalImageId: 10,
      externalImageUrl: 'https://provider.test/10-original.jpg',
      mirrorUrl: '',
    });
    listMatchedImages.mockResolvedValue([providerImage(10)]);

    const [image] = await service.listMatchedImages(user, 1413, 0, 10);

    expect(image.imageUrl).toBe('https://provider.test/10-original.jpg');
  });

  it('should use the oldest local row when several share an external id', async () => {
    const first = await saveImage(dataSource, { name: 'first.jpg', externalImageId: 10 });
    await saveImage(dataSource, { name: 'second.jpg', externalImageId: 10 });
    listMatchedImages.mockResolvedValue([providerImage(10)]);

    const result = await service.listMatchedImages(user, 1413, 0, 10);

    expect(result).toHaveLength(1);
    expect(result[0].id).toBe(first.id);
  });

  it('should return an empty list when the provider has no matches', async () => {
    listMatchedImages.mockResolvedValue([]);

    await expect(service.listMatchedImages(user, 1413, 0, 10)).resolves.toEqual([]);
  });

  it('should require a registration', async () => {
    await expect(service.listMatchedImages(user, 2000, 0, 10)).rejects.toThrow(NotFoundException);
    expect(listMatchedImages).not.toHaveBeenCalled();
  });

  it('should reject an event without a provider key', async () => {
    await saveEvent(dataSource, { name: 'Keyless', externalEventId: 2000, externalEventKey: '' });
    await registrations.insert({ userId: user.id, externalEventId: 2000, requestId: 78, requestKey: 'k2' });

    await expect(service.listMatchedImages(user, 2000, 0, 10)).rejects.toThrow(BadRequestException);
    expect(listMatchedImages).not.toHaveBeenCalled();
  });

  it('should leave placeholder urls null when the provider sends none', () => {
    const placeholder = toMatchPlaceholder(
      { id: 12, name: 'c.jpg', imageUrl: null, width: null, height: null, size: null },
      user.id,
      5,
      1413,
    );

    expect(placeholder).toMatchObject({ id: null, externalImageId: 12, externalImageUrl: null, imageUrl: null });
  });
});
