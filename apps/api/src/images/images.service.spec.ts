import { Test } from '@nestjs/testing';
import { getRepositoryToken } from '@nestjs/typeorm';
import { BadRequestException, NotFoundException } from '@nestjs/common';
import { DataSource, In, Repository } from 'typeorm';

import { ImagesService, toImageListItem } from './images.service';
import { ImageEntity } from './entities/image.entity';
import { UserEntity } from '../users/entities/user.entity';
import { createTestDataSource } from '../../test/test-database';
import { saveImage, saveUser } from '../../test/fixtures';

describe('ImagesService', () => {
  let dataSource: DataSource;
  let service: ImagesService;
  let images: Repository<ImageEntity>;
  let users: Repository<UserEntity>;
  let user: UserEntity;

  beforeEach(async () => {
    dataSource = await createTestDataSource();
    images = dataSource.getRepository(ImageEntity);
    users = dataSource.getRepository(UserEntity);

    const module = await Test.createTestingModule({
      providers: [
        ImagesService,
        { provide: DataSource, useValue: dataSource },
        { provide: getRepositoryToken(ImageEntity), useValue: images },
      ],
    }).compile();

    service = module.get(ImagesService);
    user = await saveUser(dataSource);
  });

  afterEach(async () => {
    await dataSource.destroy();
  });

  describe('create', () => {
    it('should store an image with absent fields as null', async () => {
      const image = await service.create({ name: 'start.jpg', eventId: 3 });

      const stored = await images.findOneByOrFail({ id: image.id });
      expect(stored).toMatchObject({
        name: 'start.jpg',
        eventId: 3,
        userId: null,
        mirrorUrl: null,
        externalImageId: null,
      });
    });

    it('should require a user or an event', async () => {
      await expect(service.create({ name: 'orphan.jpg' })).rejects.toThrow(BadRequestException);
      expect(await images.count()).toBe(0);
    });

    it('should make the image the user selfie when flagged', async () => {
      await service.create({
        name: 'selfie.jpg',
        userId: user.id,
        mirrorUrl: 'https://mirror.test/selfie.jpg',
        mirrorCid: 'bafy-selfie',
        externalImageUrl: 'https://provider.test/selfie.jpg',
        height: 640,
        width: 480,
        isSelfie: true,
      });

      const updated = await users.findOneByOrFail({ id: user.id });
      expect(updated).toMatchObject({
        selfieUrl: 'https://mirror.test/selfie.jpg',
        selfieCid: 'bafy-selfie',
        selfieHeight: 640,
        selfieWidth: 480,
      });
    });

    it('should use the provider url for the selfie when there is no mirror', async () => {
      await service.create({
        name: 'selfie.jpg',
        userId: user.id,
        externalImageUrl: 'https://provider.test/selfie.jpg',
        isSelfie: true,
      });

      const updated = await users.findOneByOrFail({ id: user.id });
      expect(updated.selfieUrl).toBe('https://provider.test/selfie.jpg');
      expect(updated.selfieCid).toBeNull();
    });

    it('should leave the user untouched without the selfie flag', async () => {
      await service.create({ name: 'photo.jpg', userId: user.id, mirrorUrl: 'https://mirror.test/p.jpg' });

      const updated = await users.findOneByOrFail({ id: user.id });
      expect(updated.selfieUrl).toBeNull();
    });

    it('should roll back the image when the selfie owner does not exist', async () => {
      await expect(
        service.create({ name: 'selfie.jpg', userId: 9999, mirrorUrl: 'https://mirror.test/s.jpg', isSelfie: true }),
      ).rejects.toThrow(NotFoundException);

      expect(await images.count()).toBe(0);
    });
  });

  describe('update', () => {
    it('should change only the provided fields', async () => {
      const image = await saveImage(dataSource, { userId: user.id, description: 'keep me', size: 100 });

      const updated = await service.update(image.id, { size: 200, mirrorCid: null });

      expect(updated).toMatchObject({ description: 'keep me', size: 200, mirrorCid: null, name: 'photo.jpg' });
    });

    it('should apply the selfie rule with the updated values', async () => {
      const image = await saveImage(dataSource, {
        userId: user.id,
        mirrorUrl: 'https://mirror.test/old.jpg',
        height: 10,
        width: 10,
      });

      await service.update(image.id, { mirrorUrl: 'https://mirror.test/new.jpg', height: 900, isSelfie: true });

      const updated = await users.findOneByOrFail({ id: user.id });
      expect(updated).toMatchObject({
        selfieUrl: 'https://mirror.test/new.jpg',
        selfieHeight: 900,
        selfieWidth: 10,
      });
    });

    it('should reject a selfie update for an unknown user and keep the image', async () => {
      const image = await saveImage(dataSource, { userId: user.id, description: 'before' });

      await expect(
        service.update(image.id, { userId: 9999, description: 'after', isSelfie: true }),
      ).rejects.toThrow(NotFoundException);

      const stored = await images.findOneByOrFail({ id: image.id });
      expect(stored.description).toBe('before');
      expect(stored.userId).toBe(user.id);
    });

    it('should throw for an unknown image', async () => {
      await expect(service.update(9999, { name: 'x.jpg' })).rejects.toThrow(NotFoundException);
    });
  });

  describe('user views', () => {
    it('should only return images owned by the user', async () => {
      const other = await saveUser(dataSource, { username: 'bob' });
      const own = await saveImage(dataSource, { userId: user.id });
      const foreign = await saveImage(dataSource, { userId: other.id });

      await expect(service.findOneForUser(user.id, own.id)).resolves.toMatchObject({ id: own.id });
      await expect(service.findOneForUser(user.id, foreign.id)).rejects.toThrow(NotFoundException);
    });

    it('should list newest first and filter by event', async () => {
      const a = await saveImage(dataSource, { userId: user.id, eventId: 1 });
      const b = await saveImage(dataSource, { userId: user.id, eventId: 2 });
      const c = await saveImage(dataSource, { userId: user.id, eventId: 1 });

      const all = await service.findAllForUser(user.id);
      const eventOne = await service.listForUser(user.id, { eventId: 1 });
      const paged = await service.listForUser(user.id, { limit: 1, offset: 1 });

      expect(all.map((image) => image.id)).toEqual([c.id, b.id, a.id]);
      expect(eventOne.map((image) => image.id)).toEqual([c.id, a.id]);
      expect(paged.map((image) => image.id)).toEqual([b.id]);
    });

    it('should look up images by external id in one call', async () => {
      await saveImage(dataSource, { externalImageId: 10 });
      await saveImage(dataSource, { externalImageId: 11 });
      await saveImage(dataSource, { externalImageId: 12 });

      const found = await service.findByExternalIds([10, 12, 99]);

      expect(found.map((image) => image.externalImageId)).toEqual([10, 12]);
      await expect(service.findByExternalIds([])).resolves.toEqual([]);
    });

    it('should leave ids beyond the integer range out of the lookup', async () => {
      await saveImage(dataSource, { externalImageId: 10 });
      const findSpy = jest.spyOn(images, 'find');

      const found = await service.findByExternalIds([10, 3000000000]);

      expect(found.map((image) => image.externalImageId)).toEqual([10]);
      expect(findSpy).toHaveBeenCalledWith({
        where: { externalImageId: In([10]) },
        order: { id: 'ASC' },
      });

      findSpy.mockClear();
      await expect(service.findByExternalIds([2147483648])).resolves.toEqual([]);
      expect(findSpy).not.toHaveBeenCalled();
    });
  });

  it('should derive imageUrl when mapping to the list shape', async () => {
    const image = await saveImage(dataSource, {
      externalImageUrl: 'https://provider.test/1.jpg',
      mirrorUrl: 'https://mirror.test/1.jpg',
    });

    expect(toImageListItem(image).imageUrl).toBe('https://mirror.test/1.jpg');
    expect(toImageListItem({ ...image, mirrorUrl: null }).imageUrl).toBe('https://provider.test/1.jpg');
  });
});
