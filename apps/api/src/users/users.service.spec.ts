import { Test } from '@nestjs/testing';
import { getRepositoryToken } from '@nestjs/typeorm';
import { ConflictException, NotFoundException } from '@nestjs/common';
import { DataSource } from 'typeorm';

import { UsersService } from './users.service';
import { UserEntity } from './entities/user.entity';
import { createTestDataSource } from '../../test/test-database';
import { saveUser } from '../../test/fixtures';

describe('UsersService', () => {
  let dataSource: DataSource;
  let service: UsersService;

  beforeEach(async () => {
    dataSource = await createTestDataSource();

    const module = await Test.createTestingModule({
      providers: [
        UsersService,
        { provide: getRepositoryToken(UserEntity), useValue: dataSource.getRepository(UserEntity) },
      ],
    }).compile();

    service = module.get(UsersService);
  });

  afterEach(async () => {
    await dataSource.destroy();
  });

  describe('updateProfile', () => {
    it('should only touch the fields present in the patch', async () => {
      const user = await saveUser(dataSource, { description: 'Runner', interests: 'trail' });

      const updated = await service.updateProfile(user.id, { twitterUrl: 'https://twitter.com/alice' });

      expect(updated).toMatchObject({
        twitterUrl: 'https://twitter.com/alice',
        description: 'Runner',
        interests: 'trail',
      });
    });

    it('should clear a field set to null', async () => {
      const user = await saveUser(dataSource, { description: 'Runner' });

      const updated = await service.updateProfile(user.id, { description: null });

      expect(updated.description).toBeNull();
    });

    it('should reject an email already used by another user', async () => {
      await saveUser(dataSource, { username: 'bob', email: 'shared@example.com' });
      const user = await saveUser(dataSource);

      await expect(service.updateProfile(user.id, { email: 'shared@example.com' })).rejects.toThrow(
        ConflictException,
      );
    });

    it('should throw for an unknown user', async () => {
      await expect(service.updateProfile(9999, { description: 'x' })).rejects.toThrow(NotFoundException);
    });
  });

  it('should find users by username', async () => {
    const user = await saveUser(dataSource);

    await expect(service.findByUsername('alice')).resolves.toMatchObject({ id: user.id });
    await expect(service.findByUsername('nobody')).resolves.toBeNull();
  });
});
