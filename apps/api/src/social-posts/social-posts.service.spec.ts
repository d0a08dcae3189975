import { Test } from '@nestjs/testing';
import { getRepositoryToken } from '@nestjs/typeorm';
import { BadRequestException, ServiceUnavailableException } from '@nestjs/common';
import { DataSource, Repository } from 'typeorm';

import { SocialPostsService } from './social-posts.service';
import { UserSocialPostEntity } from './entities/user-social-post.entity';
import { APP_CONFIG, AppConfig } from '../config/app.config';
import { createTestDataSource } from '../../test/test-database';
import { createTestConfig } from '../../test/test-config';
import { jsonResponse } from '../../test/http-fakes';

const SOCIAL_CONFIG = {
  apiUrl: 'https://scraper.test/posts',
  apiHost: 'scraper.test',
  apiKey: 'test-key',
};

describe('SocialPostsService', () => {
  let dataSource: DataSource;
  let posts: Repository<UserSocialPostEntity>;
  let fetchSpy: jest.SpiedFunction<typeof fetch>;

  async function createService(config: AppConfig): Promise<SocialPostsService> {
    const module = await Test.createTestingModule({
      providers: [
        SocialPostsService,
        { provide: APP_CONFIG, useValue: config },
        { provide: getRepositoryToken(UserSocialPostEntity), useValue: posts },
      ],
    }).compile();
    return module.get(SocialPostsService);
  }

  beforeEach(async () => {
    dataSource = await createTestDataSource();
    posts = dataSource.getRepository(UserSocialPostEntity);
    fetchSpy = jest.spyOn(global, 'fetch');
  });

  afterEach(async () => {
    fetchSpy.mockRestore();
    await dataSource.destroy();
  });

  it('should do nothing when no API key is configured', async () => {
    const service = await createService(createTestConfig({ socialPosts: null }));

    await expect(service.refreshUserPosts(1, 'https://instagram.com/alice')).resolves.toBeNull();
    expect(fetchSpy).not.toHaveBeenCalled();
  });

  describe('with the scraper configured', () => {
    let service: SocialPostsService;

    beforeEach(async () => {
      service = await createService(createTestConfig({ socialPosts: SOCIAL_CONFIG }));
    });

    it('should send the profile url as a form post with the API headers', async () => {
      fetchSpy.mockImplementation(async () => jsonResponse({ posts: [] }));

      await service.refreshUserPosts(1, 'https://instagram.com/alice');

      const [url, init] = fetchSpy.mock.calls[0];
      expect(url).toBe('https://scraper.test/posts');
      expect(init?.method).toBe('POST');
      expect(init?.headers).toEqual({
        'Content-Type': 'application/x-www-form-urlencoded',
        'x-rapidapi-host': 'scraper.test',
        'x-rapidapi-key': 'test-key',
      });
      const body = init?.body;
      if (!(body instanceof URLSearchParams)) {
        throw new Error('expected a form body');
      }
      expect(body.get('username_or_url')).toBe('https://instagram.com/alice');
      expect(body.get('amount')).toBe('10');
    });

    it('should store new posts once and skip malformed items', async () => {
      fetchSpy.mockImplementation(async () =>
        jsonResponse({
          posts: [
            { node: { code: 'A1', caption: { text: 'Finish line', created_at: 1700000000 } } },
            { node: { code: 'B2', caption: 'Plain caption', taken_at: 1700000100 } },
            { node: { code: '' } },
            { node: { code: 'C3', caption: 42 } },
            { node: { code: 'A1' } },
            'not a post',
          ],
        }),
      );

      const result = await service.refreshUserPosts(1, 'https://instagram.com/alice');

      expect(result).toEqual({ received: 3, inserted: 2, skipped: 1 });
      const stored = await posts.find({ order: { code: 'ASC' } });
      expect(stored.map(({ code, caption, postedAt }) => ({ code, caption, postedAt }))).toEqual([
        { code: 'A1', caption: 'Finish line', postedAt: 1700000000 },
        { code: 'B2', caption: 'Plain caption', postedAt: 1700000100 },
      ]);
    });

    it('should skip posts already stored for the user', async () => {
      await posts.insert({ userId: 1, code: 'A1', caption: null, postedAt: null });
      await posts.insert({ userId: 2, code: 'B2', caption: null, postedAt: null });
      fetchSpy.mockImplementation(async () =>
        jsonResponse({ posts: [{ node: { code: 'A1' } }, { node: { code: 'B2' } }] }),
      );

      const result = await service.refreshUserPosts(1, 'https://instagram.com/alice');

      expect(result).toEqual({ received: 2, inserted: 1, skipped: 1 });
      expect(await posts.countBy({ userId: 1 })).toBe(2);
    });

    it('should reject a response without a posts list', async () => {
      fetchSpy.mockImplementation(async () => jsonResponse({ message: 'quota exceeded' }));

      await expect(service.refreshUserPosts(1, 'https://instagram.com/alice')).rejects.toThrow(
        BadRequestException,
      );
    });

    it('should report an error status as unavailable', async () => {
      fetchSpy.mockImplementation(async () => jsonResponse({ message: 'down' }, 503));

      await expect(service.refreshUserPosts(1, 'https://instagram.com/alice')).rejects.toThrow(
        ServiceUnavailableException,
      );
    });
  });
});
