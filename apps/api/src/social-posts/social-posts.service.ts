import {
  BadRequestException,
  Inject,
  Injectable,
  Logger,
  ServiceUnavailableException,
} from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';

import { APP_CONFIG, AppConfig, SocialPostsConfig } from '../config/app.config';
import { UserSocialPostEntity } from './entities/user-social-post.entity';
import { postItemSchema, postsEnvelopeSchema } from './social-posts.schemas';
import { SocialPostsRefreshResult } from '@shared/types';
import { ERROR_CODES, SOCIAL_POSTS } from '@shared/constants';
import { getErrorMessage } from '@shared/utils';

export interface ExtractedPost {
  code: string;
  caption: string | null;
  postedAt: number | null;
}

/**
 * Pulls a user's recent Instagram posts from a scraper API and keeps the ones we
 * have not stored yet.
 */
@Injectable()
export class SocialPostsService {
  private readonly logger = new Logger(SocialPostsService.name);
  private readonly config: SocialPostsConfig | null;

  constructor(
    @Inject(APP_CONFIG) appConfig: AppConfig,
    @InjectRepository(UserSocialPostEntity)
    private readonly postsRepository: Repository<UserSocialPostEntity>,
  ) {
    this.config = appConfig.socialPosts;
  }

  /**
   * Returns null when no scraper API key is configured.
   */
  async refreshUserPosts(userId: number, profileUrl: string): Promise<SocialPostsRefreshResult | null> {
    if (!this.config) {
      this.logger.debug('Social posts API key not configured, skipping refresh');
      return null;
    }

    const body = await this.fetchPosts(this.config, profileUrl);
    const posts = this.extractPosts(body);

    const existing = await this.postsRepository.find({
      select: { code: true },
      where: { userId },
    });
    const knownCodes = new Set(existing.map((post) => post.code));

    const fresh: ExtractedPost[] = [];
    for (const post of posts) {
      if (knownCodes.has(post.code)) {
        continue;
      }
      knownCodes.add(post.code);
      fresh.push(post);
    }

    if (fresh.length > 0) {
      await this.postsRepository.insert(
        fresh.map((post) => ({
          userId,
          code: post.code,
          caption: post.caption,
          postedAt: post.postedAt,
        })),
      );
    }

    return {
      received: posts.length,
      inserted: fresh.length,
      skipped: posts.length - fresh.length,
    };
  }

  extractPosts(body: unknown): ExtractedPost[] {
    const envelope = postsEnvelopeSchema.safeParse(body);
    if (!envelope.success) {
      throw new BadRequestException({
        code: ERROR_CODES.SOCIAL_POSTS_ERROR,
        message: 'Social posts API returned a malformed response',
      });
    }

    const posts: ExtractedPost[] = [];
    envelope.data.posts.forEach((item, index) => {
      const parsed = postItemSchema.safeParse(item);
      if (!parsed.success) {
        this.logger.warn(`Skipping malformed social post at position ${index}`);
        return;
      }

      const { code, caption, taken_at: takenAt } = parsed.data.node;
      let text: string | null = null;
      let createdAt: number | null = null;
      if (typeof caption === 'string') {
        text = caption;
      } else if (caption) {
        text = caption.text ?? null;
        createdAt = caption.created_at ?? null;
      }

      posts.push({ code, caption: text, postedAt: takenAt ?? createdAt });
    });

    return posts;
  }

  private async fetchPosts(config: SocialPostsConfig, profileUrl: string): Promise<unknown> {
    let response: Response;
    try {
      response = await fetch(config.apiUrl, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/x-www-form-urlencoded',
          'x-rapidapi-host': config.apiHost,
          'x-rapidapi-key': config.apiKey,
        },
        body: new URLSearchParams({
          username_or_url: profileUrl,
          amount: String(SOCIAL_POSTS.FETCH_AMOUNT),
        }),
        signal: AbortSignal.timeout(SOCIAL_POSTS.TIMEOUT_MS),
      });
    } catch (error) {
      throw new ServiceUnavailableException({
        code: ERROR_CODES.SERVICE_UNAVAILABLE,
        message: `Social posts API unreachable: ${getErrorMessage(error)}`,
      });
    }

    if (!response.ok) {
      throw new ServiceUnavailableException({
        code: ERROR_CODES.SERVICE_UNAVAILABLE,
        message: `Social posts API returned ${response.status}`,
      });
    }

    try {
      return await response.json();
    } catch (error) {
      throw new BadRequestException({
        code: ERROR_CODES.SOCIAL_POSTS_ERROR,
        message: `Social posts API returned invalid JSON: ${getErrorMessage(error)}`,
      });
    }
  }
}
