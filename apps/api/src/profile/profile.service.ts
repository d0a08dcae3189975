import { Injectable, Logger } from '@nestjs/common';

import { UsersService, toUserProfile } from '../users/users.service';
import { UserEntity } from '../users/entities/user.entity';
import { SocialPostsService } from '../social-posts/social-posts.service';
import { UserProfilePatch } from '../users/user-profile.patch';
import { UserProfile } from '@shared/types';
import { getErrorMessage } from '@shared/utils';

@Injectable()
export class ProfileService {
  private readonly logger = new Logger(ProfileService.name);

  constructor(
    private readonly usersService: UsersService,
    private readonly socialPostsService: SocialPostsService,
  ) {}

  getProfile(user: UserEntity): UserProfile {
    return toUserProfile(user);
  }

  async updateProfile(userId: number, patch: UserProfilePatch): Promise<UserProfile> {
    const user = await this.usersService.updateProfile(userId, patch);

    if (patch.instagramUrl) {
      await this.refreshSocialPosts(user.id, patch.instagramUrl);
    }

    return toUserProfile(user);
  }

  // Best effort: the profile update already succeeded
  private async refreshSocialPosts(userId: number, profileUrl: string): Promise<void> {
    try {
      const result = await this.socialPostsService.refreshUserPosts(userId, profileUrl);
      if (result) {
        this.logger.log(
          `Social posts refreshed for user ${userId}: ${result.inserted} new, ${result.skipped} skipped of ${result.received}`,
        );
      }
    } catch (error) {
      this.logger.warn(`Could not refresh social posts for user ${userId}: ${getErrorMessage(error)}`);
    }
  }
}
