import { Module } from '@nestjs/common';

import { ProfileController } from './profile.controller';
import { ProfileService } from './profile.service';
import { UsersModule } from '../users/users.module';
import { SocialPostsModule } from '../social-posts/social-posts.module';

@Module({
  imports: [UsersModule, SocialPostsModule],
  controllers: [ProfileController],
  providers: [ProfileService],
})
export class ProfileModule {}
