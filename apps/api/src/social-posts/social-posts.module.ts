import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';

import { UserSocialPostEntity } from './entities/user-social-post.entity';
import { SocialPostsService } from './social-posts.service';

@Module({
  imports: [TypeOrmModule.forFeature([UserSocialPostEntity])],
  providers: [SocialPostsService],
  exports: [SocialPostsService],
})
export class SocialPostsModule {}
