import { Module } from '@nestjs/common';
import { APP_GUARD } from '@nestjs/core';
import { ThrottlerGuard, ThrottlerModule } from '@nestjs/throttler';

import { AppConfigModule } from './config/app-config.module';
import { DatabaseModule } from './database/database.module';
import { AuthModule } from './auth/auth.module';
import { UsersModule } from './users/users.module';
import { ProfileModule } from './profile/profile.module';
import { EventsModule } from './events/events.module';
import { ImagesModule } from './images/images.module';
import { RegistrationsModule } from './registrations/registrations.module';
import { RegionMappingsModule } from './region-mappings/region-mappings.module';
import { HealthController } from './health/health.controller';
import { RATE_LIMITS } from '@shared/constants';

@Module({
  imports: [
    AppConfigModule,
    DatabaseModule,
    ThrottlerModule.forRoot([
      {
        ttl: 60000,
        limit: RATE_LIMITS.DEFAULT,
      },
    ]),
    AuthModule,
    UsersModule,
    ProfileModule,
    EventsModule,
    ImagesModule,
    RegistrationsModule,
    RegionMappingsModule,
  ],
  controllers: [HealthController],
  providers: [
    {
      provide: APP_GUARD,
      useClass: ThrottlerGuard,
    },
  ],
})
export class AppModule {}
