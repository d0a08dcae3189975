import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';

import { EventRegistrationEntity } from './entities/event-registration.entity';
import { EventEntity } from '../events/entities/event.entity';
import { RegistrationsService } from './registrations.service';
import { MatchReconciliationService } from './match-reconciliation.service';
import { RegistrationsController } from './registrations.controller';
import { InternalRegistrationsController } from './internal-registrations.controller';
import { EventsModule } from '../events/events.module';
import { ImagesModule } from '../images/images.module';
import { MatchProviderModule } from '../match-provider/match-provider.module';
import { SelfieFetcherService } from '../common/services/selfie-fetcher.service';

@Module({
  imports: [
    TypeOrmModule.forFeature([EventRegistrationEntity, EventEntity]),
    EventsModule,
    ImagesModule,
    MatchProviderModule,
  ],
  controllers: [RegistrationsController, InternalRegistrationsController],
  providers: [RegistrationsService, MatchReconciliationService, SelfieFetcherService],
})
export class RegistrationsModule {}
