import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';

import { EventEntity } from './entities/event.entity';
import { EventsService } from './events.service';
import { EventsController } from './events.controller';
import { InternalEventsController } from './internal-events.controller';

@Module({
  imports: [TypeOrmModule.forFeature([EventEntity])],
  controllers: [EventsController, InternalEventsController],
  providers: [EventsService],
  exports: [EventsService],
})
export class EventsModule {}
