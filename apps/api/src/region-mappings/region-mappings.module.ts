import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';

import { RegionMappingEntity } from './entities/region-mapping.entity';
import { RegionMappingsService } from './region-mappings.service';
import { RegionMappingsController } from './region-mappings.controller';

@Module({
  imports: [TypeOrmModule.forFeature([RegionMappingEntity])],
  controllers: [RegionMappingsController],
  providers: [RegionMappingsService],
})
export class RegionMappingsModule {}
