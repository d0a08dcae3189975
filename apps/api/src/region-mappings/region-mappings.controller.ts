import { Body, Controller, Delete, Get, Param, Post, UseGuards } from '@nestjs/common';
import { AuthGuard } from '@nestjs/passport';

import { RegionMappingsService, toRegionMapping } from './region-mappings.service';
import { BulkInsertMappingsDto } from './dto/bulk-insert-mappings.dto';
import { ApiResponse, BulkInsertResult, RegionMapping } from '@shared/types';
import { ParseIdPipe } from '../common/pipes/parse-id.pipe';

@Controller('internal/region-mappings')
@UseGuards(AuthGuard('internal'))
export class RegionMappingsController {
  constructor(private readonly regionMappingsService: RegionMappingsService) {}

  @Post('bulk')
  async bulkInsert(@Body() bulkInsertDto: BulkInsertMappingsDto): Promise<ApiResponse<BulkInsertResult>> {
    const result = await this.regionMappingsService.bulkInsert(bulkInsertDto.eventId, bulkInsertDto.mappings);
    return { data: result };
  }

  @Get('event/:eventId')
  async findByEvent(@Param('eventId', ParseIdPipe) eventId: number): Promise<ApiResponse<RegionMapping[]>> {
    const mappings = await this.regionMappingsService.findByEvent(eventId);
    return { data: mappings.map(toRegionMapping) };
  }

  @Get(':id')
  async findOne(@Param('id', ParseIdPipe) id: number): Promise<ApiResponse<RegionMapping>> {
    const mapping = await this.regionMappingsService.findOne(id);
    return { data: toRegionMapping(mapping) };
  }

  @Delete('event/:eventId')
  async deleteByEvent(@Param('eventId', ParseIdPipe) eventId: number): Promise<ApiResponse<{ deleted: number }>> {
    const deleted = await this.regionMappingsService.deleteByEvent(eventId);
    return { data: { deleted } };
  }
}
