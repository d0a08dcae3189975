import {
  ConflictException,
  HttpException,
  Injectable,
  InternalServerErrorException,
  Logger,
  NotFoundException,
} from '@nestjs/common';
import { InjectDataSource, InjectRepository } from '@nestjs/typeorm';
import { DataSource, In, Repository } from 'typeorm';

import { RegionMappingEntity } from './entities/region-mapping.entity';
import { isUniqueViolation } from '../database/unique-violation';
import { BulkInsertResult, RegionMapping, SkippedMappingKey } from '@shared/types';
import { ERROR_CODES, REGION_MAPPINGS } from '@shared/constants';
import { chunk, getErrorMessage } from '@shared/utils';

export interface RegionMappingInput {
  requestId: number;
  imageId: number;
  indexNum: number;
  x1?: number | null;
  x2?: number | null;
  y1?: number | null;
  y2?: number | null;
  aspectRatio?: number | null;
}

function mappingKey(indexNum: number, requestId: number): string {
  return `${indexNum}:${requestId}`;
}

@Injectable()
export class RegionMappingsService {
  private readonly logger = new Logger(RegionMappingsService.name);

  constructor(
    @InjectDataSource()
    private readonly dataSource: DataSource,
    @InjectRepository(RegionMappingEntity)
    private readonly mappingsRepository: Repository<RegionMappingEntity>,
  ) {}

  /**
   * Inserts the mappings of one event that are not stored yet.
   *
   * A mapping is identified by (eventId, indexNum, requestId). Keys already in
   * storage and repeats inside the batch are skipped; the first occurrence in
   * the batch wins. All new rows are written in one transaction, in chunks, so
   * either every new row lands or none does.
   */
  async bulkInsert(eventId: number, mappings: RegionMappingInput[]): Promise<BulkInsertResult> {
    const received = mappings.length;
    if (received === 0) {
      return { received: 0, inserted: 0, skipped: 0, skippedKeys: [] };
    }

    const indexNums = [...new Set(mappings.map((mapping) => mapping.indexNum))];
    const stored = await this.mappingsRepository.find({
      select: { indexNum: true, requestId: true },
      where: { eventId, indexNum: In(indexNums) },
    });
    const seen = new Set(stored.map((row) => mappingKey(row.indexNum, row.requestId)));

    const fresh: RegionMappingInput[] = [];
    const skippedKeys: SkippedMappingKey[] = [];
    for (const mapping of mappings) {
      const key = mappingKey(mapping.indexNum, mapping.requestId);
      if (seen.has(key)) {
        skippedKeys.push({ eventId, indexNum: mapping.indexNum, requestId: mapping.requestId });
        continue;
      }
      seen.add(key);
      fresh.push(mapping);
    }

    if (skippedKeys.length > 0) {
      this.logger.warn(`Event ${eventId}: skipping ${skippedKeys.length} duplicate region mappings`);
    }

    if (fresh.length > 0) {
      await this.insertAll(eventId, fresh);
    }

    this.logger.log(`Event ${eventId}: received ${received}, inserted ${fresh.length}, skipped ${skippedKeys.length}`);

    return {
      received,
      inserted: fresh.length,
      skipped: skippedKeys.length,
      skippedKeys,
    };
  }

  async findByEvent(eventId: number): Promise<RegionMappingEntity[]> {
    return this.mappingsRepository.find({
      where: { eventId },
      order: { indexNum: 'ASC', id: 'ASC' },
    });
  }

  async findOne(id: number): Promise<RegionMappingEntity> {
    const mapping = await this.mappingsRepository.findOne({ where: { id } });

    if (!mapping) {
      throw new NotFoundException({
        code: ERROR_CODES.MAPPING_NOT_FOUND,
        message: `Region mapping ${id} not found`,
      });
    }

    return mapping;
  }

  async deleteByEvent(eventId: number): Promise<number> {
    const result = await this.mappingsRepository.delete({ eventId });
    const deleted = result.affected ?? 0;
    this.logger.log(`Deleted ${deleted} region mappings for event ${eventId}`);
    return deleted;
  }

  private async insertAll(eventId: number, mappings: RegionMappingInput[]): Promise<void> {
    const rows = mappings.map((mapping) => ({
      eventId,
      requestId: mapping.requestId,
      imageId: mapping.imageId,
      indexNum: mapping.indexNum,
      x1: mapping.x1 ?? null,
      x2: mapping.x2 ?? null,
      y1: mapping.y1 ?? null,
      y2: mapping.y2 ?? null,
      aspectRatio: mapping.aspectRatio ?? null,
    }));

    try {
      await this.dataSource.transaction(async (manager) => {
        for (const rowsChunk of chunk(rows, REGION_MAPPINGS.CHUNK_SIZE)) {
          await manager.insert(RegionMappingEntity, rowsChunk);
        }
      });
    } catch (error) {
      if (isUniqueViolation(error)) {
        throw new ConflictException({
          code: ERROR_CODES.MAPPING_CONFLICT,
          message: `Region mappings for event ${eventId} were inserted concurrently, retry the batch`,
        });
      }
      if (error instanceof HttpException) {
        throw error;
      }
      const errorMessage = getErrorMessage(error);
      this.logger.error(
        `Bulk insert for event ${eventId} rolled back: ${errorMessage}`,
        error instanceof Error ? error.stack : undefined,
      );
      throw new InternalServerErrorException({
        code: ERROR_CODES.INTERNAL_ERROR,
        message: `Bulk insert failed: ${errorMessage}`,
      });
    }
  }
}

export function toRegionMapping(mapping: RegionMappingEntity): RegionMapping {
  return {
    id: mapping.id,
    eventId: mapping.eventId,
    requestId: mapping.requestId,
    imageId: mapping.imageId,
    indexNum: mapping.indexNum,
    x1: mapping.x1,
    x2: mapping.x2,
    y1: mapping.y1,
    y2: mapping.y2,
    aspectRatio: mapping.aspectRatio,
    createdAt: mapping.createdAt.toISOString(),
    updatedAt: mapping.updatedAt.toISOString(),
  };
}
