import { Controller, Get, Param, Query, Req, UseGuards } from '@nestjs/common';
import { AuthGuard } from '@nestjs/passport';

import { ImagesService, toImageListItem } from './images.service';
import { ImageListQueryDto } from './dto/image-list-query.dto';
import { AuthenticatedRequest } from '../common/interfaces/authenticated-request';
import { ApiResponse, ImageListItem } from '@shared/types';
import { ParseIdPipe } from '../common/pipes/parse-id.pipe';

@Controller()
@UseGuards(AuthGuard('basic'))
export class ImagesController {
  constructor(private readonly imagesService: ImagesService) {}

  @Get('images')
  async findAll(@Req() req: AuthenticatedRequest): Promise<ApiResponse<ImageListItem[]>> {
    const images = await this.imagesService.findAllForUser(req.user.id);
    return { data: images.map(toImageListItem) };
  }

  @Get('images/:id')
  async findOne(
    @Req() req: AuthenticatedRequest,
    @Param('id', ParseIdPipe) id: number,
  ): Promise<ApiResponse<ImageListItem>> {
    const image = await this.imagesService.findOneForUser(req.user.id, id);
    return { data: toImageListItem(image) };
  }

  @Get('getImageList')
  async getImageList(
    @Req() req: AuthenticatedRequest,
    @Query() query: ImageListQueryDto,
  ): Promise<ApiResponse<ImageListItem[]>> {
    const offset = query.offset ?? 0;
    const images = await this.imagesService.listForUser(req.user.id, {
      limit: query.limit,
      offset,
      eventId: query.eventId,
    });
    return {
      data: images.map(toImageListItem),
      meta: { pagination: { offset, limit: query.limit ?? null } },
    };
  }
}
