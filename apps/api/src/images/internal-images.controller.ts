import { Body, Controller, Get, Param, Post, Put, UseGuards } from '@nestjs/common';
import { AuthGuard } from '@nestjs/passport';

import { ImagesService, toImageListItem } from './images.service';
import { CreateImageDto } from './dto/create-image.dto';
import { UpdateImageDto } from './dto/update-image.dto';
import { ApiResponse, ImageListItem } from '@shared/types';
import { ParseIdPipe } from '../common/pipes/parse-id.pipe';

@Controller('internal/images')
@UseGuards(AuthGuard('internal'))
export class InternalImagesController {
  constructor(private readonly imagesService: ImagesService) {}

  @Post()
  async create(@Body() createImageDto: CreateImageDto): Promise<ApiResponse<ImageListItem>> {
    const image = await this.imagesService.create(createImageDto);
    return { data: toImageListItem(image) };
  }

  @Get(':id')
  async findOne(@Param('id', ParseIdPipe) id: number): Promise<ApiResponse<ImageListItem>> {
    const image = await this.imagesService.findOne(id);
    return { data: toImageListItem(image) };
  }

  @Put(':id')
  async update(
    @Param('id', ParseIdPipe) id: number,
    @Body() updateImageDto: UpdateImageDto,
  ): Promise<ApiResponse<ImageListItem>> {
    const image = await this.imagesService.update(id, updateImageDto);
    return { data: toImageListItem(image) };
  }
}
