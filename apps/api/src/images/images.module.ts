import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';

import { ImageEntity } from './entities/image.entity';
import { ImagesService } from './images.service';
import { ImagesController } from './images.controller';
import { InternalImagesController } from './internal-images.controller';

@Module({
  imports: [TypeOrmModule.forFeature([ImageEntity])],
  controllers: [ImagesController, InternalImagesController],
  providers: [ImagesService],
  exports: [ImagesService],
})
export class ImagesModule {}
