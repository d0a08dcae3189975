import { ImageEntity } from './entities/image.entity';

export interface ImagePatch {
  name?: string;
  userId?: number | null;
  eventId?: number | null;
  externalImageId?: number | null;
  externalImageUrl?: string | null;
  mirrorUrl?: string | null;
  mirrorCid?: string | null;
  size?: number | null;
  height?: number | null;
  width?: number | null;
  description?: string | null;
  imageEncoding?: string | null;
}

export function applyImagePatch(image: ImageEntity, patch: ImagePatch): ImageEntity {
  if (patch.name !== undefined) image.name = patch.name;
  if (patch.userId !== undefined) image.userId = patch.userId;
  if (patch.eventId !== undefined) image.eventId = patch.eventId;
  if (patch.externalImageId !== undefined) image.externalImageId = patch.externalImageId;
  if (patch.externalImageUrl !== undefined) image.externalImageUrl = patch.externalImageUrl;
  if (patch.mirrorUrl !== undefined) image.mirrorUrl = patch.mirrorUrl;
  if (patch.mirrorCid !== undefined) image.mirrorCid = patch.mirrorCid;
  if (patch.size !== undefined) image.size = patch.size;
  if (patch.height !== undefined) image.height = patch.height;
  if (patch.width !== undefined) image.width = patch.width;
  if (patch.description !== undefined) image.description = patch.description;
  if (patch.imageEncoding !== undefined) image.imageEncoding = patch.imageEncoding;
  return image;
}
