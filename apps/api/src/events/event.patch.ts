import { EventEntity } from './entities/event.entity';

export interface EventPatch {
  name?: string;
  description?: string | null;
  coverImageUrl?: string | null;
  coverImageHeight?: number | null;
  coverImageWidth?: number | null;
  location?: string | null;
  category?: string | null;
  eventDate?: string | null;
}

export function applyEventPatch(event: EventEntity, patch: EventPatch): EventEntity {
  if (patch.name !== undefined) event.name = patch.name;
  if (patch.description !== undefined) event.description = patch.description;
  if (patch.coverImageUrl !== undefined) event.coverImageUrl = patch.coverImageUrl;
  if (patch.coverImageHeight !== undefined) event.coverImageHeight = patch.coverImageHeight;
  if (patch.coverImageWidth !== undefined) event.coverImageWidth = patch.coverImageWidth;
  if (patch.location !== undefined) event.location = patch.location;
  if (patch.category !== undefined) event.category = patch.category;
  if (patch.eventDate !== undefined) event.eventDate = patch.eventDate;
  return event;
}
