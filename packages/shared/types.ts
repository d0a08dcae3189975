// Interfaces
export interface UserProfile {
  id: number;
  username: string;
  email: string | null;
  instagramUrl: string | null;
  twitterUrl: string | null;
  linkedinUrl: string | null;
  description: string | null;
  interests: string | null;
  selfieUrl: string | null;
  selfieCid: string | null;
  selfieHeight: number | null;
  selfieWidth: number | null;
  createdAt: string;
  updatedAt: string;
}

export interface EventSummary {
  id: number;
  name: string;
  description: string | null;
  coverImageUrl: string | null;
  coverImageHeight: number | null;
  coverImageWidth: number | null;
  location: string | null;
  category: string | null;
  eventDate: string | null;
  externalEventId: number;
  externalEventKey: string | null;
  createdAt: string;
  updatedAt: string;
}

/**
 * Image as returned to clients. `id` and the timestamps are null for
 * provider matches that have not been mirrored locally yet.
 */
export interface ImageListItem {
  id: number | null;
  name: string;
  userId: number | null;
  eventId: number | null;
  externalImageId: number | null;
  externalImageUrl: string | null;
  mirrorUrl: string | null;
  mirrorCid: string | null;
  size: number | null;
  height: number | null;
  width: number | null;
  description: string | null;
  imageEncoding: string | null;
  imageUrl: string | null;
  createdAt: string | null;
  updatedAt: string | null;
}

export interface RegistrationSummary {
  id: number;
  userId: number;
  externalEventId: number;
  requestId: number;
  requestKey: string;
  redirectUrl: string | null;
  createdAt: string;
}

export interface RegisteredEvent {
  registrationId: number;
  requestId: number;
  requestKey: string;
  redirectUrl: string | null;
  registrationCreatedAt: string;
  externalEventId: number;
  // Null when the event is not in our events table
  eventId: number | null;
  eventName: string | null;
  eventDescription: string | null;
  eventCoverImageUrl: string | null;
  eventDate: string | null;
  externalEventKey: string | null;
}

export interface RegionMapping {
  id: number;
  eventId: number;
  requestId: number;
  imageId: number;
  indexNum: number;
  x1: number | null;
  x2: number | null;
  y1: number | null;
  y2: number | null;
  aspectRatio: number | null;
  createdAt: string;
  updatedAt: string;
}

export interface SkippedMappingKey {
  eventId: number;
  indexNum: number;
  requestId: number;
}

export interface BulkInsertResult {
  received: number;
  inserted: number;
  skipped: number;
  skippedKeys: SkippedMappingKey[];
}

export interface SocialPostsRefreshResult {
  received: number;
  inserted: number;
  skipped: number;
}

// API Response types
export interface ApiResponse<T = unknown> {
  data?: T;
  error?: {
    code: string;
    message: string;
    details?: unknown;
  };
  meta?: {
    pagination?: {
      offset: number;
      limit: number | null;
    };
    page?: number;
    pageSize?: number;
    total?: number;
  };
}
