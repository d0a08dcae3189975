// Error codes
export const ERROR_CODES = {
  // Auth
  INVALID_CREDENTIALS: 'INVALID_CREDENTIALS',
  UNAUTHORIZED: 'UNAUTHORIZED',
  FORBIDDEN: 'FORBIDDEN',

  // Users
  USER_NOT_FOUND: 'USER_NOT_FOUND',
  USERNAME_TAKEN: 'USERNAME_TAKEN',
  EMAIL_ALREADY_EXISTS: 'EMAIL_ALREADY_EXISTS',

  // Events
  EVENT_NOT_FOUND: 'EVENT_NOT_FOUND',
  EVENT_KEY_MISSING: 'EVENT_KEY_MISSING',
  EVENT_ALREADY_EXISTS: 'EVENT_ALREADY_EXISTS',

  // Registrations
  ALREADY_REGISTERED: 'ALREADY_REGISTERED',
  SELFIE_REQUIRED: 'SELFIE_REQUIRED',
  SELFIE_DOWNLOAD_FAILED: 'SELFIE_DOWNLOAD_FAILED',
  REGISTRATION_NOT_FOUND: 'REGISTRATION_NOT_FOUND',

  // Match provider
  MATCH_PROVIDER_UNAVAILABLE: 'MATCH_PROVIDER_UNAVAILABLE',
  MATCH_PROVIDER_ERROR: 'MATCH_PROVIDER_ERROR',

  // Images
  IMAGE_NOT_FOUND: 'IMAGE_NOT_FOUND',
  IMAGE_OWNER_REQUIRED: 'IMAGE_OWNER_REQUIRED',

  // Region mappings
  MAPPING_NOT_FOUND: 'MAPPING_NOT_FOUND',
  MAPPING_CONFLICT: 'MAPPING_CONFLICT',

  // Social posts
  SOCIAL_POSTS_ERROR: 'SOCIAL_POSTS_ERROR',

  // General
  NOT_FOUND: 'NOT_FOUND',
  VALIDATION_ERROR: 'VALIDATION_ERROR',
  CONFLICT: 'CONFLICT',
  PRECONDITION_FAILED: 'PRECONDITION_FAILED',
  SERVICE_UNAVAILABLE: 'SERVICE_UNAVAILABLE',
  RATE_LIMITED: 'RATE_LIMITED',
  INTERNAL_ERROR: 'INTERNAL_ERROR',
} as const;

// Match provider
export const MATCH_PROVIDER = {
  REQUEST_PATH: '/request',
  IMAGE_LIST_PATH: '/event/image-list',
  DEFAULT_PAGE_SIZE: 10,
  ALL_IMAGES: -1, // page_size understood by the provider as "every image"
} as const;

// Selfie download
export const SELFIE = {
  TEMP_DIR_PREFIX: 'selfie-',
  DEFAULT_EXTENSION: '.jpg',
} as const;

// Region mapping ingestion
export const REGION_MAPPINGS = {
  CHUNK_SIZE: 500,
  MAX_BATCH: 10000,
} as const;

// Social posts
export const SOCIAL_POSTS = {
  FETCH_AMOUNT: 10,
  TIMEOUT_MS: 30 * 1000,
} as const;

// Rate limits (per minute)
export const RATE_LIMITS = {
  REGISTER_EVENT: 10,
  MATCHED_IMAGES: 60,
  DEFAULT: 100,
} as const;

// Ids are stored in 32-bit integer columns
export const MAX_ID = 2147483647;

// Pagination
export const PAGINATION = {
  MAX_LIMIT: 100,
} as const;

export const SERVICE_NAME = 'photomatch-api';
export const SERVICE_VERSION = '1.0.0';
