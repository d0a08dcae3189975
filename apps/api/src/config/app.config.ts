import { z } from 'zod';

export const APP_CONFIG = Symbol('APP_CONFIG');

export type Environment = 'development' | 'production' | 'test';

export interface MatchProviderConfig {
  baseUrl: string;
  requestTimeoutMs: number;
  listTimeoutMs: number;
}

export interface SelfieConfig {
  downloadTimeoutMs: number;
}

export interface InternalAuthConfig {
  username: string;
  password: string;
}

export interface SocialPostsConfig {
  apiUrl: string;
  apiHost: string;
  apiKey: string;
}

export interface AppConfig {
  environment: Environment;
  port: number;
  corsOrigins: string[];
  database: {
    url: string;
    synchronize: boolean;
  };
  matchProvider: MatchProviderConfig;
  selfie: SelfieConfig;
  internalAuth: InternalAuthConfig;
  // null disables the social posts refresh
  socialPosts: SocialPostsConfig | null;
}

const blankToUndefined = (value: unknown) =>
  typeof value === 'string' && value.trim() === '' ? undefined : value;

const optionalString = z.preprocess(blankToUndefined, z.string().trim().optional());

const stringWithDefault = (fallback: string) =>
  z.preprocess(blankToUndefined, z.string().trim().default(fallback));

const positiveInt = (fallback: number) =>
  z.preprocess(blankToUndefined, z.coerce.number().int().positive().default(fallback));

const envSchema = z.object({
  NODE_ENV: z.preprocess(
    blankToUndefined,
    z.enum(['development', 'production', 'test']).default('development'),
  ),
  PORT: positiveInt(8000),
  CORS_ORIGINS: stringWithDefault('http://localhost:3000'),

  DATABASE_URL: z.preprocess(blankToUndefined, z.string().url().optional()),
  POSTGRES_USER: stringWithDefault('postgres'),
  POSTGRES_PASSWORD: stringWithDefault('password'),
  POSTGRES_HOST: stringWithDefault('localhost'),
  POSTGRES_PORT: positiveInt(5432),
  POSTGRES_DB: stringWithDefault('photomatch'),
  DATABASE_SYNCHRONIZE: z.preprocess(
    blankToUndefined,
    z.enum(['true', 'false']).default('false'),
  ),

  MATCH_PROVIDER_BASE_URL: z.preprocess(
    blankToUndefined,
    z.string().url().default('https://dev-api.fotoowl.ai/open'),
  ),
  MATCH_PROVIDER_REQUEST_TIMEOUT_MS: positiveInt(60_000),
  MATCH_PROVIDER_LIST_TIMEOUT_MS: positiveInt(30_000),
  SELFIE_DOWNLOAD_TIMEOUT_MS: positiveInt(30_000),

  INTERNAL_USERNAME: optionalString,
  INTERNAL_PASSWORD: optionalString,

  SOCIAL_POSTS_API_URL: z.preprocess(
    blankToUndefined,
    z
      .string()
      .url()
      .default('https://instagram-scraper-stable-api.p.rapidapi.com/get_ig_user_posts.php'),
  ),
  SOCIAL_POSTS_API_HOST: stringWithDefault('instagram-scraper-stable-api.p.rapidapi.com'),
  SOCIAL_POSTS_API_KEY: optionalString,
});

const DEV_INTERNAL_USERNAME = 'internal_service';
const DEV_INTERNAL_PASSWORD = 'change-me';

/**
 * Builds the application configuration from an environment map.
 * Called once at start-up; everything else receives the result by injection.
 */
export function buildAppConfig(env: NodeJS.ProcessEnv): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid configuration: ${issues}`);
  }
  const vars = parsed.data;

  if (vars.NODE_ENV === 'production' && (!vars.INTERNAL_USERNAME || !vars.INTERNAL_PASSWORD)) {
    throw new Error('Invalid configuration: INTERNAL_USERNAME and INTERNAL_PASSWORD are required in production');
  }

  const databaseUrl =
    vars.DATABASE_URL ??
    `postgresql://${encodeURIComponent(vars.POSTGRES_USER)}:${encodeURIComponent(vars.POSTGRES_PASSWORD)}` +
      `@${vars.POSTGRES_HOST}:${vars.POSTGRES_PORT}/${vars.POSTGRES_DB}`;

  return {
    environment: vars.NODE_ENV,
    port: vars.PORT,
    corsOrigins: vars.CORS_ORIGINS.split(',')
      .map((origin) => origin.trim())
      .filter((origin) => origin.length > 0),
    database: {
      url: databaseUrl,
      synchronize: vars.DATABASE_SYNCHRONIZE === 'true',
    },
    matchProvider: {
      baseUrl: vars.MATCH_PROVIDER_BASE_URL.replace(/\/+$/, ''),
      requestTimeoutMs: vars.MATCH_PROVIDER_REQUEST_TIMEOUT_MS,
      listTimeoutMs: vars.MATCH_PROVIDER_LIST_TIMEOUT_MS,
    },
    selfie: {
      downloadTimeoutMs: vars.SELFIE_DOWNLOAD_TIMEOUT_MS,
    },
    internalAuth: {
      username: vars.INTERNAL_USERNAME ?? DEV_INTERNAL_USERNAME,
      password: vars.INTERNAL_PASSWORD ?? DEV_INTERNAL_PASSWORD,
    },
    socialPosts: vars.SOCIAL_POSTS_API_KEY
      ? {
          apiUrl: vars.SOCIAL_POSTS_API_URL,
          apiHost: vars.SOCIAL_POSTS_API_HOST,
          apiKey: vars.SOCIAL_POSTS_API_KEY,
        }
      : null,
  };
}
