import {
  BadRequestException,
  Inject,
  Injectable,
  Logger,
  ServiceUnavailableException,
} from '@nestjs/common';
import { readFile } from 'fs/promises';
import { basename } from 'path';
import { ZodType, ZodTypeDef } from 'zod';

import { APP_CONFIG, AppConfig, MatchProviderConfig } from '../config/app.config';
import { ERROR_CODES, MATCH_PROVIDER } from '@shared/constants';
import { getErrorMessage } from '@shared/utils';
import {
  createRequestDataSchema,
  envelopeSchema,
  imageListDataSchema,
  providerImageSchema,
} from './match-provider.schemas';
import {
  CreateMatchRequestInput,
  MatchedImagesQuery,
  MatchRequestCorrelation,
  ProviderImage,
} from './match-provider.types';

/**
 * HTTP client for the external face-matching service. Every response is
 * treated as untrusted and validated before use.
 */
@Injectable()
export class MatchProviderClient {
  private readonly logger = new Logger(MatchProviderClient.name);
  private readonly config: MatchProviderConfig;

  constructor(@Inject(APP_CONFIG) appConfig: AppConfig) {
    this.config = appConfig.matchProvider;
  }

  async createRequest(input: CreateMatchRequestInput): Promise<MatchRequestCorrelation> {
    const selfie = await readFile(input.selfiePath);

    const form = new FormData();
    form.append('file', new Blob([new Uint8Array(selfie)]), basename(input.selfiePath));
    form.append('event_id', String(input.externalEventId));
    form.append('key', input.eventKey);

    this.logger.log(`Submitting selfie for event ${input.externalEventId} (${selfie.length} bytes)`);

    const body = await this.send(`${this.config.baseUrl}${MATCH_PROVIDER.REQUEST_PATH}`, {
      method: 'POST',
      body: form,
      signal: AbortSignal.timeout(this.config.requestTimeoutMs),
    });

    const data = this.unwrapEnvelope(body);
    const parsed = createRequestDataSchema.safeParse(data);
    if (!parsed.success) {
      throw new BadRequestException({
        code: ERROR_CODES.MATCH_PROVIDER_ERROR,
        message: 'Invalid response from match provider: missing or invalid request_id or request_key',
      });
    }

    return {
      requestId: parsed.data.request_id,
      requestKey: parsed.data.request_key,
      redirectUrl: parsed.data.redirect_url ?? null,
    };
  }

  async listMatchedImages(query: MatchedImagesQuery): Promise<ProviderImage[]> {
    const params = new URLSearchParams({
      event_id: String(query.externalEventId),
      page: String(query.page),
      page_size: String(query.pageSize),
      key: query.eventKey,
      request_id: String(query.requestId),
      request_key: query.requestKey,
    });

    this.logger.debug(
      `Fetching matches for event ${query.externalEventId}, request ${query.requestId} (page ${query.page}, size ${query.pageSize})`,
    );

    const body = await this.send(
      `${this.config.baseUrl}${MATCH_PROVIDER.IMAGE_LIST_PATH}?${params.toString()}`,
      {
        method: 'GET',
        signal: AbortSignal.timeout(this.config.listTimeoutMs),
      },
    );

    const data = this.parseOrReject(imageListDataSchema, this.unwrapEnvelope(body));
    const images: ProviderImage[] = [];

    data.image_list.forEach((item, index) => {
      const parsed = providerImageSchema.safeParse(item);
      if (!parsed.success) {
        this.logger.warn(
          `Skipping malformed image at position ${index} for event ${query.externalEventId}: ${parsed.error.issues[0]?.message ?? 'invalid item'}`,
        );
        return;
      }
      images.push({
        id: parsed.data.id,
        name: parsed.data.name ?? '',
        imageUrl: parsed.data.img_url ?? null,
        width: parsed.data.width ?? null,
        height: parsed.data.height ?? null,
        size: parsed.data.size ?? null,
      });
    });

    return images;
  }

  private async send(url: string, init: RequestInit): Promise<unknown> {
    let response: Response;
    try {
      response = await fetch(url, init);
    } catch (error) {
      const errorMessage = getErrorMessage(error);
      this.logger.error(`Match provider unreachable: ${errorMessage}`);
      throw new ServiceUnavailableException({
        code: ERROR_CODES.MATCH_PROVIDER_UNAVAILABLE,
        message: `Failed to connect to match provider: ${errorMessage}`,
      });
    }

    if (response.status >= 500) {
      this.logger.error(`Match provider returned ${response.status}`);
      throw new ServiceUnavailableException({
        code: ERROR_CODES.MATCH_PROVIDER_UNAVAILABLE,
        message: `Match provider returned ${response.status}`,
      });
    }

    if (!response.ok) {
      throw new BadRequestException({
        code: ERROR_CODES.MATCH_PROVIDER_ERROR,
        message: `Match provider rejected the request with ${response.status}`,
      });
    }

    try {
      return await response.json();
    } catch (error) {
      throw new BadRequestException({
        code: ERROR_CODES.MATCH_PROVIDER_ERROR,
        message: `Match provider returned invalid JSON: ${getErrorMessage(error)}`,
      });
    }
  }

  private unwrapEnvelope(body: unknown): unknown {
    const envelope = this.parseOrReject(envelopeSchema, body);
    if (!envelope.ok) {
      throw new BadRequestException({
        code: ERROR_CODES.MATCH_PROVIDER_ERROR,
        message: 'Match provider returned error response',
      });
    }
    return envelope.data;
  }

  private parseOrReject<T>(schema: ZodType<T, ZodTypeDef, unknown>, value: unknown): T {
    const parsed = schema.safeParse(value);
    if (!parsed.success) {
      throw new BadRequestException({
        code: ERROR_CODES.MATCH_PROVIDER_ERROR,
        message: 'Match provider returned a malformed response',
      });
    }
    return parsed.data;
  }
}
