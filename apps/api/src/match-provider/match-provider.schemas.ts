import { z } from 'zod';
import { MAX_ID } from '@shared/constants';

// Stored in an integer column, so bounded by MAX_ID
const storedId = z.number().int().positive().max(MAX_ID);

const positiveId = z.union([storedId, z.string().regex(/^\d+$/).transform(Number).pipe(storedId)]);

export const envelopeSchema = z.object({
  ok: z.boolean(),
  data: z.unknown(),
});

export const createRequestDataSchema = z.object({
  request_id: positiveId,
  request_key: z.string().min(1),
  redirect_url: z.string().nullish(),
});

export const imageListDataSchema = z
  .object({
    image_list: z.array(z.unknown()).default([]),
  })
  .default({});

export const providerImageSchema = z.object({
  id: z.number().int(),
  name: z.string().nullish(),
  img_url: z.string().nullish(),
  width: z.number().nullish(),
  height: z.number().nullish(),
  size: z.number().nullish(),
});
