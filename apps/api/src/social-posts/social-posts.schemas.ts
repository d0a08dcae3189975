import { z } from 'zod';

export const postsEnvelopeSchema = z.object({
  posts: z.array(z.unknown()),
});

const captionSchema = z
  .union([
    z.string(),
    z.object({
      text: z.string().nullish(),
      created_at: z.number().nullish(),
    }),
  ])
  .nullish();

export const postItemSchema = z.object({
  node: z.object({
    code: z.string().min(1),
    caption: captionSchema,
    taken_at: z.number().nullish(),
  }),
});
