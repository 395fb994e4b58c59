import { z } from 'zod';

export const DEFAULT_MEDIA_TYPE = 'application/octet-stream';

export const uploadMetadataSchema = z.object({
  filename: z.string().max(255).default(''),
  mimetype: z
    .string()
    .max(255)
    .optional()
    .transform((value) => value?.trim() || DEFAULT_MEDIA_TYPE),
});
