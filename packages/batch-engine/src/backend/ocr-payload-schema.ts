import { z } from 'zod';

export const ocrPageSchema = z
  .object({
    index: z.number().int().nonnegative(),
    markdown: z.string(),
    images: z.array(z.unknown()).optional(),
    dimensions: z.unknown().optional(),
  })
  .passthrough();

/**
 * Minimal shape a backend response must have to count as a success.
 * Unknown fields are kept so callers receive the backend's full answer.
 */
export const ocrPayloadSchema = z
  .object({
    pages: z.array(ocrPageSchema).min(1, 'Response contains no pages'),
    model: z.string().optional(),
    usageInfo: z.unknown().optional(),
  })
  .passthrough();
