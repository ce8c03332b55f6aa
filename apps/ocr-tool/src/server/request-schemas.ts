import { z } from 'zod';

const httpUrl = z
  .string()
  .url()
  .refine((value) => /^https?:\/\//.test(value), {
    message: 'URL must start with http:// or https://',
  });

export const MAX_BATCH_URLS = 10;

export const processRequestSchema = z.discriminatedUnion('processType', [
  z.object({
    processType: z.literal('url'),
    url: httpUrl,
    includeImages: z.boolean().optional(),
  }),
  z.object({
    processType: z.literal('file'),
    fileName: z.string().min(1),
    contentBase64: z.string().min(1),
    includeImages: z.boolean().optional(),
  }),
]);

export const batchRequestSchema = z.object({
  urls: z.array(httpUrl).min(1).max(MAX_BATCH_URLS),
  includeImages: z.boolean().optional(),
});

export type ProcessRequest = z.infer<typeof processRequestSchema>;
export type BatchRequest = z.infer<typeof batchRequestSchema>;
