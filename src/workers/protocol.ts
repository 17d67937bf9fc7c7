import { z } from 'zod';

export const ConversionJobSchema = z.object({
  bytes: z.instanceof(Uint8Array),
  options: z.object({
    maxBytes: z.number().int().positive(),
    stripBoilerplate: z.boolean(),
  }),
});

export const ConversionResultSchema = z.union([
  z.object({
    ok: z.literal(true),
    text: z.string(),
    mimeType: z.string(),
    url: z.string(),
  }),
  z.object({
    ok: z.literal(false),
    kind: z.enum(['FormatError', 'SizeLimitError', 'TimeoutError']),
    stage: z.enum(['plist', 'webarchive', 'html', 'pipeline']),
    detail: z.string(),
  }),
]);

export const WorkerMessageSchema = z.union([
  z.object({ type: z.literal('result'), result: ConversionResultSchema }),
  z.object({ type: z.literal('error'), message: z.string() }),
]);

export type ConversionJob = z.infer<typeof ConversionJobSchema>;
export type WorkerMessage = z.infer<typeof WorkerMessageSchema>;
