import { z } from 'zod';

export const textAnomalyInput = z.object({
  url: z
    .string()
    .min(1, 'URL is required')
    .url('URL must be absolute')
    .refine((value) => /^https?:\/\//i.test(value), 'URL must use http or https'),
});

const normalizedVertex = z.object({
  x: z.number(),
  y: z.number(),
});

export const detectedWordSchema = z.object({
  text: z.string(),
  confidence: z.number().min(0).max(1),
  boundingPolygon: z.object({
    normalizedVertices: z.array(normalizedVertex).min(3, 'Bounding polygon needs at least 3 vertices'),
  }),
});

export const analyzeImageResultSchema = z.object({
  imageText: z
    .object({
      words: z.array(detectedWordSchema).default([]),
    })
    .nullish(),
});

export const documentGeneratorResponseSchema = z
  .object({
    code: z.unknown(),
    status: z.string().optional(),
  })
  .passthrough();

export type TextAnomalyInput = z.infer<typeof textAnomalyInput>;
