/**
 * Zod схемы ответа generateContent с grounding metadata
 *
 * Поля, которые отсутствуют или имеют неверный тип, превращаются в undefined.
 * Элементы массивов chunks не выбрасываются: их позиция задаёт номер источника.
 */

import { z } from 'zod';

const optionalString = z.string().optional().catch(undefined);
const optionalNumber = z.number().optional().catch(undefined);

export const WebSourceSchema = z.object({
  uri: optionalString,
  title: optionalString
});

export const GroundingChunkSchema = z
  .object({
    web: WebSourceSchema.optional().catch(undefined),
    uri: optionalString,
    title: optionalString
  })
  .catch({});

export const SegmentSchema = z.object({
  startIndex: optionalNumber,
  endIndex: optionalNumber,
  text: optionalString
});

export const GroundingSupportSchema = z
  .object({
    segment: SegmentSchema.optional().catch(undefined),
    // Неверный элемент отбрасывается отдельно, остальные ссылки сохраняются
    groundingChunkIndices: z
      .array(z.number().int().nullable().catch(null))
      .transform(indices => indices.filter((index): index is number => index !== null))
      .optional()
      .catch(undefined)
  })
  .catch({});

export const GroundingMetadataSchema = z.object({
  groundingChunks: z.array(GroundingChunkSchema).optional().catch(undefined),
  webSearchQueries: z.array(z.string()).optional().catch(undefined),
  groundingSupports: z.array(GroundingSupportSchema).optional().catch(undefined)
});

export const PartSchema = z
  .object({
    text: optionalString
  })
  .catch({});

export const CandidateSchema = z
  .object({
    content: z
      .object({
        parts: z.array(PartSchema).optional().catch(undefined)
      })
      .optional()
      .catch(undefined),
    groundingMetadata: GroundingMetadataSchema.optional().catch(undefined)
  })
  .catch({});

export const GenerateContentResponseSchema = z.object({
  candidates: z.array(CandidateSchema).optional().catch(undefined)
});

export type RawGroundingChunk = z.infer<typeof GroundingChunkSchema>;
export type RawGroundingMetadata = z.infer<typeof GroundingMetadataSchema>;
export type RawCandidate = z.infer<typeof CandidateSchema>;
export type RawGenerateContentResponse = z.infer<typeof GenerateContentResponseSchema>;
