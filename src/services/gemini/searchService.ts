/**
 * Запрос к Gemini с Google Search grounding и разбор citation metadata
 */

import { getDefaultSearchConfig } from '../../config/searchConfig';
import { SearchError } from '../errors';
import type { EventLogger } from '../observability';
import type { Citation, GroundingSegment, SearchResponse } from '../webSearch/types';
import type { GroundedContentGenerator } from './geminiClient';
import {
  GenerateContentResponseSchema,
  type RawCandidate,
  type RawGroundingChunk,
  type RawGroundingMetadata
} from './groundingSchema';

const SCOPE = 'gemini.search';

export interface QueryOptions {
  /** Модель (по умолчанию gemini-2.5-flash) */
  model?: string;
  logger?: EventLogger;
}

function extractText(candidate: RawCandidate | undefined): string {
  const parts = candidate?.content?.parts ?? [];
  return parts
    .map(part => part.text)
    .filter((text): text is string => text !== undefined)
    .join('');
}

function chunkSource(chunk: RawGroundingChunk): { uri?: string; title?: string } {
  if (chunk.web) {
    return { uri: chunk.web.uri, title: chunk.web.title };
  }
  return { uri: chunk.uri, title: chunk.title };
}

/**
 * Номер источника = позиция chunk + 1, даже если предыдущие chunks без uri пропущены:
 * groundingChunkIndices ссылаются на исходные позиции.
 */
function extractCitations(metadata: RawGroundingMetadata): Citation[] {
  const citations: Citation[] = [];

  (metadata.groundingChunks ?? []).forEach((chunk, i) => {
    const { uri, title } = chunkSource(chunk);
    if (uri) {
      citations.push({ index: i + 1, uri, title: title ?? '' });
    }
  });

  return citations;
}

function extractSegments(metadata: RawGroundingMetadata): GroundingSegment[] | undefined {
  const segments: GroundingSegment[] = [];

  for (const support of metadata.groundingSupports ?? []) {
    if (!support.segment) {
      continue;
    }
    segments.push({
      startIndex: support.segment.startIndex ?? 0,
      endIndex: support.segment.endIndex ?? 0,
      text: support.segment.text ?? '',
      chunkIndices: support.groundingChunkIndices ?? []
    });
  }

  return segments.length > 0 ? segments : undefined;
}

/**
 * Разбирает ответ generateContent в SearchResponse.
 *
 * Отсутствующие поля дают пустые значения: пустой текст, пустой список
 * citations, отсутствующие queries/segments.
 *
 * @throws SearchError если ответ не является объектом
 */
export function parseGroundedResponse(raw: unknown): SearchResponse {
  const parsed = GenerateContentResponseSchema.safeParse(raw);
  if (!parsed.success) {
    const details = parsed.error.issues.map(issue => issue.message).join('; ');
    throw new SearchError(`Malformed response: ${details}`);
  }

  const candidate = parsed.data.candidates?.[0];
  const response: SearchResponse = {
    responseText: extractText(candidate),
    citations: []
  };

  const metadata = candidate?.groundingMetadata;
  if (metadata) {
    response.citations = extractCitations(metadata);

    if (metadata.webSearchQueries && metadata.webSearchQueries.length > 0) {
      response.webSearchQueries = metadata.webSearchQueries;
    }

    const segments = extractSegments(metadata);
    if (segments) {
      response.groundingSegments = segments;
    }
  }

  return response;
}

/**
 * Запрос к Gemini с Google Search grounding
 *
 * @throws SearchError при любой ошибке запроса или разбора ответа
 */
export async function queryWithGrounding(
  client: GroundedContentGenerator,
  prompt: string,
  options: QueryOptions = {}
): Promise<SearchResponse> {
  const model = options.model ?? getDefaultSearchConfig().defaultModel;
  const logger = options.logger;

  try {
    logger?.info('api_call', SCOPE, `Querying with model '${model}' and Google Search grounding`);
    const raw = await client.generateGrounded(prompt, model);
    logger?.trace('raw_response', SCOPE, 'Raw response', { response: raw });

    const response = parseGroundedResponse(raw);
    logger?.debug('api_response', SCOPE, 'Query completed', {
      responseLength: response.responseText.length,
      citations: response.citations.length,
      segments: response.groundingSegments?.length ?? 0
    });

    return response;
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new SearchError(`Query failed: ${message}`, { cause: error });
  }
}
