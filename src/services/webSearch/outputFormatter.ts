/**
 * Рендеринг SearchResponse в JSON и markdown
 */

import { formatCitationsMarkdown } from './citationsFormatter';
import type { Citation, SearchResponse } from './types';

export interface JsonCitation {
  index: number;
  uri: string;
  title: string;
}

export interface JsonGroundingSupport {
  segment: {
    start_index: number;
    end_index: number;
    text: string;
  };
  grounding_chunk_indices: number[];
}

export interface JsonGroundingMetadata {
  web_search_queries?: string[];
  grounding_chunks?: JsonCitation[];
  grounding_supports?: JsonGroundingSupport[];
}

export interface JsonOutput {
  response_text: string;
  citations?: JsonCitation[];
  grounding_metadata?: JsonGroundingMetadata;
}

export interface JsonOutputOptions {
  /** Добавить grounding_metadata (включается с -vv) */
  includeGroundingMetadata?: boolean;
}

function toJsonCitations(citations: readonly Citation[]): JsonCitation[] {
  return citations.map(c => ({ index: c.index, uri: c.uri, title: c.title }));
}

function buildGroundingMetadata(response: SearchResponse): JsonGroundingMetadata | undefined {
  const metadata: JsonGroundingMetadata = {};

  if (response.webSearchQueries && response.webSearchQueries.length > 0) {
    metadata.web_search_queries = [...response.webSearchQueries];
  }

  if (response.citations.length > 0) {
    metadata.grounding_chunks = toJsonCitations(response.citations);
  }

  if (response.groundingSegments && response.groundingSegments.length > 0) {
    metadata.grounding_supports = response.groundingSegments.map(segment => ({
      segment: {
        start_index: segment.startIndex,
        end_index: segment.endIndex,
        text: segment.text
      },
      grounding_chunk_indices: [...segment.chunkIndices]
    }));
  }

  return Object.keys(metadata).length > 0 ? metadata : undefined;
}

/**
 * Объект для JSON вывода. citations и grounding_metadata опускаются, если пусты.
 */
export function buildJsonOutput(response: SearchResponse, options: JsonOutputOptions = {}): JsonOutput {
  const output: JsonOutput = { response_text: response.responseText };

  if (response.citations.length > 0) {
    output.citations = toJsonCitations(response.citations);
  }

  if (options.includeGroundingMetadata) {
    const metadata = buildGroundingMetadata(response);
    if (metadata) {
      output.grounding_metadata = metadata;
    }
  }

  return output;
}

export function toJSON(response: SearchResponse, options: JsonOutputOptions = {}): string {
  return JSON.stringify(buildJsonOutput(response, options), null, 2);
}

/**
 * Markdown: текст ответа и, если есть источники, секция "## Citations"
 */
export function toMarkdown(response: SearchResponse): string {
  if (response.citations.length === 0) {
    return response.responseText;
  }

  return [
    response.responseText,
    '',
    '## Citations',
    '',
    ...formatCitationsMarkdown(response.citations)
  ].join('\n');
}
