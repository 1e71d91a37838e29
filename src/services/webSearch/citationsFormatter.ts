/**
 * Форматирование citations для включения в ответ
 */

import type { Citation, GroundingSegment } from './types';

/**
 * Ссылка на источник в формате [1](https://...)
 */
export function formatCitationLink(index: number, uri: string): string {
  return `[${index}](${uri})`;
}

/**
 * Вставляет ссылки на источники в текст ответа.
 *
 * Группа ссылок вида `[1](uri1), [2](uri2)` вставляется сразу после
 * `endIndex` каждого сегмента. Сегменты обрабатываются с конца текста,
 * поэтому смещения ещё не обработанных сегментов не сдвигаются.
 *
 * @param responseText - Исходный текст ответа
 * @param segments - Фрагменты с grounding support
 * @param citations - Доступные источники
 * @returns Текст со вставленными ссылками
 */
export function addInlineCitations(
  responseText: string,
  segments: readonly GroundingSegment[] | undefined,
  citations: readonly Citation[]
): string {
  if (!segments || segments.length === 0 || citations.length === 0) {
    return responseText;
  }

  const citationUris = new Map<number, string>();
  for (const citation of citations) {
    citationUris.set(citation.index, citation.uri);
  }

  // sort стабилен: сегменты с одинаковым endIndex сохраняют исходный порядок
  const sortedSegments = [...segments].sort((a, b) => b.endIndex - a.endIndex);

  let text = responseText;
  for (const segment of sortedSegments) {
    if (segment.chunkIndices.length === 0) {
      continue;
    }

    const links: string[] = [];
    for (const chunkIndex of segment.chunkIndices) {
      // chunk indices 0-based, citation index 1-based
      const citationIndex = chunkIndex + 1;
      const uri = citationUris.get(citationIndex);
      if (uri) {
        links.push(formatCitationLink(citationIndex, uri));
      }
    }

    if (links.length > 0) {
      const group = links.join(', ');
      text = text.slice(0, segment.endIndex) + group + text.slice(segment.endIndex);
    }
  }

  return text;
}

/**
 * Форматирует citations в markdown список
 *
 * @returns Строки вида `1. [Title](https://...)`; без заголовка вместо него URI
 */
export function formatCitationsMarkdown(citations: readonly Citation[]): string[] {
  return citations.map(citation => {
    const label = citation.title || citation.uri;
    return `${citation.index}. [${label}](${citation.uri})`;
  });
}
