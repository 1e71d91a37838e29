/**
 * Типы для ответа с Google Search grounding
 */

export interface Citation {
  /** Номер источника (1-based, позиция chunk в ответе API + 1) */
  readonly index: number;

  /** URI источника */
  readonly uri: string;

  /** Заголовок страницы (может быть пустым) */
  readonly title: string;
}

export interface GroundingSegment {
  /** Начальное смещение в тексте ответа */
  startIndex: number;

  /** Конечное смещение в тексте ответа */
  endIndex: number;

  /** Сам фрагмент текста (только для информации) */
  text: string;

  /** 0-based индексы chunks, подтверждающих фрагмент */
  chunkIndices: number[];
}

export interface SearchResponse {
  /** Текст ответа модели */
  responseText: string;

  /** Источники */
  citations: Citation[];

  /** Поисковые запросы, выполненные моделью */
  webSearchQueries?: string[];

  /** Фрагменты текста с привязкой к источникам */
  groundingSegments?: GroundingSegment[];
}
