/**
 * Типы для Observability
 */

/**
 * Уровни логирования
 */
export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error';

/**
 * Типы событий
 */
export type SearchEventType =
  | 'command_start'
  | 'prompt_resolved'
  | 'client_init'
  | 'api_call'
  | 'api_response'
  | 'raw_response'
  | 'citations_added'
  | 'output_written'
  | 'warn'
  | 'error';

/**
 * Событие для логирования
 */
export interface SearchEvent {
  /** Тип события */
  type: SearchEventType;

  /** Модуль-источник события (например, 'gemini.client') */
  scope: string;

  /** Временная метка */
  timestamp: Date;

  /** Сообщение для человека */
  message?: string;

  /** Данные события */
  data?: Record<string, unknown>;

  /** Уровень логирования */
  level?: LogLevel;
}
