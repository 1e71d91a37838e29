/**
 * Ошибки CLI и библиотеки
 */

/** Неверный или отсутствующий prompt */
export class PromptValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'PromptValidationError';
  }
}

/** Неверное использование команды (например, неизвестный shell для completion) */
export class CliUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CliUsageError';
  }
}

/** Ошибка конфигурации Gemini клиента (например, нет API ключа) */
export class GeminiClientError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'GeminiClientError';
  }
}

/** Ошибка запроса к Gemini: исходное сообщение сохраняется, исходная ошибка в cause */
export class SearchError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'SearchError';
  }
}
