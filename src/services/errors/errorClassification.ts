/**
 * Классификация ошибок на границе команды
 */

import { CliUsageError, GeminiClientError, PromptValidationError, SearchError } from './errors';

export type ErrorType =
  | 'validation_error'
  | 'configuration_error'
  | 'query_error'
  | 'unknown_error';

export interface ClassifiedError {
  type: ErrorType;
  message: string;
  originalError: unknown;
  /** Ожидаемая ошибка (ввод, окружение, запрос) — печатается без префикса "Unexpected error" */
  handled: boolean;
  exitCode: number;
}

function messageOf(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error ?? 'Unknown error');
}

/**
 * Классифицирует ошибку
 */
export function classifyError(error: unknown): ClassifiedError {
  const message = messageOf(error);

  if (error instanceof PromptValidationError || error instanceof CliUsageError) {
    return { type: 'validation_error', message, originalError: error, handled: true, exitCode: 1 };
  }

  if (error instanceof GeminiClientError) {
    return { type: 'configuration_error', message, originalError: error, handled: true, exitCode: 1 };
  }

  if (error instanceof SearchError) {
    return { type: 'query_error', message, originalError: error, handled: true, exitCode: 1 };
  }

  return { type: 'unknown_error', message, originalError: error, handled: false, exitCode: 1 };
}

/**
 * Сообщение для stderr
 */
export function formatErrorMessage(error: ClassifiedError): string {
  if (error.handled) {
    return `Error: ${error.message}`;
  }
  return `Error: Unexpected error: ${error.message}`;
}
