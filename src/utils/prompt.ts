/**
 * Получение prompt из аргумента или stdin
 */

import { PromptValidationError } from '../services/errors';

export type PromptInput = NodeJS.ReadableStream & { isTTY?: boolean };

const BIN = 'gemini-grounded-search';

/**
 * Читает prompt из stdin
 *
 * @throws PromptValidationError если stdin — терминал или ввод пустой
 */
export async function readStdin(stdin: PromptInput): Promise<string> {
  if (stdin.isTTY) {
    throw new PromptValidationError(
      'No input available from stdin. ' +
      `Use --stdin flag with piped input: echo 'question' | ${BIN} query --stdin`
    );
  }

  // Декодируем целиком: многобайтовый символ может прийти в двух chunks
  const chunks: Buffer[] = [];
  for await (const chunk of stdin) {
    chunks.push(typeof chunk === 'string' ? Buffer.from(chunk, 'utf8') : chunk);
  }
  const content = Buffer.concat(chunks).toString('utf8');

  const trimmed = content.trim();
  if (!trimmed) {
    throw new PromptValidationError(
      'Empty input received from stdin. ' +
      `Provide non-empty input: echo 'question' | ${BIN} query --stdin`
    );
  }

  return trimmed;
}

/**
 * Проверяет prompt из позиционного аргумента
 *
 * @throws PromptValidationError если prompt не задан или пустой
 */
export function validatePrompt(prompt: string | undefined): string {
  if (!prompt) {
    throw new PromptValidationError(
      'No prompt provided. Either provide PROMPT argument or use --stdin flag.\n' +
      'Examples:\n' +
      `  ${BIN} query 'Who won euro 2024?'\n` +
      `  echo 'Who won euro 2024?' | ${BIN} query --stdin`
    );
  }
  return prompt;
}

/**
 * Prompt из stdin (если useStdin) или из аргумента
 */
export async function resolvePrompt(
  prompt: string | undefined,
  useStdin: boolean,
  stdin: PromptInput
): Promise<string> {
  if (useStdin) {
    return readStdin(stdin);
  }
  return validatePrompt(prompt);
}
