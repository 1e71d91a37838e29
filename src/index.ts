/**
 * Public API для использования как библиотеки
 *
 * @example
 * const client = new GeminiClient();
 * const response = await queryWithGrounding(client, 'Who won euro 2024?');
 * console.log(addInlineCitations(response.responseText, response.groundingSegments, response.citations));
 */

export * from './services/webSearch';
export * from './services/gemini';
export * from './services/errors';
export * from './services/observability';
export { getDefaultSearchConfig, resolveModel } from './config/searchConfig';
export type { SearchConfig } from './config/searchConfig';
export { validatePrompt, readStdin, resolvePrompt } from './utils/prompt';
export type { PromptInput } from './utils/prompt';
export { runCli, buildProgram, CLI_NAME, CLI_VERSION } from './cli/program';
export type { CliRuntime } from './cli/runtime';
