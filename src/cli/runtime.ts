/**
 * Окружение выполнения CLI (потоки, env, фабрика клиента)
 */

import { GeminiClient, type GeminiClientOptions, type GroundedContentGenerator } from '../services/gemini';
import type { PromptInput } from '../utils/prompt';

export interface CliRuntime {
  env: Record<string, string | undefined>;
  stdin: PromptInput;
  stdout: NodeJS.WritableStream;
  stderr: NodeJS.WritableStream;
  /** Фабрика клиента; в тестах заменяется на fake */
  createClient: (options: GeminiClientOptions) => GroundedContentGenerator;
}

export function createProcessRuntime(): CliRuntime {
  return {
    env: process.env,
    stdin: process.stdin,
    stdout: process.stdout,
    stderr: process.stderr,
    createClient: options => new GeminiClient(options)
  };
}
