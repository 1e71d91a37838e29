/**
 * Gemini клиент
 *
 * Инициализирует SDK с API ключом из параметра или из окружения и
 * выполняет запрос с включённым инструментом Google Search.
 */

import { GoogleGenAI } from '@google/genai';
import { getDefaultSearchConfig, type SearchConfig } from '../../config/searchConfig';
import { GeminiClientError } from '../errors';
import type { EventLogger } from '../observability';

const SCOPE = 'gemini.client';

/**
 * Источник grounded ответов. Query executor зависит только от этого интерфейса.
 */
export interface GroundedContentGenerator {
  generateGrounded(prompt: string, model: string): Promise<unknown>;
}

export interface GeminiClientOptions {
  /** API ключ; если не задан, читается из окружения */
  apiKey?: string;
  env?: Record<string, string | undefined>;
  config?: SearchConfig;
  logger?: EventLogger;
}

export class GeminiClient implements GroundedContentGenerator {
  private readonly genAI: GoogleGenAI;
  private readonly logger?: EventLogger;

  /**
   * @throws GeminiClientError если API ключ не найден
   */
  constructor(options: GeminiClientOptions = {}) {
    const config = options.config ?? getDefaultSearchConfig();
    const env = options.env ?? process.env;
    this.logger = options.logger;

    let apiKey = options.apiKey;
    if (apiKey === undefined) {
      this.logger?.debug('client_init', SCOPE, `No API key provided, reading from ${config.apiKeyEnvVar}`);
      apiKey = env[config.apiKeyEnvVar];
    }

    if (!apiKey) {
      this.logger?.error(SCOPE, `${config.apiKeyEnvVar} not found in environment`);
      throw new GeminiClientError(
        `${config.apiKeyEnvVar} environment variable is required. ` +
        `Set it with: export ${config.apiKeyEnvVar}='your-api-key'`
      );
    }

    this.genAI = new GoogleGenAI({ apiKey });
    this.logger?.info('client_init', SCOPE, 'GeminiClient initialized');
  }

  async generateGrounded(prompt: string, model: string): Promise<unknown> {
    return this.genAI.models.generateContent({
      model,
      contents: prompt,
      config: { tools: [{ googleSearch: {} }] }
    });
  }
}
