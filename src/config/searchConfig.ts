/**
 * Конфигурация по умолчанию для grounded search
 */

export interface SearchConfig {
  defaultModel: string;
  /** Модель для --pro */
  proModel: string;
  /** Переменная окружения с API ключом */
  apiKeyEnvVar: string;
}

export function getDefaultSearchConfig(): SearchConfig {
  return {
    defaultModel: 'gemini-2.5-flash',
    proModel: 'gemini-2.5-pro',
    apiKeyEnvVar: 'GEMINI_API_KEY'
  };
}

export function resolveModel(pro: boolean, config: SearchConfig = getDefaultSearchConfig()): string {
  return pro ? config.proModel : config.defaultModel;
}
