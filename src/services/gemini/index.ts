/**
 * Barrel export для Gemini
 */

export { GeminiClient } from './geminiClient';
export type { GeminiClientOptions, GroundedContentGenerator } from './geminiClient';
export { queryWithGrounding, parseGroundedResponse } from './searchService';
export type { QueryOptions } from './searchService';
