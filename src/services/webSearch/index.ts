/**
 * Barrel export для citations и форматирования ответа
 */

export * from './types';
export * from './citationsFormatter';
export * from './outputFormatter';
