/**
 * Barrel export для ошибок
 */

export * from './errors';
export * from './errorClassification';
