/**
 * Barrel export для Observability
 */

export { EventLogger, levelForVerbosity } from './eventLogger';
export type { EventLoggerConfig } from './eventLogger';
export type {
  SearchEvent,
  SearchEventType,
  LogLevel
} from './types';
