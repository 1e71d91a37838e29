/**
 * Structured logging для событий CLI
 *
 * Вывод идёт в stderr: stdout занят результатом команды.
 */

import { Console as NodeConsole } from 'node:console';
import type { SearchEvent, LogLevel, SearchEventType } from './types';

export interface EventLoggerConfig {
  /** Максимальное количество событий в памяти */
  maxEvents?: number;

  /** Уровень логирования */
  logLevel?: LogLevel;

  /** Включить structured logging в консоль */
  consoleLogging?: boolean;

  /** Поток для консольного вывода (по умолчанию process.stderr) */
  stream?: NodeJS.WritableStream;

  /** Callback для экспорта событий */
  exportCallback?: (event: SearchEvent) => void;
}

const LEVELS: readonly LogLevel[] = ['trace', 'debug', 'info', 'warn', 'error'];

/**
 * Уровень логирования по количеству флагов -v
 */
export function levelForVerbosity(verbosity: number): LogLevel {
  if (verbosity >= 3) return 'trace';
  if (verbosity === 2) return 'debug';
  if (verbosity === 1) return 'info';
  return 'warn';
}

export class EventLogger {
  private events: SearchEvent[] = [];
  private config: EventLoggerConfig;
  private console: Console;

  constructor(config: EventLoggerConfig = {}) {
    this.config = {
      maxEvents: 1000,
      logLevel: 'warn',
      consoleLogging: true,
      ...config
    };
    this.console = this.createConsole();
  }

  /**
   * Логирование события
   */
  log(event: Omit<SearchEvent, 'timestamp'>): void {
    const fullEvent: SearchEvent = {
      ...event,
      timestamp: new Date(),
      level: event.level || this.getDefaultLevel(event.type)
    };

    if (!this.shouldLog(fullEvent.level || 'info')) {
      return;
    }

    this.events.push(fullEvent);

    if (this.config.maxEvents && this.events.length > this.config.maxEvents) {
      this.events = this.events.slice(-Math.floor(this.config.maxEvents * 0.5));
    }

    if (this.config.consoleLogging) {
      this.logToConsole(fullEvent);
    }

    if (this.config.exportCallback) {
      try {
        this.config.exportCallback(fullEvent);
      } catch (error) {
        this.console.error('[EventLogger] Ошибка экспорта события:', error);
      }
    }
  }

  trace(type: SearchEventType, scope: string, message: string, data?: Record<string, unknown>): void {
    this.log({ type, scope, message, data, level: 'trace' });
  }

  debug(type: SearchEventType, scope: string, message: string, data?: Record<string, unknown>): void {
    this.log({ type, scope, message, data, level: 'debug' });
  }

  info(type: SearchEventType, scope: string, message: string, data?: Record<string, unknown>): void {
    this.log({ type, scope, message, data, level: 'info' });
  }

  error(scope: string, message: string, data?: Record<string, unknown>): void {
    this.log({ type: 'error', scope, message, data, level: 'error' });
  }

  /**
   * Логирование в консоль с structured форматированием
   */
  private logToConsole(event: SearchEvent): void {
    const level = event.level || 'info';
    const line = `${event.timestamp.toISOString()} ${level.toUpperCase()} [${event.scope}] ${event.message ?? event.type}`;

    if (event.data && Object.keys(event.data).length > 0) {
      this.getConsoleMethod(level)(line, event.data);
    } else {
      this.getConsoleMethod(level)(line);
    }
  }

  /**
   * Определяет метод консоли по уровню
   */
  private getConsoleMethod(level: LogLevel): (...args: unknown[]) => void {
    switch (level) {
      case 'trace':
      case 'debug':
        return this.console.debug.bind(this.console);
      case 'info':
        return this.console.info.bind(this.console);
      case 'warn':
        return this.console.warn.bind(this.console);
      case 'error':
        return this.console.error.bind(this.console);
      default:
        return this.console.log.bind(this.console);
    }
  }

  /**
   * Определяет уровень логирования по типу события
   */
  private getDefaultLevel(type: SearchEventType): LogLevel {
    switch (type) {
      case 'error':
        return 'error';
      case 'warn':
        return 'warn';
      case 'raw_response':
        return 'trace';
      case 'prompt_resolved':
      case 'client_init':
      case 'api_response':
      case 'output_written':
        return 'debug';
      default:
        return 'info';
    }
  }

  private shouldLog(level: LogLevel): boolean {
    const configLevelIndex = LEVELS.indexOf(this.config.logLevel || 'warn');
    return LEVELS.indexOf(level) >= configLevelIndex;
  }

  private createConsole(): Console {
    // stdout тоже направлен в stream: console.info/debug пишут в stdout
    const stream = this.config.stream ?? process.stderr;
    return new NodeConsole({ stdout: stream, stderr: stream });
  }

  /**
   * Получить все события
   */
  getEvents(scope?: string): SearchEvent[] {
    if (scope) {
      return this.events.filter(e => e.scope === scope);
    }
    return [...this.events];
  }

  /**
   * Получить события по типу
   */
  getEventsByType(type: SearchEventType): SearchEvent[] {
    return this.events.filter(e => e.type === type);
  }

  clear(): void {
    this.events = [];
  }

  /**
   * Обновить конфигурацию
   */
  updateConfig(config: Partial<EventLoggerConfig>): void {
    this.config = { ...this.config, ...config };
    if (config.stream) {
      this.console = this.createConsole();
    }
  }
}
