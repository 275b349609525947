import type { PipelineEvent } from '../types/events';
import { LOG_LEVEL_ORDER, type LogLevel, type Logger } from './types';

export interface ConsoleLoggerOptions {
  /** Messages below this level are dropped. Default: info */
  level?: LogLevel;
  bindings?: Record<string, unknown>;
}

export class ConsoleLogger implements Logger {
  private readonly level: LogLevel;
  private readonly bindings: Record<string, unknown>;

  constructor(options: ConsoleLoggerOptions = {}) {
    this.level = options.level ?? 'info';
    this.bindings = options.bindings ?? {};
  }

  log(event: PipelineEvent): void {
    if (!this.enabled('debug')) return;
    console.log(JSON.stringify(event));
  }

  trace(event: PipelineEvent, message: string): void {
    if (!this.enabled('info')) return;
    console.log(this.withPrefix(message), JSON.stringify(event));
  }

  debug(message: string): void {
    if (this.enabled('debug')) console.debug(this.withPrefix(message));
  }

  info(message: string): void {
    if (this.enabled('info')) console.info(this.withPrefix(message));
  }

  warn(message: string): void {
    if (this.enabled('warn')) console.warn(this.withPrefix(message));
  }

  error(error: Error, message?: string): void {
    if (message) {
      console.error(this.withPrefix(message), error);
    } else {
      console.error(error);
    }
  }

  child(bindings: Record<string, unknown>): Logger {
    return new ConsoleLogger({ level: this.level, bindings: { ...this.bindings, ...bindings } });
  }

  private enabled(level: LogLevel): boolean {
    return LOG_LEVEL_ORDER[level] >= LOG_LEVEL_ORDER[this.level];
  }

  private withPrefix(message: string): string {
    return formatWithBindings(this.bindings, message);
  }
}

export function formatWithBindings(bindings: Record<string, unknown>, message: string): string {
  const prefix = Object.entries(bindings)
    .map(([k, v]) => `${k}=${String(v)}`)
    .join(' ');
  return prefix ? `[${prefix}] ${message}` : message;
}
