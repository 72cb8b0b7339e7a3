/**
 * Structured logging with Pino and OpenTelemetry trace correlation
 */

import pino from 'pino';
import { trace } from '@opentelemetry/api';
import { getObservabilityConfig, type ObservabilityConfig } from './config.js';

export type { LogLevel } from './config.js';

const SENSITIVE_KEYS = ['password', 'secret', 'token', 'key', 'auth', 'credential', 'cookie'];

/**
 * Application logger backed by Pino.
 *
 * Category helpers (`auth*`, `gateway*`) prefix messages so the two
 * subsystems can be told apart in aggregated output.
 */
export class ObservabilityLogger {
  private pino: pino.Logger;
  private config: ObservabilityConfig;
  private isProduction: boolean;

  constructor(config?: ObservabilityConfig) {
    this.config = config ?? getObservabilityConfig();
    this.isProduction = this.config.environment === 'production';
    this.pino = this.createPinoLogger();
  }

  private createPinoLogger(): pino.Logger {
    if (this.config.level === 'silent') {
      return pino({ level: 'silent' });
    }

    if (this.config.exporters.console) {
      // Transports cannot use custom formatters, trace context is merged per call instead
      return pino({
        level: this.config.level,
        transport: {
          target: 'pino-pretty',
          options: {
            colorize: true,
            translateTime: 'HH:MM:ss',
            ignore: 'pid,hostname',
            destination: 2
          }
        }
      });
    }

    return pino({
      level: this.config.level,
      base: {
        service: this.config.service.name,
        version: this.config.service.version,
        namespace: this.config.service.namespace
      },
      formatters: {
        level: (label) => ({ level: label })
      }
    });
  }

  /**
   * Add OpenTelemetry trace context to log entries
   */
  private withTraceContext(data: Record<string, unknown>): Record<string, unknown> {
    const span = trace.getActiveSpan();
    if (!span) {
      return data;
    }
    const spanContext = span.spanContext();
    return {
      ...data,
      trace_id: spanContext.traceId,
      span_id: spanContext.spanId,
      trace_flags: spanContext.traceFlags
    };
  }

  private sanitizeMessage(message: string): string {
    if (!this.isProduction) {
      return message;
    }
    return message
      .replace(/\b[A-Za-z0-9._%+-]+@[A-Za-z0-9.-]+\.[A-Za-z]{2,}\b/g, '[EMAIL]')
      .replace(/Bearer\s+[A-Za-z0-9\-._~+/]+=*/g, 'Bearer [TOKEN]')
      .replace(/[A-Za-z0-9\-._~+/]{32,}/g, '[TOKEN]');
  }

  private sanitizeObject(obj: unknown, visited: WeakSet<object> = new WeakSet()): unknown {
    if (typeof obj !== 'object' || obj === null) {
      return obj;
    }
    if (visited.has(obj)) {
      return '[Circular Reference]';
    }
    visited.add(obj);

    if (Array.isArray(obj)) {
      return obj.map(item => this.sanitizeObject(item, visited));
    }

    const sanitized: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(obj)) {
      const lowerKey = key.toLowerCase();
      if (SENSITIVE_KEYS.some(sensitiveKey => lowerKey.includes(sensitiveKey))) {
        sanitized[key] = '[REDACTED]';
      } else {
        sanitized[key] = this.sanitizeObject(value, visited);
      }
    }
    return sanitized;
  }

  private toRecord(data: unknown): Record<string, unknown> {
    if (data === undefined) {
      return {};
    }
    const value = this.isProduction ? this.sanitizeObject(data) : data;
    if (typeof value === 'object' && value !== null && !Array.isArray(value)) {
      return { ...value };
    }
    return { data: value };
  }

  debug(message: string, data?: unknown): void {
    this.pino.debug(this.withTraceContext(this.toRecord(data)), this.sanitizeMessage(message));
  }

  info(message: string, data?: unknown): void {
    this.pino.info(this.withTraceContext(this.toRecord(data)), this.sanitizeMessage(message));
  }

  warn(message: string, data?: unknown): void {
    this.pino.warn(this.withTraceContext(this.toRecord(data)), this.sanitizeMessage(message));
  }

  error(message: string, error?: unknown): void {
    if (error instanceof Error) {
      const errorInfo = this.isProduction
        ? { name: error.name, message: 'Internal server error' }
        : { name: error.name, message: error.message, stack: error.stack };
      this.pino.error(this.withTraceContext(errorInfo), this.sanitizeMessage(message));
      return;
    }
    this.pino.error(this.withTraceContext(this.toRecord(error)), this.sanitizeMessage(message));
  }

  authDebug(message: string, data?: unknown): void {
    this.debug(`[Auth] ${message}`, data);
  }

  authInfo(message: string, data?: unknown): void {
    this.info(`[Auth] ${message}`, data);
  }

  authWarn(message: string, data?: unknown): void {
    this.warn(`[Auth] ${message}`, data);
  }

  authError(message: string, error?: unknown): void {
    this.error(`[Auth] ${message}`, error);
  }

  gatewayDebug(message: string, data?: unknown): void {
    this.debug(`[Gateway] ${message}`, data);
  }

  gatewayInfo(message: string, data?: unknown): void {
    this.info(`[Gateway] ${message}`, data);
  }

  gatewayWarn(message: string, data?: unknown): void {
    this.warn(`[Gateway] ${message}`, data);
  }

  gatewayError(message: string, error?: unknown): void {
    this.error(`[Gateway] ${message}`, error);
  }

  /**
   * Get underlying Pino logger for advanced usage
   */
  getPino(): pino.Logger {
    return this.pino;
  }
}

let loggerInstance: ObservabilityLogger | null = null;

export function getLogger(): ObservabilityLogger {
  if (!loggerInstance) {
    loggerInstance = new ObservabilityLogger();
  }
  return loggerInstance;
}

export const logger = getLogger();

/**
 * Shorten a credential for log output.
 */
export function tokenPrefix(value: string): string {
  return value.length > 8 ? `${value.substring(0, 8)}...` : '[short]';
}
