/**
 * Structured logging with Pino
 *
 * Attaches the active OpenTelemetry trace context to every record and
 * redacts token-like values when running in production.
 */

import pino from 'pino';
import { trace } from '@opentelemetry/api';
import { getObservabilityConfig, type ObservabilityConfig } from './config.js';

const SENSITIVE_KEYS = ['password', 'passphrase', 'secret', 'token', 'key', 'auth', 'credential', 'salt'];

export class ObservabilityLogger {
  private readonly pino: pino.Logger;
  private readonly config: ObservabilityConfig;
  private readonly isProduction: boolean;

  constructor(config?: ObservabilityConfig) {
    this.config = config ?? getObservabilityConfig();
    this.isProduction = this.config.environment === 'production';
    this.pino = this.createPinoLogger();
  }

  private createPinoLogger(): pino.Logger {
    if (this.config.level === 'silent') {
      return pino({ level: 'silent' });
    }

    // Pretty console output for development, written to stderr
    if (this.config.exporters.console) {
      return pino({
        level: this.config.level,
        base: { service: this.config.service.name },
        transport: {
          target: 'pino-pretty',
          options: {
            colorize: true,
            translateTime: 'HH:MM:ss',
            ignore: 'pid,hostname',
            destination: 2,
          },
        },
      });
    }

    return pino({
      level: this.config.level,
      base: {
        service: this.config.service.name,
        version: this.config.service.version,
      },
      formatters: {
        level: (label) => ({ level: label }),
        log: (object) => this.addTraceContext(object),
      },
    });
  }

  /**
   * Add OpenTelemetry trace context to log entries
   */
  private addTraceContext(logObject: Record<string, unknown>): Record<string, unknown> {
    const span = trace.getActiveSpan();
    if (span) {
      const spanContext = span.spanContext();
      return {
        ...logObject,
        trace_id: spanContext.traceId,
        span_id: spanContext.spanId,
        trace_flags: spanContext.traceFlags,
      };
    }
    return logObject;
  }

  /**
   * Strip anything that looks like a credential from production output
   */
  sanitize(message: string, data?: unknown): { message: string; data?: unknown } {
    if (!this.isProduction) {
      return { message, data };
    }

    const sanitizedMessage = message
      .replace(/Bearer\s+[A-Za-z0-9\-._~+/]+=*/g, 'Bearer [TOKEN]')
      .replace(/[A-Za-z0-9\-._~+/]{32,}={0,2}/g, '[TOKEN]');

    return { message: sanitizedMessage, data: this.sanitizeObject(data) };
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
      return obj.map((item) => this.sanitizeObject(item, visited));
    }

    const sanitized: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(obj)) {
      const lowerKey = key.toLowerCase();
      if (SENSITIVE_KEYS.some((sensitiveKey) => lowerKey.includes(sensitiveKey))) {
        sanitized[key] = '[REDACTED]';
      } else {
        sanitized[key] = this.sanitizeObject(value, visited);
      }
    }
    return sanitized;
  }

  debug(message: string, data?: Record<string, unknown>): void {
    const sanitized = this.sanitize(message, data);
    this.pino.debug(sanitized.data ?? {}, sanitized.message);
  }

  info(message: string, data?: Record<string, unknown>): void {
    const sanitized = this.sanitize(message, data);
    this.pino.info(sanitized.data ?? {}, sanitized.message);
  }

  warn(message: string, data?: Record<string, unknown>): void {
    const sanitized = this.sanitize(message, data);
    this.pino.warn(sanitized.data ?? {}, sanitized.message);
  }

  error(message: string, error?: unknown): void {
    const { message: sanitizedMessage } = this.sanitize(message);

    if (error instanceof Error) {
      const errorInfo = this.isProduction
        ? { name: error.name, message: error.message }
        : { name: error.name, message: error.message, stack: error.stack };
      this.pino.error(errorInfo, sanitizedMessage);
    } else if (error !== undefined) {
      const { data } = this.sanitize('', error);
      this.pino.error(data ?? {}, sanitizedMessage);
    } else {
      this.pino.error(sanitizedMessage);
    }
  }

  /**
   * Child logger bound to a component name
   */
  child(component: string): ObservabilityLogger {
    return new ObservabilityLogger({
      ...this.config,
      service: { ...this.config.service, name: `${this.config.service.name}:${component}` },
    });
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
