import pino from 'pino'
import type { Logger, LoggerOptions } from 'pino'

/**
 * Observability - Structured logging and metrics
 *
 * - Structured JSON logging via Pino (pino-pretty for local runs)
 * - Child loggers carry component and peer id
 * - Basic in-memory metrics (counters, gauges, timings)
 */

/**
 * Metrics interface - simple counters and gauges
 */
export interface Metrics {
  increment(name: string, value?: number, labels?: Record<string, string>): void
  gauge(name: string, value: number, labels?: Record<string, string>): void
  timing(name: string, durationMs: number, labels?: Record<string, string>): void
}

/**
 * In-memory metrics (one instance per engine in tests, a shared one otherwise)
 */
export class InMemoryMetrics implements Metrics {
  private counters = new Map<string, number>()
  private gauges = new Map<string, number>()

  increment(name: string, value: number = 1, labels?: Record<string, string>): void {
    const key = this.makeKey(name, labels)
    this.counters.set(key, (this.counters.get(key) || 0) + value)
  }

  gauge(name: string, value: number, labels?: Record<string, string>): void {
    const key = this.makeKey(name, labels)
    this.gauges.set(key, value)
  }

  timing(name: string, durationMs: number, labels?: Record<string, string>): void {
    const key = this.makeKey(name, labels)
    this.counters.set(key, (this.counters.get(key) || 0) + durationMs)
  }

  private makeKey(name: string, labels?: Record<string, string>): string {
    if (!labels) return name
    const labelStr = Object.entries(labels)
      .sort(([a], [b]) => a.localeCompare(b))
      .map(([k, v]) => `${k}=${v}`)
      .join(',')
    return `${name}{${labelStr}}`
  }

  getCounter(name: string, labels?: Record<string, string>): number {
    return this.counters.get(this.makeKey(name, labels)) || 0
  }

  getGauge(name: string, labels?: Record<string, string>): number {
    return this.gauges.get(this.makeKey(name, labels)) || 0
  }

  snapshot(): Record<string, number> {
    return { ...Object.fromEntries(this.counters), ...Object.fromEntries(this.gauges) }
  }

  reset(): void {
    this.counters.clear()
    this.gauges.clear()
  }
}

export interface LoggingOptions {
  level?: string
  pretty?: boolean
}

function defaultLevel(): string {
  if (process.env.LOG_LEVEL) return process.env.LOG_LEVEL
  // Keep test output readable
  return process.env.VITEST ? 'silent' : 'info'
}

export function createLogger(options: LoggingOptions = {}): Logger {
  const config: LoggerOptions = {
    level: options.level || defaultLevel(),
    ...(options.pretty
      ? {
          transport: {
            target: 'pino-pretty',
            options: {
              colorize: true,
              translateTime: 'HH:MM:ss.l',
              ignore: 'pid,hostname',
            },
          },
        }
      : {}),
  }
  return pino(config)
}

/**
 * Observability singleton - global logger and metrics
 */
export class Observability {
  private static instance: Observability | undefined

  public logger: Logger
  public metrics: InMemoryMetrics

  private constructor(options?: LoggingOptions) {
    this.logger = createLogger(options)
    this.metrics = new InMemoryMetrics()
  }

  static getInstance(options?: LoggingOptions): Observability {
    if (!Observability.instance) {
      Observability.instance = new Observability(options)
    }
    return Observability.instance
  }

  /**
   * Replace the global logger, e.g. once configuration has been loaded
   */
  configure(options: LoggingOptions): Logger {
    this.logger = createLogger(options)
    return this.logger
  }

  /**
   * Create a child logger with component context
   */
  createChildLogger(context: Record<string, unknown>): Logger {
    return this.logger.child(context)
  }
}

/**
 * Global logger and metrics
 */
export const obs = Observability.getInstance()
