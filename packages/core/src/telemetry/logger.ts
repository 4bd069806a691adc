/**
 * Structured Logger Module
 *
 * Provides structured JSON logging with:
 * - Automatic telemetry context injection
 * - Secret/token redaction
 * - Consistent field names
 *
 * @module @stepgraph/core/telemetry/logger
 */

import { getCurrentContext, type TelemetryContext, type Severity } from './context.js';

// =============================================================================
// Logger Configuration
// =============================================================================

/**
 * Logger configuration options
 */
export interface LoggerConfig {
  /** Service name for identification */
  serviceName: string;
  /** Minimum severity to log */
  minSeverity?: Severity;
  /** Whether to pretty print (for development) */
  prettyPrint?: boolean;
  /** Additional default fields */
  defaultFields?: Record<string, unknown>;
  /** Custom redaction patterns */
  redactionPatterns?: RegExp[];
}

/**
 * Default redaction patterns for sensitive data
 */
const DEFAULT_REDACTION_PATTERNS: RegExp[] = [
  /Bearer\s+[a-zA-Z0-9\-._~+/]+=*/gi,
  /Authorization:\s*[^\s,;]+/gi,

  // Secrets
  /password['":\s]*[=:]\s*['"]?[^'"\s,}{]+['"]?/gi,
  /secret['":\s]*[=:]\s*['"]?[^'"\s,}{]+['"]?/gi,
  /api[_-]?key['":\s]*[=:]\s*['"]?[^'"\s,}{]+['"]?/gi,

  // Private keys
  /-----BEGIN[A-Z ]*PRIVATE KEY-----[\s\S]*?-----END[A-Z ]*PRIVATE KEY-----/g,
];

/**
 * Severity level ordering (higher = more severe)
 */
export const SEVERITY_ORDER: Record<Severity, number> = {
  DEBUG: 0,
  INFO: 1,
  NOTICE: 2,
  WARNING: 3,
  ERROR: 4,
  CRITICAL: 5,
  ALERT: 6,
  EMERGENCY: 7,
};

export function isSeverity(value: string | undefined): value is Severity {
  return value !== undefined && Object.prototype.hasOwnProperty.call(SEVERITY_ORDER, value);
}

// =============================================================================
// Log Entry Types
// =============================================================================

/**
 * Structured log entry
 */
export interface LogEntry {
  severity: Severity;
  message: string;
  timestamp: string;
  service: string;

  // Trace correlation
  traceId?: string;
  spanId?: string;

  // Context fields
  workflowId?: string;
  executionId?: string;
  nodeId?: string;
  attempt?: number;
  eventName?: string;

  error?: {
    message: string;
    name?: string;
    stack?: string;
    code?: string;
  };

  [key: string]: unknown;
}

// =============================================================================
// Logger Class
// =============================================================================

/**
 * Structured logger with telemetry context integration
 */
export class Logger {
  private config: Required<LoggerConfig>;
  private redactionPatterns: RegExp[];

  constructor(config: LoggerConfig) {
    this.config = {
      serviceName: config.serviceName,
      minSeverity: config.minSeverity ?? 'DEBUG',
      prettyPrint: config.prettyPrint ?? (process.env.NODE_ENV === 'development'),
      defaultFields: config.defaultFields ?? {},
      redactionPatterns: config.redactionPatterns ?? [],
    };
    this.redactionPatterns = [...DEFAULT_REDACTION_PATTERNS, ...this.config.redactionPatterns];
  }

  // ===========================================================================
  // Log Methods
  // ===========================================================================

  debug(message: string, data?: Record<string, unknown>): void {
    this.log('DEBUG', message, data);
  }

  info(message: string, data?: Record<string, unknown>): void {
    this.log('INFO', message, data);
  }

  warn(message: string, data?: Record<string, unknown>): void {
    this.log('WARNING', message, data);
  }

  error(message: string, error?: unknown, data?: Record<string, unknown>): void {
    const errorData = this.formatError(error);
    this.log('ERROR', message, { ...data, ...errorData });
  }

  /**
   * Whether a message at this severity would be written
   */
  isEnabled(severity: Severity): boolean {
    return SEVERITY_ORDER[severity] >= SEVERITY_ORDER[this.config.minSeverity];
  }

  // ===========================================================================
  // Specialized Logging Methods
  // ===========================================================================

  /**
   * Log workflow run start
   */
  runStart(workflowId: string, executionId: string, data?: Record<string, unknown>): void {
    this.info('Run started', {
      eventName: 'run.start',
      workflowId,
      executionId,
      ...data,
    });
  }

  /**
   * Log workflow run end
   */
  runEnd(
    workflowId: string,
    executionId: string,
    status: string,
    durationMs: number,
    data?: Record<string, unknown>
  ): void {
    const severity: Severity = status === 'failed' ? 'ERROR' : status === 'cancelled' ? 'WARNING' : 'INFO';
    this.log(severity, `Run ${status}`, {
      eventName: `run.${status}`,
      workflowId,
      executionId,
      durationMs,
      ...data,
    });
  }

  /**
   * Log a node execution outcome
   */
  nodeEnd(
    nodeId: string,
    success: boolean,
    durationMs: number,
    data?: Record<string, unknown>
  ): void {
    const severity: Severity = success ? 'DEBUG' : 'WARNING';
    this.log(severity, `Node ${success ? 'completed' : 'failed'}`, {
      eventName: success ? 'node.success' : 'node.failure',
      nodeId,
      durationMs,
      ...data,
    });
  }

  // ===========================================================================
  // Core Logging
  // ===========================================================================

  private log(severity: Severity, message: string, data?: Record<string, unknown>): void {
    if (!this.isEnabled(severity)) {
      return;
    }

    const ctx = getCurrentContext();
    const entry = this.buildLogEntry(severity, message, ctx, data);
    this.output(this.redact(entry));
  }

  private buildLogEntry(
    severity: Severity,
    message: string,
    ctx: TelemetryContext | undefined,
    data?: Record<string, unknown>
  ): LogEntry {
    const entry: LogEntry = {
      severity,
      message,
      timestamp: new Date().toISOString(),
      service: this.config.serviceName,
      ...this.config.defaultFields,
    };

    if (ctx) {
      entry.traceId = ctx.traceId;
      entry.spanId = ctx.spanId;
      if (ctx.workflowId) entry.workflowId = ctx.workflowId;
      if (ctx.executionId) entry.executionId = ctx.executionId;
      if (ctx.nodeId) entry.nodeId = ctx.nodeId;
      if (ctx.attempt !== undefined) entry.attempt = ctx.attempt;
      if (ctx.eventName) entry.eventName = ctx.eventName;
    }

    if (data) {
      Object.assign(entry, data);
    }

    return entry;
  }

  private formatError(error: unknown): Record<string, unknown> {
    if (!error) return {};

    if (error instanceof Error) {
      const code = 'code' in error && typeof error.code === 'string' ? error.code : undefined;
      return {
        error: {
          message: error.message,
          name: error.name,
          stack: error.stack,
          code,
        },
      };
    }

    return {
      error: {
        message: String(error),
      },
    };
  }

  private redact(entry: LogEntry): LogEntry {
    const redacted: LogEntry = { ...entry };
    for (const [key, value] of Object.entries(entry)) {
      redacted[key] = this.redactValue(value);
    }
    return redacted;
  }

  private redactValue(value: unknown): unknown {
    if (typeof value === 'string') {
      let result = value;
      for (const pattern of this.redactionPatterns) {
        result = result.replace(pattern, '[REDACTED]');
      }
      return result;
    }
    if (Array.isArray(value)) {
      return value.map((item) => this.redactValue(item));
    }
    if (value !== null && typeof value === 'object' && !(value instanceof Date)) {
      return Object.fromEntries(
        Object.entries(value).map(([key, nested]) => [key, this.redactValue(nested)])
      );
    }
    return value;
  }

  private output(entry: LogEntry): void {
    const output = this.config.prettyPrint
      ? JSON.stringify(entry, null, 2)
      : JSON.stringify(entry);

    switch (entry.severity) {
      case 'ERROR':
      case 'CRITICAL':
      case 'ALERT':
      case 'EMERGENCY':
        console.error(output);
        break;
      case 'WARNING':
        console.warn(output);
        break;
      default:
        console.log(output);
    }
  }

  // ===========================================================================
  // Child Logger
  // ===========================================================================

  /**
   * Create a child logger with additional default fields
   */
  child(additionalFields: Record<string, unknown>): Logger {
    return new Logger({
      ...this.config,
      defaultFields: {
        ...this.config.defaultFields,
        ...additionalFields,
      },
    });
  }
}

// =============================================================================
// Singleton Logger
// =============================================================================

let defaultLogger: Logger | null = null;

/**
 * Get the default logger instance, optionally scoped to a component
 */
export function getLogger(component?: string): Logger {
  if (!defaultLogger) {
    const level = process.env.LOG_LEVEL?.toUpperCase();
    defaultLogger = new Logger({
      serviceName: process.env.APP_NAME || 'stepgraph',
      minSeverity: isSeverity(level) ? level : 'INFO',
      prettyPrint: process.env.NODE_ENV === 'development',
    });
  }
  return component ? defaultLogger.child({ component }) : defaultLogger;
}

/**
 * Set a custom default logger
 */
export function setLogger(logger: Logger | null): void {
  defaultLogger = logger;
}

/**
 * Create a logger for a specific service
 */
export function createLogger(serviceName: string, config?: Partial<LoggerConfig>): Logger {
  return new Logger({
    serviceName,
    ...config,
  });
}
