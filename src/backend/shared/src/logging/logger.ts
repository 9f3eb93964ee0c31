/**
 * Structured Logging Module
 *
 * Structured JSON logging with correlation IDs, PII masking and an optional
 * telemetry sink. Services log every accepted state change at info level,
 * refused operations at warn level and collaborator failures at error level.
 *
 * @tested tests/property/logging.property.test.ts
 */

import { z } from 'zod';

/**
 * Log levels supported by the logger
 */
export const LogLevel = {
  DEBUG: 'debug',
  INFO: 'info',
  WARN: 'warn',
  ERROR: 'error',
} as const;

export type LogLevel = (typeof LogLevel)[keyof typeof LogLevel];

export const LogLevelSchema = z.nativeEnum(LogLevel);

/**
 * Patterns masked inside free-text values.
 * Phone numbers need explicit formatting so UUID segments are left alone.
 */
export const PII_PATTERNS = {
  email: /[a-zA-Z0-9][a-zA-Z0-9._%+-]*@[a-zA-Z0-9.-]+\.[a-zA-Z]{2,}/g,
  phone: /(?:\+\d{1,3}[-.\s]?\(?\d{2,4}\)?[-.\s]\d{3,4}[-.\s]\d{3,4}|\(\d{3}\)[-.\s]?\d{3}[-.\s]?\d{4})/g,
  bearer: /Bearer\s+[A-Za-z0-9._~+/=-]+/g,
} as const;

/**
 * Field names whose values are masked entirely. A key matches when it
 * contains one of these (case-insensitive), so `invitedEmail` is masked.
 */
export const PII_FIELD_NAMES = [
  'email',
  'phone',
  'password',
  'secret',
  'token',
  'apiKey',
  'authorization',
  'contactName',
  'fullName',
] as const;

/**
 * Structured log entry schema
 */
export const LogEntrySchema = z.object({
  timestamp: z.string(),
  level: LogLevelSchema,
  message: z.string(),
  correlationId: z.string().optional(),
  service: z.string(),
  metadata: z.record(z.unknown()).optional(),
  error: z
    .object({
      name: z.string(),
      message: z.string(),
      code: z.string().optional(),
      stack: z.string().optional(),
    })
    .optional(),
});

export type LogEntry = z.infer<typeof LogEntrySchema>;

/**
 * Status change log entry
 */
export interface StateChangeLogEntry {
  entity: string;
  entityId: string;
  fromStatus: string | null;
  toStatus: string;
  actorId: string;
  reason?: string;
}

/**
 * Telemetry sink interface
 */
export interface TelemetryClient {
  trackTrace(message: string, severity: number, properties?: Record<string, string>): void;
  trackException(exception: Error, properties?: Record<string, string>): void;
  trackDependency(
    name: string,
    data: string,
    duration: number,
    success: boolean,
    dependencyType: string,
    properties?: Record<string, string>
  ): void;
  flush(): void;
}

export interface LoggerConfig {
  serviceName: string;
  minLevel: LogLevel;
  enableConsole: boolean;
  telemetryClient?: TelemetryClient;
  maskPii: boolean;
}

export const defaultLoggerConfig: LoggerConfig = {
  serviceName: 'supplier-compliance',
  minLevel: LogLevel.INFO,
  enableConsole: true,
  maskPii: true,
};

export function maskPiiInString(value: string): string {
  return value
    .replace(PII_PATTERNS.email, '[EMAIL_MASKED]')
    .replace(PII_PATTERNS.phone, '[PHONE_MASKED]')
    .replace(PII_PATTERNS.bearer, 'Bearer [TOKEN_MASKED]');
}

export function isPiiFieldName(fieldName: string): boolean {
  const lower = fieldName.toLowerCase();
  return PII_FIELD_NAMES.some((piiField) => lower.includes(piiField.toLowerCase()));
}

/**
 * Masks PII in an object recursively
 */
export function maskPiiInObject(value: unknown, depth = 0): unknown {
  if (depth > 10) {
    return '[MAX_DEPTH_EXCEEDED]';
  }

  if (value === null || value === undefined) {
    return value;
  }

  if (typeof value === 'string') {
    return maskPiiInString(value);
  }

  if (value instanceof Date) {
    return value.toISOString();
  }

  if (Array.isArray(value)) {
    return value.map((item) => maskPiiInObject(item, depth + 1));
  }

  if (typeof value === 'object') {
    const masked: Record<string, unknown> = {};
    for (const [key, entry] of Object.entries(value)) {
      if (isPiiFieldName(key) && entry !== null && entry !== undefined) {
        masked[key] = '[PII_MASKED]';
      } else {
        masked[key] = maskPiiInObject(entry, depth + 1);
      }
    }
    return masked;
  }

  return value;
}

function maskMetadata(metadata: Record<string, unknown>): Record<string, unknown> {
  const masked: Record<string, unknown> = {};
  for (const [key, entry] of Object.entries(metadata)) {
    masked[key] =
      isPiiFieldName(key) && entry !== null && entry !== undefined
        ? '[PII_MASKED]'
        : maskPiiInObject(entry, 1);
  }
  return masked;
}

function logLevelToSeverity(level: LogLevel): number {
  switch (level) {
    case LogLevel.DEBUG:
      return 0;
    case LogLevel.INFO:
      return 1;
    case LogLevel.WARN:
      return 2;
    case LogLevel.ERROR:
      return 3;
  }
}

const LEVEL_ORDER: readonly LogLevel[] = [
  LogLevel.DEBUG,
  LogLevel.INFO,
  LogLevel.WARN,
  LogLevel.ERROR,
];

function shouldLog(level: LogLevel, minLevel: LogLevel): boolean {
  return LEVEL_ORDER.indexOf(level) >= LEVEL_ORDER.indexOf(minLevel);
}

function errorCode(error: Error): string | undefined {
  const code: unknown = Reflect.get(error, 'code');
  return typeof code === 'string' ? code : undefined;
}

/**
 * Structured Logger class
 */
export class Logger {
  private readonly config: LoggerConfig;
  private correlationId?: string;
  private readonly sink: LogEntry[];

  constructor(config: Partial<LoggerConfig> = {}, sink: LogEntry[] = []) {
    this.config = { ...defaultLoggerConfig, ...config };
    this.sink = sink;
  }

  setCorrelationId(correlationId: string): void {
    this.correlationId = correlationId;
  }

  getCorrelationId(): string | undefined {
    return this.correlationId;
  }

  /**
   * Creates a child logger bound to a correlation ID. Entries written by the
   * child are visible through the parent's getLogEntries().
   */
  child(correlationId: string): Logger {
    const childLogger = new Logger(this.config, this.sink);
    childLogger.setCorrelationId(correlationId);
    return childLogger;
  }

  /**
   * Gets all log entries (for testing)
   */
  getLogEntries(): LogEntry[] {
    return [...this.sink];
  }

  clearLogEntries(): void {
    this.sink.length = 0;
  }

  private createLogEntry(
    level: LogLevel,
    message: string,
    metadata?: Record<string, unknown>,
    error?: Error
  ): LogEntry {
    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message,
      service: this.config.serviceName,
      correlationId: this.correlationId,
    };

    if (metadata) {
      entry.metadata = this.config.maskPii ? maskMetadata(metadata) : metadata;
    }

    if (error) {
      entry.error = {
        name: error.name,
        message: this.config.maskPii ? maskPiiInString(error.message) : error.message,
        code: errorCode(error),
        stack: error.stack,
      };
    }

    return entry;
  }

  private log(
    level: LogLevel,
    message: string,
    metadata?: Record<string, unknown>,
    error?: Error
  ): void {
    if (!shouldLog(level, this.config.minLevel)) {
      return;
    }

    const entry = this.createLogEntry(level, message, metadata, error);
    this.sink.push(entry);

    if (this.config.enableConsole) {
      const logFn = level === LogLevel.ERROR ? console.error : console.log;
      logFn(JSON.stringify(entry));
    }

    const telemetry = this.config.telemetryClient;
    if (telemetry) {
      const properties: Record<string, string> = { service: this.config.serviceName };
      if (this.correlationId) {
        properties.correlationId = this.correlationId;
      }
      if (entry.metadata) {
        properties.metadata = JSON.stringify(entry.metadata);
      }

      if (error) {
        telemetry.trackException(error, properties);
      } else {
        telemetry.trackTrace(message, logLevelToSeverity(level), properties);
      }
    }
  }

  debug(message: string, metadata?: Record<string, unknown>): void {
    this.log(LogLevel.DEBUG, message, metadata);
  }

  info(message: string, metadata?: Record<string, unknown>): void {
    this.log(LogLevel.INFO, message, metadata);
  }

  warn(message: string, metadata?: Record<string, unknown>): void {
    this.log(LogLevel.WARN, message, metadata);
  }

  error(message: string, error?: Error, metadata?: Record<string, unknown>): void {
    this.log(LogLevel.ERROR, message, metadata, error);
  }

  /**
   * Logs an accepted status transition
   */
  logStateChange(entry: StateChangeLogEntry): void {
    this.info(`${entry.entity} status changed`, {
      entity: entry.entity,
      entityId: entry.entityId,
      fromStatus: entry.fromStatus,
      toStatus: entry.toStatus,
      actorId: entry.actorId,
      reason: entry.reason,
    });
  }

  /**
   * Logs a call to an external service
   */
  logDependency(
    name: string,
    data: string,
    duration: number,
    success: boolean,
    dependencyType: string
  ): void {
    const metadata: Record<string, unknown> = {
      dependencyName: name,
      dependencyData: data,
      duration,
      success,
      dependencyType,
    };

    if (success) {
      this.info(`Dependency call to ${name} succeeded`, metadata);
    } else {
      this.warn(`Dependency call to ${name} failed`, metadata);
    }

    const telemetry = this.config.telemetryClient;
    if (telemetry) {
      const properties: Record<string, string> = { service: this.config.serviceName };
      if (this.correlationId) {
        properties.correlationId = this.correlationId;
      }
      telemetry.trackDependency(name, data, duration, success, dependencyType, properties);
    }
  }

  flush(): void {
    this.config.telemetryClient?.flush();
  }
}

export function createLogger(config: Partial<LoggerConfig> = {}): Logger {
  return new Logger(config);
}

/**
 * In-memory telemetry client for testing
 */
export class InMemoryTelemetryClient implements TelemetryClient {
  public traces: Array<{ message: string; severity: number; properties?: Record<string, string> }> =
    [];
  public exceptions: Array<{ exception: Error; properties?: Record<string, string> }> = [];
  public dependencies: Array<{
    name: string;
    data: string;
    duration: number;
    success: boolean;
    dependencyType: string;
    properties?: Record<string, string>;
  }> = [];
  public flushCount = 0;

  trackTrace(message: string, severity: number, properties?: Record<string, string>): void {
    this.traces.push({ message, severity, properties });
  }

  trackException(exception: Error, properties?: Record<string, string>): void {
    this.exceptions.push({ exception, properties });
  }

  trackDependency(
    name: string,
    data: string,
    duration: number,
    success: boolean,
    dependencyType: string,
    properties?: Record<string, string>
  ): void {
    this.dependencies.push({ name, data, duration, success, dependencyType, properties });
  }

  flush(): void {
    this.flushCount++;
  }

  clear(): void {
    this.traces = [];
    this.exceptions = [];
    this.dependencies = [];
    this.flushCount = 0;
  }
}

let globalLogger: Logger | null = null;

/**
 * Gets the global logger instance
 */
export function getLogger(): Logger {
  if (!globalLogger) {
    globalLogger = createLogger();
  }
  return globalLogger;
}

export function setLogger(logger: Logger): void {
  globalLogger = logger;
}

/**
 * Resets the global logger (for testing)
 */
export function resetLogger(): void {
  globalLogger = null;
}
