/**
 * Structured Logging Module
 *
 * JSON-line logging with a per-run identifier so every entry of one analysis
 * can be traced back to its inputs and parameters.
 *
 * @tested tests/property/analysis-logging.property.test.ts
 */

import { z } from 'zod';

export const LogLevel = {
  DEBUG: 'debug',
  INFO: 'info',
  WARN: 'warn',
  ERROR: 'error',
} as const;

export type LogLevel = (typeof LogLevel)[keyof typeof LogLevel];

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

/**
 * Structured log entry schema
 */
export const LogEntrySchema = z.object({
  timestamp: z.string().datetime(),
  level: z.enum([LogLevel.DEBUG, LogLevel.INFO, LogLevel.WARN, LogLevel.ERROR]),
  message: z.string(),
  service: z.string(),
  runId: z.string().optional(),
  metadata: z.record(z.unknown()).optional(),
  error: z
    .object({
      name: z.string(),
      message: z.string(),
      stack: z.string().optional(),
    })
    .optional(),
});

export type LogEntry = z.infer<typeof LogEntrySchema>;

/**
 * Summary of one completed analysis run
 */
export interface AnalysisLogEntry {
  runId: string;
  interventionCount: number;
  schemes: string[];
  parameters: Record<string, unknown>;
  /** Scheme name → best-ranked intervention */
  topInterventions?: Record<string, unknown>;
  processingTimeMs: number;
}

export interface LoggerConfig {
  serviceName: string;
  minLevel: LogLevel;
  enableConsole: boolean;
}

export const defaultLoggerConfig: LoggerConfig = {
  serviceName: 'geroscience-mcda',
  minLevel: LogLevel.INFO,
  enableConsole: true,
};

interface WriteOptions {
  metadata?: Record<string, unknown>;
  error?: Error;
  runId?: string;
}

export class Logger {
  private readonly config: LoggerConfig;
  private readonly runId?: string;
  /** Shared with every child so a run's entries are visible from the root */
  private readonly entries: LogEntry[];

  constructor(config: Partial<LoggerConfig> = {}, runId?: string, entries: LogEntry[] = []) {
    this.config = { ...defaultLoggerConfig, ...config };
    this.runId = runId;
    this.entries = entries;
  }

  getRunId(): string | undefined {
    return this.runId;
  }

  /**
   * Returns a logger that stamps `runId` on every entry and appends to this
   * logger's in-memory entries
   */
  child(runId: string): Logger {
    return new Logger(this.config, runId, this.entries);
  }

  /**
   * Entries recorded so far (for testing)
   */
  getLogEntries(): LogEntry[] {
    return [...this.entries];
  }

  private write(level: LogLevel, message: string, options: WriteOptions = {}): void {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[this.config.minLevel]) {
      return;
    }

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message,
      service: this.config.serviceName,
    };
    const runId = options.runId ?? this.runId;
    if (runId !== undefined) entry.runId = runId;
    if (options.metadata) entry.metadata = options.metadata;
    if (options.error) {
      const { name, message: errorMessage, stack } = options.error;
      entry.error = { name, message: errorMessage, stack };
    }

    this.entries.push(entry);

    if (this.config.enableConsole) {
      const line = JSON.stringify(entry);
      if (level === LogLevel.ERROR) {
        console.error(line);
      } else {
        console.log(line);
      }
    }
  }

  debug(message: string, metadata?: Record<string, unknown>): void {
    this.write(LogLevel.DEBUG, message, { metadata });
  }

  info(message: string, metadata?: Record<string, unknown>): void {
    this.write(LogLevel.INFO, message, { metadata });
  }

  warn(message: string, metadata?: Record<string, unknown>): void {
    this.write(LogLevel.WARN, message, { metadata });
  }

  error(message: string, error?: Error, metadata?: Record<string, unknown>): void {
    this.write(LogLevel.ERROR, message, { metadata, error });
  }

  /**
   * Logs a completed analysis with its parameters and headline results
   */
  logAnalysis(entry: AnalysisLogEntry): void {
    const { runId, topInterventions, ...summary } = entry;
    const metadata: Record<string, unknown> = { ...summary };
    if (topInterventions) {
      metadata.topInterventions = topInterventions;
    }
    this.write(LogLevel.INFO, 'Analysis completed', { metadata, runId });
  }
}

export function createLogger(config: Partial<LoggerConfig> = {}): Logger {
  return new Logger(config);
}

let globalLogger: Logger | undefined;

/**
 * Process-wide logger used when a run is not handed one
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
 * Drops the process-wide logger (for testing)
 */
export function resetLogger(): void {
  globalLogger = undefined;
}
