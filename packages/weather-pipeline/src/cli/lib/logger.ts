/**
 * CLI Output and Logging
 *
 * Human-readable coloured lines for interactive use, JSON lines with
 * `--json`. Tracks the running command and its duration.
 *
 * @module cli/lib/logger
 */

// ============================================================================
// Types
// ============================================================================

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogMetadata {
  readonly [key: string]: unknown;
}

export interface StructuredLogEntry {
  readonly timestamp: string;
  readonly level: LogLevel;
  readonly message: string;
  readonly command?: string;
  readonly duration_ms?: number;
  readonly [key: string]: unknown;
}

export interface CLILoggerConfig {
  /** Minimum level written */
  readonly level: LogLevel;
  readonly json: boolean;
  readonly service?: string;
}

/** Where output lines go; console by default */
export interface OutputSink {
  stdout(line: string): void;
  stderr(line: string): void;
}

// ============================================================================
// Constants
// ============================================================================

const LOG_LEVEL_VALUES: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const COLORS = {
  reset: '\x1b[0m',
  dim: '\x1b[2m',
  red: '\x1b[31m',
  yellow: '\x1b[33m',
  blue: '\x1b[34m',
  cyan: '\x1b[36m',
  gray: '\x1b[90m',
} as const;

const LEVEL_COLORS: Record<LogLevel, string> = {
  debug: COLORS.gray,
  info: COLORS.blue,
  warn: COLORS.yellow,
  error: COLORS.red,
};

const LEVEL_LABELS: Record<LogLevel, string> = {
  debug: 'DEBUG',
  info: 'INFO ',
  warn: 'WARN ',
  error: 'ERROR',
};

const CONSOLE_SINK: OutputSink = {
  stdout: (line) => console.log(line),
  stderr: (line) => console.error(line),
};

// ============================================================================
// CLI Logger
// ============================================================================

export class CLILogger {
  private readonly config: CLILoggerConfig;
  private readonly sink: OutputSink;
  private startTime: number;
  private commandContext: string | null = null;

  constructor(config: CLILoggerConfig, sink: OutputSink = CONSOLE_SINK) {
    this.config = {
      service: 'weather-pipeline',
      ...config,
    };
    this.sink = sink;
    this.startTime = Date.now();
  }

  get json(): boolean {
    return this.config.json;
  }

  private shouldLog(level: LogLevel): boolean {
    return LOG_LEVEL_VALUES[level] >= LOG_LEVEL_VALUES[this.config.level];
  }

  private formatJson(level: LogLevel, message: string, metadata?: LogMetadata): string {
    const entry: StructuredLogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message,
      ...(this.config.service && { service: this.config.service }),
      ...(this.commandContext && { command: this.commandContext }),
      ...(metadata && Object.keys(metadata).length > 0 ? metadata : {}),
    };
    return JSON.stringify(entry);
  }

  private formatHuman(level: LogLevel, message: string, metadata?: LogMetadata): string {
    let line = `${COLORS.dim}${new Date().toISOString()}${COLORS.reset} `;
    line += `${LEVEL_COLORS[level]}${LEVEL_LABELS[level]}${COLORS.reset} `;
    line += message;

    if (metadata && Object.keys(metadata).length > 0) {
      const metaStr = Object.entries(metadata)
        .map(([key, value]) => {
          const valueStr = typeof value === 'object' ? JSON.stringify(value) : String(value);
          return `${COLORS.cyan}${key}${COLORS.reset}=${valueStr}`;
        })
        .join(' ');
      line += ` ${COLORS.dim}(${metaStr})${COLORS.reset}`;
    }

    return line;
  }

  private log(level: LogLevel, message: string, metadata?: LogMetadata): void {
    if (!this.shouldLog(level)) return;

    const formatted = this.config.json
      ? this.formatJson(level, message, metadata)
      : this.formatHuman(level, message, metadata);

    // Diagnostics go to stderr so stdout stays parseable under --json
    this.sink.stderr(formatted);
  }

  debug(message: string, metadata?: LogMetadata): void {
    this.log('debug', message, metadata);
  }

  info(message: string, metadata?: LogMetadata): void {
    this.log('info', message, metadata);
  }

  warn(message: string, metadata?: LogMetadata): void {
    this.log('warn', message, metadata);
  }

  error(message: string, metadata?: LogMetadata): void {
    this.log('error', message, metadata);
  }

  commandStart(command: string, options?: LogMetadata): void {
    this.commandContext = command;
    this.startTime = Date.now();
    this.info(`Starting ${command}`, options);
  }

  commandEnd(success: boolean, metadata?: LogMetadata): void {
    const baseMetadata = { duration_ms: Date.now() - this.startTime, ...metadata };

    if (success) {
      this.info('Command completed', baseMetadata);
    } else {
      this.error('Command failed', baseMetadata);
    }
  }

  /**
   * Write a command's result to stdout: one JSON document, or `lines` as-is
   */
  result(data: unknown, lines: readonly string[] = []): void {
    if (this.config.json) {
      this.sink.stdout(JSON.stringify(data, null, 2));
      return;
    }
    for (const line of lines) {
      this.sink.stdout(line);
    }
  }

  /**
   * Print rows as an aligned table (a JSON array under --json)
   */
  table(data: readonly Record<string, unknown>[], columns?: readonly string[]): void {
    if (this.config.json) {
      this.sink.stdout(JSON.stringify(data));
      return;
    }

    const first = data[0];
    if (first === undefined) {
      this.sink.stdout('No data to display');
      return;
    }

    const cols = columns ?? Object.keys(first);

    const widths = new Map<string, number>();
    for (const col of cols) {
      let width = col.length;
      for (const row of data) {
        width = Math.max(width, String(row[col] ?? '').length);
      }
      widths.set(col, width);
    }

    const pad = (col: string, value: string): string => value.padEnd(widths.get(col) ?? 0);

    this.sink.stdout(cols.map((col) => pad(col, col)).join(' | '));
    this.sink.stdout(cols.map((col) => '-'.repeat(widths.get(col) ?? 0)).join('-+-'));
    for (const row of data) {
      this.sink.stdout(cols.map((col) => pad(col, String(row[col] ?? ''))).join(' | '));
    }
  }
}

// ============================================================================
// Factory Functions
// ============================================================================

export function createCLILogger(
  config: Partial<CLILoggerConfig> = {},
  sink?: OutputSink
): CLILogger {
  return new CLILogger(
    {
      level: config.level ?? 'info',
      json: config.json ?? false,
      service: config.service ?? 'weather-pipeline',
    },
    sink
  );
}

// ============================================================================
// Utility Functions
// ============================================================================

/**
 * Format a duration in milliseconds for display
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) {
    return `${ms}ms`;
  } else if (ms < 60000) {
    return `${(ms / 1000).toFixed(2)}s`;
  } else {
    const minutes = Math.floor(ms / 60000);
    const seconds = ((ms % 60000) / 1000).toFixed(1);
    return `${minutes}m ${seconds}s`;
  }
}
