import type { LogLevel } from '@/types/logLevel';

/**
 * Structured logger with hierarchical scopes and optional JSON output.
 * `spam` sits below debug and is used for per-packet hex traces.
 */
export type { LogLevel } from '@/types/logLevel';

const WEIGHTS: Record<LogLevel, number> = {
  spam: 5,
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  none: 100,
};

/**
 * Receives every formatted line that passes the level filter.
 */
export type LogSink = (level: LogLevel, line: string) => void;

interface LoggerConfig {
  level: LogLevel;
  json: boolean;
  stdout: NodeJS.WritableStream;
  stderr: NodeJS.WritableStream;
  sink: LogSink | null;
}

export interface LoggerOptions {
  level?: LogLevel;
  json?: boolean;
  stdout?: NodeJS.WritableStream;
  stderr?: NodeJS.WritableStream;
  sink?: LogSink | null;
}

export type LogContext = Record<string, unknown>;

class LogManager {
  private readonly config: LoggerConfig = {
    level: 'info',
    json: false,
    stdout: process.stdout,
    stderr: process.stderr,
    sink: null,
  };

  public configure(options: LoggerOptions): void {
    this.config.level = options.level ?? this.config.level;
    this.config.json = options.json ?? this.config.json;
    this.config.stdout = options.stdout ?? this.config.stdout;
    this.config.stderr = options.stderr ?? this.config.stderr;
    if (options.sink !== undefined) {
      this.config.sink = options.sink;
    }
  }

  public get level(): LogLevel {
    return this.config.level;
  }

  public create(component: string, ...scopes: string[]): ComponentLogger {
    return new ComponentLogger(this.config, [component, ...scopes]);
  }
}

export const logManager = new LogManager();

/**
 * Creates a scoped logger using the global configuration.
 */
export function createLogger(component: string, ...scopes: string[]): ComponentLogger {
  return logManager.create(component, ...scopes);
}

export class ComponentLogger {
  constructor(
    private readonly config: LoggerConfig,
    private readonly scopes: string[],
  ) {}

  public spam(message: string, context?: LogContext): void {
    this.write('spam', message, context);
  }

  public debug(message: string, context?: LogContext): void {
    this.write('debug', message, context);
  }

  public info(message: string, context?: LogContext): void {
    this.write('info', message, context);
  }

  public warn(message: string, context?: LogContext): void {
    this.write('warn', message, context);
  }

  public error(message: string, context?: LogContext): void {
    this.write('error', message, context);
  }

  /**
   * Returns a logger with an additional scope appended.
   */
  public child(scope: string): ComponentLogger {
    return new ComponentLogger(this.config, [...this.scopes, scope]);
  }

  public isEnabled(level: LogLevel): boolean {
    return WEIGHTS[level] >= WEIGHTS[this.config.level];
  }

  private write(level: LogLevel, message: string, context?: LogContext): void {
    if (!this.isEnabled(level)) {
      return;
    }

    const payload = this.config.json
      ? this.formatJson(level, message, context)
      : this.formatLine(level, message, context);

    if (this.config.sink) {
      this.config.sink(level, payload);
      return;
    }
    const stream = level === 'error' || level === 'warn' ? this.config.stderr : this.config.stdout;
    stream.write(`${payload}\n`);
  }

  private formatLine(level: LogLevel, message: string, context?: LogContext): string {
    const ts = new Date().toISOString();
    const scope = this.scopes.join('|');
    const ctx = formatContext(context);
    return `[${ts}][${level.toUpperCase()}][${scope}]${ctx} ${message}`;
  }

  private formatJson(level: LogLevel, message: string, context?: LogContext): string {
    return JSON.stringify({
      timestamp: new Date().toISOString(),
      level,
      scopes: this.scopes,
      message,
      context: context ?? {},
    }, jsonReplacer);
  }
}

export function formatContext(context?: LogContext): string {
  if (!context) return '';
  const entries = Object.entries(context)
    .filter(([, value]) => value !== undefined)
    .sort(([left], [right]) => left.localeCompare(right))
    .map(([key, value]) => `${key}=${stringifyValue(value)}`);
  if (entries.length === 0) return '';
  return ` [${entries.join(' ')}]`;
}

function stringifyValue(value: unknown): string {
  if (value === null) return 'null';
  if (Buffer.isBuffer(value)) return value.toString('hex');
  if (typeof value === 'string') {
    if (value.length === 0) return '""';
    if (/[\s"\\[\]]/.test(value)) return JSON.stringify(value);
    return value;
  }
  if (typeof value === 'object') {
    try {
      return JSON.stringify(value, jsonReplacer);
    } catch {
      return String(value);
    }
  }
  return String(value);
}

function jsonReplacer(_key: string, value: unknown): unknown {
  if (typeof value === 'bigint') {
    return value.toString();
  }
  return value;
}
