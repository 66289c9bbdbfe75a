import * as fs from 'fs';
import * as path from 'path';

/**
 * Structured logger for the relay.
 * Emits one JSON object per line; under NODE_ENV=test entries go to a
 * per-process file in test-logs/ instead of the console.
 */

export type LogLevel = 'error' | 'warn' | 'info' | 'debug' | 'trace';

const LEVELS: LogLevel[] = ['error', 'warn', 'info', 'debug', 'trace'];

export interface LogContext {
  correlationId?: string;
  taskId?: string;
  contextId?: string;
  todolistId?: string;
  endpoint?: string;
  mode?: string;
  operation?: string;
  duration?: number;
  [key: string]: unknown;
}

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  context?: LogContext;
  error?: {
    name: string;
    message: string;
    stack?: string;
    code?: string | number;
  };
  metrics?: {
    [key: string]: number;
  };
}

function errorCode(error: Error): string | number | undefined {
  const code: unknown = Reflect.get(error, 'code');
  return typeof code === 'string' || typeof code === 'number' ? code : undefined;
}

class Logger {
  private logLevel: LogLevel;
  private testLogFile?: string;

  constructor(
    private readonly serviceName: string = 'agent-relay',
    logLevel: LogLevel = 'info',
    private readonly environment: string = process.env.NODE_ENV || 'development',
    private readonly version: string = process.env.npm_package_version || '0.1.0',
    private readonly baseContext: LogContext = {},
    testLogFile?: string
  ) {
    this.logLevel = logLevel;
    this.testLogFile = testLogFile;

    if (!this.testLogFile && this.environment === 'test' && process.env.TEST_LOG_FILE !== 'false') {
      const logDir = path.join(process.cwd(), 'test-logs');
      if (!fs.existsSync(logDir)) {
        fs.mkdirSync(logDir, { recursive: true });
      }
      this.testLogFile = path.join(logDir, `test-${Date.now()}-${process.pid}.log`);
    }
  }

  private shouldLog(level: LogLevel): boolean {
    return LEVELS.indexOf(level) <= LEVELS.indexOf(this.logLevel);
  }

  private formatLogEntry(
    level: LogLevel,
    message: string,
    context?: LogContext,
    error?: Error,
    metrics?: { [key: string]: number }
  ): LogEntry {
    const logEntry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message,
      context: {
        ...this.baseContext,
        ...context,
        service: this.serviceName,
        environment: this.environment,
        version: this.version,
      },
    };

    if (error) {
      logEntry.error = {
        name: error.name,
        message: error.message,
        stack: error.stack,
        code: errorCode(error),
      };
    }

    if (metrics) {
      logEntry.metrics = metrics;
    }

    return logEntry;
  }

  private writeLog(logEntry: LogEntry): void {
    const output = JSON.stringify(logEntry);

    if (this.testLogFile) {
      try {
        fs.appendFileSync(this.testLogFile, output + '\n');
        return;
      } catch (error) {
        console.error('Failed to write to test log file:', error);
      }
    }

    if (logEntry.level === 'error' || logEntry.level === 'warn') {
      console.error(output);
    } else {
      console.log(output);
    }
  }

  private log(level: LogLevel, message: string, context?: LogContext, error?: Error): void {
    if (!this.shouldLog(level)) return;
    this.writeLog(this.formatLogEntry(level, message, context, error));
  }

  error(message: string, context?: LogContext, error?: Error): void {
    this.log('error', message, context, error);
  }

  warn(message: string, context?: LogContext, error?: Error): void {
    this.log('warn', message, context, error);
  }

  info(message: string, context?: LogContext): void {
    this.log('info', message, context);
  }

  debug(message: string, context?: LogContext): void {
    this.log('debug', message, context);
  }

  trace(message: string, context?: LogContext): void {
    this.log('trace', message, context);
  }

  /**
   * Log with custom metrics
   */
  metric(
    message: string,
    metrics: { [key: string]: number },
    context?: LogContext,
    level: LogLevel = 'info'
  ): void {
    if (!this.shouldLog(level)) return;
    this.writeLog(this.formatLogEntry(level, message, context, undefined, metrics));
  }

  /**
   * Create a child logger with additional context
   */
  child(additionalContext: LogContext): Logger {
    return new Logger(
      this.serviceName,
      this.logLevel,
      this.environment,
      this.version,
      { ...this.baseContext, ...additionalContext },
      this.testLogFile
    );
  }

  setLogLevel(level: LogLevel): void {
    this.logLevel = level;
  }

}

export const logger = new Logger();

export { Logger };

export function logHttpRequest(
  method: string,
  path: string,
  statusCode: number,
  duration: number,
  context?: LogContext
): void {
  logger.metric(
    `HTTP ${method} ${path} ${statusCode}`,
    {
      http_status_code: statusCode,
      http_duration_ms: duration,
      http_success: statusCode < 400 ? 1 : 0,
    },
    {
      ...context,
      http_method: method,
      http_path: path,
      http_status_code: statusCode,
    },
    statusCode >= 500 ? 'error' : statusCode >= 400 ? 'warn' : 'info'
  );
}
