// Logging utilities for Lambda functions

export interface LogContext {
  functionName?: string;
  requestId?: string;
  [key: string]: unknown;
}

export type LogLevel = 'DEBUG' | 'INFO' | 'WARN' | 'ERROR';

export type LogSink = (line: string) => void;

export class Logger {
  private context: LogContext;
  private sink: LogSink;

  constructor(context: LogContext = {}, sink: LogSink = (line) => console.log(line)) {
    this.context = context;
    this.sink = sink;
  }

  // Returns a logger that adds `context` to every entry
  child(context: LogContext): Logger {
    return new Logger({ ...this.context, ...context }, this.sink);
  }

  private log(level: LogLevel, message: string, data?: unknown): void {
    const logEntry = {
      timestamp: new Date().toISOString(),
      level,
      message,
      ...this.context,
      ...(data !== undefined && { data }),
    };
    this.sink(JSON.stringify(logEntry));
  }

  info(message: string, data?: unknown): void {
    this.log('INFO', message, data);
  }

  error(message: string, data?: unknown): void {
    this.log('ERROR', message, data);
  }

  warn(message: string, data?: unknown): void {
    this.log('WARN', message, data);
  }

  debug(message: string, data?: unknown): void {
    this.log('DEBUG', message, data);
  }
}

// Shapes an unknown thrown value for a log entry
export function describeError(error: unknown): { error: string; stack?: string } {
  return {
    error: error instanceof Error ? error.message : String(error),
    stack: error instanceof Error ? error.stack : undefined,
  };
}
