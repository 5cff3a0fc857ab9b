import crypto from 'crypto';

export interface LogContext {
  operationId: string;
  caller?: string;
  route?: string;
}

type LogLevel = 'info' | 'warn' | 'error';

interface LogEntry {
  timestamp: string;
  level: LogLevel;
  operationId: string;
  phase: string;
  message: string;
  data?: Record<string, unknown>;
  caller?: string;
  route?: string;
}

class Logger {
  private context: LogContext | null = null;

  setContext(context: LogContext): void {
    this.context = context;
  }

  clearContext(): void {
    this.context = null;
  }

  private log(level: LogLevel, phase: string, message: string, data?: Record<string, unknown>): void {
    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      operationId: this.context?.operationId || 'internal',
      phase,
      message,
      data: data ? toLoggable(data) : undefined,
    };

    if (this.context?.caller) entry.caller = this.context.caller;
    if (this.context?.route) entry.route = this.context.route;

    console.log(JSON.stringify(entry));
  }

  info(phase: string, message: string, data?: Record<string, unknown>): void {
    this.log('info', phase, message, data);
  }

  warn(phase: string, message: string, data?: Record<string, unknown>): void {
    this.log('warn', phase, message, data);
  }

  error(phase: string, message: string, data?: Record<string, unknown>): void {
    this.log('error', phase, message, data);
  }
}

// JSON.stringify throws on bigint; amounts are logged as decimal strings.
function toLoggable(data: Record<string, unknown>): Record<string, unknown> {
  const serialized = JSON.stringify(data, (_key, value: unknown) =>
    typeof value === 'bigint' ? value.toString() : value
  );
  const parsed: Record<string, unknown> = JSON.parse(serialized);
  return parsed;
}

export const logger = new Logger();

export function generateOperationId(): string {
  return crypto.randomBytes(8).toString('hex');
}
