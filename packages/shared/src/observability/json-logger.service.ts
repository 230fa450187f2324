import { LoggerService } from '@nestjs/common';
import { RequestContext } from './request-context';

type LogLevel = 'info' | 'error' | 'warn' | 'debug' | 'verbose' | 'fatal';

/**
 * One JSON object per line on stdout. Messages that are themselves JSON
 * (the `JSON.stringify({ event, ... })` convention) are merged into the
 * entry instead of being nested as a string.
 */
export class JsonLoggerService implements LoggerService {
  constructor(
    private readonly serviceName: string,
    private readonly write: (line: string) => void = (line) => {
      process.stdout.write(line);
    },
  ) {}

  log(message: unknown, context?: string): void {
    this.emit('info', message, context);
  }

  error(message: unknown, trace?: string, context?: string): void {
    this.emit('error', message, context, trace);
  }

  warn(message: unknown, context?: string): void {
    this.emit('warn', message, context);
  }

  debug(message: unknown, context?: string): void {
    this.emit('debug', message, context);
  }

  verbose(message: unknown, context?: string): void {
    this.emit('verbose', message, context);
  }

  fatal(message: unknown, context?: string): void {
    this.emit('fatal', message, context);
  }

  private emit(
    level: LogLevel,
    message: unknown,
    context?: string,
    trace?: string,
  ): void {
    const ctx = RequestContext.get();
    const entry: Record<string, unknown> = {
      timestamp: new Date().toISOString(),
      level,
      service: this.serviceName,
      context: context ?? undefined,
      ...this.parse(message),
    };

    if (ctx?.requestId) entry.requestId = ctx.requestId;
    if (ctx?.userId) entry.userId = ctx.userId;
    if (trace) entry.trace = trace;

    this.write(JSON.stringify(entry) + '\n');
  }

  private parse(message: unknown): Record<string, unknown> {
    if (typeof message === 'string' && message.startsWith('{')) {
      try {
        const parsed: unknown = JSON.parse(message);
        if (typeof parsed === 'object' && parsed !== null && !Array.isArray(parsed)) {
          return { ...parsed };
        }
      } catch {
        return { event: message };
      }
    }
    if (message instanceof Error) {
      return { event: message.message };
    }
    return { event: typeof message === 'string' ? message : JSON.stringify(message) };
  }
}
