import {
  Injectable,
  NestInterceptor,
  ExecutionContext,
  CallHandler,
} from '@nestjs/common';
import { Observable } from 'rxjs';
import { tap } from 'rxjs/operators';
import { Request } from 'express';
import { RequestContext } from '../request-context/request-context';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };

const isLogLevel = (value: string): value is LogLevel => value in LEVEL_ORDER;

export class Logger {
  private static configuredLevel?: LogLevel;

  /** Pins the level, e.g. from the env file; otherwise LOG_LEVEL is read on every call. */
  static setLevel(level: string) {
    const normalized = level.toLowerCase();
    this.configuredLevel = isLogLevel(normalized) ? normalized : undefined;
  }

  static get level(): LogLevel {
    if (this.configuredLevel) return this.configuredLevel;
    const configured = (process.env.LOG_LEVEL || 'debug').toLowerCase();
    return isLogLevel(configured) ? configured : 'debug';
  }

  static enabled(level: LogLevel): boolean {
    return LEVEL_ORDER[level] >= LEVEL_ORDER[this.level];
  }

  private static prefix(tag: string, context?: string): string {
    const requestId = RequestContext.get()?.requestId;
    const scope = requestId ? `${context || 'App'}:${requestId}` : context || 'App';
    return `[${tag}] ${new Date().toISOString()} [${scope}]`;
  }

  static log(message: string, context?: string) {
    if (this.enabled('info')) {
      console.log(`${this.prefix('LOG', context)} ${message}`);
    }
  }

  static error(message: string, trace: string, context?: string) {
    console.error(`${this.prefix('ERROR', context)} ${message}`);
    if (trace) {
      console.error(trace);
    }
  }

  static warn(message: string, context?: string) {
    if (this.enabled('warn')) {
      console.warn(`${this.prefix('WARN', context)} ${message}`);
    }
  }

  static debug(message: string, context?: string) {
    if (this.enabled('debug')) {
      console.debug(`${this.prefix('DEBUG', context)} ${message}`);
    }
  }
}

@Injectable()
export class LoggingInterceptor implements NestInterceptor {
  intercept(context: ExecutionContext, next: CallHandler): Observable<unknown> {
    const request = context.switchToHttp().getRequest<Request>();
    const { method, url, body, query, params } = request;

    Logger.debug(
      `Request: ${method} ${url} \nBody: ${JSON.stringify(body)} \nQuery: ${JSON.stringify(query)} \nParams: ${JSON.stringify(params)}`,
      'LoggingInterceptor',
    );

    const now = Date.now();
    return next.handle().pipe(
      tap((response) => {
        Logger.debug(
          `Response: ${method} ${url} ${Date.now() - now}ms \nResponse: ${JSON.stringify(response)}`,
          'LoggingInterceptor',
        );
      }),
    );
  }
}
