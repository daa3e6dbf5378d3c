import {
    ExceptionFilter,
    Catch,
    ArgumentsHost,
    HttpException,
    HttpStatus,
  } from '@nestjs/common';
  import { Request, Response } from 'express';
  import { Logger } from '../interceptors/logging.interceptor';

  export interface ErrorResponseBody {
    statusCode: number;
    timestamp: string;
    path: string;
    error: string;
    message: string | string[];
    rule?: string;
  }

  const isRecord = (value: unknown): value is Record<string, unknown> =>
    typeof value === 'object' && value !== null;

  const readMessage = (value: unknown): string | string[] | undefined => {
    if (typeof value === 'string') return value;
    if (Array.isArray(value) && value.every((item) => typeof item === 'string')) {
      return value;
    }
    return undefined;
  };

  @Catch()
  export class HttpExceptionFilter implements ExceptionFilter {
    catch(exception: unknown, host: ArgumentsHost) {
      const ctx = host.switchToHttp();
      const response = ctx.getResponse<Response>();
      const request = ctx.getRequest<Request>();

      let status = HttpStatus.INTERNAL_SERVER_ERROR;
      let message: string | string[] = 'Internal server error';
      let error = 'Internal Server Error';
      let rule: string | undefined;

      if (exception instanceof HttpException) {
        status = exception.getStatus();
        const exceptionResponse = exception.getResponse();
        if (typeof exceptionResponse === 'string') {
          message = exceptionResponse;
          error = exception.name;
        } else if (isRecord(exceptionResponse)) {
          message = readMessage(exceptionResponse.message) ?? exception.message;
          if (typeof exceptionResponse.error === 'string') {
            error = exceptionResponse.error;
          } else {
            error = exception.name;
          }
          if (typeof exceptionResponse.rule === 'string') {
            rule = exceptionResponse.rule;
          }
        } else {
          message = exception.message;
          error = exception.name;
        }
      } else if (exception instanceof Error) {
        message = exception.message;
        error = exception.name;
      }

      const logLine = `${request.method} ${request.url} ${status} - ${Array.isArray(message) ? message.join('; ') : message}`;
      if (status >= HttpStatus.INTERNAL_SERVER_ERROR) {
        Logger.error(
          logLine,
          exception instanceof Error ? exception.stack || 'No stack trace available' : '',
          'HttpExceptionFilter',
        );
      } else {
        Logger.warn(logLine, 'HttpExceptionFilter');
      }

      const body: ErrorResponseBody = {
        statusCode: status,
        timestamp: new Date().toISOString(),
        path: request.url,
        error,
        message,
      };
      if (rule) {
        body.rule = rule;
      }
      response.status(status).json(body);
    }
  }
