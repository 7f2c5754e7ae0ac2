import {
  type ArgumentsHost,
  Catch,
  type ExceptionFilter,
  HttpException,
  HttpStatus,
  Logger,
} from '@nestjs/common';
import type { Response } from 'express';
import { GameError } from '../errors/game-errors.js';

function messageOf(body: string | object): string {
  if (typeof body === 'string') return body;
  if ('message' in body) {
    const { message } = body;
    if (typeof message === 'string') return message;
    if (Array.isArray(message)) return message.join('; ');
  }
  return 'Unknown error';
}

@Catch()
export class GameExceptionFilter implements ExceptionFilter {
  private readonly logger = new Logger(GameExceptionFilter.name);

  catch(exception: unknown, host: ArgumentsHost): void {
    const res = host.switchToHttp().getResponse<Response>();

    if (exception instanceof GameError) {
      if (exception.httpStatus >= HttpStatus.INTERNAL_SERVER_ERROR) {
        this.logger.error(`${exception.code}: ${exception.message}`, exception.stack);
      }
      res.status(exception.httpStatus).json({
        code: exception.code,
        message: exception.message,
        details: exception.details ?? null,
      });
      return;
    }

    if (exception instanceof HttpException) {
      const body = exception.getResponse();
      res.status(exception.getStatus()).json({
        code: 'HTTP_ERROR',
        message: messageOf(body),
        details: typeof body === 'object' ? body : null,
      });
      return;
    }

    this.logger.error(
      'Unhandled exception',
      exception instanceof Error ? exception.stack : String(exception),
    );
    res.status(HttpStatus.INTERNAL_SERVER_ERROR).json({
      code: 'INTERNAL_ERROR',
      message: 'Internal server error',
      details: null,
    });
  }
}
