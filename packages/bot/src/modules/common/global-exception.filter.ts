import {
  ExceptionFilter,
  Catch,
  ArgumentsHost,
  HttpException,
  HttpStatus,
  Injectable,
} from '@nestjs/common';
import type { FastifyReply, FastifyRequest } from 'fastify';
import { logger } from './structured-logger.service';

interface ErrorResponse {
  statusCode: number;
  message: string;
  error: string;
  timestamp: string;
  path: string;
}

function readField(body: object, key: string): string | undefined {
  const value: unknown = Reflect.get(body, key);
  if (typeof value === 'string') return value;
  if (Array.isArray(value)) return value.map(String).join(', ');
  return undefined;
}

/**
 * Filtre global pour les routes HTTP du pont mesh : toutes les exceptions sont loggées
 * de manière structurée et renvoyées sous une forme JSON unique
 */
@Catch()
@Injectable()
export class GlobalExceptionFilter implements ExceptionFilter {
  catch(exception: unknown, host: ArgumentsHost) {
    const ctx = host.switchToHttp();
    const reply = ctx.getResponse<FastifyReply>();
    const request = ctx.getRequest<FastifyRequest>();

    let status = HttpStatus.INTERNAL_SERVER_ERROR;
    let message = 'Internal server error';
    let error = 'Internal Server Error';

    if (exception instanceof HttpException) {
      status = exception.getStatus();
      const exceptionResponse = exception.getResponse();

      if (typeof exceptionResponse === 'string') {
        message = exceptionResponse;
      } else if (typeof exceptionResponse === 'object' && exceptionResponse !== null) {
        message = readField(exceptionResponse, 'message') || message;
        error = readField(exceptionResponse, 'error') || exception.name;
      }
    } else if (exception instanceof Error) {
      message = exception.message;
      error = exception.name;
    }

    const path = request?.url || 'unknown';
    const errorResponse: ErrorResponse = {
      statusCode: status,
      message,
      error,
      timestamp: new Date().toISOString(),
      path,
    };

    const logContext = { statusCode: status, path, method: request?.method };

    if (status >= 500) {
      // Erreurs serveur : log complet avec stack trace
      logger.error(
        `${request?.method} ${path} - ${status} ${error}`,
        exception,
        logContext,
      );
    } else {
      logger.warn(`${request?.method} ${path} - ${status} ${message}`, logContext);
    }

    reply.status(status).send(errorResponse);
  }
}
