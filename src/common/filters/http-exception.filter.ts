import {
  ExceptionFilter,
  Catch,
  ArgumentsHost,
  HttpException,
  HttpStatus,
  Logger,
} from "@nestjs/common";
import { Request, Response } from "express";
import {
  ConnectionError,
  DuplicateRecordError,
  StorageError,
  UnsupportedOperationError,
  ValidationError,
} from "../errors/storage.errors";

export interface ErrorResponseBody {
  statusCode: number;
  timestamp: string;
  path: string;
  message: string | string[];
  error?: string;
  stack?: string;
}

interface ResolvedError {
  status: number;
  message: string | string[];
  error?: string;
}

/**
 * Maps domain errors to a status code and a message safe to show clients.
 * Storage and connection details stay in the log.
 */
export const resolveError = (exception: unknown): ResolvedError => {
  if (exception instanceof HttpException) {
    const exceptionResponse = exception.getResponse();
    if (typeof exceptionResponse === "string") {
      return { status: exception.getStatus(), message: exceptionResponse };
    }

    const responseObj: Record<string, unknown> = { ...exceptionResponse };
    const rawMessage = responseObj.message;
    let message: string | string[] = exception.message;
    if (typeof rawMessage === "string") {
      message = rawMessage;
    } else if (Array.isArray(rawMessage)) {
      message = rawMessage.map(String); // ValidationPipe reports one per field
    }
    const error =
      typeof responseObj.error === "string" ? responseObj.error : undefined;
    return { status: exception.getStatus(), message, error };
  }

  if (exception instanceof ConnectionError) {
    return {
      status: HttpStatus.SERVICE_UNAVAILABLE,
      message: "Database unavailable",
      error: exception.name,
    };
  }
  if (exception instanceof DuplicateRecordError) {
    return {
      status: HttpStatus.CONFLICT,
      message: "A record with the same unique fields already exists",
      error: exception.name,
    };
  }
  if (exception instanceof StorageError) {
    return {
      status: HttpStatus.INTERNAL_SERVER_ERROR,
      message: "Internal server error",
      error: exception.name,
    };
  }
  if (exception instanceof UnsupportedOperationError) {
    return {
      status: HttpStatus.NOT_IMPLEMENTED,
      message: exception.message,
      error: exception.name,
    };
  }
  if (exception instanceof ValidationError) {
    return {
      status: HttpStatus.BAD_REQUEST,
      message: exception.message,
      error: exception.name,
    };
  }

  return {
    status: HttpStatus.INTERNAL_SERVER_ERROR,
    message: "Internal server error",
  };
};

/**
 * Global exception filter for consistent error responses.
 * - Hides stack traces in production
 * - Logs 5xx with stack, 4xx as warnings
 */
@Catch()
export class HttpExceptionFilter implements ExceptionFilter {
  private readonly logger = new Logger(HttpExceptionFilter.name);
  private readonly isProduction = process.env.NODE_ENV === "production";

  catch(exception: unknown, host: ArgumentsHost): void {
    const ctx = host.switchToHttp();
    const response = ctx.getResponse<Response>();
    const request = ctx.getRequest<Request>();

    const { status, message, error } = resolveError(exception);

    if (status >= 500) {
      this.logger.error(
        `${request.method} ${request.url} - Status: ${status}`,
        exception instanceof Error ? exception.stack : String(exception),
      );
    } else {
      this.logger.warn(
        `${request.method} ${request.url} - Status: ${status} - Message: ${Array.isArray(message) ? message.join(", ") : message}`,
      );
    }

    const errorResponse: ErrorResponseBody = {
      statusCode: status,
      timestamp: new Date().toISOString(),
      path: request.url,
      message,
      ...(error && { error }),
    };

    // Only include stack trace in development
    if (!this.isProduction && exception instanceof Error) {
      errorResponse.stack = exception.stack;
    }

    response.status(status).json(errorResponse);
  }
}
