import {
  Injectable,
  NestInterceptor,
  ExecutionContext,
  CallHandler,
  Logger,
} from "@nestjs/common";
import { Observable } from "rxjs";
import { tap } from "rxjs/operators";
import { Request, Response } from "express";

const SLOW_REQUEST_MS = 1000;
const MUTATING_METHODS = new Set(["POST", "PUT", "PATCH", "DELETE"]);

/**
 * Global logging interceptor for HTTP requests.
 *
 * Only logs interesting events:
 * - Writes (POST/PUT/PATCH/DELETE)
 * - Error statuses reached without an exception
 * - Slow requests (>1000ms)
 *
 * Reads are not logged; thrown errors are logged by HttpExceptionFilter.
 */
@Injectable()
export class LoggingInterceptor implements NestInterceptor {
  private readonly logger = new Logger("HTTP");

  intercept(context: ExecutionContext, next: CallHandler): Observable<unknown> {
    const ctx = context.switchToHttp();
    const request = ctx.getRequest<Request>();
    const response = ctx.getResponse<Response>();

    const { method, url, ip } = request;
    const startTime = Date.now();

    return next.handle().pipe(
      tap(() => {
        const { statusCode } = response;
        const responseTime = Date.now() - startTime;

        const isError = statusCode >= 400;
        const isSlow = responseTime > SLOW_REQUEST_MS;
        const isWrite = MUTATING_METHODS.has(method);

        if (isError || isSlow || isWrite) {
          this.logger.log(
            `${method} ${url} ${statusCode} - ${responseTime}ms - ${ip ?? "-"}`,
          );
        }
      }),
    );
  }
}
