import {
  CallHandler,
  ExecutionContext,
  Injectable,
  NestInterceptor,
} from '@nestjs/common';
import type { Request, Response } from 'express';
import { Observable } from 'rxjs';
import { tap } from 'rxjs/operators';

import { MetricsService } from './metrics.service';

function statusOf(error: unknown): number {
  if (
    typeof error === 'object' &&
    error !== null &&
    'status' in error &&
    typeof error.status === 'number'
  ) {
    return error.status;
  }
  return 500;
}

@Injectable()
export class MetricsInterceptor implements NestInterceptor {
  constructor(private readonly metricsService: MetricsService) {}

  intercept(context: ExecutionContext, next: CallHandler): Observable<unknown> {
    const http = context.switchToHttp();
    const request = http.getRequest<Request>();
    const response = http.getResponse<Response>();
    const { method } = request;
    // Route pattern, not the raw URL, to keep label cardinality bounded.
    const route: unknown = request.route;
    const routePath =
      typeof route === 'object' &&
      route !== null &&
      'path' in route &&
      typeof route.path === 'string'
        ? route.path
        : request.path;

    const startTime = Date.now();
    let recorded = false;
    const record = (statusCode: number) => {
      if (recorded) {
        return;
      }
      recorded = true;
      const duration = (Date.now() - startTime) / 1000;
      this.metricsService.recordHttpRequest(
        method,
        routePath,
        statusCode,
        duration,
      );
    };

    return next.handle().pipe(
      tap({
        next: () => record(response.statusCode || 200),
        complete: () => record(response.statusCode || 200),
        error: (error: unknown) => record(statusOf(error)),
      }),
    );
  }
}
