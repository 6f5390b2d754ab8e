import {
  CallHandler,
  ExecutionContext,
  Injectable,
  NestInterceptor,
} from '@nestjs/common';
import type { Request, Response as ExpressResponse } from 'express';
import { Observable, map } from 'rxjs';

interface Response<T> {
  statusCode: number;
  message?: string;
  data: T;
}

@Injectable()
export class TransformInterceptor<T>
  implements NestInterceptor<T, Response<T> | T>
{
  public intercept(
    context: ExecutionContext,
    next: CallHandler<T>,
  ): Observable<Response<T> | T> {
    const ctx = context.switchToHttp();
    const request = ctx.getRequest<Request>();

    // Skip transformation for metrics endpoint (Prometheus format)
    if (request.url === '/metrics' || request.path === '/metrics') {
      return next.handle();
    }

    // Server-sent events carry their own framing.
    if ((request.headers.accept ?? '').includes('text/event-stream')) {
      return next.handle();
    }

    return next.handle().pipe(
      map((value) => {
        const statusCode = ctx.getResponse<ExpressResponse>().statusCode;
        let message = 'Success';

        if (statusCode === 201) {
          message = 'Created successfully';
        }

        return { statusCode, data: value, message };
      }),
    );
  }
}
