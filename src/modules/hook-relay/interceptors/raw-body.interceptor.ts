import {
  Injectable,
  NestInterceptor,
  ExecutionContext,
  CallHandler,
  RawBodyRequest,
} from '@nestjs/common';
import type { Request } from 'express';
import { Observable } from 'rxjs';

/**
 * Raw Body Interceptor
 *
 * Hands providers the request body exactly as received.
 * Expects the raw parser installed by `useRawHookBodies`.
 */
@Injectable()
export class RawBodyInterceptor implements NestInterceptor {
  intercept(context: ExecutionContext, next: CallHandler): Observable<unknown> {
    const request = context.switchToHttp().getRequest<RawBodyRequest<Request>>();
    const body: unknown = request.body;

    if (request.rawBody) {
      request.body = request.rawBody;
    } else if (Buffer.isBuffer(body)) {
      request.rawBody = body;
    } else if (typeof body === 'string') {
      request.rawBody = Buffer.from(body);
      request.body = request.rawBody;
    } else if (isNonEmptyObject(body)) {
      // Parsed without a raw copy; re-serializing is the best available
      request.rawBody = Buffer.from(JSON.stringify(body));
      request.body = request.rawBody;
    } else {
      request.rawBody = Buffer.alloc(0);
      request.body = request.rawBody;
    }

    return next.handle();
  }
}

function isNonEmptyObject(value: unknown): value is object {
  return typeof value === 'object' && value !== null && Object.keys(value).length > 0;
}
