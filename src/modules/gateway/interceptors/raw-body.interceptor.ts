import {
  Injectable,
  NestInterceptor,
  ExecutionContext,
  CallHandler,
} from '@nestjs/common';
import type { Request } from 'express';
import { Observable } from 'rxjs';

/**
 * Coerce whatever the body parser left on the request into raw bytes.
 * Requests without a body end up with an empty buffer.
 */
export function toRawBody(body: unknown): Buffer {
  if (Buffer.isBuffer(body)) {
    return body;
  }
  if (typeof body === 'string') {
    return Buffer.from(body, 'utf8');
  }
  return Buffer.alloc(0);
}

/**
 * Raw Body Interceptor
 *
 * Guarantees request.body is the raw request bytes, as needed for
 * content-type driven decoding and signature verification
 */
@Injectable()
export class RawBodyInterceptor implements NestInterceptor {
  intercept(context: ExecutionContext, next: CallHandler): Observable<unknown> {
    const request = context.switchToHttp().getRequest<Request>();
    request.body = toRawBody(request.body);
    return next.handle();
  }
}
