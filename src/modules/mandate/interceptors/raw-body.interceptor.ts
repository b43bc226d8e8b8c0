import {
  Injectable,
  NestInterceptor,
  ExecutionContext,
  CallHandler,
} from '@nestjs/common';
import type { Request } from 'express';
import { Observable } from 'rxjs';

type RawBodyRequest = Request & { rawBody?: Buffer };

/**
 * Raw Body Interceptor
 *
 * Hands the exact request bytes to the handler so inbound signatures can be
 * checked. Requires the application to be created with `rawBody: true`.
 */
@Injectable()
export class RawBodyInterceptor implements NestInterceptor {
  intercept(context: ExecutionContext, next: CallHandler): Observable<unknown> {
    const request = context.switchToHttp().getRequest<RawBodyRequest>();

    if (request.rawBody) {
      request.body = request.rawBody;
    } else if (Buffer.isBuffer(request.body)) {
      request.rawBody = request.body;
    } else if (typeof request.body === 'string') {
      request.rawBody = Buffer.from(request.body);
      request.body = request.rawBody;
    } else if (request.body && typeof request.body === 'object') {
      // Re-serialized bodies rarely match the sender's signature
      request.rawBody = Buffer.from(JSON.stringify(request.body));
      request.body = request.rawBody;
    }

    return next.handle();
  }
}
