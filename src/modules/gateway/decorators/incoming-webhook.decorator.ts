import { createParamDecorator, ExecutionContext } from '@nestjs/common';
import type { Request } from 'express';
import { createIncomingRequest, IncomingRequest } from '../../../core';
import { toRawBody } from '../interceptors/raw-body.interceptor';

/**
 * Injects the immutable IncomingRequest view of the current HTTP request
 */
export const IncomingWebhook = createParamDecorator(
  (_data: unknown, context: ExecutionContext): IncomingRequest => {
    const request = context.switchToHttp().getRequest<Request>();

    return createIncomingRequest({
      method: request.method,
      path: request.path,
      headers: request.headers,
      body: toRawBody(request.body),
      remoteAddress: request.ip ?? request.socket.remoteAddress,
    });
  },
);
