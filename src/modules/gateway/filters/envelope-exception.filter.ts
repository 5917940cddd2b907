import {
  ArgumentsHost,
  Catch,
  ExceptionFilter,
  HttpException,
  HttpStatus,
  Inject,
  Logger,
} from '@nestjs/common';
import type { Request, Response } from 'express';
import { GatewayOutcome, OutcomeType, ResponseBuilder } from '../../../core';
import { RESPONSE_BUILDER } from '../constants';

/**
 * Classify a failure raised outside the gateway (routing, body parsing)
 * by its HTTP status
 */
export function outcomeForHttpFailure(
  status: number,
  method: string,
  path: string,
): GatewayOutcome {
  switch (status) {
    case HttpStatus.NOT_FOUND:
    case HttpStatus.METHOD_NOT_ALLOWED:
      return { type: OutcomeType.NOT_FOUND, method, path };
    case HttpStatus.PAYLOAD_TOO_LARGE:
      return { type: OutcomeType.PAYLOAD_TOO_LARGE };
    case HttpStatus.BAD_REQUEST:
    case HttpStatus.UNSUPPORTED_MEDIA_TYPE:
      return { type: OutcomeType.UNREADABLE_BODY };
    default:
      return { type: OutcomeType.INTERNAL_FAILURE };
  }
}

/**
 * Envelope Exception Filter
 *
 * Catches everything that escapes a controller (unknown routes included)
 * and answers with the standard envelope, so no response leaves the
 * service in another shape.
 */
@Catch()
export class EnvelopeExceptionFilter implements ExceptionFilter {
  private readonly logger = new Logger(EnvelopeExceptionFilter.name);

  constructor(
    @Inject(RESPONSE_BUILDER)
    private readonly responses: ResponseBuilder,
  ) {}

  catch(exception: unknown, host: ArgumentsHost): void {
    const http = host.switchToHttp();
    const request = http.getRequest<Request>();
    const response = http.getResponse<Response>();

    const status =
      exception instanceof HttpException
        ? exception.getStatus()
        : HttpStatus.INTERNAL_SERVER_ERROR;

    if (status >= HttpStatus.INTERNAL_SERVER_ERROR) {
      const error = exception instanceof Error ? exception : new Error(String(exception));
      this.logger.error(
        `Unhandled error on ${request.method} ${request.originalUrl}: ${error.message}`,
        error.stack,
      );
    } else {
      this.logger.warn(`${request.method} ${request.originalUrl} rejected with ${status}`);
    }

    const { envelope, httpStatus } = this.responses.build(
      outcomeForHttpFailure(status, request.method, request.path),
    );

    if (response.headersSent) {
      this.logger.error(`Response already sent for ${request.method} ${request.originalUrl}`);
      return;
    }
    response.status(httpStatus).json(envelope);
  }
}
