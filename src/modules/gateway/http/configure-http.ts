import { Logger } from '@nestjs/common';
import type { NestExpressApplication } from '@nestjs/platform-express';
import { raw } from 'express';
import type { ErrorRequestHandler } from 'express';
import { ResponseBuilder } from '../../../core';
import { outcomeForHttpFailure } from '../filters/envelope-exception.filter';

export interface WebhookHttpOptions {
  /**
   * Largest accepted request body, in bytes
   */
  maxBodyBytes: number;
  responses?: ResponseBuilder;
}

/**
 * Body-parser errors carry the HTTP status they map to
 */
function statusOf(error: unknown): number {
  if (typeof error === 'object' && error !== null && 'status' in error) {
    const { status } = error;
    if (typeof status === 'number') return status;
  }
  return 500;
}

/**
 * Install raw body capture for every content type.
 *
 * Must run before the application is initialized so the parser sits ahead
 * of the routes. The application has to be created with bodyParser: false;
 * decoding is done by the gateway from the raw bytes. Body-read failures
 * (too large, aborted) are answered here with the standard envelope since
 * they never reach a controller.
 */
export function configureWebhookHttp(
  app: NestExpressApplication,
  options: WebhookHttpOptions,
): void {
  const logger = new Logger('WebhookHttp');
  const responses = options.responses ?? new ResponseBuilder();

  app.use(raw({ type: () => true, limit: options.maxBodyBytes }));

  const bodyErrorHandler: ErrorRequestHandler = (error, req, res, next) => {
    if (res.headersSent) {
      next(error);
      return;
    }

    const status = statusOf(error);
    logger.warn(
      `Request body rejected on ${req.method} ${req.originalUrl} (${status}): ${
        error instanceof Error ? error.message : String(error)
      }`,
    );

    const { envelope, httpStatus } = responses.build(
      outcomeForHttpFailure(status, req.method, req.path),
    );
    res.status(httpStatus).json(envelope);
  };
  app.use(bodyErrorHandler);
}
