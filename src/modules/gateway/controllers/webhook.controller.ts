import {
  Controller,
  Post,
  Param,
  Res,
  UseInterceptors,
  Inject,
} from '@nestjs/common';
import { ApiTags } from '@nestjs/swagger';
import type { Response } from 'express';
import type { GatewayResponse, IncomingRequest, IngestionGateway } from '../../../core';
import {
  ApiGenericWebhookEndpoint,
  ApiProviderWebhookEndpoint,
} from '../../../_shared/swagger/decorators';
import { RawBodyInterceptor } from '../interceptors/raw-body.interceptor';
import { IncomingWebhook } from '../decorators/incoming-webhook.decorator';
import { INGESTION_GATEWAY } from '../constants';

/**
 * Webhook Controller
 *
 * HTTP entry points for webhook senders. All classification, dispatch and
 * error translation happens in the IngestionGateway; this controller only
 * writes the envelope and status it returns.
 */
@ApiTags('Ingest')
@Controller('webhook')
@UseInterceptors(RawBodyInterceptor)
export class WebhookController {
  constructor(
    @Inject(INGESTION_GATEWAY)
    private readonly gateway: IngestionGateway,
  ) {}

  @Post()
  @ApiGenericWebhookEndpoint()
  async handleGeneric(
    @IncomingWebhook() request: IncomingRequest,
    @Res() res: Response,
  ): Promise<void> {
    this.send(res, await this.gateway.handleGeneric(request));
  }

  @Post(':provider')
  @ApiProviderWebhookEndpoint()
  async handleProvider(
    @Param('provider') provider: string,
    @IncomingWebhook() request: IncomingRequest,
    @Res() res: Response,
  ): Promise<void> {
    this.send(res, await this.gateway.handleProvider(provider, request));
  }

  private send(res: Response, { envelope, httpStatus }: GatewayResponse): void {
    res.status(httpStatus).json(envelope);
  }
}
