/**
 * Example: Embedding the webhook gateway in a NestJS application
 *
 * The gateway module serves GET /, POST /webhook and POST /webhook/:provider.
 * Business logic plugs in through hooks; the gateway always answers with
 * the standard envelope.
 */

import { Injectable, Logger, Module } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import type { NestExpressApplication } from '@nestjs/platform-express';
import {
  configureWebhookHttp,
  createIncomingRequest,
  EventHandlerTag,
  GatewayModule,
  GitHubProviderAdapter,
  IngestionGateway,
  PayloadKind,
  ProviderEventReceived,
  ProviderRouter,
} from '../src';

// deployment.service.ts
@Injectable()
export class DeploymentService {
  private readonly logger = new Logger(DeploymentService.name);

  async onGitHubEvent({ event, outcome }: ProviderEventReceived): Promise<void> {
    if (outcome.handler !== EventHandlerTag.PUSH || event.payload.kind !== PayloadKind.JSON) {
      return;
    }
    this.logger.log(`Queueing deployment for delivery ${event.deliveryId ?? 'unknown'}`);
  }
}

const deployments = new DeploymentService();

// app.module.ts
@Module({
  imports: [
    GatewayModule.forRoot({
      providers: [
        {
          name: 'github',
          adapter: 'github',
          secrets: (process.env.GITHUB_WEBHOOK_SECRET ?? '').split(','),
        },
      ],
      webhooks: {
        verifySignatures: process.env.VERIFY_SIGNATURES === 'true',
      },
      hooks: {
        onProviderEvent: (received) => deployments.onGitHubEvent(received),
        onError: (error, context) => {
          Logger.error(`Webhook ${context.requestId} failed: ${error.message}`, error.stack);
        },
      },
    }),
  ],
})
export class AppModule {}

// main.ts
export async function bootstrap(): Promise<void> {
  const app = await NestFactory.create<NestExpressApplication>(AppModule, {
    bodyParser: false,
  });
  configureWebhookHttp(app, { maxBodyBytes: 1024 * 1024 });
  await app.listen(3000);
}

// Without NestJS: the core gateway works on any request source
export async function handleOutsideNest(): Promise<void> {
  const gateway = new IngestionGateway({
    router: new ProviderRouter([new GitHubProviderAdapter()]),
  });

  const { envelope, httpStatus } = await gateway.handleProvider(
    'github',
    createIncomingRequest({
      method: 'POST',
      path: '/webhook/github',
      headers: { 'content-type': 'application/json', 'x-github-event': 'ping' },
      body: Buffer.from('{"zen":"Keep it logically awesome."}'),
    }),
  );

  Logger.log(`${httpStatus} ${envelope.message}`);
}
