import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import type { NestExpressApplication } from '@nestjs/platform-express';
import { SwaggerModule, DocumentBuilder } from '@nestjs/swagger';
import { AppModule } from './app.module';
import { ConfigurationService, configureWebhookHttp } from './modules';

async function bootstrap() {
  const app = await NestFactory.create<NestExpressApplication>(AppModule, {
    bodyParser: false,
    bufferLogs: true,
  });

  const configuration = app.get(ConfigurationService);
  app.useLogger(configuration.getLogLevels());

  configureWebhookHttp(app, { maxBodyBytes: configuration.getMaxBodyBytes() });

  if (configuration.isSwaggerEnabled()) {
    const config = new DocumentBuilder()
      .setTitle('Webhook Ingestion Gateway')
      .setDescription(
        'Accepts webhooks from generic senders and named providers, classifies and dispatches them, and acknowledges every request with a uniform envelope.',
      )
      .setVersion('0.1.0')
      .addTag('Ingest', 'Receive generic and provider webhooks')
      .addTag('Health', 'Service liveness')
      .build();

    const document = SwaggerModule.createDocument(app, config);
    SwaggerModule.setup('api', app, document);
  }

  const { host, port } = configuration.getServerAddress();
  const logger = new Logger('Bootstrap');
  logger.log(`Starting webhook gateway on ${host}:${port}`);

  await app.listen(port, host);

  logger.log(`Providers: ${configuration.getProviderNames().join(', ') || 'none'}`);
  if (configuration.isSignatureVerificationEnabled()) {
    logger.log('Provider signature verification enabled');
  } else {
    logger.warn('Provider signature verification disabled; signatures are logged only');
  }
  if (configuration.isSwaggerEnabled()) {
    logger.log(`OpenAPI documentation available at http://${host}:${port}/api`);
  }
}

bootstrap().catch((error: unknown) => {
  const logger = new Logger('Bootstrap');
  logger.error(
    `Failed to start webhook gateway: ${error instanceof Error ? error.message : String(error)}`,
    error instanceof Error ? error.stack : undefined,
  );
  process.exit(1);
});
