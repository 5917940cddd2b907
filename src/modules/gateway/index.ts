/**
 * Gateway NestJS Module
 *
 * Main module for serving the webhook gateway from a NestJS application
 */

// Main module
export { GatewayModule } from './gateway.module';

// Configuration
export {
  GatewayModuleConfig,
  GatewayModuleAsyncConfig,
  defaultGatewayConfig,
  mergeGatewayConfig,
} from './gateway.config';

// Controllers
export * from './controllers';

// Services
export { ConfigurationService } from './services/configuration.service';

// Request handling
export { RawBodyInterceptor } from './interceptors/raw-body.interceptor';
export { IncomingWebhook } from './decorators/incoming-webhook.decorator';
export { EnvelopeExceptionFilter } from './filters/envelope-exception.filter';
export { configureWebhookHttp } from './http/configure-http';

// Injection tokens
export * from './constants';
