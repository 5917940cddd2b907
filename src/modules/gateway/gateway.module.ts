import { DynamicModule, Global, Module, Provider } from '@nestjs/common';
import { APP_FILTER } from '@nestjs/core';
import {
  IngestionGateway,
  ProviderRouter,
  ResponseBuilder,
  WebhookProviderAdapter,
} from '../../core';
import { GitHubProviderAdapter } from '../../adapters/providers';
import {
  GatewayModuleConfig,
  GatewayModuleAsyncConfig,
  mergeGatewayConfig,
} from './gateway.config';
import {
  GATEWAY_CONFIG,
  INGESTION_GATEWAY,
  PROVIDER_ADAPTERS,
  PROVIDER_ROUTER,
  PROVIDER_SECRETS,
  RESPONSE_BUILDER,
} from './constants';
import { WebhookController } from './controllers/webhook.controller';
import { HealthController } from './controllers/health.controller';
import { ConfigurationService } from './services/configuration.service';
import { EnvelopeExceptionFilter } from './filters/envelope-exception.filter';

/**
 * Gateway Module - Main NestJS Module
 *
 * Provides dependency injection and configuration for the webhook gateway
 */
@Global()
@Module({})
export class GatewayModule {
  /**
   * Configure the gateway synchronously
   */
  static forRoot(config: GatewayModuleConfig): DynamicModule {
    return {
      module: GatewayModule,
      providers: [
        {
          provide: GATEWAY_CONFIG,
          useValue: mergeGatewayConfig(config),
        },
        ...this.createProviders(),
      ],
      controllers: [HealthController, WebhookController],
      exports: [GATEWAY_CONFIG, INGESTION_GATEWAY, ConfigurationService],
    };
  }

  /**
   * Configure the gateway asynchronously
   */
  static forRootAsync(options: GatewayModuleAsyncConfig): DynamicModule {
    return {
      module: GatewayModule,
      imports: options.imports || [],
      providers: [
        {
          provide: GATEWAY_CONFIG,
          useFactory: async (...args: unknown[]) =>
            mergeGatewayConfig(await options.useFactory(...args)),
          inject: options.inject || [],
        },
        ...this.createProviders(),
      ],
      controllers: [HealthController, WebhookController],
      exports: [GATEWAY_CONFIG, INGESTION_GATEWAY, ConfigurationService],
    };
  }

  /**
   * Create providers that depend on the resolved configuration
   */
  private static createProviders(): Provider[] {
    return [
      {
        provide: ConfigurationService,
        useClass: ConfigurationService,
      },
      {
        provide: PROVIDER_ADAPTERS,
        useFactory: (configuration: ConfigurationService) => {
          const adapters = new Map<string, WebhookProviderAdapter>();

          for (const providerConfig of configuration.getConfig().providers) {
            adapters.set(
              providerConfig.name.toLowerCase(),
              this.resolveAdapter(providerConfig.name, providerConfig.adapter),
            );
          }

          return adapters;
        },
        inject: [ConfigurationService],
      },
      {
        provide: PROVIDER_SECRETS,
        useFactory: (configuration: ConfigurationService) =>
          configuration.getProviderSecrets(),
        inject: [ConfigurationService],
      },
      {
        provide: PROVIDER_ROUTER,
        useFactory: (adapters: Map<string, WebhookProviderAdapter>) =>
          new ProviderRouter(adapters.values()),
        inject: [PROVIDER_ADAPTERS],
      },
      {
        provide: RESPONSE_BUILDER,
        useFactory: () => new ResponseBuilder(),
      },
      {
        provide: INGESTION_GATEWAY,
        useFactory: (
          configuration: ConfigurationService,
          router: ProviderRouter,
          secrets: Map<string, string[]>,
        ) =>
          new IngestionGateway({
            router,
            secrets,
            verifySignatures: configuration.isSignatureVerificationEnabled(),
            redactHeaders: configuration.getRedactedHeaders(),
            hooks: configuration.getConfig().hooks,
          }),
        inject: [ConfigurationService, PROVIDER_ROUTER, PROVIDER_SECRETS],
      },
      {
        provide: APP_FILTER,
        useClass: EnvelopeExceptionFilter,
      },
    ];
  }

  private static resolveAdapter(
    name: string,
    adapter: GatewayModuleConfig['providers'][number]['adapter'],
  ): WebhookProviderAdapter {
    if (typeof adapter !== 'string') {
      if (adapter.providerName.toLowerCase() !== name.toLowerCase()) {
        throw new Error(
          `Provider adapter '${adapter.providerName}' registered under mismatched name '${name}'`,
        );
      }
      return adapter;
    }

    switch (adapter) {
      case 'github':
        return new GitHubProviderAdapter();
      default:
        throw new Error(`Unknown provider adapter: ${String(adapter)}`);
    }
  }
}
