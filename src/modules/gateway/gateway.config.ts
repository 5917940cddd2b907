import type { FactoryProvider, ModuleMetadata } from '@nestjs/common';
import { DEFAULT_REDACTED_HEADERS, GatewayHooks, WebhookProviderAdapter } from '../../core';

export type BuiltInProviderAdapter = 'github';

/**
 * Gateway Module Configuration
 */
export interface GatewayModuleConfig {
  /**
   * Named providers served under /webhook/:provider
   */
  providers: Array<{
    /**
     * Route segment (e.g. 'github' for /webhook/github)
     */
    name: string;

    /**
     * Adapter instance or built-in adapter name
     */
    adapter: WebhookProviderAdapter | BuiltInProviderAdapter;

    /**
     * Webhook signature secret(s). An array supports rotation:
     * each secret is tried until one matches.
     */
    secrets?: string | string[];
  }>;

  /**
   * Webhook processing configuration
   */
  webhooks?: {
    /**
     * Reject provider requests whose signature does not verify
     */
    verifySignatures?: boolean;

    /**
     * Header name fragments masked in logs
     */
    redactHeaders?: string[];

    /**
     * Largest accepted request body, in bytes
     */
    maxBodyBytes?: number;
  };

  /**
   * Business logic extension points
   */
  hooks?: GatewayHooks;

  /**
   * API configuration
   */
  api?: {
    enableSwagger?: boolean;
  };

  /**
   * Listen address
   */
  server?: {
    host?: string;
    port?: number;
  };

  debug?: boolean;
}

/**
 * Async configuration factory
 */
export interface GatewayModuleAsyncConfig extends Pick<ModuleMetadata, 'imports'> {
  inject?: FactoryProvider['inject'];
  useFactory: (
    ...args: any[]
  ) => Promise<GatewayModuleConfig> | GatewayModuleConfig;
}

export const DEFAULT_MAX_BODY_BYTES = 1024 * 1024;

/**
 * Default configuration values
 */
export const defaultGatewayConfig: Required<
  Pick<GatewayModuleConfig, 'webhooks' | 'api' | 'server' | 'debug'>
> = {
  webhooks: {
    verifySignatures: false,
    redactHeaders: DEFAULT_REDACTED_HEADERS,
    maxBodyBytes: DEFAULT_MAX_BODY_BYTES,
  },
  api: {
    enableSwagger: true,
  },
  server: {
    host: '0.0.0.0',
    port: 5000,
  },
  debug: false,
};

/**
 * Merge a partial configuration over the defaults, section by section
 */
export function mergeGatewayConfig(config: GatewayModuleConfig): GatewayModuleConfig {
  return {
    ...config,
    webhooks: { ...defaultGatewayConfig.webhooks, ...config.webhooks },
    api: { ...defaultGatewayConfig.api, ...config.api },
    server: { ...defaultGatewayConfig.server, ...config.server },
    debug: config.debug ?? defaultGatewayConfig.debug,
  };
}
