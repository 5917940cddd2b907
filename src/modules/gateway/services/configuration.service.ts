import { Injectable, Inject, LogLevel } from '@nestjs/common';
import { DEFAULT_REDACTED_HEADERS } from '../../../core';
import {
  DEFAULT_MAX_BODY_BYTES,
  defaultGatewayConfig,
  type GatewayModuleConfig,
} from '../gateway.config';
import { GATEWAY_CONFIG } from '../constants';

/**
 * Configuration Service
 *
 * Provides access to the resolved gateway configuration
 */
@Injectable()
export class ConfigurationService {
  constructor(
    @Inject(GATEWAY_CONFIG)
    private readonly config: GatewayModuleConfig,
  ) {}

  /**
   * Get full configuration
   */
  getConfig(): GatewayModuleConfig {
    return this.config;
  }

  /**
   * Names of the configured providers
   */
  getProviderNames(): string[] {
    return this.config.providers.map((provider) => provider.name.toLowerCase());
  }

  /**
   * Secrets per provider name, normalized to arrays
   */
  getProviderSecrets(): Map<string, string[]> {
    const secrets = new Map<string, string[]>();

    for (const provider of this.config.providers) {
      const configured = provider.secrets ?? [];
      const list = Array.isArray(configured) ? configured : [configured];
      secrets.set(
        provider.name.toLowerCase(),
        list.filter((secret) => secret.length > 0),
      );
    }

    return secrets;
  }

  /**
   * Check if signature verification is enabled
   */
  isSignatureVerificationEnabled(): boolean {
    return this.config.webhooks?.verifySignatures === true;
  }

  getRedactedHeaders(): string[] {
    return this.config.webhooks?.redactHeaders ?? DEFAULT_REDACTED_HEADERS;
  }

  getMaxBodyBytes(): number {
    return this.config.webhooks?.maxBodyBytes ?? DEFAULT_MAX_BODY_BYTES;
  }

  /**
   * Check if debug mode is enabled
   */
  isDebugMode(): boolean {
    return this.config.debug === true;
  }

  /**
   * Log levels for the application logger; debug mode adds debug and verbose
   */
  getLogLevels(): LogLevel[] {
    return this.isDebugMode()
      ? ['error', 'warn', 'log', 'debug', 'verbose']
      : ['error', 'warn', 'log'];
  }

  /**
   * Check if Swagger is enabled
   */
  isSwaggerEnabled(): boolean {
    return this.config.api?.enableSwagger !== false;
  }

  getServerAddress(): { host: string; port: number } {
    return {
      host: this.config.server?.host ?? defaultGatewayConfig.server.host ?? '0.0.0.0',
      port: this.config.server?.port ?? defaultGatewayConfig.server.port ?? 5000,
    };
  }
}
