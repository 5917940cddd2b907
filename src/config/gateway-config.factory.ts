import type { GatewayModuleConfig } from '../modules/gateway/gateway.config';
import type { EnvironmentVariables } from './environment.validation';

/**
 * Split a comma-separated secret list, dropping blanks
 */
export function parseSecrets(value: string | undefined): string[] {
  return (value ?? '')
    .split(',')
    .map((secret) => secret.trim())
    .filter((secret) => secret.length > 0);
}

/**
 * Gateway configuration for the standalone service, derived from the environment
 */
export function createGatewayConfig(env: EnvironmentVariables): GatewayModuleConfig {
  return {
    providers: [
      {
        name: 'github',
        adapter: 'github',
        secrets: parseSecrets(env.GITHUB_WEBHOOK_SECRET),
      },
    ],
    webhooks: {
      verifySignatures: env.VERIFY_SIGNATURES,
      maxBodyBytes: env.MAX_BODY_BYTES,
    },
    api: {
      enableSwagger: env.ENABLE_SWAGGER,
    },
    server: {
      host: env.HOST,
      port: env.PORT,
    },
    debug: env.DEBUG,
  };
}
