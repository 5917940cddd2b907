import {
  ConfigurationService,
  createGatewayConfig,
  DEFAULT_REDACTED_HEADERS,
  mergeGatewayConfig,
  parseSecrets,
  validateEnvironment,
} from '../../src';

describe('Configuration', () => {
  describe('validateEnvironment', () => {
    it('should apply defaults for missing variables', () => {
      const env = validateEnvironment({});

      expect(env.HOST).toBe('0.0.0.0');
      expect(env.PORT).toBe(5000);
      expect(env.DEBUG).toBe(false);
      expect(env.VERIFY_SIGNATURES).toBe(false);
      expect(env.MAX_BODY_BYTES).toBe(1048576);
      expect(env.ENABLE_SWAGGER).toBe(true);
      expect(env.GITHUB_WEBHOOK_SECRET).toBeUndefined();
    });

    it('should convert numeric and boolean strings', () => {
      const env = validateEnvironment({
        HOST: '127.0.0.1',
        PORT: '8080',
        DEBUG: 'TRUE',
        VERIFY_SIGNATURES: 'true',
        MAX_BODY_BYTES: '2048',
        ENABLE_SWAGGER: 'false',
        GITHUB_WEBHOOK_SECRET: 'test-secret',
      });

      expect(env.HOST).toBe('127.0.0.1');
      expect(env.PORT).toBe(8080);
      expect(env.DEBUG).toBe(true);
      expect(env.VERIFY_SIGNATURES).toBe(true);
      expect(env.MAX_BODY_BYTES).toBe(2048);
      expect(env.ENABLE_SWAGGER).toBe(false);
      expect(env.GITHUB_WEBHOOK_SECRET).toBe('test-secret');
    });

    it('should treat any value other than true as false', () => {
      expect(validateEnvironment({ DEBUG: 'yes' }).DEBUG).toBe(false);
      expect(validateEnvironment({ DEBUG: '1' }).DEBUG).toBe(false);
    });

    it('should reject invalid values', () => {
      expect(() => validateEnvironment({ PORT: 'not-a-port' })).toThrow(
        /^Invalid environment configuration: PORT: /,
      );
      expect(() => validateEnvironment({ PORT: '70000' })).toThrow(/PORT/);
      expect(() => validateEnvironment({ MAX_BODY_BYTES: '0' })).toThrow(/MAX_BODY_BYTES/);
    });
  });

  describe('parseSecrets', () => {
    it('should split comma-separated secrets and drop blanks', () => {
      expect(parseSecrets('test-secret, old-secret,,')).toEqual(['test-secret', 'old-secret']);
      expect(parseSecrets(undefined)).toEqual([]);
    });
  });

  describe('createGatewayConfig', () => {
    it('should configure the GitHub provider from the environment', () => {
      const config = createGatewayConfig(
        validateEnvironment({
          GITHUB_WEBHOOK_SECRET: 'test-secret',
          VERIFY_SIGNATURES: 'true',
          PORT: '3000',
        }),
      );

      expect(config).toEqual({
        providers: [{ name: 'github', adapter: 'github', secrets: ['test-secret'] }],
        webhooks: { verifySignatures: true, maxBodyBytes: 1048576 },
        api: { enableSwagger: true },
        server: { host: '0.0.0.0', port: 3000 },
        debug: false,
      });
    });
  });

  describe('ConfigurationService', () => {
    it('should expose defaults for an empty configuration', () => {
      const service = new ConfigurationService(mergeGatewayConfig({ providers: [] }));

      expect(service.getProviderNames()).toEqual([]);
      expect(service.isSignatureVerificationEnabled()).toBe(false);
      expect(service.getRedactedHeaders()).toEqual(DEFAULT_REDACTED_HEADERS);
      expect(service.getMaxBodyBytes()).toBe(1048576);
      expect(service.isSwaggerEnabled()).toBe(true);
      expect(service.getServerAddress()).toEqual({ host: '0.0.0.0', port: 5000 });
      expect(service.getLogLevels()).toEqual(['error', 'warn', 'log']);
    });

    it('should normalize provider secrets', () => {
      const service = new ConfigurationService(
        mergeGatewayConfig({
          providers: [{ name: 'GitHub', adapter: 'github', secrets: 'test-secret' }],
          webhooks: { verifySignatures: true },
          debug: true,
        }),
      );

      expect(service.getProviderNames()).toEqual(['github']);
      expect(service.getProviderSecrets()).toEqual(new Map([['github', ['test-secret']]]));
      expect(service.isSignatureVerificationEnabled()).toBe(true);
      expect(service.getMaxBodyBytes()).toBe(1048576);
      expect(service.getLogLevels()).toEqual(['error', 'warn', 'log', 'debug', 'verbose']);
    });
  });
});
