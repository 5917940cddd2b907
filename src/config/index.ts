export * from './environment.validation';
export * from './gateway-config.factory';
