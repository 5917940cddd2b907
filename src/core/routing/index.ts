export * from './provider-router';
