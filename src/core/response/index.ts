export * from './response-builder';
