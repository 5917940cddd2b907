/**
 * Webhook Ingestion Gateway - NestJS modules
 */

export * from './gateway';
