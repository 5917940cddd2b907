/**
 * Webhook Ingestion Gateway
 *
 * Accepts webhooks from generic senders and named providers, classifies
 * and dispatches them, and acknowledges every request with a uniform
 * response envelope.
 */
import 'reflect-metadata';

// Core: decoding, routing, dispatch, response envelopes
export * from './core';

// Provider adapters
export * from './adapters/providers';

// NestJS module, controllers, filter and HTTP wiring
export * from './modules';

// Environment validation and config factory
export * from './config';

// OpenAPI DTOs, Swagger decorators and testing utilities
export * from './_shared';
