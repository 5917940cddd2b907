/**
 * Centralized Swagger decorators for the gateway API
 *
 * These decorators keep the OpenAPI documentation out of the controllers.
 */

export * from './webhook.decorators';
export * from './health.decorators';
