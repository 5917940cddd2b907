/**
 * Shared Resources
 *
 * Centralized exports for components used across the application
 */

// DTOs for the OpenAPI response contract
export * from './dto';

// Swagger decorators for clean controllers
export * from './swagger';

// Testing utilities
export * from './testing/webhook-request.factory';
