/**
 * Testing utilities
 * Request factories and signing helpers for tests against the gateway
 */

export * from '../_shared/testing/webhook-request.factory';

// Re-export core for convenience in tests
export * from '../core';
