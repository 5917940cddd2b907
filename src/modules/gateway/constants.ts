/**
 * Injection tokens for the gateway module
 */

export const GATEWAY_CONFIG = Symbol('GATEWAY_CONFIG');
export const PROVIDER_ADAPTERS = Symbol('PROVIDER_ADAPTERS');
export const PROVIDER_SECRETS = Symbol('PROVIDER_SECRETS');
export const PROVIDER_ROUTER = Symbol('PROVIDER_ROUTER');
export const RESPONSE_BUILDER = Symbol('RESPONSE_BUILDER');
export const INGESTION_GATEWAY = Symbol('INGESTION_GATEWAY');
