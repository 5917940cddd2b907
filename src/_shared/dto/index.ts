/**
 * DTOs describing the gateway's response contract in the OpenAPI document
 */

export * from './envelope.dto';
