/**
 * Gateway core - request classification and dispatch, free of HTTP framework wiring
 */

// Domain enums
export * from './domain/enums';

// Interfaces and contracts
export * from './interfaces';

// Errors
export * from './errors';

// Request view and header helpers
export * from './request';

// Decode -> route -> dispatch -> build
export * from './decoding';
export * from './routing';
export * from './dispatch';
export * from './response';

// Signature verification
export * from './security';

// Orchestration
export * from './gateway';
