// Interface and type exports
export * from './json.types';
export * from './payload.types';
export * from './request.types';
export * from './envelope.types';
export * from './provider.adapter';
export * from './hooks.interface';
export * from './logger.interface';
