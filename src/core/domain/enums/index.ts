export * from './payload-kind.enum';
export * from './event-handler.enum';
export * from './envelope-status.enum';
export * from './outcome-type.enum';
