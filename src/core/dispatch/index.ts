export * from './event-dispatcher';
