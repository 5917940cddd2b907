export * from './payload-summary';
export * from './ingestion-gateway';
