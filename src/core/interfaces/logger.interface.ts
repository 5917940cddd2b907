/**
 * Subset of the NestJS LoggerService used by the gateway core
 */
export interface GatewayLogger {
  log(message: string): void;
  warn(message: string): void;
  error(message: string, stack?: string): void;
  debug(message: string): void;
}
