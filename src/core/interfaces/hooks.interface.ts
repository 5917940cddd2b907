import type { DispatchOutcome } from '../dispatch/event-dispatcher';
import { PayloadSummary } from './envelope.types';
import { Payload } from './payload.types';
import { IncomingRequest } from './request.types';

/**
 * Event-type, signature and payload of a named-provider request
 */
export interface ProviderEvent {
  provider: string;
  eventType?: string;
  signature?: string;
  deliveryId?: string;
  payload: Payload;
}

export interface PayloadReceivedEvent {
  request: IncomingRequest;
  payload: Payload;
  summary: PayloadSummary;
}

export interface ProviderEventReceived {
  request: IncomingRequest;
  event: ProviderEvent;
  outcome: DispatchOutcome;
}

export interface GatewayErrorContext {
  requestId: string;
  path: string;
  provider?: string;
}

/**
 * Extension points for business logic.
 * A hook that throws turns the request into an internal failure.
 */
export interface GatewayHooks {
  /**
   * Called for every payload accepted on the generic endpoint
   */
  onPayload?: (event: PayloadReceivedEvent) => void | Promise<void>;

  /**
   * Called after a provider event has been dispatched
   */
  onProviderEvent?: (event: ProviderEventReceived) => void | Promise<void>;

  /**
   * Called when a request ends in an internal failure
   */
  onError?: (error: Error, context: GatewayErrorContext) => void | Promise<void>;
}
