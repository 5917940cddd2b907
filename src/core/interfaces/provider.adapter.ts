import { EventHandlerTag } from '../domain/enums';
import { Payload } from './payload.types';
import { HeaderMap } from './request.types';

/**
 * Explicit event-type to handler mapping.
 * Strings absent from the map resolve to EventHandlerTag.OTHER.
 */
export type EventHandlerMap = Readonly<Record<string, EventHandlerTag>>;

/**
 * Loggable facts read from a provider payload
 */
export type EventDetails = Readonly<Record<string, string | number>>;

/**
 * Webhook provider adapter - captures one sender's header conventions
 * and event switch. Register more adapters to support more providers.
 */
export interface WebhookProviderAdapter {
  /**
   * Route segment identifying the provider (e.g. 'github' for /webhook/github)
   */
  readonly providerName: string;

  /**
   * Human-readable name used in response messages
   */
  readonly displayName: string;

  /**
   * Header carrying the event type (lower-case)
   */
  readonly eventHeader: string;

  /**
   * Header carrying the payload signature (lower-case)
   */
  readonly signatureHeader: string;

  /**
   * Header carrying the provider's delivery id, if the provider sends one
   */
  readonly deliveryHeader?: string;

  readonly eventHandlers: EventHandlerMap;

  /**
   * Verify the payload signature against any of the given secrets
   * (supports rotation)
   */
  verifySignature(rawBody: Buffer, headers: HeaderMap, secrets: string[]): boolean;

  /**
   * Extract loggable details for a handled event.
   * Must tolerate any payload shape.
   */
  describeEvent(handler: EventHandlerTag, payload: Payload): EventDetails;
}
