import { EventHandlerTag } from '../domain/enums';
import { EventDetails, Payload, WebhookProviderAdapter } from '../interfaces';

/**
 * Result of dispatching one provider event
 */
export interface DispatchOutcome {
  handler: EventHandlerTag;
  eventType?: string;
  handled: boolean;
  message: string;
  details: EventDetails;
}

/**
 * Switches a provider event onto its handler branch.
 *
 * Resolution is an exact lookup in the adapter's event map; anything not in
 * the map (including a missing event type) lands on OTHER, which is accepted
 * as unhandled rather than rejected.
 */
export class EventDispatcher {
  private readonly handlers: ReadonlyMap<string, EventHandlerTag>;

  constructor(private readonly adapter: WebhookProviderAdapter) {
    this.handlers = new Map(Object.entries(adapter.eventHandlers));
  }

  resolve(eventType: string | undefined): EventHandlerTag {
    if (eventType === undefined) {
      return EventHandlerTag.OTHER;
    }
    return this.handlers.get(eventType) ?? EventHandlerTag.OTHER;
  }

  dispatch(eventType: string | undefined, payload: Payload): DispatchOutcome {
    const handler = this.resolve(eventType);
    const { displayName } = this.adapter;

    if (eventType === undefined || handler === EventHandlerTag.OTHER) {
      return {
        handler: EventHandlerTag.OTHER,
        eventType,
        handled: false,
        message: `Unhandled ${displayName} event: ${eventType ?? '<none>'}`,
        details: {},
      };
    }

    return {
      handler,
      eventType,
      handled: true,
      message: `${displayName} ${eventType} event processed`,
      details: this.adapter.describeEvent(handler, payload),
    };
  }
}
