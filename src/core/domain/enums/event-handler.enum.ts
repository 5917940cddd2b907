/**
 * Handler branches a provider event can be dispatched to.
 * Every event-type string resolves to exactly one of these.
 */
export enum EventHandlerTag {
  PUSH = 'push',
  PULL_REQUEST = 'pull_request',

  /**
   * Unknown, empty or missing event type; accepted but not processed
   */
  OTHER = 'other',
}
