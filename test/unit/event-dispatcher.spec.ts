import {
  EventDispatcher,
  EventHandlerTag,
  GitHubProviderAdapter,
  JsonValue,
  Payload,
  PayloadKind,
} from '../../src';

describe('EventDispatcher', () => {
  let dispatcher: EventDispatcher;

  const jsonPayload = (value: JsonValue): Payload => ({
    kind: PayloadKind.JSON,
    value,
    text: JSON.stringify(value),
  });

  const pushPayload = jsonPayload({
    ref: 'refs/heads/main',
    commits: [{ id: 'a' }, { id: 'b' }],
  });

  beforeEach(() => {
    dispatcher = new EventDispatcher(new GitHubProviderAdapter());
  });

  describe('resolve', () => {
    it('should map known event types to their handlers', () => {
      expect(dispatcher.resolve('push')).toBe(EventHandlerTag.PUSH);
      expect(dispatcher.resolve('pull_request')).toBe(EventHandlerTag.PULL_REQUEST);
    });

    it('should map everything else to OTHER', () => {
      expect(dispatcher.resolve('issues')).toBe(EventHandlerTag.OTHER);
      expect(dispatcher.resolve('PUSH')).toBe(EventHandlerTag.OTHER);
      expect(dispatcher.resolve('')).toBe(EventHandlerTag.OTHER);
      expect(dispatcher.resolve(undefined)).toBe(EventHandlerTag.OTHER);
    });

    it('should not resolve inherited object members', () => {
      expect(dispatcher.resolve('toString')).toBe(EventHandlerTag.OTHER);
      expect(dispatcher.resolve('__proto__')).toBe(EventHandlerTag.OTHER);
    });
  });

  describe('dispatch', () => {
    it('should process push events', () => {
      const outcome = dispatcher.dispatch('push', pushPayload);

      expect(outcome).toEqual({
        handler: EventHandlerTag.PUSH,
        eventType: 'push',
        handled: true,
        message: 'GitHub push event processed',
        details: { ref: 'refs/heads/main', commits: 2 },
      });
    });

    it('should process pull request events', () => {
      const outcome = dispatcher.dispatch('pull_request', jsonPayload({ action: 'opened', number: 7 }));

      expect(outcome.handled).toBe(true);
      expect(outcome.message).toBe('GitHub pull_request event processed');
      expect(outcome.details).toEqual({ action: 'opened', number: 7 });
    });

    it('should accept unknown events as unhandled', () => {
      const outcome = dispatcher.dispatch('issues', pushPayload);

      expect(outcome).toEqual({
        handler: EventHandlerTag.OTHER,
        eventType: 'issues',
        handled: false,
        message: 'Unhandled GitHub event: issues',
        details: {},
      });
    });

    it('should accept a missing event type as unhandled', () => {
      const outcome = dispatcher.dispatch(undefined, pushPayload);

      expect(outcome.handled).toBe(false);
      expect(outcome.message).toBe('Unhandled GitHub event: <none>');
    });

    it('should tolerate payloads of unexpected shape', () => {
      const outcome = dispatcher.dispatch('push', jsonPayload([1, 2]));

      expect(outcome.handled).toBe(true);
      expect(outcome.details).toEqual({});
    });
  });
});
