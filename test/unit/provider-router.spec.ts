import { GitHubProviderAdapter, ProviderRouter, RouteKind } from '../../src';

describe('ProviderRouter', () => {
  let router: ProviderRouter;

  beforeEach(() => {
    router = new ProviderRouter([new GitHubProviderAdapter()]);
  });

  it('should route requests without a provider to the generic path', () => {
    expect(router.route(undefined, {})).toEqual({ kind: RouteKind.GENERIC });
  });

  it('should route a registered provider case-insensitively', () => {
    const route = router.route('GitHub', {
      'x-github-event': 'push',
      'x-hub-signature-256': 'sha256=abc',
      'x-github-delivery': 'delivery-1',
    });

    expect(route.kind).toBe(RouteKind.NAMED_PROVIDER);
    if (route.kind !== RouteKind.NAMED_PROVIDER) return;
    expect(route.adapter.providerName).toBe('github');
    expect(route.eventType).toBe('push');
    expect(route.signature).toBe('sha256=abc');
    expect(route.deliveryId).toBe('delivery-1');
  });

  it('should leave missing and empty headers undefined', () => {
    const route = router.route('github', { 'x-github-event': '' });

    expect(route).toMatchObject({
      kind: RouteKind.NAMED_PROVIDER,
      eventType: undefined,
      signature: undefined,
      deliveryId: undefined,
    });
  });

  it('should report unknown providers', () => {
    expect(router.route('gitlab', {})).toEqual({
      kind: RouteKind.UNKNOWN_PROVIDER,
      provider: 'gitlab',
    });
  });

  it('should reject duplicate registrations', () => {
    expect(() => router.register(new GitHubProviderAdapter())).toThrow(
      'Provider adapter already registered: github',
    );
  });

  it('should list registered providers', () => {
    expect(router.getProviderNames()).toEqual(['github']);
    expect(router.getAdapters()).toHaveLength(1);
    expect(router.getAdapter('GITHUB')).toBeInstanceOf(GitHubProviderAdapter);
  });
});
