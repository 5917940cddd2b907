import { HeaderMap, WebhookProviderAdapter } from '../interfaces';
import { getHeader } from '../request/headers';

export enum RouteKind {
  GENERIC = 'generic',
  NAMED_PROVIDER = 'named_provider',
  UNKNOWN_PROVIDER = 'unknown_provider',
}

export interface NamedProviderRoute {
  kind: RouteKind.NAMED_PROVIDER;
  adapter: WebhookProviderAdapter;
  eventType?: string;
  signature?: string;
  deliveryId?: string;
}

export type Route =
  | { kind: RouteKind.GENERIC }
  | NamedProviderRoute
  | { kind: RouteKind.UNKNOWN_PROVIDER; provider: string };

/**
 * Selects the handling strategy for a request.
 *
 * Provider identity comes only from the route taken (/webhook vs
 * /webhook/:provider), never from the body. On the provider path the
 * adapter's event, signature and delivery headers are read and passed on.
 */
export class ProviderRouter {
  private readonly adapters = new Map<string, WebhookProviderAdapter>();

  constructor(adapters: Iterable<WebhookProviderAdapter> = []) {
    for (const adapter of adapters) {
      this.register(adapter);
    }
  }

  register(adapter: WebhookProviderAdapter): void {
    const name = adapter.providerName.toLowerCase();
    if (this.adapters.has(name)) {
      throw new Error(`Provider adapter already registered: ${name}`);
    }
    this.adapters.set(name, adapter);
  }

  getAdapter(provider: string): WebhookProviderAdapter | undefined {
    return this.adapters.get(provider.toLowerCase());
  }

  getAdapters(): WebhookProviderAdapter[] {
    return Array.from(this.adapters.values());
  }

  getProviderNames(): string[] {
    return Array.from(this.adapters.keys());
  }

  route(provider: string | undefined, headers: HeaderMap): Route {
    if (provider === undefined) {
      return { kind: RouteKind.GENERIC };
    }

    const adapter = this.getAdapter(provider);
    if (!adapter) {
      return { kind: RouteKind.UNKNOWN_PROVIDER, provider };
    }

    return {
      kind: RouteKind.NAMED_PROVIDER,
      adapter,
      eventType: nonEmpty(getHeader(headers, adapter.eventHeader)),
      signature: nonEmpty(getHeader(headers, adapter.signatureHeader)),
      deliveryId: adapter.deliveryHeader
        ? nonEmpty(getHeader(headers, adapter.deliveryHeader))
        : undefined,
    };
  }
}

function nonEmpty(value: string | undefined): string | undefined {
  return value === undefined || value.length === 0 ? undefined : value;
}
