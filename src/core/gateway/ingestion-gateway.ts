import { Logger } from '@nestjs/common';
import { OutcomeType } from '../domain/enums';
import { decode } from '../decoding';
import { EventDispatcher } from '../dispatch';
import {
  MalformedPayloadError,
  SignatureVerificationError,
  UnknownProviderError,
  UnreadableBodyError,
} from '../errors';
import {
  GatewayHooks,
  GatewayLogger,
  GatewayOutcome,
  GatewayResponse,
  IncomingRequest,
  Payload,
  ProviderEvent,
  ProviderEventSummary,
  WebhookProviderAdapter,
} from '../interfaces';
import { getHeader, readFormFields, redactHeaders } from '../request';
import {
  Clock,
  DEFAULT_INTERNAL_FAILURE_MESSAGE,
  outcomeFromError,
  ResponseBuilder,
  systemClock,
} from '../response';
import { ProviderRouter, RouteKind } from '../routing';
import { payloadTypeTag, serializePayload, summarizePayload } from './payload-summary';

export const DEFAULT_REDACTED_HEADERS = [
  'authorization',
  'cookie',
  'signature',
  'secret',
  'token',
];

export interface IngestionGatewayConfig {
  router: ProviderRouter;

  /**
   * Webhook secrets per provider name; several entries allow rotation
   */
  secrets?: Map<string, string[]>;

  /**
   * Reject provider requests whose signature does not verify.
   * Off by default: the signature is captured and logged only.
   */
  verifySignatures?: boolean;

  /**
   * Header name fragments whose values are masked in logs
   */
  redactHeaders?: string[];

  hooks?: GatewayHooks;
  clock?: Clock;
  logger?: GatewayLogger;
}

/**
 * IngestionGateway composes decode -> route -> dispatch -> build per request.
 *
 * Every call resolves to exactly one envelope/status pair; no exception
 * escapes. Malformed JSON on the generic path maps to 400; on a provider
 * path any body failure is a 500, like everything unexpected, with a generic
 * message while the cause goes to the log.
 */
export class IngestionGateway {
  private readonly router: ProviderRouter;
  private readonly secrets: Map<string, string[]>;
  private readonly verifySignatures: boolean;
  private readonly redactPatterns: string[];
  private readonly hooks?: GatewayHooks;
  private readonly clock: Clock;
  private readonly logger: GatewayLogger;
  private readonly responses: ResponseBuilder;
  private readonly dispatchers = new Map<string, EventDispatcher>();

  constructor(config: IngestionGatewayConfig) {
    this.router = config.router;
    this.secrets = config.secrets ?? new Map();
    this.verifySignatures = config.verifySignatures ?? false;
    this.redactPatterns = config.redactHeaders ?? DEFAULT_REDACTED_HEADERS;
    this.hooks = config.hooks;
    this.clock = config.clock ?? systemClock;
    this.logger = config.logger ?? new Logger(IngestionGateway.name);
    this.responses = new ResponseBuilder(this.clock);

    for (const adapter of this.router.getAdapters()) {
      this.dispatchers.set(adapter.providerName.toLowerCase(), new EventDispatcher(adapter));
    }
  }

  health(): GatewayResponse {
    return this.responses.health('Webhook gateway is running');
  }

  /**
   * POST /webhook - decode and summarize any payload
   */
  async handleGeneric(request: IncomingRequest): Promise<GatewayResponse> {
    try {
      this.logReceipt(request);

      const payload = await this.decodeBody(request);
      const serialized = serializePayload(payload);
      this.logger.debug(`Webhook payload [${request.id}]: ${serialized}`);

      const summary = summarizePayload(payload, request.receivedAt, serialized);
      await this.hooks?.onPayload?.({ request, payload, summary });

      return this.responses.build({
        type: OutcomeType.ACCEPTED,
        message: 'Webhook processed successfully',
        data: summary,
      });
    } catch (error) {
      return this.fail(error, request, outcomeFromError(error, DEFAULT_INTERNAL_FAILURE_MESSAGE));
    }
  }

  /**
   * POST /webhook/:provider - route by provider, dispatch on the event header
   */
  async handleProvider(provider: string, request: IncomingRequest): Promise<GatewayResponse> {
    const adapter = this.router.getAdapter(provider);
    const failureMessage = adapter
      ? `Failed to process ${adapter.displayName} webhook`
      : 'Failed to process webhook';

    try {
      const route = this.router.route(provider, request.headers);
      if (route.kind === RouteKind.UNKNOWN_PROVIDER) {
        throw new UnknownProviderError(route.provider);
      }
      if (route.kind !== RouteKind.NAMED_PROVIDER) {
        throw new Error(`Unexpected route for provider webhook: ${route.kind}`);
      }

      const { eventType, signature, deliveryId } = route;
      const displayName = route.adapter.displayName;

      this.logger.log(
        `${displayName} webhook event: ${eventType ?? '<none>'} [${request.id}]` +
          (deliveryId ? ` delivery=${deliveryId}` : ''),
      );
      this.logger.log(
        `${displayName} signature header ${route.adapter.signatureHeader}: ${signature ? 'present' : 'absent'}`,
      );

      const signatureVerified = this.checkSignature(route.adapter, request);

      const payload = await this.decodeBody(request);
      const outcome = this.dispatcherFor(route.adapter).dispatch(eventType, payload);

      if (outcome.handled) {
        this.logger.log(`Processing ${outcome.handler} event${formatDetails(outcome.details)}`);
      } else {
        this.logger.log(outcome.message);
      }

      const event: ProviderEvent = {
        provider: route.adapter.providerName,
        eventType,
        signature,
        deliveryId,
        payload,
      };
      await this.hooks?.onProviderEvent?.({ request, event, outcome });

      const summary: ProviderEventSummary = {
        provider: route.adapter.providerName,
        event_type: eventType ?? null,
        handler: outcome.handler,
        handled: outcome.handled,
        delivery_id: deliveryId ?? null,
        signature_verified: signatureVerified,
        payload_type: payloadTypeTag(payload),
      };

      return this.responses.build({
        type: OutcomeType.ACCEPTED,
        message: outcome.message,
        data: summary,
      });
    } catch (error) {
      // An unreadable body is a processing failure here, not a client error
      const outcome: GatewayOutcome =
        error instanceof MalformedPayloadError || error instanceof UnreadableBodyError
          ? { type: OutcomeType.INTERNAL_FAILURE, message: failureMessage }
          : outcomeFromError(error, failureMessage);
      return this.fail(error, request, outcome, provider);
    }
  }

  /**
   * Returns whether the signature was verified. Throws only when
   * verification is enabled and the signature does not match.
   */
  private checkSignature(adapter: WebhookProviderAdapter, request: IncomingRequest): boolean {
    if (!this.verifySignatures) {
      return false;
    }

    const secrets = this.secrets.get(adapter.providerName.toLowerCase()) ?? [];
    if (secrets.length === 0) {
      throw new SignatureVerificationError(
        `No secrets configured for provider: ${adapter.providerName}`,
        adapter.providerName,
      );
    }

    if (!adapter.verifySignature(request.body, request.headers, secrets)) {
      throw new SignatureVerificationError(
        'Signature verification failed',
        adapter.providerName,
      );
    }

    return true;
  }

  private async decodeBody(request: IncomingRequest): Promise<Payload> {
    const formFields = await readFormFields(request.headers, request.body);
    return decode(request.headers, request.body, formFields);
  }

  private dispatcherFor(adapter: WebhookProviderAdapter): EventDispatcher {
    const name = adapter.providerName.toLowerCase();
    let dispatcher = this.dispatchers.get(name);
    if (!dispatcher) {
      dispatcher = new EventDispatcher(adapter);
      this.dispatchers.set(name, dispatcher);
    }
    return dispatcher;
  }

  private logReceipt(request: IncomingRequest): void {
    const contentType = getHeader(request.headers, 'content-type') ?? '';

    this.logger.log(
      `Webhook received from IP: ${request.remoteAddress ?? 'unknown'} [${request.id}]`,
    );
    this.logger.log(`Content-Type: ${contentType}`);
    this.logger.debug(
      `Headers: ${JSON.stringify(redactHeaders(request.headers, this.redactPatterns))}`,
    );
  }

  private async fail(
    error: unknown,
    request: IncomingRequest,
    outcome: GatewayOutcome,
    provider?: string,
  ): Promise<GatewayResponse> {
    switch (outcome.type) {
      case OutcomeType.MALFORMED_PAYLOAD:
        this.logger.warn(`Invalid JSON in webhook payload [${request.id}]: ${errorText(error)}`);
        break;
      case OutcomeType.SIGNATURE_REJECTED:
        this.logger.warn(`Webhook signature rejected [${request.id}]: ${errorText(error)}`);
        break;
      case OutcomeType.UNREADABLE_BODY:
        this.logger.warn(`Unreadable webhook body [${request.id}]: ${errorText(error)}`);
        break;
      case OutcomeType.UNKNOWN_PROVIDER:
        this.logger.warn(`Webhook for unknown provider [${request.id}]: ${errorText(error)}`);
        break;
      default:
        await this.reportInternalFailure(error, request, provider);
    }

    return this.responses.build(outcome);
  }

  private async reportInternalFailure(
    error: unknown,
    request: IncomingRequest,
    provider?: string,
  ): Promise<void> {
    const cause = error instanceof Error ? error : new Error(String(error));
    this.logger.error(
      `Error processing webhook [${request.id}] ${request.path}: ${cause.message}`,
      cause.stack,
    );

    if (!this.hooks?.onError) {
      return;
    }

    try {
      await this.hooks.onError(cause, { requestId: request.id, path: request.path, provider });
    } catch (hookError) {
      this.logger.error(
        `onError hook failed [${request.id}]: ${errorText(hookError)}`,
        hookError instanceof Error ? hookError.stack : undefined,
      );
    }
  }
}

function errorText(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function formatDetails(details: Readonly<Record<string, string | number>>): string {
  const entries = Object.entries(details);
  if (entries.length === 0) {
    return '';
  }
  return ` (${entries.map(([key, value]) => `${key}=${value}`).join(', ')})`;
}
