import {
  EventDetails,
  EventHandlerMap,
  EventHandlerTag,
  getHeader,
  HeaderMap,
  isJsonObject,
  Payload,
  PayloadKind,
  readNumber,
  readString,
  verifyHmacSha256Signature,
  WebhookProviderAdapter,
} from '../../../core';

/**
 * GitHub Provider Adapter
 *
 * Event type arrives in 'x-github-event', the delivery id in
 * 'x-github-delivery' and the signature in 'x-hub-signature-256'
 * as 'sha256=' + hex HMAC-SHA256 of the raw body with the webhook secret.
 *
 * @see https://docs.github.com/en/webhooks/webhook-events-and-payloads
 * @see https://docs.github.com/en/webhooks/using-webhooks/validating-webhook-deliveries
 */
export class GitHubProviderAdapter implements WebhookProviderAdapter {
  readonly providerName = 'github';
  readonly displayName = 'GitHub';
  readonly eventHeader = 'x-github-event';
  readonly signatureHeader = 'x-hub-signature-256';
  readonly deliveryHeader = 'x-github-delivery';

  readonly eventHandlers: EventHandlerMap = {
    push: EventHandlerTag.PUSH,
    pull_request: EventHandlerTag.PULL_REQUEST,
  };

  verifySignature(rawBody: Buffer, headers: HeaderMap, secrets: string[]): boolean {
    return verifyHmacSha256Signature(
      rawBody,
      getHeader(headers, this.signatureHeader),
      secrets,
    );
  }

  describeEvent(handler: EventHandlerTag, payload: Payload): EventDetails {
    if (payload.kind !== PayloadKind.JSON || !isJsonObject(payload.value)) {
      return {};
    }
    const body = payload.value;
    const details: Record<string, string | number> = {};

    switch (handler) {
      case EventHandlerTag.PUSH: {
        const ref = readString(body, 'ref');
        if (ref !== undefined) details.ref = ref;
        const commits = body.commits;
        if (Array.isArray(commits)) details.commits = commits.length;
        break;
      }

      case EventHandlerTag.PULL_REQUEST: {
        const action = readString(body, 'action');
        if (action !== undefined) details.action = action;
        const number = readNumber(body, 'number');
        if (number !== undefined) details.number = number;
        break;
      }

      default:
        break;
    }

    return details;
  }
}
